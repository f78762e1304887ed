import Decimal from "decimal.js";

import { MetricsError } from "@/lib/errors";
import {
  groupTransactions,
  transactionDate,
  type ContributionFlagSource,
  type Fund,
  type IsoDate,
  type TransactionKind,
  type TransactionRecord,
} from "@/lib/funds";
import { DEFAULT_IRR_OPTIONS, xirr, type IrrOptions, type IrrUndefinedReason } from "@/lib/irr";
import { toFixedAmount } from "@/lib/normalize";
import type { Store } from "@/lib/store";

export const RATIO_SCALE = 4;
export const IRR_SCALE = 6;

export type MetricStatus = "defined" | "undefined";

export type CashFlowEntry = {
  date: IsoDate;
  kind: TransactionKind | "residual_nav";
  transactionId?: string;
  amount: string; // signed from the LP's view: paid in is negative
};

export type AppliedAdjustment = {
  transactionId: string;
  date: IsoDate;
  category: string;
  amount: string;
  side: "contribution" | "distribution";
  flagSource: ContributionFlagSource;
};

export type MetricsBreakdown = {
  fundId: string;
  fundName: string;
  counts: { capitalCalls: number; distributions: number; adjustments: number };
  totalCalls: string;
  contributionAdjustments: string;
  distributionSideAdjustments: string;
  pic: string;
  cumulativeDistributions: string;
  dpi: { status: MetricStatus; value: number | null; reason?: string };
  irr: {
    status: MetricStatus;
    value: number | null;
    reason?: IrrUndefinedReason;
    method?: "newton" | "bisection";
    iterations?: number;
  };
  tvpi: { status: MetricStatus; value: number | null; navTracked: boolean; nav?: string; navAsOf?: IsoDate };
  cashFlows: CashFlowEntry[];
  adjustmentsApplied: AppliedAdjustment[];
  notes: string[];
};

export type MetricsResult = { ok: true; breakdown: MetricsBreakdown } | { ok: false; error: MetricsError };

function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, v) => acc.plus(v), new Decimal(0));
}

function ratio(numerator: Decimal, pic: Decimal): number {
  return numerator.div(pic).toDecimalPlaces(RATIO_SCALE, Decimal.ROUND_HALF_UP).toNumber();
}

function compareFlows(a: CashFlowEntry, b: CashFlowEntry): number {
  return a.date.localeCompare(b.date) || (a.transactionId ?? "").localeCompare(b.transactionId ?? "");
}

/**
 * PIC, DPI, IRR and TVPI from a fund's transactions, with every intermediate sum and flow.
 *
 * Adjustments flagged as contributions add to paid-in; the others are capital-call-side refunds
 * and reduce it. Nothing here reads the clock, so equal inputs give identical breakdowns.
 */
export function computeMetrics(
  fund: Fund,
  transactions: readonly TransactionRecord[],
  irrOptions: IrrOptions = DEFAULT_IRR_OPTIONS,
): MetricsResult {
  const foreign = transactions.find((t) => t.fundId !== fund.fundId);
  if (foreign) {
    return {
      ok: false,
      error: new MetricsError(
        "FOREIGN_TRANSACTION",
        `Transaction ${foreign.transactionId} belongs to fund ${foreign.fundId}, not ${fund.fundId}`,
      ),
    };
  }

  const { capitalCalls, distributions, adjustments } = groupTransactions([...transactions]);
  const contributionSide = adjustments.filter((a) => a.isContributionAdjustment);
  const distributionSide = adjustments.filter((a) => !a.isContributionAdjustment);

  const totalCalls = sum(capitalCalls.map((c) => c.amount));
  const contributionAdjustments = sum(contributionSide.map((a) => a.amount));
  const distributionSideAdjustments = sum(distributionSide.map((a) => a.amount));
  const pic = totalCalls.plus(contributionAdjustments).minus(distributionSideAdjustments);
  const cumulativeDistributions = sum(distributions.map((d) => d.amount));
  const notes: string[] = [];

  let dpi: MetricsBreakdown["dpi"];
  if (pic.isZero()) {
    dpi = { status: "defined", value: 0 };
    notes.push("Paid-in capital is zero; DPI is reported as 0.");
  } else if (pic.isNegative()) {
    dpi = { status: "undefined", value: null, reason: "Paid-in capital is negative" };
    notes.push("Paid-in capital is negative after adjustments; DPI and TVPI are undefined.");
  } else {
    dpi = { status: "defined", value: ratio(cumulativeDistributions, pic) };
  }

  const cashFlows: CashFlowEntry[] = [
    ...capitalCalls.map((c) => ({
      date: c.callDate,
      kind: c.kind,
      transactionId: c.transactionId,
      amount: toFixedAmount(c.amount.negated()),
    })),
    ...distributions.map((d) => ({
      date: d.distributionDate,
      kind: d.kind,
      transactionId: d.transactionId,
      amount: toFixedAmount(d.amount),
    })),
    ...adjustments.map((a) => ({
      date: a.adjustmentDate,
      kind: a.kind,
      transactionId: a.transactionId,
      amount: toFixedAmount(a.isContributionAdjustment ? a.amount.negated() : a.amount),
    })),
  ];

  const navTracked = fund.nav !== undefined && fund.navAsOf !== undefined;
  if (fund.nav !== undefined && fund.navAsOf !== undefined) {
    cashFlows.push({ date: fund.navAsOf, kind: "residual_nav", amount: toFixedAmount(fund.nav) });
  }
  cashFlows.sort(compareFlows);

  const irrResult = xirr(
    cashFlows.map((f) => ({ date: f.date, amount: new Decimal(f.amount).toNumber() })),
    irrOptions,
  );
  const irr: MetricsBreakdown["irr"] = irrResult.ok
    ? {
        status: "defined",
        value: new Decimal(irrResult.rate).toDecimalPlaces(IRR_SCALE, Decimal.ROUND_HALF_UP).toNumber(),
        method: irrResult.method,
        iterations: irrResult.iterations,
      }
    : { status: "undefined", value: null, reason: irrResult.reason };
  if (!irrResult.ok) notes.push(`IRR is undefined (${irrResult.reason.replaceAll("_", " ")}).`);

  let tvpi: MetricsBreakdown["tvpi"];
  if (dpi.value === null) {
    tvpi = { status: "undefined", value: null, navTracked };
  } else if (fund.nav !== undefined && fund.navAsOf !== undefined) {
    const value = pic.isZero() ? 0 : ratio(cumulativeDistributions.plus(fund.nav), pic);
    tvpi = { status: "defined", value, navTracked: true, nav: toFixedAmount(fund.nav), navAsOf: fund.navAsOf };
  } else {
    tvpi = { status: "defined", value: dpi.value, navTracked: false };
    notes.push("Residual NAV is not tracked for this fund; TVPI equals DPI.");
  }

  const defaulted = distributionSide.filter((a) => a.contributionFlagSource === "default").length;
  if (defaulted) {
    notes.push(
      `${defaulted} adjustment(s) had no contribution signal and were treated as capital-call-side refunds; verify against the source documents.`,
    );
  }

  const adjustmentsApplied: AppliedAdjustment[] = adjustments
    .map((a) => ({
      transactionId: a.transactionId,
      date: transactionDate(a),
      category: a.category,
      amount: toFixedAmount(a.amount),
      side: a.isContributionAdjustment ? ("contribution" as const) : ("distribution" as const),
      flagSource: a.contributionFlagSource,
    }))
    .sort((a, b) => a.date.localeCompare(b.date) || a.transactionId.localeCompare(b.transactionId));

  return {
    ok: true,
    breakdown: {
      fundId: fund.fundId,
      fundName: fund.name,
      counts: {
        capitalCalls: capitalCalls.length,
        distributions: distributions.length,
        adjustments: adjustments.length,
      },
      totalCalls: toFixedAmount(totalCalls),
      contributionAdjustments: toFixedAmount(contributionAdjustments),
      distributionSideAdjustments: toFixedAmount(distributionSideAdjustments),
      pic: toFixedAmount(pic),
      cumulativeDistributions: toFixedAmount(cumulativeDistributions),
      dpi,
      irr,
      tvpi,
      cashFlows,
      adjustmentsApplied,
      notes,
    },
  };
}

/** Reads the fund and its transactions in one unit of work and computes its metrics. */
export async function getFundMetrics(store: Store, fundId: string, irrOptions?: IrrOptions): Promise<MetricsResult> {
  const loaded = await store.withUnitOfWork(async (uow) => {
    const fund = await uow.getFund(fundId);
    if (!fund) return null;
    return { fund, transactions: await uow.listTransactions(fundId) };
  });
  if (!loaded) {
    return { ok: false, error: new MetricsError("FUND_NOT_FOUND", `Fund ${fundId} not found`) };
  }
  return computeMetrics(loaded.fund, loaded.transactions, irrOptions);
}

/** Key/value lines labeled `[M:NAME]` for prompt context and fallback answers. */
export function metricsContextLines(b: MetricsBreakdown): string[] {
  const show = (m: { status: MetricStatus; value: number | null }, digits: number) =>
    m.status === "defined" && m.value !== null ? m.value.toFixed(digits) : "undefined";
  const irrText =
    b.irr.status === "defined" && b.irr.value !== null
      ? `${(b.irr.value * 100).toFixed(2)}%`
      : `undefined (${(b.irr.reason ?? "no_convergence").replaceAll("_", " ")})`;
  return [
    `[M:PIC] Paid-in capital: ${b.pic}`,
    `[M:TOTAL_CALLS] Total capital calls: ${b.totalCalls}`,
    `[M:CONTRIBUTION_ADJUSTMENTS] Contribution adjustments: ${b.contributionAdjustments}`,
    `[M:DISTRIBUTION_SIDE_ADJUSTMENTS] Capital-call-side refunds: ${b.distributionSideAdjustments}`,
    `[M:DISTRIBUTIONS] Cumulative distributions: ${b.cumulativeDistributions}`,
    `[M:DPI] DPI: ${show(b.dpi, RATIO_SCALE)}`,
    `[M:IRR] IRR: ${irrText}`,
    `[M:TVPI] TVPI: ${show(b.tvpi, RATIO_SCALE)}${b.tvpi.navTracked ? "" : " (NAV not tracked; equals DPI)"}`,
  ];
}
