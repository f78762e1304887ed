import Decimal from "decimal.js";
import { describe, expect, it } from "vitest";

import { createMemoryStore } from "@/lib/memoryStore";
import { computeMetrics, getFundMetrics, metricsContextLines, type MetricsBreakdown } from "@/lib/metrics";

import { adj, call, dist, makeFund } from "./fixtures";

const baseline = [
  call("c1", "2024-01-15", "6000000"),
  call("c2", "2024-06-15", "4000000"),
  dist("d1", "2024-12-15", "4000000"),
];

function breakdown(...args: Parameters<typeof computeMetrics>): MetricsBreakdown {
  const res = computeMetrics(...args);
  if (!res.ok) throw res.error;
  return res.breakdown;
}

describe("computeMetrics", () => {
  it("computes PIC and DPI from calls and distributions", () => {
    const b = breakdown(makeFund(), baseline);
    expect(b.totalCalls).toBe("10000000.00");
    expect(b.pic).toBe("10000000.00");
    expect(b.cumulativeDistributions).toBe("4000000.00");
    expect(b.dpi).toEqual({ status: "defined", value: 0.4 });
    expect(b.counts).toEqual({ capitalCalls: 2, distributions: 1, adjustments: 0 });
  });

  it("adds contribution adjustments to paid-in capital", () => {
    const b = breakdown(makeFund(), [...baseline, adj("a1", "2024-03-01", "100000", true)]);
    expect(b.contributionAdjustments).toBe("100000.00");
    expect(b.pic).toBe("10100000.00");
    expect(b.dpi.value).toBe(0.396);
    expect(b.adjustmentsApplied).toEqual([
      {
        transactionId: "a1",
        date: "2024-03-01",
        category: "Contribution Adjustment",
        amount: "100000.00",
        side: "contribution",
        flagSource: "text",
      },
    ]);
  });

  it("subtracts other adjustments and flags the defaulted direction", () => {
    const b = breakdown(makeFund(), [...baseline, adj("a1", "2024-03-01", "50000", false)]);
    expect(b.distributionSideAdjustments).toBe("50000.00");
    expect(b.pic).toBe("9950000.00");
    expect(b.dpi.value).toBe(0.402);
    expect(b.notes).toContain(
      "1 adjustment(s) had no contribution signal and were treated as capital-call-side refunds; verify against the source documents.",
    );
  });

  it("reports DPI as 0 when nothing was paid in", () => {
    const b = breakdown(makeFund(), [dist("d1", "2024-12-15", "1000")]);
    expect(b.pic).toBe("0.00");
    expect(b.dpi).toEqual({ status: "defined", value: 0 });
    expect(b.irr).toEqual({ status: "undefined", value: null, reason: "too_few_flows" });
    expect(b.notes).toEqual([
      "Paid-in capital is zero; DPI is reported as 0.",
      "IRR is undefined (too few flows).",
      "Residual NAV is not tracked for this fund; TVPI equals DPI.",
    ]);
  });

  it("leaves DPI and TVPI undefined when adjustments push PIC negative", () => {
    const b = breakdown(makeFund(), [call("c1", "2024-01-01", "1000"), adj("a1", "2024-02-01", "2000", false)]);
    expect(b.pic).toBe("-1000.00");
    expect(b.dpi.status).toBe("undefined");
    expect(b.tvpi).toEqual({ status: "undefined", value: null, navTracked: false });
  });

  it("marks IRR undefined without a sign change", () => {
    const b = breakdown(makeFund(), [call("c1", "2024-01-01", "1000"), call("c2", "2024-02-01", "1000")]);
    expect(b.irr.status).toBe("undefined");
    expect(b.irr.reason).toBe("no_sign_change");
    expect(b.notes).toContain("IRR is undefined (no sign change).");
  });

  it("orders signed cash flows by date", () => {
    const b = breakdown(makeFund(), [...baseline, adj("a1", "2024-03-01", "100000", true)]);
    expect(b.cashFlows.map((f) => [f.date, f.kind, f.amount])).toEqual([
      ["2024-01-15", "capital_call", "-6000000.00"],
      ["2024-03-01", "adjustment", "-100000.00"],
      ["2024-06-15", "capital_call", "-4000000.00"],
      ["2024-12-15", "distribution", "4000000.00"],
    ]);
    expect(b.irr.status).toBe("defined");
    expect(b.irr.value ?? 0).toBeLessThan(0);
  });

  it("uses residual NAV for TVPI when the fund tracks it", () => {
    const fund = makeFund({ nav: new Decimal("6000000"), navAsOf: "2024-12-31" });
    const b = breakdown(fund, baseline);
    expect(b.tvpi).toEqual({ status: "defined", value: 1, navTracked: true, nav: "6000000.00", navAsOf: "2024-12-31" });
    expect(b.cashFlows.at(-1)).toEqual({ date: "2024-12-31", kind: "residual_nav", amount: "6000000.00" });
  });

  it("gives TVPI equal to DPI without NAV", () => {
    const b = breakdown(makeFund(), baseline);
    expect(b.tvpi).toEqual({ status: "defined", value: 0.4, navTracked: false });
  });

  it("is deterministic for equal inputs", () => {
    expect(breakdown(makeFund(), baseline)).toEqual(breakdown(makeFund(), [...baseline].reverse()));
  });

  it("rejects transactions from another fund", () => {
    const res = computeMetrics(makeFund(), [call("c1", "2024-01-01", "1000", "fund-2")]);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("FOREIGN_TRANSACTION");
  });
});

describe("metricsContextLines", () => {
  it("labels every figure for citation", () => {
    const lines = metricsContextLines(breakdown(makeFund(), baseline));
    expect(lines[0]).toBe("[M:PIC] Paid-in capital: 10000000.00");
    expect(lines).toContain("[M:DPI] DPI: 0.4000");
    expect(lines).toContain("[M:TVPI] TVPI: 0.4000 (NAV not tracked; equals DPI)");
  });
});

describe("getFundMetrics", () => {
  it("reads the fund and its transactions from the store", async () => {
    const store = createMemoryStore();
    await store.withUnitOfWork(async (uow) => {
      uow.putFund(makeFund());
      for (const t of baseline) uow.addTransaction(t);
    });
    const res = await getFundMetrics(store, "fund-1");
    expect(res.ok && res.breakdown.pic).toBe("10000000.00");
  });

  it("reports a missing fund", async () => {
    const res = await getFundMetrics(createMemoryStore(), "nope");
    expect(res.ok ? "" : res.error.code).toBe("FUND_NOT_FOUND");
  });
});
