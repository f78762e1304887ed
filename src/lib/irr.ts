import { differenceInCalendarDays, parseISO } from "date-fns";

import type { IsoDate } from "@/lib/funds";

export type DatedFlow = {
  date: IsoDate;
  amount: number;
};

export type IrrOptions = {
  maxIterations: number;
  tolerance: number;
};

export const DEFAULT_IRR_OPTIONS: IrrOptions = { maxIterations: 100, tolerance: 1e-7 };

export type IrrUndefinedReason = "too_few_flows" | "no_sign_change" | "no_convergence";

export type IrrResult =
  | { ok: true; rate: number; method: "newton" | "bisection"; iterations: number }
  | { ok: false; reason: IrrUndefinedReason };

const DAYS_PER_YEAR = 365;
const NEWTON_GUESS = 0.1;
const LOWER_BOUND = -0.9999;

type YearFlow = { years: number; amount: number };

function toYearFlows(flows: readonly DatedFlow[]): YearFlow[] {
  const sorted = [...flows].sort((a, b) => a.date.localeCompare(b.date));
  const origin = parseISO(sorted[0]?.date ?? "1970-01-01");
  return sorted.map((f) => ({
    years: differenceInCalendarDays(parseISO(f.date), origin) / DAYS_PER_YEAR,
    amount: f.amount,
  }));
}

function npv(rate: number, flows: readonly YearFlow[]): number {
  return flows.reduce((sum, f) => sum + f.amount / Math.pow(1 + rate, f.years), 0);
}

function npvDerivative(rate: number, flows: readonly YearFlow[]): number {
  return flows.reduce((sum, f) => sum - (f.years * f.amount) / Math.pow(1 + rate, f.years + 1), 0);
}

function newton(flows: readonly YearFlow[], options: IrrOptions): IrrResult | null {
  let rate = NEWTON_GUESS;
  for (let i = 1; i <= options.maxIterations; i += 1) {
    const value = npv(rate, flows);
    const slope = npvDerivative(rate, flows);
    if (!Number.isFinite(value) || !Number.isFinite(slope) || slope === 0) return null;
    const next = rate - value / slope;
    if (!Number.isFinite(next) || next <= -1) return null;
    if (Math.abs(next - rate) < options.tolerance) {
      return { ok: true, rate: next, method: "newton", iterations: i };
    }
    rate = next;
  }
  return null;
}

function bisection(flows: readonly YearFlow[], options: IrrOptions): IrrResult {
  let lo = LOWER_BOUND;
  let hi = 1;
  let fLo = npv(lo, flows);
  let fHi = npv(hi, flows);
  // Widen the upper bound until the root is bracketed.
  while (fLo * fHi > 0 && hi < 1e6) {
    hi *= 10;
    fHi = npv(hi, flows);
  }
  if (!(fLo * fHi <= 0)) return { ok: false, reason: "no_convergence" };

  for (let i = 1; i <= options.maxIterations; i += 1) {
    const mid = (lo + hi) / 2;
    const fMid = npv(mid, flows);
    if (Math.abs(fMid) < options.tolerance || (hi - lo) / 2 < options.tolerance) {
      return { ok: true, rate: mid, method: "bisection", iterations: i };
    }
    if (fLo * fMid < 0) {
      hi = mid;
      fHi = fMid;
    } else {
      lo = mid;
      fLo = fMid;
    }
  }
  return { ok: false, reason: "no_convergence" };
}

/**
 * Annualized internal rate of return over dated flows (actual/365 from the earliest flow).
 * Newton's method first, bisection when Newton diverges.
 */
export function xirr(flows: readonly DatedFlow[], options: IrrOptions = DEFAULT_IRR_OPTIONS): IrrResult {
  const nonZero = flows.filter((f) => f.amount !== 0);
  if (nonZero.length < 2) return { ok: false, reason: "too_few_flows" };
  if (!nonZero.some((f) => f.amount > 0) || !nonZero.some((f) => f.amount < 0)) {
    return { ok: false, reason: "no_sign_change" };
  }
  const yearFlows = toYearFlows(nonZero);
  return newton(yearFlows, options) ?? bisection(yearFlows, options);
}
