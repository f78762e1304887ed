import { describe, expect, it } from "vitest";

import { xirr } from "@/lib/irr";

describe("xirr", () => {
  const flows = [
    { date: "2020-01-01", amount: -1000 },
    { date: "2021-01-01", amount: 1100 },
  ];

  it("solves a one-period investment on actual/365 days", () => {
    const res = xirr(flows);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    // 2020 is a leap year: 366 days.
    expect(res.rate).toBeCloseTo(Math.pow(1.1, 365 / 366) - 1, 8);
    expect(res.method).toBe("newton");
  });

  it("does not depend on input order", () => {
    const res = xirr([...flows].reverse());
    const expected = xirr(flows);
    expect(res).toEqual(expected);
  });

  it("is undefined without both signs or with fewer than two flows", () => {
    expect(xirr([{ date: "2024-01-01", amount: -1000 }, { date: "2024-02-01", amount: -1000 }])).toEqual({
      ok: false,
      reason: "no_sign_change",
    });
    expect(xirr([{ date: "2024-01-01", amount: -1000 }, { date: "2024-02-01", amount: 0 }])).toEqual({
      ok: false,
      reason: "too_few_flows",
    });
  });

  it("gives up when neither solver converges within the iteration budget", () => {
    expect(xirr(flows, { maxIterations: 1, tolerance: 1e-7 })).toEqual({ ok: false, reason: "no_convergence" });
  });

  it("falls back to bisection when Newton leaves the domain", () => {
    const res = xirr([
      { date: "2023-01-01", amount: -1000 },
      { date: "2024-01-01", amount: 100 },
    ]);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.method).toBe("bisection");
    expect(res.rate).toBeCloseTo(-0.9, 5);
  });
});
