import { describe, expect, it } from "vitest";

import { planTransactions, type StagedWrite } from "@/lib/ddbStore";

function puts(count: number, requiresFund?: string): StagedWrite[] {
  return Array.from({ length: count }, (_, i) => ({
    item: { Put: { TableName: "ledger", Item: { pk: `FUND#f1#TXN`, sk: `CAPITAL_CALL#2024-01-01#${i}` } } },
    requiresFund,
  }));
}

describe("planTransactions", () => {
  it("adds one fund existence check per transaction", () => {
    const groups = planTransactions("ledger", puts(150, "f1"), new Set());
    expect(groups.map((g) => g.length)).toEqual([100, 52]);
    for (const group of groups) {
      expect(group.at(-1)?.item.ConditionCheck?.Key).toEqual({ pk: "FUND#f1", sk: "META" });
    }
  });

  it("skips the check when the fund is written in the same unit of work", () => {
    const groups = planTransactions("ledger", puts(150, "f1"), new Set(["f1"]));
    expect(groups.map((g) => g.length)).toEqual([100, 50]);
    expect(groups.flat().some((w) => w.item.ConditionCheck)).toBe(false);
  });

  it("returns no transactions for an empty unit of work", () => {
    expect(planTransactions("ledger", [], new Set())).toEqual([]);
  });
});
