import { describe, expect, it } from "vitest";

import { resolveColumns, type RawTable } from "@/lib/tableClassifier";
import { extractTransactions } from "@/lib/transactionExtractor";

const ctx = { fundId: "fund-1", documentId: "doc-1" };

function run(table: RawTable, kind: "capital_call" | "distribution" | "adjustment" | "unknown", order?: "MDY" | "DMY") {
  return extractTransactions(table, kind, resolveColumns(table.headerRow), { ...ctx, dateOrder: order });
}

describe("extractTransactions", () => {
  it("extracts capital calls and reports bad rows without stopping", () => {
    const { records, rowErrors } = run(
      {
        headerRow: ["Date", "Call Number", "Amount", "Description"],
        dataRows: [
          ["01/15/2024", "Call 1", "$5,000,000", "Initial capital call"],
          ["bad", "Call 2", "$1,000", "x"],
          ["", "", "", ""],
          ["03/01/2024", "Call 3", "0", "zero"],
        ],
      },
      "capital_call",
    );

    expect(rowErrors).toEqual(['Row 2: Date needs a four-digit year: "bad"', 'Row 4: Amount is zero: "0"']);
    expect(records).toHaveLength(1);
    const [first] = records;
    expect(first?.kind).toBe("capital_call");
    if (first?.kind !== "capital_call") return;
    expect(first.callDate).toBe("2024-01-15");
    expect(first.amount.toFixed(2)).toBe("5000000.00");
    expect(first.callType).toBe("Capital Call");
    expect(first.description).toBe("Initial capital call");
    expect(first.fundId).toBe("fund-1");
    expect(first.documentId).toBe("doc-1");
  });

  it("reads distribution types, recallable flags and stores magnitudes", () => {
    const { records, rowErrors } = run(
      {
        headerRow: ["Date", "Type", "Amount", "Recallable", "Description"],
        dataRows: [
          ["02/15/2024", "Return of Capital", "$1,500,000", "No", "Exit proceeds"],
          ["06/30/2024", "Income", "(500,000)", "Yes", "Dividend"],
        ],
      },
      "distribution",
    );

    expect(rowErrors).toEqual([]);
    const summary = records.map((r) =>
      r.kind === "distribution" ? [r.distributionDate, r.distributionType, r.amount.toFixed(2), r.isRecallable] : [],
    );
    expect(summary).toEqual([
      ["2024-02-15", "Return of Capital", "1500000.00", false],
      ["2024-06-30", "Income", "500000.00", true],
    ]);
  });

  it("keeps adjustment signs and infers the contribution flag from text", () => {
    const { records } = run(
      {
        headerRow: ["Date", "Type", "Amount", "Description"],
        dataRows: [
          ["01/15/2024", "Capital Call Adjustment", "$100,000", "Fee true-up"],
          ["03/20/2024", "Recallable Distribution", "-$50,000", "Recallable return"],
        ],
      },
      "adjustment",
    );

    const summary = records.map((r) =>
      r.kind === "adjustment"
        ? [r.category, r.amount.toFixed(2), r.isContributionAdjustment, r.contributionFlagSource]
        : [],
    );
    expect(summary).toEqual([
      ["Capital Call Adjustment", "100000.00", true, "text"],
      ["Recallable Distribution", "-50000.00", false, "default"],
    ]);
  });

  it("rejects adjustments without a category", () => {
    const { records, rowErrors } = run({ headerRow: ["Date", "Amount"], dataRows: [["01/01/2024", "100"]] }, "adjustment");
    expect(records).toEqual([]);
    expect(rowErrors).toEqual(['Row 1: Missing adjustment category: "01/01/2024 | 100"']);
  });

  it("honors the configured date order", () => {
    const { records } = run(
      { headerRow: ["Date", "Amount"], dataRows: [["04/05/2024", "1,000"]] },
      "capital_call",
      "DMY",
    );
    const [record] = records;
    expect(record?.kind === "capital_call" && record.callDate).toBe("2024-05-04");
  });

  it("extracts nothing from unknown tables", () => {
    expect(run({ headerRow: ["Name"], dataRows: [["x"]] }, "unknown")).toEqual({ records: [], rowErrors: [] });
  });
});
