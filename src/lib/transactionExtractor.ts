import type Decimal from "decimal.js";

import { NormalizationError, errorMessage } from "@/lib/errors";
import { newId, type Adjustment, type CapitalCall, type Distribution, type IsoDate, type TransactionRecord } from "@/lib/funds";
import { isAmountLike, isDateLike, parseAmount, parseDate, type DateOrder } from "@/lib/normalize";
import {
  cleanCell,
  containsTerm,
  isEmptyRow,
  type ColumnMapping,
  type RawTable,
  type TableKind,
} from "@/lib/tableClassifier";

export type ExtractionContext = {
  fundId: string;
  documentId?: string;
  dateOrder?: DateOrder;
};

export type ExtractionResult = {
  records: TransactionRecord[];
  rowErrors: string[];
};

const TRUTHY_FLAGS = new Set(["yes", "y", "true", "t", "1", "x", "✓"]);
const CONTRIBUTION_TERMS = ["contribution", "capital call", "call", "drawdown"];

export const DEFAULT_CALL_TYPE = "Capital Call";
export const DEFAULT_DISTRIBUTION_TYPE = "Distribution";
export const DEFAULT_ADJUSTMENT_TYPE = "Adjustment";

function cellAt(row: readonly string[], index: number | undefined): string {
  return index === undefined ? "" : cleanCell(row[index]);
}

function readDate(row: readonly string[], mapping: ColumnMapping, order: DateOrder): IsoDate {
  if (mapping.date !== undefined) {
    const res = parseDate(cellAt(row, mapping.date), order);
    if (!res.ok) throw res.error;
    return res.value;
  }
  for (const raw of row.slice(0, 3)) {
    const res = parseDate(cleanCell(raw), order);
    if (res.ok) return res.value;
  }
  throw new NormalizationError("No date found", row.map(cleanCell).join(" | "));
}

function readAmount(row: readonly string[], mapping: ColumnMapping): Decimal {
  let value: Decimal | undefined;
  let raw = "";
  if (mapping.amount !== undefined) {
    raw = cellAt(row, mapping.amount);
    const res = parseAmount(raw);
    if (!res.ok) throw res.error;
    value = res.value;
  } else {
    for (const cell of row.map(cleanCell)) {
      if (!cell || isDateLike(cell)) continue;
      const res = parseAmount(cell);
      if (res.ok) {
        value = res.value;
        raw = cell;
        break;
      }
    }
  }
  if (!value) throw new NormalizationError("No amount found", row.map(cleanCell).join(" | "));
  if (value.isZero()) throw new NormalizationError("Amount is zero", raw);
  return value;
}

function readDescription(row: readonly string[], mapping: ColumnMapping): string {
  const described = cellAt(row, mapping.description);
  if (described) return described;
  let longest = "";
  for (const cell of row.map(cleanCell)) {
    if (cell.length <= longest.length || isAmountLike(cell) || isDateLike(cell)) continue;
    longest = cell;
  }
  return longest;
}

function readRecallable(row: readonly string[], mapping: ColumnMapping): boolean {
  if (mapping.recallable !== undefined) {
    return TRUTHY_FLAGS.has(cellAt(row, mapping.recallable).toLowerCase());
  }
  return row.some((raw) => {
    const cell = cleanCell(raw).toLowerCase();
    return containsTerm(cell, "recallable") && !containsTerm(cell, "non-recallable") && !containsTerm(cell, "not recallable");
  });
}

function parseRow(
  kind: Exclude<TableKind, "unknown">,
  row: readonly string[],
  mapping: ColumnMapping,
  ctx: ExtractionContext,
): TransactionRecord {
  const order = ctx.dateOrder ?? "MDY";
  const date = readDate(row, mapping, order);
  const amount = readAmount(row, mapping);
  const description = readDescription(row, mapping);
  const typeText = cellAt(row, mapping.type);
  const base = {
    transactionId: newId(),
    fundId: ctx.fundId,
    documentId: ctx.documentId,
    description,
  };

  if (kind === "capital_call") {
    const call: CapitalCall = {
      ...base,
      kind,
      callDate: date,
      callType: typeText || DEFAULT_CALL_TYPE,
      amount: amount.abs(),
    };
    return call;
  }

  if (kind === "distribution") {
    const dist: Distribution = {
      ...base,
      kind,
      distributionDate: date,
      distributionType: typeText || DEFAULT_DISTRIBUTION_TYPE,
      isRecallable: readRecallable(row, mapping),
      amount: amount.abs(),
    };
    return dist;
  }

  const category = cellAt(row, mapping.category) || typeText;
  if (!category) {
    throw new NormalizationError("Missing adjustment category", row.map(cleanCell).join(" | "));
  }
  const directionText = [typeText, category, description].join(" ");
  const isContribution = CONTRIBUTION_TERMS.some((t) => containsTerm(directionText, t));
  const adj: Adjustment = {
    ...base,
    kind,
    adjustmentDate: date,
    adjustmentType: typeText || DEFAULT_ADJUSTMENT_TYPE,
    category,
    amount,
    isContributionAdjustment: isContribution,
    contributionFlagSource: isContribution ? "text" : "default",
  };
  return adj;
}

/**
 * Turns a classified table into transaction records. Rows fail independently: a bad row is
 * reported in `rowErrors` as "Row N: ..." (1-based data-row index) and the rest still extract.
 */
export function extractTransactions(
  table: RawTable,
  kind: TableKind,
  mapping: ColumnMapping,
  ctx: ExtractionContext,
): ExtractionResult {
  const records: TransactionRecord[] = [];
  const rowErrors: string[] = [];
  if (kind === "unknown") return { records, rowErrors };

  table.dataRows.forEach((row, i) => {
    if (isEmptyRow(row)) return;
    try {
      records.push(parseRow(kind, row, mapping, ctx));
    } catch (err) {
      rowErrors.push(`Row ${i + 1}: ${errorMessage(err)}`);
    }
  });

  return { records, rowErrors };
}
