import { ClassificationError } from "@/lib/errors";
import type { TransactionKind } from "@/lib/funds";
import { isAmountLike, isDateLike } from "@/lib/normalize";

export type RawTable = {
  headerRow: string[];
  dataRows: string[][];
};

export type TableKind = TransactionKind | "unknown";

export type CanonicalField = "date" | "amount" | "description" | "type" | "category" | "recallable";

export type ColumnMapping = Partial<Record<CanonicalField, number>>;

export type KindScores = Record<TransactionKind, number>;

export type ClassificationBasis = "header" | "first_row" | "none";

export type Classification =
  | { ok: true; kind: TableKind; mapping: ColumnMapping; scores: KindScores; basis: ClassificationBasis }
  | { ok: false; error: ClassificationError };

// Adjustment vocabulary overlaps capital-call vocabulary ("capital call adjustment"), so it
// outweighs it, and ties resolve toward adjustment.
export const ADJUSTMENT_WEIGHT = 2;
export const DISTRIBUTION_WEIGHT = 1;
export const CAPITAL_CALL_WEIGHT = 1;
export const RECALLABLE_COLUMN_WEIGHT = 1;
export const MIN_CONFIDENCE = 1;

export const TIE_BREAK_ORDER: readonly TransactionKind[] = ["adjustment", "distribution", "capital_call"];

export const KIND_KEYWORDS: ReadonlyArray<{ kind: TransactionKind; weight: number; terms: readonly string[] }> = [
  {
    kind: "adjustment",
    weight: ADJUSTMENT_WEIGHT,
    terms: ["adjustment", "rebalance", "correction", "recallable", "clawback", "reconciliation", "true-up"],
  },
  {
    kind: "distribution",
    weight: DISTRIBUTION_WEIGHT,
    terms: ["distribution", "return", "dividend", "payment", "proceeds", "paid out"],
  },
  {
    kind: "capital_call",
    weight: CAPITAL_CALL_WEIGHT,
    terms: ["capital call", "call", "contribution", "drawdown", "commitment", "funding"],
  },
];

// Resolution order matters: each header index is claimed once, and within a field earlier
// terms win over later ones ("Amount" beats "Total Commitment").
const FIELD_TERMS: ReadonlyArray<[CanonicalField, readonly string[]]> = [
  ["recallable", ["recallable", "recall", "clawback"]],
  ["date", ["date", "dated", "as of", "period"]],
  ["amount", ["amount", "value", "sum", "total", "usd", "eur", "gbp", "$", "€", "£"]],
  ["category", ["category", "classification"]],
  ["type", ["type", "kind", "class"]],
  ["description", ["description", "note", "memo", "comment", "detail", "purpose", "narrative"]],
];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive match of `term` at the start of a word in `text`. */
export function containsTerm(text: string, term: string): boolean {
  const t = term.toLowerCase();
  const haystack = text.toLowerCase();
  if (!/^[a-z0-9]/.test(t)) return haystack.includes(t);
  return new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(t)}`).test(haystack);
}

export function cleanCell(value: unknown): string {
  if (value == null) return "";
  return String(value).replace(/\s+/g, " ").trim();
}

export function isEmptyRow(row: readonly unknown[]): boolean {
  return !row.some((c) => cleanCell(c));
}

export function scoreText(text: string): KindScores {
  const scores: KindScores = { adjustment: 0, distribution: 0, capital_call: 0 };
  if (!text.trim()) return scores;
  for (const group of KIND_KEYWORDS) {
    for (const term of group.terms) {
      if (containsTerm(text, term)) scores[group.kind] += group.weight;
    }
  }
  return scores;
}

export function pickKind(scores: KindScores): TableKind {
  let best: TableKind = "unknown";
  let bestScore = 0;
  for (const kind of TIE_BREAK_ORDER) {
    if (scores[kind] > bestScore) {
      best = kind;
      bestScore = scores[kind];
    }
  }
  return bestScore >= MIN_CONFIDENCE ? best : "unknown";
}

export function resolveColumns(headerRow: readonly string[]): ColumnMapping {
  const headers = headerRow.map((h) => cleanCell(h).toLowerCase());
  const claimed = new Set<number>();
  const mapping: ColumnMapping = {};

  for (const [field, terms] of FIELD_TERMS) {
    let found: number | undefined;
    for (const term of terms) {
      const idx = headers.findIndex((h, i) => h && !claimed.has(i) && containsTerm(h, term));
      if (idx !== -1) {
        found = idx;
        break;
      }
    }
    if (found !== undefined) {
      mapping[field] = found;
      claimed.add(found);
    }
  }
  return mapping;
}

/** The first data row's type cell, or its first cell that is neither a date nor an amount. */
export function leadingTextCell(row: readonly string[], mapping: ColumnMapping): string {
  if (mapping.type !== undefined) {
    const typed = cleanCell(row[mapping.type]);
    if (typed) return typed;
  }
  for (const raw of row) {
    const cell = cleanCell(raw);
    if (!cell || isDateLike(cell) || isAmountLike(cell)) continue;
    return cell;
  }
  return "";
}

export function classifyTable(headerRow: readonly string[], sampleRows: readonly string[][]): Classification {
  const header = headerRow.map(cleanCell);
  if (!header.some(Boolean)) {
    return { ok: false, error: new ClassificationError("Table has no header row") };
  }
  const rows = sampleRows.filter((r) => !isEmptyRow(r));
  if (!rows.length) {
    return { ok: false, error: new ClassificationError("Table has no data rows") };
  }

  const mapping = resolveColumns(header);

  // A dedicated recallable-flag column marks a distribution table; its header text would
  // otherwise score as adjustment vocabulary.
  const headerText = header.filter((_, i) => i !== mapping.recallable).join(" ");
  const headerScores = scoreText(headerText);
  if (mapping.recallable !== undefined) headerScores.distribution += RECALLABLE_COLUMN_WEIGHT;

  const headerKind = pickKind(headerScores);
  if (headerKind !== "unknown") {
    return { ok: true, kind: headerKind, mapping, scores: headerScores, basis: "header" };
  }

  const rowScores = scoreText(leadingTextCell(rows[0] ?? [], mapping));
  const rowKind = pickKind(rowScores);
  return {
    ok: true,
    kind: rowKind,
    mapping,
    scores: rowScores,
    basis: rowKind === "unknown" ? "none" : "first_row",
  };
}
