import type { ClassificationBasis, TableKind } from "@/lib/tableClassifier";

export type ParsingStatus = "pending" | "processing" | "completed" | "completed_with_errors" | "failed";

export type TerminalStatus = Extract<ParsingStatus, "completed" | "completed_with_errors" | "failed">;

export const PARSING_STATUSES: readonly ParsingStatus[] = [
  "pending",
  "processing",
  "completed",
  "completed_with_errors",
  "failed",
];

const ALLOWED_PREVIOUS: Record<ParsingStatus, readonly ParsingStatus[]> = {
  pending: [],
  processing: ["pending"],
  completed: ["processing"],
  completed_with_errors: ["processing"],
  // A job that cannot start (missing blob, unreadable PDF) fails straight from pending.
  failed: ["pending", "processing"],
};

export function allowedPreviousStatuses(to: ParsingStatus): readonly ParsingStatus[] {
  return ALLOWED_PREVIOUS[to];
}

export function canTransition(from: ParsingStatus, to: ParsingStatus): boolean {
  return ALLOWED_PREVIOUS[to].includes(from);
}

export function isTerminal(status: ParsingStatus): status is TerminalStatus {
  return status === "completed" || status === "completed_with_errors" || status === "failed";
}

export function asParsingStatus(value: unknown): ParsingStatus {
  return PARSING_STATUSES.find((s) => s === value) ?? "pending";
}

export type TableSummary = {
  pageNumber: number;
  tableIndex: number;
  kind: TableKind;
  basis: ClassificationBasis;
  rowsExtracted: number;
  rowErrors: number;
  skippedReason?: string;
};

export type ProcessingStats = {
  pageCount: number;
  pagesProcessed: number;
  tablesFound: number;
  capitalCalls: number;
  distributions: number;
  adjustments: number;
  unknownTables: number;
  chunkCount: number;
  errors: string[];
  tables: TableSummary[];
};

export type DocumentRecord = {
  documentId: string;
  fundId: string;
  fileName: string;
  blobKey: string;
  contentType: string;
  sizeBytes: number;
  uploadedAt: string;
  updatedAt: string;
  parsingStatus: ParsingStatus;
  errorMessage?: string;
  stats?: ProcessingStats;
};

export type DocumentPatch = {
  errorMessage?: string;
  stats?: ProcessingStats;
};

export function summarizeErrors(errors: readonly string[], limit = 3): string | undefined {
  if (!errors.length) return undefined;
  const head = errors.slice(0, limit).join("; ");
  return errors.length > limit ? `${head} (+${errors.length - limit} more)` : head;
}
