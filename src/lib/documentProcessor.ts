import { chunkPageText, DEFAULT_CHUNK_OPTIONS, type ChunkOptions, type TextChunkDraft } from "@/lib/chunker";
import type { DocumentRecord, ProcessingStats, TableSummary, TerminalStatus } from "@/lib/documents";
import type { EmbeddingProvider } from "@/lib/embeddings";
import { PageError, errorMessage } from "@/lib/errors";
import type { TransactionRecord } from "@/lib/funds";
import type { DateOrder } from "@/lib/normalize";
import type { Store } from "@/lib/store";
import { classifyTable, type RawTable } from "@/lib/tableClassifier";
import { extractTransactions } from "@/lib/transactionExtractor";
import type { DocumentSource } from "@/lib/types";
import type { TextChunk, VectorIndex } from "@/lib/vectorIndex";

export type ProcessingReport = {
  status: TerminalStatus;
  pageCount: number;
  pagesProcessed: number;
  tablesFound: number;
  capitalCalls: number;
  distributions: number;
  adjustments: number;
  unknownTables: number;
  chunksCreated: number;
  errors: string[];
  tables: TableSummary[];
};

export type ProcessorDeps = {
  store: Store;
  embeddings: EmbeddingProvider;
  index: VectorIndex;
  chunkOptions?: ChunkOptions;
  dateOrder?: DateOrder;
};

export type ProcessDocumentInput<P> = {
  document: Pick<DocumentRecord, "documentId" | "fundId">;
  source: DocumentSource<P>;
};

export function decideStatus(report: Pick<ProcessingReport, "capitalCalls" | "distributions" | "adjustments" | "chunksCreated" | "errors">): TerminalStatus {
  const produced = report.capitalCalls + report.distributions + report.adjustments + report.chunksCreated;
  if (!report.errors.length) return "completed";
  return produced > 0 ? "completed_with_errors" : "failed";
}

export function toProcessingStats(report: ProcessingReport): ProcessingStats {
  return {
    pageCount: report.pageCount,
    pagesProcessed: report.pagesProcessed,
    tablesFound: report.tablesFound,
    capitalCalls: report.capitalCalls,
    distributions: report.distributions,
    adjustments: report.adjustments,
    unknownTables: report.unknownTables,
    chunkCount: report.chunksCreated,
    errors: report.errors,
    tables: report.tables,
  };
}

export function chunkId(documentId: string, chunkIndex: number): string {
  return `${documentId}-${chunkIndex}`;
}

/**
 * Walks a loaded document page by page. Tables are classified, extracted and saved one table per
 * unit of work; page prose is chunked, embedded and indexed. Every failure below the document
 * level is recorded in the report and processing moves on, so this never throws.
 */
export function createDocumentProcessor(deps: ProcessorDeps) {
  const chunkOptions = deps.chunkOptions ?? DEFAULT_CHUNK_OPTIONS;

  async function saveTable(
    report: ProcessingReport,
    table: RawTable,
    where: { pageNumber: number; tableIndex: number },
    ids: { fundId: string; documentId: string },
  ) {
    const label = `Page ${where.pageNumber}, table ${where.tableIndex + 1}`;
    const classification = classifyTable(table.headerRow, table.dataRows);
    if (!classification.ok) {
      report.errors.push(`${label}: ${classification.error.message}`);
      report.tables.push({
        ...where,
        kind: "unknown",
        basis: "none",
        rowsExtracted: 0,
        rowErrors: 0,
        skippedReason: classification.error.message,
      });
      return;
    }

    const { kind, mapping, basis } = classification;
    if (kind === "unknown") {
      report.unknownTables += 1;
      report.tables.push({ ...where, kind, basis, rowsExtracted: 0, rowErrors: 0, skippedReason: "unclassified" });
      return;
    }

    const { records, rowErrors } = extractTransactions(table, kind, mapping, {
      fundId: ids.fundId,
      documentId: ids.documentId,
      dateOrder: deps.dateOrder,
    });
    for (const rowError of rowErrors) report.errors.push(`${label}: ${rowError}`);

    let saved: TransactionRecord[] = [];
    if (records.length) {
      try {
        await deps.store.withUnitOfWork(async (uow) => {
          for (const record of records) uow.addTransaction(record);
        });
        saved = records;
      } catch (err) {
        report.errors.push(`${label}: failed to save transactions: ${errorMessage(err)}`);
      }
    }

    for (const record of saved) {
      if (record.kind === "capital_call") report.capitalCalls += 1;
      else if (record.kind === "distribution") report.distributions += 1;
      else report.adjustments += 1;
    }
    report.tables.push({ ...where, kind, basis, rowsExtracted: saved.length, rowErrors: rowErrors.length });
  }

  async function indexText(drafts: TextChunkDraft[], ids: { fundId: string; documentId: string }): Promise<number> {
    if (!drafts.length) return 0;
    const vectors = await deps.embeddings.embed(drafts.map((d) => d.text));
    if (vectors.length !== drafts.length) {
      throw new Error(`Embedding provider returned ${vectors.length} vectors for ${drafts.length} chunks`);
    }
    const chunks: TextChunk[] = drafts.map((d, i) => ({
      chunkId: chunkId(ids.documentId, d.chunkIndex),
      documentId: ids.documentId,
      fundId: ids.fundId,
      pageNumber: d.pageNumber,
      chunkIndex: d.chunkIndex,
      text: d.text,
      embedding: vectors[i] ?? [],
    }));
    await deps.index.upsert(chunks);
    return chunks.length;
  }

  async function processDocument<P>(input: ProcessDocumentInput<P>): Promise<ProcessingReport> {
    const { source } = input;
    const ids = { fundId: input.document.fundId, documentId: input.document.documentId };
    const report: ProcessingReport = {
      status: "completed",
      pageCount: source.pages.pageCount,
      pagesProcessed: 0,
      tablesFound: 0,
      capitalCalls: 0,
      distributions: 0,
      adjustments: 0,
      unknownTables: 0,
      chunksCreated: 0,
      errors: [],
      tables: [],
    };
    let nextChunkIndex = 0;

    for (let pageNumber = 1; pageNumber <= source.pages.pageCount; pageNumber += 1) {
      let page: P;
      try {
        page = await source.pages.page(pageNumber);
      } catch (err) {
        report.errors.push(new PageError(pageNumber, err).message);
        continue;
      }

      try {
        const tables = await source.detectTables(page);
        for (const [tableIndex, table] of tables.entries()) {
          report.tablesFound += 1;
          try {
            await saveTable(report, table, { pageNumber, tableIndex }, ids);
          } catch (err) {
            const message = errorMessage(err);
            report.errors.push(`Page ${pageNumber}, table ${tableIndex + 1}: ${message}`);
            report.tables.push({
              pageNumber,
              tableIndex,
              kind: "unknown",
              basis: "none",
              rowsExtracted: 0,
              rowErrors: 0,
              skippedReason: message,
            });
          }
        }
      } catch (err) {
        report.errors.push(`Page ${pageNumber}: table detection failed: ${errorMessage(err)}`);
      }

      try {
        const text = await source.extractText(page);
        const drafts = chunkPageText(text, pageNumber, nextChunkIndex, chunkOptions);
        report.chunksCreated += await indexText(drafts, ids);
        nextChunkIndex += drafts.length;
      } catch (err) {
        report.errors.push(`Page ${pageNumber}: text indexing failed: ${errorMessage(err)}`);
      }

      report.pagesProcessed += 1;
    }

    report.status = decideStatus(report);
    console.log("document processed", {
      documentId: ids.documentId,
      status: report.status,
      pages: report.pagesProcessed,
      tables: report.tablesFound,
      chunks: report.chunksCreated,
      errors: report.errors.length,
    });
    return report;
  }

  return { processDocument };
}

export type DocumentProcessor = ReturnType<typeof createDocumentProcessor>;
