import type { DocumentPatch, DocumentRecord, ParsingStatus } from "@/lib/documents";
import { UnitOfWorkClosedError } from "@/lib/errors";
import type { Fund, TransactionRecord } from "@/lib/funds";

/**
 * A unit of work against durable storage. Reads go straight to storage; writes are staged and
 * only reach storage when the owning `withUnitOfWork` callback resolves.
 */
export type UnitOfWork = {
  getFund(fundId: string): Promise<Fund | null>;
  listFunds(limit?: number): Promise<Fund[]>;
  putFund(fund: Fund): void;

  listTransactions(fundId: string): Promise<TransactionRecord[]>;
  addTransaction(record: TransactionRecord): void;
  /** Stages deletion of every transaction extracted from `documentId`; returns how many. */
  deleteTransactionsForDocument(fundId: string, documentId: string): Promise<number>;

  getDocument(documentId: string): Promise<DocumentRecord | null>;
  listDocuments(fundId: string, limit?: number): Promise<DocumentRecord[]>;
  createDocument(doc: DocumentRecord): void;
  /** Conditional on the stored status being a legal predecessor of `to`. */
  transitionDocument(documentId: string, to: ParsingStatus, patch?: DocumentPatch): void;
  deleteDocument(doc: DocumentRecord): void;
};

export type Store = {
  withUnitOfWork<T>(fn: (uow: UnitOfWork) => Promise<T>): Promise<T>;
};

export type UnitOfWorkHandle = {
  uow: UnitOfWork;
  commit(): Promise<void>;
  close(): void;
};

/** Commits when `fn` resolves, drops staged writes when it throws, and always closes. */
export async function runUnitOfWork<T>(handle: UnitOfWorkHandle, fn: (uow: UnitOfWork) => Promise<T>): Promise<T> {
  try {
    const result = await fn(handle.uow);
    await handle.commit();
    return result;
  } finally {
    handle.close();
  }
}

export type OpenGuard = {
  assertOpen(): void;
  close(): void;
  readonly closed: boolean;
};

export function createOpenGuard(): OpenGuard {
  let closed = false;
  return {
    assertOpen() {
      if (closed) throw new UnitOfWorkClosedError();
    },
    close() {
      closed = true;
    },
    get closed() {
      return closed;
    },
  };
}
