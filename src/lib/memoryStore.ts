import { canTransition, type DocumentPatch, type DocumentRecord, type ParsingStatus } from "@/lib/documents";
import { InvalidStatusTransitionError, NotFoundError } from "@/lib/errors";
import type { Fund, TransactionRecord } from "@/lib/funds";
import { createOpenGuard, runUnitOfWork, type Store, type UnitOfWork, type UnitOfWorkHandle } from "@/lib/store";

type State = {
  funds: Map<string, Fund>;
  transactions: Map<string, TransactionRecord>;
  documents: Map<string, DocumentRecord>;
};

type StagedOp = (draft: State) => void;

export type MemoryStore = Store & {
  /** Number of units of work currently open; for tests. */
  openUnits(): number;
};

function copyState(state: State): State {
  return {
    funds: new Map(state.funds),
    transactions: new Map(state.transactions),
    documents: new Map(state.documents),
  };
}

function byCreated<T extends { createdAt?: string; uploadedAt?: string }>(a: T, b: T): number {
  return (b.createdAt ?? b.uploadedAt ?? "").localeCompare(a.createdAt ?? a.uploadedAt ?? "");
}

/** In-process store with the same all-or-nothing commit semantics as the DynamoDB store. */
export function createMemoryStore(): MemoryStore {
  let state: State = { funds: new Map(), transactions: new Map(), documents: new Map() };
  let open = 0;

  function openUnitOfWork(): UnitOfWorkHandle {
    const guard = createOpenGuard();
    const ops: StagedOp[] = [];
    open += 1;

    const stage = (op: StagedOp) => {
      guard.assertOpen();
      ops.push(op);
    };

    const uow: UnitOfWork = {
      async getFund(fundId) {
        guard.assertOpen();
        return state.funds.get(fundId) ?? null;
      },
      async listFunds(limit = 50) {
        guard.assertOpen();
        return Array.from(state.funds.values()).sort(byCreated).slice(0, limit);
      },
      putFund(fund) {
        stage((draft) => {
          draft.funds.set(fund.fundId, fund);
        });
      },
      async listTransactions(fundId) {
        guard.assertOpen();
        return Array.from(state.transactions.values()).filter((t) => t.fundId === fundId);
      },
      addTransaction(record) {
        stage((draft) => {
          if (!draft.funds.has(record.fundId)) throw new NotFoundError(`Fund ${record.fundId}`);
          draft.transactions.set(record.transactionId, record);
        });
      },
      async deleteTransactionsForDocument(fundId, documentId) {
        guard.assertOpen();
        const ids = Array.from(state.transactions.values())
          .filter((t) => t.fundId === fundId && t.documentId === documentId)
          .map((t) => t.transactionId);
        stage((draft) => {
          for (const id of ids) draft.transactions.delete(id);
        });
        return ids.length;
      },
      async getDocument(documentId) {
        guard.assertOpen();
        return state.documents.get(documentId) ?? null;
      },
      async listDocuments(fundId, limit = 100) {
        guard.assertOpen();
        return Array.from(state.documents.values())
          .filter((d) => d.fundId === fundId)
          .sort(byCreated)
          .slice(0, limit);
      },
      createDocument(doc) {
        stage((draft) => {
          if (draft.documents.has(doc.documentId)) {
            throw new Error(`Document ${doc.documentId} already exists`);
          }
          draft.documents.set(doc.documentId, doc);
        });
      },
      transitionDocument(documentId: string, to: ParsingStatus, patch?: DocumentPatch) {
        stage((draft) => {
          const current = draft.documents.get(documentId);
          if (!current || !canTransition(current.parsingStatus, to)) {
            throw new InvalidStatusTransitionError(documentId, to);
          }
          draft.documents.set(documentId, {
            ...current,
            parsingStatus: to,
            updatedAt: new Date().toISOString(),
            ...(patch?.errorMessage !== undefined ? { errorMessage: patch.errorMessage } : {}),
            ...(patch?.stats ? { stats: patch.stats } : {}),
          });
        });
      },
      deleteDocument(doc) {
        stage((draft) => {
          draft.documents.delete(doc.documentId);
        });
      },
    };

    return {
      uow,
      async commit() {
        guard.assertOpen();
        if (!ops.length) return;
        const draft = copyState(state);
        for (const op of ops) op(draft);
        state = draft;
      },
      close() {
        if (guard.closed) return;
        guard.close();
        ops.length = 0;
        open -= 1;
      },
    };
  }

  return {
    withUnitOfWork<T>(fn: (uow: UnitOfWork) => Promise<T>) {
      return runUnitOfWork(openUnitOfWork(), fn);
    },
    openUnits() {
      return open;
    },
  };
}
