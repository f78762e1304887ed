import { z } from "zod";

import type { DocumentRecord } from "@/lib/documents";
import type { Runtime } from "@/lib/runtime";

import { fail, failFromError, IdSchema, LimitSchema, ok, type HandlerResult } from "@/handlers/http";

const UploadSchema = z.object({
  fundId: IdSchema,
  fileName: z.string().trim().min(1).max(255),
  contentType: z.string().trim().default("application/pdf"),
  bytes: z.instanceof(Uint8Array),
});

export type DocumentView = Omit<DocumentRecord, "blobKey">;

export function serializeDocument(doc: DocumentRecord): DocumentView {
  const { blobKey: _blobKey, ...view } = doc;
  return view;
}

const UPLOAD_ERROR_STATUS = {
  EMPTY_FILE: 400,
  NOT_PDF: 415,
  FILE_TOO_LARGE: 413,
  FUND_NOT_FOUND: 404,
} as const;

export async function uploadDocument(rt: Runtime, input: unknown): Promise<HandlerResult<{ document: DocumentView }>> {
  try {
    const body = UploadSchema.parse(input);
    const res = await rt.jobs.uploadDocument(body);
    if (!res.ok) return fail(res.error, UPLOAD_ERROR_STATUS[res.error]);
    return ok({ document: serializeDocument(res.document) }, 202);
  } catch (err) {
    return failFromError(err, "document upload");
  }
}

export async function getDocument(rt: Runtime, documentId: unknown): Promise<HandlerResult<{ document: DocumentView }>> {
  try {
    const id = IdSchema.parse(documentId);
    const doc = await rt.store.withUnitOfWork((uow) => uow.getDocument(id));
    if (!doc) return fail("DOCUMENT_NOT_FOUND", 404);
    return ok({ document: serializeDocument(doc) });
  } catch (err) {
    return failFromError(err, "document get");
  }
}

/** Polling view: current status plus the accumulated processing statistics and errors. */
export async function getDocumentStatus(
  rt: Runtime,
  documentId: unknown,
): Promise<HandlerResult<Pick<DocumentRecord, "documentId" | "parsingStatus" | "errorMessage" | "stats" | "updatedAt">>> {
  try {
    const id = IdSchema.parse(documentId);
    const doc = await rt.store.withUnitOfWork((uow) => uow.getDocument(id));
    if (!doc) return fail("DOCUMENT_NOT_FOUND", 404);
    return ok({
      documentId: doc.documentId,
      parsingStatus: doc.parsingStatus,
      errorMessage: doc.errorMessage,
      stats: doc.stats,
      updatedAt: doc.updatedAt,
    });
  } catch (err) {
    return failFromError(err, "document status");
  }
}

export async function listDocuments(
  rt: Runtime,
  fundId: unknown,
  query: unknown = {},
): Promise<HandlerResult<{ documents: DocumentView[] }>> {
  try {
    const id = IdSchema.parse(fundId);
    const { limit } = z.object({ limit: LimitSchema }).parse(query);
    const docs = await rt.store.withUnitOfWork(async (uow) => {
      const fund = await uow.getFund(id);
      return fund ? uow.listDocuments(id, limit) : null;
    });
    if (!docs) return fail("FUND_NOT_FOUND", 404);
    return ok({ documents: docs.map(serializeDocument) });
  } catch (err) {
    return failFromError(err, "document list");
  }
}

export async function deleteDocument(
  rt: Runtime,
  documentId: unknown,
): Promise<HandlerResult<{ documentId: string; transactionsDeleted: number; chunksDeleted: number }>> {
  try {
    const id = IdSchema.parse(documentId);
    const res = await rt.jobs.deleteDocument(id);
    if (!res.ok) return fail(res.error, res.error === "DOCUMENT_NOT_FOUND" ? 404 : 409);
    return ok({ documentId: res.documentId, transactionsDeleted: res.transactionsDeleted, chunksDeleted: res.chunksDeleted });
  } catch (err) {
    return failFromError(err, "document delete");
  }
}
