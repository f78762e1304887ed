import { documentBlobKey, type BlobStore } from "@/lib/blobStore";
import type { DocumentRecord } from "@/lib/documents";
import { errorMessage } from "@/lib/errors";
import { newId } from "@/lib/funds";
import type { JobQueue } from "@/lib/jobQueue";
import type { Store } from "@/lib/store";
import type { VectorIndex } from "@/lib/vectorIndex";

export type DocumentJobsDeps = {
  store: Store;
  blobs: BlobStore;
  queue: JobQueue;
  index: VectorIndex;
  maxUploadBytes: number;
};

export type UploadInput = {
  fundId: string;
  fileName: string;
  contentType: string;
  bytes: Uint8Array;
};

export type UploadError = "EMPTY_FILE" | "NOT_PDF" | "FILE_TOO_LARGE" | "FUND_NOT_FOUND";

export type UploadResult = { ok: true; document: DocumentRecord } | { ok: false; error: UploadError };

export type DeleteError = "DOCUMENT_NOT_FOUND" | "DOCUMENT_BUSY";

export type DeleteResult =
  | { ok: true; documentId: string; transactionsDeleted: number; chunksDeleted: number }
  | { ok: false; error: DeleteError };

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-

export function looksLikePdf(fileName: string, contentType: string, bytes: Uint8Array): boolean {
  const declared = contentType.toLowerCase().startsWith("application/pdf") || fileName.toLowerCase().endsWith(".pdf");
  return declared && PDF_MAGIC.every((b, i) => bytes[i] === b);
}

export function createDocumentJobs(deps: DocumentJobsDeps) {
  /**
   * Stores the PDF, records a pending document and enqueues it for the worker. Returns as soon as
   * the job is queued.
   */
  async function uploadDocument(input: UploadInput): Promise<UploadResult> {
    if (!input.bytes.length) return { ok: false, error: "EMPTY_FILE" };
    if (input.bytes.length > deps.maxUploadBytes) return { ok: false, error: "FILE_TOO_LARGE" };
    if (!looksLikePdf(input.fileName, input.contentType, input.bytes)) return { ok: false, error: "NOT_PDF" };

    const fund = await deps.store.withUnitOfWork((uow) => uow.getFund(input.fundId));
    if (!fund) return { ok: false, error: "FUND_NOT_FOUND" };

    const documentId = newId();
    const now = new Date().toISOString();
    const blobKey = documentBlobKey(input.fundId, documentId, input.fileName);
    await deps.blobs.put(blobKey, input.bytes, "application/pdf");

    const document: DocumentRecord = {
      documentId,
      fundId: input.fundId,
      fileName: input.fileName,
      blobKey,
      contentType: "application/pdf",
      sizeBytes: input.bytes.length,
      uploadedAt: now,
      updatedAt: now,
      parsingStatus: "pending",
    };
    try {
      await deps.store.withUnitOfWork(async (uow) => {
        uow.createDocument(document);
      });
    } catch (err) {
      await deps.blobs.delete(blobKey).catch((cleanupErr: unknown) => {
        console.error("document blob cleanup failed", { documentId, err: errorMessage(cleanupErr) });
      });
      throw err;
    }

    try {
      await deps.queue.send({ documentId, fundId: input.fundId });
    } catch (err) {
      const message = `Failed to enqueue processing: ${errorMessage(err)}`;
      await deps.store.withUnitOfWork(async (uow) => {
        uow.transitionDocument(documentId, "failed", { errorMessage: message });
      });
      throw err;
    }

    console.log("document queued", { documentId, fundId: input.fundId, sizeBytes: document.sizeBytes });
    return { ok: true, document };
  }

  /** Removes a document with everything extracted from it: transactions, chunks and the stored file. */
  async function deleteDocument(documentId: string): Promise<DeleteResult> {
    const document = await deps.store.withUnitOfWork((uow) => uow.getDocument(documentId));
    if (!document) return { ok: false, error: "DOCUMENT_NOT_FOUND" };
    if (document.parsingStatus === "processing") return { ok: false, error: "DOCUMENT_BUSY" };

    const chunksDeleted = await deps.index.deleteByDocument(document.fundId, documentId);
    const transactionsDeleted = await deps.store.withUnitOfWork(async (uow) => {
      const count = await uow.deleteTransactionsForDocument(document.fundId, documentId);
      uow.deleteDocument(document);
      return count;
    });
    await deps.blobs.delete(document.blobKey);

    console.log("document deleted", { documentId, transactionsDeleted, chunksDeleted });
    return { ok: true, documentId, transactionsDeleted, chunksDeleted };
  }

  return { uploadDocument, deleteDocument };
}

export type DocumentJobs = ReturnType<typeof createDocumentJobs>;
