import { setTimeout as sleep } from "node:timers/promises";

import type { BlobStore } from "@/lib/blobStore";
import type { AppConfig } from "@/lib/config";
import type { DocumentProcessor } from "@/lib/documentProcessor";
import { toProcessingStats } from "@/lib/documentProcessor";
import { summarizeErrors, type DocumentPatch, type ParsingStatus } from "@/lib/documents";
import { DocumentFailure, InvalidStatusTransitionError, errorMessage } from "@/lib/errors";
import { parseDocumentJob, type DocumentJob, type JobQueue, type ReceivedMessage } from "@/lib/jobQueue";
import type { Store } from "@/lib/store";
import type { DocumentLoader, DocumentSource } from "@/lib/types";

export type WorkerDeps = {
  store: Store;
  blobs: BlobStore;
  queue: JobQueue;
  processor: DocumentProcessor;
  loadDocument: DocumentLoader;
  concurrency: number;
  waitSeconds?: number;
  idleDelayMs?: number;
  /** A redelivered job fails a document left in `processing` for at least this long. */
  staleProcessingMs?: number;
};

export type JobOutcome = "processed" | "skipped" | "failed" | "retry";

const ERROR_BACKOFF_MS = 1000;
const DEFAULT_STALE_PROCESSING_MS = 15 * 60 * 1000;

/** A worker in its own process sees uploads only through DynamoDB, S3 and SQS. */
export function assertStandaloneWorkerStorage(driver: AppConfig["STORAGE_DRIVER"]): void {
  if (driver === "memory") {
    throw new Error(
      "Standalone worker needs STORAGE_DRIVER=dynamodb; with memory storage call runtime.worker.start() in the process that takes uploads",
    );
  }
}

export function createDocumentWorker(deps: WorkerDeps) {
  const inFlight = new Set<Promise<JobOutcome>>();
  let running = false;
  let loop: Promise<void> | null = null;

  async function transition(documentId: string, to: ParsingStatus, patch?: DocumentPatch) {
    await deps.store.withUnitOfWork(async (uow) => {
      uow.transitionDocument(documentId, to, patch);
    });
  }

  async function runJob(job: DocumentJob): Promise<Exclude<JobOutcome, "retry">> {
    const document = await deps.store.withUnitOfWork((uow) => uow.getDocument(job.documentId));
    if (!document || document.fundId !== job.fundId) {
      console.error("document job skipped", { documentId: job.documentId, reason: "not found" });
      return "skipped";
    }
    if (document.parsingStatus === "processing") {
      const age = Date.now() - Date.parse(document.updatedAt);
      if (age < (deps.staleProcessingMs ?? DEFAULT_STALE_PROCESSING_MS)) {
        console.log("document job skipped", { documentId: job.documentId, status: document.parsingStatus });
        return "skipped";
      }
      try {
        await transition(document.documentId, "failed", {
          errorMessage: "Processing was interrupted before it finished",
        });
      } catch (err) {
        if (err instanceof InvalidStatusTransitionError) return "skipped";
        throw err;
      }
      console.error("document failed", { documentId: document.documentId, err: "stale processing", ageMs: age });
      return "failed";
    }
    if (document.parsingStatus !== "pending") {
      // Redelivered message for a document another worker already took.
      console.log("document job skipped", { documentId: job.documentId, status: document.parsingStatus });
      return "skipped";
    }

    try {
      await transition(document.documentId, "processing");
    } catch (err) {
      if (err instanceof InvalidStatusTransitionError) return "skipped";
      throw err;
    }

    let source: DocumentSource<unknown>;
    try {
      const bytes = await deps.blobs.get(document.blobKey);
      source = await deps.loadDocument(bytes);
    } catch (err) {
      const failure = err instanceof DocumentFailure ? err : new DocumentFailure(`Could not load document: ${errorMessage(err)}`);
      await transition(document.documentId, "failed", { errorMessage: failure.message });
      console.error("document failed", { documentId: document.documentId, err: failure.message });
      return "failed";
    }

    try {
      const report = await deps.processor.processDocument({ document, source });
      await transition(document.documentId, report.status, {
        stats: toProcessingStats(report),
        errorMessage: summarizeErrors(report.errors) ?? "",
      });
      return report.status === "failed" ? "failed" : "processed";
    } finally {
      await source.pages.close();
    }
  }

  /** Runs one message to completion. Messages are acknowledged unless the job should be retried. */
  async function handle(message: ReceivedMessage): Promise<JobOutcome> {
    const job = parseDocumentJob(message.body);
    if (!job) {
      console.error("document job dropped", { reason: "invalid message body" });
      await deps.queue.ack(message.receipt);
      return "skipped";
    }

    try {
      const outcome = await runJob(job);
      await deps.queue.ack(message.receipt);
      return outcome;
    } catch (err) {
      console.error("document job errored", { documentId: job.documentId, err: errorMessage(err) });
      try {
        await transition(job.documentId, "failed", { errorMessage: `Processing aborted: ${errorMessage(err)}` });
        await deps.queue.ack(message.receipt);
        return "failed";
      } catch (markErr) {
        // Leave the message unacknowledged so the queue redelivers it.
        console.error("document job left for retry", { documentId: job.documentId, err: errorMessage(markErr) });
        return "retry";
      }
    }
  }

  function track(message: ReceivedMessage): Promise<JobOutcome> {
    const task: Promise<JobOutcome> = handle(message)
      .catch((err: unknown) => {
        console.error("document job crashed", { err: errorMessage(err) });
        return "retry" as const;
      })
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
    return task;
  }

  /** Receives one batch and waits for every job in it. */
  async function runOnce(): Promise<JobOutcome[]> {
    const messages = await deps.queue.receive(deps.concurrency, 0);
    return Promise.all(messages.map(track));
  }

  async function poll() {
    while (running) {
      const capacity = deps.concurrency - inFlight.size;
      if (capacity <= 0) {
        await Promise.race(inFlight);
        continue;
      }
      try {
        const messages = await deps.queue.receive(capacity, deps.waitSeconds ?? 20);
        // Tracked in inFlight; stop() waits for them.
        for (const message of messages) void track(message);
        if (!messages.length && deps.idleDelayMs) await sleep(deps.idleDelayMs);
      } catch (err) {
        console.error("document queue receive failed", { err: errorMessage(err) });
        await sleep(ERROR_BACKOFF_MS);
      }
    }
  }

  return {
    runOnce,
    handle,
    start() {
      if (running) return;
      running = true;
      loop = poll();
    },
    /** Stops polling and waits for in-flight jobs to finish. */
    async stop() {
      running = false;
      if (loop) await loop;
      loop = null;
      await Promise.allSettled(inFlight);
    },
    inFlightCount() {
      return inFlight.size;
    },
  };
}

export type DocumentWorker = ReturnType<typeof createDocumentWorker>;
