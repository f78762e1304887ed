export class NormalizationError extends Error {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(`${message}: "${raw}"`);
    this.name = "NormalizationError";
    this.raw = raw;
  }
}

export class ClassificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ClassificationError";
  }
}

export class PageError extends Error {
  readonly pageNumber: number;

  constructor(pageNumber: number, cause: unknown) {
    super(`Error processing page ${pageNumber}: ${errorMessage(cause)}`);
    this.name = "PageError";
    this.pageNumber = pageNumber;
  }
}

export class DocumentFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocumentFailure";
  }
}

export class MetricsError extends Error {
  readonly code: "FUND_NOT_FOUND" | "FOREIGN_TRANSACTION";

  constructor(code: MetricsError["code"], message: string) {
    super(message);
    this.name = "MetricsError";
    this.code = code;
  }
}

export class RetrievalFailure extends Error {
  constructor(cause: unknown) {
    super(`Retrieval failed: ${errorMessage(cause)}`);
    this.name = "RetrievalFailure";
  }
}

export class GenerationFailure extends Error {
  readonly timedOut: boolean;

  constructor(message: string, timedOut = false) {
    super(message);
    this.name = "GenerationFailure";
    this.timedOut = timedOut;
  }
}

export class InvalidStatusTransitionError extends Error {
  constructor(documentId: string, to: string) {
    super(`Document ${documentId} cannot move to ${to}`);
    this.name = "InvalidStatusTransitionError";
  }
}

export class UnitOfWorkClosedError extends Error {
  constructor() {
    super("Unit of work is already closed");
    this.name = "UnitOfWorkClosedError";
  }
}

export class NotFoundError extends Error {
  constructor(what: string) {
    super(`${what} not found`);
    this.name = "NotFoundError";
  }
}

export class ConversationMismatchError extends Error {
  constructor(conversationId: string, fundId: string) {
    super(`Conversation ${conversationId} does not belong to fund ${fundId}`);
    this.name = "ConversationMismatchError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name || "Error";
  if (err && typeof err === "object" && "name" in err) return String(err.name);
  return String(err);
}
