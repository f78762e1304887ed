import { z } from "zod";

import { ConversationMismatchError, NotFoundError, errorMessage } from "@/lib/errors";

export type ErrorBody = { ok: false; error: string };

export type HandlerResult<T extends object = Record<string, unknown>> = {
  status: number;
  body: ({ ok: true } & T) | ErrorBody;
};

export function ok<T extends object>(data: T, status = 200): HandlerResult<T> {
  return { status, body: { ok: true as const, ...data } };
}

export function fail(error: string, status: number): HandlerResult<never> {
  return { status, body: { ok: false, error } };
}

/** Maps thrown errors onto the error codes the handlers share; unexpected ones are logged. */
export function failFromError(err: unknown, context: string): HandlerResult<never> {
  if (err instanceof z.ZodError) return fail("BAD_REQUEST", 400);
  if (err instanceof NotFoundError) return fail("NOT_FOUND", 404);
  if (err instanceof ConversationMismatchError) return fail("CONVERSATION_FUND_MISMATCH", 409);
  if (err instanceof Error && err.message.startsWith("Missing env ")) return fail("MISSING_CONFIG", 500);

  // Log without leaking request content.
  console.error(`${context} failed`, { err: errorMessage(err) });
  return fail("FAILED", 500);
}

export const IdSchema = z.string().trim().min(1).max(64);

export const LimitSchema = z.coerce.number().int().min(1).max(200).optional();
