import { z } from "zod";

import type { ConversationTurn } from "@/lib/conversationStore";
import type { AnswerResult } from "@/lib/queryEngine";
import type { Runtime } from "@/lib/runtime";

import { fail, failFromError, IdSchema, ok, type HandlerResult } from "@/handlers/http";

const QuerySchema = z.object({
  query: z.string().trim().min(1).max(4000),
  fundId: IdSchema,
  conversationId: IdSchema.optional(),
});

export async function postQuery(rt: Runtime, input: unknown): Promise<HandlerResult<{ answer: AnswerResult }>> {
  try {
    const body = QuerySchema.parse(input);
    const fund = await rt.store.withUnitOfWork((uow) => uow.getFund(body.fundId));
    if (!fund) return fail("FUND_NOT_FOUND", 404);
    const answer = await rt.engine.answer(body);
    return ok({ answer });
  } catch (err) {
    return failFromError(err, "chat query");
  }
}

export async function getConversation(
  rt: Runtime,
  conversationId: unknown,
): Promise<HandlerResult<{ conversationId: string; fundId: string; turns: ConversationTurn[] }>> {
  try {
    const id = IdSchema.parse(conversationId);
    const conversation = await rt.conversations.getConversation(id);
    if (!conversation) return fail("CONVERSATION_NOT_FOUND", 404);
    const turns = await rt.engine.history(id);
    return ok({ conversationId: id, fundId: conversation.fundId, turns });
  } catch (err) {
    return failFromError(err, "chat history");
  }
}
