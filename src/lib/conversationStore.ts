import { GetCommand, PutCommand, QueryCommand, type DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { z } from "zod";

import type { Intent } from "@/lib/intent";

export type AnswerSource = {
  label: string; // S1, S2, ...
  chunkId: string;
  documentId: string;
  pageNumber: number;
  score: number;
  excerpt: string;
  cited: boolean;
};

export type AnswerStatus = "answered" | "partial" | "failed";

export type Conversation = {
  conversationId: string;
  fundId: string;
  createdAt: string;
};

export type ConversationTurn = {
  turnId: string;
  seq: number;
  query: string;
  answer: string;
  intent: Intent;
  status: AnswerStatus;
  sources: AnswerSource[];
  metricLines: string[];
  createdAt: string;
};

export type TurnDraft = Omit<ConversationTurn, "seq">;

export type ConversationStore = {
  getConversation(conversationId: string): Promise<Conversation | null>;
  /** Returns false when the conversation already exists. */
  createConversation(conversation: Conversation): Promise<boolean>;
  /** The most recent `limit` turns, oldest first. */
  listTurns(conversationId: string, limit?: number): Promise<ConversationTurn[]>;
  appendTurn(conversationId: string, turn: TurnDraft): Promise<ConversationTurn>;
};

export function createMemoryConversationStore(): ConversationStore {
  const conversations = new Map<string, Conversation>();
  const turns = new Map<string, ConversationTurn[]>();
  return {
    async getConversation(conversationId) {
      return conversations.get(conversationId) ?? null;
    },
    async createConversation(conversation) {
      if (conversations.has(conversation.conversationId)) return false;
      conversations.set(conversation.conversationId, conversation);
      return true;
    },
    async listTurns(conversationId, limit) {
      const all = turns.get(conversationId) ?? [];
      return limit === undefined ? [...all] : limit > 0 ? all.slice(-limit) : [];
    },
    async appendTurn(conversationId, draft) {
      const list = turns.get(conversationId) ?? [];
      const turn = { ...draft, seq: list.length + 1 };
      list.push(turn);
      turns.set(conversationId, list);
      return turn;
    },
  };
}

function pkConversation(conversationId: string) {
  return `CONV#${conversationId}`;
}

function pkConversationTurns(conversationId: string) {
  return `CONV#${conversationId}#TURNS`;
}

function skTurn(seq: number) {
  return `TURN#${String(seq).padStart(8, "0")}`;
}

function asString(value: unknown): string {
  if (typeof value === "string") return value;
  if (value == null) return "";
  return String(value);
}

function safeJsonParse(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}

const sourceSchema = z.object({
  label: z.string(),
  chunkId: z.string(),
  documentId: z.string(),
  pageNumber: z.number(),
  score: z.number(),
  excerpt: z.string(),
  cited: z.boolean(),
});

const intentSchema = z.enum(["definition", "calculation", "retrieval", "mixed"]);
const statusSchema = z.enum(["answered", "partial", "failed"]);

function coerceTurn(row: Record<string, unknown>): ConversationTurn {
  const sources = z.array(sourceSchema).safeParse(safeJsonParse(row["sources"]));
  const metricLines = z.array(z.string()).safeParse(safeJsonParse(row["metric_lines"]));
  const intent = intentSchema.safeParse(row["intent"]);
  const status = statusSchema.safeParse(row["status"]);
  return {
    turnId: asString(row["turn_id"]),
    seq: typeof row["seq"] === "number" ? row["seq"] : 0,
    query: asString(row["query"]),
    answer: asString(row["answer"]),
    intent: intent.success ? intent.data : "retrieval",
    status: status.success ? status.data : "answered",
    sources: sources.success ? sources.data : [],
    metricLines: metricLines.success ? metricLines.data : [],
    createdAt: asString(row["created_at"]),
  };
}

function isConditionalCheckFailed(err: unknown): boolean {
  return err instanceof Error && err.name === "ConditionalCheckFailedException";
}

/**
 * Conversations and their turns on the shared table. Turns carry a sequence number in the sort key;
 * appends are conditional on the slot being free, so two writers cannot interleave one conversation.
 */
export function createDdbConversationStore(ddb: DynamoDBDocumentClient, tableName: string): ConversationStore {
  const TableName = tableName;

  async function queryTurns(conversationId: string, limit: number): Promise<ConversationTurn[]> {
    const res = await ddb.send(
      new QueryCommand({
        TableName,
        KeyConditionExpression: "pk = :pk",
        ExpressionAttributeValues: { ":pk": pkConversationTurns(conversationId) },
        ScanIndexForward: false,
        Limit: limit,
      }),
    );
    return (res.Items ?? []).map(coerceTurn).reverse();
  }

  return {
    async getConversation(conversationId) {
      const res = await ddb.send(new GetCommand({ TableName, Key: { pk: pkConversation(conversationId), sk: "META" } }));
      const row = res.Item;
      if (!row) return null;
      return {
        conversationId: asString(row["conversation_id"]),
        fundId: asString(row["fund_id"]),
        createdAt: asString(row["created_at"]),
      };
    },

    async createConversation(conversation) {
      try {
        await ddb.send(
          new PutCommand({
            TableName,
            Item: {
              pk: pkConversation(conversation.conversationId),
              sk: "META",
              entity: "conversation",
              conversation_id: conversation.conversationId,
              fund_id: conversation.fundId,
              created_at: conversation.createdAt,
            },
            ConditionExpression: "attribute_not_exists(pk)",
          }),
        );
        return true;
      } catch (err) {
        if (isConditionalCheckFailed(err)) return false;
        throw err;
      }
    },

    async listTurns(conversationId, limit) {
      if (limit !== undefined) return limit > 0 ? queryTurns(conversationId, limit) : [];
      const out: ConversationTurn[] = [];
      let lastKey: Record<string, unknown> | undefined;
      do {
        const res = await ddb.send(
          new QueryCommand({
            TableName,
            KeyConditionExpression: "pk = :pk",
            ExpressionAttributeValues: { ":pk": pkConversationTurns(conversationId) },
            ExclusiveStartKey: lastKey,
            ScanIndexForward: true,
          }),
        );
        for (const item of res.Items ?? []) out.push(coerceTurn(item));
        lastKey = res.LastEvaluatedKey;
      } while (lastKey);
      return out;
    },

    async appendTurn(conversationId, draft) {
      const [latest] = await queryTurns(conversationId, 1);
      const turn: ConversationTurn = { ...draft, seq: (latest?.seq ?? 0) + 1 };
      await ddb.send(
        new PutCommand({
          TableName,
          Item: {
            pk: pkConversationTurns(conversationId),
            sk: skTurn(turn.seq),
            entity: "turn",
            turn_id: turn.turnId,
            seq: turn.seq,
            query: turn.query,
            answer: turn.answer,
            intent: turn.intent,
            status: turn.status,
            sources: JSON.stringify(turn.sources),
            metric_lines: JSON.stringify(turn.metricLines),
            created_at: turn.createdAt,
          },
          ConditionExpression: "attribute_not_exists(pk)",
        }),
      );
      return turn;
    },
  };
}
