import { setTimeout as sleep } from "node:timers/promises";

import {
  BatchWriteCommand,
  QueryCommand,
  type BatchWriteCommandInput,
  type DynamoDBDocumentClient,
  type QueryCommandInput,
} from "@aws-sdk/lib-dynamodb";

import { cosineSimilarity } from "@/lib/embeddings";

export type TextChunk = {
  chunkId: string;
  documentId: string;
  fundId: string;
  pageNumber: number;
  chunkIndex: number;
  text: string;
  embedding: number[];
  metadata?: Record<string, string>;
};

export type ChunkFilter = {
  fundId: string;
  documentId?: string;
};

export type ScoredChunk = {
  chunk: TextChunk;
  score: number;
};

export type VectorIndex = {
  upsert(chunks: TextChunk[]): Promise<void>;
  search(vector: number[], topK: number, filter: ChunkFilter): Promise<ScoredChunk[]>;
  deleteByDocument(fundId: string, documentId: string): Promise<number>;
};

/** Score descending, then document and position so equal scores rank the same way every time. */
export function rankChunks(scored: ScoredChunk[], topK: number): ScoredChunk[] {
  return [...scored]
    .sort(
      (a, b) =>
        b.score - a.score ||
        a.chunk.documentId.localeCompare(b.chunk.documentId) ||
        a.chunk.chunkIndex - b.chunk.chunkIndex,
    )
    .slice(0, Math.max(0, topK));
}

export function createMemoryVectorIndex(): VectorIndex & { size(): number } {
  const chunks = new Map<string, TextChunk>();
  return {
    async upsert(items) {
      for (const c of items) chunks.set(c.chunkId, c);
    },
    async search(vector, topK, filter) {
      const scored: ScoredChunk[] = [];
      for (const c of chunks.values()) {
        if (c.fundId !== filter.fundId) continue;
        if (filter.documentId && c.documentId !== filter.documentId) continue;
        scored.push({ chunk: c, score: cosineSimilarity(vector, c.embedding) });
      }
      return rankChunks(scored, topK);
    },
    async deleteByDocument(fundId, documentId) {
      let removed = 0;
      for (const [id, c] of chunks) {
        if (c.fundId === fundId && c.documentId === documentId) {
          chunks.delete(id);
          removed += 1;
        }
      }
      return removed;
    },
    size() {
      return chunks.size;
    },
  };
}

function pkFundChunks(fundId: string) {
  return `FUND#${fundId}#CHUNKS`;
}

function skDocumentChunks(documentId: string) {
  return `DOC#${documentId}#CHUNK#`;
}

function skChunk(documentId: string, chunkIndex: number) {
  return `${skDocumentChunks(documentId)}${String(chunkIndex).padStart(6, "0")}`;
}

function asString(value: unknown): string {
  return typeof value === "string" ? value : value == null ? "" : String(value);
}

function asNumber(value: unknown): number {
  return typeof value === "number" ? value : 0;
}

function asEmbedding(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is number => typeof v === "number");
}

function asMetadata(value: unknown): Record<string, string> | undefined {
  if (!value || typeof value !== "object") return undefined;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === "string") out[k] = v;
  }
  return out;
}

function coerceChunk(row: Record<string, unknown>): TextChunk {
  return {
    chunkId: asString(row["chunk_id"]),
    documentId: asString(row["document_id"]),
    fundId: asString(row["fund_id"]),
    pageNumber: asNumber(row["page_number"]),
    chunkIndex: asNumber(row["chunk_index"]),
    text: asString(row["text"]),
    embedding: asEmbedding(row["embedding"]),
    metadata: asMetadata(row["metadata"]),
  };
}

type WriteRequest = NonNullable<BatchWriteCommandInput["RequestItems"]>[string][number];

const BATCH_WRITE_LIMIT = 25;
const MAX_BATCH_ATTEMPTS = 5;
const BATCH_RETRY_BASE_MS = 50;

/** Delay before `attempt` (1-based); doubles from the second attempt on. */
export function batchRetryDelayMs(attempt: number): number {
  return attempt < 2 ? 0 : BATCH_RETRY_BASE_MS * 2 ** (attempt - 2);
}

/** Writes `items`, then retries whatever `write` hands back as unprocessed, backing off between tries. */
export async function writeWithRetry<T>(
  items: T[],
  write: (batch: T[]) => Promise<T[]>,
  wait: (ms: number) => Promise<unknown> = sleep,
): Promise<void> {
  let pending = items;
  for (let attempt = 1; pending.length; attempt += 1) {
    if (attempt > MAX_BATCH_ATTEMPTS) {
      throw new Error(`Batch write left ${pending.length} unprocessed items`);
    }
    if (attempt > 1) await wait(batchRetryDelayMs(attempt));
    pending = await write(pending);
  }
}

/**
 * Chunk vectors stored under the fund's partition; similarity is computed in process over the
 * fund's chunks, which keeps the index on the same table as everything else.
 */
export function createDdbVectorIndex(ddb: DynamoDBDocumentClient, tableName: string): VectorIndex {
  const TableName = tableName;

  async function batchWrite(requests: WriteRequest[]) {
    for (let i = 0; i < requests.length; i += BATCH_WRITE_LIMIT) {
      await writeWithRetry(requests.slice(i, i + BATCH_WRITE_LIMIT), async (batch: WriteRequest[]) => {
        const res = await ddb.send(new BatchWriteCommand({ RequestItems: { [TableName]: batch } }));
        return res.UnprocessedItems?.[TableName] ?? [];
      });
    }
  }

  async function queryChunks(filter: ChunkFilter, projection?: string): Promise<Record<string, unknown>[]> {
    const input: QueryCommandInput = filter.documentId
      ? {
          TableName,
          KeyConditionExpression: "pk = :pk AND begins_with(sk, :prefix)",
          ExpressionAttributeValues: { ":pk": pkFundChunks(filter.fundId), ":prefix": skDocumentChunks(filter.documentId) },
        }
      : {
          TableName,
          KeyConditionExpression: "pk = :pk",
          ExpressionAttributeValues: { ":pk": pkFundChunks(filter.fundId) },
        };
    if (projection) input.ProjectionExpression = projection;

    const rows: Record<string, unknown>[] = [];
    let startKey: QueryCommandInput["ExclusiveStartKey"];
    do {
      const res = await ddb.send(new QueryCommand({ ...input, ExclusiveStartKey: startKey }));
      for (const it of res.Items ?? []) rows.push(it);
      startKey = res.LastEvaluatedKey;
    } while (startKey);
    return rows;
  }

  return {
    async upsert(chunks) {
      await batchWrite(
        chunks.map((c) => ({
          PutRequest: {
            Item: {
              pk: pkFundChunks(c.fundId),
              sk: skChunk(c.documentId, c.chunkIndex),
              entity: "chunk",
              chunk_id: c.chunkId,
              document_id: c.documentId,
              fund_id: c.fundId,
              page_number: c.pageNumber,
              chunk_index: c.chunkIndex,
              text: c.text,
              embedding: c.embedding,
              metadata: c.metadata,
            },
          },
        })),
      );
    },

    async search(vector, topK, filter) {
      const rows = await queryChunks(filter);
      const scored = rows.map(coerceChunk).map((chunk) => ({ chunk, score: cosineSimilarity(vector, chunk.embedding) }));
      return rankChunks(scored, topK);
    },

    async deleteByDocument(fundId, documentId) {
      const rows = await queryChunks({ fundId, documentId }, "pk, sk");
      await batchWrite(rows.map((row) => ({ DeleteRequest: { Key: { pk: asString(row["pk"]), sk: asString(row["sk"]) } } })));
      return rows.length;
    },
  };
}
