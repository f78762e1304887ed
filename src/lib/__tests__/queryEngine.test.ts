import { beforeEach, describe, expect, it, vi } from "vitest";

import { createMemoryConversationStore } from "@/lib/conversationStore";
import { createLocalEmbedder } from "@/lib/embeddings";
import { ConversationMismatchError, GenerationFailure } from "@/lib/errors";
import { createMemoryStore } from "@/lib/memoryStore";
import { createKeyedQueue, createQueryEngine } from "@/lib/queryEngine";
import { createRetriever } from "@/lib/retrieval";
import type { TransactionRecord } from "@/lib/funds";
import { createMemoryVectorIndex } from "@/lib/vectorIndex";

import { call, dist, makeFund, scriptedLlm, type ScriptedLlm } from "./fixtures";

const DPI_TEXT = "What does DPI mean? DPI is distributions over paid-in capital.";

async function setup(llm: ScriptedLlm, transactions: TransactionRecord[] = []) {
  const store = createMemoryStore();
  await store.withUnitOfWork(async (uow) => {
    uow.putFund(makeFund());
    for (const t of transactions) uow.addTransaction(t);
  });
  const embeddings = createLocalEmbedder(256);
  const index = createMemoryVectorIndex();
  const [vector] = await embeddings.embed([DPI_TEXT]);
  await index.upsert([
    { chunkId: "doc-1-0", documentId: "doc-1", fundId: "fund-1", pageNumber: 1, chunkIndex: 0, text: DPI_TEXT, embedding: vector ?? [] },
  ]);
  const conversations = createMemoryConversationStore();
  const engine = createQueryEngine({
    store,
    retriever: createRetriever({ embeddings, index, defaultTopK: 5 }),
    llm,
    conversations,
    topK: 3,
    historyTurns: 5,
    llmTimeoutMs: 1000,
    maxTokens: 256,
  });
  return { engine, conversations };
}

const withFlows = [call("c1", "2024-01-15", "6000000"), call("c2", "2024-06-15", "4000000"), dist("d1", "2024-12-15", "4000000")];

describe("query engine", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("answers a definition question from retrieved text without metrics", async () => {
    const llm = scriptedLlm(() => "DPI is distributions over paid-in capital [S1].");
    const { engine } = await setup(llm);

    const res = await engine.answer({ query: "What does DPI mean?", fundId: "fund-1" });

    expect(res.status).toBe("answered");
    expect(res.intent).toBe("definition");
    expect(res.metrics).toBeNull();
    expect(res.citedMetrics).toEqual([]);
    expect(res.sources).toEqual([
      expect.objectContaining({ label: "S1", chunkId: "doc-1-0", pageNumber: 1, cited: true }),
    ]);
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0]?.system).toContain("The user wants a concept explained.");
    expect(llm.calls[0]?.messages.at(-1)?.content).toContain("[S1] document doc-1, page 1");
  });

  it("answers a mixed question with metrics and cited sources", async () => {
    const llm = scriptedLlm(() => "DPI is 0.4000 [M:DPI]. It measures distributions over paid-in capital [S1].");
    const { engine } = await setup(llm, withFlows);

    const res = await engine.answer({ query: "Calculate DPI and explain what it means", fundId: "fund-1" });

    expect(res.intent).toBe("mixed");
    expect(res.status).toBe("answered");
    expect(res.metrics?.dpi.value).toBe(0.4);
    expect(res.metrics?.pic).toBe("10000000.00");
    expect(res.citedMetrics).toEqual(["DPI"]);
    expect(res.sources[0]?.cited).toBe(true);
    expect(res.usage).toEqual({
      provider: "anthropic",
      model: "test-model",
      inputTokens: 1000,
      outputTokens: 100,
      estimatedUsd: expect.closeTo(0.0045, 10),
    });
    expect(llm.calls[0]?.messages.at(-1)?.content).toContain("[M:DPI] DPI: 0.4000");
  });

  it("falls back to a metrics summary when generation fails", async () => {
    const llm = scriptedLlm(() => new GenerationFailure("LLM call timed out after 1000ms", true));
    const { engine } = await setup(llm, withFlows);

    const res = await engine.answer({ query: "What is the current DPI?", fundId: "fund-1" });

    expect(res.status).toBe("partial");
    expect(res.text.split("\n").slice(0, 2)).toEqual([
      "An explanation could not be generated. Computed metrics for Harbor Growth Fund I:",
      "- [M:PIC] Paid-in capital: 10000000.00",
    ]);
    expect(res.failures).toEqual([{ stage: "generation", message: "LLM call timed out after 1000ms", timedOut: true }]);
  });

  it("fails when generation fails and there are no metrics to show", async () => {
    const llm = scriptedLlm(() => new Error("overloaded"));
    const { engine } = await setup(llm);

    const res = await engine.answer({ query: "What does DPI mean?", fundId: "fund-1" });

    expect(res.status).toBe("failed");
    expect(res.text).toBe("");
    expect(res.failures).toEqual([{ stage: "generation", message: "overloaded", timedOut: false }]);
  });

  it("does not call the model when every requested path failed", async () => {
    const llm = scriptedLlm(() => "unused");
    const { engine } = await setup(llm);

    const res = await engine.answer({ query: "What is the current DPI?", fundId: "missing" });

    expect(res.status).toBe("failed");
    expect(res.failures).toEqual([{ stage: "metrics", message: "Fund missing not found" }]);
    expect(llm.calls).toHaveLength(0);
  });

  it("runs turns of one conversation in order and feeds back history", async () => {
    const llm = scriptedLlm((args) => `reply with ${args.messages.length} messages`);
    const { engine } = await setup(llm);

    const [first, second] = await Promise.all([
      engine.answer({ query: "What does DPI mean?", fundId: "fund-1", conversationId: "conv-1" }),
      engine.answer({ query: "Show me the notice", fundId: "fund-1", conversationId: "conv-1" }),
    ]);

    expect(first.text).toBe("reply with 1 messages");
    expect(second.text).toBe("reply with 3 messages");
    const turns = await engine.history("conv-1");
    expect(turns.map((t) => [t.seq, t.query])).toEqual([
      [1, "What does DPI mean?"],
      [2, "Show me the notice"],
    ]);
  });

  it("rejects a conversation that belongs to another fund", async () => {
    const llm = scriptedLlm(() => "ok");
    const { engine, conversations } = await setup(llm);
    await conversations.createConversation({ conversationId: "conv-9", fundId: "fund-2", createdAt: "2024-01-01T00:00:00.000Z" });

    await expect(engine.answer({ query: "What does DPI mean?", fundId: "fund-1", conversationId: "conv-9" })).rejects.toThrow(
      ConversationMismatchError,
    );
  });
});

describe("createKeyedQueue", () => {
  it("serializes tasks per key and keeps going after a failure", async () => {
    const enqueue = createKeyedQueue();
    const order: string[] = [];
    const slow = enqueue("a", async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("a1");
      throw new Error("a1 failed");
    });
    const next = enqueue("a", async () => {
      order.push("a2");
      return 2;
    });
    const other = enqueue("b", async () => {
      order.push("b1");
      return 1;
    });

    await expect(slow).rejects.toThrow("a1 failed");
    expect(await next).toBe(2);
    expect(await other).toBe(1);
    expect(order).toEqual(["b1", "a1", "a2"]);
  });
});
