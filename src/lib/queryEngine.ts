import type { AnswerSource, AnswerStatus, ConversationStore, ConversationTurn } from "@/lib/conversationStore";
import { estimateUsd, type LlmPrice } from "@/lib/cost";
import { ConversationMismatchError, GenerationFailure, errorMessage } from "@/lib/errors";
import { newId } from "@/lib/funds";
import { classifyIntent, needsMetrics, needsRetrieval, type Intent, type IntentSignal } from "@/lib/intent";
import type { IrrOptions } from "@/lib/irr";
import type { LlmClient, LlmMessage, LlmProvider } from "@/lib/llm";
import { getFundMetrics, metricsContextLines, type MetricsBreakdown } from "@/lib/metrics";
import { buildAnalystPersona } from "@/lib/persona";
import type { RetrievedChunk, Retriever } from "@/lib/retrieval";
import type { Store } from "@/lib/store";

export type AnswerFailure = {
  stage: "metrics" | "retrieval" | "generation";
  message: string;
  timedOut?: boolean;
};

export type AnswerUsage = {
  provider: LlmProvider;
  model: string;
  inputTokens?: number;
  outputTokens?: number;
  estimatedUsd: number;
};

export type AnswerResult = {
  status: AnswerStatus;
  conversationId: string;
  turnId: string;
  intent: Intent;
  signals: IntentSignal[];
  text: string;
  sources: AnswerSource[];
  metrics: MetricsBreakdown | null;
  citedMetrics: string[];
  failures: AnswerFailure[];
  latencyMs: number;
  usage?: AnswerUsage;
};

export type AnswerInput = {
  query: string;
  fundId: string;
  conversationId?: string;
};

export type QueryEngineDeps = {
  store: Store;
  retriever: Retriever;
  llm: LlmClient;
  conversations: ConversationStore;
  topK: number;
  historyTurns: number;
  llmTimeoutMs: number;
  maxTokens: number;
  irrOptions?: IrrOptions;
  price?: LlmPrice;
};

const SOURCE_LABEL = /\[S(\d+)\]/g;
const METRIC_LABEL = /\[M:([A-Z_]+)\]/g;

/** Runs tasks one at a time per key; different keys run independently. */
export function createKeyedQueue() {
  const tails = new Map<string, Promise<void>>();
  return function enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result.then(
      () => undefined,
      () => undefined,
    ).then(() => {
      if (tails.get(key) === tail) tails.delete(key);
    });
    tails.set(key, tail);
    return result;
  };
}

export function toSources(chunks: RetrievedChunk[]): AnswerSource[] {
  return chunks.map((c, i) => ({
    label: `S${i + 1}`,
    chunkId: c.chunkId,
    documentId: c.documentId,
    pageNumber: c.pageNumber,
    score: c.score,
    excerpt: c.text,
    cited: false,
  }));
}

export function citedLabels(text: string): { sources: Set<string>; metrics: string[] } {
  const sources = new Set<string>();
  for (const m of text.matchAll(SOURCE_LABEL)) sources.add(`S${m[1]}`);
  const metrics = new Set<string>();
  for (const m of text.matchAll(METRIC_LABEL)) if (m[1]) metrics.add(m[1]);
  return { sources, metrics: [...metrics] };
}

export function buildContext(query: string, sources: AnswerSource[], metrics: MetricsBreakdown | null): string {
  const parts: string[] = [];
  if (sources.length) {
    parts.push("Sources:");
    for (const s of sources) {
      parts.push(`[${s.label}] document ${s.documentId}, page ${s.pageNumber}, score ${s.score.toFixed(4)}`);
      parts.push(s.excerpt);
      parts.push("");
    }
  } else {
    parts.push("Sources: none retrieved.", "");
  }
  if (metrics) {
    parts.push(`Metrics for ${metrics.fundName}:`);
    parts.push(...metricsContextLines(metrics));
    for (const note of metrics.notes) parts.push(`Note: ${note}`);
    parts.push("");
  }
  parts.push(`Question: ${query}`);
  return parts.join("\n");
}

export function historyMessages(turns: ConversationTurn[]): LlmMessage[] {
  const out: LlmMessage[] = [];
  for (const t of turns) {
    if (!t.answer) continue;
    out.push({ role: "user", content: t.query }, { role: "assistant", content: t.answer });
  }
  return out;
}

export function fallbackAnswer(metrics: MetricsBreakdown): string {
  return [
    `An explanation could not be generated. Computed metrics for ${metrics.fundName}:`,
    ...metricsContextLines(metrics).map((line) => `- ${line}`),
  ].join("\n");
}

/**
 * Routes a question, gathers metrics and/or retrieved passages, and asks the LLM for a cited answer.
 * Turns in one conversation run in submission order.
 */
export function createQueryEngine(deps: QueryEngineDeps) {
  const enqueue = createKeyedQueue();

  async function ensureConversation(conversationId: string, fundId: string) {
    const existing = await deps.conversations.getConversation(conversationId);
    if (existing) {
      if (existing.fundId !== fundId) throw new ConversationMismatchError(conversationId, fundId);
      return;
    }
    await deps.conversations.createConversation({ conversationId, fundId, createdAt: new Date().toISOString() });
  }

  async function answerTurn(input: AnswerInput, conversationId: string, startedAt: number): Promise<AnswerResult> {
    await ensureConversation(conversationId, input.fundId);

    const { intent, signals } = classifyIntent(input.query);
    const failures: AnswerFailure[] = [];
    let metrics: MetricsBreakdown | null = null;
    let sources: AnswerSource[] = [];
    let pathsFailed = 0;
    let pathsRequested = 0;

    if (needsMetrics(intent)) {
      pathsRequested += 1;
      try {
        const result = await getFundMetrics(deps.store, input.fundId, deps.irrOptions);
        if (result.ok) metrics = result.breakdown;
        else {
          failures.push({ stage: "metrics", message: result.error.message });
          pathsFailed += 1;
        }
      } catch (err) {
        failures.push({ stage: "metrics", message: errorMessage(err) });
        pathsFailed += 1;
      }
    }

    if (needsRetrieval(intent)) {
      pathsRequested += 1;
      try {
        sources = toSources(await deps.retriever.retrieve(input.query, { fundId: input.fundId, topK: deps.topK }));
      } catch (err) {
        failures.push({ stage: "retrieval", message: errorMessage(err) });
        pathsFailed += 1;
      }
    }

    let status: AnswerStatus = "answered";
    let text = "";
    let citedMetrics: string[] = [];
    let usage: AnswerUsage | undefined;

    if (pathsRequested > 0 && pathsFailed === pathsRequested) {
      status = "failed";
    } else {
      const history = await deps.conversations.listTurns(conversationId, deps.historyTurns);
      try {
        const res = await deps.llm.completeText({
          system: buildAnalystPersona(intent),
          messages: [...historyMessages(history), { role: "user", content: buildContext(input.query, sources, metrics) }],
          maxTokens: deps.maxTokens,
          timeoutMs: deps.llmTimeoutMs,
        });
        text = res.text;
        const cited = citedLabels(text);
        sources = sources.map((s) => ({ ...s, cited: cited.sources.has(s.label) }));
        citedMetrics = metrics ? cited.metrics : [];
        if (res.usage) {
          usage = {
            provider: res.provider,
            model: res.model,
            inputTokens: res.usage.inputTokens,
            outputTokens: res.usage.outputTokens,
            estimatedUsd: estimateUsd(res.model, res.usage, deps.price),
          };
        }
      } catch (err) {
        failures.push({
          stage: "generation",
          message: errorMessage(err),
          timedOut: err instanceof GenerationFailure ? err.timedOut : false,
        });
        if (metrics) {
          status = "partial";
          text = fallbackAnswer(metrics);
        } else {
          status = "failed";
        }
      }
    }

    if (failures.length) {
      console.error("query answered with failures", {
        conversationId,
        intent,
        status,
        stages: failures.map((f) => f.stage),
      });
    }

    const turn = await deps.conversations.appendTurn(conversationId, {
      turnId: newId(12),
      query: input.query,
      answer: text,
      intent,
      status,
      sources,
      metricLines: metrics ? metricsContextLines(metrics) : [],
      createdAt: new Date().toISOString(),
    });

    return {
      status,
      conversationId,
      turnId: turn.turnId,
      intent,
      signals,
      text,
      sources,
      metrics,
      citedMetrics,
      failures,
      latencyMs: Date.now() - startedAt,
      usage,
    };
  }

  return {
    answer(input: AnswerInput): Promise<AnswerResult> {
      const startedAt = Date.now();
      const conversationId = input.conversationId ?? newId();
      return enqueue(conversationId, () => answerTurn(input, conversationId, startedAt));
    },
    history(conversationId: string): Promise<ConversationTurn[]> {
      return deps.conversations.listTurns(conversationId);
    },
  };
}

export type QueryEngine = ReturnType<typeof createQueryEngine>;
