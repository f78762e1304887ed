import type { LlmUsage } from "@/lib/llm";

export type LlmPrice = {
  inputUsdPer1M: number;
  outputUsdPer1M: number;
};

export function priceForModel(modelId: string, override?: LlmPrice): LlmPrice {
  if (override) return override;
  const m = modelId.toLowerCase();
  if (m.includes("haiku")) return { inputUsdPer1M: 0.8, outputUsdPer1M: 4 };
  if (m.includes("opus")) return { inputUsdPer1M: 15, outputUsdPer1M: 75 };
  // Sonnet as default.
  return { inputUsdPer1M: 3, outputUsdPer1M: 15 };
}

export function estimateUsd(modelId: string, usage: LlmUsage, override?: LlmPrice): number {
  const price = priceForModel(modelId, override);
  const input = usage.inputTokens ?? 0;
  const output = usage.outputTokens ?? 0;
  return (input / 1_000_000) * price.inputUsdPer1M + (output / 1_000_000) * price.outputUsdPer1M;
}
