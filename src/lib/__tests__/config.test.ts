import { describe, expect, it } from "vitest";

import { loadConfig } from "@/lib/config";
import { estimateUsd, priceForModel } from "@/lib/cost";
import { describeLlmError } from "@/lib/llm";

describe("loadConfig", () => {
  it("falls back to defaults for missing and blank values", () => {
    const config = loadConfig({ CHUNK_SIZE: " ", TOP_K_RESULTS: "8" });
    expect(config.CHUNK_SIZE).toBe(1000);
    expect(config.CHUNK_OVERLAP).toBe(200);
    expect(config.TOP_K_RESULTS).toBe(8);
    expect(config.DATE_ORDER).toBe("MDY");
    expect(config.STORAGE_DRIVER).toBe("memory");
    expect(config.LLM_INPUT_USD_PER_1M).toBeUndefined();
  });

  it("rejects an overlap that does not fit the chunk", () => {
    expect(() => loadConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      "Invalid config: CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    );
  });

  it("rejects unknown enum values", () => {
    expect(() => loadConfig({ DATE_ORDER: "YMD" })).toThrow(/^Invalid config: DATE_ORDER: /);
  });
});

describe("cost", () => {
  it("prices by model family with an explicit override winning", () => {
    expect(priceForModel("anthropic.claude-3-5-haiku")).toEqual({ inputUsdPer1M: 0.8, outputUsdPer1M: 4 });
    expect(priceForModel("claude-opus-4")).toEqual({ inputUsdPer1M: 15, outputUsdPer1M: 75 });
    expect(estimateUsd("claude-opus-4", { inputTokens: 1_000_000 }, { inputUsdPer1M: 1, outputUsdPer1M: 2 })).toBe(1);
    expect(estimateUsd("any-model", { inputTokens: 2_000_000, outputTokens: 1_000_000 })).toBe(21);
  });
});

describe("describeLlmError", () => {
  it("turns configuration and AWS errors into actionable text", () => {
    expect(describeLlmError(new Error("Missing env ANTHROPIC_API_KEY"))).toBe("Missing configuration: ANTHROPIC_API_KEY");

    const denied = new Error("User is not authorized");
    denied.name = "AccessDeniedException";
    expect(describeLlmError(denied)).toBe(
      "Bedrock access denied. The IAM role needs bedrock:InvokeModel and model access enabled.",
    );

    const other = new Error("socket hang up");
    other.name = "NetworkError";
    expect(describeLlmError(other)).toBe("NetworkError: socket hang up");
  });
});
