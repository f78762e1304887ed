import { describe, expect, it } from "vitest";

import { classifyIntent, needsMetrics, needsRetrieval } from "@/lib/intent";

describe("classifyIntent", () => {
  it.each([
    ["What does DPI mean?", "definition"],
    ["What is a capital call?", "definition"],
    ["What is the current DPI?", "calculation"],
    ["What's our IRR", "calculation"],
    ["Show me all capital calls in 2024", "retrieval"],
    ["Calculate DPI and explain what it means", "mixed"],
    ["How much was distributed in Q3 2024?", "mixed"],
    ["Hello there", "retrieval"],
  ])("%s -> %s", (query, intent) => {
    expect(classifyIntent(query).intent).toBe(intent);
  });

  it("reports the patterns that matched", () => {
    expect(classifyIntent("What is the current DPI?").signals).toEqual([
      { category: "calculation", pattern: "what is the <metric>" },
      { category: "calculation", pattern: "current" },
      { category: "calculation", pattern: "metric name" },
    ]);
  });

  it("does not count a metric name as a calculation request inside a definition question", () => {
    expect(classifyIntent("What does TVPI mean?").signals).toEqual([
      { category: "definition", pattern: "what does ... mean" },
    ]);
  });

  it("falls back to retrieval with no signals", () => {
    expect(classifyIntent("   ")).toEqual({ intent: "retrieval", signals: [] });
  });
});

describe("routing", () => {
  it("runs metrics for calculation and mixed, retrieval for everything else", () => {
    expect(needsMetrics("calculation")).toBe(true);
    expect(needsMetrics("mixed")).toBe(true);
    expect(needsMetrics("definition")).toBe(false);
    expect(needsRetrieval("calculation")).toBe(false);
    expect(needsRetrieval("mixed")).toBe(true);
    expect(needsRetrieval("retrieval")).toBe(true);
  });
});
