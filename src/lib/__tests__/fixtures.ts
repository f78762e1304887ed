import Decimal from "decimal.js";

import type { Adjustment, CapitalCall, Distribution, Fund } from "@/lib/funds";
import type { LlmClient, CompleteTextArgs, LlmTextResult } from "@/lib/llm";
import type { RawTable } from "@/lib/tableClassifier";
import { documentSource, type DocumentSource } from "@/lib/types";

export function makeFund(overrides: Partial<Fund> = {}): Fund {
  return {
    fundId: "fund-1",
    name: "Harbor Growth Fund I",
    createdAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function call(id: string, date: string, amount: string, fundId = "fund-1"): CapitalCall {
  return {
    kind: "capital_call",
    transactionId: id,
    fundId,
    callDate: date,
    callType: "Capital Call",
    amount: new Decimal(amount),
    description: "",
  };
}

export function dist(id: string, date: string, amount: string, fundId = "fund-1"): Distribution {
  return {
    kind: "distribution",
    transactionId: id,
    fundId,
    distributionDate: date,
    distributionType: "Distribution",
    isRecallable: false,
    amount: new Decimal(amount),
    description: "",
  };
}

export function adj(
  id: string,
  date: string,
  amount: string,
  isContributionAdjustment: boolean,
  fundId = "fund-1",
): Adjustment {
  return {
    kind: "adjustment",
    transactionId: id,
    fundId,
    adjustmentDate: date,
    adjustmentType: "Adjustment",
    category: isContributionAdjustment ? "Contribution Adjustment" : "Fee Rebate",
    amount: new Decimal(amount),
    isContributionAdjustment,
    contributionFlagSource: isContributionAdjustment ? "text" : "default",
    description: "",
  };
}

export type FakePage = {
  tables?: RawTable[];
  text?: string;
  loadError?: string;
  tableError?: string;
};

/** An in-memory document whose pages carry their tables and text directly. */
export function fakeSource(pages: FakePage[]): DocumentSource<FakePage> & { closed: () => boolean } {
  let closed = false;
  const source = documentSource<FakePage>(
    {
      pageCount: pages.length,
      async page(n) {
        const page = pages[n - 1];
        if (!page) throw new Error(`No page ${n}`);
        if (page.loadError) throw new Error(page.loadError);
        return page;
      },
      async close() {
        closed = true;
      },
    },
    async (page) => {
      if (page.tableError) throw new Error(page.tableError);
      return page.tables ?? [];
    },
    async (page) => page.text ?? "",
  );
  return { ...source, closed: () => closed };
}

export type ScriptedLlm = LlmClient & { calls: CompleteTextArgs[] };

/** Replies with `reply(args)`; throws when it returns an Error. */
export function scriptedLlm(reply: (args: CompleteTextArgs) => string | Error): ScriptedLlm {
  const calls: CompleteTextArgs[] = [];
  return {
    provider: "anthropic",
    model: "test-model",
    calls,
    async completeText(args): Promise<LlmTextResult> {
      calls.push(args);
      const out = reply(args);
      if (out instanceof Error) throw out;
      return { provider: "anthropic", model: "test-model", text: out, usage: { inputTokens: 1000, outputTokens: 100 } };
    },
  };
}
