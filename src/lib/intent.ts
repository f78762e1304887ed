export type Intent = "definition" | "calculation" | "retrieval" | "mixed";

export type IntentCategory = Exclude<Intent, "mixed">;

export type IntentSignal = {
  category: IntentCategory;
  pattern: string;
};

export type IntentResult = {
  intent: Intent;
  signals: IntentSignal[];
};

type Rule = { pattern: string; re: RegExp };

const METRIC_NAME = String.raw`(?:dpi|irr|tvpi|pic|moic|paid[- ]in(?: capital)?|internal rate of return|distributions? to paid[- ]in)`;

const CALCULATION_RULES: Rule[] = [
  { pattern: "calculate", re: /\bcalculat(?:e|ed|ion)\b/ },
  { pattern: "compute", re: /\bcomput(?:e|ed|ation)\b/ },
  { pattern: "what is the <metric>", re: new RegExp(String.raw`\bwhat(?:'s| is) (?:the|our|my) (?:current )?${METRIC_NAME}\b`) },
  { pattern: "what's our", re: /\bwhat(?:'s| is) our\b/ },
  { pattern: "how much", re: /\bhow much\b/ },
  { pattern: "current", re: /\bcurrent\b/ },
];

const METRIC_MENTION: Rule = { pattern: "metric name", re: new RegExp(String.raw`\b${METRIC_NAME}\b`) };

const DEFINITION_RULES: Rule[] = [
  { pattern: "what does ... mean", re: /\bwhat (?:does|do) .+ mean\b/ },
  { pattern: "define", re: /\bdefin(?:e|ed)\b/ },
  { pattern: "definition", re: /\bdefinitions?\b/ },
  { pattern: "explain", re: /\bexplain\b/ },
  { pattern: "meaning of", re: /\bmeaning of\b/ },
  // "what is X" but not "what is the X"
  { pattern: "what is <x>", re: /\bwhat(?:'s| is| are) (?!the\b|our\b|my\b)[a-z]/ },
];

const MONTHS = "january|february|march|april|may|june|july|august|september|october|november|december|jan|feb|mar|apr|jun|jul|aug|sep|sept|oct|nov|dec";

const RETRIEVAL_RULES: Rule[] = [
  { pattern: "show me", re: /\bshow me\b/ },
  { pattern: "list", re: /\blist\b/ },
  { pattern: "find", re: /\bfind\b/ },
  { pattern: "when was/were", re: /\bwhen (?:was|were|did)\b/ },
  { pattern: "which", re: /\bwhich\b/ },
  { pattern: "year", re: /\b(?:19|20)\d{2}\b/ },
  { pattern: "quarter", re: /\bq[1-4]\b|\b(?:first|second|third|fourth) quarter\b/ },
  { pattern: "month", re: new RegExp(String.raw`\b(?:${MONTHS})\b`) },
  { pattern: "between ... and", re: /\bbetween .+ and\b/ },
  { pattern: "since", re: /\bsince\b/ },
];

function matches(rules: Rule[], text: string, category: IntentCategory): IntentSignal[] {
  return rules.filter((r) => r.re.test(text)).map((r) => ({ category, pattern: r.pattern }));
}

/**
 * Keyword routing. A query that hits more than one category is mixed and runs every path; a
 * query that hits none falls back to retrieval.
 */
export function classifyIntent(query: string): IntentResult {
  const text = query.toLowerCase().replace(/[’‘]/g, "'").replace(/\s+/g, " ").trim();

  const definition = matches(DEFINITION_RULES, text, "definition");
  const calculation = matches(CALCULATION_RULES, text, "calculation");
  // A metric name alone asks for the number, unless the query is asking what the metric means.
  if (!definition.length && METRIC_MENTION.re.test(text)) {
    calculation.push({ category: "calculation", pattern: METRIC_MENTION.pattern });
  }
  const retrieval = matches(RETRIEVAL_RULES, text, "retrieval");

  const signals = [...calculation, ...definition, ...retrieval];
  const categories = new Set(signals.map((s) => s.category));
  let intent: Intent;
  if (categories.size > 1) intent = "mixed";
  else if (categories.size === 1) intent = signals[0]?.category ?? "retrieval";
  else intent = "retrieval";
  return { intent, signals };
}

export function needsMetrics(intent: Intent): boolean {
  return intent === "calculation" || intent === "mixed";
}

export function needsRetrieval(intent: Intent): boolean {
  return intent !== "calculation";
}
