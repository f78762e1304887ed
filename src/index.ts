export { loadConfig, type AppConfig } from "@/lib/config";
export { createRuntime, type Runtime, type RuntimeOverrides } from "@/lib/runtime";
export { computeMetrics, getFundMetrics, type MetricsBreakdown } from "@/lib/metrics";
export { classifyIntent, type Intent } from "@/lib/intent";
export type { AnswerResult } from "@/lib/queryEngine";
export type { DocumentRecord, ParsingStatus, ProcessingStats } from "@/lib/documents";

export { createFund, getFund, listFunds, listFundTransactions } from "@/handlers/funds";
export { deleteDocument, getDocument, getDocumentStatus, listDocuments, uploadDocument } from "@/handlers/documents";
export { getMetrics } from "@/handlers/metrics";
export { getConversation, postQuery } from "@/handlers/chat";
export { getHealth } from "@/handlers/health";
export type { HandlerResult } from "@/handlers/http";
