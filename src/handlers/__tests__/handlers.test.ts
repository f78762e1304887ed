import { beforeEach, describe, expect, it, vi } from "vitest";

import { postQuery, getConversation } from "@/handlers/chat";
import { deleteDocument, getDocumentStatus, uploadDocument } from "@/handlers/documents";
import { createFund, getFund, listFundTransactions } from "@/handlers/funds";
import { getHealth } from "@/handlers/health";
import { failFromError } from "@/handlers/http";
import { getMetrics } from "@/handlers/metrics";
import { loadConfig } from "@/lib/config";
import type { LlmClient } from "@/lib/llm";
import { createRuntime } from "@/lib/runtime";

const llm: LlmClient = {
  provider: "anthropic",
  model: "test-model",
  async completeText() {
    return { provider: "anthropic", model: "test-model", text: "PIC is 0.00 [M:PIC]." };
  },
};

function runtime() {
  return createRuntime(loadConfig({}), { env: {}, llm });
}

async function fundId(rt: ReturnType<typeof runtime>, body: Record<string, unknown> = { name: "Harbor Growth Fund I" }) {
  const res = await createFund(rt, body);
  if (!res.body.ok) throw new Error(res.body.error);
  return res.body.fund.fundId;
}

describe("fund handlers", () => {
  it("creates and reads a fund", async () => {
    const rt = runtime();
    const created = await createFund(rt, { name: "  Harbor Growth Fund I ", vintageYear: 2021, nav: "$6,000,000", navAsOf: "12/31/2024" });
    expect(created.status).toBe(201);
    if (!created.body.ok) throw new Error(created.body.error);
    expect(created.body.fund).toMatchObject({ name: "Harbor Growth Fund I", vintageYear: 2021, nav: "6000000.00", navAsOf: "2024-12-31" });

    const read = await getFund(rt, created.body.fund.fundId);
    expect(read.status).toBe(200);
    expect(read.body.ok && read.body.fund.name).toBe("Harbor Growth Fund I");
  });

  it("rejects invalid input", async () => {
    const rt = runtime();
    expect(await createFund(rt, { name: "" })).toEqual({ status: 400, body: { ok: false, error: "BAD_REQUEST" } });
    expect(await createFund(rt, { name: "X", nav: "100" })).toEqual({ status: 400, body: { ok: false, error: "BAD_REQUEST" } });
    expect(await createFund(rt, { name: "X", nav: "1.2M", navAsOf: "2024-12-31" })).toEqual({
      status: 400,
      body: { ok: false, error: "BAD_REQUEST" },
    });
  });

  it("reports unknown funds", async () => {
    const rt = runtime();
    expect(await getFund(rt, "missing")).toEqual({ status: 404, body: { ok: false, error: "FUND_NOT_FOUND" } });
    expect(await listFundTransactions(rt, "missing")).toEqual({ status: 404, body: { ok: false, error: "FUND_NOT_FOUND" } });
    expect(await getMetrics(rt, "missing")).toEqual({ status: 404, body: { ok: false, error: "FUND_NOT_FOUND" } });
  });

  it("serves metrics for a fund without transactions", async () => {
    const rt = runtime();
    const id = await fundId(rt);
    const res = await getMetrics(rt, id);
    expect(res.status).toBe(200);
    expect(res.body.ok && res.body.metrics.pic).toBe("0.00");
  });
});

describe("document handlers", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  it("maps upload errors to status codes", async () => {
    const rt = runtime();
    const id = await fundId(rt);
    const notPdf = await uploadDocument(rt, { fundId: id, fileName: "a.pdf", bytes: new TextEncoder().encode("hello") });
    expect(notPdf).toEqual({ status: 415, body: { ok: false, error: "NOT_PDF" } });
    const empty = await uploadDocument(rt, { fundId: id, fileName: "a.pdf", bytes: new Uint8Array() });
    expect(empty.status).toBe(400);
    const noBytes = await uploadDocument(rt, { fundId: id, fileName: "a.pdf", bytes: "JVBERi0=" });
    expect(noBytes).toEqual({ status: 400, body: { ok: false, error: "BAD_REQUEST" } });
  });

  it("accepts a PDF and reports it pending without exposing the storage key", async () => {
    const rt = runtime();
    const id = await fundId(rt);
    const res = await uploadDocument(rt, { fundId: id, fileName: "q4.pdf", bytes: new TextEncoder().encode("%PDF-1.4 x") });
    expect(res.status).toBe(202);
    if (!res.body.ok) throw new Error(res.body.error);
    expect(res.body.document).not.toHaveProperty("blobKey");

    const status = await getDocumentStatus(rt, res.body.document.documentId);
    expect(status.body.ok && status.body.parsingStatus).toBe("pending");

    const deleted = await deleteDocument(rt, res.body.document.documentId);
    expect(deleted.status).toBe(200);
    expect(await deleteDocument(rt, res.body.document.documentId)).toEqual({
      status: 404,
      body: { ok: false, error: "DOCUMENT_NOT_FOUND" },
    });
  });
});

describe("chat handlers", () => {
  it("answers a query and returns the conversation", async () => {
    const rt = runtime();
    const id = await fundId(rt);
    const res = await postQuery(rt, { query: "What is the current PIC?", fundId: id, conversationId: "conv-1" });
    expect(res.status).toBe(200);
    expect(res.body.ok && res.body.answer.status).toBe("answered");
    expect(res.body.ok && res.body.answer.citedMetrics).toEqual(["PIC"]);

    const conv = await getConversation(rt, "conv-1");
    expect(conv.body.ok && conv.body.turns.map((t) => t.query)).toEqual(["What is the current PIC?"]);
  });

  it("rejects unknown funds, unknown conversations and foreign conversations", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const rt = runtime();
    const a = await fundId(rt);
    const b = await fundId(rt, { name: "Second Fund" });

    expect((await postQuery(rt, { query: "hi", fundId: "missing" })).status).toBe(404);
    expect((await getConversation(rt, "nope")).status).toBe(404);

    await postQuery(rt, { query: "hi", fundId: a, conversationId: "conv-2" });
    expect(await postQuery(rt, { query: "hi", fundId: b, conversationId: "conv-2" })).toEqual({
      status: 409,
      body: { ok: false, error: "CONVERSATION_FUND_MISMATCH" },
    });
  });
});

describe("failFromError", () => {
  it("hides unexpected errors behind a generic code", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(failFromError(new Error("db exploded"), "fund get")).toEqual({ status: 500, body: { ok: false, error: "FAILED" } });
    expect(spy).toHaveBeenCalledWith("fund get failed", { err: "db exploded" });
    expect(failFromError(new Error("Missing env FUND_LEDGER_DDB_TABLE"), "x")).toEqual({
      status: 500,
      body: { ok: false, error: "MISSING_CONFIG" },
    });
  });
});

describe("getHealth", () => {
  it("reports missing provider credentials", async () => {
    const res = await getHealth(runtime(), {});
    expect(res.status).toBe(503);
    expect(res.body.summary.missingRequiredEnvs).toEqual(["ANTHROPIC_API_KEY"]);
    expect(res.body.checks).toEqual({});
  });

  it("is healthy in memory mode with a key", async () => {
    const res = await getHealth(runtime(), { ANTHROPIC_API_KEY: "test-secret" });
    expect(res.status).toBe(200);
    expect(res.body.hints).toEqual(["STORAGE_DRIVER=memory keeps everything in process; data is lost on restart."]);
  });
});
