import { z } from "zod";

import { newId, transactionDate, type Fund, type TransactionRecord } from "@/lib/funds";
import { parseAmount, parseDate, toFixedAmount } from "@/lib/normalize";
import type { Runtime } from "@/lib/runtime";

import { fail, failFromError, IdSchema, LimitSchema, ok, type HandlerResult } from "@/handlers/http";

const CreateFundSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    gpName: z.string().trim().max(200).optional(),
    fundType: z.string().trim().max(100).optional(),
    vintageYear: z.number().int().min(1900).max(2200).optional(),
    nav: z.union([z.string(), z.number()]).optional(),
    navAsOf: z.string().optional(),
  })
  .refine((b) => (b.nav === undefined) === (b.navAsOf === undefined), {
    message: "nav and navAsOf go together",
  });

export type FundView = {
  fundId: string;
  name: string;
  gpName: string | null;
  fundType: string | null;
  vintageYear: number | null;
  nav: string | null;
  navAsOf: string | null;
  createdAt: string;
};

export function serializeFund(fund: Fund): FundView {
  return {
    fundId: fund.fundId,
    name: fund.name,
    gpName: fund.gpName ?? null,
    fundType: fund.fundType ?? null,
    vintageYear: fund.vintageYear ?? null,
    nav: fund.nav ? toFixedAmount(fund.nav) : null,
    navAsOf: fund.navAsOf ?? null,
    createdAt: fund.createdAt,
  };
}

export function serializeTransaction(record: TransactionRecord) {
  const { amount, ...rest } = record;
  return { ...rest, date: transactionDate(record), amount: toFixedAmount(amount) };
}

export async function createFund(rt: Runtime, input: unknown): Promise<HandlerResult<{ fund: FundView }>> {
  try {
    const body = CreateFundSchema.parse(input);
    let nav: Fund["nav"];
    let navAsOf: Fund["navAsOf"];
    if (body.nav !== undefined && body.navAsOf !== undefined) {
      const amount = parseAmount(String(body.nav));
      const date = parseDate(body.navAsOf, rt.config.DATE_ORDER);
      if (!amount.ok || !date.ok) return fail("BAD_REQUEST", 400);
      nav = amount.value;
      navAsOf = date.value;
    }

    const fund: Fund = {
      fundId: newId(),
      name: body.name,
      gpName: body.gpName || undefined,
      fundType: body.fundType || undefined,
      vintageYear: body.vintageYear,
      nav,
      navAsOf,
      createdAt: new Date().toISOString(),
    };
    await rt.store.withUnitOfWork(async (uow) => {
      uow.putFund(fund);
    });
    return ok({ fund: serializeFund(fund) }, 201);
  } catch (err) {
    return failFromError(err, "fund create");
  }
}

export async function getFund(rt: Runtime, fundId: unknown): Promise<HandlerResult<{ fund: FundView }>> {
  try {
    const id = IdSchema.parse(fundId);
    const fund = await rt.store.withUnitOfWork((uow) => uow.getFund(id));
    if (!fund) return fail("FUND_NOT_FOUND", 404);
    return ok({ fund: serializeFund(fund) });
  } catch (err) {
    return failFromError(err, "fund get");
  }
}

export async function listFunds(rt: Runtime, query: unknown = {}): Promise<HandlerResult<{ funds: FundView[] }>> {
  try {
    const { limit } = z.object({ limit: LimitSchema }).parse(query);
    const funds = await rt.store.withUnitOfWork((uow) => uow.listFunds(limit));
    return ok({ funds: funds.map(serializeFund) });
  } catch (err) {
    return failFromError(err, "fund list");
  }
}

export async function listFundTransactions(
  rt: Runtime,
  fundId: unknown,
): Promise<HandlerResult<{ transactions: ReturnType<typeof serializeTransaction>[] }>> {
  try {
    const id = IdSchema.parse(fundId);
    const loaded = await rt.store.withUnitOfWork(async (uow) => {
      const fund = await uow.getFund(id);
      return fund ? uow.listTransactions(id) : null;
    });
    if (!loaded) return fail("FUND_NOT_FOUND", 404);
    const transactions = loaded
      .map(serializeTransaction)
      .sort((a, b) => a.date.localeCompare(b.date) || a.transactionId.localeCompare(b.transactionId));
    return ok({ transactions });
  } catch (err) {
    return failFromError(err, "fund transactions");
  }
}
