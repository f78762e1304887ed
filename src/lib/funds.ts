import { randomUUID } from "node:crypto";

import type Decimal from "decimal.js";

export type IsoDate = string; // YYYY-MM-DD

export type Fund = {
  fundId: string;
  name: string;
  gpName?: string;
  fundType?: string;
  vintageYear?: number;
  nav?: Decimal; // residual NAV, when the fund tracks one
  navAsOf?: IsoDate;
  createdAt: string;
};

export type TransactionKind = "capital_call" | "distribution" | "adjustment";

type TransactionBase = {
  transactionId: string;
  fundId: string;
  documentId?: string;
  amount: Decimal;
  description: string;
};

export type CapitalCall = TransactionBase & {
  kind: "capital_call";
  callDate: IsoDate;
  callType: string;
};

export type Distribution = TransactionBase & {
  kind: "distribution";
  distributionDate: IsoDate;
  distributionType: string;
  isRecallable: boolean;
};

export type ContributionFlagSource = "text" | "default";

export type Adjustment = TransactionBase & {
  kind: "adjustment";
  adjustmentDate: IsoDate;
  adjustmentType: string;
  category: string;
  isContributionAdjustment: boolean;
  contributionFlagSource: ContributionFlagSource;
};

export type TransactionRecord = CapitalCall | Distribution | Adjustment;

export type FundTransactions = {
  capitalCalls: CapitalCall[];
  distributions: Distribution[];
  adjustments: Adjustment[];
};

export function transactionDate(record: TransactionRecord): IsoDate {
  switch (record.kind) {
    case "capital_call":
      return record.callDate;
    case "distribution":
      return record.distributionDate;
    case "adjustment":
      return record.adjustmentDate;
  }
}

export function groupTransactions(records: TransactionRecord[]): FundTransactions {
  const out: FundTransactions = { capitalCalls: [], distributions: [], adjustments: [] };
  for (const r of records) {
    if (r.kind === "capital_call") out.capitalCalls.push(r);
    else if (r.kind === "distribution") out.distributions.push(r);
    else out.adjustments.push(r);
  }
  return out;
}

export function newId(length = 16): string {
  return randomUUID().replaceAll("-", "").slice(0, length);
}
