import { TransactionCanceledException } from "@aws-sdk/client-dynamodb";
import {
  GetCommand,
  QueryCommand,
  TransactWriteCommand,
  type DynamoDBDocumentClient,
  type QueryCommandInput,
  type TransactWriteCommandInput,
} from "@aws-sdk/lib-dynamodb";
import { z } from "zod";

import {
  allowedPreviousStatuses,
  asParsingStatus,
  type DocumentPatch,
  type DocumentRecord,
  type ParsingStatus,
  type ProcessingStats,
} from "@/lib/documents";
import { InvalidStatusTransitionError, NotFoundError } from "@/lib/errors";
import { transactionDate, type Fund, type TransactionRecord } from "@/lib/funds";
import { amountFromStored, toFixedAmount } from "@/lib/normalize";
import { createOpenGuard, runUnitOfWork, type Store, type UnitOfWork, type UnitOfWorkHandle } from "@/lib/store";

type TransactItem = NonNullable<TransactWriteCommandInput["TransactItems"]>[number];

export type StagedWrite = {
  item: TransactItem;
  /** Fund whose META row must exist when this write lands. */
  requiresFund?: string;
  onConditionFailed?: () => Error;
};

// DynamoDB caps a transaction at 100 items; larger units of work commit in several transactions.
const MAX_TRANSACT_ITEMS = 100;
const META = "META";

function pkFund(fundId: string) {
  return `FUND#${fundId}`;
}

function pkFundIndex() {
  return "FUNDS";
}

function pkFundTransactions(fundId: string) {
  return `FUND#${fundId}#TXN`;
}

function pkFundDocuments(fundId: string) {
  return `FUND#${fundId}#DOCS`;
}

function pkDocument(documentId: string) {
  return `DOC#${documentId}`;
}

function skTransaction(record: TransactionRecord) {
  return `${record.kind.toUpperCase()}#${transactionDate(record)}#${record.transactionId}`;
}

function skCreated(createdAt: string, type: "FUND" | "DOC", id: string) {
  return `CREATED#${createdAt}#${type}#${id}`;
}

function asString(value: unknown): string {
  return typeof value === "string" ? value : value == null ? "" : String(value);
}

function asOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

function asOptionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

const tableSummarySchema = z.object({
  pageNumber: z.number(),
  tableIndex: z.number(),
  kind: z.enum(["capital_call", "distribution", "adjustment", "unknown"]),
  basis: z.enum(["header", "first_row", "none"]),
  rowsExtracted: z.number(),
  rowErrors: z.number(),
  skippedReason: z.string().optional(),
});

const processingStatsSchema = z.object({
  pageCount: z.number(),
  pagesProcessed: z.number(),
  tablesFound: z.number(),
  capitalCalls: z.number(),
  distributions: z.number(),
  adjustments: z.number(),
  unknownTables: z.number(),
  chunkCount: z.number(),
  errors: z.array(z.string()),
  tables: z.array(tableSummarySchema),
});

function parseStats(value: unknown): ProcessingStats | undefined {
  if (typeof value !== "string" || !value) return undefined;
  try {
    const parsed = processingStatsSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

function fundItem(fund: Fund) {
  return {
    pk: pkFund(fund.fundId),
    sk: META,
    entity: "fund",
    fund_id: fund.fundId,
    name: fund.name,
    gp_name: fund.gpName,
    fund_type: fund.fundType,
    vintage_year: fund.vintageYear,
    nav: fund.nav ? toFixedAmount(fund.nav) : undefined,
    nav_as_of: fund.navAsOf,
    created_at: fund.createdAt,
  };
}

function coerceFund(row: Record<string, unknown>): Fund {
  const nav = asOptionalString(row["nav"]);
  return {
    fundId: asString(row["fund_id"]),
    name: asString(row["name"]),
    gpName: asOptionalString(row["gp_name"]),
    fundType: asOptionalString(row["fund_type"]),
    vintageYear: asOptionalNumber(row["vintage_year"]),
    nav: nav ? amountFromStored(nav) : undefined,
    navAsOf: asOptionalString(row["nav_as_of"]),
    createdAt: asString(row["created_at"]),
  };
}

function transactionItem(record: TransactionRecord) {
  const base = {
    pk: pkFundTransactions(record.fundId),
    sk: skTransaction(record),
    entity: "transaction",
    kind: record.kind,
    transaction_id: record.transactionId,
    fund_id: record.fundId,
    document_id: record.documentId,
    amount: toFixedAmount(record.amount),
    description: record.description,
  };
  switch (record.kind) {
    case "capital_call":
      return { ...base, call_date: record.callDate, call_type: record.callType };
    case "distribution":
      return {
        ...base,
        distribution_date: record.distributionDate,
        distribution_type: record.distributionType,
        is_recallable: record.isRecallable,
      };
    case "adjustment":
      return {
        ...base,
        adjustment_date: record.adjustmentDate,
        adjustment_type: record.adjustmentType,
        category: record.category,
        is_contribution_adjustment: record.isContributionAdjustment,
        contribution_flag_source: record.contributionFlagSource,
      };
  }
}

function coerceTransaction(row: Record<string, unknown>): TransactionRecord | null {
  const base = {
    transactionId: asString(row["transaction_id"]),
    fundId: asString(row["fund_id"]),
    documentId: asOptionalString(row["document_id"]),
    amount: amountFromStored(row["amount"]),
    description: asString(row["description"]),
  };
  const kind = row["kind"];
  if (kind === "capital_call") {
    return { ...base, kind, callDate: asString(row["call_date"]), callType: asString(row["call_type"]) };
  }
  if (kind === "distribution") {
    return {
      ...base,
      kind,
      distributionDate: asString(row["distribution_date"]),
      distributionType: asString(row["distribution_type"]),
      isRecallable: row["is_recallable"] === true,
    };
  }
  if (kind === "adjustment") {
    return {
      ...base,
      kind,
      adjustmentDate: asString(row["adjustment_date"]),
      adjustmentType: asString(row["adjustment_type"]),
      category: asString(row["category"]),
      isContributionAdjustment: row["is_contribution_adjustment"] === true,
      contributionFlagSource: row["contribution_flag_source"] === "text" ? "text" : "default",
    };
  }
  return null;
}

function documentItem(doc: DocumentRecord) {
  return {
    pk: pkDocument(doc.documentId),
    sk: META,
    entity: "document",
    document_id: doc.documentId,
    fund_id: doc.fundId,
    file_name: doc.fileName,
    blob_key: doc.blobKey,
    content_type: doc.contentType,
    size_bytes: doc.sizeBytes,
    uploaded_at: doc.uploadedAt,
    updated_at: doc.updatedAt,
    parsing_status: doc.parsingStatus,
    error_message: doc.errorMessage,
    stats_json: doc.stats ? JSON.stringify(doc.stats) : undefined,
  };
}

function coerceDocument(row: Record<string, unknown>): DocumentRecord {
  return {
    documentId: asString(row["document_id"]),
    fundId: asString(row["fund_id"]),
    fileName: asString(row["file_name"]),
    blobKey: asString(row["blob_key"]),
    contentType: asString(row["content_type"]),
    sizeBytes: asOptionalNumber(row["size_bytes"]) ?? 0,
    uploadedAt: asString(row["uploaded_at"]),
    updatedAt: asString(row["updated_at"]),
    parsingStatus: asParsingStatus(row["parsing_status"]),
    errorMessage: asOptionalString(row["error_message"]),
    stats: parseStats(row["stats_json"]),
  };
}

/** Packs staged writes into transactions, each carrying the fund checks its writes need. */
export function planTransactions(
  tableName: string,
  writes: readonly StagedWrite[],
  stagedFunds: ReadonlySet<string>,
): StagedWrite[][] {
  const groups: StagedWrite[][] = [];
  let current: StagedWrite[] = [];
  let checks = new Set<string>();

  const flush = () => {
    if (!current.length) return;
    const withChecks = [...current];
    for (const fundId of checks) withChecks.push(fundCheck(tableName, fundId));
    groups.push(withChecks);
    current = [];
    checks = new Set();
  };

  for (const write of writes) {
    const needsCheck = write.requiresFund && !stagedFunds.has(write.requiresFund) && !checks.has(write.requiresFund);
    if (current.length + checks.size + (needsCheck ? 2 : 1) > MAX_TRANSACT_ITEMS) flush();
    current.push(write);
    if (write.requiresFund && !stagedFunds.has(write.requiresFund)) checks.add(write.requiresFund);
  }
  flush();
  return groups;
}

function fundCheck(tableName: string, fundId: string): StagedWrite {
  return {
    item: {
      ConditionCheck: {
        TableName: tableName,
        Key: { pk: pkFund(fundId), sk: META },
        ConditionExpression: "attribute_exists(pk)",
      },
    },
    onConditionFailed: () => new NotFoundError(`Fund ${fundId}`),
  };
}

function conditionFailure(err: unknown, group: readonly StagedWrite[]): Error | null {
  if (!(err instanceof TransactionCanceledException)) return null;
  const reasons = err.CancellationReasons ?? [];
  for (let i = 0; i < reasons.length; i += 1) {
    if (reasons[i]?.Code !== "ConditionalCheckFailed") continue;
    const failed = group[i]?.onConditionFailed;
    if (failed) return failed();
  }
  return null;
}

async function queryAll(ddb: DynamoDBDocumentClient, input: QueryCommandInput): Promise<Record<string, unknown>[]> {
  const rows: Record<string, unknown>[] = [];
  let startKey: QueryCommandInput["ExclusiveStartKey"];
  do {
    const res = await ddb.send(new QueryCommand({ ...input, ExclusiveStartKey: startKey }));
    for (const it of res.Items ?? []) rows.push(it);
    startKey = res.LastEvaluatedKey;
  } while (startKey);
  return rows;
}

/**
 * Single-table DynamoDB store. Writes staged in a unit of work are sent as TransactWriteItems on
 * commit; a unit of work over 100 items spans several transactions and is only atomic per chunk.
 */
export function createDdbStore(ddb: DynamoDBDocumentClient, tableName: string): Store {
  const TableName = tableName;

  async function getItem(pk: string, sk: string): Promise<Record<string, unknown> | null> {
    const res = await ddb.send(new GetCommand({ TableName, Key: { pk, sk } }));
    return res.Item ?? null;
  }

  function openUnitOfWork(): UnitOfWorkHandle {
    const guard = createOpenGuard();
    const writes: StagedWrite[] = [];
    const stagedFunds = new Set<string>();

    const stage = (write: StagedWrite) => {
      guard.assertOpen();
      writes.push(write);
    };

    const uow: UnitOfWork = {
      async getFund(fundId) {
        guard.assertOpen();
        const row = await getItem(pkFund(fundId), META);
        return row ? coerceFund(row) : null;
      },

      async listFunds(limit = 50) {
        guard.assertOpen();
        const res = await ddb.send(
          new QueryCommand({
            TableName,
            KeyConditionExpression: "pk = :pk",
            ExpressionAttributeValues: { ":pk": pkFundIndex() },
            Limit: limit,
            ScanIndexForward: false,
          }),
        );
        const ids = (res.Items ?? []).map((it) => asString(it["fund_id"])).filter(Boolean);
        const funds: Fund[] = [];
        for (const id of ids) {
          const row = await getItem(pkFund(id), META);
          if (row) funds.push(coerceFund(row));
        }
        return funds;
      },

      putFund(fund) {
        stage({ item: { Put: { TableName, Item: fundItem(fund) } } });
        stage({
          item: {
            Put: {
              TableName,
              Item: {
                pk: pkFundIndex(),
                sk: skCreated(fund.createdAt, "FUND", fund.fundId),
                entity: "fund_index",
                fund_id: fund.fundId,
                name: fund.name,
                created_at: fund.createdAt,
              },
            },
          },
        });
        stagedFunds.add(fund.fundId);
      },

      async listTransactions(fundId) {
        guard.assertOpen();
        const rows = await queryAll(ddb, {
          TableName,
          KeyConditionExpression: "pk = :pk",
          ExpressionAttributeValues: { ":pk": pkFundTransactions(fundId) },
        });
        const out: TransactionRecord[] = [];
        for (const row of rows) {
          const record = coerceTransaction(row);
          if (record) out.push(record);
        }
        return out;
      },

      addTransaction(record) {
        stage({
          item: { Put: { TableName, Item: transactionItem(record) } },
          requiresFund: record.fundId,
        });
      },

      async deleteTransactionsForDocument(fundId, documentId) {
        guard.assertOpen();
        const rows = await queryAll(ddb, {
          TableName,
          KeyConditionExpression: "pk = :pk",
          FilterExpression: "document_id = :doc",
          ExpressionAttributeValues: { ":pk": pkFundTransactions(fundId), ":doc": documentId },
          ProjectionExpression: "pk, sk",
        });
        for (const row of rows) {
          stage({ item: { Delete: { TableName, Key: { pk: asString(row["pk"]), sk: asString(row["sk"]) } } } });
        }
        return rows.length;
      },

      async getDocument(documentId) {
        guard.assertOpen();
        const row = await getItem(pkDocument(documentId), META);
        return row ? coerceDocument(row) : null;
      },

      async listDocuments(fundId, limit = 100) {
        guard.assertOpen();
        const res = await ddb.send(
          new QueryCommand({
            TableName,
            KeyConditionExpression: "pk = :pk",
            ExpressionAttributeValues: { ":pk": pkFundDocuments(fundId) },
            Limit: limit,
            ScanIndexForward: false,
          }),
        );
        const ids = (res.Items ?? []).map((it) => asString(it["document_id"])).filter(Boolean);
        const docs: DocumentRecord[] = [];
        for (const id of ids) {
          const row = await getItem(pkDocument(id), META);
          if (row) docs.push(coerceDocument(row));
        }
        docs.sort((a, b) => (b.uploadedAt || "").localeCompare(a.uploadedAt || ""));
        return docs;
      },

      createDocument(doc) {
        stage({
          item: {
            Put: {
              TableName,
              Item: documentItem(doc),
              ConditionExpression: "attribute_not_exists(pk)",
            },
          },
          requiresFund: doc.fundId,
          onConditionFailed: () => new Error(`Document ${doc.documentId} already exists`),
        });
        stage({
          item: {
            Put: {
              TableName,
              Item: {
                pk: pkFundDocuments(doc.fundId),
                sk: skCreated(doc.uploadedAt, "DOC", doc.documentId),
                entity: "document_index",
                document_id: doc.documentId,
                fund_id: doc.fundId,
                file_name: doc.fileName,
                uploaded_at: doc.uploadedAt,
              },
            },
          },
        });
      },

      transitionDocument(documentId: string, to: ParsingStatus, patch?: DocumentPatch) {
        guard.assertOpen();
        const previous = allowedPreviousStatuses(to);
        if (!previous.length) throw new InvalidStatusTransitionError(documentId, to);
        const values: Record<string, unknown> = {
          ":to": to,
          ":updated_at": new Date().toISOString(),
        };
        previous.forEach((status, i) => {
          values[`:p${i}`] = status;
        });
        const sets = ["#status = :to", "updated_at = :updated_at"];
        if (patch?.errorMessage !== undefined) {
          sets.push("error_message = :error_message");
          values[":error_message"] = patch.errorMessage;
        }
        if (patch?.stats) {
          sets.push("stats_json = :stats_json");
          values[":stats_json"] = JSON.stringify(patch.stats);
        }
        const allowed = previous.map((_, i) => `:p${i}`).join(", ");
        stage({
          item: {
            Update: {
              TableName,
              Key: { pk: pkDocument(documentId), sk: META },
              UpdateExpression: `SET ${sets.join(", ")}`,
              ConditionExpression: `attribute_exists(pk) AND #status IN (${allowed})`,
              ExpressionAttributeNames: { "#status": "parsing_status" },
              ExpressionAttributeValues: values,
            },
          },
          onConditionFailed: () => new InvalidStatusTransitionError(documentId, to),
        });
      },

      deleteDocument(doc) {
        stage({ item: { Delete: { TableName, Key: { pk: pkDocument(doc.documentId), sk: META } } } });
        stage({
          item: {
            Delete: {
              TableName,
              Key: { pk: pkFundDocuments(doc.fundId), sk: skCreated(doc.uploadedAt, "DOC", doc.documentId) },
            },
          },
        });
      },
    };

    return {
      uow,
      async commit() {
        guard.assertOpen();
        for (const group of planTransactions(TableName, writes, stagedFunds)) {
          try {
            await ddb.send(new TransactWriteCommand({ TransactItems: group.map((w) => w.item) }));
          } catch (err) {
            throw conditionFailure(err, group) ?? err;
          }
        }
      },
      close() {
        if (guard.closed) return;
        guard.close();
        writes.length = 0;
      },
    };
  }

  return {
    withUnitOfWork<T>(fn: (uow: UnitOfWork) => Promise<T>) {
      return runUnitOfWork(openUnitOfWork(), fn);
    },
  };
}
