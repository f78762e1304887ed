import { DescribeTableCommand } from "@aws-sdk/client-dynamodb";
import { HeadBucketCommand } from "@aws-sdk/client-s3";
import { GetQueueAttributesCommand } from "@aws-sdk/client-sqs";

import { errorMessage } from "@/lib/errors";
import type { Runtime } from "@/lib/runtime";

type CheckResult = { ok: true } | { ok: false; error: string };

async function safeCheck(fn: () => Promise<void>): Promise<CheckResult> {
  try {
    await fn();
    return { ok: true };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

export async function getHealth(rt: Runtime, env: Record<string, string | undefined> = process.env) {
  const { config } = rt;
  const present = {
    AWS_REGION: Boolean(env.AWS_REGION ?? env.AWS_DEFAULT_REGION),
    FUND_LEDGER_DDB_TABLE: Boolean(env.FUND_LEDGER_DDB_TABLE),
    FUND_LEDGER_S3_BUCKET: Boolean(env.FUND_LEDGER_S3_BUCKET),
    FUND_LEDGER_SQS_QUEUE_URL: Boolean(env.FUND_LEDGER_SQS_QUEUE_URL),
    LLM_PROVIDER: Boolean(env.LLM_PROVIDER),
    BEDROCK_MODEL_ID: Boolean(env.BEDROCK_MODEL_ID),
    ANTHROPIC_API_KEY: Boolean(env.ANTHROPIC_API_KEY),
  };

  const required: (keyof typeof present)[] = [];
  if (config.STORAGE_DRIVER === "dynamodb") {
    required.push("AWS_REGION", "FUND_LEDGER_DDB_TABLE", "FUND_LEDGER_S3_BUCKET", "FUND_LEDGER_SQS_QUEUE_URL");
  }
  required.push(config.LLM_PROVIDER === "bedrock" ? "BEDROCK_MODEL_ID" : "ANTHROPIC_API_KEY");
  if (config.EMBEDDING_PROVIDER === "bedrock" && !required.includes("AWS_REGION")) required.push("AWS_REGION");
  const missingRequiredEnvs = required.filter((key) => !present[key]);

  const hints: string[] = [];
  if (config.LLM_PROVIDER === "bedrock" && !present.BEDROCK_MODEL_ID) {
    hints.push("LLM_PROVIDER=bedrock needs BEDROCK_MODEL_ID.");
  }
  if (config.LLM_PROVIDER === "anthropic" && !present.ANTHROPIC_API_KEY) {
    hints.push("LLM_PROVIDER=anthropic needs ANTHROPIC_API_KEY; answers degrade to metrics-only summaries without it.");
  }
  if (config.STORAGE_DRIVER === "memory") {
    hints.push("STORAGE_DRIVER=memory keeps everything in process; data is lost on restart.");
  }

  const { aws } = rt;
  const checks: Record<string, CheckResult> = aws
    ? {
        ddbDescribeTable: await safeCheck(async () => {
          await aws.ddb.send(new DescribeTableCommand({ TableName: aws.tableName }));
        }),
        s3HeadBucket: await safeCheck(async () => {
          await aws.s3.send(new HeadBucketCommand({ Bucket: aws.bucket }));
        }),
        sqsGetQueueAttributes: await safeCheck(async () => {
          await aws.sqs.send(new GetQueueAttributesCommand({ QueueUrl: aws.queueUrl, AttributeNames: ["QueueArn"] }));
        }),
      }
    : {};

  const ok = missingRequiredEnvs.length === 0 && Object.values(checks).every((c) => c.ok);

  return {
    status: ok ? 200 : 503,
    body: {
      ok,
      summary: {
        storageDriver: config.STORAGE_DRIVER,
        llmProvider: config.LLM_PROVIDER,
        embeddingProvider: config.EMBEDDING_PROVIDER,
        missingRequiredEnvs,
      },
      env: present,
      region: aws?.region ?? null,
      ddbTable: aws?.tableName ?? null,
      bucket: aws?.bucket ?? null,
      sqsUrl: aws?.queueUrl ?? null,
      checks,
      hints,
    },
  };
}
