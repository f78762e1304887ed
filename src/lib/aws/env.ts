type Env = Record<string, string | undefined>;

export function getAwsRegion(env: Env = process.env): string {
  const region = env.AWS_REGION ?? env.AWS_DEFAULT_REGION;
  if (!region) {
    throw new Error("Missing env AWS_REGION");
  }
  return region;
}

export function getDdbTableName(env: Env = process.env): string {
  const name = env.FUND_LEDGER_DDB_TABLE;
  if (!name) {
    throw new Error("Missing env FUND_LEDGER_DDB_TABLE");
  }
  return name;
}

export function getS3BucketName(env: Env = process.env): string {
  const name = env.FUND_LEDGER_S3_BUCKET;
  if (!name) {
    throw new Error("Missing env FUND_LEDGER_S3_BUCKET");
  }
  return name;
}

export function getSqsQueueUrl(env: Env = process.env): string {
  const url = env.FUND_LEDGER_SQS_QUEUE_URL;
  if (!url) {
    throw new Error("Missing env FUND_LEDGER_SQS_QUEUE_URL");
  }
  return url;
}

export function getBedrockModelId(env: Env = process.env): string {
  const id = env.BEDROCK_MODEL_ID;
  if (!id) throw new Error("Missing env BEDROCK_MODEL_ID");
  return id;
}

export function getAnthropicApiKey(env: Env = process.env): string {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (!apiKey) throw new Error("Missing env ANTHROPIC_API_KEY");
  return apiKey;
}
