import type { BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";
import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { S3Client } from "@aws-sdk/client-s3";
import type { SQSClient } from "@aws-sdk/client-sqs";

import { createBedrockRuntimeClient } from "@/lib/aws/bedrock";
import { createDdbDocClient } from "@/lib/aws/ddb";
import {
  getAnthropicApiKey,
  getAwsRegion,
  getBedrockModelId,
  getDdbTableName,
  getS3BucketName,
  getSqsQueueUrl,
} from "@/lib/aws/env";
import { createS3Client } from "@/lib/aws/s3";
import { createSqsClient } from "@/lib/aws/sqs";
import { createMemoryBlobStore, createS3BlobStore, type BlobStore } from "@/lib/blobStore";
import type { AppConfig } from "@/lib/config";
import { createDdbConversationStore, createMemoryConversationStore, type ConversationStore } from "@/lib/conversationStore";
import type { LlmPrice } from "@/lib/cost";
import { createDdbStore } from "@/lib/ddbStore";
import { createDocumentJobs, type DocumentJobs } from "@/lib/documentJobs";
import { createDocumentProcessor, type DocumentProcessor } from "@/lib/documentProcessor";
import { createBedrockEmbedder, createLocalEmbedder, type EmbeddingProvider } from "@/lib/embeddings";
import { GenerationFailure } from "@/lib/errors";
import type { IrrOptions } from "@/lib/irr";
import { createMemoryJobQueue, createSqsJobQueue, type JobQueue } from "@/lib/jobQueue";
import { createAnthropicLlm, createBedrockLlm, describeLlmError, type LlmClient } from "@/lib/llm";
import { createMemoryStore } from "@/lib/memoryStore";
import { loadPdf } from "@/lib/pdf";
import { createQueryEngine, type QueryEngine } from "@/lib/queryEngine";
import { createRetriever, type Retriever } from "@/lib/retrieval";
import type { Store } from "@/lib/store";
import type { DocumentLoader } from "@/lib/types";
import { createDdbVectorIndex, createMemoryVectorIndex, type VectorIndex } from "@/lib/vectorIndex";
import { createDocumentWorker, type DocumentWorker } from "@/lib/worker";

type Env = Record<string, string | undefined>;

export type AwsHandles = {
  region: string;
  ddb: DynamoDBDocumentClient;
  tableName: string;
  s3: S3Client;
  bucket: string;
  sqs: SQSClient;
  queueUrl: string;
};

export type Runtime = {
  config: AppConfig;
  aws: AwsHandles | null;
  store: Store;
  blobs: BlobStore;
  queue: JobQueue;
  index: VectorIndex;
  conversations: ConversationStore;
  embeddings: EmbeddingProvider;
  llm: LlmClient;
  retriever: Retriever;
  processor: DocumentProcessor;
  engine: QueryEngine;
  jobs: DocumentJobs;
  worker: DocumentWorker;
  irrOptions: IrrOptions;
};

export type RuntimeOverrides = {
  env?: Env;
  llm?: LlmClient;
  embeddings?: EmbeddingProvider;
  loadDocument?: DocumentLoader;
};

/** Stands in when no provider credentials are configured; every call fails as a generation failure. */
export function unavailableLlm(provider: LlmClient["provider"], model: string, cause: unknown): LlmClient {
  const message = describeLlmError(cause);
  return {
    provider,
    model,
    async completeText() {
      throw new GenerationFailure(message);
    },
  };
}

function buildLlm(config: AppConfig, env: Env, bedrock: () => BedrockRuntimeClient): LlmClient {
  if (config.LLM_PROVIDER === "bedrock") {
    try {
      return createBedrockLlm(bedrock(), getBedrockModelId(env));
    } catch (err) {
      return unavailableLlm("bedrock", "", err);
    }
  }
  try {
    return createAnthropicLlm(getAnthropicApiKey(env), config.ANTHROPIC_MODEL);
  } catch (err) {
    return unavailableLlm("anthropic", config.ANTHROPIC_MODEL, err);
  }
}

function priceOverride(config: AppConfig): LlmPrice | undefined {
  if (config.LLM_INPUT_USD_PER_1M === undefined || config.LLM_OUTPUT_USD_PER_1M === undefined) return undefined;
  return { inputUsdPer1M: config.LLM_INPUT_USD_PER_1M, outputUsdPer1M: config.LLM_OUTPUT_USD_PER_1M };
}

/**
 * Builds every long-lived handle once: AWS clients, the LLM and embedding clients, stores, and the
 * services on top of them. Callers keep the result for the life of the process.
 */
export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const env = overrides.env ?? process.env;

  let aws: AwsHandles | null = null;
  if (config.STORAGE_DRIVER === "dynamodb") {
    const region = getAwsRegion(env);
    aws = {
      region,
      ddb: createDdbDocClient(region),
      tableName: getDdbTableName(env),
      s3: createS3Client(region),
      bucket: getS3BucketName(env),
      sqs: createSqsClient(region),
      queueUrl: getSqsQueueUrl(env),
    };
  }

  let bedrockClient: BedrockRuntimeClient | null = null;
  const bedrock = () => {
    bedrockClient ??= createBedrockRuntimeClient(aws?.region ?? getAwsRegion(env));
    return bedrockClient;
  };

  const store = aws ? createDdbStore(aws.ddb, aws.tableName) : createMemoryStore();
  const index = aws ? createDdbVectorIndex(aws.ddb, aws.tableName) : createMemoryVectorIndex();
  const conversations = aws ? createDdbConversationStore(aws.ddb, aws.tableName) : createMemoryConversationStore();
  const blobs = aws ? createS3BlobStore(aws.s3, aws.bucket) : createMemoryBlobStore();
  const queue = aws ? createSqsJobQueue(aws.sqs, aws.queueUrl) : createMemoryJobQueue();

  const embeddings =
    overrides.embeddings ??
    (config.EMBEDDING_PROVIDER === "bedrock"
      ? createBedrockEmbedder(bedrock(), config.EMBEDDING_MODEL_ID, config.EMBEDDING_DIMENSIONS)
      : createLocalEmbedder(config.EMBEDDING_DIMENSIONS));
  const llm = overrides.llm ?? buildLlm(config, env, bedrock);
  const irrOptions: IrrOptions = { maxIterations: config.IRR_MAX_ITERATIONS, tolerance: config.IRR_TOLERANCE };

  const retriever = createRetriever({ embeddings, index, defaultTopK: config.TOP_K_RESULTS });
  const processor = createDocumentProcessor({
    store,
    embeddings,
    index,
    chunkOptions: { chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP },
    dateOrder: config.DATE_ORDER,
  });
  const engine = createQueryEngine({
    store,
    retriever,
    llm,
    conversations,
    topK: config.TOP_K_RESULTS,
    historyTurns: config.HISTORY_TURNS,
    llmTimeoutMs: config.LLM_TIMEOUT_MS,
    maxTokens: config.LLM_MAX_TOKENS,
    irrOptions,
    price: priceOverride(config),
  });
  const jobs = createDocumentJobs({ store, blobs, queue, index, maxUploadBytes: config.MAX_UPLOAD_BYTES });
  const worker = createDocumentWorker({
    store,
    blobs,
    queue,
    processor,
    loadDocument: overrides.loadDocument ?? loadPdf,
    concurrency: config.WORKER_CONCURRENCY,
    waitSeconds: config.WORKER_WAIT_SECONDS,
    idleDelayMs: aws ? 0 : 250,
    staleProcessingMs: config.WORKER_STALE_PROCESSING_MS,
  });

  return {
    config,
    aws,
    store,
    blobs,
    queue,
    index,
    conversations,
    embeddings,
    llm,
    retriever,
    processor,
    engine,
    jobs,
    worker,
    irrOptions,
  };
}
