import { z } from "zod";

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const configSchema = z
  .object({
    CHUNK_SIZE: intFromEnv(1000),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
    TOP_K_RESULTS: intFromEnv(5),
    HISTORY_TURNS: z.coerce.number().int().min(0).default(5),
    DATE_ORDER: z.enum(["MDY", "DMY"]).default("MDY"),
    LLM_PROVIDER: z.enum(["anthropic", "bedrock"]).default("anthropic"),
    LLM_TIMEOUT_MS: intFromEnv(30_000),
    LLM_MAX_TOKENS: intFromEnv(1024),
    ANTHROPIC_MODEL: z.string().min(1).default("claude-sonnet-4-5-20250929"),
    MAX_UPLOAD_BYTES: intFromEnv(50 * 1024 * 1024),
    EMBEDDING_PROVIDER: z.enum(["local", "bedrock"]).default("local"),
    EMBEDDING_MODEL_ID: z.string().min(1).default("amazon.titan-embed-text-v2:0"),
    EMBEDDING_DIMENSIONS: intFromEnv(384),
    STORAGE_DRIVER: z.enum(["memory", "dynamodb"]).default("memory"),
    IRR_MAX_ITERATIONS: intFromEnv(100),
    IRR_TOLERANCE: z.coerce.number().positive().default(1e-7),
    WORKER_CONCURRENCY: intFromEnv(2),
    WORKER_WAIT_SECONDS: z.coerce.number().int().min(0).max(20).default(20),
    WORKER_STALE_PROCESSING_MS: z.coerce.number().int().min(0).default(15 * 60 * 1000),
    LLM_INPUT_USD_PER_1M: z.coerce.number().nonnegative().optional(),
    LLM_OUTPUT_USD_PER_1M: z.coerce.number().nonnegative().optional(),
  })
  .refine((c) => c.CHUNK_OVERLAP < c.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

export type AppConfig = z.infer<typeof configSchema>;

/** Tunables from the environment. Blank values fall back to defaults. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value.trim();
  }
  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid config: ${detail}`);
  }
  return parsed.data;
}
