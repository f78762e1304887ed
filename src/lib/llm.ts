import Anthropic from "@anthropic-ai/sdk";
import { InvokeModelCommand, type BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";
import { z } from "zod";

import { GenerationFailure } from "@/lib/errors";

export type LlmProvider = "anthropic" | "bedrock";

export type LlmUsage = {
  inputTokens?: number;
  outputTokens?: number;
};

export type LlmTextResult = {
  provider: LlmProvider;
  model: string;
  text: string;
  usage?: LlmUsage;
};

export type LlmMessage = {
  role: "user" | "assistant";
  content: string;
};

export type CompleteTextArgs = {
  system: string;
  messages: LlmMessage[];
  maxTokens: number;
  temperature?: number;
  timeoutMs: number;
};

export type LlmClient = {
  readonly provider: LlmProvider;
  readonly model: string;
  completeText(args: CompleteTextArgs): Promise<LlmTextResult>;
};

export function describeLlmError(err: unknown): string {
  const name = err instanceof Error ? err.name || "" : "";
  const msg = err instanceof Error ? err.message || "" : String(err);

  if (msg.startsWith("Missing env ")) {
    return `Missing configuration: ${msg.replace("Missing env ", "")}`;
  }

  // AWS SDK errors carry a name like AccessDeniedException / ValidationException.
  const lower = msg.toLowerCase();
  if (name === "AccessDeniedException" || lower.includes("accessdenied")) {
    return "Bedrock access denied. The IAM role needs bedrock:InvokeModel and model access enabled.";
  }
  if (name === "UnrecognizedClientException" || lower.includes("security token") || lower.includes("invalidsignature")) {
    return "AWS credentials or region are invalid. Check AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY and AWS_REGION.";
  }
  if (name === "ResourceNotFoundException") {
    return "Bedrock model not found. Check BEDROCK_MODEL_ID and AWS_REGION.";
  }
  if (name === "ValidationException" && lower.includes("on-demand throughput")) {
    return "This model cannot be invoked on demand. Set BEDROCK_MODEL_ID to an inference profile ID or ARN.";
  }
  if (err instanceof Anthropic.APIError && err.status === 401) {
    return "Anthropic rejected the API key. Check ANTHROPIC_API_KEY.";
  }
  if (err instanceof Anthropic.APIError && err.status === 429) {
    return "Anthropic rate limit reached. Retry shortly.";
  }

  const head = name && name !== "Error" ? `${name}: ` : "";
  return `${head}${msg || "Unknown error"}`;
}

const bedrockResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

async function withTimeout<T>(timeoutMs: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const signal = AbortSignal.timeout(timeoutMs);
  try {
    return await run(signal);
  } catch (err) {
    if (signal.aborted) {
      throw new GenerationFailure(`LLM call timed out after ${timeoutMs}ms`, true);
    }
    throw new GenerationFailure(describeLlmError(err));
  }
}

export function createAnthropicLlm(apiKey: string, model: string): LlmClient {
  const client = new Anthropic({ apiKey });
  return {
    provider: "anthropic",
    model,
    completeText(args) {
      return withTimeout(args.timeoutMs, async (signal) => {
        const resp = await client.messages.create(
          {
            model,
            system: args.system,
            max_tokens: args.maxTokens,
            temperature: args.temperature ?? 0,
            messages: args.messages.map((m) => ({ role: m.role, content: m.content })),
          },
          { signal, maxRetries: 0 },
        );
        const text = resp.content
          .flatMap((block) => (block.type === "text" ? [block.text] : []))
          .join("\n")
          .trim();
        return {
          provider: "anthropic",
          model,
          text,
          usage: { inputTokens: resp.usage.input_tokens, outputTokens: resp.usage.output_tokens },
        };
      });
    },
  };
}

/** Anthropic models on Bedrock take an Anthropic-shaped request body. */
export function createBedrockLlm(client: BedrockRuntimeClient, modelId: string): LlmClient {
  return {
    provider: "bedrock",
    model: modelId,
    completeText(args) {
      return withTimeout(args.timeoutMs, async (abortSignal) => {
        const payload = {
          anthropic_version: "bedrock-2023-05-31",
          max_tokens: args.maxTokens,
          temperature: args.temperature ?? 0,
          system: args.system,
          messages: args.messages.map((m) => ({
            role: m.role,
            content: [{ type: "text", text: m.content }],
          })),
        };
        const resp = await client.send(
          new InvokeModelCommand({
            modelId,
            contentType: "application/json",
            accept: "application/json",
            body: new TextEncoder().encode(JSON.stringify(payload)),
          }),
          { abortSignal },
        );
        const parsed = bedrockResponseSchema.parse(JSON.parse(new TextDecoder("utf-8").decode(resp.body)));
        const text = parsed.content
          .flatMap((block) => (block.type === "text" && block.text ? [block.text] : []))
          .join("\n")
          .trim();
        return {
          provider: "bedrock",
          model: modelId,
          text,
          usage: { inputTokens: parsed.usage?.input_tokens, outputTokens: parsed.usage?.output_tokens },
        };
      });
    },
  };
}
