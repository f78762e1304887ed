import { InvokeModelCommand, type BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";
import { z } from "zod";

export type EmbeddingProvider = {
  readonly name: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
};

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i += 1) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

export function normalizeVector(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm ? vector.map((v) => v / norm) : vector;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || !a.length) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return na && nb ? dot / Math.sqrt(na * nb) : 0;
}

/**
 * Feature-hashing bag of words plus adjacent-word bigrams. Deterministic and offline; the
 * quality is lexical, which is enough for local runs and tests.
 */
export function embedLocally(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  const tokens = tokenize(text);
  const features = [...tokens];
  for (let i = 1; i < tokens.length; i += 1) features.push(`${tokens[i - 1]} ${tokens[i]}`);
  for (const feature of features) {
    const hash = fnv1a(feature);
    const bucket = hash % dimensions;
    const sign = hash & 0x80000000 ? -1 : 1;
    vector[bucket] = (vector[bucket] ?? 0) + sign;
  }
  return normalizeVector(vector);
}

export function createLocalEmbedder(dimensions = 384): EmbeddingProvider {
  return {
    name: "local-hash",
    dimensions,
    async embed(texts) {
      return texts.map((t) => embedLocally(t, dimensions));
    },
  };
}

const titanResponseSchema = z.object({ embedding: z.array(z.number()) });

/** Amazon Titan text embeddings v2 on Bedrock; one InvokeModel call per text. */
export function createBedrockEmbedder(
  client: BedrockRuntimeClient,
  modelId: string,
  dimensions: number,
): EmbeddingProvider {
  return {
    name: modelId,
    dimensions,
    async embed(texts) {
      const out: number[][] = [];
      for (const inputText of texts) {
        const resp = await client.send(
          new InvokeModelCommand({
            modelId,
            contentType: "application/json",
            accept: "application/json",
            body: new TextEncoder().encode(JSON.stringify({ inputText, dimensions, normalize: true })),
          }),
        );
        const parsed = titanResponseSchema.safeParse(JSON.parse(new TextDecoder("utf-8").decode(resp.body)));
        if (!parsed.success) throw new Error(`Unexpected embedding response from ${modelId}`);
        out.push(parsed.data.embedding);
      }
      return out;
    },
  };
}
