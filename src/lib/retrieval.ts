import type { EmbeddingProvider } from "@/lib/embeddings";
import { RetrievalFailure } from "@/lib/errors";
import type { VectorIndex } from "@/lib/vectorIndex";

export type RetrievedChunk = {
  chunkId: string;
  documentId: string;
  pageNumber: number;
  chunkIndex: number;
  text: string;
  score: number;
};

export type RetrieveOptions = {
  fundId: string;
  topK?: number;
  documentId?: string;
};

export type Retriever = {
  retrieve(query: string, options: RetrieveOptions): Promise<RetrievedChunk[]>;
};

export function createRetriever(deps: { embeddings: EmbeddingProvider; index: VectorIndex; defaultTopK: number }): Retriever {
  return {
    async retrieve(query, options) {
      const text = query.trim();
      const topK = options.topK ?? deps.defaultTopK;
      if (!text || topK <= 0) return [];
      try {
        const [vector] = await deps.embeddings.embed([text]);
        if (!vector) throw new Error("Embedding provider returned no vector");
        const hits = await deps.index.search(vector, topK, { fundId: options.fundId, documentId: options.documentId });
        return hits.map(({ chunk, score }) => ({
          chunkId: chunk.chunkId,
          documentId: chunk.documentId,
          pageNumber: chunk.pageNumber,
          chunkIndex: chunk.chunkIndex,
          text: chunk.text,
          score,
        }));
      } catch (err) {
        throw new RetrievalFailure(err);
      }
    },
  };
}
