import type { EmbeddingProvider } from "./embedding-service.js";
import type { RetrievedChunkRef } from "./types.js";
import type { VectorStore } from "./vector-store.js";

export interface RetrieveOptions {
  topK: number;
  scoreThreshold: number;
}

export async function retrieve(
  query: string,
  store: VectorStore,
  embedder: EmbeddingProvider,
  options: RetrieveOptions,
): Promise<RetrievedChunkRef[]> {
  const queryVector = await embedder.embedQuery(query);
  const results = await store.search(queryVector, options.topK);

  return results
    .filter((r) => r.score >= options.scoreThreshold)
    .map((r) => ({
      id: r.chunk.id,
      sourceFilename: r.chunk.sourceFilename,
      pageNumber: r.chunk.pageNumber,
      chunkIndex: r.chunk.chunkIndex,
      text: r.chunk.text,
      similarity: r.score,
    }));
}
