import path from "node:path";
import { LocalIndex } from "vectra";
import { z } from "zod";
import { AsyncLock } from "./async-lock.js";
import { StoreError, toErrorMessage } from "./errors.js";
import type { Chunk, Logger, SearchHit, StoreStats } from "./types.js";

const chunkMetadataSchema = z.object({
  text: z.string(),
  source: z.string(),
  page: z.number().int(),
  chunkIndex: z.number().int(),
});

interface IndexedItem {
  id: string;
  vector: number[];
  /** Magnitude of `vector`, stored by vectra on insert. */
  norm: number;
  metadata: Record<string, unknown>;
}

function toChunk(item: IndexedItem): Chunk {
  const parsed = chunkMetadataSchema.safeParse(item.metadata);
  if (!parsed.success) {
    throw new StoreError("read", `record ${item.id} has malformed metadata`);
  }
  return {
    id: item.id,
    text: parsed.data.text,
    sourceFilename: parsed.data.source,
    pageNumber: parsed.data.page,
    chunkIndex: parsed.data.chunkIndex,
    embedding: item.vector,
  };
}

function magnitude(vector: number[]): number {
  return Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
}

function cosine(query: number[], queryNorm: number, item: IndexedItem): number {
  if (item.norm === 0) return 0;
  let dot = 0;
  for (let i = 0; i < query.length; i++) {
    dot += (query[i] ?? 0) * (item.vector[i] ?? 0);
  }
  return dot / (queryNorm * item.norm);
}

// One lock per resolved directory, shared by every VectorStore opened on it.
const directoryLocks = new Map<string, AsyncLock>();

function lockFor(directory: string): AsyncLock {
  let lock = directoryLocks.get(directory);
  if (!lock) {
    lock = new AsyncLock();
    directoryLocks.set(directory, lock);
  }
  return lock;
}

/**
 * Chunk records and their vectors in one vectra index on disk. Text and
 * metadata travel inside the same index item as the vector, and a batch is
 * committed by a single `endUpdate` write.
 *
 * Every operation runs in one exclusive section per directory, so stores
 * opened on the same path from independent sessions never interleave, and
 * `search` and `stats` wait for an in-flight `add` or `clear`. Each
 * operation opens a fresh `LocalIndex` and reads `index.json` inside that
 * section; nothing is cached between operations.
 */
export class VectorStore {
  readonly directory: string;
  private readonly lock: AsyncLock;

  constructor(
    directory: string,
    private readonly log: Logger = () => {},
  ) {
    this.directory = path.resolve(directory);
    this.lock = lockFor(this.directory);
  }

  private async openIndex(operation: string): Promise<{ index: LocalIndex; items: IndexedItem[] }> {
    const index = new LocalIndex(this.directory);
    try {
      if (!(await index.isIndexCreated())) {
        await index.createIndex();
      }
      return { index, items: await index.listItems() };
    } catch (error) {
      throw new StoreError(operation, toErrorMessage(error), { cause: error });
    }
  }

  /** Dimensionality of stored vectors, or undefined for an empty store. */
  async dimensions(): Promise<number | undefined> {
    return this.lock.run(async () => (await this.openIndex("read")).items[0]?.vector.length);
  }

  async add(chunks: Chunk[]): Promise<void> {
    if (chunks.length === 0) return;

    await this.lock.run(async () => {
      const { index, items: existing } = await this.openIndex("add");
      const dims = existing[0]?.vector.length ?? chunks[0]?.embedding.length ?? 0;
      const ids = new Set(existing.map((item) => item.id));

      for (const chunk of chunks) {
        if (chunk.embedding.length === 0 || chunk.embedding.length !== dims) {
          throw new StoreError(
            "add",
            `dimensionality mismatch: store holds ${dims}-dimensional vectors, chunk ${chunk.id} has ${chunk.embedding.length}`,
          );
        }
        if (!chunk.text.trim()) {
          throw new StoreError("add", `chunk ${chunk.id} has no text`);
        }
        if (ids.has(chunk.id)) {
          throw new StoreError("add", `duplicate chunk id ${chunk.id}`);
        }
        ids.add(chunk.id);
      }

      try {
        await index.beginUpdate();
      } catch (error) {
        throw new StoreError("add", toErrorMessage(error), { cause: error });
      }

      // on failure `index` is dropped with whatever it inserted in memory
      try {
        for (const chunk of chunks) {
          await index.insertItem({
            id: chunk.id,
            vector: chunk.embedding,
            metadata: {
              text: chunk.text,
              source: chunk.sourceFilename,
              page: chunk.pageNumber,
              chunkIndex: chunk.chunkIndex,
            },
          });
        }
        await index.endUpdate();
      } catch (error) {
        index.cancelUpdate();
        throw new StoreError("add", toErrorMessage(error), { cause: error });
      }
    });
  }

  /**
   * Up to `k` chunks by descending cosine similarity in [-1, 1]. Equal
   * scores keep insertion order.
   */
  async search(queryVector: number[], k: number): Promise<SearchHit[]> {
    if (k <= 0) return [];

    return this.lock.run(async () => {
      const { items: existing } = await this.openIndex("search");
      const first = existing[0];
      if (!first) return [];

      if (queryVector.length !== first.vector.length) {
        throw new StoreError(
          "search",
          `dimensionality mismatch: store holds ${first.vector.length}-dimensional vectors, query has ${queryVector.length}`,
        );
      }
      const queryNorm = magnitude(queryVector);
      if (queryNorm === 0) {
        throw new StoreError("search", "query vector has zero magnitude");
      }

      // Array.prototype.sort is stable: equal scores stay in insertion order
      const results = existing
        .map((item) => ({ item, score: cosine(queryVector, queryNorm, item) }))
        .sort((a, b) => b.score - a.score)
        .slice(0, k);
      return results.map((r) => ({ chunk: toChunk(r.item), score: r.score }));
    });
  }

  async stats(): Promise<StoreStats> {
    return this.lock.run(async () => {
      const { items: existing } = await this.openIndex("stats");
      const sources = new Set<string>();
      for (const item of existing) {
        const source = item.metadata["source"];
        if (typeof source === "string") sources.add(source);
      }
      return { totalDocuments: existing.length, sourceCount: sources.size };
    });
  }

  /** Drops every chunk. Reports failure instead of throwing. */
  async clear(): Promise<boolean> {
    try {
      await this.lock.run(() =>
        new LocalIndex(this.directory).createIndex({ version: 1, deleteIfExists: true }),
      );
      this.log("RAG: vector store cleared");
      return true;
    } catch (error) {
      this.log(`RAG: clearing vector store failed: ${toErrorMessage(error)}`);
      return false;
    }
  }
}
