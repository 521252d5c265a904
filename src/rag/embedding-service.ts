import { z } from "zod";
import { RAG_CONFIG, type RagConfig } from "./config.js";
import { ConfigError, EmbeddingProviderError, toErrorMessage } from "./errors.js";
import { postJson } from "./http-client.js";
import type { Logger } from "./types.js";

const OPENROUTER_EMBEDDINGS_URL = "https://openrouter.ai/api/v1/embeddings";

export interface EmbeddingProvider {
  readonly id: string;
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

const openRouterResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int().optional() })),
});

const ollamaResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

interface BatchingOptions {
  batchSize: number;
  concurrency: number;
  dimensions?: number;
  onProgress?: (done: number, total: number) => void;
}

/**
 * Splits texts into batches, sends them through a bounded pool of workers
 * and reassembles the vectors in input order.
 */
async function embedInBatches(
  texts: string[],
  embedBatch: (batch: string[]) => Promise<number[][]>,
  options: BatchingOptions,
): Promise<number[][]> {
  const batches: { texts: string[]; startIdx: number }[] = [];
  for (let i = 0; i < texts.length; i += options.batchSize) {
    batches.push({
      texts: texts.slice(i, i + options.batchSize),
      startIdx: i,
    });
  }

  const results: number[][] = new Array<number[]>(texts.length);
  let completed = 0;

  const queue = [...batches];
  const workers = Array.from(
    { length: Math.min(options.concurrency, queue.length) },
    async () => {
      while (queue.length > 0) {
        const batch = queue.shift();
        if (!batch) break;
        const embeddings = await embedBatch(batch.texts);
        if (embeddings.length !== batch.texts.length) {
          throw new Error(
            `expected ${batch.texts.length} vectors in batch, received ${embeddings.length}`,
          );
        }
        embeddings.forEach((vector, j) => {
          results[batch.startIdx + j] = vector;
        });
        completed += batch.texts.length;
        options.onProgress?.(Math.min(completed, texts.length), texts.length);
      }
    },
  );

  await Promise.all(workers);
  checkDimensions(results, options.dimensions);
  return results;
}

function checkDimensions(vectors: number[][], expected?: number): void {
  const first = vectors[0];
  if (!first) return;
  const size = expected ?? first.length;
  if (size === 0) {
    throw new Error("provider returned an empty vector");
  }
  for (const vector of vectors) {
    if (vector.length !== size) {
      throw new Error(`expected ${size}-dimensional vectors, received ${vector.length}`);
    }
  }
}

abstract class HttpEmbeddingProvider implements EmbeddingProvider {
  abstract readonly id: string;
  abstract readonly model: string;

  constructor(
    protected readonly config: RagConfig,
    private readonly log: Logger,
  ) {}

  protected abstract embedBatch(batch: string[]): Promise<number[][]>;

  protected queryText(query: string): string {
    return query;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      throw new EmbeddingProviderError(this.id, "no input texts");
    }

    try {
      return await embedInBatches(texts, (batch) => this.embedBatch(batch), {
        batchSize: this.config.embeddingBatchSize,
        concurrency: this.config.embeddingConcurrency,
        dimensions: this.config.embeddingDimensions,
        onProgress: texts.length > this.config.embeddingBatchSize
          ? (done, total) => this.log(`RAG: embedding ${done}/${total}`)
          : undefined,
      });
    } catch (error) {
      const reason = toErrorMessage(error);
      this.log(`RAG: embedding failed provider=${this.id} model=${this.model}: ${reason}`);
      throw new EmbeddingProviderError(this.id, `model "${this.model}": ${reason}`, { cause: error });
    }
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embed([this.queryText(query)]);
    if (!embedding) {
      throw new EmbeddingProviderError(this.id, "no vector returned for query");
    }
    return embedding;
  }
}

export class OpenRouterEmbeddingProvider extends HttpEmbeddingProvider {
  readonly id = "remote";
  readonly model: string;
  private readonly apiKey: string;

  constructor(config: RagConfig, log: Logger) {
    super(config, log);
    if (!config.openRouterApiKey) {
      throw new ConfigError("OPENROUTER_API_KEY is required for the remote embedding provider");
    }
    this.apiKey = config.openRouterApiKey;
    this.model = config.openRouterEmbeddingModel;
  }

  protected override queryText(query: string): string {
    return this.config.queryPrefix + query;
  }

  protected async embedBatch(batch: string[]): Promise<number[][]> {
    const payload = await postJson(
      OPENROUTER_EMBEDDINGS_URL,
      { model: this.model, input: batch },
      { apiKey: this.apiKey, timeoutMs: this.config.providerTimeoutMs },
    );
    const parsed = openRouterResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error("embedding response did not contain numeric vectors");
    }

    const data = [...parsed.data.data];
    if (data.every((item) => item.index !== undefined)) {
      data.sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    }
    return data.map((item) => item.embedding);
  }
}

export class OllamaEmbeddingProvider extends HttpEmbeddingProvider {
  readonly id = "local";
  readonly model: string;

  constructor(config: RagConfig, log: Logger) {
    super(config, log);
    this.model = config.ollamaEmbeddingModel;
  }

  protected async embedBatch(batch: string[]): Promise<number[][]> {
    const baseUrl = this.config.ollamaBaseUrl.replace(/\/+$/, "");
    const payload = await postJson(
      `${baseUrl}/api/embed`,
      { model: this.model, input: batch },
      { timeoutMs: this.config.providerTimeoutMs },
    );
    const parsed = ollamaResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error("Ollama embedding response did not include numeric vectors");
    }
    return parsed.data.embeddings;
  }
}

/**
 * Offline provider: folds character codes into a fixed number of buckets and
 * L2-normalises. Stable for identical input; no network or model needed.
 */
export class DeterministicEmbeddingProvider implements EmbeddingProvider {
  readonly id = "deterministic";
  readonly model: string;

  constructor(readonly dimensions: number) {
    this.model = `char-hash-${dimensions}`;
  }

  private vectorFor(input: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (let i = 0; i < input.length; i += 1) {
      const vectorIndex = i % this.dimensions;
      const code = input.charCodeAt(i);
      vector[vectorIndex] = (vector[vectorIndex] ?? 0) + (code % 31) / 31;
    }

    const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0)) || 1;
    return vector.map((value) => value / magnitude);
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      throw new EmbeddingProviderError(this.id, "no input texts");
    }
    return texts.map((text) => this.vectorFor(text));
  }

  async embedQuery(query: string): Promise<number[]> {
    return this.vectorFor(query);
  }
}

export function createEmbeddingProvider(config: RagConfig, log: Logger): EmbeddingProvider {
  switch (config.embeddingProvider) {
    case "remote":
      return new OpenRouterEmbeddingProvider(config, log);
    case "local":
      return new OllamaEmbeddingProvider(config, log);
    case "deterministic":
      return new DeterministicEmbeddingProvider(
        config.embeddingDimensions ?? RAG_CONFIG.deterministicDimensions,
      );
  }
}
