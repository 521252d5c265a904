import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const RAG_CONFIG = {
  cacheDir: ".rag-cache",

  embeddingProvider: "remote",
  llmProvider: "remote",

  openRouterEmbeddingModel: "qwen/qwen3-embedding-8b",
  openRouterChatModel: "qwen/qwen3.5-122b-a10b",
  ollamaBaseUrl: "http://127.0.0.1:11434",
  ollamaEmbeddingModel: "mxbai-embed-large",
  ollamaChatModel: "qwen2.5:14b-instruct",

  embeddingBatchSize: 20,
  embeddingConcurrency: 5,
  deterministicDimensions: 128,

  queryPrefix: "Instruct: Retrieve relevant document passages\nQuery: ",
  systemPrompt:
    "You are pagewise, a helpful assistant that answers questions about the user's PDF documents. Be concise and direct.",

  topK: 5,
  scoreThreshold: 0.3,
  historyTurns: 6,

  chunkSize: 1000,
  chunkOverlap: 200,
  chunkingStrategy: "sliding-window",

  providerTimeoutMs: 60_000,
} as const;

export const EMBEDDING_PROVIDERS = ["remote", "local", "deterministic"] as const;
export const LLM_PROVIDERS = ["remote", "local"] as const;

export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];
export type LlmProviderName = (typeof LLM_PROVIDERS)[number];

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z
  .object({
    EMBEDDING_PROVIDER: z.enum(EMBEDDING_PROVIDERS).default(RAG_CONFIG.embeddingProvider),
    LLM_PROVIDER: z.enum(LLM_PROVIDERS).default(RAG_CONFIG.llmProvider),
    OPENROUTER_API_KEY: optionalString,
    OPENROUTER_EMBEDDING_MODEL: z.string().min(1).default(RAG_CONFIG.openRouterEmbeddingModel),
    OPENROUTER_CHAT_MODEL: z.string().min(1).default(RAG_CONFIG.openRouterChatModel),
    OLLAMA_BASE_URL: z.string().url().default(RAG_CONFIG.ollamaBaseUrl),
    OLLAMA_EMBEDDING_MODEL: z.string().min(1).default(RAG_CONFIG.ollamaEmbeddingModel),
    OLLAMA_CHAT_MODEL: z.string().min(1).default(RAG_CONFIG.ollamaChatModel),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
    CHUNK_SIZE: z.coerce.number().int().positive().default(RAG_CONFIG.chunkSize),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(RAG_CONFIG.chunkOverlap),
    CHUNKING_STRATEGY: z.string().min(1).default(RAG_CONFIG.chunkingStrategy),
    TOP_K: z.coerce.number().int().positive().default(RAG_CONFIG.topK),
    SCORE_THRESHOLD: z.coerce.number().min(-1).max(1).default(RAG_CONFIG.scoreThreshold),
    HISTORY_TURNS: z.coerce.number().int().nonnegative().default(RAG_CONFIG.historyTurns),
    PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(RAG_CONFIG.providerTimeoutMs),
    RAG_CACHE_DIR: z.string().min(1).default(RAG_CONFIG.cacheDir),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  })
  .refine(
    (env) =>
      (env.EMBEDDING_PROVIDER !== "remote" && env.LLM_PROVIDER !== "remote") ||
      env.OPENROUTER_API_KEY !== undefined,
    {
      message: "OPENROUTER_API_KEY is required when a provider is remote",
      path: ["OPENROUTER_API_KEY"],
    },
  );

export interface RagConfig {
  embeddingProvider: EmbeddingProviderName;
  llmProvider: LlmProviderName;
  openRouterApiKey?: string;
  openRouterEmbeddingModel: string;
  openRouterChatModel: string;
  ollamaBaseUrl: string;
  ollamaEmbeddingModel: string;
  ollamaChatModel: string;
  /** Expected vector length; unset accepts whatever the provider returns. */
  embeddingDimensions?: number;
  embeddingBatchSize: number;
  embeddingConcurrency: number;
  queryPrefix: string;
  systemPrompt: string;
  chunkSize: number;
  chunkOverlap: number;
  chunkingStrategy: string;
  topK: number;
  scoreThreshold: number;
  historyTurns: number;
  providerTimeoutMs: number;
  vectorsDir: string;
  conversationsDir: string;
}

function resolveCacheDirs(cacheDir: string): Pick<RagConfig, "vectorsDir" | "conversationsDir"> {
  const root = path.resolve(cacheDir);
  return {
    vectorsDir: path.join(root, "vectors"),
    conversationsDir: path.join(root, "conversations"),
  };
}

export function loadRagConfig(
  env: Record<string, string | undefined> = process.env,
): RagConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    embeddingProvider: values.EMBEDDING_PROVIDER,
    llmProvider: values.LLM_PROVIDER,
    openRouterApiKey: values.OPENROUTER_API_KEY,
    openRouterEmbeddingModel: values.OPENROUTER_EMBEDDING_MODEL,
    openRouterChatModel: values.OPENROUTER_CHAT_MODEL,
    ollamaBaseUrl: values.OLLAMA_BASE_URL,
    ollamaEmbeddingModel: values.OLLAMA_EMBEDDING_MODEL,
    ollamaChatModel: values.OLLAMA_CHAT_MODEL,
    embeddingDimensions: values.EMBEDDING_DIMENSIONS,
    embeddingBatchSize: RAG_CONFIG.embeddingBatchSize,
    embeddingConcurrency: RAG_CONFIG.embeddingConcurrency,
    queryPrefix: RAG_CONFIG.queryPrefix,
    systemPrompt: RAG_CONFIG.systemPrompt,
    chunkSize: values.CHUNK_SIZE,
    chunkOverlap: values.CHUNK_OVERLAP,
    chunkingStrategy: values.CHUNKING_STRATEGY,
    topK: values.TOP_K,
    scoreThreshold: values.SCORE_THRESHOLD,
    historyTurns: values.HISTORY_TURNS,
    providerTimeoutMs: values.PROVIDER_TIMEOUT_MS,
    ...resolveCacheDirs(values.RAG_CACHE_DIR),
  };
}
