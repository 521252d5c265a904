import { z } from "zod";
import type { RagConfig } from "./config.js";
import { buildContextSuffix } from "./context-builder.js";
import { ConfigError, GenerationError, toErrorMessage } from "./errors.js";
import { postJson } from "./http-client.js";
import type { Logger, RetrievedChunkRef, TurnRole } from "./types.js";

const OPENROUTER_API_URL = "https://openrouter.ai/api/v1/chat/completions";

export interface ChatMessage {
  role: "system" | TurnRole;
  content: string;
}

export interface GenerationRequest {
  question: string;
  contextChunks: RetrievedChunkRef[];
  /** Earlier turns, oldest first, not including `question`. */
  history: ChatMessage[];
}

export interface LlmProvider {
  readonly id: string;
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

const ollamaChatSchema = z.object({
  message: z.object({ content: z.string() }),
});

/** System message with the retrieved context, the history, then the question. */
export function buildMessages(systemPrompt: string, request: GenerationRequest): ChatMessage[] {
  return [
    { role: "system", content: systemPrompt + buildContextSuffix(request.contextChunks) },
    ...request.history,
    { role: "user", content: request.question },
  ];
}

abstract class HttpLlmProvider implements LlmProvider {
  abstract readonly id: string;
  abstract readonly model: string;

  constructor(
    protected readonly config: RagConfig,
    private readonly log: Logger,
  ) {}

  protected abstract complete(messages: ChatMessage[]): Promise<string>;

  async generate(request: GenerationRequest): Promise<string> {
    try {
      const reply = (await this.complete(buildMessages(this.config.systemPrompt, request))).trim();
      if (!reply) {
        throw new Error("completion was empty");
      }
      return reply;
    } catch (error) {
      const reason = toErrorMessage(error);
      this.log(`RAG: generation failed provider=${this.id} model=${this.model}: ${reason}`);
      throw new GenerationError(this.id, `model "${this.model}": ${reason}`, { cause: error });
    }
  }
}

export class OpenRouterLlmProvider extends HttpLlmProvider {
  readonly id = "remote";
  readonly model: string;
  private readonly apiKey: string;

  constructor(config: RagConfig, log: Logger) {
    super(config, log);
    if (!config.openRouterApiKey) {
      throw new ConfigError("OPENROUTER_API_KEY is required for the remote LLM provider");
    }
    this.apiKey = config.openRouterApiKey;
    this.model = config.openRouterChatModel;
  }

  protected async complete(messages: ChatMessage[]): Promise<string> {
    const payload = await postJson(
      OPENROUTER_API_URL,
      { model: this.model, messages, stream: false },
      { apiKey: this.apiKey, timeoutMs: this.config.providerTimeoutMs },
    );
    const parsed = completionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error("response is not a chat-completions payload");
    }
    return parsed.data.choices[0]?.message.content ?? "";
  }
}

export class OllamaLlmProvider extends HttpLlmProvider {
  readonly id = "local";
  readonly model: string;

  constructor(config: RagConfig, log: Logger) {
    super(config, log);
    this.model = config.ollamaChatModel;
  }

  protected async complete(messages: ChatMessage[]): Promise<string> {
    const baseUrl = this.config.ollamaBaseUrl.replace(/\/+$/, "");
    const payload = await postJson(
      `${baseUrl}/api/chat`,
      { model: this.model, messages, stream: false },
      { timeoutMs: this.config.providerTimeoutMs },
    );
    const parsed = ollamaChatSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error("Ollama chat response did not include a message");
    }
    return parsed.data.message.content;
  }
}

export function createLlmProvider(config: RagConfig, log: Logger): LlmProvider {
  switch (config.llmProvider) {
    case "remote":
      return new OpenRouterLlmProvider(config, log);
    case "local":
      return new OllamaLlmProvider(config, log);
  }
}
