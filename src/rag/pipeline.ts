import { v4 as uuidv4 } from "uuid";
import type { RagConfig } from "./config.js";
import { ConversationManager, ConversationRepository } from "./conversation-manager.js";
import { ingestDocument } from "./document-ingestor.js";
import { createEmbeddingProvider, type EmbeddingProvider } from "./embedding-service.js";
import { EmbeddingProviderError, NoActiveConversationError, SessionStateError, toErrorMessage } from "./errors.js";
import { createLlmProvider, type ChatMessage, type LlmProvider } from "./llm-service.js";
import { retrieve } from "./retriever.js";
import type {
  ChatResponse,
  Chunk,
  ConversationTurn,
  IngestionBatchResult,
  IngestionFailure,
  IngestionResult,
  IngestionSuccess,
  Logger,
  PdfUpload,
  RecentMessage,
  RetrievedChunkRef,
  StoreStats,
} from "./types.js";
import { VectorStore } from "./vector-store.js";

export const NO_DOCUMENTS_MESSAGE =
  "No documents have been ingested yet. Upload a PDF and ask your question again.";
export const GENERATION_FALLBACK_MESSAGE =
  "Sorry, I couldn't generate an answer right now. Please try again.";
export const EMPTY_QUESTION_MESSAGE = "Please enter a question.";

export type SessionState = "uninitialized" | "ready" | "ingesting" | "querying" | "disposed";

/** Collaborators a caller can supply instead of having them built from config. */
export interface SessionOverrides {
  embeddingProvider?: EmbeddingProvider;
  llmProvider?: LlmProvider;
  store?: VectorStore;
  conversations?: ConversationManager;
  log?: Logger;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

interface SessionDeps {
  embedder: EmbeddingProvider;
  llm: LlmProvider;
  store: VectorStore;
  conversations: ConversationManager;
}

interface AnswerOutcome {
  response: string;
  chunks: RetrievedChunkRef[];
  error: boolean;
}

function partition(results: IngestionResult[]): IngestionBatchResult {
  const success: IngestionSuccess[] = [];
  const errors: IngestionFailure[] = [];
  for (const result of results) {
    if (result.status === "success") success.push(result);
    else errors.push(result);
  }
  return { results, success, errors };
}

/**
 * One user's chat session: owns no data itself, only wires the ingestor,
 * providers, vector store and conversation manager together. Calls are
 * accepted one at a time from the `ready` state.
 */
export class ChatSession {
  private currentState: SessionState = "uninitialized";
  private deps: SessionDeps | null = null;
  private readonly log: Logger;

  constructor(
    private readonly config: RagConfig,
    private readonly overrides: SessionOverrides = {},
  ) {
    this.log = overrides.log ?? ((msg) => console.log(msg));
  }

  get state(): SessionState {
    return this.currentState;
  }

  get conversationId(): string | null {
    return this.deps?.conversations.active?.id ?? null;
  }

  async initialize(): Promise<void> {
    if (this.currentState === "ready") return;
    if (this.currentState !== "uninitialized") {
      throw new SessionStateError(`cannot initialize a session that is ${this.currentState}`);
    }

    const embedder = this.overrides.embeddingProvider ?? createEmbeddingProvider(this.config, this.log);
    const llm = this.overrides.llmProvider ?? createLlmProvider(this.config, this.log);
    const store = this.overrides.store ?? new VectorStore(this.config.vectorsDir, this.log);
    const conversations =
      this.overrides.conversations ??
      new ConversationManager(new ConversationRepository(this.config.conversationsDir), this.log);

    const stats = await store.stats();
    conversations.startNew();

    this.deps = { embedder, llm, store, conversations };
    this.currentState = "ready";
    this.log(
      `RAG ready: embedding=${embedder.id}/${embedder.model} llm=${llm.id}/${llm.model}, ${stats.totalDocuments} chunk(s) from ${stats.sourceCount} document(s)`,
    );
  }

  dispose(): void {
    if (this.currentState === "disposed") return;
    this.deps?.conversations.close();
    this.deps = null;
    this.currentState = "disposed";
  }

  private requireDeps(): SessionDeps {
    if (!this.deps) {
      throw new SessionStateError(`session is ${this.currentState}; initialize it first`);
    }
    return this.deps;
  }

  private requireReady(): SessionDeps {
    const deps = this.requireDeps();
    if (this.currentState !== "ready") {
      throw new SessionStateError(`session is busy (${this.currentState})`);
    }
    return deps;
  }

  private async transition<T>(
    state: "ingesting" | "querying",
    task: (deps: SessionDeps) => Promise<T>,
  ): Promise<T> {
    const deps = this.requireReady();
    this.currentState = state;
    try {
      return await task(deps);
    } finally {
      if (this.currentState === state) this.currentState = "ready";
    }
  }

  async processUploadedPdfs(files: PdfUpload[], options: ProcessOptions = {}): Promise<IngestionBatchResult> {
    return this.transition("ingesting", async (deps) => {
      const results: IngestionResult[] = [];

      for (const file of files) {
        if (options.signal?.aborted) {
          results.push({ status: "error", filename: file.filename, errorMessage: "Ingestion cancelled" });
          continue;
        }

        try {
          results.push(await this.ingestFile(deps, file));
        } catch (error) {
          const errorMessage = toErrorMessage(error);
          this.log(`RAG: ${file.filename} failed: ${errorMessage}`);
          results.push({ status: "error", filename: file.filename, errorMessage });
        }
      }

      return partition(results);
    });
  }

  private async ingestFile(deps: SessionDeps, file: PdfUpload): Promise<IngestionSuccess> {
    this.log(`RAG: extracting ${file.filename}...`);
    const doc = await ingestDocument(file.bytes, file.filename, {
      chunkSize: this.config.chunkSize,
      chunkOverlap: this.config.chunkOverlap,
      chunkingStrategy: this.config.chunkingStrategy,
    });

    this.log(`RAG: embedding ${file.filename} (${doc.chunks.length} chunks)...`);
    const vectors = await deps.embedder.embed(doc.chunks.map((c) => c.text));

    const chunks: Chunk[] = doc.chunks.map((chunk, i) => {
      const embedding = vectors[i];
      if (!embedding) {
        throw new EmbeddingProviderError(deps.embedder.id, `no vector returned for chunk ${i}`);
      }
      return {
        id: uuidv4(),
        text: chunk.text,
        sourceFilename: file.filename,
        pageNumber: chunk.pageNumber,
        chunkIndex: chunk.chunkIndex,
        embedding,
      };
    });

    await deps.store.add(chunks);
    this.log(`RAG: ${file.filename} done (${doc.pageCount} pages, ${chunks.length} chunks)`);

    return { status: "success", filename: file.filename, pageCount: doc.pageCount, chunkCount: chunks.length };
  }

  async generateResponse(question: string): Promise<ChatResponse> {
    return this.transition("querying", async (deps) => {
      const { conversations } = deps;
      if (!conversations.active) throw new NoActiveConversationError();

      const text = question.trim();
      if (!text) {
        return { response: EMPTY_QUESTION_MESSAGE, similarDocuments: [], error: true };
      }

      const history: ChatMessage[] = conversations
        .recent(this.config.historyTurns)
        .filter((turn) => !turn.isError)
        .map((turn) => ({ role: turn.role, content: turn.content }));

      conversations.recordTurn({
        role: "user",
        content: text,
        timestamp: new Date().toISOString(),
        isError: false,
      });

      const outcome = await this.answer(deps, text, history);

      const assistantTurn: ConversationTurn = {
        role: "assistant",
        content: outcome.response,
        timestamp: new Date().toISOString(),
        isError: outcome.error,
      };
      if (outcome.chunks.length > 0) assistantTurn.retrievedChunks = outcome.chunks;
      conversations.recordTurn(assistantTurn);

      return {
        response: outcome.response,
        error: outcome.error,
        similarDocuments: outcome.chunks.map((chunk) => ({
          document: chunk.text,
          metadata: {
            id: chunk.id,
            filename: chunk.sourceFilename,
            page: chunk.pageNumber,
            chunkIndex: chunk.chunkIndex,
          },
          similarity: chunk.similarity,
        })),
      };
    });
  }

  private async answer(deps: SessionDeps, question: string, history: ChatMessage[]): Promise<AnswerOutcome> {
    let chunks: RetrievedChunkRef[] = [];
    try {
      const stats = await deps.store.stats();
      if (stats.totalDocuments === 0) {
        return { response: NO_DOCUMENTS_MESSAGE, chunks, error: false };
      }

      chunks = await retrieve(question, deps.store, deps.embedder, {
        topK: this.config.topK,
        scoreThreshold: this.config.scoreThreshold,
      });
      const response = await deps.llm.generate({ question, contextChunks: chunks, history });
      return { response, chunks, error: false };
    } catch (error) {
      this.log(`RAG: answering failed: ${toErrorMessage(error)}`);
      return { response: GENERATION_FALLBACK_MESSAGE, chunks, error: true };
    }
  }

  /** Null when the store cannot be read. */
  async getDatabaseStats(): Promise<StoreStats | null> {
    const deps = this.requireDeps();
    try {
      return await deps.store.stats();
    } catch (error) {
      this.log(`RAG: reading store stats failed: ${toErrorMessage(error)}`);
      return null;
    }
  }

  async clearDatabase(): Promise<boolean> {
    return this.requireReady().store.clear();
  }

  startNewConversation(): string {
    return this.requireReady().conversations.startNew().id;
  }

  async saveConversation(): Promise<boolean> {
    const deps = this.requireReady();
    try {
      await deps.conversations.save();
      return true;
    } catch (error) {
      this.log(`RAG: saving conversation failed: ${toErrorMessage(error)}`);
      return false;
    }
  }

  async loadConversation(id: string): Promise<boolean> {
    const deps = this.requireReady();
    try {
      await deps.conversations.load(id);
      return true;
    } catch (error) {
      this.log(`RAG: loading conversation failed: ${toErrorMessage(error)}`);
      return false;
    }
  }

  listSavedConversations(): Promise<string[]> {
    return this.requireDeps().conversations.listSaved();
  }

  getRecentMessages(n: number): RecentMessage[] {
    return this.requireDeps()
      .conversations.recent(n)
      .map((turn) => ({ role: turn.role, content: turn.content }));
  }
}

export function createChatSession(config: RagConfig, overrides: SessionOverrides = {}): ChatSession {
  return new ChatSession(config, overrides);
}
