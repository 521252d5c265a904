import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConversationManager, ConversationRepository } from "../conversation-manager.js";
import { DeterministicEmbeddingProvider, type EmbeddingProvider } from "../embedding-service.js";
import { EmbeddingProviderError, SessionStateError, StoreError } from "../errors.js";
import {
  ChatSession,
  createChatSession,
  EMPTY_QUESTION_MESSAGE,
  GENERATION_FALLBACK_MESSAGE,
  NO_DOCUMENTS_MESSAGE,
} from "../pipeline.js";
import { VectorStore } from "../vector-store.js";
import { FakeLlmProvider, makeTempDir, removeDir, testConfig } from "./helpers/fakes.js";
import { buildPdf, sampleProse } from "./helpers/pdf-fixture.js";
import type { RagConfig } from "../config.js";

class FailingEmbeddingProvider implements EmbeddingProvider {
  readonly id = "failing";
  readonly model = "failing-model";

  async embed(): Promise<number[][]> {
    throw new EmbeddingProviderError(this.id, "service unavailable");
  }

  async embedQuery(): Promise<number[]> {
    throw new EmbeddingProviderError(this.id, "service unavailable");
  }
}

/** Delegates to a real provider and runs a hook before each `embed`. */
class HookedEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  readonly model: string;

  constructor(
    private readonly inner: EmbeddingProvider,
    private readonly beforeEmbed: () => void,
  ) {
    this.id = inner.id;
    this.model = inner.model;
  }

  embed(texts: string[]): Promise<number[][]> {
    this.beforeEmbed();
    return this.inner.embed(texts);
  }

  embedQuery(query: string): Promise<number[]> {
    return this.inner.embedQuery(query);
  }
}

describe("ChatSession", () => {
  let dir: string;
  let config: RagConfig;
  let llm: FakeLlmProvider;
  let logs: string[];

  function newSession(embeddingProvider: EmbeddingProvider = new DeterministicEmbeddingProvider(128)): ChatSession {
    return createChatSession(config, { embeddingProvider, llmProvider: llm, log: (msg) => logs.push(msg) });
  }

  beforeEach(async () => {
    dir = await makeTempDir("session");
    config = testConfig(dir);
    llm = new FakeLlmProvider();
    logs = [];
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe("lifecycle", () => {
    it("rejects calls before initialize and after dispose", async () => {
      const session = newSession();

      expect(session.state).toBe("uninitialized");
      await expect(session.generateResponse("hi")).rejects.toThrow(SessionStateError);
      await expect(session.processUploadedPdfs([])).rejects.toThrow(SessionStateError);

      await session.initialize();
      expect(session.state).toBe("ready");
      expect(session.conversationId).not.toBeNull();

      session.dispose();
      expect(session.state).toBe("disposed");
      await expect(session.generateResponse("hi")).rejects.toThrow(SessionStateError);
      await expect(session.initialize()).rejects.toThrow(SessionStateError);
    });

    it("rejects a second call while one is in flight", async () => {
      const session = newSession();
      await session.initialize();

      const ingesting = session.processUploadedPdfs([{ bytes: buildPdf(["some text"]), filename: "busy.pdf" }]);

      expect(session.state).toBe("ingesting");
      await expect(session.generateResponse("question")).rejects.toThrow("session is busy (ingesting)");

      await ingesting;
      expect(session.state).toBe("ready");
    });
  });

  describe("processUploadedPdfs", () => {
    it("ingests a batch and reports a corrupt file without stopping", async () => {
      const session = newSession();
      await session.initialize();

      const batch = await session.processUploadedPdfs([
        { bytes: buildPdf(["first document text"]), filename: "first.pdf" },
        { bytes: new TextEncoder().encode("definitely not a pdf"), filename: "broken.pdf" },
        { bytes: buildPdf(["third document text", "with a second page"]), filename: "third.pdf" },
      ]);

      expect(batch.results.map((r) => r.status)).toEqual(["success", "error", "success"]);
      expect(batch.success).toEqual([
        { status: "success", filename: "first.pdf", pageCount: 1, chunkCount: 1 },
        { status: "success", filename: "third.pdf", pageCount: 2, chunkCount: 1 },
      ]);
      expect(batch.errors).toHaveLength(1);
      expect(batch.errors[0]?.filename).toBe("broken.pdf");
      expect(batch.errors[0]?.errorMessage).toContain("broken.pdf: not a readable PDF");
      expect(await session.getDatabaseStats()).toEqual({ totalDocuments: 2, sourceCount: 2 });
    });

    it("reports embedding failures per file and stores nothing for them", async () => {
      const session = newSession(new FailingEmbeddingProvider());
      await session.initialize();

      const batch = await session.processUploadedPdfs([{ bytes: buildPdf(["text"]), filename: "a.pdf" }]);

      expect(batch.errors).toEqual([
        {
          status: "error",
          filename: "a.pdf",
          errorMessage: 'Embedding provider "failing" failed: service unavailable',
        },
      ]);
      expect(await session.getDatabaseStats()).toEqual({ totalDocuments: 0, sourceCount: 0 });
    });

    it("stops taking new files once cancelled", async () => {
      const controller = new AbortController();
      const session = newSession(
        new HookedEmbeddingProvider(new DeterministicEmbeddingProvider(128), () => controller.abort()),
      );
      await session.initialize();

      const batch = await session.processUploadedPdfs(
        [
          { bytes: buildPdf(["first"]), filename: "first.pdf" },
          { bytes: buildPdf(["second"]), filename: "second.pdf" },
        ],
        { signal: controller.signal },
      );

      expect(batch.results).toEqual([
        { status: "success", filename: "first.pdf", pageCount: 1, chunkCount: 1 },
        { status: "error", filename: "second.pdf", errorMessage: "Ingestion cancelled" },
      ]);
    });
  });

  describe("generateResponse", () => {
    it("answers from retrieved chunks and records both turns", async () => {
      const text = sampleProse(500);
      const session = newSession();
      await session.initialize();
      await session.processUploadedPdfs([{ bytes: buildPdf([text]), filename: "sample.pdf" }]);

      expect(await session.getDatabaseStats()).toEqual({ totalDocuments: 3, sourceCount: 1 });

      const result = await session.generateResponse("  What does the sample say?  ");

      expect(result.error).toBe(false);
      expect(result.response).toBe("answer from fake");
      expect(result.similarDocuments).toHaveLength(3);
      expect(result.similarDocuments.map((d) => d.metadata.filename)).toEqual(["sample.pdf", "sample.pdf", "sample.pdf"]);
      expect(result.similarDocuments.map((d) => d.metadata.chunkIndex).sort()).toEqual([0, 1, 2]);
      expect(result.similarDocuments.map((d) => d.document).sort()).toEqual(
        [text.slice(0, 200), text.slice(150, 350), text.slice(300, 500)].sort(),
      );

      expect(llm.requests).toHaveLength(1);
      expect(llm.requests[0]?.question).toBe("What does the sample say?");
      expect(llm.requests[0]?.contextChunks).toHaveLength(3);
      expect(llm.requests[0]?.history).toEqual([]);

      expect(session.getRecentMessages(5)).toEqual([
        { role: "user", content: "What does the sample say?" },
        { role: "assistant", content: "answer from fake" },
      ]);
    });

    it("passes earlier turns as history", async () => {
      const session = newSession();
      await session.initialize();
      await session.processUploadedPdfs([{ bytes: buildPdf(["history text"]), filename: "h.pdf" }]);

      await session.generateResponse("first question");
      await session.generateResponse("second question");

      expect(llm.requests[1]?.history).toEqual([
        { role: "user", content: "first question" },
        { role: "assistant", content: "answer from fake" },
      ]);
    });

    it("short-circuits when nothing has been ingested", async () => {
      const session = newSession();
      await session.initialize();

      const result = await session.generateResponse("anything there?");

      expect(result).toEqual({ response: NO_DOCUMENTS_MESSAGE, similarDocuments: [], error: false });
      expect(llm.requests).toHaveLength(0);
      expect(session.getRecentMessages(2)).toEqual([
        { role: "user", content: "anything there?" },
        { role: "assistant", content: NO_DOCUMENTS_MESSAGE },
      ]);
    });

    it("asks for a question when given only whitespace", async () => {
      const session = newSession();
      await session.initialize();

      const result = await session.generateResponse("   ");

      expect(result).toEqual({ response: EMPTY_QUESTION_MESSAGE, similarDocuments: [], error: true });
      expect(session.getRecentMessages(5)).toEqual([]);
    });

    it("records a generation failure as an error turn and leaves it out of later history", async () => {
      const conversations = new ConversationManager(new ConversationRepository(config.conversationsDir));
      const session = createChatSession(config, {
        embeddingProvider: new DeterministicEmbeddingProvider(128),
        llmProvider: llm,
        conversations,
        log: (msg) => logs.push(msg),
      });
      await session.initialize();
      await session.processUploadedPdfs([{ bytes: buildPdf(["failure text"]), filename: "f.pdf" }]);

      llm.failWith = "upstream exploded";
      const failed = await session.generateResponse("first");

      expect(failed.error).toBe(true);
      expect(failed.response).toBe(GENERATION_FALLBACK_MESSAGE);
      expect(conversations.active?.turns.map((t) => t.isError)).toEqual([false, true]);
      expect(logs).toContain('RAG: answering failed: LLM provider "fake" failed: upstream exploded');

      llm.failWith = null;
      await session.generateResponse("second");

      expect(llm.requests[1]?.history).toEqual([{ role: "user", content: "first" }]);
    });

    it("fails cleanly when the embedding provider changes dimensionality", async () => {
      const first = newSession(new DeterministicEmbeddingProvider(128));
      await first.initialize();
      await first.processUploadedPdfs([{ bytes: buildPdf(["stored with 128 dimensions"]), filename: "old.pdf" }]);
      first.dispose();

      const swapped = newSession(new DeterministicEmbeddingProvider(64));
      await swapped.initialize();

      const result = await swapped.generateResponse("still there?");
      expect(result.error).toBe(true);
      expect(result.response).toBe(GENERATION_FALLBACK_MESSAGE);
      expect(llm.requests).toHaveLength(0);

      const batch = await swapped.processUploadedPdfs([{ bytes: buildPdf(["new text"]), filename: "new.pdf" }]);
      expect(batch.errors[0]?.errorMessage).toContain(
        "dimensionality mismatch: store holds 128-dimensional vectors",
      );

      const store = new VectorStore(config.vectorsDir);
      await expect(store.search(new Array<number>(64).fill(0.1), 3)).rejects.toThrow(StoreError);
    });
  });

  describe("database and conversations", () => {
    it("clears the store", async () => {
      const session = newSession();
      await session.initialize();
      await session.processUploadedPdfs([{ bytes: buildPdf(["to be cleared"]), filename: "c.pdf" }]);

      expect(await session.clearDatabase()).toBe(true);
      expect(await session.getDatabaseStats()).toEqual({ totalDocuments: 0, sourceCount: 0 });
    });

    it("saves, lists and resumes conversations", async () => {
      const session = newSession();
      await session.initialize();
      await session.generateResponse("remember me");
      const savedId = session.conversationId;

      expect(await session.saveConversation()).toBe(true);
      const freshId = session.startNewConversation();
      expect(freshId).not.toBe(savedId);
      expect(session.getRecentMessages(5)).toEqual([]);

      expect(await session.listSavedConversations()).toEqual([savedId]);
      expect(await session.loadConversation(savedId ?? "")).toBe(true);
      expect(session.conversationId).toBe(savedId);
      expect(session.getRecentMessages(1)).toEqual([{ role: "assistant", content: NO_DOCUMENTS_MESSAGE }]);
    });

    it("reports an unknown conversation id as a failed load", async () => {
      const session = newSession();
      await session.initialize();

      expect(await session.loadConversation("does-not-exist")).toBe(false);
      expect(logs).toContain(
        "RAG: loading conversation failed: Store load conversation failed: conversation does-not-exist not found",
      );
    });
  });
});
