import { mkdir, readdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { NoActiveConversationError, StoreError, toErrorMessage } from "./errors.js";
import type { Conversation, ConversationTurn, Logger } from "./types.js";

const retrievedChunkSchema = z.object({
  id: z.string(),
  sourceFilename: z.string(),
  pageNumber: z.number().int(),
  chunkIndex: z.number().int(),
  text: z.string(),
  similarity: z.number(),
});

const turnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
  retrievedChunks: z.array(retrievedChunkSchema).optional(),
  isError: z.boolean(),
});

const conversationSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  turns: z.array(turnSchema),
});

/** One JSON file per conversation id; a save overwrites that file. */
export class ConversationRepository {
  constructor(readonly directory: string) {}

  private fileFor(id: string): string {
    return path.join(this.directory, `${path.basename(id)}.json`);
  }

  async save(conversation: Conversation): Promise<void> {
    const target = this.fileFor(conversation.id);
    const temp = `${target}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, JSON.stringify(conversation, null, 2));
      await rename(temp, target);
    } catch (error) {
      throw new StoreError("save conversation", toErrorMessage(error), { cause: error });
    }
  }

  async load(id: string): Promise<Conversation> {
    let data: string;
    try {
      data = await readFile(this.fileFor(id), "utf-8");
    } catch (error) {
      throw new StoreError("load conversation", `conversation ${id} not found`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      throw new StoreError("load conversation", `conversation ${id} is not valid JSON`, { cause: error });
    }

    const parsed = conversationSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError("load conversation", `conversation ${id} is malformed`);
    }
    return parsed.data;
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch {
      // nothing saved yet
      return [];
    }
    return entries
      .filter((f) => f.endsWith(".json"))
      .map((f) => f.slice(0, -".json".length))
      .sort();
  }
}

function copyConversation(conversation: Conversation): Conversation {
  return {
    id: conversation.id,
    createdAt: conversation.createdAt,
    turns: conversation.turns.map((turn) => ({ ...turn })),
  };
}

export class ConversationManager {
  private current: Conversation | null = null;
  private unsavedTurns = 0;

  constructor(
    private readonly repository: ConversationRepository,
    private readonly log: Logger = () => {},
  ) {}

  get active(): Conversation | null {
    return this.current ? copyConversation(this.current) : null;
  }

  get hasUnsavedTurns(): boolean {
    return this.unsavedTurns > 0;
  }

  /**
   * Activates a fresh conversation. Turns of the previous conversation that
   * were never saved are dropped; its saved file stays on disk.
   */
  startNew(): Conversation {
    this.discardUnsaved("starting a new conversation");
    this.current = { id: uuidv4(), createdAt: new Date().toISOString(), turns: [] };
    this.unsavedTurns = 0;
    this.log(`RAG: started conversation ${this.current.id}`);
    return copyConversation(this.current);
  }

  recordTurn(turn: ConversationTurn): void {
    if (!this.current) throw new NoActiveConversationError();
    this.current.turns.push({ ...turn });
    this.unsavedTurns++;
  }

  async save(): Promise<void> {
    if (!this.current) throw new NoActiveConversationError();
    const snapshot = copyConversation(this.current);
    await this.repository.save(snapshot);
    // turns recorded while the write was in flight are still unsaved
    this.unsavedTurns = this.current.turns.length - snapshot.turns.length;
    this.log(`RAG: saved conversation ${snapshot.id} (${snapshot.turns.length} turns)`);
  }

  /** Last `n` turns, oldest first. */
  recent(n: number): ConversationTurn[] {
    if (!this.current) throw new NoActiveConversationError();
    if (n <= 0) return [];
    return this.current.turns.slice(-n).map((turn) => ({ ...turn }));
  }

  async load(id: string): Promise<Conversation> {
    const loaded = await this.repository.load(id);
    this.discardUnsaved(`loading conversation ${id}`);
    this.current = loaded;
    this.unsavedTurns = 0;
    return copyConversation(loaded);
  }

  listSaved(): Promise<string[]> {
    return this.repository.list();
  }

  /** Drops the active conversation, reporting unsaved turns that are lost. */
  close(): void {
    this.discardUnsaved("closing the session");
    this.current = null;
    this.unsavedTurns = 0;
  }

  private discardUnsaved(reason: string): void {
    if (this.current && this.unsavedTurns > 0) {
      this.log(
        `RAG: discarding ${this.unsavedTurns} unsaved turn(s) of conversation ${this.current.id} (${reason})`,
      );
    }
  }
}
