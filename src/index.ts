#!/usr/bin/env node
import "dotenv/config";
import blessed from "blessed";
import { loadRagConfig, type RagConfig } from "./rag/config.js";
import { collectSources, formatSourcesForUI, formatTopDocuments } from "./rag/context-builder.js";
import { toErrorMessage } from "./rag/errors.js";
import { collectPdfUploads } from "./rag/file-scanner.js";
import { createChatSession } from "./rag/pipeline.js";
import type { ChatResponse } from "./rag/types.js";

const HELP_LINES = [
  "/ingest <file-or-dir>  add PDFs to the knowledge base",
  "/stats                 show how many chunks are stored",
  "/clear                 remove every stored chunk",
  "/new                   start a new conversation (unsaved turns are dropped)",
  "/save                  save the current conversation",
  "/load <id>             resume a saved conversation",
  "/list                  list saved conversations",
  "/recent [n]            show the last n messages (default 3)",
  "/help                  show this help",
];

// ── Config ──────────────────────────────────────────────────────────────────
function loadConfigOrExit(): RagConfig {
  try {
    return loadRagConfig();
  } catch (err) {
    console.error(`Error: ${toErrorMessage(err)}`);
    console.error("  See .env.example for the recognised settings.");
    process.exit(1);
  }
}

const config = loadConfigOrExit();

// ── UI Setup ────────────────────────────────────────────────────────────────
const screen = blessed.screen({
  smartCSR: true,
  title: "pagewise",
});

const chatBox = blessed.log({
  parent: screen,
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-3",
  scrollable: true,
  alwaysScroll: true,
  scrollbar: {
    ch: "│",
    style: { bg: "blue" },
  },
  border: { type: "line" },
  style: {
    border: { fg: "blue" },
  },
  label: ` pagewise — ${config.embeddingProvider} embeddings, ${config.llmProvider} LLM `,
  tags: true,
  mouse: true,
});

const inputBox = blessed.textbox({
  parent: screen,
  bottom: 0,
  left: 0,
  width: "100%",
  height: 3,
  border: { type: "line" },
  style: {
    border: { fg: "green" },
    focus: { border: { fg: "yellow" } },
  },
  label: " you > ",
  inputOnFocus: false,
  mouse: true,
});

let busy = false;

screen.key(["C-c"], () => shutdown());
inputBox.key(["C-c"], () => shutdown());

// Re-focus input whenever it loses focus (e.g. mouse click on chatBox)
// Use setTimeout to break the blur→focus→render→blur cycle
inputBox.on("blur", () => {
  if (!busy) setTimeout(() => promptInput(), 0);
});

function promptInput(): void {
  inputBox.readInput(() => {/* handled by submit event */});
}

function print(line: string): void {
  chatBox.log(line);
  screen.render();
}

function escapeTags(text: string): string {
  return blessed.escape(text);
}

const session = createChatSession(config, {
  log: (msg) => print(`{grey-fg}${escapeTags(msg)}{/}`),
});

function shutdown(): never {
  session.dispose();
  process.exit(0);
}

// ── Spinner ─────────────────────────────────────────────────────────────────
const spinFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
let spinIdx = 0;
let spinTimer: ReturnType<typeof setInterval> | null = null;
let spinElapsed = 0;
let spinLabel = "thinking";

function startSpinner(label: string): void {
  stopSpinner();
  spinLabel = label;
  spinIdx = 0;
  spinElapsed = 0;
  updateSpinnerLine();
  spinTimer = setInterval(() => {
    spinIdx = (spinIdx + 1) % spinFrames.length;
    spinElapsed += 100;
    updateSpinnerLine();
  }, 100);
}

function lastLineHasSpinner(): number | null {
  const lines = chatBox.getLines();
  const lastIdx = lines.length - 1;
  const last = lines[lastIdx];
  return last !== undefined && last.includes(`${spinLabel}...`) ? lastIdx : null;
}

function updateSpinnerLine(): void {
  const idx = lastLineHasSpinner();
  if (idx !== null) chatBox.deleteLine(idx);
  const secs = (spinElapsed / 1000).toFixed(1);
  print(`{grey-fg}  ${spinFrames[spinIdx] ?? ""} ${spinLabel}... ${secs}s{/}`);
}

function stopSpinner(): void {
  if (spinTimer) {
    clearInterval(spinTimer);
    spinTimer = null;
  }
  const idx = lastLineHasSpinner();
  if (idx !== null) chatBox.deleteLine(idx);
}

// ── Commands ────────────────────────────────────────────────────────────────
function printAnswer(result: ChatResponse): void {
  const color = result.error ? "red-fg" : "white-fg";
  for (const line of result.response.split("\n")) {
    print(`{${color}}  ${escapeTags(line)}{/}`);
  }

  if (result.similarDocuments.length > 0) {
    const sources = collectSources(
      result.similarDocuments.map((doc) => ({
        sourceFilename: doc.metadata.filename,
        pageNumber: doc.metadata.page,
      })),
    );
    print(`{grey-fg}  \u{2713} \u{1F4C4} ${escapeTags(formatSourcesForUI(sources))}{/}`);
    for (const line of formatTopDocuments(result.similarDocuments)) {
      print(`{grey-fg}  ${escapeTags(line)}{/}`);
    }
  }
}

async function runCommand(input: string): Promise<void> {
  const [command = "", ...rest] = input.split(/\s+/);
  const arg = rest.join(" ").trim();

  switch (command) {
    case "/help":
      for (const line of HELP_LINES) print(`  ${line}`);
      return;

    case "/ingest": {
      if (!arg) {
        print("{yellow-fg}usage: /ingest <file-or-dir>{/}");
        return;
      }
      const uploads = await collectPdfUploads(arg);
      if (uploads.length === 0) {
        print(`{yellow-fg}no PDFs found in ${escapeTags(arg)}{/}`);
        return;
      }
      startSpinner("ingesting");
      const batch = await session.processUploadedPdfs(uploads);
      stopSpinner();
      for (const ok of batch.success) {
        print(`{green-fg}  \u{2713} ${escapeTags(ok.filename)}: ${ok.chunkCount} chunks from ${ok.pageCount} pages{/}`);
      }
      for (const failed of batch.errors) {
        print(`{red-fg}  \u{2717} ${escapeTags(failed.filename)}: ${escapeTags(failed.errorMessage)}{/}`);
      }
      return;
    }

    case "/stats": {
      const stats = await session.getDatabaseStats();
      print(
        stats
          ? `  ${stats.totalDocuments} chunk(s) from ${stats.sourceCount} document(s)`
          : "{red-fg}  store unavailable{/}",
      );
      return;
    }

    case "/clear":
      print((await session.clearDatabase()) ? "  database cleared" : "{red-fg}  failed to clear database{/}");
      return;

    case "/new":
      print(`  started conversation ${session.startNewConversation()}`);
      return;

    case "/save":
      print((await session.saveConversation()) ? "  conversation saved" : "{red-fg}  failed to save conversation{/}");
      return;

    case "/load":
      if (!arg) {
        print("{yellow-fg}usage: /load <id>{/}");
        return;
      }
      print((await session.loadConversation(arg)) ? `  resumed conversation ${escapeTags(arg)}` : "{red-fg}  failed to load conversation{/}");
      return;

    case "/list": {
      const ids = await session.listSavedConversations();
      print(ids.length > 0 ? ids.map((id) => `  ${id}`).join("\n") : "  no saved conversations");
      return;
    }

    case "/recent": {
      const n = arg ? Number.parseInt(arg, 10) : 3;
      for (const msg of session.getRecentMessages(Number.isNaN(n) ? 3 : n)) {
        const preview = msg.content.length > 50 ? `${msg.content.slice(0, 50)}...` : msg.content;
        print(`  ${msg.role}: ${escapeTags(preview)}`);
      }
      return;
    }

    default:
      print(`{yellow-fg}unknown command ${escapeTags(command)}; try /help{/}`);
  }
}

async function handleInput(text: string): Promise<void> {
  if (text.startsWith("/")) {
    await runCommand(text);
    return;
  }

  startSpinner("thinking");
  const result = await session.generateResponse(text);
  stopSpinner();
  printAnswer(result);
}

// ── Input Handler ───────────────────────────────────────────────────────────
inputBox.on("submit", (value: string) => {
  const text = value.trim();
  inputBox.clearValue();
  screen.render();

  if (!text || busy) {
    promptInput();
    return;
  }

  print(`{green-fg}you >{/} ${escapeTags(text)}`);
  busy = true;
  inputBox.style.border.fg = "grey";
  (inputBox as blessed.Widgets.BoxElement).setLabel(" ... ");
  screen.render();

  handleInput(text)
    .catch((err: unknown) => {
      stopSpinner();
      print(`{red-fg}error:{/} ${escapeTags(toErrorMessage(err))}`);
    })
    .finally(() => {
      busy = false;
      chatBox.log("");
      inputBox.style.border.fg = "green";
      (inputBox as blessed.Widgets.BoxElement).setLabel(" you > ");
      screen.render();
      promptInput();
    });
});

inputBox.key(["escape"], () => {
  inputBox.cancel();
});

// ── Startup ─────────────────────────────────────────────────────────────────
print("Ask a question, or type /help for commands. Ctrl+C to quit.");
print("");

session
  .initialize()
  .then(() => {
    print(`{grey-fg}conversation ${session.conversationId ?? "?"}{/}`);
    print("");
  })
  .catch((err: unknown) => {
    print(`{red-fg}Initialization failed: ${escapeTags(toErrorMessage(err))}{/}`);
  });

promptInput();
