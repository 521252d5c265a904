import type { ExtractedDocument, TextChunk } from "../types.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";
import { slidingWindows, trimSpan } from "./windows.js";

/** Windows each page on its own; no chunk crosses a page boundary. */
export class PageChunker implements ChunkingStrategy {
  readonly name = "page";

  chunk(document: ExtractedDocument, options: ChunkingOptions): TextChunk[] {
    const chunks: TextChunk[] = [];

    for (const page of document.pages) {
      const text = page.text.trim();
      if (!text) continue;

      for (const span of slidingWindows(text, options)) {
        const piece = trimSpan(text, span);
        if (!piece.text) continue;
        chunks.push({
          text: piece.text,
          pageNumber: page.pageNumber,
          chunkIndex: chunks.length,
        });
      }
    }

    return chunks;
  }
}
