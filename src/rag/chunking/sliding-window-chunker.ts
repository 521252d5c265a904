import type { ExtractedDocument, TextChunk } from "../types.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";
import { slidingWindows, trimSpan } from "./windows.js";

interface PageOffset {
  pageNumber: number;
  start: number;
}

function pageAt(offsets: PageOffset[], offset: number): number {
  let pageNumber = offsets[0]?.pageNumber ?? 1;
  for (const entry of offsets) {
    if (entry.start > offset) break;
    pageNumber = entry.pageNumber;
  }
  return pageNumber;
}

/**
 * Windows the whole document as one text (pages joined by "\n"). A chunk
 * may span pages; it is attributed to the page its first character is on.
 */
export class SlidingWindowChunker implements ChunkingStrategy {
  readonly name = "sliding-window";

  chunk(document: ExtractedDocument, options: ChunkingOptions): TextChunk[] {
    const offsets: PageOffset[] = [];
    const parts: string[] = [];
    let cursor = 0;

    for (const page of document.pages) {
      const text = page.text.trim();
      if (!text) continue;
      if (parts.length > 0) cursor += 1;
      offsets.push({ pageNumber: page.pageNumber, start: cursor });
      parts.push(text);
      cursor += text.length;
    }

    const fullText = parts.join("\n");
    const chunks: TextChunk[] = [];

    for (const span of slidingWindows(fullText, options)) {
      const piece = trimSpan(fullText, span);
      if (!piece.text) continue;
      chunks.push({
        text: piece.text,
        pageNumber: pageAt(offsets, piece.offset),
        chunkIndex: chunks.length,
      });
    }

    return chunks;
  }
}
