import type { ChunkingOptions } from "./types.js";

export interface TextSpan {
  start: number;
  end: number;
}

const SEPARATORS = ["\n\n", "\n", " "];

/** Windows needed to cover `length` characters with plain fixed steps. */
function windowCount(length: number, { chunkSize, chunkOverlap }: ChunkingOptions): number {
  if (length <= 0) return 0;
  if (length <= chunkSize) return 1;
  return 1 + Math.ceil((length - chunkSize) / (chunkSize - chunkOverlap));
}

function lastSeparatorEnd(text: string, start: number, end: number, chunkOverlap: number): number {
  const window = text.slice(start, end);
  for (const sep of SEPARATORS) {
    const idx = window.lastIndexOf(sep);
    if (idx > chunkOverlap) return start + idx + sep.length;
  }
  return end;
}

/**
 * Overlapping windows over `text`, as many as fixed steps of
 * `chunkSize - chunkOverlap` would give. A window that stops short of the
 * end is pulled back to the last separator past the overlap, unless that
 * would take one more window to cover the rest. The final window always
 * ends at `text.length`.
 */
export function slidingWindows(text: string, options: ChunkingOptions): TextSpan[] {
  const { chunkSize, chunkOverlap } = options;
  if (chunkOverlap >= chunkSize) {
    throw new RangeError(`chunk overlap (${chunkOverlap}) must be smaller than chunk size (${chunkSize})`);
  }

  const budget = windowCount(text.length, options);
  const spans: TextSpan[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      const snapped = lastSeparatorEnd(text, start, end, chunkOverlap);
      const rest = windowCount(text.length - (snapped - chunkOverlap), options);
      if (spans.length + 1 + rest <= budget) end = snapped;
    }

    spans.push({ start, end });
    if (end >= text.length) break;
    start = end - chunkOverlap;
  }

  return spans;
}

/** Trimmed text of a span and the offset where that trimmed text begins. */
export function trimSpan(text: string, span: TextSpan): { text: string; offset: number } {
  const raw = text.slice(span.start, span.end);
  const leading = raw.length - raw.trimStart().length;
  return { text: raw.trim(), offset: span.start + leading };
}
