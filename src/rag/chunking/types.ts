import type { ExtractedDocument, TextChunk } from "../types.js";

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(document: ExtractedDocument, options: ChunkingOptions): TextChunk[];
}
