import { getChunkingStrategy, type ChunkingOptions } from "./chunking/index.js";
import { IngestionError } from "./errors.js";
import { extractPdf } from "./pdf-extractor.js";
import type { IngestedDocument } from "./types.js";

export interface IngestOptions extends ChunkingOptions {
  chunkingStrategy: string;
}

/** PDF bytes to chunk texts with page attribution. */
export async function ingestDocument(
  bytes: Uint8Array,
  filename: string,
  options: IngestOptions,
): Promise<IngestedDocument> {
  const strategy = getChunkingStrategy(options.chunkingStrategy);
  const doc = await extractPdf(bytes, filename);

  if (doc.pages.length === 0) {
    throw new IngestionError(filename, "PDF contains no extractable text");
  }

  const chunks = strategy.chunk(doc, options);
  if (chunks.length === 0) {
    throw new IngestionError(filename, "PDF contains no extractable text");
  }

  return { filename, pageCount: doc.pageCount, chunks };
}
