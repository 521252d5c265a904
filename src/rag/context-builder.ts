import type { RetrievedChunkRef, SimilarDocument } from "./types.js";

export interface SourceRef {
  source: string;
  pages: number[];
}

export const NO_CONTEXT_NOTICE =
  "\n\n--- Retrieved Context ---\n" +
  "No relevant document excerpts were found for this question. " +
  "Tell the user that the uploaded documents do not appear to cover it instead of guessing.";

export function formatCitation(chunk: Pick<RetrievedChunkRef, "sourceFilename" | "pageNumber">): string {
  return `[Source: ${chunk.sourceFilename}, Page ${chunk.pageNumber}]`;
}

/** System prompt suffix carrying the retrieved excerpts with their source labels. */
export function buildContextSuffix(chunks: RetrievedChunkRef[]): string {
  if (chunks.length === 0) return NO_CONTEXT_NOTICE;

  const contextParts = chunks.map((chunk) => `${formatCitation(chunk)}\n${chunk.text}`);

  return (
    "\n\n--- Retrieved Context ---\n" +
    "Use the following document excerpts to answer the user's question. " +
    "Cite your sources using the [Source: file, Page N] labels when referencing specific information.\n\n" +
    contextParts.join("\n\n")
  );
}

/** Distinct sources in first-seen order, each with its sorted pages. */
export function collectSources(
  chunks: Array<Pick<RetrievedChunkRef, "sourceFilename" | "pageNumber">>,
): SourceRef[] {
  const sourceMap = new Map<string, Set<number>>();
  for (const chunk of chunks) {
    const pages = sourceMap.get(chunk.sourceFilename) ?? new Set<number>();
    pages.add(chunk.pageNumber);
    sourceMap.set(chunk.sourceFilename, pages);
  }

  const sources: SourceRef[] = [];
  for (const [source, pages] of sourceMap) {
    sources.push({ source, pages: [...pages].sort((a, b) => a - b) });
  }
  return sources;
}

export function formatSourcesForUI(sources: SourceRef[]): string {
  return sources
    .map((s) => {
      const pageRefs = s.pages.map((p) => `p.${p}`).join(", ");
      return `${s.source} ${pageRefs}`;
    })
    .join(" | ");
}

/** The best `limit` documents, each as a header line and a one-line snippet. */
export function formatTopDocuments(docs: SimilarDocument[], limit = 3, snippetLength = 200): string[] {
  return docs.slice(0, limit).flatMap((doc, i) => {
    const flat = doc.document.replace(/\s+/g, " ");
    const snippet = flat.length > snippetLength ? `${flat.slice(0, snippetLength)}...` : flat;
    return [
      `${i + 1}. ${doc.metadata.filename} p.${doc.metadata.page} (similarity ${doc.similarity.toFixed(2)})`,
      `   ${snippet}`,
    ];
  });
}
