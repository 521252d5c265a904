import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import type { PdfUpload } from "./types.js";

async function listPdfFiles(target: string): Promise<string[]> {
  const targetStat = await stat(target);
  if (!targetStat.isDirectory()) {
    return [target];
  }

  const entries = await readdir(target);
  return entries
    .filter((f) => f.toLowerCase().endsWith(".pdf"))
    .sort()
    .map((f) => path.join(target, f));
}

/**
 * Reads a PDF, or every *.pdf directly inside a directory, into uploads.
 * A single file is taken as given so a wrong file type surfaces as an
 * ingestion error rather than being skipped.
 */
export async function collectPdfUploads(target: string): Promise<PdfUpload[]> {
  const resolved = path.resolve(target);
  const files = await listPdfFiles(resolved);

  const uploads: PdfUpload[] = [];
  for (const filePath of files) {
    const buffer = await readFile(filePath);
    uploads.push({ bytes: new Uint8Array(buffer), filename: path.basename(filePath) });
  }
  return uploads;
}
