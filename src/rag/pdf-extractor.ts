import { getDocumentProxy } from "unpdf";
import { IngestionError, toErrorMessage } from "./errors.js";
import type { ExtractedDocument, PageContent } from "./types.js";

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

async function openPdf(bytes: Uint8Array, filename: string) {
  try {
    // pdf.js may take ownership of the buffer it is given
    return await getDocumentProxy(new Uint8Array(bytes));
  } catch (error) {
    if (error instanceof Error && error.name === "PasswordException") {
      throw new IngestionError(filename, "PDF is password protected", { cause: error });
    }
    throw new IngestionError(filename, `not a readable PDF (${toErrorMessage(error)})`, {
      cause: error,
    });
  }
}

/**
 * Extracts the text of every page. Pages without text are left out of
 * `pages` but still counted in `pageCount`.
 */
export async function extractPdf(bytes: Uint8Array, filename: string): Promise<ExtractedDocument> {
  if (bytes.byteLength === 0) {
    throw new IngestionError(filename, "file is empty");
  }

  const pdf = await openPdf(bytes, filename);
  const pageCount = pdf.numPages;
  const pages: PageContent[] = [];

  try {
    for (let i = 1; i <= pageCount; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();
      const text = normalizeWhitespace(
        textContent.items.map((item) => ("str" in item ? item.str : "")).join(" "),
      );
      if (text) {
        pages.push({ pageNumber: i, text });
      }
    }
  } catch (error) {
    throw new IngestionError(filename, `failed to read page text (${toErrorMessage(error)})`, {
      cause: error,
    });
  } finally {
    await pdf.destroy();
  }

  return { source: filename, pageCount, pages };
}
