import { describe, expect, it, vi } from "vitest";
import { IngestionError } from "../errors.js";
import { extractPdf } from "../pdf-extractor.js";

vi.mock("unpdf", () => ({
  getDocumentProxy: vi.fn(async () => {
    throw Object.assign(new Error("No password given"), { name: "PasswordException" });
  }),
}));

describe("extractPdf with an encrypted file", () => {
  it("reports that the PDF is password protected", async () => {
    const error = await extractPdf(new Uint8Array([37, 80, 68, 70]), "locked.pdf").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IngestionError);
    expect(error).toMatchObject({
      filename: "locked.pdf",
      message: "locked.pdf: PDF is password protected",
    });
  });
});
