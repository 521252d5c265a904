import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { collectPdfUploads } from "../file-scanner.js";
import { makeTempDir, removeDir } from "./helpers/fakes.js";

describe("collectPdfUploads", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("scan");
    await writeFile(path.join(dir, "b.pdf"), "bbb");
    await writeFile(path.join(dir, "a.PDF"), "a");
    await writeFile(path.join(dir, "notes.txt"), "not a pdf");
    await mkdir(path.join(dir, "nested"));
    await writeFile(path.join(dir, "nested", "c.pdf"), "c");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("reads the PDFs directly inside a directory in name order", async () => {
    const uploads = await collectPdfUploads(dir);

    expect(uploads.map((u) => u.filename)).toEqual(["a.PDF", "b.pdf"]);
    expect(uploads.map((u) => u.bytes.byteLength)).toEqual([1, 3]);
  });

  it("takes a single file as given", async () => {
    const uploads = await collectPdfUploads(path.join(dir, "notes.txt"));

    expect(uploads).toHaveLength(1);
    expect(uploads[0]?.filename).toBe("notes.txt");
    expect(new TextDecoder().decode(uploads[0]?.bytes)).toBe("not a pdf");
  });

  it("fails for a path that does not exist", async () => {
    await expect(collectPdfUploads(path.join(dir, "missing"))).rejects.toThrow();
  });
});
