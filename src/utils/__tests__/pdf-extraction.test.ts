import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  cleanPdfText,
  DEFAULT_PDF_STRATEGIES,
  extractTextFromPDF,
  type PdfTextStrategy,
} from "../pdf-extraction";

function strategy(name: string, extract: PdfTextStrategy["extract"]): PdfTextStrategy {
  return { name, extract: vi.fn(extract) };
}

describe("extractTextFromPDF", () => {
  let workDir: string;
  let pdfPath: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "pdf-extraction-"));
    pdfPath = path.join(workDir, "resume.pdf");
    await fs.writeFile(pdfPath, "%PDF-1.4 placeholder");
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  it("tries pdfjs before pdf-parse by default", () => {
    expect(DEFAULT_PDF_STRATEGIES.map((entry) => entry.name)).toEqual(["pdfjs", "pdf-parse"]);
  });

  it("returns the first strategy's non-empty text", async () => {
    const first = strategy("first", async () => "  Marie   Curie \n\n Data Engineer ");
    const second = strategy("second", async () => "unused");

    await expect(extractTextFromPDF(pdfPath, [first, second])).resolves.toBe(
      "Marie Curie\nData Engineer",
    );
    expect(second.extract).not.toHaveBeenCalled();
  });

  it("skips strategies that throw or find nothing", async () => {
    const broken = strategy("broken", async () => {
      throw new Error("bad xref table");
    });
    const blank = strategy("blank", async () => " \n ");
    const working = strategy("working", async (data) => `${data.length} bytes`);

    await expect(extractTextFromPDF(pdfPath, [broken, blank, working])).resolves.toBe(
      "20 bytes",
    );
  });

  it("returns an empty string when every strategy comes up blank", async () => {
    const blank = strategy("blank", async () => "");
    await expect(extractTextFromPDF(pdfPath, [blank, blank])).resolves.toBe("");
  });

  it("fails for missing files", async () => {
    await expect(
      extractTextFromPDF(path.join(workDir, "missing.pdf"), []),
    ).rejects.toThrow("PDF file not found");
  });
});

describe("cleanPdfText", () => {
  it("collapses spacing and drops blank lines", () => {
    expect(cleanPdfText("a \t b\n\n  \nc  ")).toBe("a b\nc");
  });
});
