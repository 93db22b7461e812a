import fs from "fs-extra";
import path from "path";
import type { TextItem } from "pdfjs-dist/types/src/display/api";
import logger, { describeError } from "./logger";

/**
 * One way of pulling the text layer out of PDF bytes.
 */
export interface PdfTextStrategy {
  name: string;
  extract(data: Uint8Array): Promise<string>;
}

function isTextItem(item: object): item is TextItem {
  return "str" in item;
}

export const pdfjsStrategy: PdfTextStrategy = {
  name: "pdfjs",
  async extract(data) {
    const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");
    const pdf = await getDocument({ data, useSystemFonts: true }).promise;
    const pages: string[] = [];

    try {
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const textContent = await page.getTextContent();

        const pageText = textContent.items
          .map((item) => (isTextItem(item) ? item.str + (item.hasEOL ? "\n" : "") : ""))
          .join(" ");

        pages.push(pageText);
      }
    } finally {
      await pdf.destroy();
    }

    return pages.join("\n");
  },
};

export const pdfParseStrategy: PdfTextStrategy = {
  name: "pdf-parse",
  async extract(data) {
    const { default: pdfParse } = await import("pdf-parse/lib/pdf-parse.js");
    const result = await pdfParse(Buffer.from(data));
    return result.text;
  },
};

export const DEFAULT_PDF_STRATEGIES: readonly PdfTextStrategy[] = [
  pdfjsStrategy,
  pdfParseStrategy,
];

/**
 * Returns the text of the first strategy that produces any. Strategies that
 * throw or find nothing are skipped; when all of them do, the result is "".
 *
 * @throws Error if the file is missing or cannot be read.
 */
export async function extractTextFromPDF(
  filePath: string,
  strategies: readonly PdfTextStrategy[] = DEFAULT_PDF_STRATEGIES,
): Promise<string> {
  const absolutePath = path.resolve(filePath);
  if (!(await fs.pathExists(absolutePath))) {
    throw new Error(`PDF file not found: ${absolutePath}`);
  }
  const fileData = await fs.readFile(absolutePath);

  for (const strategy of strategies) {
    try {
      // pdfjs transfers the buffer it is given, so each strategy gets a copy
      const text = cleanPdfText(await strategy.extract(new Uint8Array(fileData)));
      if (text) {
        logger.info("Extracted text from PDF", {
          file: path.basename(absolutePath),
          strategy: strategy.name,
          characters: text.length,
        });
        return text;
      }
      logger.warn("PDF strategy found no text", { strategy: strategy.name });
    } catch (error) {
      logger.warn("PDF strategy failed", {
        strategy: strategy.name,
        error: describeError(error),
      });
    }
  }

  logger.warn("No text could be extracted from PDF", { file: path.basename(absolutePath) });
  return "";
}

/**
 * Collapses runs of spaces and blank lines left by text-layer extraction.
 */
export function cleanPdfText(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/[ \t\f\v]+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}
