import fs from "node:fs/promises";
import { PDFParse } from "pdf-parse";

import { errorMessage } from "../application/errors";
import type { DocumentParser, ParsedDocument } from "../ports/document-parser";
import type { Logger } from "../ports/logger";

export type ExtractedText = {
  text: string;
  pageCount: number;
};

export type PdfTextExtractor = (data: Uint8Array) => Promise<ExtractedText>;

export const NO_TEXT_ERROR = "No text content could be extracted";

export const extractWithPdfParse: PdfTextExtractor = async (data) => {
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return {
      text: result.pages.map((page) => page.text).join("\n"),
      pageCount: result.total,
    };
  } finally {
    await parser.destroy();
  }
};

export function cleanExtractedText(raw: string): string {
  return raw
    .replace(/\n{3,}/g, "\n\n")
    .replace(/ +/g, " ")
    .trim()
    .replace(/(?<=[a-z])(?=[A-Z])/g, " ")
    .replace(/[^\S\n]+/g, " ");
}

export function extractTitle(text: string): string {
  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (trimmed) return trimmed;
  }
  return "Untitled";
}

export type PdfParseDocumentParserOptions = {
  logger: Logger;
  extract?: PdfTextExtractor;
};

/**
 * Reads a PDF from disk and returns its cleaned text. File-system errors
 * propagate so callers can retry them; anything wrong with the content itself
 * comes back as `error`.
 */
export class PdfParseDocumentParser implements DocumentParser {
  private readonly logger: Logger;
  private readonly extract: PdfTextExtractor;

  constructor(options: PdfParseDocumentParserOptions) {
    this.logger = options.logger;
    this.extract = options.extract ?? extractWithPdfParse;
  }

  async parse(absolutePath: string): Promise<ParsedDocument> {
    const data = await fs.readFile(absolutePath);

    let extracted: ExtractedText;
    try {
      extracted = await this.extract(new Uint8Array(data));
    } catch (err) {
      this.logger.warn({ err, file: absolutePath }, "Could not extract text from PDF");
      return { title: "", text: "", pageCount: 0, error: `Invalid PDF content: ${errorMessage(err)}` };
    }

    const text = cleanExtractedText(extracted.text);
    if (!text) {
      return { title: "", text: "", pageCount: extracted.pageCount, error: NO_TEXT_ERROR };
    }

    this.logger.debug({ file: absolutePath, pages: extracted.pageCount }, "Parsed PDF");
    return { title: extractTitle(text), text, pageCount: extracted.pageCount };
  }
}
