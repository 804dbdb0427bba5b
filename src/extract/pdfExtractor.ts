import fs from "node:fs";
import { PDFParse } from "pdf-parse";
import { ExtractionError } from "../core/errors";
import type { PdfMetadata } from "../types";
import type { Extraction, FormatExtractor } from "./types";

export interface PdfParserLike {
  getText(): Promise<{
    total: number;
    pages: Array<{
      num: number;
      text: string;
    }>;
  }>;
  getInfo(): Promise<{
    total: number;
    info?: Record<string, unknown>;
  }>;
  destroy(): Promise<void>;
}

export interface PdfExtractorDeps {
  parserFactory?: (data: Buffer) => PdfParserLike;
  readFile?: (filePath: string) => Promise<Buffer>;
}

export class PdfExtractor implements FormatExtractor<"pdf"> {
  readonly fileType = "pdf";
  private readonly parserFactory: (data: Buffer) => PdfParserLike;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps?: PdfExtractorDeps) {
    this.parserFactory =
      deps?.parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
    this.readFile = deps?.readFile ?? fs.promises.readFile;
  }

  async extract(filePath: string): Promise<Extraction<"pdf">> {
    try {
      const pdfBuffer = await this.readFile(filePath);
      const { textResult, infoResult } = await readPdf(this.parserFactory(pdfBuffer));

      const pages = [...textResult.pages].sort((a, b) => a.num - b.num);
      const text = pages
        .filter((page) => page.text.trim().length > 0)
        .map((page) => `\n--- Page ${page.num} ---\n${page.text}\n`)
        .join("")
        .trim();

      return {
        text,
        metadata: toPdfMetadata(infoResult.info, textResult.total),
      };
    } catch (error) {
      throw new ExtractionError("pdf", error);
    }
  }
}

async function readPdf(parser: PdfParserLike) {
  try {
    const textResult = await parser.getText();
    const infoResult = await parser.getInfo();
    return { textResult, infoResult };
  } finally {
    await parser.destroy().catch(() => undefined);
  }
}

function toPdfMetadata(info: Record<string, unknown> | undefined, pageCount: number): PdfMetadata {
  return {
    format: "pdf",
    title: infoString(info, "Title"),
    author: infoString(info, "Author"),
    subject: infoString(info, "Subject"),
    creator: infoString(info, "Creator"),
    pages: pageCount,
  };
}

function infoString(info: Record<string, unknown> | undefined, key: string): string {
  const value = info?.[key];
  return typeof value === "string" ? value : "";
}
