import fs from "node:fs";
import { load } from "cheerio";
import JSZip from "jszip";
import { CapabilityMissingError, ExtractionError } from "../core/errors";
import type { DocxMetadata } from "../types";
import type { Extraction, FormatExtractor } from "./types";

export interface MammothLike {
  extractRawText(input: { buffer: Buffer }): Promise<{ value: string }>;
}

export interface DocxExtractorDeps {
  loadMammoth?: () => Promise<MammothLike>;
  readFile?: (filePath: string) => Promise<Buffer>;
}

interface DocxPackageInfo {
  title: string;
  author: string;
  subject: string;
  created: string;
  modified: string;
  paragraphs: number;
}

export class DocxExtractor implements FormatExtractor<"docx"> {
  readonly fileType = "docx";
  private readonly loadMammoth: () => Promise<MammothLike>;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps?: DocxExtractorDeps) {
    this.loadMammoth = deps?.loadMammoth ?? loadMammothModule;
    this.readFile = deps?.readFile ?? fs.promises.readFile;
  }

  async extract(filePath: string): Promise<Extraction<"docx">> {
    try {
      const mammoth = await this.loadMammoth();
      const docxBuffer = await this.readFile(filePath);
      const raw = await mammoth.extractRawText({ buffer: docxBuffer });

      // mammoth ends every paragraph with a blank line; a single newline is a soft break inside one.
      const text = raw.value
        .split("\n\n")
        .filter((paragraph) => paragraph.trim().length > 0)
        .join("\n")
        .trim();

      const info = await readPackageInfo(docxBuffer);
      const metadata: DocxMetadata = {
        format: "docx",
        ...info,
      };
      return { text, metadata };
    } catch (error) {
      throw new ExtractionError("docx", error);
    }
  }
}

async function loadMammothModule(): Promise<MammothLike> {
  try {
    return await import("mammoth");
  } catch (error) {
    if (isModuleNotFound(error)) {
      throw new CapabilityMissingError("mammoth");
    }
    throw error;
  }
}

function isModuleNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "MODULE_NOT_FOUND";
}

async function readPackageInfo(docxBuffer: Buffer): Promise<DocxPackageInfo> {
  const zip = await JSZip.loadAsync(docxBuffer);
  const coreXml = await zip.file("docProps/core.xml")?.async("string");
  const documentXml = await zip.file("word/document.xml")?.async("string");

  const core = load(coreXml ?? "", { xml: true });
  const body = load(documentXml ?? "", { xml: true });

  return {
    title: core("dc\\:title").first().text(),
    author: core("dc\\:creator").first().text(),
    subject: core("dc\\:subject").first().text(),
    created: toIsoTimestamp(core("dcterms\\:created").first().text()),
    modified: toIsoTimestamp(core("dcterms\\:modified").first().text()),
    paragraphs: body("w\\:body > w\\:p").length,
  };
}

function toIsoTimestamp(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    return "";
  }
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? "" : parsed.toISOString();
}
