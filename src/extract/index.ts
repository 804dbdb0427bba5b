import { DocxExtractor } from "./docxExtractor";
import { JsonExtractor } from "./jsonExtractor";
import { MarkdownExtractor } from "./markdownExtractor";
import { PdfExtractor } from "./pdfExtractor";
import { TextExtractor } from "./textExtractor";
import type { ExtractorSet } from "./types";

export function createExtractors(overrides: Partial<ExtractorSet> = {}): ExtractorSet {
  return {
    pdf: overrides.pdf ?? new PdfExtractor(),
    docx: overrides.docx ?? new DocxExtractor(),
    txt: overrides.txt ?? new TextExtractor(),
    md: overrides.md ?? new MarkdownExtractor(),
    json: overrides.json ?? new JsonExtractor(),
  };
}

export * from "./docxExtractor";
export * from "./fileTypes";
export * from "./jsonExtractor";
export * from "./markdownExtractor";
export * from "./pdfExtractor";
export * from "./textExtractor";
export * from "./types";
