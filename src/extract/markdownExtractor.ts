import fs from "node:fs";
import { marked } from "marked";
import { ExtractionError } from "../core/errors";
import type { MarkdownMetadata } from "../types";
import { countCharacters, decodeUtf8 } from "./textExtractor";
import type { Extraction, FormatExtractor } from "./types";

export function extractHeaders(markdown: string): string[] {
  return markdown
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("#"));
}

export class MarkdownExtractor implements FormatExtractor<"md"> {
  readonly fileType = "md";
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps?: { readFile?: (filePath: string) => Promise<Buffer> }) {
    this.readFile = deps?.readFile ?? fs.promises.readFile;
  }

  async extract(filePath: string): Promise<Extraction<"md">> {
    try {
      const source = decodeUtf8(await this.readFile(filePath));
      // Rendered only to measure it; the record keeps the Markdown source.
      const html = await marked.parse(source);
      const metadata: MarkdownMetadata = {
        format: "md",
        lines: source.split("\n").length,
        htmlLength: countCharacters(html),
        headers: extractHeaders(source),
      };
      return { text: source, metadata };
    } catch (error) {
      throw new ExtractionError("md", error);
    }
  }
}
