import fs from "node:fs";
import { DecodeError, ExtractionError } from "../core/errors";
import type { TextEncodingName, TextMetadata } from "../types";
import type { Extraction, FormatExtractor } from "./types";

export type Decoder = (bytes: Buffer) => string;

const FALLBACK_ENCODINGS: readonly TextEncodingName[] = ["latin-1", "cp1252", "iso-8859-1"];

const DECODERS: Record<TextEncodingName, Decoder> = {
  "utf-8": (bytes) => new TextDecoder("utf-8", { fatal: true }).decode(bytes),
  "latin-1": (bytes) => bytes.toString("latin1"),
  cp1252: (bytes) => new TextDecoder("windows-1252", { fatal: true }).decode(bytes),
  "iso-8859-1": (bytes) => new TextDecoder("iso-8859-1", { fatal: true }).decode(bytes),
};

export interface DecodedText {
  text: string;
  encoding: TextEncodingName;
}

/**
 * Strict UTF-8 first, then each legacy encoding in order. The first decoder that
 * does not throw wins.
 */
export function decodeText(
  bytes: Buffer,
  fallbacks: readonly TextEncodingName[] = FALLBACK_ENCODINGS,
  decoders: Record<TextEncodingName, Decoder> = DECODERS,
): DecodedText {
  const attempted: TextEncodingName[] = [];
  for (const encoding of ["utf-8" as const, ...fallbacks]) {
    attempted.push(encoding);
    try {
      return { text: decoders[encoding](bytes), encoding };
    } catch {
      continue;
    }
  }
  throw new DecodeError(attempted);
}

export function decodeUtf8(bytes: Buffer): string {
  return decodeText(bytes, []).text;
}

/** Length in code points, so an emoji counts once. */
export function countCharacters(text: string): number {
  return [...text].length;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export class TextExtractor implements FormatExtractor<"txt"> {
  readonly fileType = "txt";
  private readonly readFile: (filePath: string) => Promise<Buffer>;
  private readonly decoders?: Record<TextEncodingName, Decoder>;

  constructor(deps?: { readFile?: (filePath: string) => Promise<Buffer>; decoders?: Record<TextEncodingName, Decoder> }) {
    this.readFile = deps?.readFile ?? fs.promises.readFile;
    this.decoders = deps?.decoders;
  }

  async extract(filePath: string): Promise<Extraction<"txt">> {
    try {
      const bytes = await this.readFile(filePath);
      const decoded = decodeText(bytes, FALLBACK_ENCODINGS, this.decoders);
      const metadata: TextMetadata = {
        format: "txt",
        encoding: decoded.encoding,
        lines: decoded.text.split("\n").length,
        words: countWords(decoded.text),
        characters: countCharacters(decoded.text),
      };
      return { text: decoded.text, metadata };
    } catch (error) {
      throw new ExtractionError("txt", error);
    }
  }
}
