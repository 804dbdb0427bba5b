import type { FileType, FormatMetadataMap } from "../types";

export interface Extraction<T extends FileType> {
  text: string;
  metadata: FormatMetadataMap[T];
}

export interface FormatExtractor<T extends FileType> {
  readonly fileType: T;
  extract(filePath: string): Promise<Extraction<T>>;
}

/** One extractor per supported type; a missing entry is a compile error. */
export type ExtractorSet = { readonly [T in FileType]: FormatExtractor<T> };
