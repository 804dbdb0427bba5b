export const SUPPORTED_FILE_TYPES = ["pdf", "docx", "txt", "md", "json"] as const;

export type FileType = (typeof SUPPORTED_FILE_TYPES)[number];

export interface PdfMetadata {
  format: "pdf";
  title: string;
  author: string;
  subject: string;
  creator: string;
  pages: number;
}

export interface DocxMetadata {
  format: "docx";
  title: string;
  author: string;
  subject: string;
  paragraphs: number;
  created: string;
  modified: string;
}

export type TextEncodingName = "utf-8" | "latin-1" | "cp1252" | "iso-8859-1";

export interface TextMetadata {
  format: "txt";
  encoding: TextEncodingName;
  lines: number;
  words: number;
  characters: number;
}

export interface MarkdownMetadata {
  format: "md";
  lines: number;
  htmlLength: number;
  headers: string[];
}

export type JsonValueType = "object" | "array" | "string" | "number" | "boolean" | "null";

export interface JsonMetadata {
  format: "json";
  keys: string[];
  type: JsonValueType;
  size: number;
}

export interface FormatMetadataMap {
  pdf: PdfMetadata;
  docx: DocxMetadata;
  txt: TextMetadata;
  md: MarkdownMetadata;
  json: JsonMetadata;
}

export type FormatMetadata = FormatMetadataMap[FileType];

export interface DocumentInsight {
  summary: string;
  keywords: string[];
}

export interface ProcessedDocument {
  status: "processed";
  filename: string;
  filePath: string;
  fileType: FileType;
  fileSizeBytes: number;
  content: string;
  contentLength: number;
  summary: string;
  keywords: string[];
  formatMetadata: FormatMetadata;
  contentHash: string;
  processedAt: string;
  error?: undefined;
}

export interface FailedDocument {
  status: "failed";
  filename: string;
  filePath: string;
  fileType: FileType;
  error: string;
  processedAt: string;
}

export type DocumentRecord = ProcessedDocument | FailedDocument;

/** Filename-keyed view of one processing run. */
export type Corpus = ReadonlyMap<string, DocumentRecord>;

export type MatchedField = "content" | "summary" | "keywords" | "filename";

export interface ScoredResult {
  filename: string;
  score: number;
  matchedFields: MatchedField[];
  summary: string;
  keywords: string[];
}

export interface CorpusStatistics {
  totalDocuments: number;
  successfulCount: number;
  failedCount: number;
  byFileType: Partial<Record<FileType, number>>;
  totalContentLength: number;
  averageContentLength: number;
}
