import type { FileType } from "../types";

export type DocumentErrorCode =
  | "UNSUPPORTED_FILE_TYPE"
  | "FILE_NOT_FOUND"
  | "EXTRACTION_FAILED"
  | "INSIGHT_FAILED";

export class DocumentError extends Error {
  readonly code: DocumentErrorCode;

  constructor(message: string, code: DocumentErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class UnsupportedFileTypeError extends DocumentError {
  readonly extension: string;

  constructor(extension: string) {
    super(`Unsupported file type: ${extension || "(none)"}`, "UNSUPPORTED_FILE_TYPE");
    this.extension = extension;
  }
}

export class FileNotFoundError extends DocumentError {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Document not found: ${filePath}`, "FILE_NOT_FOUND");
    this.filePath = filePath;
  }
}

/**
 * Wraps a format-specific failure (parse error, undecodable text, missing parser).
 * The message is prefixed with the format so failed records read well on their own.
 */
export class ExtractionError extends DocumentError {
  readonly fileType: FileType;

  constructor(fileType: FileType, cause: unknown) {
    super(`Error processing ${formatLabel(fileType)}: ${describeError(cause)}`, "EXTRACTION_FAILED", { cause });
    this.fileType = fileType;
  }
}

export class CapabilityMissingError extends Error {
  readonly packageName: string;

  constructor(packageName: string) {
    super(`${packageName} not installed. Please install it to process these files.`);
    this.name = "CapabilityMissingError";
    this.packageName = packageName;
  }
}

export class DecodeError extends Error {
  readonly attemptedEncodings: readonly string[];

  constructor(attemptedEncodings: readonly string[]) {
    super(`Could not decode file with any supported encoding (${attemptedEncodings.join(", ")})`);
    this.name = "DecodeError";
    this.attemptedEncodings = attemptedEncodings;
  }
}

// Never leaves the insight generator; see insight/insightGenerator.ts.
export class InsightGenerationError extends DocumentError {
  constructor(message: string, cause?: unknown) {
    super(message, "INSIGHT_FAILED", { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatLabel(fileType: FileType): string {
  switch (fileType) {
    case "pdf":
      return "PDF";
    case "docx":
      return "DOCX";
    case "txt":
      return "text";
    case "md":
      return "Markdown";
    case "json":
      return "JSON";
  }
}
