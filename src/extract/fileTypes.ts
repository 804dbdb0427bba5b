import path from "node:path";
import { UnsupportedFileTypeError } from "../core/errors";
import { SUPPORTED_FILE_TYPES } from "../types";
import type { FileType } from "../types";

export function fileExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function isSupportedFileType(value: string): value is FileType {
  return SUPPORTED_FILE_TYPES.some((type) => type === value);
}

/** Returns the file type for a path, or undefined when its extension is not supported. */
export function detectFileType(filePath: string): FileType | undefined {
  const extension = fileExtension(filePath).replace(/^\./, "");
  return isSupportedFileType(extension) ? extension : undefined;
}

export function resolveFileType(filePath: string): FileType {
  const fileType = detectFileType(filePath);
  if (!fileType) {
    throw new UnsupportedFileTypeError(fileExtension(filePath));
  }
  return fileType;
}
