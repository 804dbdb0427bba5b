import type { DocumentRecord, FileType } from "../types";

export type StoredDocumentStatus = "active" | "failed";

/** What survives a process restart: everything about a document except its text. */
export interface StoredDocumentMetadata {
  filename: string;
  filePath: string;
  fileType: FileType;
  status: StoredDocumentStatus;
  summary?: string;
  keywords: string[];
  contentHash?: string;
  fileSizeBytes?: number;
  lastModified?: string;
  processedAt: string;
  error?: string;
}

export interface ScanRunSummary {
  status: "completed" | "failed";
  finishedAt: string;
  processed: number;
  ok: number;
  failed: number;
  skipped: number;
}

export interface StoreStats {
  totalDocuments: number;
  active: number;
  failed: number;
  scans: number;
}

export interface DocumentMetadataStore {
  startScan(runId: string, startedAt: string): Promise<void>;
  finishScan(runId: string, summary: ScanRunSummary): Promise<void>;
  upsertDocument(metadata: StoredDocumentMetadata): Promise<void>;
  getDocument(filename: string): Promise<StoredDocumentMetadata | undefined>;
  listDocuments(): Promise<StoredDocumentMetadata[]>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}

export function toStoredMetadata(record: DocumentRecord, lastModified?: string): StoredDocumentMetadata {
  if (record.status === "failed") {
    return {
      filename: record.filename,
      filePath: record.filePath,
      fileType: record.fileType,
      status: "failed",
      keywords: [],
      lastModified,
      processedAt: record.processedAt,
      error: record.error,
    };
  }

  return {
    filename: record.filename,
    filePath: record.filePath,
    fileType: record.fileType,
    status: "active",
    summary: record.summary,
    keywords: record.keywords,
    contentHash: record.contentHash,
    fileSizeBytes: record.fileSizeBytes,
    lastModified,
    processedAt: record.processedAt,
  };
}
