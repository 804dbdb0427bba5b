import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { isSupportedFileType } from "../extract/fileTypes";
import type { DocumentMetadataStore, ScanRunSummary, StoredDocumentMetadata, StoreStats } from "./types";

type DocumentRow = {
  filename: string;
  filePath: string;
  fileType: string;
  status: string;
  summary: string | null;
  keywords: string | null;
  contentHash: string | null;
  fileSizeBytes: number | null;
  lastModified: string | null;
  processedAt: string;
  error: string | null;
};

const DOCUMENT_COLUMNS = `
  filename, filePath, fileType, status, summary, keywords,
  contentHash, fileSizeBytes, lastModified, processedAt, error
`;

export class SqliteStore implements DocumentMetadataStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startScan(runId: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO scans (runId, startedAt, finishedAt, status)
        VALUES (@runId, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({
        runId,
        startedAt,
      });
  }

  async finishScan(runId: string, summary: ScanRunSummary): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE scans
        SET
          status = @status,
          finishedAt = @finishedAt,
          processed = @processed,
          ok = @ok,
          failed = @failed,
          skipped = @skipped
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        ...summary,
      });
  }

  async upsertDocument(metadata: StoredDocumentMetadata): Promise<void> {
    const statement = this.db.prepare(`
      INSERT INTO documents (${DOCUMENT_COLUMNS}, updatedAt)
      VALUES (
        @filename, @filePath, @fileType, @status, @summary, @keywords,
        @contentHash, @fileSizeBytes, @lastModified, @processedAt, @error, @updatedAt
      )
      ON CONFLICT(filename) DO UPDATE SET
        filePath = excluded.filePath,
        fileType = excluded.fileType,
        status = excluded.status,
        summary = excluded.summary,
        keywords = excluded.keywords,
        contentHash = excluded.contentHash,
        fileSizeBytes = excluded.fileSizeBytes,
        lastModified = excluded.lastModified,
        processedAt = excluded.processedAt,
        error = excluded.error,
        updatedAt = excluded.updatedAt
    `);

    statement.run({
      filename: metadata.filename,
      filePath: metadata.filePath,
      fileType: metadata.fileType,
      status: metadata.status,
      summary: metadata.summary ?? null,
      keywords: metadata.keywords.length > 0 ? JSON.stringify(metadata.keywords) : null,
      contentHash: metadata.contentHash ?? null,
      fileSizeBytes: metadata.fileSizeBytes ?? null,
      lastModified: metadata.lastModified ?? null,
      processedAt: metadata.processedAt,
      error: metadata.error ?? null,
      updatedAt: new Date().toISOString(),
    });
  }

  async getDocument(filename: string): Promise<StoredDocumentMetadata | undefined> {
    const row = this.db
      .prepare<[string], DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE filename = ?`)
      .get(filename);
    return row ? fromRow(row) : undefined;
  }

  async listDocuments(): Promise<StoredDocumentMetadata[]> {
    const rows = this.db
      .prepare<[], DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM documents ORDER BY filename ASC`)
      .all();
    return rows.map(fromRow);
  }

  async getStats(): Promise<StoreStats> {
    const totalDocuments = this.countWhere("documents", "1 = 1");
    const active = this.countWhere("documents", "status = 'active'");
    const failed = this.countWhere("documents", "status = 'failed'");
    const scans = this.countWhere("scans", "1 = 1");

    return {
      totalDocuments,
      active,
      failed,
      scans,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private countWhere(tableName: "documents" | "scans", whereClause: string): number {
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${tableName} WHERE ${whereClause}`)
      .get();
    return row?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        filename TEXT PRIMARY KEY,
        filePath TEXT NOT NULL,
        fileType TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'active',
        summary TEXT NULL,
        keywords TEXT NULL,
        contentHash TEXT NULL,
        fileSizeBytes INTEGER NULL,
        lastModified TEXT NULL,
        processedAt TEXT NOT NULL,
        error TEXT NULL,
        updatedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS scans (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL,
        processed INTEGER NOT NULL DEFAULT 0,
        ok INTEGER NOT NULL DEFAULT 0,
        failed INTEGER NOT NULL DEFAULT 0,
        skipped INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_documents_status ON documents(status);
    `);
  }
}

function parseKeywords(raw: string | null): string[] {
  if (!raw) {
    return [];
  }
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}

function fromRow(row: DocumentRow): StoredDocumentMetadata {
  if (!isSupportedFileType(row.fileType)) {
    throw new Error(`Stored document ${row.filename} has unsupported file type ${row.fileType}`);
  }

  return {
    filename: row.filename,
    filePath: row.filePath,
    fileType: row.fileType,
    status: row.status === "failed" ? "failed" : "active",
    summary: row.summary ?? undefined,
    keywords: parseKeywords(row.keywords),
    contentHash: row.contentHash ?? undefined,
    fileSizeBytes: row.fileSizeBytes ?? undefined,
    lastModified: row.lastModified ?? undefined,
    processedAt: row.processedAt,
    error: row.error ?? undefined,
  };
}
