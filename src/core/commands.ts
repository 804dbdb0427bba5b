import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { buildDocumentContext, formatSearchToolResult, SEARCH_DOCUMENTS_TOOL } from "../context";
import { resolveFileType } from "../extract";
import type { Logger, MetricsRegistry } from "../observability";
import type { DocumentRegistry } from "../registry";
import { toStoredMetadata } from "../store";
import type { DocumentMetadataStore, StoredDocumentMetadata } from "../store";
import type { DocumentRecord, ProcessedDocument } from "../types";
import { FileNotFoundError } from "./errors";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: DocumentMetadataStore;
  registry: DocumentRegistry;
  logger: Logger;
  metrics: MetricsRegistry;
  print: (text: string) => void;
}

export type ChangeKind = "new" | "changed" | "unchanged";

export interface ChangeReport {
  new: string[];
  changed: string[];
  unchanged: string[];
}

export function classifyChange(stored: StoredDocumentMetadata | undefined, record: DocumentRecord): ChangeKind {
  if (!stored) {
    return "new";
  }
  if (record.status === "failed") {
    return stored.status === "failed" ? "unchanged" : "changed";
  }
  return stored.contentHash === record.contentHash ? "unchanged" : "changed";
}

export function describeRecord(record: DocumentRecord): Record<string, unknown> {
  if (record.status === "failed") {
    return { ...record };
  }
  return {
    status: record.status,
    filename: record.filename,
    fileType: record.fileType,
    fileSizeBytes: record.fileSizeBytes,
    contentLength: record.contentLength,
    summary: record.summary,
    keywords: record.keywords,
    formatMetadata: record.formatMetadata,
    contentHash: record.contentHash,
    processedAt: record.processedAt,
  };
}

async function lastModifiedOf(record: DocumentRecord): Promise<string | undefined> {
  if (record.status === "failed") {
    return undefined;
  }
  const stats = await fs.promises.stat(record.filePath);
  return stats.mtime.toISOString();
}

async function persistRecord(ctx: CommandContext, record: DocumentRecord): Promise<ChangeKind> {
  const stored = await ctx.store.getDocument(record.filename);
  const change = classifyChange(stored, record);
  await ctx.store.upsertDocument(toStoredMetadata(record, await lastModifiedOf(record)));
  if (change !== "unchanged") {
    ctx.logger.info("document_metadata_updated", { filename: record.filename, change });
  }
  return change;
}

function printJson(ctx: CommandContext, value: unknown): void {
  ctx.print(JSON.stringify(value, null, 2));
}

export async function runScan(ctx: CommandContext): Promise<ChangeReport> {
  await ctx.store.startScan(ctx.runId, new Date().toISOString());

  try {
    const corpus = await ctx.registry.processAll(ctx.config.documentsDir);
    const changes: ChangeReport = { new: [], changed: [], unchanged: [] };
    for (const record of corpus.values()) {
      const change = await persistRecord(ctx, record);
      changes[change].push(record.filename);
    }

    const scan = ctx.registry.getLastScan();
    await ctx.store.finishScan(ctx.runId, {
      status: "completed",
      finishedAt: new Date().toISOString(),
      processed: scan?.processed ?? corpus.size,
      ok: scan?.ok ?? 0,
      failed: scan?.failed ?? 0,
      skipped: scan?.skipped ?? 0,
    });

    printJson(ctx, { stats: ctx.registry.stats(), changes });
    return changes;
  } catch (error) {
    await ctx.store.finishScan(ctx.runId, {
      status: "failed",
      finishedAt: new Date().toISOString(),
      processed: 0,
      ok: 0,
      failed: 0,
      skipped: 0,
    });
    throw error;
  }
}

/**
 * Copies a file into the documents directory and processes it. Unlike a scan,
 * extraction failures reach the caller.
 */
export async function runAdd(ctx: CommandContext, sourcePath: string): Promise<ProcessedDocument> {
  const source = path.resolve(sourcePath);
  if (!fs.existsSync(source)) {
    throw new FileNotFoundError(source);
  }
  resolveFileType(source);

  const documentsDir = path.resolve(ctx.config.documentsDir);
  await fs.promises.mkdir(documentsDir, { recursive: true });
  const destination = path.join(documentsDir, path.basename(source));
  if (destination !== source) {
    await fs.promises.copyFile(source, destination);
  }

  const record = await ctx.registry.addDocument(destination);
  await persistRecord(ctx, record);
  printJson(ctx, describeRecord(record));
  return record;
}

export async function runSearch(ctx: CommandContext, query: string, limit?: number): Promise<void> {
  await ctx.registry.processAll(ctx.config.documentsDir);
  const results = ctx.registry.search(query);
  ctx.logger.info("search_complete", { query, hits: results.length });
  printJson(ctx, formatSearchToolResult(results, limit ?? ctx.config.searchResultLimit));
}

export async function runStats(ctx: CommandContext): Promise<void> {
  await ctx.registry.processAll(ctx.config.documentsDir);
  printJson(ctx, ctx.registry.stats());
}

export async function runContext(ctx: CommandContext): Promise<void> {
  await ctx.registry.processAll(ctx.config.documentsDir);
  ctx.print(buildDocumentContext(ctx.registry.getAll()));
}

/** Prints the function-tool definitions a chat client registers alongside the context block. */
export function runTools(ctx: CommandContext): void {
  printJson(ctx, [SEARCH_DOCUMENTS_TOOL]);
}

export async function runDocuments(ctx: CommandContext): Promise<void> {
  const [documents, stats] = await Promise.all([ctx.store.listDocuments(), ctx.store.getStats()]);
  printJson(ctx, { stats, documents });
}
