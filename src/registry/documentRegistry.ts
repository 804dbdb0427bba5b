import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { describeError, FileNotFoundError } from "../core/errors";
import { countCharacters, createExtractors, detectFileType, resolveFileType } from "../extract";
import type { Extraction, ExtractorSet } from "../extract";
import type { InsightGenerator } from "../insight";
import type { Logger, MetricsRegistry } from "../observability";
import { searchCorpus } from "../search";
import { computeCorpusStats } from "../stats";
import type {
  Corpus,
  CorpusStatistics,
  DocumentRecord,
  FailedDocument,
  FileType,
  ProcessedDocument,
  ScoredResult,
} from "../types";

interface RegistryDeps {
  config: Pick<AppConfig, "documentsDir" | "processConcurrency">;
  logger: Logger;
  metrics: MetricsRegistry;
  insights: InsightGenerator;
  extractors?: ExtractorSet;
}

export interface ScanSummary {
  processed: number;
  ok: number;
  failed: number;
  skipped: number;
}

interface ScanCandidate {
  filePath: string;
  fileType: FileType;
}

export async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const workerCount = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
  const workers = new Array(workerCount).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(workers);
}

export function hashBytes(bytes: Buffer): string {
  return crypto.createHash("md5").update(bytes).digest("hex");
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/**
 * Owns the in-memory corpus. Every mutation builds a new map and swaps it in,
 * so a corpus handed out by `getAll` never changes underneath its reader.
 */
export class DocumentRegistry {
  private readonly deps: RegistryDeps;
  private readonly extractors: ExtractorSet;
  private corpus: ReadonlyMap<string, DocumentRecord> = new Map();
  private lastScan?: ScanSummary;

  constructor(deps: RegistryDeps) {
    this.deps = deps;
    this.extractors = deps.extractors ?? createExtractors();
  }

  async processAll(directoryPath: string = this.deps.config.documentsDir): Promise<Corpus> {
    const { logger, metrics } = this.deps;
    const directory = path.resolve(directoryPath);
    logger.info("scan_start", { directory });

    const { candidates, skipped } = await this.listCandidates(directory);
    const next = new Map<string, DocumentRecord>();
    let ok = 0;
    let failed = 0;

    await processWithConcurrency(candidates, this.deps.config.processConcurrency, async (candidate) => {
      const record = await this.processForScan(candidate);
      next.set(record.filename, record);
      if (record.status === "processed") {
        ok += 1;
      } else {
        failed += 1;
      }
    });

    metrics.incrementCounter("documents_skipped", skipped);
    this.corpus = next;
    this.lastScan = { processed: candidates.length, ok, failed, skipped };
    logger.info("scan_complete", { directory, ...this.lastScan });
    return next;
  }

  /** Processes one file and propagates every failure except a missing insight. */
  async processOne(filePath: string): Promise<ProcessedDocument> {
    const absolutePath = path.resolve(filePath);
    const stats = await fs.promises.stat(absolutePath).catch((error: unknown) => {
      if (isMissingFileError(error)) {
        throw new FileNotFoundError(absolutePath);
      }
      throw error;
    });
    if (!stats.isFile()) {
      throw new FileNotFoundError(absolutePath);
    }

    const fileType = resolveFileType(absolutePath);
    return this.buildRecord(absolutePath, fileType, stats.size);
  }

  /** Processes a file added after startup and puts it in the corpus, replacing any record of the same name. */
  async addDocument(filePath: string): Promise<ProcessedDocument> {
    const record = await this.processOne(filePath);
    const next = new Map(this.corpus);
    next.set(record.filename, record);
    this.corpus = next;
    this.deps.logger.info("document_added", { filename: record.filename, fileType: record.fileType });
    return record;
  }

  getAll(): Corpus {
    return this.corpus;
  }

  getDocument(filename: string): DocumentRecord | undefined {
    return this.corpus.get(filename);
  }

  getLastScan(): ScanSummary | undefined {
    return this.lastScan;
  }

  search(query: string): ScoredResult[] {
    this.deps.metrics.incrementCounter("searches");
    return searchCorpus(query, this.corpus);
  }

  stats(): CorpusStatistics {
    return computeCorpusStats(this.corpus);
  }

  private async listCandidates(directory: string): Promise<{ candidates: ScanCandidate[]; skipped: number }> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isMissingFileError(error)) {
        this.deps.logger.warn("scan_directory_missing", { directory });
        return { candidates: [], skipped: 0 };
      }
      throw error;
    }

    const candidates: ScanCandidate[] = [];
    let skipped = 0;
    for (const entry of entries) {
      const filePath = path.join(directory, entry.name);
      if (!(await isRegularFile(entry, filePath))) {
        continue;
      }
      const fileType = detectFileType(entry.name);
      if (!fileType) {
        skipped += 1;
        this.deps.logger.debug("scan_file_skipped", { filename: entry.name });
        continue;
      }
      candidates.push({ filePath, fileType });
    }
    return { candidates, skipped };
  }

  private async processForScan(candidate: ScanCandidate): Promise<DocumentRecord> {
    const { logger, metrics } = this.deps;
    try {
      const record = await this.processOne(candidate.filePath);
      metrics.incrementCounter("documents_ok");
      return record;
    } catch (error) {
      const failure: FailedDocument = {
        status: "failed",
        filename: path.basename(candidate.filePath),
        filePath: candidate.filePath,
        fileType: candidate.fileType,
        error: describeError(error),
        processedAt: new Date().toISOString(),
      };
      metrics.incrementCounter("documents_failed");
      logger.warn("document_failed", { filename: failure.filename, fileType: failure.fileType, error: failure.error });
      return failure;
    }
  }

  private async extract(filePath: string, fileType: FileType): Promise<Extraction<FileType>> {
    const { logger, metrics } = this.deps;
    const stopTimer = metrics.startTimer("extract_ms");
    try {
      return await this.extractors[fileType].extract(filePath);
    } finally {
      const durationMs = stopTimer();
      logger.debug("document_extracted", { filename: path.basename(filePath), fileType, durationMs });
    }
  }

  private async buildRecord(filePath: string, fileType: FileType, fileSizeBytes: number): Promise<ProcessedDocument> {
    const filename = path.basename(filePath);

    const extraction = await this.extract(filePath, fileType);
    const insight = await this.deps.insights.generate(extraction.text, filename);
    const contentHash = hashBytes(await fs.promises.readFile(filePath));

    return {
      status: "processed",
      filename,
      filePath,
      fileType,
      fileSizeBytes,
      content: extraction.text,
      contentLength: countCharacters(extraction.text),
      summary: insight.summary,
      keywords: insight.keywords,
      formatMetadata: extraction.metadata,
      contentHash,
      processedAt: new Date().toISOString(),
    };
  }
}

async function isRegularFile(entry: fs.Dirent, filePath: string): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  const target = await fs.promises.stat(filePath).catch(() => undefined);
  return target?.isFile() ?? false;
}
