import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { TextGenerationRequest, TextGenerator } from "../insight";
import { Logger, MetricsRegistry } from "../observability";
import type { FailedDocument, ProcessedDocument } from "../types";

export function quietLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test", minLevel: "error" });
}

export function newMetrics(): MetricsRegistry {
  return new MetricsRegistry();
}

export class FakeTextGenerator implements TextGenerator {
  readonly requests: TextGenerationRequest[] = [];
  private readonly reply: (request: TextGenerationRequest) => Promise<string>;

  constructor(reply: string | ((request: TextGenerationRequest) => Promise<string>)) {
    this.reply = typeof reply === "string" ? async () => reply : reply;
  }

  async generate(request: TextGenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.reply(request);
  }
}

export function makeTempDir(prefix = "portfolio-docs-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function processedDoc(overrides: Partial<ProcessedDocument> & { filename: string }): ProcessedDocument {
  const content = overrides.content ?? "";
  return {
    status: "processed",
    filePath: `/docs/${overrides.filename}`,
    fileType: "txt",
    fileSizeBytes: content.length,
    content,
    contentLength: content.length,
    summary: `Document: ${overrides.filename}`,
    keywords: [],
    formatMetadata: { format: "txt", encoding: "utf-8", lines: 1, words: 0, characters: content.length },
    contentHash: "d41d8cd98f00b204e9800998ecf8427e",
    processedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function failedDoc(filename: string, error = "Error processing PDF: bad xref"): FailedDocument {
  return {
    status: "failed",
    filename,
    filePath: `/docs/${filename}`,
    fileType: "pdf",
    error,
    processedAt: "2026-01-01T00:00:00.000Z",
  };
}
