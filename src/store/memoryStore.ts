import type { DocumentMetadataStore, ScanRunSummary, StoredDocumentMetadata, StoreStats } from "./types";

export class InMemoryStore implements DocumentMetadataStore {
  private readonly documents = new Map<string, StoredDocumentMetadata>();
  private readonly scans = new Map<string, { startedAt: string; summary?: ScanRunSummary }>();

  async startScan(runId: string, startedAt: string): Promise<void> {
    this.scans.set(runId, { startedAt });
  }

  async finishScan(runId: string, summary: ScanRunSummary): Promise<void> {
    const scan = this.scans.get(runId);
    if (scan) {
      scan.summary = summary;
    }
  }

  async upsertDocument(metadata: StoredDocumentMetadata): Promise<void> {
    this.documents.set(metadata.filename, { ...metadata, keywords: [...metadata.keywords] });
  }

  async getDocument(filename: string): Promise<StoredDocumentMetadata | undefined> {
    return this.documents.get(filename);
  }

  async listDocuments(): Promise<StoredDocumentMetadata[]> {
    return [...this.documents.values()].sort((a, b) => (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0));
  }

  async getStats(): Promise<StoreStats> {
    const documents = [...this.documents.values()];
    const active = documents.filter((document) => document.status === "active").length;
    return {
      totalDocuments: documents.length,
      active,
      failed: documents.length - active,
      scans: this.scans.size,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
