import type { Corpus, MatchedField, ProcessedDocument, ScoredResult } from "../types";

export const FIELD_WEIGHTS: Readonly<Record<MatchedField, number>> = {
  content: 3,
  summary: 2,
  keywords: 1,
  filename: 1,
};

export function scoreDocument(query: string, document: ProcessedDocument): ScoredResult | undefined {
  const needle = query.toLowerCase();
  const matchedFields: MatchedField[] = [];

  if (document.content.toLowerCase().includes(needle)) {
    matchedFields.push("content");
  }
  if (document.summary.toLowerCase().includes(needle)) {
    matchedFields.push("summary");
  }
  // Any number of matching keywords counts once.
  if (document.keywords.some((keyword) => keyword.toLowerCase().includes(needle))) {
    matchedFields.push("keywords");
  }
  if (document.filename.toLowerCase().includes(needle)) {
    matchedFields.push("filename");
  }

  const score = matchedFields.reduce((total, field) => total + FIELD_WEIGHTS[field], 0);
  if (score === 0) {
    return undefined;
  }

  return {
    filename: document.filename,
    score,
    matchedFields,
    summary: document.summary,
    keywords: document.keywords,
  };
}

/**
 * Ranks processed documents by weighted case-insensitive substring matches.
 * Equal scores are ordered by filename. An empty query matches everything.
 */
export function searchCorpus(query: string, corpus: Corpus): ScoredResult[] {
  const results: ScoredResult[] = [];
  for (const record of corpus.values()) {
    if (record.status === "failed") {
      continue;
    }
    const result = scoreDocument(query, record);
    if (result) {
      results.push(result);
    }
  }

  return results.sort((a, b) => b.score - a.score || compareFilenames(a.filename, b.filename));
}

function compareFilenames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
