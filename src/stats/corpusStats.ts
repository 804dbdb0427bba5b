import type { Corpus, CorpusStatistics } from "../types";

export function computeCorpusStats(corpus: Corpus): CorpusStatistics {
  const byFileType: CorpusStatistics["byFileType"] = {};
  let successfulCount = 0;
  let totalContentLength = 0;

  for (const record of corpus.values()) {
    if (record.status === "failed") {
      continue;
    }
    successfulCount += 1;
    byFileType[record.fileType] = (byFileType[record.fileType] ?? 0) + 1;
    totalContentLength += record.contentLength;
  }

  return {
    totalDocuments: corpus.size,
    successfulCount,
    failedCount: corpus.size - successfulCount,
    byFileType,
    totalContentLength,
    averageContentLength: successfulCount > 0 ? totalContentLength / successfulCount : 0,
  };
}
