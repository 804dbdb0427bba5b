import type { Corpus, ScoredResult } from "../types";

export interface SearchToolHit {
  document: string;
  relevance: number;
  summary: string;
  keywords: string[];
}

export interface SearchToolResult {
  search_results: SearchToolHit[];
}

/** Function-tool definition for document search, printed by the `tools` command. */
export const SEARCH_DOCUMENTS_TOOL = {
  type: "function",
  function: {
    name: "search_documents",
    description: "Search through the profile documents for specific information",
    parameters: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Search query to find relevant information",
        },
      },
      required: ["query"],
      additionalProperties: false,
    },
  },
} as const;

/** One `**filename**: summary` line per processed document, for the system prompt. */
export function buildDocumentContext(corpus: Corpus): string {
  const lines: string[] = [];
  for (const [filename, record] of corpus) {
    if (record.status === "failed") {
      continue;
    }
    lines.push(`**${filename}**: ${record.summary}`);
  }
  return lines.join("\n");
}

export function formatSearchToolResult(results: ScoredResult[], limit = 3): SearchToolResult {
  return {
    search_results: results.slice(0, Math.max(0, limit)).map((result) => ({
      document: result.filename,
      relevance: result.score,
      summary: result.summary,
      keywords: result.keywords,
    })),
  };
}
