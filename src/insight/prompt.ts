/** First `maxChars` characters, counted in code points so a surrogate pair is never split. */
export function truncateForInsight(content: string, maxChars: number): string {
  const limit = Math.max(0, Math.floor(maxChars));
  const characters = [...content];
  return characters.length > limit ? characters.slice(0, limit).join("") : content;
}

export function buildInsightPrompt(filename: string, excerpt: string): string {
  return [
    `Analyze the following document content from file "${filename}":`,
    "",
    excerpt,
    "",
    "Please provide:",
    "1. A concise 2-3 sentence summary",
    "2. 5-8 relevant keywords/topics",
    "",
    "Respond with only a JSON object in this format:",
    "{",
    '  "summary": "your summary here",',
    '  "keywords": ["keyword1", "keyword2", ...]',
    "}",
  ].join("\n");
}
