import { describe, expect, it } from "vitest";
import { buildInsightPrompt, truncateForInsight } from "./prompt";

describe("truncateForInsight", () => {
  it("leaves short content alone", () => {
    expect(truncateForInsight("short", 3000)).toBe("short");
  });

  it("cuts long content to the limit", () => {
    expect(truncateForInsight("abcdef", 4)).toBe("abcd");
  });

  it("never splits an emoji", () => {
    expect(truncateForInsight("ab🚀cd", 3)).toBe("ab🚀");
  });

  it("treats a non-positive limit as an empty excerpt", () => {
    expect(truncateForInsight("abcdef", -2)).toBe("");
  });
});

describe("buildInsightPrompt", () => {
  it("embeds the filename and excerpt and asks for JSON", () => {
    const prompt = buildInsightPrompt("resume.pdf", "Jane Doe, AI engineer");
    expect(prompt.split("\n")[0]).toBe('Analyze the following document content from file "resume.pdf":');
    expect(prompt).toContain("\nJane Doe, AI engineer\n");
    expect(prompt).toContain('"summary": "your summary here"');
  });
});
