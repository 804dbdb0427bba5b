import { describe, expect, it, vi } from "vitest";
import { InsightGenerationError } from "../core/errors";
import { FakeTextGenerator, newMetrics, quietLogger } from "../testing/fixtures";
import { InsightGenerator, parseInsightResponse } from "./insightGenerator";
import type { InsightGeneratorOptions } from "./insightGenerator";
import type { TextGenerator } from "./types";

const OPTIONS: InsightGeneratorOptions = {
  enabled: true,
  model: "gpt-4o-mini",
  temperature: 0.3,
  maxChars: 3000,
};

function generatorWith(generator: TextGenerator, options: Partial<InsightGeneratorOptions> = {}) {
  const metrics = newMetrics();
  const insights = new InsightGenerator({
    generator,
    options: { ...OPTIONS, ...options },
    logger: quietLogger(),
    metrics,
  });
  return { insights, metrics };
}

describe("InsightGenerator", () => {
  it("returns the summary and keywords from a JSON reply", async () => {
    const fake = new FakeTextGenerator('{"summary":"An AI engineer resume.","keywords":["ai","teaching"]}');
    const { insights, metrics } = generatorWith(fake);

    const insight = await insights.generate("Resume text", "resume.txt");

    expect(insight).toEqual({ summary: "An AI engineer resume.", keywords: ["ai", "teaching"] });
    expect(metrics.getCounters().insights_generated).toBe(1);
    expect(fake.requests[0].model).toBe("gpt-4o-mini");
    expect(fake.requests[0].temperature).toBe(0.3);
    expect(fake.requests[0].prompt).toContain('from file "resume.txt"');
  });

  it("sends only the first maxChars characters", async () => {
    const fake = new FakeTextGenerator('{"summary":"s","keywords":[]}');
    const { insights } = generatorWith(fake);

    await insights.generate("x".repeat(5000), "long.txt");

    expect(fake.requests[0].prompt).toContain("x".repeat(3000));
    expect(fake.requests[0].prompt).not.toContain("x".repeat(3001));
  });

  it("falls back to the filename placeholder on a malformed reply", async () => {
    const { insights, metrics } = generatorWith(new FakeTextGenerator("Here is your summary!"));

    const insight = await insights.generate("Resume text", "resume.txt");

    expect(insight).toEqual({ summary: "Document: resume.txt", keywords: [] });
    expect(metrics.getCounters().insights_fallback).toBe(1);
  });

  it("falls back when the service call rejects", async () => {
    const failing = new FakeTextGenerator(async () => {
      throw new Error("connect ECONNREFUSED");
    });
    const { insights } = generatorWith(failing);

    await expect(insights.generate("text", "notes.md")).resolves.toEqual({ summary: "Document: notes.md", keywords: [] });
  });

  it("falls back when keywords are not a list of strings", async () => {
    const { insights } = generatorWith(new FakeTextGenerator('{"summary":"ok","keywords":"ai, ml"}'));
    await expect(insights.generate("text", "a.md")).resolves.toEqual({ summary: "Document: a.md", keywords: [] });
  });

  it("does not call the service when disabled", async () => {
    const generate = vi.fn(async () => '{"summary":"s","keywords":[]}');
    const { insights } = generatorWith({ generate }, { enabled: false });

    const insight = await insights.generate("text", "a.json");

    expect(insight).toEqual({ summary: "Document: a.json", keywords: [] });
    expect(generate).not.toHaveBeenCalled();
  });
});

describe("parseInsightResponse", () => {
  it("tolerates surrounding whitespace", () => {
    expect(parseInsightResponse('\n {"summary":"s","keywords":["k"]} \n')).toEqual({ summary: "s", keywords: ["k"] });
  });

  it("rejects a non-object root", () => {
    expect(() => parseInsightResponse("[1, 2]")).toThrow(InsightGenerationError);
  });

  it("rejects a missing summary", () => {
    expect(() => parseInsightResponse('{"keywords":[]}')).toThrow("Insight response has no string summary");
  });
});
