import { describeError, InsightGenerationError } from "../core/errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { DocumentInsight } from "../types";
import { buildInsightPrompt, truncateForInsight } from "./prompt";
import type { TextGenerator } from "./types";

export interface InsightGeneratorOptions {
  enabled: boolean;
  model: string;
  temperature: number;
  maxChars: number;
}

interface InsightGeneratorDeps {
  generator: TextGenerator;
  options: InsightGeneratorOptions;
  logger: Logger;
  metrics: MetricsRegistry;
}

type InsightOutcome = { ok: true; insight: DocumentInsight } | { ok: false; error: string };

export function fallbackInsight(filename: string): DocumentInsight {
  return { summary: `Document: ${filename}`, keywords: [] };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

export function parseInsightResponse(text: string): DocumentInsight {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.trim());
  } catch (error) {
    throw new InsightGenerationError("Insight response is not valid JSON", error);
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new InsightGenerationError("Insight response is not a JSON object");
  }
  if (!("summary" in parsed) || typeof parsed.summary !== "string") {
    throw new InsightGenerationError("Insight response has no string summary");
  }
  if (!("keywords" in parsed) || !isStringArray(parsed.keywords)) {
    throw new InsightGenerationError("Insight response has no keyword list");
  }
  return { summary: parsed.summary, keywords: parsed.keywords };
}

/**
 * Best-effort summary and keywords for a document. `generate` never rejects: every
 * failure is logged and replaced by the filename placeholder.
 */
export class InsightGenerator {
  private readonly deps: InsightGeneratorDeps;

  constructor(deps: InsightGeneratorDeps) {
    this.deps = deps;
  }

  async generate(content: string, filename: string): Promise<DocumentInsight> {
    if (!this.deps.options.enabled) {
      this.deps.metrics.incrementCounter("insights_fallback");
      this.deps.logger.debug("insight_skipped", { filename });
      return fallbackInsight(filename);
    }

    const outcome = await this.attempt(content, filename);
    if (outcome.ok) {
      this.deps.metrics.incrementCounter("insights_generated");
      return outcome.insight;
    }

    this.deps.metrics.incrementCounter("insights_fallback");
    this.deps.logger.warn("insight_fallback", { filename, error: outcome.error });
    return fallbackInsight(filename);
  }

  private async attempt(content: string, filename: string): Promise<InsightOutcome> {
    const { generator, options, metrics } = this.deps;
    const stopTimer = metrics.startTimer("insight_ms");
    try {
      const excerpt = truncateForInsight(content, options.maxChars);
      const text = await generator.generate({
        model: options.model,
        prompt: buildInsightPrompt(filename, excerpt),
        temperature: options.temperature,
      });
      return { ok: true, insight: parseInsightResponse(text) };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    } finally {
      stopTimer();
    }
  }
}
