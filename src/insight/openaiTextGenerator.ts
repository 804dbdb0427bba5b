import OpenAI from "openai";
import { InsightGenerationError } from "../core/errors";
import type { TextGenerationRequest, TextGenerator } from "./types";

export interface OpenAiTextGeneratorOptions {
  apiKey?: string;
  timeoutMs: number;
}

export class OpenAiTextGenerator implements TextGenerator {
  private readonly options: OpenAiTextGeneratorOptions;
  private client?: OpenAI;

  constructor(options: OpenAiTextGeneratorOptions) {
    this.options = options;
  }

  async generate(request: TextGenerationRequest): Promise<string> {
    const client = this.getClient();
    const resp = await client.chat.completions.create({
      model: request.model,
      messages: [{ role: "user", content: request.prompt }],
      temperature: request.temperature,
    });

    const text = resp.choices?.[0]?.message?.content;
    if (!text) {
      throw new InsightGenerationError("Empty completion from text generation service");
    }
    return text;
  }

  private getClient(): OpenAI {
    if (!this.options.apiKey) {
      throw new InsightGenerationError("Missing env var: OPENAI_API_KEY");
    }
    this.client ??= new OpenAI({
      apiKey: this.options.apiKey,
      timeout: this.options.timeoutMs,
      maxRetries: 1,
    });
    return this.client;
  }
}
