export interface TextGenerationRequest {
  model: string;
  prompt: string;
  temperature: number;
}

/** Anything that can turn a prompt into completion text. */
export interface TextGenerator {
  generate(request: TextGenerationRequest): Promise<string>;
}
