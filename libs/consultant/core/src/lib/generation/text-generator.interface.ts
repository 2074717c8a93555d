import { LlmProvider } from '@business-consultant/shared/types';

/**
 * Text-generation capability consumed by the analysis pipeline.
 * Implementations reject with GenerationError when no text can be produced.
 */
export interface TextGenerator {
  readonly provider: LlmProvider;
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export interface TextGeneratorConfig {
  provider: LlmProvider | string;
  apiKey?: string;
  model?: string;
  /** Override for the backend endpoint (OpenAI-compatible base URL or Ollama host) */
  baseUrl?: string;
}

/** Injection token for the configured TextGenerator */
export const TEXT_GENERATOR = 'TEXT_GENERATOR';
