import {
  DEFAULT_MODELS,
  LlmProvider,
  isLlmProvider,
} from '@business-consultant/shared/types';
import { TextGenerator, TextGeneratorConfig } from './text-generator.interface';
import { GenerationError } from './generation.error';
import { AnthropicTextGenerator } from './anthropic-text.generator';
import { OpenAICompatibleTextGenerator } from './openai-compatible-text.generator';
import { OllamaTextGenerator, DEFAULT_OLLAMA_HOST } from './ollama-text.generator';

export const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';
export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

/**
 * Build the backend named by the configuration.
 * Constructed once by the caller; nothing here reads the environment.
 */
export function createTextGenerator(config: TextGeneratorConfig): TextGenerator {
  const provider = config.provider.toLowerCase();

  if (!isLlmProvider(provider)) {
    throw new GenerationError(`Unknown LLM provider: ${config.provider}`, config.provider);
  }

  const model = config.model || DEFAULT_MODELS[provider];

  if (provider === LlmProvider.OLLAMA) {
    return new OllamaTextGenerator(model, config.baseUrl || DEFAULT_OLLAMA_HOST);
  }

  const apiKey = config.apiKey;
  if (!apiKey) {
    throw new GenerationError(`An API key is required for provider ${provider}`, provider);
  }

  switch (provider) {
    case LlmProvider.ANTHROPIC:
      return new AnthropicTextGenerator(apiKey, model);
    case LlmProvider.OPENAI:
      return new OpenAICompatibleTextGenerator(provider, apiKey, model, config.baseUrl);
    case LlmProvider.DEEPSEEK:
      return new OpenAICompatibleTextGenerator(
        provider,
        apiKey,
        model,
        config.baseUrl || DEEPSEEK_BASE_URL
      );
    case LlmProvider.GEMINI:
      return new OpenAICompatibleTextGenerator(
        provider,
        apiKey,
        model,
        config.baseUrl || GEMINI_OPENAI_BASE_URL
      );
  }
}
