import { registerAs } from '@nestjs/config';
import { LlmProvider, isLlmProvider } from '@business-consultant/shared/types';
import { TextGeneratorConfig } from '../generation/text-generator.interface';

type Environment = Record<string, string | undefined>;

const API_KEY_VARIABLES: Record<LlmProvider, string[]> = {
  [LlmProvider.ANTHROPIC]: ['ANTHROPIC_API_KEY'],
  [LlmProvider.OPENAI]: ['OPENAI_API_KEY'],
  [LlmProvider.GEMINI]: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
  [LlmProvider.DEEPSEEK]: ['DEEPSEEK_API_KEY'],
  [LlmProvider.OLLAMA]: [],
};

/**
 * Resolve the text-generation backend settings from an environment map.
 * LLM_API_KEY overrides the provider-specific key variables.
 */
export function resolveTextGeneratorConfig(env: Environment): TextGeneratorConfig {
  const provider = (env['LLM_PROVIDER'] || LlmProvider.GEMINI).toLowerCase();
  const keyVariables = isLlmProvider(provider) ? API_KEY_VARIABLES[provider] : [];

  const apiKey =
    env['LLM_API_KEY'] || keyVariables.map((name) => env[name]).find((value) => !!value);

  return {
    provider,
    apiKey,
    model: env['LLM_MODEL'] || undefined,
    baseUrl:
      env['LLM_BASE_URL'] || (provider === LlmProvider.OLLAMA ? env['OLLAMA_HOST'] : undefined),
  };
}

export const llmConfig = registerAs('llm', () => resolveTextGeneratorConfig(process.env));
