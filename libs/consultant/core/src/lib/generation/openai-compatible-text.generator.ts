import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import { LlmProvider } from '@business-consultant/shared/types';
import { TextGenerator } from './text-generator.interface';
import { GenerationError, describeCause } from './generation.error';

/**
 * Chat-completions backend. Serves OpenAI itself and every provider that
 * exposes an OpenAI-compatible endpoint (DeepSeek, Gemini).
 */
export class OpenAICompatibleTextGenerator implements TextGenerator {
  private readonly logger = new Logger(OpenAICompatibleTextGenerator.name);
  private readonly client: OpenAI;

  constructor(
    readonly provider: LlmProvider,
    apiKey: string,
    readonly model: string,
    baseURL?: string
  ) {
    this.client = new OpenAI({ apiKey, baseURL });
  }

  async generate(prompt: string): Promise<string> {
    let content: string | null | undefined;

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0.7,
      });

      if (response.usage) {
        this.logger.debug(
          `[${this.provider}] Tokens: ${response.usage.prompt_tokens} in + ${response.usage.completion_tokens} out`
        );
      }
      content = response.choices[0]?.message?.content;
    } catch (error) {
      const status = error instanceof OpenAI.APIError && error.status ? ` (${error.status})` : '';
      throw new GenerationError(
        `${this.provider} request failed${status}: ${describeCause(error)}`,
        this.provider,
        { cause: error }
      );
    }

    if (!content) {
      throw new GenerationError(`${this.provider} returned an empty response`, this.provider);
    }
    return content;
  }
}
