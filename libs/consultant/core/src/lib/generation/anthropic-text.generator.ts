import { Logger } from '@nestjs/common';
import { query } from '@anthropic-ai/claude-agent-sdk';
import { LlmProvider } from '@business-consultant/shared/types';
import { TextGenerator } from './text-generator.interface';
import { GenerationError, describeCause } from './generation.error';

/**
 * Claude backend through the Agent SDK.
 * Runs a single turn with no tools: the prompt already carries all data.
 */
export class AnthropicTextGenerator implements TextGenerator {
  readonly provider = LlmProvider.ANTHROPIC;
  private readonly logger = new Logger(AnthropicTextGenerator.name);

  constructor(
    private readonly apiKey: string,
    readonly model: string
  ) {}

  /** Environment for the SDK's child process, carrying this backend's key */
  private processEnv(): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [name, value] of Object.entries(process.env)) {
      if (value !== undefined) {
        env[name] = value;
      }
    }
    env['ANTHROPIC_API_KEY'] = this.apiKey;
    return env;
  }

  async generate(prompt: string): Promise<string> {
    let text = '';

    try {
      const stream = query({
        prompt,
        options: {
          model: this.model,
          maxTurns: 1,
          allowedTools: [],
          permissionMode: 'bypassPermissions',
          env: this.processEnv(),
        },
      });

      for await (const message of stream) {
        this.logger.debug(`Message type: ${message.type}`);

        if (message.type === 'assistant' && message.message.usage) {
          const { input_tokens, output_tokens } = message.message.usage;
          this.logger.debug(`Tokens: ${input_tokens} in + ${output_tokens} out`);
        }

        if (message.type === 'result') {
          if (message.subtype !== 'success' || message.is_error) {
            throw new GenerationError(
              `Claude query ended with ${message.subtype}`,
              this.provider
            );
          }
          text = message.result;
        }
      }
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      throw new GenerationError(
        `Anthropic request failed: ${describeCause(error)}`,
        this.provider,
        { cause: error }
      );
    }

    if (!text) {
      throw new GenerationError('Anthropic returned an empty response', this.provider);
    }
    return text;
  }
}
