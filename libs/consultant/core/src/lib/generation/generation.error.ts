import { LlmProvider } from '@business-consultant/shared/types';

/**
 * Raised by a text-generation backend that could not produce a result:
 * unreachable service, rejected credentials, exhausted quota, or
 * unusable configuration. Callers receive it unchanged.
 */
export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly provider?: LlmProvider | string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export const describeCause = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
