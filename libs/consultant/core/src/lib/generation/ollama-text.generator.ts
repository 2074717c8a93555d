import axios, { AxiosInstance, isAxiosError } from 'axios';
import { LlmProvider } from '@business-consultant/shared/types';
import { TextGenerator } from './text-generator.interface';
import { GenerationError, describeCause } from './generation.error';

interface OllamaGenerateResponse {
  model: string;
  response: string;
  done: boolean;
}

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/**
 * Local models served by Ollama's HTTP API
 */
export class OllamaTextGenerator implements TextGenerator {
  readonly provider = LlmProvider.OLLAMA;
  private readonly client: AxiosInstance;

  constructor(
    readonly model: string,
    host: string = DEFAULT_OLLAMA_HOST
  ) {
    this.client = axios.create({
      baseURL: host,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  async generate(prompt: string): Promise<string> {
    let text: string;

    try {
      const response = await this.client.post<OllamaGenerateResponse>('/api/generate', {
        model: this.model,
        prompt,
        stream: false,
      });
      text = response.data.response;
    } catch (error) {
      const detail =
        isAxiosError(error) && error.response
          ? `HTTP ${error.response.status}`
          : describeCause(error);
      throw new GenerationError(`Ollama request failed: ${detail}`, this.provider, {
        cause: error,
      });
    }

    if (!text) {
      throw new GenerationError('Ollama returned an empty response', this.provider);
    }
    return text;
  }
}
