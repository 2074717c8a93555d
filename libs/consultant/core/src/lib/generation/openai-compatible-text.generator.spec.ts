const mockCreate = jest.fn();
const mockOpenAI = jest.fn().mockImplementation(() => ({
  chat: { completions: { create: mockCreate } },
}));

jest.mock('openai', () => ({
  __esModule: true,
  default: Object.assign(mockOpenAI, {
    APIError: class APIError extends Error {
      constructor(
        readonly status: number | undefined,
        _error: unknown,
        message: string | undefined
      ) {
        super(message);
      }
    },
  }),
}));

import OpenAI from 'openai';
import { LlmProvider } from '@business-consultant/shared/types';
import { OpenAICompatibleTextGenerator } from './openai-compatible-text.generator';
import { GenerationError } from './generation.error';

describe('OpenAICompatibleTextGenerator', () => {
  let generator: OpenAICompatibleTextGenerator;

  beforeEach(() => {
    mockCreate.mockReset();
    generator = new OpenAICompatibleTextGenerator(
      LlmProvider.DEEPSEEK,
      'test-secret',
      'deepseek-chat',
      'https://api.deepseek.com'
    );
  });

  it('should configure the client with key and base URL', () => {
    expect(mockOpenAI).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'https://api.deepseek.com',
    });
  });

  it('should send the prompt as a single user message', async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: 'Growth is efficient.' } }],
      usage: { prompt_tokens: 900, completion_tokens: 120 },
    });

    const text = await generator.generate('Evaluate marketing');

    expect(text).toBe('Growth is efficient.');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'deepseek-chat',
      messages: [{ role: 'user', content: 'Evaluate marketing' }],
      temperature: 0.7,
    });
  });

  it('should include the HTTP status of API errors', async () => {
    const failure = new OpenAI.APIError(429, undefined, 'quota exceeded', undefined);
    mockCreate.mockRejectedValue(failure);

    const error = await generator.generate('prompt').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toHaveProperty('message', 'deepseek request failed (429): quota exceeded');
    expect(error).toHaveProperty('provider', 'deepseek');
    expect(error).toHaveProperty('cause', failure);
  });

  it('should wrap network failures', async () => {
    mockCreate.mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));

    const promise = generator.generate('prompt');

    await expect(promise).rejects.toBeInstanceOf(GenerationError);
    await expect(promise).rejects.toThrow('deepseek request failed: getaddrinfo ENOTFOUND');
  });

  it('should reject an empty completion', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });

    await expect(generator.generate('prompt')).rejects.toThrow(
      'deepseek returned an empty response'
    );
  });
});
