export * from './lib/consultant.module';
export * from './lib/config/llm.config';
export * from './lib/prompts/report-prompts';
export * from './lib/prompts/prompt.service';
export * from './lib/generation/generation.error';
export * from './lib/generation/text-generator.interface';
export * from './lib/generation/text-generator.factory';
export * from './lib/generation/anthropic-text.generator';
export * from './lib/generation/openai-compatible-text.generator';
export * from './lib/generation/ollama-text.generator';
export * from './lib/analysis/business-analysis.service';
export * from './lib/stream/analysis-stream.service';
