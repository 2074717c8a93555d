export * from './lib/errors';
export * from './lib/input-schemas';
export * from './lib/financial/financial-analyzer';
export * from './lib/marketing/marketing-analyzer';
