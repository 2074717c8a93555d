export * from './lib/numeric';
