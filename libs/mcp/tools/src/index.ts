export * from './lib/tool-registry';
