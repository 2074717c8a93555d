export * from './lib/mcp-server';
