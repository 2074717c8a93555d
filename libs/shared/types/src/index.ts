export * from './lib/enums';
export * from './lib/metrics.types';
export * from './lib/stream-events.types';
