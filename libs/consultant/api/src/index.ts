export * from './lib/api.module';
export * from './lib/analysis.controller';
export * from './lib/metrics.controller';
export * from './lib/http-errors';
export * from './lib/dto/analysis.dto';
