import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { llmConfig } from './config/llm.config';
import { PromptService } from './prompts/prompt.service';
import { BusinessAnalysisService } from './analysis/business-analysis.service';
import { AnalysisStreamService } from './stream/analysis-stream.service';
import { TEXT_GENERATOR } from './generation/text-generator.interface';
import { createTextGenerator } from './generation/text-generator.factory';

@Module({
  imports: [
    ConfigModule.forFeature(llmConfig),
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),
  ],
  providers: [
    {
      provide: TEXT_GENERATOR,
      inject: [llmConfig.KEY],
      useFactory: (config: ConfigType<typeof llmConfig>) => createTextGenerator(config),
    },
    PromptService,
    BusinessAnalysisService,
    AnalysisStreamService,
  ],
  exports: [TEXT_GENERATOR, PromptService, BusinessAnalysisService, AnalysisStreamService],
})
export class ConsultantModule {}
