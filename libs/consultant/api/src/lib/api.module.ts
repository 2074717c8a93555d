import { Module } from '@nestjs/common';
import { ConsultantModule } from '@business-consultant/consultant/core';
import { AnalysisController } from './analysis.controller';
import { MetricsController } from './metrics.controller';

@Module({
  imports: [ConsultantModule],
  controllers: [MetricsController, AnalysisController],
})
export class ApiModule {}
