import { Body, Controller, HttpCode, Logger, Post } from '@nestjs/common';
import { BusinessAnalysisService } from '@business-consultant/consultant/core';
import {
  FinancialMetricsRequest,
  FinancialMetricsResponse,
  MarketingMetricsRequest,
  MarketingMetricsResponse,
} from './dto/analysis.dto';
import { toHttpException } from './http-errors';

/**
 * Metrics Controller - raw metrics without narrative generation
 *
 * POST /api/metrics/financial
 * POST /api/metrics/marketing
 *
 * Both accept the flat input record and return the report plus its markdown
 * summary. No text-generation backend is contacted.
 */
@Controller('api/metrics')
export class MetricsController {
  private readonly logger = new Logger(MetricsController.name);

  constructor(private analysisService: BusinessAnalysisService) {}

  @Post('financial')
  @HttpCode(200)
  computeFinancial(@Body() body: FinancialMetricsRequest): FinancialMetricsResponse {
    try {
      const metrics = this.analysisService.computeFinancialMetrics(body);
      return { metrics, summary: this.analysisService.formatFinancialMetrics(metrics) };
    } catch (error) {
      this.logger.warn(`Financial metrics rejected: ${this.describe(error)}`);
      throw toHttpException(error);
    }
  }

  @Post('marketing')
  @HttpCode(200)
  computeMarketing(@Body() body: MarketingMetricsRequest): MarketingMetricsResponse {
    try {
      const metrics = this.analysisService.computeMarketingMetrics(body);
      return { metrics, summary: this.analysisService.formatMarketingMetrics(metrics) };
    } catch (error) {
      this.logger.warn(`Marketing metrics rejected: ${this.describe(error)}`);
      throw toHttpException(error);
    }
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
  }
}
