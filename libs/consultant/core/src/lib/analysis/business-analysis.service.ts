/**
 * BusinessAnalysisService
 *
 * Runs the metrics → prompt → narrative pipeline:
 * - Financial and marketing entry points each produce metrics plus one narrative
 * - The full run feeds both narratives into the CEO synthesis
 * - Metrics-only entry points never touch the text-generation backend
 *
 * Every stage runs strictly in sequence. Errors from the backend are rethrown
 * unchanged and stop the remaining stages; nothing partial is returned.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomUUID } from 'crypto';
import {
  AnalysisStage,
  BusinessAnalysisResult,
  FinancialAnalysisResult,
  FinancialMetricsReport,
  MarketingAnalysisResult,
  MarketingMetricsReport,
  StreamEventPayload,
  StreamEventType,
  createEventName,
} from '@business-consultant/shared/types';
import {
  FinancialAnalyzer,
  FinancialInputsPayload,
  MarketingAnalyzer,
  MarketingInputsPayload,
} from '@business-consultant/metrics/core';
import { PromptService } from '../prompts/prompt.service';
import { TEXT_GENERATOR, TextGenerator } from '../generation/text-generator.interface';

@Injectable()
export class BusinessAnalysisService {
  private readonly logger = new Logger(BusinessAnalysisService.name);
  private readonly financialAnalyzer = new FinancialAnalyzer();
  private readonly marketingAnalyzer = new MarketingAnalyzer();

  constructor(
    @Inject(TEXT_GENERATOR) private textGenerator: TextGenerator,
    private promptService: PromptService,
    private eventEmitter: EventEmitter2
  ) {}

  computeFinancialMetrics(inputs: FinancialInputsPayload): FinancialMetricsReport {
    return this.financialAnalyzer.analyze(inputs);
  }

  computeMarketingMetrics(inputs: MarketingInputsPayload): MarketingMetricsReport {
    return this.marketingAnalyzer.analyze(inputs);
  }

  formatFinancialMetrics(report: FinancialMetricsReport): string {
    return this.financialAnalyzer.formatResults(report);
  }

  formatMarketingMetrics(report: MarketingMetricsReport): string {
    return this.marketingAnalyzer.formatResults(report);
  }

  async analyzeFinancials(inputs: FinancialInputsPayload): Promise<FinancialAnalysisResult> {
    const metrics = this.computeFinancialMetrics(inputs);
    const report = await this.textGenerator.generate(
      this.promptService.buildFinancialPrompt(metrics)
    );
    return { metrics, report };
  }

  async analyzeMarketing(inputs: MarketingInputsPayload): Promise<MarketingAnalysisResult> {
    const metrics = this.computeMarketingMetrics(inputs);
    const report = await this.textGenerator.generate(
      this.promptService.buildMarketingPrompt(metrics)
    );
    return { metrics, report };
  }

  /**
   * Full analysis: CFO report, CMO report, then the CEO synthesis of both.
   * Progress is emitted on `analysis.<runId>` for stream subscribers.
   */
  async analyzeBusiness(
    financialInputs: FinancialInputsPayload,
    marketingInputs: MarketingInputsPayload,
    runId: string = randomUUID()
  ): Promise<BusinessAnalysisResult> {
    const startTime = Date.now();
    let stage = AnalysisStage.FINANCIAL_METRICS;

    this.logger.log(
      `[${runId}] Starting business analysis with ${this.textGenerator.provider}/${this.textGenerator.model}`
    );

    const announce = (status: 'started' | 'completed') =>
      this.emit({
        type: StreamEventType.STAGE,
        runId,
        stage,
        status,
        timestamp: new Date().toISOString(),
      });

    const runStage = async <T>(next: AnalysisStage, work: () => T | Promise<T>): Promise<T> => {
      stage = next;
      announce('started');
      const output = await work();
      announce('completed');
      return output;
    };

    try {
      const financialMetrics = await runStage(AnalysisStage.FINANCIAL_METRICS, () =>
        this.computeFinancialMetrics(financialInputs)
      );
      const financialReport = await runStage(AnalysisStage.FINANCIAL_REPORT, () =>
        this.textGenerator.generate(this.promptService.buildFinancialPrompt(financialMetrics))
      );
      const marketingMetrics = await runStage(AnalysisStage.MARKETING_METRICS, () =>
        this.computeMarketingMetrics(marketingInputs)
      );
      const marketingReport = await runStage(AnalysisStage.MARKETING_REPORT, () =>
        this.textGenerator.generate(this.promptService.buildMarketingPrompt(marketingMetrics))
      );
      const ceoReport = await runStage(AnalysisStage.CEO_REPORT, () =>
        this.textGenerator.generate(
          this.promptService.buildCeoPrompt(financialReport, marketingReport)
        )
      );

      const result: BusinessAnalysisResult = {
        financialMetrics,
        financialReport,
        marketingMetrics,
        marketingReport,
        ceoReport,
      };
      const duration = Date.now() - startTime;

      this.emit({
        type: StreamEventType.COMPLETE,
        runId,
        result,
        duration,
        timestamp: new Date().toISOString(),
      });
      this.logger.log(`[${runId}] Business analysis complete (${duration}ms)`);

      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`[${runId}] Business analysis failed during ${stage}: ${message}`);

      this.emit({
        type: StreamEventType.ERROR,
        runId,
        stage,
        errorName: error instanceof Error ? error.name : 'Error',
        message,
        timestamp: new Date().toISOString(),
      });

      throw error;
    }
  }

  private emit(payload: StreamEventPayload): void {
    this.eventEmitter.emit(createEventName(payload.runId), payload);
  }
}
