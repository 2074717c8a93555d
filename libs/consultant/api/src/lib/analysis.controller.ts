import { Body, Controller, HttpCode, Logger, Post, Req, Res } from '@nestjs/common';
import { Request, Response } from 'express';
import { randomUUID } from 'crypto';
import {
  AnalysisStreamService,
  BusinessAnalysisService,
} from '@business-consultant/consultant/core';
import {
  BusinessAnalysisResult,
  ConnectedEvent,
  FinancialAnalysisResult,
  MarketingAnalysisResult,
  StreamEventType,
} from '@business-consultant/shared/types';
import {
  BusinessAnalysisRequest,
  FinancialMetricsRequest,
  MarketingMetricsRequest,
} from './dto/analysis.dto';
import { toHttpException } from './http-errors';

/**
 * Analysis Controller - metrics plus generated narratives
 *
 * - POST /api/analysis/financial  → CFO report
 * - POST /api/analysis/marketing  → CMO report
 * - POST /api/analysis/business   → CFO, CMO and CEO reports
 * - POST /api/analysis/business/stream → same run, progress streamed via SSE
 *
 * Each run makes its backend calls strictly one after another; a failure
 * ends the request without a partial result.
 */
@Controller('api/analysis')
export class AnalysisController {
  private readonly logger = new Logger(AnalysisController.name);

  constructor(
    private analysisService: BusinessAnalysisService,
    private streamService: AnalysisStreamService
  ) {}

  @Post('financial')
  @HttpCode(200)
  async analyzeFinancials(@Body() body: FinancialMetricsRequest): Promise<FinancialAnalysisResult> {
    try {
      return await this.analysisService.analyzeFinancials(body);
    } catch (error) {
      this.logger.error(`Financial analysis failed: ${this.describe(error)}`);
      throw toHttpException(error);
    }
  }

  @Post('marketing')
  @HttpCode(200)
  async analyzeMarketing(@Body() body: MarketingMetricsRequest): Promise<MarketingAnalysisResult> {
    try {
      return await this.analysisService.analyzeMarketing(body);
    } catch (error) {
      this.logger.error(`Marketing analysis failed: ${this.describe(error)}`);
      throw toHttpException(error);
    }
  }

  @Post('business')
  @HttpCode(200)
  async analyzeBusiness(@Body() body: BusinessAnalysisRequest): Promise<BusinessAnalysisResult> {
    try {
      return await this.analysisService.analyzeBusiness(
        body.financial,
        body.marketing,
        body.runId || randomUUID()
      );
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * Business analysis with SSE progress.
   *
   * Example request:
   * POST /api/analysis/business/stream
   * Headers: Accept: text/event-stream
   * Body: { "financial": { "revenue": 1200000, ... }, "marketing": { ... } }
   *
   * Response: SSE stream with events (connected, stage, complete, error).
   * The `complete` event carries the full result.
   */
  @Post('business/stream')
  async streamBusinessAnalysis(
    @Body() body: BusinessAnalysisRequest,
    @Req() req: Request,
    @Res() res: Response
  ): Promise<void> {
    const runId = body.runId || randomUUID();

    this.logger.log(`[${runId}] Starting business analysis with SSE streaming`);

    // Status must be 200 (not 201) for EventSource compatibility
    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');

    this.streamService.registerStream(runId, res);

    const connected: ConnectedEvent = {
      type: StreamEventType.CONNECTED,
      runId,
      timestamp: new Date().toISOString(),
    };
    res.write(`data: ${JSON.stringify(connected)}\n\n`);

    // Stage, complete and error events reach the client through the stream service
    this.analysisService
      .analyzeBusiness(body.financial, body.marketing, runId)
      .then(() => {
        this.logger.log(`[${runId}] Streamed analysis delivered`);
      })
      .catch((error) => {
        this.logger.error(`[${runId}] Streamed analysis failed: ${this.describe(error)}`);
        this.streamService.closeStream(runId);
      });

    req.on('close', () => {
      this.logger.log(`[${runId}] Client disconnected`);
      this.streamService.closeStream(runId);
    });
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
  }
}
