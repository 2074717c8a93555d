import {
  FinancialInputsPayload,
  MarketingInputsPayload,
} from '@business-consultant/metrics/core';
import {
  FinancialMetricsReport,
  MarketingMetricsReport,
} from '@business-consultant/shared/types';

/**
 * REST API request/response types
 * NOTE: SSE progress event types live in @business-consultant/shared/types
 * (StreamEventPayload, StageEvent, CompleteEvent, ErrorEvent)
 */

export type FinancialMetricsRequest = FinancialInputsPayload;
export type MarketingMetricsRequest = MarketingInputsPayload;

export interface BusinessAnalysisRequest {
  runId?: string; // Optional caller-chosen id for correlating stream events
  financial: FinancialInputsPayload;
  marketing: MarketingInputsPayload;
}

export interface FinancialMetricsResponse {
  metrics: FinancialMetricsReport;
  summary: string; // Markdown rendering of the metrics
}

export interface MarketingMetricsResponse {
  metrics: MarketingMetricsReport;
  summary: string;
}
