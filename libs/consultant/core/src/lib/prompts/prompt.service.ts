import { Injectable, Logger } from '@nestjs/common';
import {
  FinancialMetricsReport,
  MarketingMetricsReport,
  NarrativeReport,
  ReportRole,
} from '@business-consultant/shared/types';
import {
  buildCeoPrompt,
  buildFinancialPrompt,
  buildMarketingPrompt,
} from './report-prompts';

@Injectable()
export class PromptService {
  private readonly logger = new Logger(PromptService.name);

  buildFinancialPrompt(report: FinancialMetricsReport): string {
    return this.trace(ReportRole.CFO, buildFinancialPrompt(report));
  }

  buildMarketingPrompt(report: MarketingMetricsReport): string {
    return this.trace(ReportRole.CMO, buildMarketingPrompt(report));
  }

  buildCeoPrompt(
    financialNarrative: NarrativeReport,
    marketingNarrative: NarrativeReport
  ): string {
    return this.trace(ReportRole.CEO, buildCeoPrompt(financialNarrative, marketingNarrative));
  }

  private trace(role: ReportRole, prompt: string): string {
    this.logger.debug(
      `Built ${role} prompt (${prompt.length} chars): ${prompt.substring(0, 100)}...`
    );
    return prompt;
  }
}
