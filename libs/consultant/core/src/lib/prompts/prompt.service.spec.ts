import { Test, TestingModule } from '@nestjs/testing';
import {
  MarketingMetricsReport,
  UnitEconomicsStatus,
} from '@business-consultant/shared/types';
import { PromptService } from './prompt.service';
import { buildCeoPrompt, buildMarketingPrompt } from './report-prompts';

describe('PromptService', () => {
  let service: PromptService;

  const report: MarketingMetricsReport = {
    Acquisition: { CAC: 0, Marketing_Spend_Pct: '0.0%', Marketing_Efficiency_Ratio: 0 },
    Retention_and_Value: {
      Retention_Rate: '100.0%',
      Churn_Rate: '0.0%',
      Net_Revenue_Retention: '0.0%',
      LTV: 0,
    },
    Unit_Economics: {
      LTV_CAC_Ratio: 0,
      Payback_Period_Months: 0,
      Status: UnitEconomicsStatus.NEEDS_OPTIMIZATION,
    },
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [PromptService],
    }).compile();

    service = module.get<PromptService>(PromptService);
  });

  it('should return the template output unchanged', () => {
    expect(service.buildMarketingPrompt(report)).toBe(buildMarketingPrompt(report));
    expect(service.buildCeoPrompt('fin', 'mkt')).toBe(buildCeoPrompt('fin', 'mkt'));
  });

  it('should log a preview of each prompt', () => {
    const logSpy = jest.spyOn(service['logger'], 'debug');

    service.buildCeoPrompt('fin', 'mkt');

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('Built ceo prompt'));
  });
});
