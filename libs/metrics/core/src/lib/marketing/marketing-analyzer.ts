import {
  HEALTHY_LTV_CAC_RATIO,
  MarketingMetricsReport,
  RawMarketingInputs,
  UnitEconomicsStatus,
} from '@business-consultant/shared/types';
import { findNonFiniteValues, formatPercent, roundTo } from '@business-consultant/shared/utils';
import { ComputationError } from '../errors';
import { MarketingInputsPayload, parseMarketingInputs } from '../input-schemas';

/**
 * Unrounded unit economics, before formatting into the report
 */
export interface CohortEconomics {
  cac: number;
  lostCustomers: number;
  churnRate: number;
  retentionRate: number;
  netRevenueRetention: number;
  ltv: number;
  ltvCacRatio: number;
  paybackPeriodMonths: number;
  marketingEfficiencyRatio: number;
  marketingSpendPct: number;
}

export class MarketingAnalyzer {

  /**
   * Compute acquisition, retention and unit-economics metrics for one cohort.
   * Churn and retention are not clamped to [0, 1]: a cohort that grew beyond
   * tracked acquisitions reports negative churn.
   */
  analyze(payload: MarketingInputsPayload): MarketingMetricsReport {
    const inputs = parseMarketingInputs(payload);
    const economics = this.computeEconomics(inputs);

    // checked before formatting: percentages would otherwise render "Infinity%"
    const nonFinite = findNonFiniteValues(economics);
    if (nonFinite.length > 0) {
      throw new ComputationError(
        `Ratio computation overflowed for: ${nonFinite.join(', ')}`,
        nonFinite
      );
    }

    return {
      Acquisition: {
        CAC: roundTo(economics.cac, 2),
        Marketing_Spend_Pct: formatPercent(economics.marketingSpendPct),
        Marketing_Efficiency_Ratio: roundTo(economics.marketingEfficiencyRatio, 2),
      },
      Retention_and_Value: {
        Retention_Rate: formatPercent(economics.retentionRate),
        Churn_Rate: formatPercent(economics.churnRate),
        Net_Revenue_Retention: formatPercent(economics.netRevenueRetention),
        LTV: roundTo(economics.ltv, 2),
      },
      Unit_Economics: {
        LTV_CAC_Ratio: roundTo(economics.ltvCacRatio, 2),
        Payback_Period_Months: roundTo(economics.paybackPeriodMonths, 1),
        Status: this.classify(economics.ltvCacRatio),
      },
    };
  }

  computeEconomics(inputs: RawMarketingInputs): CohortEconomics {
    const {
      revenue,
      marketingSpend,
      newCustomersAcquired,
      totalCustomersStartPeriod,
      totalCustomersEndPeriod,
      avgRevenuePerUserMonthly,
      grossMarginPct,
      expansionRevenue,
    } = inputs;

    const cac = newCustomersAcquired > 0 ? marketingSpend / newCustomersAcquired : 0;

    const lostCustomers =
      totalCustomersStartPeriod + newCustomersAcquired - totalCustomersEndPeriod;
    const churnRate =
      totalCustomersStartPeriod > 0 ? lostCustomers / totalCustomersStartPeriod : 0;
    const retentionRate = 1 - churnRate;

    const startingRevenue = totalCustomersStartPeriod * avgRevenuePerUserMonthly;
    const netRevenueRetention =
      startingRevenue > 0
        ? (startingRevenue + expansionRevenue - lostCustomers * avgRevenuePerUserMonthly) /
          startingRevenue
        : 0;

    const monthlyGrossProfitPerUser = avgRevenuePerUserMonthly * grossMarginPct;

    // zero churn means an unbounded lifetime; reported as 0
    const ltv = churnRate > 0 ? monthlyGrossProfitPerUser / churnRate : 0;
    const ltvCacRatio = cac > 0 ? ltv / cac : 0;
    const paybackPeriodMonths =
      avgRevenuePerUserMonthly > 0 && grossMarginPct > 0 ? cac / monthlyGrossProfitPerUser : 0;

    const marketingEfficiencyRatio = marketingSpend > 0 ? revenue / marketingSpend : 0;
    const marketingSpendPct = revenue > 0 ? marketingSpend / revenue : 0;

    return {
      cac,
      lostCustomers,
      churnRate,
      retentionRate,
      netRevenueRetention,
      ltv,
      ltvCacRatio,
      paybackPeriodMonths,
      marketingEfficiencyRatio,
      marketingSpendPct,
    };
  }

  classify(ltvCacRatio: number): UnitEconomicsStatus {
    return ltvCacRatio >= HEALTHY_LTV_CAC_RATIO
      ? UnitEconomicsStatus.HEALTHY
      : UnitEconomicsStatus.NEEDS_OPTIMIZATION;
  }

  formatResults(report: MarketingMetricsReport): string {
    const { Acquisition, Retention_and_Value, Unit_Economics } = report;

    return `
## Marketing Unit Economics

### Acquisition
- **CAC**: $${Acquisition.CAC.toFixed(2)}
- **Marketing Spend (% of Revenue)**: ${Acquisition.Marketing_Spend_Pct}
- **Marketing Efficiency Ratio**: ${Acquisition.Marketing_Efficiency_Ratio.toFixed(2)}x

### Retention & Value
- **Retention Rate**: ${Retention_and_Value.Retention_Rate}
- **Churn Rate**: ${Retention_and_Value.Churn_Rate}
- **Net Revenue Retention**: ${Retention_and_Value.Net_Revenue_Retention}
- **LTV**: $${Retention_and_Value.LTV.toFixed(2)}

### Unit Economics
- **LTV:CAC**: ${Unit_Economics.LTV_CAC_Ratio.toFixed(2)}
- **Payback Period**: ${Unit_Economics.Payback_Period_Months.toFixed(1)} months
- **Status**: ${Unit_Economics.Status}
`;
  }
}
