import {
  DAYS_PER_YEAR,
  FinancialMetricsReport,
  RawFinancialInputs,
} from '@business-consultant/shared/types';
import {
  findNonFiniteValues,
  formatCurrency,
  roundTo,
  safeDivide,
} from '@business-consultant/shared/utils';
import { ComputationError } from '../errors';
import { FinancialInputsPayload, parseFinancialInputs } from '../input-schemas';

/**
 * Balance-sheet aggregates every ratio section builds on
 */
export interface BalanceSheetAggregates {
  currentAssets: number;
  totalAssets: number;
  currentLiabilities: number;
  netWorkingCapital: number;
}

export class FinancialAnalyzer {

  /**
   * Compute the full ratio report for one period.
   * Any ratio whose denominator is zero is reported as 0.
   */
  analyze(payload: FinancialInputsPayload): FinancialMetricsReport {
    const inputs = parseFinancialInputs(payload);
    const aggregates = this.computeAggregates(inputs);

    const report = this.buildReport(inputs, aggregates);

    const nonFinite = findNonFiniteValues(report);
    if (nonFinite.length > 0) {
      throw new ComputationError(
        `Ratio computation overflowed for: ${nonFinite.join(', ')}`,
        nonFinite
      );
    }

    return report;
  }

  computeAggregates(inputs: RawFinancialInputs): BalanceSheetAggregates {
    const currentAssets =
      inputs.cashEquivalents + inputs.accountsReceivable + inputs.inventory;
    const totalAssets =
      currentAssets + inputs.fixedAssetsPpe + inputs.intangibleAssets;
    const currentLiabilities = inputs.accountsPayable + inputs.accruedExpenses;

    return {
      currentAssets,
      totalAssets,
      currentLiabilities,
      netWorkingCapital: currentAssets - currentLiabilities,
    };
  }

  private buildReport(
    inputs: RawFinancialInputs,
    aggregates: BalanceSheetAggregates
  ): FinancialMetricsReport {
    const { currentAssets, totalAssets, currentLiabilities, netWorkingCapital } = aggregates;
    const {
      revenue,
      cogs,
      grossProfit,
      ebitda,
      ebit,
      interestExpense,
      netIncome,
      cashEquivalents,
      accountsReceivable,
      inventory,
      fixedAssetsPpe,
      longTermDebt,
      shareholdersEquity,
      stockPrice,
      sharesOutstanding,
    } = inputs;

    // Liquidity
    const currentRatio = safeDivide(currentAssets, currentLiabilities);
    const quickRatio = safeDivide(currentAssets - inventory, currentLiabilities);
    const cashRatio = safeDivide(cashEquivalents, currentLiabilities);
    const intervalMeasure = cogs ? currentAssets / (cogs / DAYS_PER_YEAR) : 0;

    // Solvency
    const totalDebtRatio = safeDivide(totalAssets - shareholdersEquity, totalAssets);
    const equityMultiplier = safeDivide(totalAssets, shareholdersEquity);
    const longTermDebtRatio = safeDivide(longTermDebt, longTermDebt + shareholdersEquity);
    const timesInterestEarned = safeDivide(ebit, interestExpense);
    const cashCoverage = safeDivide(ebitda, interestExpense);

    // Turnover
    const totalAssetTurnover = safeDivide(revenue, totalAssets);
    const nwcTurnover = safeDivide(revenue, netWorkingCapital);
    const fixedAssetTurnover = safeDivide(revenue, fixedAssetsPpe);

    // Profitability
    const grossMargin = safeDivide(grossProfit, revenue);
    const profitMargin = safeDivide(netIncome, revenue);
    const returnOnAssets = safeDivide(netIncome, totalAssets);
    const returnOnEquity = safeDivide(netIncome, shareholdersEquity);

    const dupontRoe = profitMargin * totalAssetTurnover * equityMultiplier;

    // Market
    const marketCap = stockPrice * sharesOutstanding;
    const priceEarnings =
      netIncome && sharesOutstanding ? stockPrice / (netIncome / sharesOutstanding) : 0;
    const marketToBook = safeDivide(marketCap, shareholdersEquity);
    const priceToSales = safeDivide(marketCap, revenue);
    const enterpriseValue = marketCap + longTermDebt - cashEquivalents;
    const evToEbitda = safeDivide(enterpriseValue, ebitda);

    // Operational
    const inventoryTurnover = safeDivide(cogs, inventory);
    const daysSalesInInventory = safeDivide(DAYS_PER_YEAR, inventoryTurnover);
    const receivablesTurnover = safeDivide(revenue, accountsReceivable);
    const daysSalesOutstanding = safeDivide(DAYS_PER_YEAR, receivablesTurnover);

    return {
      Liquidity: {
        Current: roundTo(currentRatio, 2),
        Quick: roundTo(quickRatio, 2),
        Cash: roundTo(cashRatio, 2),
        Interval: roundTo(intervalMeasure, 2),
      },
      Solvency: {
        'Debt Ratio': roundTo(totalDebtRatio, 2),
        Multiplier: roundTo(equityMultiplier, 2),
        LTD: roundTo(longTermDebtRatio, 2),
        TIE: roundTo(timesInterestEarned, 2),
        'Cash Coverage': roundTo(cashCoverage, 2),
      },
      Turnover: {
        'Total Asset': roundTo(totalAssetTurnover, 2),
        NWC: roundTo(nwcTurnover, 2),
        'Fixed Asset': roundTo(fixedAssetTurnover, 2),
      },
      Profitability: {
        'Gross Margin': roundTo(grossMargin, 4),
        'Profit Margin': roundTo(profitMargin, 4),
        ROA: roundTo(returnOnAssets, 4),
        ROE: roundTo(returnOnEquity, 4),
      },
      DuPont_Breakdown: {
        Profitability_Lever: roundTo(profitMargin, 4),
        Efficiency_Lever: roundTo(totalAssetTurnover, 2),
        Leverage_Lever: roundTo(equityMultiplier, 2),
        Calculated_ROE: roundTo(dupontRoe, 4),
      },
      Market: {
        'P/E': roundTo(priceEarnings, 2),
        'Market/Book': roundTo(marketToBook, 2),
        'Price/Sales': roundTo(priceToSales, 4),
        EV: roundTo(enterpriseValue, 2),
        EV_EBITDA: roundTo(evToEbitda, 2),
      },
      Operational: {
        Inv_Turnover: roundTo(inventoryTurnover, 2),
        DSI: roundTo(daysSalesInInventory, 2),
        Rec_Turnover: roundTo(receivablesTurnover, 2),
        DSO: roundTo(daysSalesOutstanding, 2),
      },
    };
  }

  /**
   * Format a ratio report for display
   */
  formatResults(report: FinancialMetricsReport): string {
    const x = (value: number) => `${value.toFixed(2)}x`;
    const pct = (value: number) => `${(value * 100).toFixed(2)}%`;
    const days = (value: number) => `${value.toFixed(1)} days`;

    return `
## Financial Ratio Analysis

### Liquidity
- **Current Ratio**: ${x(report.Liquidity.Current)}
- **Quick Ratio**: ${x(report.Liquidity.Quick)}
- **Cash Ratio**: ${x(report.Liquidity.Cash)}
- **Interval Measure**: ${days(report.Liquidity.Interval)}

### Solvency
- **Total Debt Ratio**: ${report.Solvency['Debt Ratio'].toFixed(2)}
- **Equity Multiplier**: ${x(report.Solvency.Multiplier)}
- **Long-Term Debt Ratio**: ${report.Solvency.LTD.toFixed(2)}
- **Times Interest Earned**: ${x(report.Solvency.TIE)}
- **Cash Coverage**: ${x(report.Solvency['Cash Coverage'])}

### Turnover
- **Total Asset Turnover**: ${x(report.Turnover['Total Asset'])}
- **NWC Turnover**: ${x(report.Turnover.NWC)}
- **Fixed Asset Turnover**: ${x(report.Turnover['Fixed Asset'])}

### Profitability
- **Gross Margin**: ${pct(report.Profitability['Gross Margin'])}
- **Profit Margin**: ${pct(report.Profitability['Profit Margin'])}
- **Return on Assets**: ${pct(report.Profitability.ROA)}
- **Return on Equity**: ${pct(report.Profitability.ROE)}

### DuPont Breakdown
${pct(report.DuPont_Breakdown.Profitability_Lever)} margin × ${x(report.DuPont_Breakdown.Efficiency_Lever)} turnover × ${x(report.DuPont_Breakdown.Leverage_Lever)} leverage = ${pct(report.DuPont_Breakdown.Calculated_ROE)} ROE

### Market
- **P/E**: ${x(report.Market['P/E'])}
- **Market-to-Book**: ${x(report.Market['Market/Book'])}
- **Price-to-Sales**: ${x(report.Market['Price/Sales'])}
- **Enterprise Value**: ${formatCurrency(report.Market.EV)}
- **EV/EBITDA**: ${x(report.Market.EV_EBITDA)}

### Operational
- **Inventory Turnover**: ${x(report.Operational.Inv_Turnover)} (${days(report.Operational.DSI)})
- **Receivables Turnover**: ${x(report.Operational.Rec_Turnover)} (${days(report.Operational.DSO)})
`;
  }
}
