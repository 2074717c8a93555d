import {
  FinancialMetricsReport,
  RawFinancialInputs,
} from '@business-consultant/shared/types';
import { findNonFiniteValues, roundTo } from '@business-consultant/shared/utils';
import { FinancialAnalyzer } from './financial-analyzer';
import { ComputationError } from '../errors';
import { parseFinancialInputs } from '../input-schemas';
import { SAMPLE_FINANCIAL_INPUTS } from '../../test-utils/sample-inputs';

type Section = keyof FinancialMetricsReport;

const readRatio = (report: FinancialMetricsReport, section: Section, key: string): unknown =>
  Object.entries(report[section]).find(([name]) => name === key)?.[1];

/** Deterministic pseudo-random generator so property checks are reproducible */
function createRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

function randomInputs(random: () => number): RawFinancialInputs {
  const value = (scale: number) => Math.round((random() - 0.2) * scale);
  return {
    revenue: value(5_000_000),
    cogs: value(2_000_000),
    grossProfit: value(3_000_000),
    salesAndMarketing: value(500_000),
    researchAndDevelopment: value(400_000),
    generalAndAdministrative: value(300_000),
    ebitda: value(1_000_000),
    depreciationAndAmortization: value(200_000),
    ebit: value(800_000),
    interestExpense: value(100_000),
    netIncome: value(600_000),
    cashEquivalents: value(700_000),
    accountsReceivable: value(400_000),
    inventory: value(500_000),
    fixedAssetsPpe: value(2_000_000),
    intangibleAssets: value(300_000),
    accountsPayable: value(300_000),
    accruedExpenses: value(100_000),
    longTermDebt: value(1_000_000),
    shareholdersEquity: value(2_000_000),
    stockPrice: Math.round(random() * 100),
    sharesOutstanding: Math.round(random() * 1_000_000),
  };
}

describe('FinancialAnalyzer', () => {
  let analyzer: FinancialAnalyzer;

  beforeEach(() => {
    analyzer = new FinancialAnalyzer();
  });

  describe('computeAggregates', () => {
    it('should derive current assets, total assets, current liabilities and NWC', () => {
      expect(analyzer.computeAggregates(SAMPLE_FINANCIAL_INPUTS)).toEqual({
        currentAssets: 525_000,
        totalAssets: 1_200_000,
        currentLiabilities: 85_000,
        netWorkingCapital: 440_000,
      });
    });
  });

  describe('analyze', () => {
    it('should compute the current ratio from derived current assets and liabilities', () => {
      const report = analyzer.analyze(SAMPLE_FINANCIAL_INPUTS);

      // (250000 + 95000 + 180000) / 85000
      expect(report.Liquidity.Current).toBe(6.18);
    });

    it('should round a ratio that lands exactly on a tie to the even cent', () => {
      const report = analyzer.analyze({
        ...SAMPLE_FINANCIAL_INPUTS,
        cashEquivalents: 49_000,
        accountsReceivable: 0,
        inventory: 0,
        accountsPayable: 8_000,
        accruedExpenses: 0,
      });

      // 49000 / 8000 = 6.125
      expect(report.Liquidity.Current).toBe(6.12);
      expect(report.Liquidity.Cash).toBe(6.12);
    });

    it('should compute every section of the report', () => {
      const report = analyzer.analyze(SAMPLE_FINANCIAL_INPUTS);

      expect(report).toEqual({
        Liquidity: { Current: 6.18, Quick: 4.06, Cash: 2.94, Interval: 456.25 },
        Solvency: {
          'Debt Ratio': 0.33,
          Multiplier: 1.5,
          LTD: 0.27,
          TIE: 9,
          'Cash Coverage': 10.5,
        },
        Turnover: { 'Total Asset': 1, NWC: 2.73, 'Fixed Asset': 2 },
        Profitability: {
          'Gross Margin': 0.65,
          'Profit Margin': 0.2,
          ROA: 0.2,
          ROE: 0.3,
        },
        DuPont_Breakdown: {
          Profitability_Lever: 0.2,
          Efficiency_Lever: 1,
          Leverage_Lever: 1.5,
          Calculated_ROE: 0.3,
        },
        Market: {
          'P/E': 10,
          'Market/Book': 3,
          'Price/Sales': 2,
          EV: 2_450_000,
          EV_EBITDA: 5.83,
        },
        Operational: {
          Inv_Turnover: 2.33,
          DSI: 156.43,
          Rec_Turnover: 12.63,
          DSO: 28.9,
        },
      });
    });

    it('should keep sections and keys in a fixed order', () => {
      const report = analyzer.analyze(SAMPLE_FINANCIAL_INPUTS);

      expect(Object.keys(report)).toEqual([
        'Liquidity',
        'Solvency',
        'Turnover',
        'Profitability',
        'DuPont_Breakdown',
        'Market',
        'Operational',
      ]);
      expect(Object.keys(report.Solvency)).toEqual([
        'Debt Ratio',
        'Multiplier',
        'LTD',
        'TIE',
        'Cash Coverage',
      ]);
    });

    it('should default stock price to 0 and shares outstanding to 1', () => {
      const { stockPrice, sharesOutstanding, ...withoutMarketData } = SAMPLE_FINANCIAL_INPUTS;

      const report = analyzer.analyze(withoutMarketData);

      expect(report.Market).toEqual({
        'P/E': 0,
        'Market/Book': 0,
        'Price/Sales': 0,
        EV: 50_000,
        EV_EBITDA: 0.12,
      });
      expect(stockPrice).toBe(24);
      expect(sharesOutstanding).toBe(100_000);
    });

    it('should report every ratio as 0 when all inputs are zero', () => {
      const zeros = parseFinancialInputs(
        Object.fromEntries(Object.keys(SAMPLE_FINANCIAL_INPUTS).map((key) => [key, 0]))
      );

      const report = analyzer.analyze(zeros);

      for (const section of Object.values(report)) {
        for (const value of Object.values(section)) {
          expect(value).toBe(0);
        }
      }
    });
  });

  describe('zero-denominator fallback', () => {
    const cases: Array<[string, Partial<RawFinancialInputs>, Section, string]> = [
      ['current ratio / current liabilities', { accountsPayable: 0, accruedExpenses: 0 }, 'Liquidity', 'Current'],
      ['quick ratio / current liabilities', { accountsPayable: 0, accruedExpenses: 0 }, 'Liquidity', 'Quick'],
      ['cash ratio / current liabilities', { accountsPayable: 0, accruedExpenses: 0 }, 'Liquidity', 'Cash'],
      ['interval measure / COGS', { cogs: 0 }, 'Liquidity', 'Interval'],
      [
        'debt ratio / total assets',
        { cashEquivalents: 0, accountsReceivable: 0, inventory: 0, fixedAssetsPpe: 0, intangibleAssets: 0 },
        'Solvency',
        'Debt Ratio',
      ],
      ['equity multiplier / equity', { shareholdersEquity: 0 }, 'Solvency', 'Multiplier'],
      ['long-term debt ratio / debt + equity', { shareholdersEquity: -300_000 }, 'Solvency', 'LTD'],
      ['times interest earned / interest', { interestExpense: 0 }, 'Solvency', 'TIE'],
      ['cash coverage / interest', { interestExpense: 0 }, 'Solvency', 'Cash Coverage'],
      [
        'total asset turnover / total assets',
        { cashEquivalents: 0, accountsReceivable: 0, inventory: 0, fixedAssetsPpe: 0, intangibleAssets: 0 },
        'Turnover',
        'Total Asset',
      ],
      ['NWC turnover / net working capital', { accountsPayable: 500_000 }, 'Turnover', 'NWC'],
      ['fixed asset turnover / fixed assets', { fixedAssetsPpe: 0 }, 'Turnover', 'Fixed Asset'],
      ['gross margin / revenue', { revenue: 0 }, 'Profitability', 'Gross Margin'],
      ['profit margin / revenue', { revenue: 0 }, 'Profitability', 'Profit Margin'],
      [
        'return on assets / total assets',
        { cashEquivalents: 0, accountsReceivable: 0, inventory: 0, fixedAssetsPpe: 0, intangibleAssets: 0 },
        'Profitability',
        'ROA',
      ],
      ['return on equity / equity', { shareholdersEquity: 0 }, 'Profitability', 'ROE'],
      ['leverage lever / equity', { shareholdersEquity: 0 }, 'DuPont_Breakdown', 'Leverage_Lever'],
      ['calculated ROE / equity', { shareholdersEquity: 0 }, 'DuPont_Breakdown', 'Calculated_ROE'],
      ['P/E / net income', { netIncome: 0 }, 'Market', 'P/E'],
      ['P/E / shares outstanding', { sharesOutstanding: 0 }, 'Market', 'P/E'],
      ['market-to-book / equity', { shareholdersEquity: 0 }, 'Market', 'Market/Book'],
      ['price-to-sales / revenue', { revenue: 0 }, 'Market', 'Price/Sales'],
      ['EV/EBITDA / EBITDA', { ebitda: 0 }, 'Market', 'EV_EBITDA'],
      ['inventory turnover / inventory', { inventory: 0 }, 'Operational', 'Inv_Turnover'],
      ['days sales in inventory / inventory turnover', { inventory: 0 }, 'Operational', 'DSI'],
      ['receivables turnover / receivables', { accountsReceivable: 0 }, 'Operational', 'Rec_Turnover'],
      ['days sales outstanding / receivables turnover', { accountsReceivable: 0 }, 'Operational', 'DSO'],
    ];

    it.each(cases)('should report %s as exactly 0', (_label, overrides, section, key) => {
      const report = analyzer.analyze({ ...SAMPLE_FINANCIAL_INPUTS, ...overrides });

      expect(readRatio(report, section, key)).toBe(0);
    });

    it('should still compute EV without a guard', () => {
      const report = analyzer.analyze({ ...SAMPLE_FINANCIAL_INPUTS, ebitda: 0 });

      expect(report.Market.EV).toBe(2_450_000);
    });
  });

  describe('properties', () => {
    const random = createRandom(42);
    const samples = Array.from({ length: 200 }, () => randomInputs(random));

    it('should only produce finite leaf values', () => {
      for (const inputs of samples) {
        expect(findNonFiniteValues(analyzer.analyze(inputs))).toEqual([]);
      }
    });

    it('should satisfy the DuPont identity by construction', () => {
      for (const inputs of samples) {
        const { totalAssets } = analyzer.computeAggregates(inputs);
        const profitMargin = inputs.revenue ? inputs.netIncome / inputs.revenue : 0;
        const assetTurnover = totalAssets ? inputs.revenue / totalAssets : 0;
        const equityMultiplier = inputs.shareholdersEquity
          ? totalAssets / inputs.shareholdersEquity
          : 0;

        const report = analyzer.analyze(inputs);

        expect(report.DuPont_Breakdown.Calculated_ROE).toBe(
          roundTo(profitMargin * assetTurnover * equityMultiplier, 4)
        );
      }
    });

    it('should match ROE whenever all three levers are defined', () => {
      for (const inputs of samples) {
        const { totalAssets } = analyzer.computeAggregates(inputs);
        if (!inputs.revenue || !totalAssets || !inputs.shareholdersEquity) {
          continue;
        }

        const report = analyzer.analyze(inputs);

        expect(report.DuPont_Breakdown.Calculated_ROE).toBeCloseTo(report.Profitability.ROE, 3);
      }
    });
  });

  describe('input validation', () => {
    it('should reject non-numeric fields before computing', () => {
      const payload = JSON.parse(JSON.stringify({ ...SAMPLE_FINANCIAL_INPUTS, revenue: 'lots' }));

      expect(() => analyzer.analyze(payload)).toThrow(ComputationError);
    });

    it('should raise when a ratio overflows', () => {
      expect(() =>
        analyzer.analyze({
          ...SAMPLE_FINANCIAL_INPUTS,
          ebit: Number.MAX_VALUE,
          interestExpense: 1e-10,
        })
      ).toThrow(/Solvency\.TIE/);
    });
  });

  describe('formatResults', () => {
    it('should render the headline ratios', () => {
      const output = analyzer.formatResults(analyzer.analyze(SAMPLE_FINANCIAL_INPUTS));

      expect(output).toContain('- **Current Ratio**: 6.18x');
      expect(output).toContain('- **Enterprise Value**: $2,450,000');
      expect(output).toContain('20.00% margin × 1.00x turnover × 1.50x leverage = 30.00% ROE');
      expect(output).toContain('- **Receivables Turnover**: 12.63x (28.9 days)');
    });
  });
});
