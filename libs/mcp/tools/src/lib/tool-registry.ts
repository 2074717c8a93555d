import { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  RawFinancialInputs,
  RawMarketingInputs,
  ToolName,
} from '@business-consultant/shared/types';
import {
  FinancialAnalyzer,
  MarketingAnalyzer,
  parseFinancialInputs,
  parseMarketingInputs,
} from '@business-consultant/metrics/core';

/**
 * Tool Registry for MCP Tools
 *
 * Exposes the metrics engine to MCP clients. Both tools are pure
 * computations: no text-generation backend is involved, so an assistant
 * can calculate the ratios and write its own commentary.
 */

type FieldDescriptions<T> = Record<keyof T, string>;

const FINANCIAL_FIELDS: FieldDescriptions<RawFinancialInputs> = {
  revenue: 'Total revenue for the period (USD)',
  cogs: 'Cost of goods sold',
  grossProfit: 'Revenue minus COGS',
  salesAndMarketing: 'Sales and marketing expense',
  researchAndDevelopment: 'Research and development expense',
  generalAndAdministrative: 'General and administrative expense',
  ebitda: 'Earnings before interest, taxes, depreciation and amortization',
  depreciationAndAmortization: 'Depreciation and amortization',
  ebit: 'Operating income',
  interestExpense: 'Interest expense',
  netIncome: 'Net income',
  cashEquivalents: 'Cash and cash equivalents',
  accountsReceivable: 'Accounts receivable',
  inventory: 'Inventory',
  fixedAssetsPpe: 'Property, plant and equipment (net)',
  intangibleAssets: 'Intangible assets',
  accountsPayable: 'Accounts payable',
  accruedExpenses: 'Accrued expenses',
  longTermDebt: 'Long-term debt',
  shareholdersEquity: "Shareholders' equity",
  stockPrice: 'Optional: share price (defaults to 0)',
  sharesOutstanding: 'Optional: shares outstanding (defaults to 1)',
};

const OPTIONAL_FINANCIAL_FIELDS: ReadonlyArray<keyof RawFinancialInputs> = [
  'stockPrice',
  'sharesOutstanding',
];

const MARKETING_FIELDS: FieldDescriptions<RawMarketingInputs> = {
  revenue: 'Total revenue for the period (USD)',
  marketingSpend: 'Marketing spend for the period',
  newCustomersAcquired: 'Customers acquired during the period',
  totalCustomersStartPeriod: 'Customers at the start of the period',
  totalCustomersEndPeriod: 'Customers at the end of the period',
  avgRevenuePerUserMonthly: 'Average monthly revenue per customer',
  grossMarginPct: 'Gross margin as a fraction (e.g., 0.65 for 65%)',
  expansionRevenue: 'Upsell / expansion revenue from existing customers',
};

function objectSchema<T>(
  fields: FieldDescriptions<T>,
  optional: ReadonlyArray<keyof T> = []
): Tool['inputSchema'] {
  const names = Object.keys(fields).filter((name): name is Extract<keyof T, string> =>
    Object.prototype.hasOwnProperty.call(fields, name)
  );

  return {
    type: 'object',
    properties: Object.fromEntries(
      names.map((name) => [name, { type: 'number', description: fields[name] }])
    ),
    required: names.filter((name) => !optional.includes(name)),
  };
}

function textResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

export class ToolRegistry {
  constructor(
    private financialAnalyzer: FinancialAnalyzer,
    private marketingAnalyzer: MarketingAnalyzer
  ) {}

  /**
   * Get all available tools as MCP Tool definitions
   */
  getTools(): Tool[] {
    return [
      {
        name: ToolName.CALCULATE_FINANCIAL_RATIOS,
        description: `Calculate the CFO ratio set from one period of income-statement and balance-sheet figures.

Returns liquidity, solvency, turnover, profitability, market-value and DuPont ratios,
plus a markdown summary. Any ratio whose denominator is zero is reported as 0.`,
        inputSchema: objectSchema(FINANCIAL_FIELDS, OPTIONAL_FINANCIAL_FIELDS),
      },
      {
        name: ToolName.CALCULATE_MARKETING_METRICS,
        description: `Calculate marketing unit economics for one period.

Returns CAC, marketing spend share, efficiency ratio, retention, churn, net revenue
retention, LTV, LTV:CAC, payback period and a Healthy / Needs Optimization status.`,
        inputSchema: objectSchema(MARKETING_FIELDS),
      },
    ];
  }

  /**
   * Execute a tool by name with given arguments
   */
  async executeTool(name: string, args: unknown): Promise<CallToolResult> {
    switch (name) {
      case ToolName.CALCULATE_FINANCIAL_RATIOS:
        return this.handleCalculateFinancialRatios(args);
      case ToolName.CALCULATE_MARKETING_METRICS:
        return this.handleCalculateMarketingMetrics(args);
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  // Invalid arguments raise ComputationError
  private handleCalculateFinancialRatios(args: unknown): CallToolResult {
    const metrics = this.financialAnalyzer.analyze(parseFinancialInputs(args));
    return textResult({
      metrics,
      formattedAnalysis: this.financialAnalyzer.formatResults(metrics),
    });
  }

  private handleCalculateMarketingMetrics(args: unknown): CallToolResult {
    const metrics = this.marketingAnalyzer.analyze(parseMarketingInputs(args));
    return textResult({
      metrics,
      formattedAnalysis: this.marketingAnalyzer.formatResults(metrics),
    });
  }
}

/**
 * Factory function to create the tool registry used by the MCP server
 */
export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry(new FinancialAnalyzer(), new MarketingAnalyzer());
}
