/**
 * Metrics Types
 * Raw business inputs and the ratio reports derived from them
 */

import { UnitEconomicsStatus } from './enums';

// ============================================================================
// Raw Inputs
// ============================================================================

/**
 * Income-statement and balance-sheet line items for one period.
 * Zero is a valid value for every field.
 */
export interface RawFinancialInputs {
  // Income statement
  revenue: number;
  cogs: number;
  grossProfit: number;
  salesAndMarketing: number;
  researchAndDevelopment: number;
  generalAndAdministrative: number;
  ebitda: number;
  depreciationAndAmortization: number;
  ebit: number;
  interestExpense: number;
  netIncome: number;

  // Balance sheet
  cashEquivalents: number;
  accountsReceivable: number;
  inventory: number;
  fixedAssetsPpe: number;
  intangibleAssets: number;
  accountsPayable: number;
  accruedExpenses: number;
  longTermDebt: number;
  shareholdersEquity: number;

  // Market data
  stockPrice: number;          // defaults to 0
  sharesOutstanding: number;   // defaults to 1
}

/**
 * Customer cohort and spend figures for one period
 */
export interface RawMarketingInputs {
  revenue: number;
  marketingSpend: number;
  newCustomersAcquired: number;
  totalCustomersStartPeriod: number;
  totalCustomersEndPeriod: number;
  avgRevenuePerUserMonthly: number;
  grossMarginPct: number;      // fraction, e.g. 0.65
  expansionRevenue: number;
}

// ============================================================================
// Financial Metrics Report
// ============================================================================

export interface LiquidityRatios {
  Current: number;
  Quick: number;
  Cash: number;
  Interval: number;
}

export interface SolvencyRatios {
  'Debt Ratio': number;
  Multiplier: number;
  LTD: number;
  TIE: number;
  'Cash Coverage': number;
}

export interface TurnoverRatios {
  'Total Asset': number;
  NWC: number;
  'Fixed Asset': number;
}

export interface ProfitabilityRatios {
  'Gross Margin': number;
  'Profit Margin': number;
  ROA: number;
  ROE: number;
}

export interface DuPontBreakdown {
  Profitability_Lever: number;
  Efficiency_Lever: number;
  Leverage_Lever: number;
  Calculated_ROE: number;
}

export interface MarketRatios {
  'P/E': number;
  'Market/Book': number;
  'Price/Sales': number;
  EV: number;
  EV_EBITDA: number;
}

export interface OperationalRatios {
  Inv_Turnover: number;
  DSI: number;
  Rec_Turnover: number;
  DSO: number;
}

export interface FinancialMetricsReport {
  Liquidity: LiquidityRatios;
  Solvency: SolvencyRatios;
  Turnover: TurnoverRatios;
  Profitability: ProfitabilityRatios;
  DuPont_Breakdown: DuPontBreakdown;
  Market: MarketRatios;
  Operational: OperationalRatios;
}

// ============================================================================
// Marketing Metrics Report
// ============================================================================

export interface AcquisitionMetrics {
  CAC: number;
  Marketing_Spend_Pct: string;
  Marketing_Efficiency_Ratio: number;
}

export interface RetentionAndValueMetrics {
  Retention_Rate: string;
  Churn_Rate: string;
  Net_Revenue_Retention: string;
  LTV: number;
}

export interface UnitEconomicsMetrics {
  LTV_CAC_Ratio: number;
  Payback_Period_Months: number;
  Status: UnitEconomicsStatus;
}

export interface MarketingMetricsReport {
  Acquisition: AcquisitionMetrics;
  Retention_and_Value: RetentionAndValueMetrics;
  Unit_Economics: UnitEconomicsMetrics;
}

// ============================================================================
// Analysis Results
// ============================================================================

/** Narrative text returned by the text-generation backend */
export type NarrativeReport = string;

export interface FinancialAnalysisResult {
  metrics: FinancialMetricsReport;
  report: NarrativeReport;
}

export interface MarketingAnalysisResult {
  metrics: MarketingMetricsReport;
  report: NarrativeReport;
}

export interface BusinessAnalysisResult {
  financialMetrics: FinancialMetricsReport;
  financialReport: NarrativeReport;
  marketingMetrics: MarketingMetricsReport;
  marketingReport: NarrativeReport;
  ceoReport: NarrativeReport;
}
