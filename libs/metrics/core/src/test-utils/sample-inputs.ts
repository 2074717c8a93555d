/**
 * Sample raw inputs for a mid-market company, shared by tests
 */

import { RawFinancialInputs, RawMarketingInputs } from '@business-consultant/shared/types';

export const SAMPLE_FINANCIAL_INPUTS: RawFinancialInputs = {
  revenue: 1_200_000,
  cogs: 420_000,
  grossProfit: 780_000,
  salesAndMarketing: 150_000,
  researchAndDevelopment: 90_000,
  generalAndAdministrative: 120_000,
  ebitda: 420_000,
  depreciationAndAmortization: 60_000,
  ebit: 360_000,
  interestExpense: 40_000,
  netIncome: 240_000,
  cashEquivalents: 250_000,
  accountsReceivable: 95_000,
  inventory: 180_000,
  fixedAssetsPpe: 600_000,
  intangibleAssets: 75_000,
  accountsPayable: 60_000,
  accruedExpenses: 25_000,
  longTermDebt: 300_000,
  shareholdersEquity: 800_000,
  stockPrice: 24,
  sharesOutstanding: 100_000,
};

export const SAMPLE_MARKETING_INPUTS: RawMarketingInputs = {
  revenue: 1_200_000,
  marketingSpend: 75_000,
  newCustomersAcquired: 300,
  totalCustomersStartPeriod: 2_000,
  totalCustomersEndPeriod: 2_200,
  avgRevenuePerUserMonthly: 100,
  grossMarginPct: 0.5,
  expansionRevenue: 20_000,
};
