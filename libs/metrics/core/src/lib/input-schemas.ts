import { z } from 'zod';
import { RawFinancialInputs, RawMarketingInputs } from '@business-consultant/shared/types';
import { ComputationError } from './errors';

const amount = () => z.number().finite();

export const RawFinancialInputsSchema = z.object({
  revenue: amount(),
  cogs: amount(),
  grossProfit: amount(),
  salesAndMarketing: amount(),
  researchAndDevelopment: amount(),
  generalAndAdministrative: amount(),
  ebitda: amount(),
  depreciationAndAmortization: amount(),
  ebit: amount(),
  interestExpense: amount(),
  netIncome: amount(),
  cashEquivalents: amount(),
  accountsReceivable: amount(),
  inventory: amount(),
  fixedAssetsPpe: amount(),
  intangibleAssets: amount(),
  accountsPayable: amount(),
  accruedExpenses: amount(),
  longTermDebt: amount(),
  shareholdersEquity: amount(),
  stockPrice: amount().default(0),
  sharesOutstanding: amount().default(1),
});

export const RawMarketingInputsSchema = z.object({
  revenue: amount(),
  marketingSpend: amount(),
  newCustomersAcquired: amount(),
  totalCustomersStartPeriod: amount(),
  totalCustomersEndPeriod: amount(),
  avgRevenuePerUserMonthly: amount(),
  grossMarginPct: amount(),
  expansionRevenue: amount(),
});

/** Financial inputs as a caller may send them (market data optional) */
export type FinancialInputsPayload = z.input<typeof RawFinancialInputsSchema>;
export type MarketingInputsPayload = z.input<typeof RawMarketingInputsSchema>;

function describeIssues(error: z.ZodError): { message: string; fields: string[] } {
  const fields = error.issues.map((issue) => issue.path.join('.') || '(root)');
  const details = error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return { message: details, fields };
}

export function parseFinancialInputs(payload: unknown): RawFinancialInputs {
  const parsed = RawFinancialInputsSchema.safeParse(payload);
  if (!parsed.success) {
    const { message, fields } = describeIssues(parsed.error);
    throw new ComputationError(`Invalid financial inputs: ${message}`, fields);
  }
  return parsed.data;
}

export function parseMarketingInputs(payload: unknown): RawMarketingInputs {
  const parsed = RawMarketingInputsSchema.safeParse(payload);
  if (!parsed.success) {
    const { message, fields } = describeIssues(parsed.error);
    throw new ComputationError(`Invalid marketing inputs: ${message}`, fields);
  }
  return parsed.data;
}
