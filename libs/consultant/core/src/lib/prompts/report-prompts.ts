/**
 * Report Prompts
 *
 * Role-specific analysis requests sent to the text-generation backend.
 * Builders only serialize and interpolate; they never recompute a metric.
 */

import {
  FinancialMetricsReport,
  MarketingMetricsReport,
  NarrativeReport,
} from '@business-consultant/shared/types';

/**
 * Pretty-printed JSON; key order follows the report's construction order
 */
export const serializeReport = (
  report: FinancialMetricsReport | MarketingMetricsReport
): string => JSON.stringify(report, null, 2);

export function buildFinancialPrompt(report: FinancialMetricsReport): string {
  return `You are a Senior Strategic Business Consultant and Fractional CFO. I am going to provide you with a JSON object containing the financial ratios of my business.

Your Task:

Executive Summary: Give me a 3-sentence 'vibe check' on the company's health.

The Red Flags: Identify any ratios that suggest liquidity, solvency, or efficiency risks.

The Green Flags: What are we doing exceptionally well?

Operational Advice: Based on the 'Operational' and 'DuPont' sections, give me 3 actionable steps to improve profitability or cash flow.

Benchmark Comparison: Compare these to standard healthy industry benchmarks (assume a general mid-market manufacturing/retail context).

The Data: ${serializeReport(report)}`;
}

export function buildMarketingPrompt(report: MarketingMetricsReport): string {
  return `You are a data-driven Chief Marketing Officer (CMO) with a background in Growth Engineering and Unit Economics.

Task: Analyze the provided Marketing & Customer Acquisition data and provide a high-level strategic evaluation.

Please structure your response as follows:

The Efficiency Score: On a scale of 1-10, how healthy is this growth engine? (Base this heavily on the LTV:CAC and Payback Period).

Growth vs. Burn: Are we spending too much to acquire customers, or are we being too conservative?

The Leaking Bucket Check: Analyze the Churn and Retention metrics. Is our growth sustainable, or are we losing customers too fast to keep the "bucket" full?

CMO Recommendations: Provide 3 specific strategies to either:
- Optimize CAC (if the payback period is too long).
- Increase LTV (if the margin or retention is low).
- Scale Spend (if the LTV:CAC is >3 and we should be "pouring gas on the fire").

Financial Alignment: Briefly explain how these marketing metrics will impact the company's "Bottom Line" Net Income over the next 6 months.

The Data for Analysis: ${serializeReport(report)}`;
}

export function buildCeoPrompt(
  financialNarrative: NarrativeReport,
  marketingNarrative: NarrativeReport
): string {
  return `You are the CEO of a high-growth company. You are presiding over a board meeting with your CFO and CMO.

The Objective: Synthesize the Financial Report and the Marketing Report to determine the company's "True North." You need to identify if the growth strategy is sustainable or if the company is at risk.

Analysis Requirements:

The Alignment Audit: Is the Marketing department spending cash at a rate that the Balance Sheet can support? Point out any friction between Marketing Spend and Net Income/Cash Reserves.

Unit Economics vs. Overhead: The CMO reports on LTV/CAC (unit level), but the CFO reports on OpEx (company level). Are we "profitable on a unit basis" but "losing money on a GAAP basis"? Explain what this means for our runway.

The "Growth-Profitability" Seesaw: Should we:
- Aggressive Growth: Pour more cash into marketing because the LTV/CAC and ROE justify it?
- Operational Efficiency: Freeze marketing spend and focus on fixing the "clogged" inventory/assets identified by the CFO?
- Capital Raise: Is our current trajectory going to require a debt or equity raise in the next 6-12 months?

CEO Directive: Give 3 high-level directives. These should be "Orders" to your CFO and CMO to get them in sync.

CFO DATA (Financials): ${financialNarrative}

CMO DATA (Marketing): ${marketingNarrative}`;
}
