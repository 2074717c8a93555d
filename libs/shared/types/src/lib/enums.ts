/**
 * Shared enums used across the entire application
 * Metrics engine, consultant service, HTTP API and MCP tools all reference these constants
 */

// ============================================================================
// Tool Names
// ============================================================================

export enum ToolName {
  CALCULATE_FINANCIAL_RATIOS = 'calculate_financial_ratios',
  CALCULATE_MARKETING_METRICS = 'calculate_marketing_metrics',
}

// ============================================================================
// Text Generation Providers
// ============================================================================

export enum LlmProvider {
  ANTHROPIC = 'anthropic',
  OPENAI = 'openai',
  GEMINI = 'gemini',
  DEEPSEEK = 'deepseek',
  OLLAMA = 'ollama',
}

/**
 * Model used when the configuration names a provider but no model
 */
export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  [LlmProvider.ANTHROPIC]: 'claude-haiku-4-5',
  [LlmProvider.OPENAI]: 'gpt-4o',
  [LlmProvider.GEMINI]: 'gemini-2.5-flash',
  [LlmProvider.DEEPSEEK]: 'deepseek-chat',
  [LlmProvider.OLLAMA]: 'mistral',
};

const LLM_PROVIDERS: ReadonlyArray<string> = Object.values(LlmProvider);

export const isLlmProvider = (value: string): value is LlmProvider =>
  LLM_PROVIDERS.includes(value);

// ============================================================================
// Report Roles
// ============================================================================

export enum ReportRole {
  CFO = 'cfo',
  CMO = 'cmo',
  CEO = 'ceo',
}

// ============================================================================
// Unit Economics
// ============================================================================

export enum UnitEconomicsStatus {
  HEALTHY = 'Healthy',
  NEEDS_OPTIMIZATION = 'Needs Optimization',
}

/** LTV:CAC at or above this ratio is considered healthy */
export const HEALTHY_LTV_CAC_RATIO = 3;

export const DAYS_PER_YEAR = 365;

// ============================================================================
// Analysis Stages (progress events)
// ============================================================================

export enum AnalysisStage {
  FINANCIAL_METRICS = 'financial_metrics',
  FINANCIAL_REPORT = 'financial_report',
  MARKETING_METRICS = 'marketing_metrics',
  MARKETING_REPORT = 'marketing_report',
  CEO_REPORT = 'ceo_report',
}

// ============================================================================
// SSE Stream Event Types
// ============================================================================

export enum StreamEventType {
  CONNECTED = 'connected',
  STAGE = 'stage',
  COMPLETE = 'complete',
  ERROR = 'error',
}

// ============================================================================
// Event Names (for EventEmitter)
// ============================================================================

export const ANALYSIS_EVENT_PREFIX = 'analysis';

export const createEventName = (runId: string): string => {
  return `${ANALYSIS_EVENT_PREFIX}.${runId}`;
};
