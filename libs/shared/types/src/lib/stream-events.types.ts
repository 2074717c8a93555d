/**
 * Stream Event Payload Types
 * Shared between BusinessAnalysisService, the SSE stream registry and API clients
 */

import { AnalysisStage, StreamEventType } from './enums';
import { BusinessAnalysisResult } from './metrics.types';

// ============================================================================
// Base Event Properties
// ============================================================================

interface BaseEvent {
  runId: string;
  timestamp: string;
}

// ============================================================================
// Connection Events
// ============================================================================

export interface ConnectedEvent extends BaseEvent {
  type: StreamEventType.CONNECTED;
}

// ============================================================================
// Stage Events
// ============================================================================

export interface StageEvent extends BaseEvent {
  type: StreamEventType.STAGE;
  stage: AnalysisStage;
  status: 'started' | 'completed';
}

// ============================================================================
// Completion Events
// ============================================================================

export interface CompleteEvent extends BaseEvent {
  type: StreamEventType.COMPLETE;
  result: BusinessAnalysisResult;
  duration: number;
}

// ============================================================================
// Error Events
// ============================================================================

export interface ErrorEvent extends BaseEvent {
  type: StreamEventType.ERROR;
  stage?: AnalysisStage;
  errorName: string;
  message: string;
}

// ============================================================================
// Union Type for All Stream Event Payloads
// ============================================================================

export type StreamEventPayload =
  | ConnectedEvent
  | StageEvent
  | CompleteEvent
  | ErrorEvent;

// ============================================================================
// Type Guards
// ============================================================================

export function isCompleteEvent(event: StreamEventPayload): event is CompleteEvent {
  return event.type === StreamEventType.COMPLETE;
}

export function isErrorEvent(event: StreamEventPayload): event is ErrorEvent {
  return event.type === StreamEventType.ERROR;
}
