import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Response } from 'express';
import {
  ANALYSIS_EVENT_PREFIX,
  StreamEventPayload,
  isCompleteEvent,
  isErrorEvent,
} from '@business-consultant/shared/types';

/**
 * AnalysisStreamService - SSE Connection Manager
 *
 * - Registry of runId → Response
 * - Listens to `analysis.*` events from BusinessAnalysisService
 * - Forwards each event to the client streaming that run
 * - Ends the stream after the terminal (complete / error) event
 */
@Injectable()
export class AnalysisStreamService implements OnModuleDestroy {
  private readonly logger = new Logger(AnalysisStreamService.name);
  private readonly activeStreams = new Map<string, Response>();
  private readonly listenerPattern = `${ANALYSIS_EVENT_PREFIX}.*`;
  private readonly streamListener = (payload: StreamEventPayload) =>
    this.forwardEventToClient(payload);

  constructor(private eventEmitter: EventEmitter2) {
    this.eventEmitter.on(this.listenerPattern, this.streamListener);
    this.logger.debug('Event listeners registered');
  }

  onModuleDestroy(): void {
    this.eventEmitter.off(this.listenerPattern, this.streamListener);

    const streamCount = this.activeStreams.size;
    for (const runId of [...this.activeStreams.keys()]) {
      this.closeStream(runId);
    }

    this.logger.log(`Cleanup complete - closed ${streamCount} streams`);
  }

  registerStream(runId: string, res: Response): void {
    if (this.activeStreams.has(runId)) {
      this.logger.warn(`[${runId}] Run id reused - ending the previous stream`);
      this.closeStream(runId);
    }

    this.activeStreams.set(runId, res);
    this.logger.log(`[${runId}] SSE stream registered (total: ${this.activeStreams.size})`);

    res.on('close', () => {
      this.logger.log(`[${runId}] Connection closed by client`);
      this.forget(runId, res);
    });

    res.on('error', (error) => {
      this.logger.error(`[${runId}] Connection error:`, error);
      this.forget(runId, res);
    });
  }

  closeStream(runId: string): void {
    const res = this.activeStreams.get(runId);
    if (!res) {
      return;
    }

    try {
      res.end();
    } catch (error) {
      this.logger.error(`[${runId}] Error ending stream:`, error);
    }
    this.activeStreams.delete(runId);
    this.logger.log(`[${runId}] SSE stream closed (remaining: ${this.activeStreams.size})`);
  }

  // a replaced response must not drop the stream that took its place
  private forget(runId: string, res: Response): void {
    if (this.activeStreams.get(runId) === res) {
      this.activeStreams.delete(runId);
    }
  }

  hasActiveStream(runId: string): boolean {
    return this.activeStreams.has(runId);
  }

  private forwardEventToClient(payload: StreamEventPayload): void {
    const res = this.activeStreams.get(payload.runId);
    if (!res) {
      this.logger.debug(`[${payload.runId}] No active stream for event: ${payload.type}`);
      return;
    }

    try {
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    } catch (error) {
      this.logger.error(`[${payload.runId}] Failed to forward event:`, error);
      this.closeStream(payload.runId);
      return;
    }

    if (isCompleteEvent(payload) || isErrorEvent(payload)) {
      this.closeStream(payload.runId);
    }
  }
}
