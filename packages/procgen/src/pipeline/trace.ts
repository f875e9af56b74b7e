/**
 * Trace collectors: pass timings, attempt state changes and warnings.
 */

import type { LevelError } from "@delve/contracts";
import type { GenerationState, TraceCollector, TraceEvent } from "./types";

/**
 * Records events in memory while enabled
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private now(): number {
    return performance.now() - this.startTime;
  }

  start(passId: string): void {
    if (!this.enabled) return;
    this.events.push({ eventType: "start", timestamp: this.now(), passId });
  }

  end(passId: string, durationMs: number): void {
    if (!this.enabled) return;
    this.events.push({ eventType: "end", timestamp: this.now(), passId, durationMs });
  }

  transition(attempt: number, from: GenerationState, to: GenerationState): void {
    if (!this.enabled) return;
    this.events.push({ eventType: "transition", timestamp: this.now(), attempt, from, to });
  }

  attemptFailed(attempt: number, failedIn: GenerationState, error: LevelError): void {
    if (!this.enabled) return;
    this.events.push({
      eventType: "attempt-failed",
      timestamp: this.now(),
      attempt,
      failedIn,
      code: error.code,
      message: error.message,
    });
  }

  warning(passId: string, message: string): void {
    if (!this.enabled) return;
    this.events.push({ eventType: "warning", timestamp: this.now(), passId, message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }
}

/**
 * No-op trace collector for production
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_passId: string): void {}
  end(_passId: string, _durationMs: number): void {}
  transition(_attempt: number, _from: GenerationState, _to: GenerationState): void {}
  attemptFailed(_attempt: number, _failedIn: GenerationState, _error: LevelError): void {}
  warning(_passId: string, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
}

/**
 * Create a trace collector based on configuration
 */
export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
