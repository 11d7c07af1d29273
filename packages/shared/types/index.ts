/**
 * PipeSpec Shared Types
 *
 * Vocabulary for the in-process event bus. Loader, CLI and any downstream
 * consumer (scheduler, executor) agree on these shapes.
 */

// ─── Event Bus ────────────────────────────────────────────────────

export type EventChannel =
  | 'spec.loaded'
  | 'spec.rejected'
  | 'spec.references_checked';

export type EventSource = 'loader' | 'cli' | 'system';

export interface BusEvent<T = unknown> {
  channel: EventChannel;
  timestamp: string; // ISO 8601
  source: EventSource;
  correlationId: string | null;
  payload: T;
}

export type EventHandler = (event: BusEvent) => void | Promise<void>;

// ─── Payloads ─────────────────────────────────────────────────────

export interface SpecLoadedPayload {
  name: string | null;
  stepCount: number;
  source: string; // filename or '<inline>'
}

export interface SpecRejectedPayload {
  source: string;
  message: string;
}

export interface ReferencesCheckedPayload {
  name: string | null;
  valid: boolean;
  errorCount: number;
}
