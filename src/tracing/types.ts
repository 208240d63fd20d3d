/**
 * Tracing Types
 */

/**
 * TraceEvent is one line of a scrape trace
 */
export interface TraceEvent {
  /** Schema version (always 1 for now) */
  v: number;

  /** Event type ('fetch', 'load_local', 'query_error') */
  type: string;

  /** ISO 8601 timestamp */
  ts: string;

  /** Unix timestamp in milliseconds */
  ts_ms: number;

  run_id: string;

  /** Sequence number (monotonically increasing) */
  seq: number;

  data: TraceEventData;
}

export type TraceValue = string | number | boolean | null;

export type TraceEventData = Record<string, TraceValue>;
