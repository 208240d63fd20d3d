/**
 * TraceSink Abstract Class
 *
 * Destination for trace events (a JSONL file, an in-memory list in tests)
 */

import { TraceEvent } from './types';

export abstract class TraceSink {
  /**
   * Emit a trace event
   */
  abstract emit(event: TraceEvent): void;

  /**
   * Close the sink and flush buffered data
   */
  abstract close(): Promise<void>;

  /**
   * Get unique identifier for this sink (for debugging)
   */
  abstract getSinkType(): string;
}
