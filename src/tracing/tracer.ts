/**
 * Tracer Class
 *
 * Stamps scrape events with a run id, sequence number and timestamps
 */

import { v4 as uuidv4 } from 'uuid';
import { JsonlTraceSink } from './jsonl-sink';
import { TraceSink } from './sink';
import { TraceEvent, TraceEventData } from './types';

export class Tracer {
  private runId: string;
  private sink: TraceSink;
  private seq: number = 0;

  constructor(runId: string, sink: TraceSink) {
    this.runId = runId;
    this.sink = sink;
  }

  emit(eventType: string, data: TraceEventData): void {
    this.seq += 1;
    const tsMs = Date.now();

    const event: TraceEvent = {
      v: 1,
      type: eventType,
      ts: new Date(tsMs).toISOString(),
      ts_ms: tsMs,
      run_id: this.runId,
      seq: this.seq,
      data,
    };

    this.sink.emit(event);
  }

  emitFetch(method: string, url: string, status: number, bytes: number, throttleSeconds: number): void {
    this.emit('fetch', { method, url, status, bytes, throttle_s: throttleSeconds });
  }

  emitLoadLocal(filePath: string, status: number, bytes: number): void {
    this.emit('load_local', { path: filePath, status, bytes });
  }

  emitQueryError(errorMessage: string, error: string): void {
    this.emit('query_error', { label: errorMessage, error });
  }

  async close(): Promise<void> {
    await this.sink.close();
  }

  getRunId(): string {
    return this.runId;
  }

  getSeq(): number {
    return this.seq;
  }

  getSinkType(): string {
    return this.sink.getSinkType();
  }
}

/**
 * Tracer writing to a JSONL file, with a fresh run id unless one is given
 */
export function createJsonlTracer(filePath: string, runId: string = uuidv4()): Tracer {
  return new Tracer(runId, new JsonlTraceSink(filePath));
}
