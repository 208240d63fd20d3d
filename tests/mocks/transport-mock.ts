/**
 * Mock implementations for testing
 *
 * In-process stand-ins for the Transport interface and trace sinks
 */

import { Transport } from '../../src/transport/transport';
import { TraceSink } from '../../src/tracing/sink';
import { TraceEvent } from '../../src/tracing/types';
import { FetchResult, HttpMethod, TransportRequestOptions } from '../../src/types';

export interface RecordedRequest {
  method: HttpMethod;
  url: string;
  options: TransportRequestOptions;
}

type Reply = FetchResult | Error;

/**
 * Transport that answers from a queue of canned replies
 */
export class MockTransport implements Transport {
  public requests: RecordedRequest[] = [];
  public closed: boolean = false;
  private replies: Reply[] = [];

  reply(...replies: Reply[]): this {
    this.replies.push(...replies);
    return this;
  }

  async request(
    method: HttpMethod,
    url: string,
    options: TransportRequestOptions = {}
  ): Promise<FetchResult> {
    this.requests.push({ method, url, options });
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error(`MockTransport has no reply queued for ${method} ${url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  getHitCount(): number {
    return this.requests.length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * TraceSink that keeps events in memory
 */
export class MemoryTraceSink extends TraceSink {
  public events: TraceEvent[] = [];
  public closed: boolean = false;

  emit(event: TraceEvent): void {
    this.events.push(event);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  getSinkType(): string {
    return 'MemoryTraceSink';
  }
}
