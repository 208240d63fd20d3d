/**
 * Tests for Tracer
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Tracer, createJsonlTracer } from '../../src/tracing/tracer';
import { MemoryTraceSink } from '../mocks/transport-mock';

describe('Tracer', () => {
  it('should stamp events with run id, sequence and timestamps', () => {
    const sink = new MemoryTraceSink();
    const tracer = new Tracer('run-42', sink);

    tracer.emitFetch('GET', 'https://example.test/', 200, 10, 3);
    tracer.emitQueryError('Failed to find elements with xpath //[', 'bad expression');

    expect(sink.events).toHaveLength(2);
    expect(sink.events[0]).toMatchObject({
      v: 1,
      type: 'fetch',
      run_id: 'run-42',
      seq: 1,
      data: { method: 'GET', url: 'https://example.test/', status: 200, bytes: 10, throttle_s: 3 },
    });
    expect(sink.events[1]).toMatchObject({
      type: 'query_error',
      seq: 2,
      data: { label: 'Failed to find elements with xpath //[', error: 'bad expression' },
    });
    expect(new Date(sink.events[0].ts).getTime()).toBe(sink.events[0].ts_ms);
    expect(tracer.getSeq()).toBe(2);
  });

  it('should record local loads', () => {
    const sink = new MemoryTraceSink();
    new Tracer('run', sink).emitLoadLocal('page.html', 404, 0);

    expect(sink.events[0].type).toBe('load_local');
    expect(sink.events[0].data).toEqual({ path: 'page.html', status: 404, bytes: 0 });
  });

  it('should close its sink', async () => {
    const sink = new MemoryTraceSink();
    const tracer = new Tracer('run', sink);

    await tracer.close();

    expect(sink.closed).toBe(true);
    expect(tracer.getSinkType()).toBe('MemoryTraceSink');
  });

  it('should create a JSONL tracer with a generated run id', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'treescrape-tracer-'));
    try {
      const tracer = createJsonlTracer(path.join(dir, 'trace.jsonl'));
      expect(tracer.getRunId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      tracer.emitLoadLocal('a.html', 200, 5);
      await tracer.close();

      const line = JSON.parse(fs.readFileSync(path.join(dir, 'trace.jsonl'), 'utf-8').trim());
      expect(line.run_id).toBe(tracer.getRunId());
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
