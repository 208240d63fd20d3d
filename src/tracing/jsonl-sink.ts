/**
 * JSONL Trace Sink
 *
 * Appends trace events to a local JSON Lines file
 */

import * as fs from 'fs';
import * as path from 'path';
import { ScraperLogger, defaultLogger } from '../logger';
import { TraceSink } from './sink';
import { TraceEvent } from './types';

export class JsonlTraceSink extends TraceSink {
  private path: string;
  private writeStream: fs.WriteStream | null = null;
  private closed: boolean = false;
  private logger: ScraperLogger;

  /**
   * @param filePath - JSONL file, created along with its parent directories if missing
   */
  constructor(filePath: string, logger: ScraperLogger = defaultLogger) {
    super();
    this.path = filePath;
    this.logger = logger;

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      this.writeStream = fs.createWriteStream(filePath, {
        flags: 'a',
        encoding: 'utf-8',
        autoClose: true,
      });
      this.writeStream.on('error', (error) => {
        if (!this.closed) {
          this.logger.error(`[JsonlTraceSink] Stream error: ${error.message}`);
        }
      });
    } catch (error) {
      this.logger.error(`[JsonlTraceSink] Failed to initialize sink: ${String(error)}`);
      this.writeStream = null;
    }
  }

  emit(event: TraceEvent): void {
    if (this.closed) {
      this.logger.warn('[JsonlTraceSink] Attempted to emit after close()');
      return;
    }
    if (!this.writeStream) {
      this.logger.error('[JsonlTraceSink] Write stream not available');
      return;
    }
    this.writeStream.write(JSON.stringify(event) + '\n');
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const stream = this.writeStream;
    if (!stream || stream.destroyed) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      stream.end((err?: Error | null) => (err ? reject(err) : resolve()));
    });
  }

  getSinkType(): string {
    return `JsonlTraceSink(${this.path})`;
  }

  getPath(): string {
    return this.path;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
