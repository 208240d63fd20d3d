/**
 * file:// transport - reads local documents without throttling or headers
 */

import { promises as fsPromises } from 'fs';
import { fileURLToPath } from 'url';
import { TransportError, toError } from '../errors';
import { FetchResult, HttpMethod } from '../types';
import { Transport } from './transport';

const STATUS_BY_CODE: Record<string, [number, string]> = {
  ENOENT: [404, 'Not Found'],
  ENOTDIR: [404, 'Not Found'],
  EACCES: [403, 'Forbidden'],
  EPERM: [403, 'Forbidden'],
  EISDIR: [400, 'Bad Request'],
};

export function errorCode(error: unknown): string | undefined {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

/**
 * Serves file:// URLs the way an HTTP server would answer: 200 with the file
 * bytes, or an error status with an empty body. Statuses are reported, not
 * raised. Only GET is supported.
 */
export class LocalFileTransport implements Transport {
  private hitCount: number = 0;
  private closed: boolean = false;

  async request(method: HttpMethod, url: string): Promise<FetchResult> {
    if (this.closed) {
      throw new TransportError(url, null, 'LocalFileTransport is closed');
    }
    if (method !== 'GET') {
      throw new TransportError(url, 405, `Method ${method} is not supported for file URLs`);
    }

    let filePath: string;
    try {
      filePath = fileURLToPath(url);
    } catch (e) {
      throw new TransportError(url, null, `Invalid file URL: ${url}`, e);
    }

    this.hitCount += 1;
    const started = Date.now();
    let status = 200;
    let statusText = 'OK';
    let content: Buffer = Buffer.alloc(0);

    try {
      content = await fsPromises.readFile(filePath);
    } catch (e) {
      const mapped = STATUS_BY_CODE[errorCode(e) ?? ''];
      if (!mapped) {
        const error = toError(e);
        throw new TransportError(url, null, `Failed to read ${filePath}: ${error.message}`, error);
      }
      [status, statusText] = mapped;
    }

    return {
      url,
      method,
      status,
      statusText,
      headers: status === 200 ? { 'content-length': String(content.length) } : {},
      content,
      elapsedMs: Date.now() - started,
    };
  }

  getHitCount(): number {
    return this.hitCount;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
