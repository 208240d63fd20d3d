/**
 * HTTP transport built on Node's http/https modules
 *
 * Applies a throttle delay before every request, merges the default
 * identifying headers with caller headers, follows redirects and rejects
 * non-2xx responses with TransportError.
 */

import * as http from 'http';
import * as https from 'https';
import { URL } from 'url';
import { DEFAULT_USER_AGENT } from '../config';
import { TransportError, toError } from '../errors';
import { FetchResult, HttpMethod, TransportRequestOptions } from '../types';
import { Transport, randomInt, sleep } from './transport';

export interface OutgoingRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body?: Buffer;
  timeoutMs: number;
}

export interface RawResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Sends one request and resolves with the raw response, whatever its status
 */
export type HttpSender = (request: OutgoingRequest) => Promise<RawResponse>;

export interface HttpTransportOptions {
  userAgent?: string;
  /** Headers sent with every request; caller headers override them */
  headers?: Record<string, string>;
  timeoutMs?: number;
  maxRedirects?: number;
  sender?: HttpSender;
  sleep?: (ms: number) => Promise<void>;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

/**
 * Merge header maps; later maps win, names compared case-insensitively
 */
export function mergeHeaders(...sources: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged = new Map<string, [string, string]>();
  for (const source of sources) {
    if (!source) continue;
    for (const [name, value] of Object.entries(source)) {
      merged.set(name.toLowerCase(), [name, value]);
    }
  }
  return Object.fromEntries(merged.values());
}

/**
 * Build an HttpSender over Node's http/https, reusing connections through the given agents
 */
export function createNodeSender(agents: { http: http.Agent; https: https.Agent }): HttpSender {
  return (request) =>
    new Promise((resolve, reject) => {
      const isHttps = request.url.protocol === 'https:';
      const protocol = isHttps ? https : http;

      const req = protocol.request(
        request.url,
        {
          method: request.method,
          headers: request.body
            ? { ...request.headers, 'Content-Length': String(request.body.length) }
            : request.headers,
          agent: isHttps ? agents.https : agents.http,
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('error', reject);
          res.on('end', () => {
            resolve({
              status: res.statusCode || 500,
              statusText: res.statusMessage || '',
              headers: flattenHeaders(res.headers),
              body: Buffer.concat(chunks),
            });
          });
        }
      );

      req.setTimeout(request.timeoutMs, () => {
        req.destroy(new Error(`Request timed out after ${request.timeoutMs}ms`));
      });
      req.on('error', reject);

      if (request.body) {
        req.write(request.body);
      }
      req.end();
    });
}

export class HttpTransport implements Transport {
  private hitCount: number = 0;
  private defaultHeaders: Record<string, string>;
  private timeoutMs: number;
  private maxRedirects: number;
  private sender: HttpSender;
  private sleepFn: (ms: number) => Promise<void>;
  private agents: { http: http.Agent; https: https.Agent } | null = null;

  constructor(options: HttpTransportOptions = {}) {
    this.defaultHeaders = mergeHeaders(
      { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT },
      options.headers
    );
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxRedirects = options.maxRedirects ?? 10;
    this.sleepFn = options.sleep ?? sleep;

    if (options.sender) {
      this.sender = options.sender;
    } else {
      const agents = {
        http: new http.Agent({ keepAlive: true }),
        https: new https.Agent({ keepAlive: true }),
      };
      this.agents = agents;
      this.sender = createNodeSender(agents);
    }
  }

  async get(url: string, options: TransportRequestOptions = {}): Promise<FetchResult> {
    return this.request('GET', url, options);
  }

  async post(url: string, options: TransportRequestOptions = {}): Promise<FetchResult> {
    return this.request('POST', url, options);
  }

  async request(
    method: HttpMethod,
    url: string,
    options: TransportRequestOptions = {}
  ): Promise<FetchResult> {
    let target = this.buildUrl(url, options.params);

    const throttleSeconds = options.throttleSeconds ?? randomInt(1, 3);
    await this.sleepFn(throttleSeconds * 1000);

    let currentMethod = method;
    let { body, headers } = this.buildBody(options);
    headers = mergeHeaders(this.defaultHeaders, headers);

    const started = Date.now();

    for (let hop = 0; ; hop++) {
      this.hitCount += 1;

      let response: RawResponse;
      try {
        response = await this.sender({
          method: currentMethod,
          url: target,
          headers,
          body,
          timeoutMs: options.timeoutMs ?? this.timeoutMs,
        });
      } catch (e) {
        const cause = toError(e);
        throw new TransportError(target.href, null, `${currentMethod} ${target.href} failed: ${cause.message}`, cause);
      }

      const location = response.headers['location'];
      if (REDIRECT_STATUSES.has(response.status) && location) {
        if (hop >= this.maxRedirects) {
          throw new TransportError(
            target.href,
            response.status,
            `Exceeded ${this.maxRedirects} redirects starting from ${url}`
          );
        }
        target = new URL(location, target);
        if (response.status === 303 || (currentMethod === 'POST' && response.status !== 307 && response.status !== 308)) {
          currentMethod = 'GET';
          body = undefined;
          headers = Object.fromEntries(
            Object.entries(headers).filter(([name]) => name.toLowerCase() !== 'content-type')
          );
        }
        continue;
      }

      if (response.status < 200 || response.status >= 300) {
        const reason = [String(response.status), response.statusText].filter(Boolean).join(' ');
        throw new TransportError(target.href, response.status, `${reason} for ${currentMethod} ${target.href}`);
      }

      return {
        url: target.href,
        method: currentMethod,
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        content: response.body,
        elapsedMs: Date.now() - started,
      };
    }
  }

  getHitCount(): number {
    return this.hitCount;
  }

  async close(): Promise<void> {
    if (this.agents) {
      this.agents.http.destroy();
      this.agents.https.destroy();
      this.agents = null;
    }
  }

  private buildUrl(url: string, params?: TransportRequestOptions['params']): URL {
    let target: URL;
    try {
      target = new URL(url);
    } catch (e) {
      throw new TransportError(url, null, `Invalid URL: ${url}`, e);
    }
    if (target.protocol !== 'http:' && target.protocol !== 'https:') {
      throw new TransportError(url, null, `Unsupported URL scheme: ${target.protocol}`);
    }
    for (const [key, value] of Object.entries(params ?? {})) {
      target.searchParams.append(key, String(value));
    }
    return target;
  }

  private buildBody(options: TransportRequestOptions): {
    body: Buffer | undefined;
    headers: Record<string, string>;
  } {
    const headers = { ...(options.headers ?? {}) };
    if (options.json !== undefined) {
      return {
        body: Buffer.from(JSON.stringify(options.json), 'utf-8'),
        headers: mergeHeaders({ 'Content-Type': 'application/json' }, headers),
      };
    }
    if (options.body !== undefined) {
      return {
        body: typeof options.body === 'string' ? Buffer.from(options.body, 'utf-8') : options.body,
        headers,
      };
    }
    return { body: undefined, headers };
  }
}
