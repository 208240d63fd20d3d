/**
 * TypeScript type definitions shared across treescrape
 */

export type HttpMethod = 'GET' | 'POST';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info';

/**
 * Response metadata plus the raw body bytes
 */
export interface FetchResult {
  url: string;
  method: HttpMethod;
  status: number;
  statusText: string;
  headers: Record<string, string>;
  content: Buffer;
  elapsedMs: number;
}

export interface TransportRequestOptions {
  /** Delay applied before the request is sent */
  throttleSeconds?: number;
  headers?: Record<string, string>;
  /** Appended to the URL query string */
  params?: Record<string, string | number | boolean>;
  body?: string | Buffer;
  /** Serialized as the body with a JSON content type */
  json?: unknown;
  timeoutMs?: number;
}

export interface FetchOptions extends Omit<TransportRequestOptions, 'throttleSeconds'> {
  sleepSeconds?: number;
  isPost?: boolean;
}

export type XPathQuery = { kind: 'xpath'; expression: string };
export type CssQuery = { kind: 'css'; selector: string };
export type TranslatedQuery = XPathQuery | CssQuery;

export interface SelectorTranslation {
  /** Label used when a query fails; produced on every translation */
  errorMessage: string;
  query: TranslatedQuery;
}

export type QueryOutcome =
  | { status: 'success'; elements: Element[] }
  | { status: 'error'; error: Error };
