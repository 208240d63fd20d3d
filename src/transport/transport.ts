/**
 * Transport contract used by Scraper
 */

import { FetchResult, HttpMethod, TransportRequestOptions } from '../types';

export interface Transport {
  /**
   * Issue a request. Implementations apply `options.throttleSeconds` before
   * sending and reject with TransportError for a failed or non-2xx response.
   */
  request(method: HttpMethod, url: string, options?: TransportRequestOptions): Promise<FetchResult>;

  /** Number of requests this instance has issued */
  getHitCount(): number;

  close(): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Random integer in [min, max]
 */
export function randomInt(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}
