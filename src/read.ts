/**
 * Read page content - plain text or Markdown
 */

import { ScraperElement, createTurndown } from './element';
import { Scraper } from './scraper';

export interface ReadOptions {
  format?: 'text' | 'markdown';
  /** Read this element instead of the whole document */
  element?: ScraperElement;
}

export interface ReadResult {
  status: 'success' | 'error';
  url: string;
  format: 'text' | 'markdown';
  content: string;
  length: number;
  error?: string;
}

/**
 * Read the current document (or one element) as text or Markdown
 *
 * @example
 * ```typescript
 * await scraper.getFromLocal('page.html');
 * const { content } = read(scraper, { format: 'markdown' });
 * ```
 */
export function read(scraper: Scraper, options: ReadOptions = {}): ReadResult {
  const format = options.format || 'text';
  const url = scraper.getResponse()?.url ?? '';
  const target = options.element ?? scraper.getRoot();

  if (!target) {
    return {
      status: 'error',
      url,
      format,
      content: '',
      length: 0,
      error: 'Document is not loaded',
    };
  }

  const content =
    format === 'markdown'
      ? createTurndown().turndown(scraper.getParser().serialize(target.element))
      : target.getAttribute('innerText', []);

  return {
    status: 'success',
    url,
    format,
    content,
    length: content.length,
  };
}
