/**
 * Scraper - owns the currently loaded document and exposes document-scope lookups
 */

import * as path from 'path';
import { pathToFileURL } from 'url';
import { ScraperConfig, ScraperConfigInput, resolveConfig } from './config';
import { ElementContext, ScraperElement } from './element';
import { DocumentNotLoadedError, NotFoundError } from './errors';
import { ScraperLogger, createConsoleLogger } from './logger';
import { HtmlParser, defaultParser } from './parser';
import { runQuery } from './query';
import { ANY_NODE, By, selectorModeValues } from './selector';
import { Tracer } from './tracing/tracer';
import { HttpTransport } from './transport/http-transport';
import { LocalFileTransport } from './transport/local-file-transport';
import { Transport, randomInt } from './transport/transport';
import { FetchOptions, FetchResult, QueryOutcome, TranslatedQuery } from './types';

export interface ScraperOptions extends ScraperConfigInput {
  /** Network transport; defaults to an HttpTransport built from the config */
  transport?: Transport;
  /** Creates the transport used for each getFromLocal call */
  localTransportFactory?: () => Transport;
  parser?: HtmlParser;
  logger?: ScraperLogger;
  tracer?: Tracer;
}

/**
 * Fetches documents and runs selector lookups against the latest one.
 *
 * Every fetch or local load replaces the response and the tree as a whole.
 * Elements obtained earlier keep referring to the tree they came from.
 *
 * @example
 * ```typescript
 * const scraper = new Scraper();
 * await scraper.get('https://example.com', 0);
 * const title = scraper.findElement(By.TAG_NAME, 'h1').getAttribute('innerText');
 * await scraper.close();
 * ```
 */
export class Scraper {
  private config: ScraperConfig;
  private transport: Transport;
  private localTransportFactory: () => Transport;
  private parser: HtmlParser;
  private logger: ScraperLogger;
  private tracer?: Tracer;
  private doc: Element | null = null;
  private response: FetchResult | null = null;

  constructor(options: ScraperOptions = {}) {
    const { transport, localTransportFactory, parser, logger, tracer, ...configInput } = options;
    this.config = resolveConfig(configInput);
    this.logger = logger ?? createConsoleLogger(this.config.logLevel);
    this.parser = parser ?? defaultParser;
    this.tracer = tracer;
    this.transport =
      transport ??
      new HttpTransport({
        userAgent: this.config.userAgent,
        headers: this.config.headers,
        timeoutMs: this.config.timeoutMs,
        maxRedirects: this.config.maxRedirects,
      });
    this.localTransportFactory = localTransportFactory ?? (() => new LocalFileTransport());
  }

  /**
   * Request `url` and make the response the current document.
   *
   * Without `sleepSeconds` the throttle is a random whole number of seconds
   * between the configured bounds. Transport errors propagate unchanged.
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const { sleepSeconds, isPost = false, ...requestOptions } = options;
    const throttleSeconds =
      sleepSeconds ?? randomInt(this.config.minSleepSeconds, this.config.maxSleepSeconds);
    const method = isPost ? 'POST' : 'GET';

    const response = await this.transport.request(method, url, {
      ...requestOptions,
      throttleSeconds,
    });
    this.replaceDocument(response);
    this.tracer?.emitFetch(method, response.url, response.status, response.content.length, throttleSeconds);
    return response;
  }

  async get(url: string, sleepSeconds?: number, options: Omit<FetchOptions, 'sleepSeconds' | 'isPost'> = {}): Promise<FetchResult> {
    return this.fetch(url, { ...options, sleepSeconds, isPost: false });
  }

  async post(url: string, sleepSeconds?: number, options: Omit<FetchOptions, 'sleepSeconds' | 'isPost'> = {}): Promise<FetchResult> {
    return this.fetch(url, { ...options, sleepSeconds, isPost: true });
  }

  /**
   * Load a local file as the current document. No throttle and no headers;
   * the file transport is closed whether or not the read succeeds.
   */
  async getFromLocal(filePath: string): Promise<FetchResult> {
    const transport = this.localTransportFactory();
    try {
      const response = await transport.request('GET', pathToFileURL(path.resolve(filePath)).href);
      this.logger.info(`Scraping data from: ${filePath}`);
      this.replaceDocument(response);
      this.tracer?.emitLoadLocal(filePath, response.status, response.content.length);
      return response;
    } finally {
      await transport.close();
    }
  }

  /**
   * Find every match in the document. Logs and returns an empty list when no
   * document is loaded or the query fails.
   *
   * @param doc - search this element's subtree instead of the current document
   */
  findElements(
    byMode: By,
    toSearch: string,
    doc?: Element | null,
    tag: string = ANY_NODE
  ): ScraperElement[] {
    const translation = selectorModeValues(byMode, toSearch, tag);
    const root = doc ?? this.doc;

    if (!root) {
      this.logger.error('Document is not loaded properly for xpath operations.');
      return [];
    }

    const outcome = this.search(root, byMode, translation.query, Boolean(doc));
    if (outcome.status === 'error') {
      this.reportQueryError(translation.errorMessage, outcome.error);
      return [];
    }
    return outcome.elements.map((el) => new ScraperElement(el, this.elementContext()));
  }

  /**
   * Find the first match in the document, in document order.
   *
   * @throws DocumentNotLoadedError when there is no document to search
   * @throws NotFoundError when nothing matches or the query fails
   */
  findElement(
    byMode: By,
    toSearch: string,
    doc?: Element | null,
    tag: string = ANY_NODE
  ): ScraperElement {
    const translation = selectorModeValues(byMode, toSearch, tag);
    const root = doc ?? this.doc;

    if (!root) {
      throw new DocumentNotLoadedError('HTML document is not loaded; fetch or load a document first');
    }

    const outcome = this.search(root, byMode, translation.query, Boolean(doc));
    if (outcome.status === 'error') {
      throw new NotFoundError(
        `Failed to find element. ${translation.errorMessage}: ${outcome.error.message}`,
        outcome.error
      );
    }
    if (outcome.elements.length === 0) {
      throw new NotFoundError(`Failed to find element. ${translation.errorMessage}`);
    }
    return new ScraperElement(outcome.elements[0], this.elementContext());
  }

  /** Root element of the current document, or null */
  getDocument(): Element | null {
    return this.doc;
  }

  /** Root of the current document as a ScraperElement, or null */
  getRoot(): ScraperElement | null {
    return this.doc ? new ScraperElement(this.doc, this.elementContext()) : null;
  }

  getResponse(): FetchResult | null {
    return this.response;
  }

  getHitCount(): number {
    return this.transport.getHitCount();
  }

  getParser(): HtmlParser {
    return this.parser;
  }

  getConfig(): ScraperConfig {
    return this.config;
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  private replaceDocument(response: FetchResult): void {
    const doc = response.content.length > 0 ? this.parser.parse(response.content, response.url) : null;
    this.response = response;
    this.doc = doc;
  }

  /**
   * A supplied tree is searched from that element. On the session's own tree,
   * verbatim XPath is evaluated from the root element so relative paths such
   * as `body/p` resolve; generated queries run from the Document so the root
   * element itself can match.
   */
  private search(root: Element, byMode: By, query: TranslatedQuery, supplied: boolean): QueryOutcome {
    const context = supplied || byMode === By.XPATH ? root : root.ownerDocument;
    return runQuery(context, query);
  }

  private reportQueryError(errorMessage: string, error: Error): void {
    this.logger.error(`${errorMessage}: ${error.message}`);
    this.tracer?.emitQueryError(errorMessage, error.message);
  }

  private elementContext(): ElementContext {
    return {
      parser: this.parser,
      logger: this.logger,
      onQueryError: (errorMessage, error) => this.tracer?.emitQueryError(errorMessage, error.message),
    };
  }
}
