/**
 * treescrape - fetch, parse and query HTML documents
 */

export { Scraper, ScraperOptions } from './scraper';
export { ScraperElement, ElementContext, DEFAULT_INNER_TEXT_FILTER } from './element';
export { By, ANY_NODE, isByMode, selectorModeValues, xpathLiteral, parseAttributePattern } from './selector';
export { runQuery, isElementNode } from './query';
export { HtmlParser, JsdomParser, defaultParser } from './parser';
export { read, ReadOptions, ReadResult } from './read';
export { resolveConfig, ScraperConfig, ScraperConfigInput, DEFAULT_USER_AGENT } from './config';
export { ScraperLogger, createConsoleLogger, defaultLogger } from './logger';
export * from './errors';
export * from './types';

// Transport Layer
export { Transport } from './transport/transport';
export {
  HttpTransport,
  HttpTransportOptions,
  HttpSender,
  OutgoingRequest,
  RawResponse,
  createNodeSender,
  mergeHeaders
} from './transport/http-transport';
export { LocalFileTransport } from './transport/local-file-transport';

// Tracing Layer
export {
  Tracer,
  TraceSink,
  JsonlTraceSink,
  TraceEvent,
  TraceEventData,
  createJsonlTracer
} from './tracing';
