/**
 * Error taxonomy for treescrape
 */

import { types } from 'util';

export type ScraperErrorCode =
  | 'configuration'
  | 'not_found'
  | 'attribute_not_found'
  | 'invalid_element'
  | 'document_not_loaded'
  | 'transport';

export class ScraperError extends Error {
  code: ScraperErrorCode;

  constructor(code: ScraperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Unsupported selector mode or invalid options. Never retried.
 */
export class ConfigurationError extends ScraperError {
  constructor(message: string) {
    super('configuration', message);
  }
}

/**
 * A single-match lookup found nothing (or its query failed).
 */
export class NotFoundError extends ScraperError {
  constructor(message: string, cause?: Error) {
    super('not_found', message, cause ? { cause } : undefined);
  }
}

export class AttributeNotFoundError extends ScraperError {
  attribute: string;

  constructor(attribute: string) {
    super('attribute_not_found', `Error accessing the attribute ${attribute}`);
    this.attribute = attribute;
  }
}

/**
 * Raised when something that is not an element is handed to ScraperElement.
 */
export class InvalidElementError extends ScraperError {
  constructor(message = 'Expected a parsed element node.') {
    super('invalid_element', message);
  }
}

/**
 * A document-scope lookup ran before anything was fetched or loaded.
 * Extends ReferenceError so it stays distinct from NotFoundError.
 */
export class DocumentNotLoadedError extends ReferenceError {
  readonly code: ScraperErrorCode = 'document_not_loaded';

  constructor(message = 'HTML document is not loaded') {
    super(message);
    this.name = 'DocumentNotLoadedError';
  }
}

export class TransportError extends ScraperError {
  url: string;
  status: number | null;

  constructor(url: string, status: number | null, message: string, cause?: unknown) {
    super('transport', message, cause !== undefined ? { cause } : undefined);
    this.url = url;
    this.status = status;
  }
}

/**
 * Normalize anything thrown by a collaborator into an Error
 */
export function toError(value: unknown): Error {
  // Errors raised in another realm (vm contexts, Jest's sandbox) fail instanceof
  if (value instanceof Error || types.isNativeError(value)) {
    return value;
  }
  if (typeof value === 'object' && value !== null && 'message' in value) {
    return new Error(String(value.message));
  }
  return new Error(String(value));
}
