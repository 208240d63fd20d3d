/**
 * ScraperElement - a navigable handle on one parsed element
 */

import TurndownService from 'turndown';
import { AttributeNotFoundError, InvalidElementError, NotFoundError } from './errors';
import { ScraperLogger, defaultLogger } from './logger';
import { HtmlParser, defaultParser } from './parser';
import { isElementNode, runQuery } from './query';
import { ANY_NODE, By, selectorModeValues } from './selector';
import { SelectorTranslation } from './types';

const TEXT_NODE = 3;

export const DEFAULT_INNER_TEXT_FILTER: readonly string[] = ['\n', '\t'];

export interface ElementContext {
  parser?: HtmlParser;
  logger?: ScraperLogger;
  /** Called with the failure label and cause whenever findElements swallows an error */
  onQueryError?: (errorMessage: string, error: Error) => void;
}

/**
 * Build the turndown converter used for Markdown output
 */
export function createTurndown(): TurndownService {
  const turndownService = new TurndownService({
    headingStyle: 'atx',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
  });
  turndownService.addRule('strikethrough', {
    filter: ['del', 's'],
    replacement: (content: string) => `~~${content}~~`,
  });
  turndownService.remove(['script', 'style', 'noscript']);
  return turndownService;
}

/**
 * Wraps exactly one element of a parsed tree.
 *
 * Handles are read-only views: they never mutate the tree, and they keep
 * pointing at the tree they came from after the owning Scraper loads another
 * document.
 */
export class ScraperElement {
  readonly element: Element;
  private context: ElementContext;

  /**
   * @throws InvalidElementError when `element` is null, undefined or not an element node
   */
  constructor(element: Node | null | undefined, context: ElementContext = {}) {
    if (!isElementNode(element)) {
      throw new InvalidElementError('Expected a parsed element node.');
    }
    this.element = element;
    this.context = context;
  }

  private wrap(element: Element): ScraperElement {
    return new ScraperElement(element, this.context);
  }

  private select(translation: SelectorTranslation): Element[] | Error {
    const outcome = runQuery(this.element, translation.query);
    return outcome.status === 'success' ? outcome.elements : outcome.error;
  }

  /**
   * Find every element within this element's subtree. Query failures are
   * logged and yield an empty list.
   */
  findElements(byMode: By, toSearch: string, tag: string = ANY_NODE): ScraperElement[] {
    const translation = selectorModeValues(byMode, toSearch, tag);
    const result = this.select(translation);

    if (result instanceof Error) {
      (this.context.logger ?? defaultLogger).error(`${translation.errorMessage}: ${result.message}`);
      this.context.onQueryError?.(translation.errorMessage, result);
      return [];
    }
    return result.map((el) => this.wrap(el));
  }

  /**
   * Find the first matching element within this element's subtree, in document order.
   *
   * @param tag - optional tag scope for the id, name, class and attribute
   *   modes; defaults to any node
   * @throws NotFoundError when nothing matches or the query fails
   */
  findElement(byMode: By, toSearch: string, tag: string = ANY_NODE): ScraperElement {
    const translation = selectorModeValues(byMode, toSearch, tag);
    const result = this.select(translation);

    if (result instanceof Error) {
      throw new NotFoundError(`Failed to find element. ${translation.errorMessage}: ${result.message}`, result);
    }
    if (result.length === 0) {
      throw new NotFoundError(`Failed to find element. ${translation.errorMessage}`);
    }
    return this.wrap(result[0]);
  }

  /**
   * @param allTextContent - true: text of the whole subtree; false: only the
   *   text before this element's first non-text child
   */
  getText(allTextContent: boolean = true): string {
    if (allTextContent) {
      return this.element.textContent ?? '';
    }

    let text = '';
    for (const node of Array.from(this.element.childNodes)) {
      if (node.nodeType !== TEXT_NODE) break;
      text += node.nodeValue ?? '';
    }
    return text;
  }

  getTagName(): string {
    return this.element.localName;
  }

  /**
   * Retrieve an attribute, or one of the pseudo-attributes `innerText` and `innerHTML`.
   *
   * @param attribute - attribute name (e.g. 'class', 'href', 'innerText', 'innerHTML')
   * @param innerTextFilter - strings removed from innerText, in order, before trimming
   * @throws AttributeNotFoundError when a literal attribute is absent
   */
  getAttribute(attribute: string, innerTextFilter: readonly string[] = DEFAULT_INNER_TEXT_FILTER): string {
    if (attribute === 'innerText') {
      let text = this.getText(true);
      for (const rep of innerTextFilter) {
        text = text.split(rep).join('');
      }
      return text.trim();
    }
    if (attribute === 'innerHTML') {
      return (this.context.parser ?? defaultParser).serialize(this.element);
    }

    const value = this.element.getAttribute(attribute);
    if (value === null) {
      throw new AttributeNotFoundError(attribute);
    }
    return value;
  }

  /**
   * Parent element, or null at the tree root
   */
  getParent(): ScraperElement | null {
    const parent = this.element.parentElement;
    return parent ? this.wrap(parent) : null;
  }

  /**
   * Direct children filtered by tag name ('*' for all)
   */
  getChildren(tagName: string = '*'): ScraperElement[] {
    return Array.from(this.element.children)
      .filter((child) => tagName === '*' || child.localName === tagName)
      .map((child) => this.wrap(child));
  }

  toMarkdown(): string {
    return createTurndown().turndown(this.getAttribute('innerHTML'));
  }

  toString(): string {
    return `ScraperElement: <${this.getTagName()}> element instance.`;
  }
}
