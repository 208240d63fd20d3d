/**
 * HTML parsing backed by jsdom
 */

import { JSDOM } from 'jsdom';

/**
 * Turns raw bytes into a queryable tree and serializes subtrees back to markup
 */
export interface HtmlParser {
  /** Tree root element, or null when there is nothing to parse */
  parse(content: Buffer | string, url?: string): Element | null;
  serialize(element: Element): string;
}

export class JsdomParser implements HtmlParser {
  parse(content: Buffer | string, url?: string): Element | null {
    if (content.length === 0) {
      return null;
    }
    // Scripts never run: jsdom's default runScripts is off
    const dom = new JSDOM(content, url && /^https?:/.test(url) ? { url } : undefined);
    return dom.window.document.documentElement;
  }

  serialize(element: Element): string {
    return element.outerHTML;
  }
}

export const defaultParser: HtmlParser = new JsdomParser();
