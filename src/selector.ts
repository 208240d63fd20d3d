/**
 * Selector modes and their translation into backend queries
 */

import { ConfigurationError } from './errors';
import { SelectorTranslation } from './types';

/**
 * Closed set of selector modes. Adding a mode means adding a branch to
 * selectorModeValues.
 */
export const By = {
  ID: 'id',
  NAME: 'name',
  CLASS_NAME: 'class name',
  TAG_NAME: 'tag name',
  XPATH: 'xpath',
  ATTRIBUTE: 'attribute',
  LINK_TEXT: 'link text',
  PARTIAL_LINK_TEXT: 'partial link text',
  CSS_SELECTOR: 'css selector',
} as const;

export type By = (typeof By)[keyof typeof By];

const MODES: ReadonlySet<string> = new Set<string>(Object.values(By));

/** Tag scope that matches any node type */
export const ANY_NODE = 'node()';

export function isByMode(value: string): value is By {
  return MODES.has(value);
}

/**
 * Quote a value as an XPath 1.0 string literal
 *
 * @example
 * xpathLiteral(`it's`) // "it's"
 * xpathLiteral(`a'b"c`) // concat('a', "'", 'b"c')
 */
export function xpathLiteral(value: string): string {
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  if (!value.includes('"')) {
    return `"${value}"`;
  }
  const parts = value.split("'").map((part) => `'${part}'`);
  return `concat(${parts.join(`, "'", `)})`;
}

/**
 * Split an attribute pattern of the form `name=value`. Quotes around the value
 * are dropped; a pattern without `=` names the attribute only.
 */
export function parseAttributePattern(pattern: string): { name: string; value: string | null } {
  const eq = pattern.indexOf('=');
  if (eq === -1) {
    return { name: pattern.trim(), value: null };
  }
  const name = pattern.slice(0, eq).trim();
  const value = pattern
    .slice(eq + 1)
    .trim()
    .replace(/^(["'])(.*)\1$/, '$2');
  return { name, value };
}

/**
 * Translate (mode, pattern, tag scope) into a query plus the label used when
 * that query fails.
 *
 * @throws ConfigurationError for a mode outside {@link By}
 */
export function selectorModeValues(
  byMode: string,
  toSearch: string,
  tag: string = ANY_NODE
): SelectorTranslation {
  const xpath = (errorMessage: string, expression: string): SelectorTranslation => ({
    errorMessage,
    query: { kind: 'xpath', expression },
  });

  switch (byMode) {
    case By.ID:
      return xpath(
        `Failed to find elements with id ${toSearch}`,
        `.//${tag}[@id=${xpathLiteral(toSearch)}]`
      );
    case By.NAME:
      return xpath(
        `Failed to find elements with name ${toSearch}`,
        `.//${tag}[@name=${xpathLiteral(toSearch)}]`
      );
    case By.CLASS_NAME:
      return xpath(
        `Failed to find elements with class ${toSearch}`,
        `.//${tag}[contains(concat(' ', normalize-space(@class), ' '), ${xpathLiteral(` ${toSearch} `)})]`
      );
    case By.TAG_NAME:
      return xpath(`Failed to find elements with tag ${toSearch}`, `.//${toSearch}`);
    case By.XPATH:
      return xpath(`Failed to find elements with xpath ${toSearch}`, toSearch);
    case By.ATTRIBUTE: {
      const { name, value } = parseAttributePattern(toSearch);
      const predicate = value === null ? `@${name}` : `@${name}=${xpathLiteral(value)}`;
      return xpath(`Failed to find elements with attribute ${toSearch}`, `.//${tag}[${predicate}]`);
    }
    case By.LINK_TEXT:
      return xpath(
        `Failed to find links with text ${toSearch}`,
        `.//a[normalize-space(.)=${xpathLiteral(toSearch)}]`
      );
    case By.PARTIAL_LINK_TEXT:
      return xpath(
        `Failed to find links containing text ${toSearch}`,
        `.//a[contains(., ${xpathLiteral(toSearch)})]`
      );
    case By.CSS_SELECTOR:
      return {
        errorMessage: `Failed to find elements with css selector ${toSearch}`,
        query: { kind: 'css', selector: toSearch },
      };
    default:
      throw new ConfigurationError(`Unsupported selector mode: ${byMode}`);
  }
}
