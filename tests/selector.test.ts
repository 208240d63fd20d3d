/**
 * Tests for selector translation
 */

import { ConfigurationError } from '../src/errors';
import {
  By,
  isByMode,
  parseAttributePattern,
  selectorModeValues,
  xpathLiteral,
} from '../src/selector';

describe('xpathLiteral', () => {
  it('should single-quote plain values', () => {
    expect(xpathLiteral('main')).toBe("'main'");
  });

  it('should double-quote values containing a single quote', () => {
    expect(xpathLiteral("it's")).toBe(`"it's"`);
  });

  it('should concat values containing both quote kinds', () => {
    expect(xpathLiteral(`a'b"c`)).toBe(`concat('a', "'", 'b"c')`);
  });
});

describe('parseAttributePattern', () => {
  it('should split name and value', () => {
    expect(parseAttributePattern('data-id=42')).toEqual({ name: 'data-id', value: '42' });
  });

  it('should strip quotes around the value', () => {
    expect(parseAttributePattern('href="/a=b"')).toEqual({ name: 'href', value: '/a=b' });
  });

  it('should return a null value without =', () => {
    expect(parseAttributePattern('disabled')).toEqual({ name: 'disabled', value: null });
  });
});

describe('selectorModeValues', () => {
  it('should match id within the tag scope', () => {
    expect(selectorModeValues(By.ID, 'x', 'p')).toEqual({
      errorMessage: 'Failed to find elements with id x',
      query: { kind: 'xpath', expression: ".//p[@id='x']" },
    });
  });

  it('should default the tag scope to any node', () => {
    expect(selectorModeValues(By.ID, 'x').query).toEqual({
      kind: 'xpath',
      expression: ".//node()[@id='x']",
    });
  });

  it('should match name attributes', () => {
    expect(selectorModeValues(By.NAME, 'q', 'input').query).toEqual({
      kind: 'xpath',
      expression: ".//input[@name='q']",
    });
  });

  it('should test class token membership', () => {
    expect(selectorModeValues(By.CLASS_NAME, 'btn').query).toEqual({
      kind: 'xpath',
      expression: ".//node()[contains(concat(' ', normalize-space(@class), ' '), ' btn ')]",
    });
  });

  it('should ignore the tag scope for tag names', () => {
    expect(selectorModeValues(By.TAG_NAME, 'li', 'p').query).toEqual({
      kind: 'xpath',
      expression: './/li',
    });
  });

  it('should pass xpath through verbatim', () => {
    const translation = selectorModeValues(By.XPATH, "//div[@class='a']", 'p');
    expect(translation.query).toEqual({ kind: 'xpath', expression: "//div[@class='a']" });
    expect(translation.errorMessage).toBe("Failed to find elements with xpath //div[@class='a']");
  });

  it('should build attribute predicates', () => {
    expect(selectorModeValues(By.ATTRIBUTE, 'data-kind=nav', 'a').query).toEqual({
      kind: 'xpath',
      expression: ".//a[@data-kind='nav']",
    });
    expect(selectorModeValues(By.ATTRIBUTE, 'disabled').query).toEqual({
      kind: 'xpath',
      expression: './/node()[@disabled]',
    });
  });

  it('should match link text exactly and partially', () => {
    expect(selectorModeValues(By.LINK_TEXT, 'Next page').query).toEqual({
      kind: 'xpath',
      expression: ".//a[normalize-space(.)='Next page']",
    });
    expect(selectorModeValues(By.PARTIAL_LINK_TEXT, 'Next').query).toEqual({
      kind: 'xpath',
      expression: ".//a[contains(., 'Next')]",
    });
  });

  it('should keep css selectors as css', () => {
    expect(selectorModeValues(By.CSS_SELECTOR, 'ul > li.item', 'p')).toEqual({
      errorMessage: 'Failed to find elements with css selector ul > li.item',
      query: { kind: 'css', selector: 'ul > li.item' },
    });
  });

  it('should return identical translations for identical inputs', () => {
    for (const mode of Object.values(By)) {
      expect(selectorModeValues(mode, "o'k", 'div')).toEqual(selectorModeValues(mode, "o'k", 'div'));
    }
  });

  it('should reject unknown modes with ConfigurationError', () => {
    expect(() => selectorModeValues('bogus', 'x')).toThrow(ConfigurationError);
    expect(() => selectorModeValues('bogus', 'x')).toThrow('Unsupported selector mode: bogus');
  });
});

describe('isByMode', () => {
  it('should accept every declared mode and nothing else', () => {
    expect(Object.values(By).every(isByMode)).toBe(true);
    expect(isByMode('css')).toBe(false);
  });
});
