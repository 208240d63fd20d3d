/**
 * Tests for configuration resolution
 */

import { DEFAULT_USER_AGENT, resolveConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      userAgent: DEFAULT_USER_AGENT,
      headers: {},
      timeoutMs: 30000,
      maxRedirects: 10,
      minSleepSeconds: 1,
      maxSleepSeconds: 5,
      logLevel: 'info',
    });
  });

  it('should read overrides from the environment', () => {
    const config = resolveConfig(
      {},
      { TREESCRAPE_USER_AGENT: 'test-agent/1.0', TREESCRAPE_TIMEOUT_MS: '5000', TREESCRAPE_LOG_LEVEL: 'WARN' }
    );

    expect(config.userAgent).toBe('test-agent/1.0');
    expect(config.timeoutMs).toBe(5000);
    expect(config.logLevel).toBe('warn');
  });

  it('should prefer explicit options over the environment', () => {
    expect(resolveConfig({ timeoutMs: 1000 }, { TREESCRAPE_TIMEOUT_MS: '5000' }).timeoutMs).toBe(1000);
  });

  it('should ignore explicitly undefined options', () => {
    expect(resolveConfig({ timeoutMs: undefined }, { TREESCRAPE_TIMEOUT_MS: '5000' }).timeoutMs).toBe(5000);
  });

  it('should reject an unparseable environment value', () => {
    expect(() => resolveConfig({}, { TREESCRAPE_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
  });

  it('should reject inverted sleep bounds', () => {
    expect(() => resolveConfig({ minSleepSeconds: 4, maxSleepSeconds: 2 }, {})).toThrow(
      'minSleepSeconds: minSleepSeconds must not exceed maxSleepSeconds'
    );
  });
});
