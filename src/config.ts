/**
 * Scraper configuration - zod-validated options with environment overrides
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_11_5) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/50.0.2661.102 Safari/537.36';

export const ScraperConfigSchema = z
  .object({
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    headers: z.record(z.string()).default({}),
    timeoutMs: z.number().int().positive().default(30000),
    maxRedirects: z.number().int().min(0).default(10),
    minSleepSeconds: z.number().int().min(0).default(1),
    maxSleepSeconds: z.number().int().min(0).default(5),
    logLevel: z.enum(['silent', 'error', 'warn', 'info']).default('info'),
  })
  .refine((cfg) => cfg.minSleepSeconds <= cfg.maxSleepSeconds, {
    message: 'minSleepSeconds must not exceed maxSleepSeconds',
    path: ['minSleepSeconds'],
  });

export type ScraperConfig = z.output<typeof ScraperConfigSchema>;
export type ScraperConfigInput = z.input<typeof ScraperConfigSchema>;

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (env.TREESCRAPE_USER_AGENT) {
    overrides.userAgent = env.TREESCRAPE_USER_AGENT;
  }
  if (env.TREESCRAPE_TIMEOUT_MS) {
    // Left as NaN when unparseable so the schema reports it
    overrides.timeoutMs = Number(env.TREESCRAPE_TIMEOUT_MS);
  }
  if (env.TREESCRAPE_LOG_LEVEL) {
    overrides.logLevel = env.TREESCRAPE_LOG_LEVEL.toLowerCase();
  }

  return overrides;
}

/**
 * Resolve the effective configuration. Explicit options win over the environment.
 *
 * @throws ConfigurationError when a value fails validation
 */
export function resolveConfig(
  options: ScraperConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ScraperConfig {
  const explicit = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined)
  );
  const parsed = ScraperConfigSchema.safeParse({ ...envOverrides(env), ...explicit });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid scraper configuration - ${details}`);
  }

  return parsed.data;
}
