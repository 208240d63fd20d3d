#!/usr/bin/env node
/**
 * CLI commands for treescrape
 */

import { ConfigurationError, toError } from './errors';
import { read } from './read';
import { Scraper, ScraperOptions } from './scraper';
import { ANY_NODE, By, isByMode } from './selector';
import { createJsonlTracer } from './tracing/tracer';

export type CliCommand = 'get' | 'post' | 'local';

export interface CliOptions {
  command: CliCommand;
  target: string;
  by?: By;
  query?: string;
  tag: string;
  attr: string;
  all: boolean;
  sleepSeconds?: number;
  headers: Record<string, string>;
  tracePath?: string;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const USAGE = [
  'Usage: treescrape <get|post|local> <url|path> [options]',
  '',
  'Options:',
  '  --by <mode>          Selector mode: ' + Object.values(By).map((m) => `"${m}"`).join(', '),
  '  --query <pattern>    Selector pattern (required with --by)',
  '  --tag <tag>          Tag scope for id/name/class/attribute modes (default: node())',
  '  --attr <name>        Attribute to print (default: innerText)',
  '  --all                Print every match instead of the first',
  '  --sleep <seconds>    Throttle before the request',
  '  --header <Name:Val>  Extra request header (repeatable)',
  '  --trace <file>       Append a JSONL trace to <file>',
  '',
  'Without --by the whole document is printed as Markdown.',
  '',
  'Examples:',
  '  treescrape get https://example.com --by "tag name" --query h1',
  '  treescrape local page.html --by id --query price --attr innerText',
].join('\n');

export function parseCliArgs(args: string[]): CliOptions {
  const [command, target, ...rest] = args;
  if (command !== 'get' && command !== 'post' && command !== 'local') {
    throw new ConfigurationError(`Unknown command: ${command ?? '(none)'}`);
  }
  if (!target) {
    throw new ConfigurationError(`${command} requires a ${command === 'local' ? 'file path' : 'URL'}`);
  }

  const options: CliOptions = { command, target, tag: ANY_NODE, attr: 'innerText', all: false, headers: {} };

  const value = (i: number, flag: string): string => {
    const v = rest[i + 1];
    if (v === undefined) {
      throw new ConfigurationError(`${flag} requires a value`);
    }
    return v;
  };

  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i];
    switch (flag) {
      case '--by': {
        const mode = value(i++, flag);
        if (!isByMode(mode)) {
          throw new ConfigurationError(`Unsupported selector mode: ${mode}`);
        }
        options.by = mode;
        break;
      }
      case '--query':
        options.query = value(i++, flag);
        break;
      case '--tag':
        options.tag = value(i++, flag);
        break;
      case '--attr':
        options.attr = value(i++, flag);
        break;
      case '--all':
        options.all = true;
        break;
      case '--sleep': {
        const seconds = Number(value(i++, flag));
        if (!Number.isFinite(seconds) || seconds < 0) {
          throw new ConfigurationError('--sleep expects a non-negative number');
        }
        options.sleepSeconds = seconds;
        break;
      }
      case '--header': {
        const header = value(i++, flag);
        const colon = header.indexOf(':');
        if (colon <= 0) {
          throw new ConfigurationError(`Malformed header: ${header}`);
        }
        options.headers[header.slice(0, colon).trim()] = header.slice(colon + 1).trim();
        break;
      }
      case '--trace':
        options.tracePath = value(i++, flag);
        break;
      default:
        throw new ConfigurationError(`Unknown option: ${flag}`);
    }
  }

  if (options.by && options.query === undefined) {
    throw new ConfigurationError('--by requires --query');
  }
  return options;
}

/**
 * Run one CLI invocation and return the process exit code
 */
export async function run(
  args: string[],
  io: CliIO = { out: (line) => console.log(line), err: (line) => console.error(line) },
  scraperOptions: ScraperOptions = {}
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (e) {
    io.err(`Error: ${toError(e).message}`);
    io.err(USAGE);
    return 1;
  }

  const tracer = options.tracePath ? createJsonlTracer(options.tracePath) : undefined;
  const scraper = new Scraper({ logLevel: 'warn', tracer, ...scraperOptions });

  try {
    if (options.command === 'local') {
      await scraper.getFromLocal(options.target);
    } else {
      await scraper.fetch(options.target, {
        sleepSeconds: options.sleepSeconds,
        isPost: options.command === 'post',
        headers: options.headers,
      });
    }

    if (!options.by || options.query === undefined) {
      const result = read(scraper, { format: 'markdown' });
      if (result.status === 'error') {
        throw new Error(result.error);
      }
      io.out(result.content);
      return 0;
    }

    const matches = options.all
      ? scraper.findElements(options.by, options.query, undefined, options.tag)
      : [scraper.findElement(options.by, options.query, undefined, options.tag)];
    for (const match of matches) {
      io.out(match.getAttribute(options.attr));
    }
    return 0;
  } catch (e) {
    io.err(`Error: ${toError(e).message}`);
    return 1;
  } finally {
    await scraper.close();
    await tracer?.close();
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      console.error(`Error: ${toError(e).message}`);
      process.exitCode = 1;
    });
}
