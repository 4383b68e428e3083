import { Command } from 'commander';

import { loadConfig, mergeConfigWithCLI } from './config/loader.js';
import type { OutputFormat } from './config/schema.js';
import { createProviders, createSearch } from './app.js';
import type { ProviderRegistry } from './providers/index.js';
import { renderResponse } from './output/index.js';
import { createChildLogger } from './utils/logger.js';

const cliLogger = createChildLogger('cli');

export interface SearchCommandOptions {
  type: string;
  provider?: string;
  count?: string;
  offset?: string;
  start?: string;
  page?: string;
  freshness?: string;
  language?: string;
  safesearch?: string;
  timeRange?: string;
  format?: string;
  verbose?: boolean;
  config?: string;
}

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/** Maps CLI flags onto the request shape `MultiSearch.run` validates. */
export function buildSearchRequest(queries: string[], options: SearchCommandOptions): Record<string, unknown> {
  const request: Record<string, unknown> = {
    query: queries,
    type: options.type,
    provider: options.provider,
    count: parseNumber(options.count),
    offset: parseNumber(options.offset),
    start: parseNumber(options.start),
    pageno: parseNumber(options.page),
    freshness: options.freshness,
    language: options.language,
    safesearch: options.safesearch,
    time_range: options.timeRange,
  };
  return Object.fromEntries(Object.entries(request).filter(([, value]) => value !== undefined));
}

function parseFormat(value: string | undefined): OutputFormat | undefined {
  if (value === undefined || value === 'json' || value === 'markdown') {
    return value;
  }
  throw new Error(`unsupported output format: ${value}`);
}

export function formatProviderList(registry: ProviderRegistry): string {
  return registry
    .list()
    .map((provider) => {
      const available = provider.isAvailable();
      const icon = available ? '✓' : '✗';
      const status = available ? 'available' : 'unavailable';
      return `  ${icon} ${provider.name}: ${status} (${[...provider.supportedTypes].join(', ')})`;
    })
    .join('\n');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('searchmux')
    .description('Multi-provider web search with fallback, rate limiting and parallel queries')
    .version('1.0.0');

  program
    .command('search')
    .description('Run one or more queries across the configured providers')
    .argument('<query...>', 'Search queries, each run independently')
    .option('-t, --type <type>', 'Search type: web, image, news, video or local', 'web')
    .option('-p, --provider <name>', 'Use only this provider, with no fallback')
    .option('-n, --count <number>', 'Results per query')
    .option('--offset <number>', 'Result page offset (brave)')
    .option('--start <number>', 'Zero-based result offset (google)')
    .option('--page <number>', 'Result page (searxng)')
    .option('--freshness <value>', 'Result age filter: pd, pw, pm or py (brave)')
    .option('--language <code>', 'Result language (searxng)')
    .option('--safesearch <level>', 'Safe search level 0, 1 or 2 (searxng)')
    .option('--time-range <range>', 'day, month or year (searxng)')
    .option('-f, --format <format>', 'Output format: json or markdown')
    .option('-v, --verbose', 'Include provider attempts in the output')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (queries: string[], options: SearchCommandOptions) => {
      const controller = new AbortController();
      const onInterrupt = () => controller.abort('interrupted');
      process.once('SIGINT', onInterrupt);

      try {
        const config = mergeConfigWithCLI(await loadConfig(options.config), {
          format: parseFormat(options.format),
          verbose: options.verbose,
        });

        const response = await createSearch(config).run(buildSearchRequest(queries, options), controller.signal);
        console.log(renderResponse(response, config.output));

        cliLogger.info(response.summary, 'Search complete');
      } catch (error) {
        cliLogger.error({ error }, 'Search failed');
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });

  program
    .command('providers')
    .description('List providers, their availability and supported search types')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: { config?: string }) => {
      try {
        const config = await loadConfig(options.config);
        console.log('Configured providers:\n');
        console.log(formatProviderList(createProviders(config)));
        console.log('');
      } catch (error) {
        cliLogger.error({ error }, 'Provider listing failed');
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  return program;
}
