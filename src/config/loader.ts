import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, type Config, type OutputFormat, type ProviderName } from './schema.js';
import { ConfigError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('config');

export const CONFIG_SEARCH_PATHS = ['./config/local.yaml', './config/default.yaml', './searchmux.yaml'];

type Env = Readonly<Record<string, string | undefined>>;

function expandEnvVariables(value: unknown, env: Env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
      return env[envVar] ?? '';
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvVariables(item, env));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = expandEnvVariables(val, env);
    }
    return result;
  }
  return value;
}

/**
 * Positive number from the environment. The first of `names` that is set
 * wins. Unset, malformed or non-positive values keep `current`.
 */
function readPositive(env: Env, names: string | readonly string[], current: number, integer = false): number {
  const name = [names].flat().find((candidate) => env[candidate]?.trim());
  const raw = name === undefined ? undefined : env[name];
  if (raw === undefined) {
    return current;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    logger.warn({ variable: name, value: raw, using: current }, 'Ignoring invalid environment value');
    return current;
  }
  return value;
}

export function applyEnvOverrides(config: Config, env: Env = process.env): Config {
  const search = {
    maxParallel: readPositive(
      env,
      ['SEARCH_MAX_PARALLEL', 'INTERNET_SEARCH_MAX_PARALLEL'],
      config.search.maxParallel,
      true
    ),
    rateLimit: readPositive(env, ['SEARCH_RATE_LIMIT', 'INTERNET_SEARCH_RATE_LIMIT'], config.search.rateLimit),
    timeoutMs: readPositive(env, 'SEARCH_TIMEOUT_MS', config.search.timeoutMs, true),
    fallbackDelayMs: readPositive(env, 'SEARCH_FALLBACK_DELAY_MS', config.search.fallbackDelayMs, true),
    retryBaseDelayMs: readPositive(env, 'SEARCH_RETRY_BASE_DELAY_MS', config.search.retryBaseDelayMs, true),
    maxAttempts: readPositive(env, 'SEARCH_MAX_ATTEMPTS', config.search.maxAttempts, true),
  };

  const rateLimitFor = (name: ProviderName): number | undefined => {
    const current = config.providers[name].rateLimit;
    const value = readPositive(env, `${name.toUpperCase()}_RATE_LIMIT`, current ?? 0);
    return value > 0 ? value : current;
  };

  return {
    ...config,
    search,
    providers: {
      brave: { ...config.providers.brave, rateLimit: rateLimitFor('brave') },
      google: { ...config.providers.google, rateLimit: rateLimitFor('google') },
      kagi: { ...config.providers.kagi, rateLimit: rateLimitFor('kagi') },
      searxng: { ...config.providers.searxng, rateLimit: rateLimitFor('searxng') },
      duckduckgo: { ...config.providers.duckduckgo, rateLimit: rateLimitFor('duckduckgo') },
    },
  };
}

/**
 * Loads the first config file found (or `configPath`), expands `${VAR}`
 * references, validates it and applies environment overrides. No file means
 * defaults.
 */
export async function loadConfig(configPath?: string, env: Env = process.env): Promise<Config> {
  const paths = configPath ? [configPath] : CONFIG_SEARCH_PATHS;

  if (configPath && !existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let configData: unknown = {};
  let loadedPath: string | null = null;

  for (const path of paths) {
    if (existsSync(path)) {
      try {
        const content = await readFile(path, 'utf-8');
        configData = parseYaml(content) ?? {};
        loadedPath = path;
        break;
      } catch (error) {
        throw new ConfigError(`Failed to parse config file: ${path}`, { cause: error });
      }
    }
  }

  // Expand environment variables
  const expandedConfig = expandEnvVariables(configData, env);

  // Validate with Zod
  const result = ConfigSchema.safeParse(expandedConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  logger.debug({ path: loadedPath ?? '(defaults)' }, 'Configuration loaded');
  return applyEnvOverrides(result.data, env);
}

export function mergeConfigWithCLI(
  config: Config,
  cliOptions: Partial<{
    format: OutputFormat;
    verbose: boolean;
  }>
): Config {
  const merged = { ...config };

  if (cliOptions.format !== undefined) {
    merged.output = { ...merged.output, format: cliOptions.format };
  }

  if (cliOptions.verbose !== undefined) {
    merged.output = { ...merged.output, verbose: cliOptions.verbose };
  }

  return merged;
}
