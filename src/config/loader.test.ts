import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { applyEnvOverrides, loadConfig, mergeConfigWithCLI } from './loader.js';
import { ConfigSchema } from './schema.js';
import { ConfigError } from '../utils/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'searchmux-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const path = join(dir, 'searchmux.yaml');
    writeFileSync(path, content);
    return path;
  }

  it('reads YAML and expands environment references', async () => {
    const path = writeConfig(
      ['search:', '  maxParallel: 5', 'providers:', '  brave:', '    apiKey: ${TEST_BRAVE_KEY}'].join('\n')
    );

    const config = await loadConfig(path, { TEST_BRAVE_KEY: 'test-secret' });

    expect(config.search.maxParallel).toBe(5);
    expect(config.search.timeoutMs).toBe(30000);
    expect(config.providers.brave.apiKey).toBe('test-secret');
  });

  it('treats an empty file as defaults', async () => {
    const config = await loadConfig(writeConfig(''), {});

    expect(config).toEqual(ConfigSchema.parse({}));
  });

  it('reports every validation problem', async () => {
    const path = writeConfig(['search:', '  maxParallel: 0', 'output:', '  format: xml'].join('\n'));

    const error = await loadConfig(path, {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty('message', expect.stringContaining('search.maxParallel'));
    expect(error).toHaveProperty('message', expect.stringContaining('output.format'));
  });

  it('rejects malformed YAML', async () => {
    const path = writeConfig('search: [unclosed');

    await expect(loadConfig(path, {})).rejects.toThrow(`Failed to parse config file: ${path}`);
  });

  it('rejects a missing explicit path', async () => {
    await expect(loadConfig(join(dir, 'absent.yaml'), {})).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('applyEnvOverrides', () => {
  const defaults = ConfigSchema.parse({});

  it('keeps defaults when nothing is set', () => {
    expect(applyEnvOverrides(defaults, {})).toEqual(defaults);
  });

  it('applies valid numeric overrides', () => {
    const config = applyEnvOverrides(defaults, {
      SEARCH_MAX_PARALLEL: '8',
      SEARCH_RATE_LIMIT: '2.5',
      SEARCH_TIMEOUT_MS: '5000',
      SEARCH_FALLBACK_DELAY_MS: '250',
      SEARCH_RETRY_BASE_DELAY_MS: '50',
      SEARCH_MAX_ATTEMPTS: '5',
      KAGI_RATE_LIMIT: '0.5',
    });

    expect(config.search).toEqual({
      maxParallel: 8,
      rateLimit: 2.5,
      timeoutMs: 5000,
      fallbackDelayMs: 250,
      retryBaseDelayMs: 50,
      maxAttempts: 5,
    });
    expect(config.providers.kagi.rateLimit).toBe(0.5);
    expect(config.providers.brave.rateLimit).toBeUndefined();
  });

  it.each(['abc', '0', '-3', '1.5', ' '])('ignores SEARCH_MAX_PARALLEL=%j', (value) => {
    expect(applyEnvOverrides(defaults, { SEARCH_MAX_PARALLEL: value }).search.maxParallel).toBe(3);
  });

  it('reads the INTERNET_SEARCH_ names when the SEARCH_ names are unset', () => {
    const config = applyEnvOverrides(defaults, {
      INTERNET_SEARCH_MAX_PARALLEL: '6',
      INTERNET_SEARCH_RATE_LIMIT: '4',
    });

    expect(config.search.maxParallel).toBe(6);
    expect(config.search.rateLimit).toBe(4);
  });

  it('prefers the SEARCH_ names over the INTERNET_SEARCH_ names', () => {
    const config = applyEnvOverrides(defaults, {
      SEARCH_MAX_PARALLEL: '2',
      INTERNET_SEARCH_MAX_PARALLEL: '6',
      SEARCH_RATE_LIMIT: ' ',
      INTERNET_SEARCH_RATE_LIMIT: '4',
    });

    expect(config.search.maxParallel).toBe(2);
    expect(config.search.rateLimit).toBe(4);
  });

  it('ignores an invalid per-provider rate', () => {
    const configured = ConfigSchema.parse({ providers: { brave: { rateLimit: 3 } } });

    expect(applyEnvOverrides(configured, { BRAVE_RATE_LIMIT: 'fast' }).providers.brave.rateLimit).toBe(3);
  });
});

describe('mergeConfigWithCLI', () => {
  it('overrides output settings only when given', () => {
    const defaults = ConfigSchema.parse({});

    expect(mergeConfigWithCLI(defaults, {}).output).toEqual({ format: 'json', verbose: false });
    expect(mergeConfigWithCLI(defaults, { format: 'markdown', verbose: true }).output).toEqual({
      format: 'markdown',
      verbose: true,
    });
  });
});
