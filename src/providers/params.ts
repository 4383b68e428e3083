import type { SearchParams, SearchProvider, SearchType } from './types.js';
import { CapabilityError } from '../utils/errors.js';

export const DEFAULT_COUNT = 5;

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function assertSupported(provider: SearchProvider, type: SearchType): void {
  if (!provider.supportedTypes.has(type)) {
    throw new CapabilityError(provider.name, `unsupported search type for ${provider.name}: ${type}`);
  }
}

/**
 * Integer option, clamped into `[min, max]`. Numeric strings are accepted
 * because CLI flags arrive as text; anything else falls back.
 */
export function readInteger(
  params: SearchParams,
  key: string,
  fallback: number,
  range: { min: number; max: number }
): number {
  const raw = params[key];
  const value =
    typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : NaN;

  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(range.max, Math.max(range.min, Math.trunc(value)));
}

export function readCount(params: SearchParams, max: number): number {
  return readInteger(params, 'count', Math.min(DEFAULT_COUNT, max), { min: 1, max });
}

export function readString(params: SearchParams, key: string): string | undefined {
  const raw = params[key];
  if (typeof raw === 'number') {
    return String(raw);
  }
  return typeof raw === 'string' && raw.trim() !== '' ? raw.trim() : undefined;
}

export function readChoice<T extends string>(
  params: SearchParams,
  key: string,
  choices: readonly T[]
): T | undefined {
  const value = readString(params, key);
  return choices.find((choice) => choice === value);
}

/** Strips markup vendors embed in titles and snippets (`<strong>`, `&amp;`). */
export function cleanText(text: string | undefined): string {
  if (!text) {
    return '';
  }
  return text
    .replace(/<[^>]*>/g, '')
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, code: string) => {
      if (code.startsWith('#x') || code.startsWith('#X')) {
        return String.fromCodePoint(parseInt(code.slice(2), 16));
      }
      if (code.startsWith('#')) {
        return String.fromCodePoint(parseInt(code.slice(1), 10));
      }
      return ENTITIES[code.toLowerCase()] ?? entity;
    })
    .replace(/\s+/g, ' ')
    .trim();
}

export function compactMetadata(entries: Record<string, unknown>): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined && value !== null && value !== '') {
      metadata[key] = value;
    }
  }
  return metadata;
}
