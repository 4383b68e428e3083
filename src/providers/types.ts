export const SEARCH_TYPES = ['web', 'image', 'news', 'video', 'local'] as const;

export type SearchType = (typeof SEARCH_TYPES)[number];

export function isSearchType(value: string): value is SearchType {
  return (SEARCH_TYPES as readonly string[]).includes(value);
}

export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly description: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Provider-specific options (`count`, `offset`, `freshness`, `pageno`, ...).
 * Each adapter reads the keys it understands and ignores the rest.
 */
export type SearchParams = Readonly<Record<string, unknown>>;

export interface SearchProvider {
  readonly name: string;
  readonly supportedTypes: ReadonlySet<SearchType>;
  /** Cheap credential/config check, evaluated on every request. No I/O. */
  isAvailable(): boolean;
  search(
    type: SearchType,
    query: string,
    params: SearchParams,
    signal?: AbortSignal
  ): Promise<SearchResult[]>;
}

/** Reads a credential at call time so it can be injected or revoked while running. */
export type CredentialSource = () => string | undefined;
