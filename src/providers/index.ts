export { BraveProvider, BRAVE_API_BASE_URL } from './brave.js';
export { GoogleProvider, GOOGLE_API_URL } from './google.js';
export { KagiProvider, KAGI_API_BASE_URL } from './kagi.js';
export { SearxngProvider, type SearxngSettings } from './searxng.js';
export { DuckDuckGoProvider, DUCKDUCKGO_API_URL } from './duckduckgo.js';
export { ProviderRegistry } from './registry.js';
export {
  SEARCH_TYPES,
  isSearchType,
  type SearchType,
  type SearchResult,
  type SearchParams,
  type SearchProvider,
  type CredentialSource,
} from './types.js';
