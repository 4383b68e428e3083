export * from './providers/index.js';
export * from './pipeline/index.js';
export * from './output/index.js';
export * from './utils/index.js';
export { createProviders, createSearch } from './app.js';
export { loadConfig, applyEnvOverrides, mergeConfigWithCLI, CONFIG_SEARCH_PATHS } from './config/loader.js';
export { ConfigSchema, type Config, type OutputConfig, type SearchConfig, type ProvidersConfig } from './config/schema.js';
