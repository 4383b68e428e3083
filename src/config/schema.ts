import { z } from 'zod';

export const ProviderConfigSchema = z.object({
  enabled: z.boolean().default(true),
  // Requests per second; falls back to search.rateLimit.
  rateLimit: z.number().positive().optional(),
});

export const BraveConfigSchema = ProviderConfigSchema.extend({
  apiKey: z.string().optional(),
});

export const GoogleConfigSchema = ProviderConfigSchema.extend({
  apiKey: z.string().optional(),
  searchId: z.string().optional(),
});

export const KagiConfigSchema = ProviderConfigSchema.extend({
  apiKey: z.string().optional(),
});

export const SearxngConfigSchema = ProviderConfigSchema.extend({
  baseUrl: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
});

export const DuckDuckGoConfigSchema = ProviderConfigSchema;

export const ProvidersConfigSchema = z.object({
  brave: BraveConfigSchema.default({}),
  google: GoogleConfigSchema.default({}),
  kagi: KagiConfigSchema.default({}),
  searxng: SearxngConfigSchema.default({}),
  duckduckgo: DuckDuckGoConfigSchema.default({}),
});

export const SearchConfigSchema = z.object({
  maxParallel: z.number().int().positive().default(3),
  rateLimit: z.number().positive().default(1),
  timeoutMs: z.number().int().positive().default(30000),
  fallbackDelayMs: z.number().int().nonnegative().default(1000),
  retryBaseDelayMs: z.number().int().nonnegative().default(100),
  maxAttempts: z.number().int().positive().default(3),
});

export const OutputConfigSchema = z.object({
  format: z.enum(['json', 'markdown']).default('json'),
  // Include per-provider attempts in rendered output.
  verbose: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  providers: ProvidersConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>;
export type ProviderName = keyof ProvidersConfig;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type OutputFormat = OutputConfig['format'];
