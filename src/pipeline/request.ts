import { z } from 'zod';
import { isSearchType, type SearchParams, type SearchType } from '../providers/types.js';
import { RequestValidationError } from '../utils/errors.js';

export interface SearchRequest {
  type: SearchType;
  queries: string[];
  /** Restricts the search to one provider, with no fallback. */
  provider?: string;
  /** Everything else in the request, passed to the adapters untouched. */
  params: SearchParams;
}

const QueriesSchema = z
  .array(z.unknown(), {
    required_error: "missing required parameter 'query'",
    invalid_type_error: "'query' must be an array of strings",
  })
  .min(1, "'query' array cannot be empty")
  .transform((items, ctx) => {
    const queries: string[] = [];
    items.forEach((item, index) => {
      if (typeof item === 'string' && item !== '') {
        queries.push(item);
      } else {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `query at index ${index} must be a non-empty string`,
        });
      }
    });
    return queries;
  });

const SearchTypeSchema = z
  .string({ invalid_type_error: "'type' must be a string" })
  .default('web')
  .transform((value, ctx): SearchType => {
    if (isSearchType(value)) {
      return value;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported search type: ${value}` });
    return z.NEVER;
  });

export const SearchRequestSchema = z
  .object(
    {
      query: QueriesSchema,
      type: SearchTypeSchema,
      provider: z
        .string({ invalid_type_error: "'provider' must be a string" })
        .optional()
        .transform((value) => value?.trim() || undefined),
      count: z
        .number({ invalid_type_error: "'count' must be a positive integer" })
        .int("'count' must be a positive integer")
        .positive("'count' must be a positive integer")
        .optional(),
    },
    {
      required_error: 'search request must be an object',
      invalid_type_error: 'search request must be an object',
    }
  )
  .passthrough();

/** Validates a raw request. The first problem found is reported. */
export function parseSearchRequest(input: unknown): SearchRequest {
  const result = SearchRequestSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new RequestValidationError(issue?.message ?? 'invalid search request', { cause: result.error });
  }

  const { query, type, provider, ...params } = result.data;
  return {
    type,
    queries: query,
    provider,
    params: Object.fromEntries(Object.entries(params).filter(([, value]) => value !== undefined)),
  };
}
