export { logger, createChildLogger } from './logger.js';
export { RateLimiter } from './rate-limiter.js';
export { RateLimitedHttpClient, type HttpClientOptions, type HttpRequest, type HttpResponse } from './http-client.js';
export { abortReason, sleep, throwIfAborted } from './abort.js';
export {
  SearchmuxError,
  ConfigError,
  RequestValidationError,
  ProviderError,
  CapabilityError,
  TransientNetworkError,
  VendorRateLimitedError,
  AuthenticationError,
  SecurityBlockedError,
  CancellationError,
  AllQueriesFailedError,
  errorMessage,
} from './errors.js';
