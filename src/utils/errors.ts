export class SearchmuxError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SearchmuxError';
  }
}

export class ConfigError extends SearchmuxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class RequestValidationError extends SearchmuxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RequestValidationError';
  }
}

/**
 * Failure reported by, or on behalf of, one provider. The subclasses tell the
 * transport and the executor what may be retried and what may fail over.
 */
export class ProviderError extends SearchmuxError {
  public readonly provider: string;
  public readonly statusCode?: number;

  constructor(
    provider: string,
    message: string,
    statusCode?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ProviderError';
    this.provider = provider;
    this.statusCode = statusCode;
  }
}

export class CapabilityError extends ProviderError {
  constructor(provider: string, message: string, options?: ErrorOptions) {
    super(provider, message, undefined, options);
    this.name = 'CapabilityError';
  }
}

/** Connection failure or timeout; the only kind the transport retries. */
export class TransientNetworkError extends ProviderError {
  constructor(provider: string, message: string, options?: ErrorOptions) {
    super(provider, message, undefined, options);
    this.name = 'TransientNetworkError';
  }
}

export class VendorRateLimitedError extends ProviderError {
  constructor(provider: string, message: string, statusCode?: number, options?: ErrorOptions) {
    super(provider, message, statusCode, options);
    this.name = 'VendorRateLimitedError';
  }
}

export class AuthenticationError extends ProviderError {
  constructor(provider: string, message: string, statusCode?: number, options?: ErrorOptions) {
    super(provider, message, statusCode, options);
    this.name = 'AuthenticationError';
  }
}

/** Content was flagged by the scanner. Fatal for the query, never failed over. */
export class SecurityBlockedError extends ProviderError {
  constructor(provider: string, message: string, options?: ErrorOptions) {
    super(provider, message, undefined, options);
    this.name = 'SecurityBlockedError';
  }
}

export class CancellationError extends SearchmuxError {
  constructor(message = 'search cancelled', options?: ErrorOptions) {
    super(message, options);
    this.name = 'CancellationError';
  }
}

export class AllQueriesFailedError extends SearchmuxError {
  public readonly failures: ReadonlyArray<{ query: string; error: string }>;

  constructor(failures: ReadonlyArray<{ query: string; error: string }>) {
    super(`all queries failed: ${failures.map((f) => `${f.query}: ${f.error}`).join('; ')}`);
    this.name = 'AllQueriesFailedError';
    this.failures = failures;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
