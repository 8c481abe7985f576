export class AirQualityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ApiErrorKind = "authentication" | "not-found" | "rate-limited" | "api";

/**
 * A non-retried HTTP failure. Carries the status code and the raw body
 * exactly as the API returned them.
 */
export class ApiError extends AirQualityError {
  readonly kind: ApiErrorKind = "api";

  constructor(
    message: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(message);
  }
}

export class AuthenticationError extends ApiError {
  override readonly kind = "authentication";
}

export class NotFoundError extends ApiError {
  override readonly kind = "not-found";
}

export class RateLimitError extends ApiError {
  override readonly kind = "rate-limited";
}

export type TransportFailureKind = "network" | "timeout";

/** Raised when no HTTP exchange completed at all. */
export class TransportError extends AirQualityError {
  constructor(
    readonly kind: TransportFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Synthesized by the retry executor for a response with a retryable status. */
export class RetryableStatusError extends AirQualityError {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`Retryable status code: ${status}`);
  }
}

export class RetryError extends AirQualityError {
  constructor(
    message: string,
    readonly lastFailure: Error | undefined,
    readonly attempts: number,
  ) {
    super(message, { cause: lastFailure });
  }
}

export class ValidationError extends AirQualityError {}

export class ConfigurationError extends AirQualityError {}

export function describeError(err: unknown): string {
  if (err instanceof ApiError) return `${err.message} (status ${err.status})`;
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
