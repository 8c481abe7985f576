import {
  ApiError,
  AuthenticationError,
  NotFoundError,
  RateLimitError,
} from "./errors.js";
import { logError, logWarn } from "./logger.js";
import type { AttemptResult } from "./retry.js";

export interface HttpExchange {
  url: string;
  status: number;
  body: string;
}

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.has(status);
}

export function toAttemptResult(exchange: HttpExchange): AttemptResult<HttpExchange> {
  if (isRetryableStatus(exchange.status)) {
    return { kind: "retryable-status", status: exchange.status, body: exchange.body };
  }
  return { kind: "success", value: exchange };
}

/**
 * Turn a final (non-retried) exchange into its parsed JSON payload, or throw
 * the typed error for its status.
 */
export function classifyResponse(exchange: HttpExchange): unknown {
  const { url, status, body } = exchange;

  if (status >= 200 && status < 300) {
    try {
      return JSON.parse(body);
    } catch {
      throw new ApiError(`Invalid JSON response from ${url}`, status, body);
    }
  }

  if (status === 401 || status === 403) {
    logError(`Authentication failed: ${body}`);
    throw new AuthenticationError(`Authentication failed: ${status} for ${url}`, status, body);
  }
  if (status === 404) {
    logWarn(`Resource not found: ${url}`);
    throw new NotFoundError(`Resource not found: ${url}`, status, body);
  }
  if (status === 429) {
    logWarn(`Rate limit exceeded: ${body}`);
    throw new RateLimitError(`Rate limit exceeded: ${url}`, status, body);
  }

  logError(`API error (${status}): ${body}`);
  throw new ApiError(`API request failed: ${status} for ${url}`, status, body);
}
