import {
  ConfigurationError,
  RetryableStatusError,
  RetryError,
  TransportError,
  type TransportFailureKind,
} from "./errors.js";
import { logError, logWarn } from "./logger.js";

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly exponentialBase: number;
  readonly retryOn: ReadonlySet<TransportFailureKind>;
}

/**
 * What a single attempt produced. A response whose status is retryable is
 * reported as `retryable-status` rather than thrown, so the executor retries
 * it without inspecting the value's shape.
 */
export type AttemptResult<T> =
  | { kind: "success"; value: T }
  | { kind: "retryable-status"; status: number; body: string };

export interface Attempt {
  /** 0-based index of the attempt that failed. */
  index: number;
  failure: Error;
  /** Wait before the next attempt. */
  delayMs: number;
}

export interface ExecuteOptions {
  /** Names the operation in log lines. */
  label?: string;
  onRetry?: (attempt: Attempt) => void;
  sleep?: (ms: number) => Promise<void>;
}

export type RetryPolicyOptions = Partial<Omit<RetryPolicy, "retryOn">> & {
  retryOn?: Iterable<TransportFailureKind>;
};

// setTimeout fires after 1ms for anything longer.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function createRetryPolicy(overrides: RetryPolicyOptions = {}): RetryPolicy {
  const policy = {
    maxRetries: overrides.maxRetries ?? 3,
    baseDelayMs: overrides.baseDelayMs ?? 1000,
    maxDelayMs: overrides.maxDelayMs ?? 60_000,
    exponentialBase: overrides.exponentialBase ?? 2,
    retryOn: new Set<TransportFailureKind>(overrides.retryOn ?? ["network", "timeout"]),
  };

  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new ConfigurationError(`maxRetries must be a non-negative integer, got ${policy.maxRetries}`);
  }
  if (!(policy.baseDelayMs > 0)) {
    throw new ConfigurationError(`baseDelayMs must be positive, got ${policy.baseDelayMs}`);
  }
  if (!(policy.maxDelayMs >= policy.baseDelayMs)) {
    throw new ConfigurationError(
      `maxDelayMs (${policy.maxDelayMs}) must be >= baseDelayMs (${policy.baseDelayMs})`
    );
  }
  if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs > MAX_TIMER_DELAY_MS) {
    throw new ConfigurationError(
      `maxDelayMs must be a finite number of at most ${MAX_TIMER_DELAY_MS}, got ${policy.maxDelayMs}`
    );
  }
  if (!(policy.exponentialBase > 1)) {
    throw new ConfigurationError(`exponentialBase must be > 1, got ${policy.exponentialBase}`);
  }

  return Object.freeze(policy);
}

export const DEFAULT_RETRY_POLICY = createRetryPolicy();

export function computeDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * policy.exponentialBase ** attempt, policy.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function isRetryableFailure(err: unknown, policy: RetryPolicy): err is TransportError {
  return err instanceof TransportError && policy.retryOn.has(err.kind);
}

/**
 * Run `operation` until it succeeds or the policy's retries are spent.
 *
 * Configured transport failures and retryable statuses are retried with
 * exponential backoff; any other error propagates on first occurrence.
 * Exhaustion raises a `RetryError` wrapping the last failure.
 */
export async function executeWithRetry<T>(
  operation: () => Promise<AttemptResult<T>>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: ExecuteOptions = {},
): Promise<T> {
  const label = options.label ?? "operation";
  const wait = options.sleep ?? sleep;
  let lastFailure: Error | undefined;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    let failure: Error;
    try {
      const outcome = await operation();
      if (outcome.kind === "success") return outcome.value;
      failure = new RetryableStatusError(outcome.status, outcome.body);
    } catch (err) {
      if (!isRetryableFailure(err, policy)) throw err;
      failure = err;
    }
    lastFailure = failure;

    if (attempt === policy.maxRetries) {
      logError(
        `All ${policy.maxRetries} retries exhausted for ${label}. Last error: ${failure.message}`
      );
      throw new RetryError(
        `Failed after ${policy.maxRetries} retries: ${failure.message}`,
        failure,
        attempt + 1,
      );
    }

    const delayMs = computeDelay(policy, attempt);
    logWarn(
      `Attempt ${attempt + 1}/${policy.maxRetries + 1} for ${label} failed with ${failure.name}: ${
        failure.message
      }. Retrying in ${(delayMs / 1000).toFixed(2)}s...`
    );
    options.onRetry?.({ index: attempt, failure, delayMs });
    await wait(delayMs);
  }

  throw new RetryError(`Unexpected retry loop exit for ${label}`, lastFailure, policy.maxRetries + 1);
}
