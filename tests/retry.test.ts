import { strict as assert } from "node:assert";
import { test } from "node:test";

import {
  computeDelay,
  createRetryPolicy,
  executeWithRetry,
  DEFAULT_RETRY_POLICY,
  type Attempt,
  type AttemptResult,
  type ExecuteOptions,
  type RetryPolicy,
} from "../src/retry.js";
import {
  ConfigurationError,
  RetryableStatusError,
  RetryError,
  TransportError,
} from "../src/errors.js";

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => { delays.push(ms); } };
}

/** Runs a plain async function; every resolved value is a success. */
function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy, options: ExecuteOptions = {}): Promise<T> {
  return executeWithRetry<T>(
    async (): Promise<AttemptResult<T>> => ({ kind: "success", value: await fn() }),
    policy,
    options,
  );
}

const fast = createRetryPolicy({ maxRetries: 2, baseDelayMs: 10 });

test("returns the result on first success without waiting", async () => {
  const { delays, sleep } = recordingSleep();
  let calls = 0;
  const result = await withRetry(async () => { calls++; return "ok"; }, fast, { sleep });
  assert.equal(result, "ok");
  assert.equal(calls, 1);
  assert.deepEqual(delays, []);
});

test("fails twice then succeeds: 3 calls, waits 10ms then 20ms", async () => {
  const { delays, sleep } = recordingSleep();
  let calls = 0;
  const result = await withRetry(async () => {
    calls++;
    if (calls < 3) throw new TransportError("network", "Transient error");
    return "ok";
  }, fast, { sleep });
  assert.equal(result, "ok");
  assert.equal(calls, 3);
  assert.deepEqual(delays, [10, 20]);
});

test("always failing operation raises RetryError wrapping the last failure", async () => {
  const { sleep } = recordingSleep();
  let calls = 0;
  const permanent = new TransportError("network", "Permanent error");
  await assert.rejects(
    withRetry(async () => { calls++; throw permanent; }, fast, { sleep }),
    (err: unknown) => {
      if (!(err instanceof RetryError)) return false;
      assert.equal(err.lastFailure, permanent);
      assert.equal(err.cause, permanent);
      assert.equal(err.attempts, 3);
      assert.equal(err.message, "Failed after 2 retries: Permanent error");
      return true;
    }
  );
  assert.equal(calls, 3);
});

test("invokes the operation n+1 times for n retries", async () => {
  for (const maxRetries of [0, 1, 4]) {
    const { sleep } = recordingSleep();
    let calls = 0;
    const policy = createRetryPolicy({ maxRetries, baseDelayMs: 1 });
    await assert.rejects(
      withRetry(async () => { calls++; throw new TransportError("timeout", "slow"); }, policy, { sleep }),
      RetryError
    );
    assert.equal(calls, maxRetries + 1);
  }
});

test("succeeds on attempt k after k failures with exactly k+1 calls", async () => {
  const policy = createRetryPolicy({ maxRetries: 5, baseDelayMs: 1 });
  for (const k of [0, 2, 5]) {
    const { sleep } = recordingSleep();
    let calls = 0;
    const result = await withRetry(async () => {
      calls++;
      if (calls <= k) throw new TransportError("network", "down");
      return calls;
    }, policy, { sleep });
    assert.equal(result, k + 1);
    assert.equal(calls, k + 1);
  }
});

test("errors outside the configured kinds propagate on the first attempt", async () => {
  const { delays, sleep } = recordingSleep();
  let calls = 0;
  const bug = new TypeError("Not retryable");
  await assert.rejects(
    withRetry(async () => { calls++; throw bug; }, fast, { sleep }),
    (err: unknown) => err === bug
  );
  assert.equal(calls, 1);
  assert.deepEqual(delays, []);
});

test("transport kinds not in retryOn are not retried", async () => {
  const { sleep } = recordingSleep();
  let calls = 0;
  const policy = createRetryPolicy({ maxRetries: 3, baseDelayMs: 1, retryOn: ["network"] });
  await assert.rejects(
    withRetry(async () => { calls++; throw new TransportError("timeout", "slow"); }, policy, { sleep }),
    TransportError
  );
  assert.equal(calls, 1);
});

test("retryable status is retried, then surfaces as RetryError", async () => {
  const { delays, sleep } = recordingSleep();
  let calls = 0;
  await assert.rejects(
    executeWithRetry(async (): Promise<AttemptResult<string>> => {
      calls++;
      return { kind: "retryable-status", status: 429, body: "Rate limit exceeded" };
    }, fast, { sleep }),
    (err: unknown) => {
      if (!(err instanceof RetryError)) return false;
      const last = err.lastFailure;
      if (!(last instanceof RetryableStatusError)) return false;
      assert.equal(last.status, 429);
      assert.equal(last.body, "Rate limit exceeded");
      return true;
    }
  );
  assert.equal(calls, 3);
  assert.deepEqual(delays, [10, 20]);
});

test("a retryable status followed by success returns the success value", async () => {
  const { sleep } = recordingSleep();
  let calls = 0;
  const result = await executeWithRetry(async (): Promise<AttemptResult<string>> => {
    calls++;
    return calls === 1
      ? { kind: "retryable-status", status: 503, body: "busy" }
      : { kind: "success", value: "data" };
  }, fast, { sleep });
  assert.equal(result, "data");
  assert.equal(calls, 2);
});

test("maxRetries 0 means one attempt and no wait", async () => {
  const { delays, sleep } = recordingSleep();
  let calls = 0;
  const policy = createRetryPolicy({ maxRetries: 0 });
  await assert.rejects(
    withRetry(async () => { calls++; throw new TransportError("network", "down"); }, policy, { sleep }),
    (err: unknown) => err instanceof RetryError && err.message === "Failed after 0 retries: down"
  );
  assert.equal(calls, 1);
  assert.deepEqual(delays, []);
});

test("onRetry sees attempt index, failure and delay", async () => {
  const { sleep } = recordingSleep();
  const seen: Attempt[] = [];
  const failure = new TransportError("network", "reset");
  let calls = 0;
  await withRetry(async () => {
    calls++;
    if (calls < 3) throw failure;
    return "ok";
  }, fast, { sleep, onRetry: (a) => seen.push(a) });
  assert.deepEqual(seen, [
    { index: 0, failure, delayMs: 10 },
    { index: 1, failure, delayMs: 20 },
  ]);
});

test("computeDelay doubles from the base and stops at the ceiling", () => {
  const policy = createRetryPolicy({ baseDelayMs: 1000, exponentialBase: 2, maxDelayMs: 60_000 });
  const delays = [0, 1, 2, 3, 4, 5, 6, 7].map((i) => computeDelay(policy, i));
  assert.deepEqual(delays, [1000, 2000, 4000, 8000, 16000, 32000, 60000, 60000]);
});

test("computeDelay honours a non-integer exponential base", () => {
  const policy = createRetryPolicy({ baseDelayMs: 100, exponentialBase: 1.5, maxDelayMs: 200 });
  assert.equal(computeDelay(policy, 1), 150);
  assert.equal(computeDelay(policy, 2), 200);
});

test("default policy", () => {
  assert.equal(DEFAULT_RETRY_POLICY.maxRetries, 3);
  assert.equal(DEFAULT_RETRY_POLICY.baseDelayMs, 1000);
  assert.equal(DEFAULT_RETRY_POLICY.maxDelayMs, 60_000);
  assert.deepEqual([...DEFAULT_RETRY_POLICY.retryOn].sort(), ["network", "timeout"]);
  assert.equal(computeDelay(DEFAULT_RETRY_POLICY, 10), 60_000);
  assert.ok(Object.isFrozen(DEFAULT_RETRY_POLICY));
});

test("createRetryPolicy rejects invalid settings", () => {
  assert.throws(() => createRetryPolicy({ maxRetries: -1 }), ConfigurationError);
  assert.throws(() => createRetryPolicy({ maxRetries: 1.5 }), ConfigurationError);
  assert.throws(() => createRetryPolicy({ baseDelayMs: 0 }), ConfigurationError);
  assert.throws(() => createRetryPolicy({ baseDelayMs: 500, maxDelayMs: 100 }), ConfigurationError);
  assert.throws(() => createRetryPolicy({ exponentialBase: 1 }), ConfigurationError);
  assert.throws(() => createRetryPolicy({ maxDelayMs: Infinity }), ConfigurationError);
  assert.throws(() => createRetryPolicy({ baseDelayMs: 2 ** 31, maxDelayMs: 2 ** 31 }), ConfigurationError);
  assert.equal(createRetryPolicy({ maxDelayMs: 2_147_483_647 }).maxDelayMs, 2_147_483_647);
});

test("uses a real timer when no sleep is injected", async () => {
  let calls = 0;
  const policy = createRetryPolicy({ maxRetries: 2, baseDelayMs: 10 });
  const started = Date.now();
  const result = await withRetry(async () => {
    calls++;
    if (calls < 3) throw new TransportError("network", "flaky");
    return "ok";
  }, policy);
  assert.equal(result, "ok");
  assert.ok(Date.now() - started >= 25);
});
