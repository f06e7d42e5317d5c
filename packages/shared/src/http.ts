import type { CircuitBreakerState } from "./types.js";

/**
 * Resolves after `ms`, or early once `signal` aborts. Never rejects, so loops
 * can re-check their own stop condition after waking up.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface RetryPolicy {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  signal?: AbortSignal;
}

const defaultPolicy: RetryPolicy = {
  timeoutMs: 3000,
  retries: 1,
  backoffMs: 200
};

export async function requestWithRetry(
  url: string,
  init: RequestInit,
  policy: Partial<RetryPolicy> = {}
): Promise<Response> {
  const merged = { ...defaultPolicy, ...policy };
  const outer = merged.signal;
  let lastError: unknown;

  for (let attempt = 0; attempt <= merged.retries; attempt += 1) {
    if (outer?.aborted) {
      throw new Error("request aborted");
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), merged.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    outer?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(url, {
        ...init,
        signal: controller.signal,
        headers: {
          "content-type": "application/json",
          ...(init.headers ?? {})
        }
      });

      if (response.ok) {
        return response;
      }

      lastError = new Error(`Request failed: HTTP ${response.status}`);
    } catch (error) {
      lastError = error;
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", forwardAbort);
    }

    if (attempt < merged.retries && !outer?.aborted) {
      const backoff = merged.backoffMs * Math.pow(2, attempt);
      await sleep(backoff, outer);
    }
  }

  throw lastError instanceof Error ? lastError : new Error("requestWithRetry failed");
}

export class CircuitBreaker {
  private state: CircuitBreakerState["state"] = "closed";
  private failureCount = 0;
  private lastFailureAtMs: number | undefined;
  private openedAtMs: number | undefined;
  private lastLatencyMs = 0;

  constructor(
    private readonly failureThreshold = 5,
    private readonly latencyThresholdMs = 5000,
    private readonly resetTimeoutMs = 30000,
    private readonly now: () => number = () => Date.now()
  ) {}

  canRequest(): boolean {
    if (this.state === "open") {
      if (this.openedAtMs !== undefined && this.now() - this.openedAtMs >= this.resetTimeoutMs) {
        this.state = "half_open";
        return true;
      }
      return false;
    }
    return true;
  }

  recordSuccess(latencyMs: number): void {
    this.lastLatencyMs = latencyMs;
    this.failureCount = 0;
    this.state = "closed";
    this.openedAtMs = undefined;
  }

  recordFailure(latencyMs: number): void {
    this.lastLatencyMs = latencyMs;
    this.failureCount += 1;
    this.lastFailureAtMs = this.now();

    if (
      this.state === "half_open" ||
      this.failureCount >= this.failureThreshold ||
      latencyMs > this.latencyThresholdMs
    ) {
      this.state = "open";
      this.openedAtMs = this.now();
    }
  }

  snapshot(): CircuitBreakerState {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureAt: this.lastFailureAtMs !== undefined ? new Date(this.lastFailureAtMs).toISOString() : undefined,
      openedAt: this.openedAtMs !== undefined ? new Date(this.openedAtMs).toISOString() : undefined,
      lastLatencyMs: this.lastLatencyMs
    };
  }
}
