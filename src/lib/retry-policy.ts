import { z } from "zod";

/**
 * How many times to re-check a value the remote side computes asynchronously,
 * and how long to pause before each re-check. `attempt` starts at 1.
 */
export interface RetryPolicy {
  readonly maxRetries: number;
  delayMs(attempt: number): number;
}

const nonNegativeInt = z.number().int().nonnegative();

export function fixedDelayPolicy(delayMs: number, maxRetries = 1): RetryPolicy {
  const delay = nonNegativeInt.parse(delayMs);
  return {
    maxRetries: nonNegativeInt.parse(maxRetries),
    delayMs: () => delay,
  };
}

const backoffSchema = z.object({
  initialDelayMs: nonNegativeInt,
  maxRetries: nonNegativeInt,
  factor: z.number().min(1).default(2),
  maxDelayMs: nonNegativeInt.optional(),
});

export type ExponentialBackoffOptions = z.input<typeof backoffSchema>;

export function exponentialBackoffPolicy(options: ExponentialBackoffOptions): RetryPolicy {
  const { initialDelayMs, maxRetries, factor, maxDelayMs } = backoffSchema.parse(options);
  return {
    maxRetries,
    delayMs(attempt: number): number {
      const delay = Math.round(initialDelayMs * factor ** Math.max(0, attempt - 1));
      return maxDelayMs === undefined ? delay : Math.min(delay, maxDelayMs);
    },
  };
}

/** Resolves after `ms`, or as soon as `signal` aborts. The timer is cleared on abort. */
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
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
