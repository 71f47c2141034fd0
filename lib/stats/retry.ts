import { FetchError, describeError } from "@/lib/errors";
import { silentLogger, type Logger } from "@/lib/log";
import { systemClock, type Clock } from "./clock";

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitter: boolean;
};

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 600,
  multiplier: 2,
  maxDelayMs: 30_000,
  jitter: false,
};

/**
 * Thrown by an attempt to tell the policy whether a retry makes sense.
 * Anything else thrown from an attempt is treated as transient.
 */
export class AttemptError extends Error {
  readonly retryable: boolean;
  readonly status: number | null;

  constructor(message: string, opts: { retryable: boolean; status?: number | null; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.name = "AttemptError";
    this.retryable = opts.retryable;
    this.status = opts.status ?? null;
  }
}

export type RetryHooks = {
  label?: string;
  logger?: Logger;
  onAttempt?: (attempt: number) => void;
};

export class RetryPolicy {
  readonly options: RetryOptions;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(
    options: Partial<RetryOptions> = {},
    deps: { clock?: Clock; random?: () => number } = {}
  ) {
    this.options = {
      maxAttempts: options.maxAttempts ?? DEFAULT_RETRY.maxAttempts,
      baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs,
      multiplier: options.multiplier ?? DEFAULT_RETRY.multiplier,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs,
      jitter: options.jitter ?? DEFAULT_RETRY.jitter,
    };
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.options.maxAttempts}`);
    }
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
  }

  // Wait after failed attempt n (1-based)
  delayFor(attempt: number): number {
    const { baseDelayMs, multiplier, maxDelayMs, jitter } = this.options;
    const raw = Math.min(maxDelayMs, baseDelayMs * multiplier ** (attempt - 1));
    return jitter ? Math.round(raw * this.random()) : raw;
  }

  async run<T>(fn: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    const log = hooks.logger ?? silentLogger;
    const label = hooks.label ?? "request";
    const { maxAttempts } = this.options;

    for (let attempt = 1; ; attempt++) {
      hooks.onAttempt?.(attempt);
      try {
        return await fn(attempt);
      } catch (err) {
        const retryable = err instanceof AttemptError ? err.retryable : true;
        const status = err instanceof AttemptError ? err.status : null;
        if (!retryable) {
          throw new FetchError(`${label} failed: ${describeError(err)}`, { attempts: attempt, status, cause: err });
        }
        if (attempt >= maxAttempts) {
          log.error(`${label} failed after ${attempt} attempts: ${describeError(err)}`);
          throw new FetchError(`${label} failed after ${attempt} attempts: ${describeError(err)}`, {
            attempts: attempt,
            status,
            cause: err,
          });
        }
        const wait = this.delayFor(attempt);
        log.warn(`${label} failed (attempt ${attempt}): ${describeError(err)}. Retrying in ${wait}ms...`);
        await this.clock.sleep(wait);
      }
    }
  }
}
