/**
 * Retry policy for provider calls (mailbox, embeddings, language model).
 * Exponential backoff with jitter, bounded attempts, per-attempt timeout.
 */

import { TransientProviderError } from '../errors';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  /** Lower bound of the random multiplier applied to each delay (upper bound is 1). */
  jitter?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const NETWORK_ERROR_RE = /network|timeout|timed out|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up/i;

/** Best-effort HTTP status of an error thrown by googleapis, the Anthropic SDK or fetch wrappers. */
export function statusOf(err: unknown): number | null {
  if (!err || typeof err !== 'object') return null;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('code' in err && typeof err.code === 'number') return err.code;
  if ('response' in err) {
    const res = err.response;
    if (res && typeof res === 'object' && 'status' in res && typeof res.status === 'number') {
      return res.status;
    }
  }
  return null;
}

export function isRetryable(err: unknown): boolean {
  if (err instanceof TransientProviderError) return true;
  const status = statusOf(err);
  if (status !== null) {
    return status === 408 || status === 429 || status >= 500;
  }
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    if (NETWORK_ERROR_RE.test(err.code)) return true;
  }
  return err instanceof Error && NETWORK_ERROR_RE.test(err.message);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

class AttemptTimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly jitter: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: RetryOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.timeoutMs = options.timeoutMs;
    this.jitter = options.jitter ?? 0.5;
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
  }

  /** Delay before retry number `attempt` (0-based). */
  backoffMs(attempt: number): number {
    const base = Math.min(this.baseDelayMs * Math.pow(2, attempt), this.maxDelayMs);
    const factor = this.jitter + this.random() * (1 - this.jitter);
    return Math.floor(base * factor);
  }

  /**
   * Run `fn` until it succeeds, a non-retryable error is thrown (rethrown as is),
   * or attempts run out (TransientProviderError with the last error as cause).
   * Each attempt gets an AbortSignal that fires at the per-attempt timeout.
   */
  async run<T>(label: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    let lastErr: unknown;
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        return await this.attempt(label, fn);
      } catch (err) {
        lastErr = err;
        if (!isRetryable(err)) throw err;
        if (attempt < this.maxAttempts - 1) {
          await this.sleep(this.backoffMs(attempt));
        }
      }
    }
    throw new TransientProviderError(label, this.maxAttempts, { cause: lastErr });
  }

  private async attempt<T>(label: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new AttemptTimeoutError(label, this.timeoutMs);
        controller.abort(err);
        reject(err);
      }, this.timeoutMs);
    });
    try {
      return await Promise.race([fn(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
