/**
 * Backoff and circuit breaking for calls to the patrol backend
 *
 * The queue uses `calculateBackoffDelay` to decide when a failed item is due
 * again; reference pulls wrap their requests in `withRetry`; the sync engine
 * routes every push through one `CircuitBreaker`.
 */

import { getLogger } from './logger.js';
import { toError } from '../../../shared/errors.js';

const logger = getLogger('Retry');

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 disables jitter; 0.3 spreads delays by ±30%. */
  jitterFactor: number;
}

export interface RetryConfig extends BackoffPolicy {
  maxAttempts: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Aborts the wait between attempts. */
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitterFactor: 0.3,
};

/** Delay before retry number `attempt`: base·2^(attempt-1), capped, 0 for attempt 0. */
export function calculateBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  if (attempt <= 0) return 0;
  const capped = Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
  const jitter = capped * policy.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.floor(capped + jitter));
}

function pause(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(toError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(toError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Runs `operation` until it succeeds, `shouldRetry` refuses, or attempts run out. */
export async function withRetry<T>(operation: () => Promise<T>, config: Partial<RetryConfig> = {}): Promise<T> {
  const policy: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const message = toError(error).message;
      if (attempt >= maxAttempts) {
        logger.warn(`Giving up after ${attempt} attempts`, { error: message });
        throw error;
      }
      if (policy.shouldRetry && !policy.shouldRetry(error, attempt)) {
        throw error;
      }

      const delayMs = calculateBackoffDelay(attempt, policy);
      logger.debug(`Attempt ${attempt}/${maxAttempts} failed`, { delayMs, error: message });
      policy.onRetry?.(error, attempt, delayMs);
      await pause(delayMs, policy.signal);
    }
  }
}

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  /** Successes needed in HALF_OPEN before the circuit closes. */
  halfOpenMaxAttempts: number;
  now: () => number;
}

export interface CircuitSnapshot {
  state: CircuitState;
  failureCount: number;
  retryInMs: number;
}

export class CircuitOpenError extends Error {
  constructor(name: string, waitMs: number) {
    super(`Circuit ${name} is OPEN (retry in ${Math.max(0, Math.ceil(waitMs / 1000))}s)`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private openedAt = 0;
  private halfOpenSuccesses = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(private readonly name: string, config: Partial<CircuitBreakerConfig> = {}) {
    this.config = {
      failureThreshold: config.failureThreshold ?? 5,
      recoveryTimeMs: config.recoveryTimeMs ?? 60000,
      halfOpenMaxAttempts: config.halfOpenMaxAttempts ?? 3,
      now: config.now ?? (() => Date.now()),
    };
  }

  getState(): CircuitState {
    if (this.state === 'OPEN' && this.retryInMs() === 0) {
      this.transition('HALF_OPEN');
    }
    return this.state;
  }

  snapshot(): CircuitSnapshot {
    const state = this.getState();
    return { state, failureCount: this.failures, retryInMs: this.retryInMs() };
  }

  /**
   * Runs the operation through the breaker. Only failures that
   * `countsAsFailure` accepts move the breaker toward OPEN.
   */
  async execute<T>(
    operation: () => Promise<T>,
    countsAsFailure: (error: unknown) => boolean = () => true
  ): Promise<T> {
    if (this.getState() === 'OPEN') {
      throw new CircuitOpenError(this.name, this.retryInMs());
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      if (countsAsFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private retryInMs(): number {
    if (this.state !== 'OPEN') return 0;
    return Math.max(0, this.openedAt + this.config.recoveryTimeMs - this.config.now());
  }

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.config.halfOpenMaxAttempts) {
        this.transition('CLOSED');
      }
    } else {
      this.failures = Math.max(0, this.failures - 1);
    }
  }

  private onFailure(): void {
    this.failures++;
    if (this.state === 'HALF_OPEN' || this.failures >= this.config.failureThreshold) {
      this.transition('OPEN');
    }
  }

  private transition(next: CircuitState): void {
    if (next === 'OPEN') this.openedAt = this.config.now();
    if (next === 'CLOSED') this.failures = 0;
    this.halfOpenSuccesses = 0;
    const message = `Circuit ${this.name} ${this.state} -> ${next}`;
    if (next === 'OPEN') {
      logger.warn(message, { failures: this.failures });
    } else {
      logger.info(message, { failures: this.failures });
    }
    this.state = next;
  }
}
