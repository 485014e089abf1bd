/**
 * Retry, backoff and circuit breaker helpers for calls to the generation API
 */

import { CancelledError } from '../core/errors/GenerationErrors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
  timeoutMs: 30000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  /** Errors rejected by this predicate are rethrown without further attempts */
  shouldRetry?: (error: unknown) => boolean;
  onLog?: (log: RetryLog) => void;
  signal?: AbortSignal;
}

/**
 * Executes a function with exponential backoff retry logic
 * @param fn - Async function to execute
 * @param config - Retry configuration
 * @param options - Retry predicate, logging callback and abort signal
 * @returns Promise with the function result
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { shouldRetry, onLog, signal } = options;
  let lastError: unknown = null;
  let delay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    try {
      const result = await withTimeout(fn(), config.timeoutMs);
      onLog?.({ timestamp: new Date(), attempt, delay: 0, success: true });
      return result;
    } catch (error) {
      lastError = error;
      const retryable = shouldRetry ? shouldRetry(error) : true;
      const willRetry = retryable && attempt < config.maxAttempts;

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: willRetry ? delay : undefined,
      });

      if (!retryable) {
        throw error;
      }
      if (!willRetry) {
        break;
      }

      await sleep(delay, signal);
      delay = nextDelay(delay, config);
    }
  }

  const message = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`Failed after ${config.maxAttempts} attempts. Last error: ${message}`, {
    cause: lastError,
  });
}

/**
 * Next delay of an exponential backoff, capped at maxDelayMs
 */
export function nextDelay(
  currentDelayMs: number,
  config: Pick<RetryConfig, 'multiplier' | 'maxDelayMs'>
): number {
  return Math.min(currentDelayMs * config.multiplier, config.maxDelayMs);
}

/**
 * Reject when the promise does not settle within timeoutMs
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timeout after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Sleep that rejects with CancelledError as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Circuit Breaker Pattern
 * Stops calling the generation API after repeated failures and probes it
 * again once resetTimeout has passed.
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: Array<{ timestamp: Date; state: CircuitState; reason: string }> = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const now = Date.now();
      if (this.lastFailureTime !== null && now - this.lastFailureTime > this.resetTimeout) {
        this.state = 'half-open';
        this.successCount = 0;
        this.logStateChange('half-open', 'Reset timeout reached');
      } else {
        const waitMs = this.resetTimeout - (now - (this.lastFailureTime ?? now));
        throw new Error(
          `Circuit breaker is OPEN. Generation API is temporarily unavailable. Try again in ${waitMs}ms`
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        // Two successful probes close the circuit
        if (this.successCount >= 2) {
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      this.logStateChange('open', 'Failed while in half-open state');
    } else if (this.state === 'closed' && this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private logStateChange(newState: CircuitState, reason: string): void {
    this.logs.push({ timestamp: new Date(), state: newState, reason });
    console.error(`[CircuitBreaker] → ${newState}: ${reason}`);

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats() {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime ? new Date(this.lastFailureTime) : null,
      logs: this.logs,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.logStateChange('closed', 'Manual reset');
  }
}

/**
 * Check if a thrown error or HTTP status is worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'etimedout',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
    'http 429',
    'http 500',
    'http 502',
    'http 503',
    'http 504',
  ];

  return retryablePatterns.some((pattern) => message.includes(pattern));
}
