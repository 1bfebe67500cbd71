import { setTimeout as sleep } from 'timers/promises';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  random?: () => number;
}

export interface RetryExecution {
  signal?: AbortSignal;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Bounded retry with exponential backoff and full jitter.
 * `maxAttempts: 1` runs the task exactly once.
 */
export class RetryPolicy {
  private readonly random: () => number;

  constructor(private readonly options: RetryPolicyOptions) {
    this.random = options.random ?? Math.random;
  }

  get maxAttempts(): number {
    return Math.max(1, this.options.maxAttempts);
  }

  delayFor(attempt: number): number {
    const ceiling = Math.min(
      this.options.maxDelayMs,
      this.options.baseDelayMs * 2 ** (attempt - 1),
    );
    return Math.floor(this.random() * ceiling);
  }

  async execute<T>(
    task: (attempt: number) => Promise<T>,
    execution: RetryExecution,
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await task(attempt);
      } catch (error) {
        const exhausted = attempt >= this.maxAttempts;
        if (exhausted || execution.signal?.aborted || !execution.isRetryable(error)) {
          throw error;
        }

        const delayMs = this.delayFor(attempt);
        execution.onRetry?.(error, attempt, delayMs);
        if (delayMs > 0) {
          await sleep(delayMs, undefined, { signal: execution.signal });
        }
      }
    }
  }
}
