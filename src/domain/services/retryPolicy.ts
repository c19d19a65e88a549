import { RetryExhaustedError, toError } from './exceptions';

export type ErrorClass = abstract new (...args: never[]) => Error;

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export type RetryListener = (error: Error, attempt: number, maxAttempts: number) => void;

/**
 * Bounded re-execution of an operation. Only errors of the listed classes are
 * retried; anything else propagates immediately.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly retryableErrors: readonly ErrorClass[];

  constructor(maxAttempts: number, retryableErrors: readonly ErrorClass[] = []) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    this.maxAttempts = maxAttempts;
    this.retryableErrors = retryableErrors;
  }

  static none(): RetryPolicy {
    return new RetryPolicy(1);
  }

  canRecover(error: Error): boolean {
    return this.retryableErrors.some(errorClass => error instanceof errorClass);
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, onRetry?: RetryListener): Promise<RetryOutcome<T>> {
    for (let attempt = 1; ; attempt++) {
      try {
        return { value: await operation(attempt), attempts: attempt };
      } catch (caught) {
        const error = toError(caught);
        if (!this.canRecover(error)) {
          throw error;
        }
        if (attempt >= this.maxAttempts) {
          throw new RetryExhaustedError(attempt, error);
        }
        onRetry?.(error, attempt, this.maxAttempts);
      }
    }
  }
}
