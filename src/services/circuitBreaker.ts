import type { CircuitBreakerSettings } from '../config';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerState {
  failures: number;
  lastFailureTime: number;
  state: CircuitState;
  requestCount: number;
  successCount: number;
}

export class CircuitOpenError extends Error {
  constructor(retryAfterMs: number) {
    super(`Circuit breaker is OPEN - service unavailable for another ${retryAfterMs}ms`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly recoveryTimeout: number;
  private readonly halfOpenSuccessThreshold: number;
  private state: CircuitBreakerState = {
    failures: 0,
    lastFailureTime: 0,
    state: 'CLOSED',
    requestCount: 0,
    successCount: 0
  };

  constructor(options: CircuitBreakerSettings, private readonly now: () => number = Date.now) {
    this.failureThreshold = options.failure_threshold;
    this.recoveryTimeout = options.recovery_timeout_ms;
    this.halfOpenSuccessThreshold = options.half_open_success_threshold;
  }

  async execute<T>(operation: () => Promise<T>, countsAsFailure: (error: unknown) => boolean = () => true): Promise<T> {
    if (this.state.state === 'OPEN') {
      const elapsed = this.now() - this.state.lastFailureTime;
      if (elapsed >= this.recoveryTimeout) {
        this.state.state = 'HALF_OPEN';
        this.state.successCount = 0;
      } else {
        throw new CircuitOpenError(this.recoveryTimeout - elapsed);
      }
    }

    this.state.requestCount++;
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

  private onSuccess(): void {
    this.state.failures = 0;
    this.state.successCount++;

    if (this.state.state === 'HALF_OPEN' && this.state.successCount >= this.halfOpenSuccessThreshold) {
      this.state.state = 'CLOSED';
    }
  }

  private onFailure(): void {
    this.state.failures++;
    this.state.lastFailureTime = this.now();

    // A failed trial call while half-open reopens immediately.
    if (this.state.state === 'HALF_OPEN' || this.state.failures >= this.failureThreshold) {
      this.state.state = 'OPEN';
      this.state.successCount = 0;
    }
  }

  getState(): CircuitBreakerState {
    return { ...this.state };
  }
}
