/**
 * Circuit Breaker for the language model endpoint
 *
 * Opens after `failureThreshold` consecutive service failures and rejects
 * calls until `recoveryTimeMs` has passed.
 *
 * Only service failures (5xx, network, timeouts) count. Authentication, rate
 * limit and unknown failures pass through without touching the state.
 */

import { CircuitBreakerOpenError, toLLMCallError } from './errors.js';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 1,
};

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (toLLMCallError(error).kind === 'service') {
        this.recordFailure();
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state === CircuitState.OPEN && this.lastFailureTime !== null) {
      if (Date.now() - this.lastFailureTime >= this.config.recoveryTimeMs) {
        console.error('[CircuitBreaker] Transitioning from OPEN to HALF_OPEN');
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
      }
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, transitioning to CLOSED');
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
        this.successCount = 0;
        this.lastFailureTime = null;
      }
    } else {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN) {
      console.error('[CircuitBreaker] Failure in HALF_OPEN, transitioning to OPEN');
      this.state = CircuitState.OPEN;
      this.successCount = 0;
    } else if (this.failureCount >= this.config.failureThreshold) {
      console.error(
        `[CircuitBreaker] Threshold reached (${this.failureCount}), transitioning to OPEN`
      );
      this.state = CircuitState.OPEN;
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.config.recoveryTimeMs - (Date.now() - this.lastFailureTime));
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
  }
}
