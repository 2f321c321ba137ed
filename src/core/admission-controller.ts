/**
 * AdmissionController - Two-state circuit breaker guarding the downstream
 *
 * States:
 * - CLOSED: every delivery attempt is admitted
 * - OPEN:   attempts are refused until resetTimeoutMs has passed since the
 *           last recorded failure
 *
 * There is no HALF_OPEN trial phase. Once the cool-down has elapsed the first
 * allowRequest() call closes the circuit and every later call is admitted
 * too, not just a single probe.
 *
 * Transitions:
 * - CLOSED -> OPEN only inside recordFailure(), when failureCount reaches failureThreshold
 * - OPEN -> CLOSED only inside allowRequest(), after the cool-down
 * - recordSuccess() never changes state; reaching successThreshold zeroes failureCount
 *
 * EXAMPLE USAGE:
 * ```typescript
 * const breaker = new AdmissionController({ failureThreshold: 3, successThreshold: 2, resetTimeoutMs: 10_000 });
 *
 * if (breaker.allowRequest()) {
 *   const ok = await deliver(payload);
 *   ok ? breaker.recordSuccess() : breaker.recordFailure();
 * }
 * ```
 */

export type CircuitState = 'CLOSED' | 'OPEN';

export interface AdmissionOptions {
  failureThreshold: number;
  successThreshold: number;
  resetTimeoutMs: number;
  /** Clock source, milliseconds. Defaults to Date.now */
  now?: () => number;
}

export interface AdmissionSnapshot {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number;
  failureThreshold: number;
  successThreshold: number;
  resetTimeoutMs: number;
}

export const DEFAULT_ADMISSION_OPTIONS: AdmissionOptions = {
  failureThreshold: 3,
  successThreshold: 2,
  resetTimeoutMs: 10_000,
};

export class AdmissionController {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;
  private readonly failureThreshold: number;
  private readonly successThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: AdmissionOptions = DEFAULT_ADMISSION_OPTIONS) {
    if (options.failureThreshold <= 0 || options.successThreshold <= 0) {
      throw new Error('Admission thresholds must be positive');
    }
    this.failureThreshold = options.failureThreshold;
    this.successThreshold = options.successThreshold;
    this.resetTimeoutMs = options.resetTimeoutMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Decide whether a delivery attempt may proceed
   *
   * @returns true when CLOSED, or when OPEN and the cool-down has strictly elapsed
   */
  allowRequest(): boolean {
    if (this.state === 'CLOSED') {
      return true;
    }

    if (this.now() - this.lastFailureTime > this.resetTimeoutMs) {
      this.state = 'CLOSED';
      console.log('[BREAKER] Cool-down elapsed, circuit CLOSED');
      return true;
    }

    return false;
  }

  recordFailure(): void {
    this.failureCount++;
    this.successCount = 0;
    this.lastFailureTime = this.now();

    if (this.failureCount >= this.failureThreshold) {
      if (this.state === 'CLOSED') {
        console.warn(`[BREAKER] Circuit OPENED after ${this.failureCount} failures`);
      }
      this.state = 'OPEN';
    }
  }

  recordSuccess(): void {
    this.successCount++;

    if (this.successCount >= this.successThreshold && this.failureCount > 0) {
      this.failureCount = 0;
      console.log('[BREAKER] Failure count RESET');
    }
  }

  isOpen(): boolean {
    return this.state === 'OPEN';
  }

  getState(): AdmissionSnapshot {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime,
      failureThreshold: this.failureThreshold,
      successThreshold: this.successThreshold,
      resetTimeoutMs: this.resetTimeoutMs,
    };
  }
}
