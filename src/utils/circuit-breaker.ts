/**
 * Circuit breaker for language-model calls.
 *
 * States:
 * - CLOSED: normal operation
 * - OPEN: calls are skipped until the timeout elapses
 * - HALF_OPEN: a trial call decides whether to close again
 *
 * One breaker per planner instance; nothing is shared at module level.
 */

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  failureThreshold: number; // Failures before opening circuit
  successThreshold: number; // Successes in HALF_OPEN before closing
  timeoutMs: number; // OPEN → HALF_OPEN delay
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  nextRetryTime: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private failures = 0;
  private successes = 0;
  private lastFailureTime: number | null = null;
  private nextRetryTime: number | null = null;

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Whether a call may go out now. Moves OPEN → HALF_OPEN once the timeout expired.
   */
  allowRequest(): boolean {
    if (this.state === "OPEN") {
      if (this.nextRetryTime !== null && this.now() >= this.nextRetryTime) {
        this.state = "HALF_OPEN";
        this.successes = 0;
        return true;
      }
      return false;
    }
    return true;
  }

  recordSuccess(): void {
    if (this.state === "HALF_OPEN") {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.reset();
      }
    } else if (this.state === "CLOSED") {
      this.failures = 0;
    }
  }

  recordFailure(): void {
    const now = this.now();
    this.failures++;
    this.lastFailureTime = now;

    if (this.state === "HALF_OPEN") {
      this.state = "OPEN";
      this.nextRetryTime = now + this.config.timeoutMs;
      this.successes = 0;
    } else if (this.state === "CLOSED" && this.failures >= this.config.failureThreshold) {
      this.state = "OPEN";
      this.nextRetryTime = now + this.config.timeoutMs;
    }
  }

  reset(): void {
    this.state = "CLOSED";
    this.failures = 0;
    this.successes = 0;
    this.lastFailureTime = null;
    this.nextRetryTime = null;
  }

  stats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
      nextRetryTime: this.nextRetryTime,
    };
  }
}
