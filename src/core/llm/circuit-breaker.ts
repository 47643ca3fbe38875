/**
 * Per-provider circuit breaker.
 *
 * States: closed (normal) → open (failing) → half-open (one probe allowed)
 */

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerConfig {
  failureThreshold: number;
  resetTimeoutMs: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 60_000,
};

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failures = 0;
  private openedAt: number | null = null;
  private config: CircuitBreakerConfig;

  constructor(config?: Partial<CircuitBreakerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  canExecute(): boolean {
    return this.getState() !== "open";
  }

  recordSuccess(): void {
    this.failures = 0;
    this.openedAt = null;
    this.state = "closed";
  }

  /** Returns true when this failure tripped the breaker open. */
  recordFailure(): boolean {
    this.failures++;

    if (this.state === "half-open" || this.failures >= this.config.failureThreshold) {
      const wasOpen = this.state === "open";
      this.state = "open";
      this.openedAt = Date.now();
      return !wasOpen;
    }
    return false;
  }

  getState(): CircuitState {
    if (this.state === "open" && this.openedAt !== null) {
      if (Date.now() - this.openedAt >= this.config.resetTimeoutMs) {
        this.state = "half-open";
      }
    }
    return this.state;
  }
}
