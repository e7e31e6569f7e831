import { logger } from "@/monitoring/logger";
import { CircuitOpenError } from "@/utils/errors";
import { withTimeout } from "@/utils/timeout";
import {
  CIRCUIT_STATE,
  CircuitBreakerConfig,
  CircuitBreakerState,
  CircuitState,
} from "@/types/circuitBreaker";

/**
 * Per-dependency failure isolation.
 *
 * CLOSED admits every call. After `failureThreshold` failures the breaker
 * OPENs and rejects calls until `resetTimeout` has elapsed since the last
 * failure; the first caller after that moves it to HALF_OPEN and is the only
 * one admitted until its outcome is recorded. Any success closes it again.
 *
 * The methods are synchronous, so each transition runs to completion on the
 * event loop before another caller can observe the state.
 */
export class CircuitBreaker {
  private state: CircuitState = CIRCUIT_STATE.CLOSED;
  private failureCount = 0;
  private lastFailureTime?: number;
  private trialInFlight = false;

  constructor(
    public readonly name: string,
    private readonly config: CircuitBreakerConfig
  ) {}

  canExecute(): boolean {
    if (this.state === CIRCUIT_STATE.CLOSED) {
      return true;
    }

    if (this.state === CIRCUIT_STATE.OPEN) {
      if (!this.cooldownElapsed()) {
        return false;
      }

      this.state = CIRCUIT_STATE.HALF_OPEN;
      this.trialInFlight = true;
      logger.info("Circuit breaker: HALF_OPEN - admitting trial call", {
        breaker: this.name,
      });
      return true;
    }

    // HALF_OPEN: a single trial at a time
    if (this.trialInFlight) {
      return false;
    }
    this.trialInFlight = true;
    return true;
  }

  onSuccess(): void {
    const previous = this.state;

    this.failureCount = 0;
    this.lastFailureTime = undefined;
    this.trialInFlight = false;
    this.state = CIRCUIT_STATE.CLOSED;

    if (previous !== CIRCUIT_STATE.CLOSED) {
      logger.info("Circuit breaker: CLOSED - dependency recovered", {
        breaker: this.name,
        previous,
      });
    }
  }

  onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();
    this.trialInFlight = false;

    if (this.failureCount >= this.config.failureThreshold) {
      if (this.state !== CIRCUIT_STATE.OPEN) {
        logger.warn(`Circuit breaker: OPEN - ${this.failureCount} failures`, {
          breaker: this.name,
          cooldownMs: this.config.resetTimeout,
        });
      }
      this.state = CIRCUIT_STATE.OPEN;
    }
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (!this.canExecute()) {
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await withTimeout(
        operation(),
        this.config.timeout,
        this.name
      );

      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private cooldownElapsed(): boolean {
    if (this.lastFailureTime === undefined) {
      return true;
    }
    return Date.now() - this.lastFailureTime >= this.config.resetTimeout;
  }

  getState(): CircuitBreakerState {
    return {
      state: this.state,
      failureCount: this.failureCount,
      threshold: this.config.failureThreshold,
      cooldownMs: this.config.resetTimeout,
      lastFailureTime: this.lastFailureTime,
      nextAttempt:
        this.state === CIRCUIT_STATE.OPEN && this.lastFailureTime !== undefined
          ? this.lastFailureTime + this.config.resetTimeout
          : undefined,
      trialInFlight: this.trialInFlight,
    };
  }
}
