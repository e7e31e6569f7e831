// Circuit breaker utility types
export const CIRCUIT_STATE = {
  CLOSED: "CLOSED",
  OPEN: "OPEN",
  HALF_OPEN: "HALF_OPEN",
} as const;

export type CircuitState = (typeof CIRCUIT_STATE)[keyof typeof CIRCUIT_STATE];

export interface CircuitBreakerConfig {
  failureThreshold: number;
  // Per-call timeout applied by execute()
  timeout: number;
  // Cooldown before an OPEN breaker admits a trial call
  resetTimeout: number;
}

export interface CircuitBreakerState {
  state: CircuitState;
  failureCount: number;
  threshold: number;
  cooldownMs: number;
  lastFailureTime?: number;
  nextAttempt?: number;
  trialInFlight: boolean;
}
