import { config } from "@/config/env";
import { CircuitBreaker } from "@/utils/circuitBreaker";
import { ConfigurationError } from "@/utils/errors";
import { CircuitBreakerState } from "@/types/circuitBreaker";
import { ServiceDescriptor } from "@/types/service";

interface RegistryOptions {
  resetTimeout?: number;
}

/**
 * Services known to this process and one breaker per service. Built once at
 * startup and handed to the router and the health monitor.
 */
export class ServiceRegistry {
  private readonly services = new Map<string, ServiceDescriptor>();
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    descriptors: ServiceDescriptor[],
    options: RegistryOptions = {}
  ) {
    const resetTimeout = options.resetTimeout ?? config.circuitBreaker.resetTimeout;

    for (const descriptor of descriptors) {
      if (this.services.has(descriptor.name)) {
        throw new Error(`Duplicate service descriptor: ${descriptor.name}`);
      }

      this.services.set(descriptor.name, Object.freeze({ ...descriptor }));
      this.breakers.set(
        descriptor.name,
        new CircuitBreaker(descriptor.name, {
          failureThreshold: descriptor.breakerThreshold,
          timeout: descriptor.timeoutMs,
          resetTimeout,
        })
      );
    }
  }

  has(name: string): boolean {
    return this.services.has(name);
  }

  get(name: string): ServiceDescriptor {
    const descriptor = this.services.get(name);
    if (!descriptor) {
      throw new ConfigurationError(`Unknown service: ${name}`);
    }
    return descriptor;
  }

  breaker(name: string): CircuitBreaker {
    const breaker = this.breakers.get(name);
    if (!breaker) {
      throw new ConfigurationError(`Unknown service: ${name}`);
    }
    return breaker;
  }

  list(): ServiceDescriptor[] {
    return Array.from(this.services.values());
  }

  breakerStates(): Record<string, CircuitBreakerState> {
    const states: Record<string, CircuitBreakerState> = {};
    for (const [name, breaker] of this.breakers) {
      states[name] = breaker.getState();
    }
    return states;
  }
}
