/**
 * Per-provider circuit and rate-limit state
 *
 * One registry is created by the engine and handed to every gate, so
 * concurrent sessions share the same breaker and bucket for a provider.
 */

import { CircuitBreaker, type CircuitBreakerOptions, type ProviderCircuit } from "./circuit-breaker";
import { TokenBucket } from "./token-bucket";
import { systemClock, type Clock } from "../../utils/clock";

export interface ProviderControls {
  breaker: CircuitBreaker;
  bucket: TokenBucket;
}

export class ProviderRegistry {
  private readonly controls = new Map<string, ProviderControls>();

  constructor(
    private readonly circuitOptions: CircuitBreakerOptions,
    private readonly clock: Clock = systemClock
  ) {}

  get(provider: string, requestsPerSecond: number): ProviderControls {
    const existing = this.controls.get(provider);
    if (existing) {
      return existing;
    }
    const created: ProviderControls = {
      breaker: new CircuitBreaker(provider, this.circuitOptions, this.clock),
      bucket: new TokenBucket(requestsPerSecond, this.clock),
    };
    this.controls.set(provider, created);
    return created;
  }

  has(provider: string): boolean {
    return this.controls.has(provider);
  }

  snapshot(): Record<string, ProviderCircuit> {
    const result: Record<string, ProviderCircuit> = {};
    for (const [name, { breaker }] of this.controls) {
      result[name] = breaker.snapshot();
    }
    return result;
  }
}
