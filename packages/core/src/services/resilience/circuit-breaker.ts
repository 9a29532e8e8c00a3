/**
 * Circuit breaker
 *
 * closed --(failureThreshold consecutive failures)--> open
 * open   --(cooldown elapsed, next caller)----------> half-open (one trial)
 * half-open --trial ok--> closed, failures and cooldown reset
 * half-open --trial failed--> open, cooldown doubled up to maxCooldownMs
 *
 * Each admitted call reports its outcome exactly once. Outcomes from calls
 * admitted before the circuit opened are ignored, so open never moves to
 * closed without a trial.
 */

import { systemClock, type Clock } from "../../utils/clock";
import { createModuleLogger } from "../../logger";

const log = createModuleLogger("circuit-breaker");

export type CircuitState = "closed" | "open" | "half-open";

export interface ProviderCircuit {
  state: CircuitState;
  consecutiveFailures: number;
  cooldownUntil: number | null;
  cooldownMs: number;
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownMs: number;
  maxCooldownMs: number;
}

export interface CircuitAdmission {
  readonly trial: boolean;
}

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private cooldownUntil: number | null = null;
  private cooldownMs: number;
  private trialInFlight = false;

  constructor(
    readonly name: string,
    private readonly options: CircuitBreakerOptions,
    private readonly clock: Clock = systemClock
  ) {
    this.cooldownMs = options.cooldownMs;
  }

  /**
   * Ask to make a call. Returns null when the call must be skipped.
   */
  tryAcquire(): CircuitAdmission | null {
    if (this.state === "closed") {
      return { trial: false };
    }

    if (this.state === "open") {
      if (this.cooldownUntil !== null && this.clock.now() < this.cooldownUntil) {
        return null;
      }
      this.state = "half-open";
      this.trialInFlight = false;
      log.info("Circuit half-open, admitting trial", { provider: this.name });
    }

    if (this.trialInFlight) {
      return null;
    }
    this.trialInFlight = true;
    return { trial: true };
  }

  recordSuccess(admission: CircuitAdmission): void {
    if (admission.trial) {
      this.state = "closed";
      this.consecutiveFailures = 0;
      this.cooldownUntil = null;
      this.cooldownMs = this.options.cooldownMs;
      this.trialInFlight = false;
      log.info("Circuit closed after successful trial", { provider: this.name });
      return;
    }
    if (this.state === "closed") {
      this.consecutiveFailures = 0;
    }
  }

  recordFailure(admission: CircuitAdmission): void {
    if (admission.trial) {
      this.cooldownMs = Math.min(this.options.maxCooldownMs, this.cooldownMs * 2);
      this.open();
      return;
    }
    if (this.state !== "closed") {
      return;
    }
    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.options.failureThreshold) {
      this.open();
    }
  }

  private open(): void {
    this.state = "open";
    this.trialInFlight = false;
    this.cooldownUntil = this.clock.now() + this.cooldownMs;
    log.warn("Circuit opened", {
      provider: this.name,
      consecutiveFailures: this.consecutiveFailures,
      cooldownMs: this.cooldownMs,
    });
  }

  snapshot(): ProviderCircuit {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      cooldownUntil: this.cooldownUntil,
      cooldownMs: this.cooldownMs,
    };
  }
}
