/**
 * ProviderGate
 *
 * Wraps one provider's raw search call with its circuit breaker, bounded
 * retry and token bucket. `search` never rejects: provider failures are
 * logged and surface as an empty result list.
 */

import type {
  SearchFilters,
  SearchProvider,
  SearchResultItem,
} from "../../interfaces/search-provider";
import type { Memory } from "../../interfaces/memory";
import { AccessDeniedError, errorMessage, TimeoutError } from "../../errors";
import { createModuleLogger } from "../../logger";
import { withTimeout } from "../../utils/async";
import { systemClock, type Clock } from "../../utils/clock";
import type { ProviderControls, ProviderRegistry } from "./provider-registry";
import { withRetry } from "./retry";

const log = createModuleLogger("provider-gate");

export interface ProviderGateOptions {
  requestsPerSecond: number;
  attemptTimeoutMs: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitter: number;
  };
  clock?: Clock;
  random?: () => number;
  memory?: Pick<Memory, "recordAccessFailure">;
}

export class ProviderGate {
  private readonly controls: ProviderControls;
  private readonly clock: Clock;

  constructor(
    private readonly provider: SearchProvider,
    registry: ProviderRegistry,
    private readonly options: ProviderGateOptions
  ) {
    this.controls = registry.get(provider.getName(), options.requestsPerSecond);
    this.clock = options.clock ?? systemClock;
  }

  get name(): string {
    return this.provider.getName();
  }

  /**
   * Search through the circuit, bucket and retry loop. `signal` cancels the
   * attempt in flight and any retry still to come.
   */
  async search(
    query: string,
    limit: number,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<SearchResultItem[]> {
    const { breaker, bucket } = this.controls;
    const admission = breaker.tryAcquire();
    if (!admission) {
      log.debug("Circuit open, skipping provider", { provider: this.name });
      return [];
    }

    try {
      const results = await withRetry(
        async () => {
          await bucket.acquire(signal);
          return withTimeout(
            (attemptSignal) =>
              this.provider.search(query, { limit, filters, signal: attemptSignal }),
            this.options.attemptTimeoutMs,
            () =>
              new TimeoutError(
                `${this.name} did not answer within ${this.options.attemptTimeoutMs}ms`,
                { provider: this.name }
              ),
            signal
          );
        },
        {
          ...this.options.retry,
          clock: this.clock,
          random: this.options.random,
          signal,
          onRetry: (error, attempt, delayMs) => {
            log.warn("Retrying provider call", {
              provider: this.name,
              attempt,
              delayMs,
              error: errorMessage(error),
            });
          },
        }
      );
      breaker.recordSuccess(admission);
      return results.slice(0, limit);
    } catch (error) {
      breaker.recordFailure(admission);
      log.warn("Provider call failed", {
        provider: this.name,
        query,
        error: errorMessage(error),
      });
      if (error instanceof AccessDeniedError && error.url) {
        await this.recordAccessFailure(withoutQuery(error.url), error);
      }
      return [];
    }
  }

  private async recordAccessFailure(url: string, error: AccessDeniedError): Promise<void> {
    if (!this.options.memory) return;
    try {
      await this.options.memory.recordAccessFailure(
        url,
        this.name,
        error.status === 404 ? "not_found" : "access_denied",
        error.message
      );
    } catch (storeError) {
      log.error("Could not record access failure", {
        provider: this.name,
        url,
        error: errorMessage(storeError),
      });
    }
  }
}

/**
 * A denied API request is remembered by endpoint: its query string varies with
 * every search and may carry an API key
 */
function withoutQuery(url: string): string {
  return url.split(/[?#]/, 1)[0];
}
