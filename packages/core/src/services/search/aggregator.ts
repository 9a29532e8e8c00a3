/**
 * SearchAggregator
 *
 * Fans one query out to a ranked list of providers through their gates,
 * bounded by a concurrency cap shared by every session using this instance.
 */

import type { SearchFilters, SearchResultItem } from "../../interfaces/search-provider";
import type { Memory } from "../../interfaces/memory";
import type { RankedProvider, SourceResult } from "../../models/research-state";
import { errorMessage, SourceExhaustedError, TimeoutError } from "../../errors";
import { createModuleLogger } from "../../logger";
import { Semaphore, withTimeout } from "../../utils/async";
import { normalizeUrl } from "../../utils/deduplication";
import type { ProviderGate } from "../resilience/provider-gate";

const log = createModuleLogger("search-aggregator");

export interface SearchAggregatorOptions {
  memory: Pick<Memory, "isKnownFailure">;
  maxConcurrency: number;
  providerTimeoutMs: number;
  now?: () => number;
}

interface ProviderOutcome {
  provider: string;
  items: SearchResultItem[];
}

/**
 * Heuristic quality of a single hit, 0-1
 */
export function scoreResultQuality(item: SearchResultItem): number {
  const snippetLength = item.description.trim().length;
  const score =
    0.2 + 0.5 * Math.min(1, snippetLength / 300) + (item.content ? 0.3 : 0);
  return Math.round(Math.min(1, Math.max(0, score)) * 1000) / 1000;
}

/**
 * Order candidates by learned effectiveness (descending), breaking ties by
 * their position in the candidate list.
 */
export async function rankProviders(
  candidates: Array<{ name: string; category: string }>,
  domain: string,
  memory: Pick<Memory, "getSourceEffectiveness">
): Promise<RankedProvider[]> {
  const scored = await Promise.all(
    candidates.map(async (candidate, priority) => ({
      name: candidate.name,
      category: candidate.category,
      priority,
      effectiveness: await memory.getSourceEffectiveness(candidate.name, domain),
    }))
  );
  return scored.sort(
    (a, b) => b.effectiveness - a.effectiveness || a.priority - b.priority
  );
}

export class SearchAggregator {
  private readonly gates = new Map<string, ProviderGate>();
  private readonly semaphore: Semaphore;

  constructor(
    gates: ProviderGate[],
    private readonly options: SearchAggregatorOptions
  ) {
    for (const gate of gates) {
      this.gates.set(gate.name, gate);
    }
    this.semaphore = new Semaphore(options.maxConcurrency);
  }

  get providerNames(): string[] {
    return [...this.gates.keys()];
  }

  hasProvider(name: string): boolean {
    return this.gates.has(name);
  }

  /**
   * Query every provider and merge the results in rank order.
   * Throws SourceExhaustedError when no provider returned anything.
   */
  async collect(
    query: string,
    providers: ReadonlyArray<string>,
    maxResults: number,
    filters?: SearchFilters
  ): Promise<SourceResult[]> {
    const outcomes = await Promise.all(
      providers.map((provider) => this.queryProvider(provider, query, maxResults, filters))
    );

    if (outcomes.every((outcome) => outcome.items.length === 0)) {
      throw new SourceExhaustedError([...providers]);
    }

    const now = this.options.now ?? Date.now;
    const seen = new Set<string>();
    const merged: SourceResult[] = [];

    for (const { provider, items } of outcomes) {
      for (const item of items) {
        if (!item.url) continue;
        const key = normalizeUrl(item.url);
        if (seen.has(key)) continue;
        seen.add(key);

        if (await this.isKnownFailure(item.url)) {
          log.debug("Skipping known access failure", { provider, url: item.url });
          continue;
        }

        merged.push(
          Object.freeze({
            provider,
            url: item.url,
            title: item.title,
            snippet: item.description,
            content: item.content,
            success: true,
            qualityScore: scoreResultQuality(item),
            retrievedAt: now(),
          })
        );
      }
    }

    log.info("Collected results", {
      query,
      providers: outcomes.map((o) => `${o.provider}:${o.items.length}`).join(","),
      merged: merged.length,
    });
    return merged;
  }

  private async queryProvider(
    provider: string,
    query: string,
    maxResults: number,
    filters?: SearchFilters
  ): Promise<ProviderOutcome> {
    const gate = this.gates.get(provider);
    if (!gate) {
      log.warn("No gate registered for provider", { provider });
      return { provider, items: [] };
    }

    try {
      // The deadline starts once a concurrency slot is held and aborts the gate's retries
      const items = await this.semaphore.run(() =>
        withTimeout(
          (signal) => gate.search(query, maxResults, filters, signal),
          this.options.providerTimeoutMs,
          () =>
            new TimeoutError(
              `${provider} exceeded ${this.options.providerTimeoutMs}ms`,
              { provider }
            )
        )
      );
      return { provider, items };
    } catch (error) {
      log.warn("Provider produced nothing this cycle", {
        provider,
        error: errorMessage(error),
      });
      return { provider, items: [] };
    }
  }

  private async isKnownFailure(url: string): Promise<boolean> {
    try {
      return await this.options.memory.isKnownFailure(url);
    } catch (error) {
      log.warn("Known-failure lookup failed", { url, error: errorMessage(error) });
      return false;
    }
  }
}
