/**
 * Wiring of a ResearchEngine from configuration
 */

import type { Memory } from "../../interfaces/memory";
import type { ReportExporter } from "../../interfaces/exporter";
import type { SearchProvider } from "../../interfaces/search-provider";
import type { Verifier } from "../../interfaces/verifier";
import { systemClock, type Clock } from "../../utils/clock";
import { ContentExtractor } from "../content-extractor";
import { createModelCatalog } from "../llm";
import { PrivacyRouter, type ModelCatalogEntry } from "../llm/privacy-router";
import { ProviderGate } from "../resilience/provider-gate";
import { ProviderRegistry } from "../resilience/provider-registry";
import { SaturationEvaluator } from "../saturation/evaluator";
import { SourceLearning } from "../saturation/learning";
import { createSearchProviders, type Environment } from "../search";
import { SearchAggregator } from "../search/aggregator";
import type { ResearchConfig } from "./config";
import { ResearchEngine } from "./engine";
import { ProgressHub } from "./progress-hub";
import { FactVerifier, standingFromConfig } from "./verification";

export interface CreateResearchEngineOptions {
  config: ResearchConfig;
  memory: Memory;
  env?: Environment;
  /** Replaces the providers built from config */
  searchProviders?: SearchProvider[];
  /** Replaces the model catalog built from config */
  models?: ModelCatalogEntry[];
  verifier?: Verifier;
  exporter?: ReportExporter;
  clock?: Clock;
  random?: () => number;
}

export function createResearchEngine(options: CreateResearchEngineOptions): ResearchEngine {
  const { config, memory } = options;
  const env = options.env ?? process.env;
  const clock = options.clock ?? systemClock;

  const registry = new ProviderRegistry(config.resilience.circuit, clock);
  const providers = options.searchProviders ?? createSearchProviders(config, env);
  const gates = providers.map(
    (provider) =>
      new ProviderGate(provider, registry, {
        requestsPerSecond: config.search.providers[provider.getName()]?.requestsPerSecond ?? 1,
        attemptTimeoutMs: config.search.attemptTimeoutMs,
        retry: config.resilience.retry,
        clock,
        random: options.random,
        memory,
      })
  );

  const router = new PrivacyRouter(options.models ?? createModelCatalog(config, env), {
    preferences: config.router.preferences,
    retry: {
      maxAttempts: config.router.maxAttempts,
      baseDelayMs: config.router.baseDelayMs,
      maxDelayMs: config.router.maxDelayMs,
    },
    clock,
  });

  return new ResearchEngine({
    registry,
    progress: new ProgressHub(config.server.progressBufferSize),
    services: {
      config,
      memory,
      router,
      aggregator: new SearchAggregator(gates, {
        memory,
        maxConcurrency: config.search.maxConcurrency,
        providerTimeoutMs: config.search.providerTimeoutMs,
        now: () => clock.now(),
      }),
      evaluator: new SaturationEvaluator(config.saturation),
      learning: new SourceLearning(memory, config.learning.minimumScore),
      verifier:
        options.verifier ??
        new FactVerifier({ router, standingOf: standingFromConfig(config.search.providers) }),
      extractor: config.extraction.enabled ? new ContentExtractor(config.extraction, memory) : undefined,
      exporter: options.exporter,
      now: () => clock.now(),
    },
  });
}
