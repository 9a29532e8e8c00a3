/**
 * Search Provider implementations
 */

import type { SearchProvider } from "../../interfaces/search-provider";
import { createModuleLogger } from "../../logger";
import type { ResearchConfig } from "../research-engine/config";
import { ArxivProvider } from "./arxiv-provider";
import { BraveSearchProvider } from "./brave-provider";
import { PubMedProvider } from "./pubmed-provider";
import { SemanticScholarProvider } from "./semantic-scholar-provider";

const log = createModuleLogger("search-providers");

export type Environment = Record<string, string | undefined>;

/**
 * Build the enabled providers from config. Keys are read from the env var
 * each provider names; a provider that cannot work without one is skipped.
 */
export function createSearchProviders(
  config: ResearchConfig,
  env: Environment = process.env
): SearchProvider[] {
  const providers: SearchProvider[] = [];

  for (const [name, settings] of Object.entries(config.search.providers)) {
    if (!settings.enabled) continue;
    const apiKey = settings.apiKeyEnv ? env[settings.apiKeyEnv] : undefined;

    switch (name) {
      case "pubmed":
        providers.push(new PubMedProvider(settings.baseUrl, apiKey));
        break;
      case "semantic_scholar":
        providers.push(new SemanticScholarProvider(settings.baseUrl, apiKey));
        break;
      case "arxiv":
        providers.push(new ArxivProvider(settings.baseUrl));
        break;
      case "brave":
        if (!apiKey) {
          log.warn("Brave search disabled: no API key", { env: settings.apiKeyEnv });
          break;
        }
        providers.push(new BraveSearchProvider(apiKey, settings.baseUrl));
        break;
      default:
        log.warn("No adapter for configured provider", { provider: name });
    }
  }

  return providers;
}

export { BraveSearchProvider, createBraveSearchProvider } from "./brave-provider";
export { PubMedProvider } from "./pubmed-provider";
export { SemanticScholarProvider } from "./semantic-scholar-provider";
export { ArxivProvider, parseArxivFeed } from "./arxiv-provider";
export { SearchAggregator, rankProviders, scoreResultQuality } from "./aggregator";
export type { SearchProvider } from "../../interfaces/search-provider";
