/**
 * LLM Provider implementations
 */

import { MODEL_TIERS } from "../../models/model";
import { createModuleLogger } from "../../logger";
import type { ResearchConfig } from "../research-engine/config";
import { OpenAIProvider } from "./openai-provider";
import type { ModelCatalogEntry } from "./privacy-router";

const log = createModuleLogger("model-catalog");

/**
 * One provider per configured tier. Local tiers talk to an OpenAI-compatible
 * server (OLLAMA_BASE_URL overrides the configured address); a cloud tier
 * whose key is missing is left out of the catalog.
 */
export function createModelCatalog(
  config: ResearchConfig,
  env: Record<string, string | undefined> = process.env
): ModelCatalogEntry[] {
  const catalog: ModelCatalogEntry[] = [];

  for (const tier of MODEL_TIERS) {
    const settings = config.models.tiers[tier];
    const apiKey = settings.apiKeyEnv ? env[settings.apiKeyEnv] : undefined;
    if (!settings.local && !apiKey) {
      log.warn("Cloud model tier disabled: no API key", { tier, env: settings.apiKeyEnv });
      continue;
    }

    catalog.push({
      tier,
      provider: new OpenAIProvider({
        model: settings.model,
        local: settings.local,
        contextWindow: settings.contextWindow,
        temperature: settings.temperature,
        apiKey,
        baseURL: settings.local ? env.OLLAMA_BASE_URL ?? settings.baseUrl : settings.baseUrl,
        availabilityCacheMs: config.models.availabilityCacheMs,
      }),
    });
  }

  return catalog;
}

export { OpenAIProvider, createOpenAIProvider } from "./openai-provider";
export { PrivacyRouter } from "./privacy-router";
export type { ModelCatalogEntry, CompletionOptions, PrivacyAdviceOptions } from "./privacy-router";
export { estimateComplexity, MODEL_PREFERENCES, FALLBACK_EDGES } from "./model-selector";
export { TokenChannel } from "./token-channel";
export type { LLMProvider } from "../../interfaces/llm-provider";
