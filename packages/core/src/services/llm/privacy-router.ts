/**
 * PrivacyRouter
 *
 * The only path by which the engine talks to a model. Selection walks the
 * preference table; every tier the router is about to use passes
 * `assertPrivacyCompliant`, so a LOCAL_ONLY session can never reach a cloud
 * model, whatever the table or the caller asks for.
 */

import { z } from "zod";
import keywords from "../../data/keywords.json";
import type { LLMProvider } from "../../interfaces/llm-provider";
import type {
  LLMMessage,
  ModelRecommendation,
  ModelTier,
  PrivacyMode,
  PrivacyRecommendation,
  TaskComplexity,
} from "../../models/model";
import { MODEL_TIERS } from "../../models/model";
import type { StreamEvent } from "../../models/progress";
import {
  errorMessage,
  ModelOverloadedError,
  ModelUnavailableError,
  PrivacyViolationError,
  ResearchEngineError,
} from "../../errors";
import { createModuleLogger } from "../../logger";
import type { Clock } from "../../utils/clock";
import { withRetry } from "../resilience/retry";
import {
  FALLBACK_EDGES,
  MODEL_PREFERENCES,
  type FallbackEdges,
  type PreferenceTable,
} from "./model-selector";
import { buildMessages, PRIVACY_CLASSIFICATION_PROMPTS } from "./prompts";
import { parseModelJson } from "./structured-output";
import { TokenChannel } from "./token-channel";

const log = createModuleLogger("privacy-router");

const SENSITIVE_KEYWORDS = keywords.sensitive;

const PrivacyVerdictSchema = z.object({
  sensitive: z.boolean(),
  reason: z.string().default(""),
});

export interface ModelCatalogEntry {
  tier: ModelTier;
  provider: LLMProvider;
}

export interface PrivacyRouterOptions {
  preferences?: Partial<Record<PrivacyMode, PreferenceTable>>;
  fallbacks?: Partial<Record<PrivacyMode, FallbackEdges>>;
  retry?: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  clock?: Clock;
}

export interface PrivacyAdviceOptions {
  explicitMode?: PrivacyMode;
  useModel?: boolean;
}

export interface CompletionOptions {
  privacyMode: PrivacyMode;
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export class PrivacyRouter {
  private readonly catalog = new Map<ModelTier, LLMProvider>();
  private readonly preferences: Record<PrivacyMode, PreferenceTable>;
  private readonly fallbacks: Record<PrivacyMode, FallbackEdges>;

  constructor(
    catalog: ModelCatalogEntry[],
    private readonly options: PrivacyRouterOptions = {}
  ) {
    for (const entry of catalog) {
      this.catalog.set(entry.tier, entry.provider);
    }
    this.preferences = { ...MODEL_PREFERENCES, ...options.preferences };
    this.fallbacks = { ...FALLBACK_EDGES, ...options.fallbacks };
  }

  // ===========================================================================
  // Privacy boundary
  // ===========================================================================

  isLocalTier(tier: ModelTier): boolean {
    return this.catalog.get(tier)?.isLocal() ?? false;
  }

  isCompliant(mode: PrivacyMode, tier: ModelTier): boolean {
    return mode !== "LOCAL_ONLY" || this.isLocalTier(tier);
  }

  assertPrivacyCompliant(mode: PrivacyMode, tier: ModelTier): void {
    if (!this.isCompliant(mode, tier)) {
      throw new PrivacyViolationError(
        `Model tier "${tier}" is not local and cannot be used under LOCAL_ONLY`,
        tier
      );
    }
  }

  /**
   * Preference list for (mode, complexity) with non-compliant entries removed
   */
  preferencesFor(mode: PrivacyMode, complexity: TaskComplexity): ModelTier[] {
    return this.preferences[mode][complexity].filter((tier) => {
      if (this.isCompliant(mode, tier)) return true;
      log.error("Dropping non-local tier from LOCAL_ONLY preferences", {
        tier,
        complexity,
      });
      return false;
    });
  }

  private fallbacksFor(mode: PrivacyMode, tier: ModelTier): ModelTier[] {
    return (this.fallbacks[mode][tier] ?? []).filter((next) =>
      this.isCompliant(mode, next)
    );
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  /**
   * Tiers whose provider currently answers
   */
  async availableModels(): Promise<ModelTier[]> {
    const checks = await Promise.all(
      MODEL_TIERS.map(async (tier) => {
        const provider = this.catalog.get(tier);
        return provider && (await provider.isAvailable()) ? tier : null;
      })
    );
    return checks.filter((tier): tier is ModelTier => tier !== null);
  }

  select(
    complexity: TaskComplexity,
    privacyMode: PrivacyMode,
    availableModels: readonly ModelTier[]
  ): ModelRecommendation {
    const candidates = this.preferencesFor(privacyMode, complexity);
    const model = candidates.find((tier) => availableModels.includes(tier));

    if (!model) {
      if (privacyMode === "LOCAL_ONLY") {
        throw new ModelUnavailableError(
          "No local model available; LOCAL_ONLY sessions cannot use cloud models"
        );
      }
      throw new ModelUnavailableError(
        `No model available for ${complexity} complexity (tried ${candidates.join(", ")})`
      );
    }

    const local = this.isLocalTier(model);
    const preferred = candidates[0];
    return {
      model,
      privacyCompliant: this.isCompliant(privacyMode, model),
      reasoning:
        model === preferred
          ? `${model} is the preferred ${local ? "local" : "cloud"} model for ${complexity} complexity under ${privacyMode}`
          : `${preferred} unavailable; using ${model} for ${complexity} complexity under ${privacyMode}`,
    };
  }

  async selectAvailable(
    complexity: TaskComplexity,
    privacyMode: PrivacyMode
  ): Promise<ModelRecommendation> {
    return this.select(complexity, privacyMode, await this.availableModels());
  }

  async hasCompliantModel(privacyMode: PrivacyMode): Promise<boolean> {
    const available = await this.availableModels();
    return available.some((tier) => this.isCompliant(privacyMode, tier));
  }

  // ===========================================================================
  // Completion
  // ===========================================================================

  /**
   * Complete with `model`, following the mode's fallback edges when the
   * model is unavailable or stays overloaded.
   */
  async complete(
    messages: LLMMessage[],
    model: ModelTier,
    options: CompletionOptions
  ): Promise<string> {
    const mode = options.privacyMode;
    this.assertPrivacyCompliant(mode, model);

    const tried: ModelTier[] = [];
    const queue: ModelTier[] = [model];
    let lastError: unknown;

    for (let tier = queue.shift(); tier !== undefined; tier = queue.shift()) {
      if (tried.includes(tier)) continue;
      tried.push(tier);
      this.assertPrivacyCompliant(mode, tier);

      const provider = this.catalog.get(tier);
      if (!provider) {
        lastError = new ModelUnavailableError(`No provider configured for ${tier}`, tier);
        queue.push(...this.fallbacksFor(mode, tier));
        continue;
      }

      try {
        return await this.withModelRetry(() =>
          provider.complete(messages, {
            temperature: options.temperature,
            maxTokens: options.maxTokens,
            jsonMode: options.jsonMode,
            signal: options.signal,
          })
        );
      } catch (error) {
        if (!(error instanceof ModelUnavailableError || error instanceof ModelOverloadedError)) {
          throw error;
        }
        lastError = error;
        const next = this.fallbacksFor(mode, tier);
        log.warn("Model failed, following fallback edges", {
          tier,
          next: next.join(",") || "none",
          error: errorMessage(error),
        });
        queue.push(...next);
      }
    }

    throw new ModelUnavailableError(
      `No model could complete the request (tried ${tried.join(", ")})`,
      model,
      { cause: lastError }
    );
  }

  private withModelRetry<T>(operation: () => Promise<T>): Promise<T> {
    const retry = this.options.retry ?? { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000 };
    return withRetry(operation, {
      ...retry,
      jitter: 0.2,
      clock: this.options.clock,
      shouldRetry: (error) => error instanceof ModelOverloadedError,
      onRetry: (error, attempt, delayMs) => {
        log.warn("Model overloaded, retrying", { attempt, delayMs, error: errorMessage(error) });
      },
    });
  }

  /**
   * Stream a completion as events: model_info, token..., then exactly one
   * terminal done or error. Falls back along the mode's edges only while no
   * token has been delivered.
   */
  stream(
    messages: LLMMessage[],
    model: ModelTier,
    options: CompletionOptions
  ): TokenChannel<StreamEvent> {
    const channel = new TokenChannel<StreamEvent>();
    this.pump(channel, messages, model, options).catch((error: unknown) => {
      channel.push({ type: "error", message: errorMessage(error) });
      channel.close();
    });
    return channel;
  }

  private async pump(
    channel: TokenChannel<StreamEvent>,
    messages: LLMMessage[],
    model: ModelTier,
    options: CompletionOptions
  ): Promise<void> {
    const mode = options.privacyMode;
    try {
      this.assertPrivacyCompliant(mode, model);
      const queue: ModelTier[] = [model];
      const tried: ModelTier[] = [];
      let delivered = false;

      for (let tier = queue.shift(); tier !== undefined; tier = queue.shift()) {
        if (tried.includes(tier)) continue;
        tried.push(tier);
        this.assertPrivacyCompliant(mode, tier);

        const provider = this.catalog.get(tier);
        if (!provider) {
          queue.push(...this.fallbacksFor(mode, tier));
          continue;
        }

        channel.push({ type: "model_info", model: tier, local: provider.isLocal() });
        try {
          for await (const token of provider.stream(messages, {
            temperature: options.temperature,
            maxTokens: options.maxTokens,
            signal: channel.signal,
          })) {
            if (channel.signal.aborted) break;
            delivered = true;
            channel.push({ type: "token", token });
          }
          channel.push(channel.signal.aborted ? { type: "done", cancelled: true } : { type: "done" });
          return;
        } catch (error) {
          const canFallBack =
            !delivered &&
            !channel.signal.aborted &&
            (error instanceof ModelUnavailableError || error instanceof ModelOverloadedError);
          if (!canFallBack) throw error;
          log.warn("Stream failed before first token, falling back", {
            tier,
            error: errorMessage(error),
          });
          queue.push(...this.fallbacksFor(mode, tier));
        }
      }

      throw new ModelUnavailableError(
        `No model could stream the request (tried ${tried.join(", ")})`,
        model
      );
    } catch (error) {
      if (channel.signal.aborted) {
        channel.push({ type: "done", cancelled: true });
      } else {
        channel.push({
          type: "error",
          message: errorMessage(error),
          code: error instanceof ResearchEngineError ? error.code : undefined,
        });
      }
    } finally {
      channel.close();
    }
  }

  // ===========================================================================
  // Privacy advisor
  // ===========================================================================

  /**
   * Suggest a privacy mode for a query. An explicit user choice is returned
   * unchanged; a model, when consulted, is always a local one.
   */
  async recommendPrivacyMode(
    query: string,
    options: PrivacyAdviceOptions = {}
  ): Promise<PrivacyRecommendation> {
    if (options.explicitMode) {
      return {
        mode: options.explicitMode,
        reasoning: "User-selected privacy mode is always respected.",
        source: "explicit",
      };
    }

    const lower = query.toLowerCase();
    const found = SENSITIVE_KEYWORDS.filter((keyword) =>
      new RegExp(`\\b${keyword}\\b`).test(lower)
    );

    if (found.length > 0) {
      const listed =
        found.slice(0, 3).join(", ") +
        (found.length > 3 ? ` (+${found.length - 3} more)` : "");
      return {
        mode: "LOCAL_ONLY",
        reasoning: `Detected potentially sensitive content (${listed}). Local processing recommended.`,
        source: "keyword",
      };
    }

    if (options.useModel) {
      const verdict = await this.classifyWithLocalModel(query);
      if (verdict) return verdict;
    }

    return {
      mode: "CLOUD_ALLOWED",
      reasoning: "No sensitive content detected. Cloud processing allowed for best results.",
      source: "keyword",
    };
  }

  private async classifyWithLocalModel(query: string): Promise<PrivacyRecommendation | null> {
    let recommendation: ModelRecommendation;
    try {
      recommendation = await this.selectAvailable("LOW", "LOCAL_ONLY");
    } catch (error) {
      log.info("No local model for privacy classification, using keywords", {
        error: errorMessage(error),
      });
      return null;
    }

    try {
      const text = await this.complete(
        buildMessages(PRIVACY_CLASSIFICATION_PROMPTS, { query }),
        recommendation.model,
        {
          privacyMode: "LOCAL_ONLY",
          temperature: PRIVACY_CLASSIFICATION_PROMPTS.temperature,
          jsonMode: PRIVACY_CLASSIFICATION_PROMPTS.jsonMode,
        }
      );
      const verdict = parseModelJson(text, PrivacyVerdictSchema);
      if (!verdict) {
        log.warn("Unparseable privacy verdict, using keywords");
        return null;
      }
      return {
        mode: verdict.sensitive ? "LOCAL_ONLY" : "CLOUD_ALLOWED",
        reasoning: verdict.reason || (verdict.sensitive
          ? "Local model classified the query as sensitive."
          : "Local model found no sensitive content."),
        source: "model",
      };
    } catch (error) {
      log.warn("Privacy classification failed, using keywords", {
        error: errorMessage(error),
      });
      return null;
    }
  }
}
