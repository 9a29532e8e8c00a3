/**
 * Research Configuration System
 *
 * Loads and manages configuration from research-config.yaml.
 * The file is merged over DEFAULT_CONFIG and validated before use, so every
 * getter returns a fully populated section.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../../errors";
import { createModuleLogger } from "../../logger";
import { retryBudgetMs } from "../resilience/retry";

const log = createModuleLogger("config");

// =============================================================================
// Schema
// =============================================================================

const ModelTierConfigSchema = z.object({
  model: z.string().min(1),
  baseUrl: z.string().optional(),
  apiKeyEnv: z.string().optional(),
  local: z.boolean(),
  contextWindow: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
});

const ProviderConfigSchema = z.object({
  enabled: z.boolean(),
  requestsPerSecond: z.number().positive(),
  category: z.string().min(1),
  baseUrl: z.string().url(),
  apiKeyEnv: z.string().optional(),
  // Weight of this provider's results in fact confidence; unlisted providers count 0.3
  credibility: z.number().min(0).max(1).optional(),
  peerReviewed: z.boolean().optional(),
});

const DomainConfigSchema = z.object({
  primarySources: z.array(z.string()),
  secondarySources: z.array(z.string()),
  verificationThreshold: z.number().min(0).max(1),
  keywords: z.array(z.string()).optional(),
  // Sources older than this are filtered out by providers that support dates
  maxAgeYears: z.number().int().positive().optional(),
});

const TierListSchema = z.array(z.enum(["local-fast", "local-powerful", "cloud-best"]));

const PreferenceTableSchema = z.object({
  LOW: TierListSchema,
  MEDIUM: TierListSchema,
  HIGH: TierListSchema,
});

export const ResearchConfigSchema = z.object({
  models: z.object({
    tiers: z.object({
      "local-fast": ModelTierConfigSchema,
      "local-powerful": ModelTierConfigSchema,
      "cloud-best": ModelTierConfigSchema,
    }),
    availabilityCacheMs: z.number().int().nonnegative(),
  }),
  router: z.object({
    maxAttempts: z.number().int().min(1).max(5),
    baseDelayMs: z.number().nonnegative(),
    maxDelayMs: z.number().nonnegative(),
    preferences: z
      .object({
        LOCAL_ONLY: PreferenceTableSchema.optional(),
        CLOUD_ALLOWED: PreferenceTableSchema.optional(),
        HYBRID: PreferenceTableSchema.optional(),
      })
      .optional(),
  }),
  search: z.object({
    maxConcurrency: z.number().int().positive(),
    providerTimeoutMs: z.number().int().positive(),
    attemptTimeoutMs: z.number().int().positive(),
    maxResultsPerProvider: z.number().int().positive(),
    providers: z.record(z.string(), ProviderConfigSchema),
  }),
  resilience: z.object({
    retry: z.object({
      maxAttempts: z.number().int().min(3).max(5),
      baseDelayMs: z.number().nonnegative(),
      maxDelayMs: z.number().nonnegative(),
      jitter: z.number().min(0).max(1),
    }),
    circuit: z.object({
      failureThreshold: z.number().int().positive(),
      cooldownMs: z.number().int().positive(),
      maxCooldownMs: z.number().int().positive(),
    }),
  }),
  saturation: z.object({
    newEntitiesThreshold: z.number().min(0).max(1),
    newFactsThreshold: z.number().min(0).max(1),
    coverageThreshold: z.number().min(0).max(1),
    debounceWindow: z.number().int().min(1),
    exhaustionWindow: z.number().int().min(1),
    maxCycles: z.number().int().min(1),
  }),
  learning: z.object({
    alpha: z.number().gt(0).max(1),
    defaultScore: z.number().min(0).max(1),
    minimumScore: z.number().min(0).max(1),
  }),
  extraction: z.object({
    enabled: z.boolean(),
    timeoutMs: z.number().int().positive(),
    maxContentChars: z.number().int().positive(),
    maxDocumentsPerCycle: z.number().int().nonnegative(),
    userAgent: z.string(),
  }),
  domains: z.record(z.string(), DomainConfigSchema),
  server: z.object({
    host: z.string(),
    port: z.number().int().positive(),
    progressBufferSize: z.number().int().positive(),
    retainedSessions: z.number().int().nonnegative(),
  }),
}).superRefine((config, ctx) => {
  // The aggregator's deadline has to leave room for the gate's whole retry loop
  const budget = retryBudgetMs(config.search.attemptTimeoutMs, config.resilience.retry);
  if (config.search.providerTimeoutMs < budget) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["search", "providerTimeoutMs"],
      message: `must be at least the retry budget of ${budget}ms`,
    });
  }
});

// =============================================================================
// Type Definitions
// =============================================================================

export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;
export type ModelTierConfig = z.infer<typeof ModelTierConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type DomainConfig = z.infer<typeof DomainConfigSchema>;
export type PreferenceTable = z.infer<typeof PreferenceTableSchema>;
export type RetryConfig = ResearchConfig["resilience"]["retry"];
export type CircuitConfig = ResearchConfig["resilience"]["circuit"];
export type SaturationConfig = ResearchConfig["saturation"];
export type LearningConfig = ResearchConfig["learning"];
export type ExtractionConfig = ResearchConfig["extraction"];
export type SearchConfig = ResearchConfig["search"];

export type DeepPartial<T> = T extends Array<infer U>
  ? Array<U>
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

// =============================================================================
// Default Configuration
// =============================================================================

/**
 * Default configuration values (used when config file is not found)
 */
export const DEFAULT_CONFIG: ResearchConfig = {
  models: {
    tiers: {
      "local-fast": {
        model: "llama3.1:8b",
        baseUrl: "http://localhost:11434/v1",
        local: true,
        contextWindow: 128000,
        temperature: 0.2,
      },
      "local-powerful": {
        model: "qwen2.5:32b",
        baseUrl: "http://localhost:11434/v1",
        local: true,
        contextWindow: 32768,
        temperature: 0.2,
      },
      "cloud-best": {
        model: "gpt-4o",
        apiKeyEnv: "OPENAI_API_KEY",
        local: false,
        contextWindow: 128000,
        temperature: 0.3,
      },
    },
    availabilityCacheMs: 30000,
  },
  router: {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 8000,
  },
  search: {
    maxConcurrency: 5,
    providerTimeoutMs: 100000,
    attemptTimeoutMs: 15000,
    maxResultsPerProvider: 10,
    providers: {
      pubmed: {
        enabled: true,
        requestsPerSecond: 3,
        category: "biomedical",
        baseUrl: "https://eutils.ncbi.nlm.nih.gov/entrez/eutils",
        apiKeyEnv: "NCBI_API_KEY",
        credibility: 0.9,
        peerReviewed: true,
      },
      semantic_scholar: {
        enabled: true,
        requestsPerSecond: 1,
        category: "scholarly",
        baseUrl: "https://api.semanticscholar.org/graph/v1",
        apiKeyEnv: "SEMANTIC_SCHOLAR_API_KEY",
        credibility: 0.85,
        peerReviewed: true,
      },
      arxiv: {
        enabled: true,
        requestsPerSecond: 1,
        category: "preprint",
        baseUrl: "https://export.arxiv.org/api",
        credibility: 0.7,
        peerReviewed: false,
      },
      brave: {
        enabled: true,
        requestsPerSecond: 1,
        category: "web",
        baseUrl: "https://api.search.brave.com/res/v1",
        apiKeyEnv: "BRAVE_SEARCH_API_KEY",
        credibility: 0.5,
        peerReviewed: false,
      },
    },
  },
  resilience: {
    retry: {
      maxAttempts: 4,
      baseDelayMs: 4000,
      maxDelayMs: 60000,
      jitter: 0.2,
    },
    circuit: {
      failureThreshold: 5,
      cooldownMs: 30000,
      maxCooldownMs: 300000,
    },
  },
  saturation: {
    newEntitiesThreshold: 0.1,
    newFactsThreshold: 0.1,
    coverageThreshold: 0.85,
    debounceWindow: 2,
    exhaustionWindow: 2,
    maxCycles: 5,
  },
  learning: {
    alpha: 0.3,
    defaultScore: 0.5,
    minimumScore: 0.3,
  },
  extraction: {
    enabled: true,
    timeoutMs: 10000,
    maxContentChars: 8000,
    maxDocumentsPerCycle: 10,
    userAgent:
      "Mozilla/5.0 (compatible; ResearchBot/1.0; +https://example.com/bot)",
  },
  domains: {
    medical: {
      primarySources: ["pubmed", "semantic_scholar"],
      secondarySources: ["arxiv", "brave"],
      verificationThreshold: 0.8,
      maxAgeYears: 10,
    },
    academic: {
      primarySources: ["semantic_scholar", "arxiv"],
      secondarySources: ["pubmed", "brave"],
      verificationThreshold: 0.7,
    },
    competitive_intelligence: {
      primarySources: ["brave"],
      secondarySources: ["semantic_scholar"],
      verificationThreshold: 0.6,
      maxAgeYears: 2,
    },
    regulatory: {
      primarySources: ["brave"],
      secondarySources: ["pubmed"],
      verificationThreshold: 0.8,
    },
    general: {
      primarySources: ["brave"],
      secondarySources: ["semantic_scholar", "arxiv"],
      verificationThreshold: 0.6,
    },
  },
  server: {
    host: "0.0.0.0",
    port: 8080,
    progressBufferSize: 500,
    retainedSessions: 100,
  },
};

// =============================================================================
// Configuration Loader
// =============================================================================

let cachedConfig: ResearchConfig | null = null;
let configPath: string | null = null;

/**
 * Find the research-config.yaml file by searching upward from a starting directory
 */
function findConfigFile(startDir?: string): string | null {
  const filename = "research-config.yaml";
  let currentDir = startDir || process.cwd();

  // Search up to 10 levels up
  for (let i = 0; i < 10; i++) {
    const configFilePath = path.join(currentDir, filename);
    if (fs.existsSync(configFilePath)) {
      return configFilePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source taking precedence. Arrays are replaced.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Merge overrides into a base configuration and validate the result
 */
export function mergeConfig(
  base: ResearchConfig,
  overrides: DeepPartial<ResearchConfig> | Record<string, unknown>
): ResearchConfig {
  const parsed = ResearchConfigSchema.safeParse(deepMerge(base, overrides));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid research configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(customPath?: string): ResearchConfig {
  if (cachedConfig && !customPath) {
    return cachedConfig;
  }

  const filePath = customPath || findConfigFile();

  if (!filePath) {
    log.warn("research-config.yaml not found, using default configuration");
    cachedConfig = DEFAULT_CONFIG;
    return DEFAULT_CONFIG;
  }

  let rawConfig: unknown;
  try {
    rawConfig = yaml.load(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read config from ${filePath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  // An empty file parses to undefined
  const config = mergeConfig(
    DEFAULT_CONFIG,
    isPlainObject(rawConfig) ? rawConfig : {}
  );

  cachedConfig = config;
  configPath = filePath;
  log.info("Loaded research config", { path: filePath });
  return config;
}

/**
 * Get the currently loaded configuration
 * Loads from file if not yet loaded
 */
export function getConfig(): ResearchConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear the cached configuration (useful for testing or reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Get the path to the loaded config file
 */
export function getConfigPath(): string | null {
  return configPath;
}

/**
 * Override specific configuration values at runtime
 */
export function withConfigOverrides(
  overrides: DeepPartial<ResearchConfig>
): ResearchConfig {
  return mergeConfig(getConfig(), overrides);
}

// =============================================================================
// Convenience Getters
// =============================================================================

export function getDomainConfig(
  domain: string,
  config: ResearchConfig = getConfig()
): DomainConfig {
  const domainConfig = config.domains[domain] ?? config.domains.general;
  if (!domainConfig) {
    throw new ConfigurationError(
      `No configuration for domain "${domain}" and no "general" fallback`
    );
  }
  return domainConfig;
}

export function getProviderConfig(
  name: string,
  config: ResearchConfig = getConfig()
): ProviderConfig | undefined {
  return config.search.providers[name];
}
