/**
 * Model selection tables
 *
 * (privacyMode, complexity) -> ordered tier preferences, and the fallback
 * edges each mode allows. LOCAL_ONLY rows name only local tiers; the router
 * still checks every entry against the catalog before using it.
 */

import keywords from "../../data/keywords.json";
import type { ModelTier, PrivacyMode, TaskComplexity } from "../../models/model";

export type PreferenceTable = Record<TaskComplexity, readonly ModelTier[]>;
export type FallbackEdges = Partial<Record<ModelTier, readonly ModelTier[]>>;

const CLOUD_PREFERENCES: PreferenceTable = {
  LOW: ["local-fast", "local-powerful", "cloud-best"],
  MEDIUM: ["local-powerful", "local-fast", "cloud-best"],
  HIGH: ["cloud-best", "local-powerful", "local-fast"],
};

const CLOUD_FALLBACKS: FallbackEdges = {
  "cloud-best": ["local-powerful", "local-fast"],
  "local-powerful": ["local-fast"],
};

export const MODEL_PREFERENCES: Record<PrivacyMode, PreferenceTable> = {
  LOCAL_ONLY: {
    LOW: ["local-fast", "local-powerful"],
    MEDIUM: ["local-fast", "local-powerful"],
    HIGH: ["local-powerful", "local-fast"],
  },
  CLOUD_ALLOWED: CLOUD_PREFERENCES,
  HYBRID: CLOUD_PREFERENCES,
};

export const FALLBACK_EDGES: Record<PrivacyMode, FallbackEdges> = {
  LOCAL_ONLY: {
    "local-powerful": ["local-fast"],
  },
  CLOUD_ALLOWED: CLOUD_FALLBACKS,
  HYBRID: CLOUD_FALLBACKS,
};

const COMPLEX_INDICATORS = keywords.complexIndicators;

/**
 * Estimate task complexity from text length and wording
 */
export function estimateComplexity(text: string, contextLength = 0): TaskComplexity {
  const totalLength = text.length + contextLength;
  const lower = text.toLowerCase();
  const hasComplexIndicator = COMPLEX_INDICATORS.some((indicator) =>
    lower.includes(indicator)
  );

  if (totalLength > 2000 || hasComplexIndicator) {
    return "HIGH";
  }
  if (totalLength > 500) {
    return "MEDIUM";
  }
  return "LOW";
}
