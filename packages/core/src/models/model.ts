/**
 * Model routing types
 */

export const PRIVACY_MODES = ["LOCAL_ONLY", "CLOUD_ALLOWED", "HYBRID"] as const;
export type PrivacyMode = (typeof PRIVACY_MODES)[number];

export const TASK_COMPLEXITIES = ["LOW", "MEDIUM", "HIGH"] as const;
export type TaskComplexity = (typeof TASK_COMPLEXITIES)[number];

export const MODEL_TIERS = ["local-fast", "local-powerful", "cloud-best"] as const;
export type ModelTier = (typeof MODEL_TIERS)[number];

export interface ModelRecommendation {
  model: ModelTier;
  reasoning: string;
  privacyCompliant: boolean;
}

export interface PrivacyRecommendation {
  mode: PrivacyMode;
  reasoning: string;
  source: "explicit" | "keyword" | "model";
}

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export function isPrivacyMode(value: unknown): value is PrivacyMode {
  return PRIVACY_MODES.some((mode) => mode === value);
}
