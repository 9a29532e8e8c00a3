/**
 * Research Engine service
 *
 * Phase state machine over one session at a time per orchestrator:
 * clarify -> plan -> (await_approval) -> collect -> process -> analyze ->
 * evaluate -> (plan | synthesize) -> done
 */

export { ResearchEngine, createInitialState } from "./engine";
export type { ResearchEngineOptions } from "./engine";
export { createResearchEngine } from "./factory";
export type { CreateResearchEngineOptions } from "./factory";
export { ResearchOrchestrator, toProgressSnapshot } from "./orchestrator";
export { ProgressHub } from "./progress-hub";
export type { ProgressListener } from "./progress-hub";
export { TRANSITIONS } from "./phases";
export {
  FactVerifier,
  agreementScore,
  contradicts,
  credibilityScore,
  standingFromConfig,
  type FactVerifierOptions,
  type SourceStanding,
} from "./verification";
export { detectDomain, domainKeywords, GENERAL_DOMAIN } from "./domain-detector";
export type { DetectedDomain } from "./domain-detector";
export { buildReport, fallbackSummary, NOT_FOUND_HEADING } from "./report";
export {
  USER_STOP_REASON,
  NO_MODEL_REASON,
  type EngineServices,
  type PhaseContext,
  type PhaseHandler,
  type PhaseResult,
  type SessionStatus,
  type TransitionTable,
} from "./types";
export {
  DEFAULT_CONFIG,
  ResearchConfigSchema,
  clearConfigCache,
  getConfig,
  getConfigPath,
  getDomainConfig,
  getProviderConfig,
  loadConfig,
  mergeConfig,
  withConfigOverrides,
} from "./config";
export type {
  DeepPartial,
  DomainConfig,
  ExtractionConfig,
  ModelTierConfig,
  ProviderConfig,
  ResearchConfig,
  SaturationConfig,
} from "./config";
