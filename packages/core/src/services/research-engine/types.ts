/**
 * Type definitions for research engine
 */

import type { Memory } from "../../interfaces/memory";
import type { ReportExporter } from "../../interfaces/exporter";
import type { Verifier } from "../../interfaces/verifier";
import type { StreamEvent } from "../../models/progress";
import type { ActivePhase, ResearchPhase, ResearchState } from "../../models/research-state";
import type { ContentExtractor } from "../content-extractor";
import type { PrivacyRouter } from "../llm/privacy-router";
import type { SaturationEvaluator } from "../saturation/evaluator";
import type { SourceLearning } from "../saturation/learning";
import type { SearchAggregator } from "../search/aggregator";
import type { ResearchConfig } from "./config";

/**
 * Collaborators shared by every session of an engine
 */
export interface EngineServices {
  config: ResearchConfig;
  memory: Memory;
  aggregator: SearchAggregator;
  router: PrivacyRouter;
  evaluator: SaturationEvaluator;
  learning: SourceLearning;
  verifier: Verifier;
  extractor?: ContentExtractor;
  exporter?: ReportExporter;
  now: () => number;
}

/**
 * What a phase handler sees: the shared services plus a way to publish
 * stream events for its own session
 */
export interface PhaseContext extends EngineServices {
  emit(event: StreamEvent): void;
}

export interface PhaseResult {
  state: ResearchState;
  next: ResearchPhase;
}

export type PhaseHandler = (state: ResearchState, ctx: PhaseContext) => Promise<PhaseResult>;

export type TransitionTable = Record<ActivePhase, PhaseHandler>;

/**
 * Lifecycle of an orchestrator as seen from outside
 */
export type SessionStatus = "idle" | "running" | "awaiting_approval" | "completed" | "failed";

export const USER_STOP_REASON = "stopped by user request";
export const NO_MODEL_REASON = "no language model available";
