/**
 * Progress snapshot and stream event types
 */

import type { ResearchPhase, SaturationMetrics } from "./research-state";
import type { ModelTier } from "./model";

export interface ProgressSnapshot {
  sessionId: string;
  phase: ResearchPhase;
  cycle: number;
  sourcesQueried: number;
  entitiesFound: number;
  factsExtracted: number;
  saturationMetrics: SaturationMetrics | null;
  stopReason: string[];
}

/**
 * Events emitted by a token stream. Exactly one terminal event (`done` or
 * `error`) ends every stream.
 */
export type StreamEvent =
  | { type: "token"; token: string }
  | { type: "model_info"; model: ModelTier; local: boolean }
  | { type: "done"; cancelled?: boolean }
  | { type: "error"; message: string; code?: string };

export type ProgressEvent =
  | { type: "progress"; snapshot: ProgressSnapshot }
  | StreamEvent;

/**
 * A progress event as delivered to subscribers, with its replay position
 */
export type SequencedEvent = ProgressEvent & { seq: number; sessionId: string };

export function isTerminalEvent(event: StreamEvent): boolean {
  return event.type === "done" || event.type === "error";
}
