/**
 * Research orchestrator
 *
 * Drives one session through the phase transition table. Each step runs the
 * handler for the current phase, checkpoints the resulting state through
 * Memory and publishes a progress snapshot, so a restarted process resumes at
 * the last completed phase.
 */

import type { ProgressSnapshot, StreamEvent } from "../../models/progress";
import type { ResearchState } from "../../models/research-state";
import { errorMessage, ModelUnavailableError, ResearchEngineError } from "../../errors";
import { createModuleLogger } from "../../logger";
import { roundMetrics } from "../saturation/evaluator";
import { recordModelLoss } from "./phases/synthesize";
import { TRANSITIONS } from "./phases";
import type { ProgressHub } from "./progress-hub";
import {
  USER_STOP_REASON,
  type EngineServices,
  type PhaseContext,
  type PhaseResult,
  type SessionStatus,
  type TransitionTable,
} from "./types";

const log = createModuleLogger("orchestrator");

export function toProgressSnapshot(state: ResearchState): ProgressSnapshot {
  return {
    sessionId: state.sessionId,
    phase: state.phase,
    cycle: state.cycle,
    sourcesQueried: state.sourceResults.length,
    entitiesFound: state.entities.length,
    factsExtracted: state.facts.length,
    saturationMetrics: state.saturationMetrics && roundMetrics(state.saturationMetrics),
    stopReason: [...state.stopReason],
  };
}

export interface OrchestratorHooks {
  /** Called each time a run ends completed or failed */
  onSettled?: (orchestrator: ResearchOrchestrator) => void;
}

export class ResearchOrchestrator {
  private current: ResearchState;
  private stopRequested = false;
  // Survives the commit of a step that was already running when approve() landed
  private approvalGranted = false;
  private running: Promise<ResearchState> | null = null;
  private lifecycle: SessionStatus = "idle";
  private failure: string | null = null;
  private readonly ctx: PhaseContext;

  constructor(
    initial: ResearchState,
    services: EngineServices,
    private readonly progress: ProgressHub,
    private readonly transitions: TransitionTable = TRANSITIONS,
    private readonly hooks: OrchestratorHooks = {}
  ) {
    this.current = initial;
    this.ctx = {
      ...services,
      emit: (event: StreamEvent) => {
        this.progress.publish(this.current.sessionId, event);
      },
    };
    if (initial.phase === "done") {
      this.lifecycle = "completed";
    }
  }

  get sessionId(): string {
    return this.current.sessionId;
  }

  get state(): ResearchState {
    return this.current;
  }

  get status(): SessionStatus {
    return this.lifecycle;
  }

  get error(): string | null {
    return this.failure;
  }

  snapshot(): ProgressSnapshot {
    return toProgressSnapshot(this.current);
  }

  /**
   * Run until DONE, or until the approval gate pauses the session. Concurrent
   * callers share the same run.
   */
  run(): Promise<ResearchState> {
    if (!this.running) {
      this.running = this.loop().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  /**
   * Execute exactly one transition
   */
  async step(): Promise<ResearchState> {
    const state = this.current;
    if (state.phase === "done") return state;

    if (this.stopRequested && state.phase === "await_approval") {
      return this.commit(this.forceSynthesis(state));
    }

    let result: PhaseResult;
    try {
      result = await this.transitions[state.phase](state, this.ctx);
    } catch (error) {
      if (!(error instanceof ModelUnavailableError) || state.phase === "synthesize") {
        throw error;
      }
      log.error("No model left for the session, synthesizing partial report", {
        sessionId: state.sessionId,
        phase: state.phase,
        error: errorMessage(error),
      });
      result = {
        state: recordModelLoss(state, error),
        next: "synthesize",
      };
    }

    if (this.stopRequested && result.next !== "synthesize" && result.next !== "done") {
      return this.commit(this.forceSynthesis(result.state));
    }
    return this.commit({ ...result.state, phase: result.next });
  }

  /**
   * Mark the session approved; the caller continues it with `run()`
   */
  async approve(): Promise<void> {
    if (this.current.approved) return;
    this.approvalGranted = true;
    this.current = { ...this.current, approved: true, updatedAt: this.ctx.now() };
    await this.ctx.memory.saveCheckpoint(this.current);
    log.info("Session approved", { sessionId: this.sessionId });
  }

  /**
   * Ask the session to stop. The transition in flight finishes, then the
   * session goes straight to synthesis with whatever it has collected.
   */
  requestStop(): void {
    if (this.current.phase === "done" || this.current.phase === "synthesize") return;
    this.stopRequested = true;
    log.info("Stop requested", { sessionId: this.sessionId, phase: this.current.phase });
  }

  get isPaused(): boolean {
    return this.current.phase === "await_approval" && !this.current.approved && !this.stopRequested;
  }

  private forceSynthesis(state: ResearchState): ResearchState {
    this.stopRequested = false;
    return {
      ...state,
      stopReason: [...state.stopReason, USER_STOP_REASON],
      phase: "synthesize",
    };
  }

  private async loop(): Promise<ResearchState> {
    this.lifecycle = "running";
    this.failure = null;
    try {
      while (this.current.phase !== "done") {
        if (this.isPaused) {
          this.lifecycle = "awaiting_approval";
          log.info("Waiting for approval", { sessionId: this.sessionId });
          return this.current;
        }
        await this.step();
      }
      this.lifecycle = "completed";
      this.hooks.onSettled?.(this);
      return this.current;
    } catch (error) {
      this.lifecycle = "failed";
      this.failure = errorMessage(error);
      log.error("Research session failed", {
        sessionId: this.sessionId,
        phase: this.current.phase,
        error: this.failure,
      });
      this.progress.publish(this.sessionId, {
        type: "error",
        message: this.failure,
        code: error instanceof ResearchEngineError ? error.code : undefined,
      });
      this.hooks.onSettled?.(this);
      throw error;
    }
  }

  private async commit(next: ResearchState): Promise<ResearchState> {
    const state: ResearchState = {
      ...next,
      approved: next.approved || this.approvalGranted,
      updatedAt: this.ctx.now(),
    };
    this.current = state;
    await this.ctx.memory.saveCheckpoint(state);
    this.progress.publish(state.sessionId, { type: "progress", snapshot: toProgressSnapshot(state) });

    if (state.phase === "done") {
      await this.ctx.memory.archiveSession(state);
      log.info("Session archived", { sessionId: state.sessionId });
    }
    return state;
  }
}
