/**
 * ResearchEngine
 *
 * Owns the collaborators shared across sessions (provider registry,
 * aggregator, router, memory, progress hub) and the live orchestrators.
 * Finished sessions stay attached up to `server.retainedSessions`; older ones
 * are dropped with their progress buffers and reattach from their checkpoint.
 */

import { randomUUID } from "crypto";
import type { PrivacyRecommendation } from "../../models/model";
import { isPrivacyMode } from "../../models/model";
import type { ResearchRequest, ResearchState } from "../../models/research-state";
import { emptyWorkspace } from "../../models/research-state";
import type { SessionCheckpoint } from "../../interfaces/memory";
import {
  errorMessage,
  ResearchError,
  SessionNotFoundError,
} from "../../errors";
import { createModuleLogger } from "../../logger";
import type { PrivacyAdviceOptions } from "../llm/privacy-router";
import type { ProviderCircuit } from "../resilience/circuit-breaker";
import type { ProviderRegistry } from "../resilience/provider-registry";
import { ResearchOrchestrator, toProgressSnapshot } from "./orchestrator";
import { ProgressHub } from "./progress-hub";
import type { EngineServices, TransitionTable } from "./types";

const log = createModuleLogger("research-engine");

export interface ResearchEngineOptions {
  services: EngineServices;
  registry: ProviderRegistry;
  progress?: ProgressHub;
  transitions?: TransitionTable;
}

export function createInitialState(request: ResearchRequest, now: number): ResearchState {
  const query = request.query.trim();
  if (!query) {
    throw new ResearchError("Research query must not be empty");
  }
  if (request.privacyMode !== undefined && !isPrivacyMode(request.privacyMode)) {
    throw new ResearchError(`Unknown privacy mode: ${String(request.privacyMode)}`);
  }

  return {
    sessionId: request.sessionId ?? randomUUID(),
    phase: "clarify",
    query,
    refinedQuery: query,
    domain: request.domain ?? null,
    privacyMode: request.privacyMode ?? null,
    searchFilters: request.filters ?? null,
    requireApproval: request.requireApproval ?? false,
    approved: false,
    plan: null,
    entities: [],
    facts: [],
    sourceResults: [],
    providersQueried: [],
    cycle: 1,
    cycleHistory: [],
    saturationMetrics: null,
    stopReason: [],
    notFound: [],
    usedExpansionTerms: [],
    workspace: emptyWorkspace(query),
    report: null,
    createdAt: now,
    updatedAt: now,
  };
}

export class ResearchEngine {
  readonly progress: ProgressHub;
  private readonly sessions = new Map<string, ResearchOrchestrator>();
  // Finished session ids, oldest first
  private readonly finished: string[] = [];

  constructor(private readonly options: ResearchEngineOptions) {
    this.progress =
      options.progress ?? new ProgressHub(options.services.config.server.progressBufferSize);
  }

  get services(): EngineServices {
    return this.options.services;
  }

  /**
   * Create a session and checkpoint its initial state. The session does not
   * run until `start` or `run` is called.
   */
  async createSession(request: ResearchRequest): Promise<ResearchOrchestrator> {
    const state = createInitialState(request, this.services.now());
    if (this.sessions.has(state.sessionId)) {
      throw new ResearchError(`Session ${state.sessionId} already exists`);
    }

    const orchestrator = this.attach(state);
    await this.services.memory.saveCheckpoint(state);
    this.progress.publish(state.sessionId, { type: "progress", snapshot: toProgressSnapshot(state) });
    log.info("Session created", {
      sessionId: state.sessionId,
      privacyMode: state.privacyMode ?? "auto",
      domain: state.domain ?? "auto",
    });
    return orchestrator;
  }

  /**
   * Create a session and run it until it completes or pauses for approval
   */
  async research(request: ResearchRequest): Promise<ResearchState> {
    const orchestrator = await this.createSession(request);
    return orchestrator.run();
  }

  /**
   * Continue a session in the background. Failures are recorded on the
   * orchestrator and published as an error event.
   */
  start(sessionId: string): void {
    const orchestrator = this.getSession(sessionId);
    orchestrator.run().catch((error: unknown) => {
      log.error("Background session ended with an error", {
        sessionId,
        error: errorMessage(error),
      });
    });
  }

  getSession(sessionId: string): ResearchOrchestrator {
    const orchestrator = this.sessions.get(sessionId);
    if (!orchestrator) {
      throw new SessionNotFoundError(sessionId);
    }
    return orchestrator;
  }

  /**
   * Live session, or one reattached from its last checkpoint
   */
  async findSession(sessionId: string): Promise<ResearchOrchestrator> {
    const live = this.sessions.get(sessionId);
    if (live) return live;
    const state = await this.services.memory.loadCheckpoint(sessionId);
    if (!state) {
      throw new SessionNotFoundError(sessionId);
    }
    return this.attach(state);
  }

  /**
   * Load a checkpoint and continue from its phase
   */
  async resume(sessionId: string): Promise<ResearchOrchestrator> {
    const orchestrator = await this.findSession(sessionId);
    log.info("Resuming session", { sessionId, phase: orchestrator.state.phase });
    this.start(sessionId);
    return orchestrator;
  }

  async approve(sessionId: string): Promise<ResearchOrchestrator> {
    const orchestrator = await this.findSession(sessionId);
    await orchestrator.approve();
    this.start(sessionId);
    return orchestrator;
  }

  async stop(sessionId: string): Promise<ResearchOrchestrator> {
    const orchestrator = await this.findSession(sessionId);
    orchestrator.requestStop();
    if (orchestrator.status !== "running") {
      this.start(sessionId);
    }
    return orchestrator;
  }

  listCheckpoints(): Promise<SessionCheckpoint[]> {
    return this.services.memory.listCheckpoints();
  }

  recommendPrivacyMode(
    query: string,
    options: PrivacyAdviceOptions = {}
  ): Promise<PrivacyRecommendation> {
    return this.services.router.recommendPrivacyMode(query, options);
  }

  providerStatus(): Record<string, ProviderCircuit> {
    return this.options.registry.snapshot();
  }

  private attach(state: ResearchState): ResearchOrchestrator {
    const orchestrator = new ResearchOrchestrator(
      state,
      this.services,
      this.progress,
      this.options.transitions,
      { onSettled: (settled) => this.retire(settled.sessionId) }
    );
    this.sessions.set(state.sessionId, orchestrator);
    if (orchestrator.status === "completed") {
      this.retire(state.sessionId);
    }
    return orchestrator;
  }

  private retire(sessionId: string): void {
    const at = this.finished.indexOf(sessionId);
    if (at >= 0) this.finished.splice(at, 1);
    this.finished.push(sessionId);

    const limit = this.services.config.server.retainedSessions;
    while (this.finished.length > limit) {
      const evicted = this.finished.shift();
      if (evicted === undefined) break;
      this.sessions.delete(evicted);
      this.progress.release(evicted);
      log.debug("Released finished session", { sessionId: evicted });
    }
  }
}
