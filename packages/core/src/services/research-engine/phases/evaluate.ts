/**
 * EVALUATE: saturation metrics and the stop decision for this cycle
 */

import type { CycleRecord, ResearchState } from "../../../models/research-state";
import { createModuleLogger } from "../../../logger";
import { computeMetrics } from "../../saturation/evaluator";
import type { PhaseContext, PhaseHandler } from "../types";

const log = createModuleLogger("phase:evaluate");

/**
 * Categories of providers that have returned at least one result this session
 */
function categoriesWithResults(state: ResearchState, ctx: PhaseContext): Set<string> {
  const categories = new Set<string>();
  for (const result of state.sourceResults) {
    categories.add(ctx.config.search.providers[result.provider]?.category ?? result.provider);
  }
  return categories;
}

export const evaluate: PhaseHandler = async (state, ctx) => {
  const planned = state.plan?.categoriesPlanned ?? [];
  const queried = categoriesWithResults(state, ctx);

  const metrics = computeMetrics({
    newEntities: state.workspace.newEntities,
    totalEntities: state.entities.length,
    newFacts: state.workspace.newFacts,
    totalFacts: state.facts.length,
    repeatedCitations: state.workspace.repeatedCitations,
    totalCitations: state.workspace.totalCitations,
    categoriesQueried: planned.filter((category) => queried.has(category)).length,
    categoriesPlanned: planned.length,
  });

  const decision = ctx.evaluator.shouldStop(metrics, state.cycleHistory, {
    sourceExhausted: state.workspace.exhausted,
  });

  const record: CycleRecord = {
    cycle: state.cycle,
    query: state.workspace.query,
    metrics,
    newEntities: state.workspace.newEntities,
    newFacts: state.workspace.newFacts,
    resultsCollected: state.workspace.newResultUrls.length,
    sourceExhausted: state.workspace.exhausted,
    completedAt: ctx.now(),
  };

  log.info("Cycle evaluated", {
    sessionId: state.sessionId,
    cycle: state.cycle,
    saturation: metrics.overallSaturation,
    stop: decision.stop,
    reason: decision.reason,
  });

  const evaluated: ResearchState = {
    ...state,
    saturationMetrics: metrics,
    cycleHistory: [...state.cycleHistory, record],
  };

  if (decision.stop) {
    return {
      state: { ...evaluated, stopReason: [...state.stopReason, decision.reason] },
      next: "synthesize",
    };
  }
  return { state: { ...evaluated, cycle: state.cycle + 1 }, next: "plan" };
};
