import { describe, it, expect } from "vitest";
import type { CycleRecord, SaturationMetrics, SourceResult } from "../models/research-state";
import { InMemoryMemoryRepository } from "../services/memory/in-memory-repository";
import { DEFAULT_CONFIG } from "../services/research-engine/config";
import {
  computeMetrics,
  roundMetrics,
  SaturationEvaluator,
  SOURCES_EXHAUSTED_REASON,
} from "../services/saturation/evaluator";
import {
  SourceLearning,
  summarizeOutcomes,
  updateEffectiveness,
} from "../services/saturation/learning";

const SATURATED: SaturationMetrics = {
  newEntitiesRatio: 0.05,
  newFactsRatio: 0.05,
  citationCircularity: 0.4,
  sourceCoverage: 0.9,
  overallSaturation: 0.9,
};

const GROWING: SaturationMetrics = {
  newEntitiesRatio: 0.5,
  newFactsRatio: 0.4,
  citationCircularity: 0,
  sourceCoverage: 1,
  overallSaturation: 0.5,
};

function record(cycle: number, metrics: SaturationMetrics, sourceExhausted = false): CycleRecord {
  return {
    cycle,
    query: "q",
    metrics,
    newEntities: 0,
    newFacts: 0,
    resultsCollected: 0,
    sourceExhausted,
    completedAt: cycle,
  };
}

const QUIET = {
  newEntities: 0,
  totalEntities: 25000,
  newFacts: 0,
  totalFacts: 10,
  repeatedCitations: 0,
  totalCitations: 4,
  categoriesQueried: 1,
  categoriesPlanned: 1,
};

describe("computeMetrics", () => {
  it("should derive ratios and the overall score from cycle growth", () => {
    const metrics = computeMetrics({
      newEntities: 2,
      totalEntities: 10,
      newFacts: 1,
      totalFacts: 4,
      repeatedCitations: 3,
      totalCitations: 6,
      categoriesQueried: 1,
      categoriesPlanned: 2,
    });

    expect(metrics).toMatchObject({
      newEntitiesRatio: 0.2,
      newFactsRatio: 0.25,
      citationCircularity: 0.5,
      sourceCoverage: 0.5,
    });
    expect(metrics.overallSaturation).toBeCloseTo(0.6925, 10);
  });

  it("should round only the copy sent with progress events", () => {
    const metrics = computeMetrics({ ...QUIET, newEntities: 1, totalEntities: 3 });
    expect(metrics.newEntitiesRatio).toBe(1 / 3);
    expect(roundMetrics(metrics)).toEqual({
      newEntitiesRatio: 0.3333,
      newFactsRatio: 0,
      citationCircularity: 0,
      sourceCoverage: 1,
      overallSaturation: 0.8833,
    });
  });

  it("should not divide by zero on an empty cycle", () => {
    expect(
      computeMetrics({
        newEntities: 0,
        totalEntities: 0,
        newFacts: 0,
        totalFacts: 0,
        repeatedCitations: 0,
        totalCitations: 0,
        categoriesQueried: 0,
        categoriesPlanned: 0,
      })
    ).toEqual({
      newEntitiesRatio: 0,
      newFactsRatio: 0,
      citationCircularity: 0,
      sourceCoverage: 0,
      overallSaturation: 0.7,
    });
  });
});

describe("SaturationEvaluator", () => {
  const evaluator = new SaturationEvaluator(DEFAULT_CONFIG.saturation);

  it("should keep going on a first cycle with growth", () => {
    const decision = evaluator.shouldStop(GROWING, []);
    expect(decision).toEqual({
      stop: false,
      reason: "saturation not reached at cycle 1: new entities 50%, new facts 40%, coverage 100%",
    });
  });

  it("should compare unrounded ratios with the thresholds", () => {
    // 0.09996 and 0.849996 both round to the threshold itself at 4 decimals
    expect(evaluator.isSaturated(computeMetrics({ ...QUIET, newEntities: 2499 }))).toBe(true);
    expect(
      evaluator.isSaturated(
        computeMetrics({ ...QUIET, categoriesQueried: 212499, categoriesPlanned: 250000 })
      )
    ).toBe(false);
  });

  it("should not stop on a single saturated cycle", () => {
    expect(evaluator.shouldStop(SATURATED, []).stop).toBe(false);
    expect(evaluator.shouldStop(SATURATED, [record(1, GROWING)]).stop).toBe(false);
  });

  it("should stop after two consecutive saturated cycles", () => {
    expect(evaluator.shouldStop(SATURATED, [record(1, GROWING), record(2, SATURATED)])).toEqual({
      stop: true,
      reason:
        "saturation reached: new entities 5%, new facts 5%, coverage 90% for 2 consecutive cycles",
    });
  });

  it("should not count an exhausted cycle toward saturation", () => {
    expect(evaluator.shouldStop(SATURATED, [record(1, SATURATED, true)]).stop).toBe(false);
  });

  it("should require coverage as well as low growth", () => {
    const lowCoverage = { ...SATURATED, sourceCoverage: 0.5 };
    expect(evaluator.isSaturated(lowCoverage)).toBe(false);
    expect(evaluator.shouldStop(lowCoverage, [record(1, lowCoverage)]).stop).toBe(false);
  });

  it("should stop when sources stay exhausted for the exhaustion window", () => {
    expect(evaluator.shouldStop(GROWING, [], { sourceExhausted: true }).stop).toBe(false);
    expect(
      evaluator.shouldStop(GROWING, [record(1, GROWING, true)], { sourceExhausted: true })
    ).toEqual({ stop: true, reason: SOURCES_EXHAUSTED_REASON });
  });

  it("should stop at the cycle cap", () => {
    const history = [1, 2, 3, 4].map((cycle) => record(cycle, GROWING));
    expect(evaluator.shouldStop(GROWING, history)).toEqual({
      stop: true,
      reason: "maximum of 5 research cycles reached",
    });
  });

  it("should stop on the first saturated cycle with a window of one", () => {
    const eager = new SaturationEvaluator({ ...DEFAULT_CONFIG.saturation, debounceWindow: 1 });
    expect(eager.shouldStop(SATURATED, []).stop).toBe(true);
  });
});

describe("source learning", () => {
  it("should move the score toward the observed quality", () => {
    expect(updateEffectiveness(0.5, true, 0.9, 0.3)).toBeCloseTo(0.62);
    expect(updateEffectiveness(0.5, false, 0.9, 0.3)).toBeCloseTo(0.35);
  });

  it("should summarize each provider's results", () => {
    const results: SourceResult[] = [
      { provider: "pubmed", url: "u1", title: "", snippet: "", success: true, qualityScore: 0.8, retrievedAt: 0 },
      { provider: "pubmed", url: "u2", title: "", snippet: "", success: true, qualityScore: 0.4, retrievedAt: 0 },
    ];
    const outcomes = summarizeOutcomes(["pubmed", "arxiv"], results);

    expect(outcomes[0]).toMatchObject({ provider: "pubmed", success: true, resultCount: 2 });
    expect(outcomes[0].quality).toBeCloseTo(0.6);
    expect(outcomes[1]).toEqual({ provider: "arxiv", success: false, quality: 0, resultCount: 0 });
  });

  it("should record one update per queried provider", async () => {
    const memory = new InMemoryMemoryRepository({ alpha: 0.3, defaultScore: 0.5 });
    const learning = new SourceLearning(memory, 0.3);
    const results: SourceResult[] = [
      { provider: "pubmed", url: "u1", title: "", snippet: "", success: true, qualityScore: 0.9, retrievedAt: 0 },
    ];

    await learning.recordSessionOutcome("medical", ["pubmed", "arxiv"], results);

    expect(await memory.getSourceEffectiveness("pubmed", "medical")).toBeCloseTo(0.62);
    expect(await memory.getSourceEffectiveness("arxiv", "medical")).toBeCloseTo(0.35);
    expect(await memory.getSourceEffectiveness("pubmed", "academic")).toBe(0.5);
  });

  it("should skip sources below the minimum score", () => {
    const learning = new SourceLearning(new InMemoryMemoryRepository(), 0.3);
    expect(learning.shouldUseSource(0.29)).toBe(false);
    expect(learning.shouldUseSource(0.3)).toBe(true);
  });
});
