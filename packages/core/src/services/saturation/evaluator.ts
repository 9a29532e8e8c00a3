/**
 * SaturationEvaluator
 *
 * Turns one cycle's growth numbers into metrics and decides whether the
 * session should keep collecting. The stop condition must hold for a window
 * of consecutive cycles, so one quiet cycle is not enough.
 */

import type { CycleRecord, SaturationMetrics } from "../../models/research-state";
import type { SaturationConfig } from "../research-engine/config";

export const SOURCES_EXHAUSTED_REASON = "all configured sources exhausted without results";

export interface CycleGrowth {
  newEntities: number;
  totalEntities: number; // after this cycle
  newFacts: number;
  totalFacts: number; // after this cycle
  repeatedCitations: number;
  totalCitations: number;
  categoriesQueried: number;
  categoriesPlanned: number;
}

export interface StopDecision {
  stop: boolean;
  reason: string;
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Raw ratios for one cycle. Stop decisions compare these unrounded.
 */
export function computeMetrics(growth: CycleGrowth): SaturationMetrics {
  const newEntitiesRatio = growth.newEntities / Math.max(1, growth.totalEntities);
  const newFactsRatio = growth.newFacts / Math.max(1, growth.totalFacts);
  const sourceCoverage = Math.min(
    1,
    growth.categoriesQueried / Math.max(1, growth.categoriesPlanned)
  );

  return {
    newEntitiesRatio,
    newFactsRatio,
    citationCircularity: growth.repeatedCitations / Math.max(1, growth.totalCitations),
    sourceCoverage,
    overallSaturation:
      0.35 * (1 - newEntitiesRatio) + 0.35 * (1 - newFactsRatio) + 0.3 * sourceCoverage,
  };
}

/**
 * Metrics rounded to 4 decimals for progress events
 */
export function roundMetrics(metrics: SaturationMetrics): SaturationMetrics {
  return {
    newEntitiesRatio: round(metrics.newEntitiesRatio),
    newFactsRatio: round(metrics.newFactsRatio),
    citationCircularity: round(metrics.citationCircularity),
    sourceCoverage: round(metrics.sourceCoverage),
    overallSaturation: round(metrics.overallSaturation),
  };
}

export class SaturationEvaluator {
  constructor(private readonly config: SaturationConfig) {}

  isSaturated(metrics: SaturationMetrics): boolean {
    return (
      metrics.newEntitiesRatio < this.config.newEntitiesThreshold &&
      metrics.newFactsRatio < this.config.newFactsThreshold &&
      metrics.sourceCoverage >= this.config.coverageThreshold
    );
  }

  /**
   * Decide on the current cycle. `cycleHistory` holds the earlier cycles only.
   */
  shouldStop(
    metrics: SaturationMetrics,
    cycleHistory: readonly CycleRecord[],
    current: { sourceExhausted?: boolean } = {}
  ): StopDecision {
    const cycle = cycleHistory.length + 1;
    const { debounceWindow, exhaustionWindow, maxCycles } = this.config;

    if (current.sourceExhausted) {
      const previous = cycleHistory.slice(-(exhaustionWindow - 1));
      if (
        exhaustionWindow === 1 ||
        (previous.length === exhaustionWindow - 1 &&
          previous.every((record) => record.sourceExhausted))
      ) {
        return { stop: true, reason: SOURCES_EXHAUSTED_REASON };
      }
    }

    if (!current.sourceExhausted && this.isSaturated(metrics)) {
      const previous = cycleHistory.slice(-(debounceWindow - 1));
      if (
        debounceWindow === 1 ||
        (previous.length === debounceWindow - 1 &&
          previous.every(
            (record) => !record.sourceExhausted && this.isSaturated(record.metrics)
          ))
      ) {
        return {
          stop: true,
          reason:
            `saturation reached: new entities ${formatPercent(metrics.newEntitiesRatio)}, ` +
            `new facts ${formatPercent(metrics.newFactsRatio)}, ` +
            `coverage ${formatPercent(metrics.sourceCoverage)} ` +
            `for ${debounceWindow} consecutive cycles`,
        };
      }
    }

    if (cycle >= maxCycles) {
      return { stop: true, reason: `maximum of ${maxCycles} research cycles reached` };
    }

    return {
      stop: false,
      reason:
        `saturation not reached at cycle ${cycle}: new entities ${formatPercent(metrics.newEntitiesRatio)}, ` +
        `new facts ${formatPercent(metrics.newFactsRatio)}, coverage ${formatPercent(metrics.sourceCoverage)}`,
    };
  }
}

function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}
