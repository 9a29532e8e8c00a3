/**
 * Source learning
 *
 * After a session completes, each provider it queried gets one EMA nudge per
 * domain. Reads happen concurrently from many sessions; writes only here.
 */

import type { Memory } from "../../interfaces/memory";
import type { SourceResult } from "../../models/research-state";
import { errorMessage } from "../../errors";
import { createModuleLogger } from "../../logger";

const log = createModuleLogger("source-learning");

/**
 * new = alpha * result + (1 - alpha) * old, with result = quality on success, else 0
 */
export function updateEffectiveness(
  score: number,
  success: boolean,
  quality: number,
  alpha = 0.3
): number {
  const result = success ? Math.min(1, Math.max(0, quality)) : 0;
  return alpha * result + (1 - alpha) * score;
}

export interface SessionOutcome {
  provider: string;
  success: boolean;
  quality: number;
  resultCount: number;
}

/**
 * Summarize how each queried provider performed over a session
 */
export function summarizeOutcomes(
  providers: readonly string[],
  results: readonly SourceResult[]
): SessionOutcome[] {
  return providers.map((provider) => {
    const own = results.filter((result) => result.provider === provider && result.success);
    const quality =
      own.length > 0
        ? own.reduce((sum, result) => sum + result.qualityScore, 0) / own.length
        : 0;
    return {
      provider,
      success: own.length > 0,
      quality,
      resultCount: own.length,
    };
  });
}

export class SourceLearning {
  constructor(
    private readonly memory: Pick<Memory, "updateSourceEffectiveness">,
    private readonly minimumScore = 0.3
  ) {}

  shouldUseSource(score: number): boolean {
    return score >= this.minimumScore;
  }

  async recordSessionOutcome(
    domain: string,
    providers: readonly string[],
    results: readonly SourceResult[]
  ): Promise<SessionOutcome[]> {
    const outcomes = summarizeOutcomes(providers, results);
    for (const outcome of outcomes) {
      try {
        const score = await this.memory.updateSourceEffectiveness(
          outcome.provider,
          domain,
          outcome.success,
          outcome.quality
        );
        log.info("Updated source effectiveness", { ...outcome, domain, score });
      } catch (error) {
        log.error("Could not update source effectiveness", {
          provider: outcome.provider,
          domain,
          error: errorMessage(error),
        });
      }
    }
    return outcomes;
  }
}
