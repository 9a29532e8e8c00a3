/**
 * Cross-source verification
 *
 * Confidence grows with the number of independent sources behind a fact and
 * with the credibility of the providers that returned them. Contradictions
 * are found by the cheapest model the privacy mode allows; when there is no
 * usable answer, two facts about the same subject that state different
 * years or different dollar amounts are marked as contradicting each other.
 *
 * Confidence is recomputed from the extracted score on every pass, so running
 * verification again on its own output changes nothing.
 */

import { z } from "zod";
import type { VerificationContext, Verifier } from "../../interfaces/verifier";
import type { ModelTier, PrivacyMode } from "../../models/model";
import type { Fact } from "../../models/research-state";
import { errorMessage, ModelUnavailableError, PrivacyViolationError } from "../../errors";
import { createModuleLogger } from "../../logger";
import { jaccardSimilarity, normalizeUrl, tokenize } from "../../utils/deduplication";
import type { PrivacyRouter } from "../llm/privacy-router";
import { buildMessages, CONTRADICTION_DETECTION_PROMPTS } from "../llm/prompts";
import { parseModelJson } from "../llm/structured-output";
import type { SearchConfig } from "./config";

const log = createModuleLogger("verification");

const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/g;
const DOLLAR_PATTERN = /\$\s?\d[\d,]*(?:\.\d+)?(?:\s*(?:million|billion|thousand|[mbk]\b))?/gi;
const SUBJECT_SIMILARITY = 0.3;

const VERIFIED_BONUS = 0.1;
const CONTRADICTION_PENALTY = 0.3;
const MIN_CONFIDENCE = 0.1;
const CREDIBILITY_WEIGHT = 0.4;
export const UNKNOWN_SOURCE_CREDIBILITY = 0.3;

const MAX_MODEL_FACTS = 20;
const MAX_STATEMENT_LENGTH = 500;

const ContradictionSchema = z.object({
  contradictions: z
    .array(
      z.object({
        pair: z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
        explanation: z.string().optional(),
      })
    )
    .default([]),
});

type FactPair = readonly [number, number];

export interface SourceStanding {
  credibility: number;
  peerReviewed: boolean;
}

export interface FactVerifierOptions {
  /** Asked for contradictions first; without it only the pattern check runs */
  router?: PrivacyRouter;
  /** Without it confidence ignores which provider a source came from */
  standingOf?: (provider: string) => SourceStanding;
}

/**
 * Agreement score for a fact reported by `sourceCount` independent sources
 */
export function agreementScore(sourceCount: number): number {
  if (sourceCount <= 1) return 0.3;
  return Math.min(1, 0.3 + 0.35 * Math.log2(sourceCount));
}

/**
 * Credibility of a set of sources: their mean standing, up to 0.2 for
 * peer-reviewed ones (0.05 each) and up to 0.3 for their number.
 * Null when no source is attributed to a provider.
 */
export function credibilityScore(standings: readonly SourceStanding[]): number | null {
  if (standings.length === 0) return null;
  const mean = standings.reduce((sum, standing) => sum + standing.credibility, 0) / standings.length;
  const peerReviewed = standings.filter((standing) => standing.peerReviewed).length;
  const peerBonus = Math.min(0.2, 0.05 * peerReviewed);
  const countBonus = Math.min(0.3, 0.1 * Math.log2(standings.length + 1));
  return Math.min(1, mean + peerBonus + countBonus);
}

/**
 * Provider standings as configured under `search.providers`
 */
export function standingFromConfig(
  providers: SearchConfig["providers"]
): (provider: string) => SourceStanding {
  return (provider) => ({
    credibility: providers[provider]?.credibility ?? UNKNOWN_SOURCE_CREDIBILITY,
    peerReviewed: providers[provider]?.peerReviewed ?? false,
  });
}

function subjectWords(statement: string): string[] {
  return tokenize(statement).filter((token) => !/^\d+$/.test(token));
}

function matches(statement: string, pattern: RegExp): Set<string> {
  return new Set(
    (statement.match(pattern) ?? []).map((value) =>
      value.toLowerCase().replace(/[\s,]/g, "")
    )
  );
}

function disjoint(a: Set<string>, b: Set<string>): boolean {
  if (a.size === 0 || b.size === 0) return false;
  for (const value of a) {
    if (b.has(value)) return false;
  }
  return true;
}

/**
 * Whether two statements talk about the same subject but disagree on a
 * year or an amount
 */
export function contradicts(a: string, b: string): boolean {
  if (jaccardSimilarity(subjectWords(a), subjectWords(b)) <= SUBJECT_SIMILARITY) {
    return false;
  }
  return (
    disjoint(matches(a, YEAR_PATTERN), matches(b, YEAR_PATTERN)) ||
    disjoint(matches(a, DOLLAR_PATTERN), matches(b, DOLLAR_PATTERN))
  );
}

function contradictingPairs(facts: readonly Fact[]): FactPair[] {
  const pairs: FactPair[] = [];
  for (let i = 0; i < facts.length; i++) {
    for (let j = i + 1; j < facts.length; j++) {
      if (contradicts(facts[i].statement, facts[j].statement)) pairs.push([i, j]);
    }
  }
  return pairs;
}

export class FactVerifier implements Verifier {
  constructor(private readonly options: FactVerifierOptions = {}) {}

  async verify(facts: Fact[], context: VerificationContext): Promise<Fact[]> {
    const opposed = facts.map(() => new Set<number>());
    for (const [a, b] of await this.findContradictions(facts, context.privacyMode)) {
      opposed[a].add(b);
      opposed[b].add(a);
    }

    const providerOf = new Map(
      context.sources.map((source) => [normalizeUrl(source.url), source.provider])
    );

    return facts.map((fact, index) => {
      const urls = [...new Set(fact.sources.map(normalizeUrl))];
      const verified = urls.length >= 2;
      const contradictions = [...opposed[index]]
        .sort((a, b) => a - b)
        .map((other) => facts[other].statement);

      let confidence = Math.min(
        1,
        Math.max(fact.extractedConfidence, agreementScore(urls.length)) + (verified ? VERIFIED_BONUS : 0)
      );
      if (contradictions.length > 0) {
        confidence = Math.max(MIN_CONFIDENCE, confidence - CONTRADICTION_PENALTY);
      }
      const credibility = this.credibility(urls, providerOf);
      if (credibility !== null) {
        confidence = (1 - CREDIBILITY_WEIGHT) * confidence + CREDIBILITY_WEIGHT * credibility;
      }

      return {
        ...fact,
        confidence: Math.round(confidence * 1000) / 1000,
        verified,
        contradictions,
      };
    });
  }

  private credibility(urls: readonly string[], providerOf: ReadonlyMap<string, string>): number | null {
    const { standingOf } = this.options;
    if (!standingOf) return null;
    const standings = urls.flatMap((url) => {
      const provider = providerOf.get(url);
      return provider === undefined ? [] : [standingOf(provider)];
    });
    return credibilityScore(standings);
  }

  private async findContradictions(facts: readonly Fact[], privacyMode: PrivacyMode): Promise<FactPair[]> {
    if (facts.length < 2) return [];
    const { router } = this.options;
    const fromModel = router ? await this.askModel(router, facts, privacyMode) : [];
    return fromModel.length > 0 ? fromModel : contradictingPairs(facts);
  }

  private async askModel(
    router: PrivacyRouter,
    facts: readonly Fact[],
    privacyMode: PrivacyMode
  ): Promise<FactPair[]> {
    const batch = facts.slice(0, MAX_MODEL_FACTS);
    let model: ModelTier;
    try {
      model = (await router.selectAvailable("LOW", privacyMode)).model;
    } catch (error) {
      if (error instanceof ModelUnavailableError && privacyMode === "LOCAL_ONLY") throw error;
      log.debug("No model for contradiction checks, using patterns", { error: errorMessage(error) });
      return [];
    }

    try {
      const text = await router.complete(
        buildMessages(CONTRADICTION_DETECTION_PROMPTS, {
          facts: batch
            .map((fact, index) => `[${index}] ${fact.statement.slice(0, MAX_STATEMENT_LENGTH)}`)
            .join("\n"),
        }),
        model,
        {
          privacyMode,
          temperature: CONTRADICTION_DETECTION_PROMPTS.temperature,
          jsonMode: CONTRADICTION_DETECTION_PROMPTS.jsonMode,
          maxTokens: 2000,
        }
      );

      const parsed = parseModelJson(text, ContradictionSchema);
      if (!parsed) {
        log.warn("Unusable contradiction output, using patterns", { model });
        return [];
      }
      return parsed.contradictions.flatMap(({ pair: [a, b] }): FactPair[] =>
        a !== b && a < batch.length && b < batch.length ? [[Math.min(a, b), Math.max(a, b)]] : []
      );
    } catch (error) {
      if (error instanceof PrivacyViolationError) throw error;
      if (error instanceof ModelUnavailableError && privacyMode === "LOCAL_ONLY") throw error;
      log.warn("Contradiction check failed, using patterns", { model, error: errorMessage(error) });
      return [];
    }
  }
}
