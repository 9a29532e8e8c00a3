/**
 * PROCESS: turn this cycle's new results into documents, entities and facts
 */

import type { ModelTier, PrivacyMode } from "../../../models/model";
import type { Entity, Fact, ResearchState, SourceResult } from "../../../models/research-state";
import { errorMessage, ModelUnavailableError } from "../../../errors";
import { createModuleLogger } from "../../../logger";
import { normalizeStatement } from "../../../utils/deduplication";
import type { PhaseContext, PhaseHandler } from "../types";
import { extractFacts, type Extraction } from "./fact-extraction";

const log = createModuleLogger("phase:process");

/**
 * Merge extracted facts into the session's facts by normalized statement.
 * Returns the merged list and how many statements were new.
 */
export function mergeFacts(
  existing: readonly Fact[],
  extracted: Extraction["facts"],
  sourceUrl: string
): { facts: Fact[]; added: number } {
  const facts = existing.map((fact) => ({ ...fact, sources: [...fact.sources] }));
  const index = new Map(facts.map((fact, i) => [normalizeStatement(fact.statement), i]));
  let added = 0;

  for (const candidate of extracted) {
    const key = normalizeStatement(candidate.statement);
    if (!key) continue;
    const at = index.get(key);
    if (at === undefined) {
      index.set(key, facts.length);
      facts.push({
        statement: candidate.statement,
        sources: [sourceUrl],
        confidence: candidate.confidence,
        extractedConfidence: candidate.confidence,
        verified: false,
        contradictions: [],
      });
      added++;
      continue;
    }
    const fact = facts[at];
    if (!fact.sources.includes(sourceUrl)) fact.sources.push(sourceUrl);
    fact.confidence = Math.max(fact.confidence, candidate.confidence);
    fact.extractedConfidence = Math.max(fact.extractedConfidence, candidate.confidence);
  }

  return { facts, added };
}

/**
 * Merge entities by lowercase name; the first type seen wins
 */
export function mergeEntities(
  existing: readonly Entity[],
  extracted: readonly Entity[]
): { entities: Entity[]; added: number } {
  const entities = [...existing];
  const names = new Set(existing.map((entity) => entity.name.toLowerCase()));
  let added = 0;
  for (const entity of extracted) {
    const key = entity.name.toLowerCase();
    if (!key || names.has(key)) continue;
    names.add(key);
    entities.push(entity);
    added++;
  }
  return { entities, added };
}

/**
 * Model for extraction, or null to go straight to the heuristic. Under
 * LOCAL_ONLY a missing local model ends the session's collection.
 */
async function extractionModel(mode: PrivacyMode, ctx: PhaseContext): Promise<ModelTier | null> {
  try {
    return (await ctx.router.selectAvailable("LOW", mode)).model;
  } catch (error) {
    if (error instanceof ModelUnavailableError && mode === "LOCAL_ONLY") throw error;
    log.warn("No model for extraction, using heuristic", { error: errorMessage(error) });
    return null;
  }
}

async function documentText(
  result: SourceResult,
  ctx: PhaseContext,
  budget: { fetches: number }
): Promise<string> {
  if (result.content) return result.content;
  if (ctx.extractor?.enabled && budget.fetches > 0) {
    budget.fetches--;
    const extracted = await ctx.extractor.extract(result.url, result.provider);
    if (extracted.fetchStatus === "success" && extracted.text) {
      return extracted.text;
    }
  }
  return result.snippet;
}

export const processResults: PhaseHandler = async (state: ResearchState, ctx) => {
  const mode = state.privacyMode ?? "LOCAL_ONLY";
  const fresh = new Set(state.workspace.newResultUrls);
  const results = state.sourceResults.filter((result) => fresh.has(result.url));
  const model = results.length > 0 ? await extractionModel(mode, ctx) : null;
  const budget = { fetches: ctx.config.extraction.maxDocumentsPerCycle };

  let facts = state.facts;
  let entities = state.entities;
  let newFacts = 0;
  let newEntities = 0;

  for (const result of results) {
    const content = await documentText(result, ctx, budget);
    if (!content.trim()) continue;

    await ctx.memory.storeDocument(
      content,
      {
        url: result.url,
        title: result.title,
        source: result.provider,
        domain: state.domain ?? undefined,
      },
      state.sessionId
    );

    const extraction = await extractFacts(ctx.router, model, mode, {
      query: state.refinedQuery,
      title: result.title,
      url: result.url,
      content,
    });

    const mergedFacts = mergeFacts(facts, extraction.facts, result.url);
    const mergedEntities = mergeEntities(entities, extraction.entities);
    facts = mergedFacts.facts;
    entities = mergedEntities.entities;
    newFacts += mergedFacts.added;
    newEntities += mergedEntities.added;
  }

  log.info("Processed results", {
    sessionId: state.sessionId,
    cycle: state.cycle,
    documents: results.length,
    newFacts,
    newEntities,
  });

  return {
    state: {
      ...state,
      facts,
      entities,
      workspace: { ...state.workspace, newFacts, newEntities },
    },
    next: "analyze",
  };
};
