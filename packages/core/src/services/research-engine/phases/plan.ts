/**
 * PLAN: choose and rank providers, build this cycle's query
 */

import type { Entity, ResearchState } from "../../../models/research-state";
import { emptyWorkspace } from "../../../models/research-state";
import { errorMessage } from "../../../errors";
import { createModuleLogger } from "../../../logger";
import { rankProviders } from "../../search/aggregator";
import { planFilters } from "../../search/filters";
import { getDomainConfig } from "../config";
import { GENERAL_DOMAIN } from "../domain-detector";
import type { PhaseContext, PhaseHandler } from "../types";

const log = createModuleLogger("phase:plan");

const MAX_EXPANSION_TERMS = 3;
const RELATED_DOCUMENTS = 5;

/**
 * Expand the query with up to three recent entity names that neither the
 * query nor an earlier cycle has used
 */
export function expandQuery(
  refinedQuery: string,
  entities: readonly Entity[],
  usedTerms: readonly string[]
): { query: string; terms: string[] } {
  const lowerQuery = refinedQuery.toLowerCase();
  const used = new Set(usedTerms.map((term) => term.toLowerCase()));
  const terms: string[] = [];

  for (let i = entities.length - 1; i >= 0 && terms.length < MAX_EXPANSION_TERMS; i--) {
    const name = entities[i].name.trim();
    const key = name.toLowerCase();
    if (!name || used.has(key) || lowerQuery.includes(key)) continue;
    used.add(key);
    terms.push(name);
  }

  return {
    query: terms.length > 0 ? `${refinedQuery} ${terms.join(" ")}` : refinedQuery,
    terms,
  };
}

async function relatedDocuments(state: ResearchState, ctx: PhaseContext, domain: string) {
  try {
    const related = await ctx.memory.searchSimilar(state.refinedQuery, RELATED_DOCUMENTS, { domain });
    return related.map((doc) => doc.id);
  } catch (error) {
    log.warn("Related document lookup failed", {
      sessionId: state.sessionId,
      error: errorMessage(error),
    });
    return [];
  }
}

export const plan: PhaseHandler = async (state, ctx) => {
  const domain = state.domain ?? GENERAL_DOMAIN;
  const domainConfig = getDomainConfig(domain, ctx.config);

  const names = [...new Set([...domainConfig.primarySources, ...domainConfig.secondarySources])].filter(
    (name) => ctx.aggregator.hasProvider(name)
  );
  const candidates = names.map((name) => ({
    name,
    category: ctx.config.search.providers[name]?.category ?? name,
  }));

  const ranked = await rankProviders(candidates, domain, ctx.memory);
  const usable = ranked.filter((provider) => ctx.learning.shouldUseSource(provider.effectiveness));
  const providers = usable.length > 0 ? usable : ranked;
  if (usable.length < ranked.length) {
    log.info("Dropped low-effectiveness providers", {
      sessionId: state.sessionId,
      dropped: ranked
        .filter((provider) => !usable.includes(provider))
        .map((provider) => provider.name)
        .join(","),
    });
  }

  const { query, terms } =
    state.cycle <= 1
      ? { query: state.refinedQuery, terms: [] }
      : expandQuery(state.refinedQuery, state.entities, state.usedExpansionTerms);

  const next = state.requireApproval && !state.approved ? "await_approval" : "collect";

  log.info("Planned cycle", {
    sessionId: state.sessionId,
    cycle: state.cycle,
    query,
    providers: providers.map((provider) => provider.name).join(","),
  });

  return {
    state: {
      ...state,
      plan: {
        providers,
        query,
        categoriesPlanned: [...new Set(providers.map((provider) => provider.category))],
        relatedDocumentIds: await relatedDocuments(state, ctx, domain),
        filters: planFilters(state.searchFilters, domainConfig.maxAgeYears, ctx.now()),
      },
      usedExpansionTerms: [...state.usedExpansionTerms, ...terms],
      workspace: emptyWorkspace(query),
    },
    next,
  };
};
