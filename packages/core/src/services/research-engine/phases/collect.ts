/**
 * COLLECT: fan the cycle query out to the planned providers
 */

import type { NotFoundEntry, SourceResult } from "../../../models/research-state";
import { SourceExhaustedError } from "../../../errors";
import { createModuleLogger } from "../../../logger";
import { normalizeUrl } from "../../../utils/deduplication";
import type { PhaseHandler } from "../types";

const log = createModuleLogger("phase:collect");

export function addNotFound(entries: readonly NotFoundEntry[], entry: NotFoundEntry): NotFoundEntry[] {
  const exists = entries.some((e) => e.topic === entry.topic && e.reason === entry.reason);
  return exists ? [...entries] : [...entries, entry];
}

export const collect: PhaseHandler = async (state, ctx) => {
  const providers = state.plan?.providers.map((provider) => provider.name) ?? [];
  const query = state.workspace.query || state.refinedQuery;
  const providersQueried = [...new Set([...state.providersQueried, ...providers])];

  let results: SourceResult[];
  try {
    results = await ctx.aggregator.collect(
      query,
      providers,
      ctx.config.search.maxResultsPerProvider,
      state.plan?.filters
    );
  } catch (error) {
    if (!(error instanceof SourceExhaustedError)) throw error;
    log.warn("All providers exhausted", {
      sessionId: state.sessionId,
      cycle: state.cycle,
      providers: error.providers.join(","),
    });
    return {
      state: {
        ...state,
        providersQueried,
        workspace: { ...state.workspace, query, exhausted: true },
        notFound: addNotFound(state.notFound, {
          topic: query,
          reason:
            error.providers.length > 0
              ? `no results from ${error.providers.join(", ")}`
              : "no search providers configured for this domain",
        }),
      },
      next: "evaluate",
    };
  }

  const known = new Set(state.sourceResults.map((result) => normalizeUrl(result.url)));
  const fresh = results.filter((result) => !known.has(normalizeUrl(result.url)));

  return {
    state: {
      ...state,
      providersQueried,
      sourceResults: [...state.sourceResults, ...fresh],
      workspace: {
        ...state.workspace,
        query,
        newResultUrls: fresh.map((result) => result.url),
        repeatedCitations: results.length - fresh.length,
        totalCitations: results.length,
      },
    },
    next: "process",
  };
};
