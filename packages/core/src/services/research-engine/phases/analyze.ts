/**
 * ANALYZE: cross-source verification of the session's facts
 */

import type { PhaseHandler } from "../types";

export const analyze: PhaseHandler = async (state, ctx) => {
  const facts =
    state.facts.length > 0
      ? await ctx.verifier.verify(state.facts, {
          privacyMode: state.privacyMode ?? "LOCAL_ONLY",
          sources: state.sourceResults,
        })
      : state.facts;
  return { state: { ...state, facts }, next: "evaluate" };
};
