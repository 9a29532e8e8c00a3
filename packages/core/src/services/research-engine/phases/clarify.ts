/**
 * CLARIFY: normalize the query, settle domain and privacy mode
 */

import { createModuleLogger } from "../../../logger";
import { detectDomain, domainKeywords } from "../domain-detector";
import type { PhaseHandler } from "../types";

const log = createModuleLogger("phase:clarify");

export const clarify: PhaseHandler = async (state, ctx) => {
  const refinedQuery = state.query.replace(/\s+/g, " ").trim();

  let domain = state.domain;
  if (!domain) {
    const detected = detectDomain(refinedQuery, domainKeywords(ctx.config.domains));
    domain = detected.domain;
    log.info("Detected domain", {
      sessionId: state.sessionId,
      domain,
      confidence: detected.confidence,
      matched: detected.matchedKeywords.join(","),
    });
  }

  let privacyMode = state.privacyMode;
  if (!privacyMode) {
    const recommendation = await ctx.router.recommendPrivacyMode(refinedQuery);
    privacyMode = recommendation.mode;
    log.info("Privacy mode recommended", {
      sessionId: state.sessionId,
      mode: privacyMode,
      reasoning: recommendation.reasoning,
    });
  }

  return {
    state: { ...state, refinedQuery, domain, privacyMode },
    next: "plan",
  };
};
