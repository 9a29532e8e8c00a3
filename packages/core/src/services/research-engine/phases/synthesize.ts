/**
 * SYNTHESIZE: executive summary, report, learning and export
 */

import type { ModelTier } from "../../../models/model";
import type { ResearchState } from "../../../models/research-state";
import { errorMessage, ModelUnavailableError, PrivacyViolationError } from "../../../errors";
import { createModuleLogger } from "../../../logger";
import { buildMessages, EXECUTIVE_SUMMARY_PROMPTS } from "../../llm/prompts";
import { buildReport, fallbackSummary, rankFindings } from "../report";
import { getDomainConfig } from "../config";
import { GENERAL_DOMAIN } from "../domain-detector";
import { NO_MODEL_REASON, USER_STOP_REASON, type PhaseContext, type PhaseHandler } from "../types";
import { addNotFound } from "./collect";

const log = createModuleLogger("phase:synthesize");

const SUMMARY_FINDINGS = 10;

/**
 * Note that the session lost its last usable model. Under LOCAL_ONLY the
 * reason names the local tier rather than the provider's error.
 */
export function recordModelLoss(state: ResearchState, error: unknown): ResearchState {
  return {
    ...state,
    notFound: addNotFound(state.notFound, {
      topic: state.refinedQuery || state.query,
      reason: state.privacyMode === "LOCAL_ONLY" ? "no local model available" : errorMessage(error),
    }),
    stopReason: state.stopReason.includes(NO_MODEL_REASON)
      ? state.stopReason
      : [...state.stopReason, NO_MODEL_REASON],
  };
}

/**
 * Stream a model-written summary into the session's progress feed.
 * Returns null when no model produced a usable summary. Under LOCAL_ONLY a
 * missing or failed local model throws ModelUnavailableError instead.
 */
async function streamSummary(state: ResearchState, ctx: PhaseContext): Promise<string | null> {
  const mode = state.privacyMode ?? "LOCAL_ONLY";

  let model: ModelTier;
  try {
    model = (await ctx.router.selectAvailable("HIGH", mode)).model;
  } catch (error) {
    if (error instanceof ModelUnavailableError && mode === "LOCAL_ONLY") throw error;
    log.warn("No model for the executive summary", { error: errorMessage(error) });
    return null;
  }

  const findings = rankFindings(state.facts)
    .slice(0, SUMMARY_FINDINGS)
    .map((fact) => `- ${fact.statement} [${Math.round(fact.confidence * 100)}%]`)
    .join("\n");
  const contradictions = state.facts
    .filter((fact) => fact.contradictions.length > 0)
    .map((fact) => `- ${fact.statement}`)
    .join("\n");
  const gaps = state.notFound.map((entry) => `- ${entry.topic}: ${entry.reason}`).join("\n");

  const channel = ctx.router.stream(
    buildMessages(EXECUTIVE_SUMMARY_PROMPTS, {
      query: state.refinedQuery,
      domain: state.domain ?? GENERAL_DOMAIN,
      findings,
      contradictions: contradictions || "None detected.",
      gaps: gaps || "None recorded.",
    }),
    model,
    { privacyMode: mode, temperature: EXECUTIVE_SUMMARY_PROMPTS.temperature }
  );

  let text = "";
  let failed = false;
  for await (const event of channel) {
    ctx.emit(event);
    if (event.type === "token") text += event.token;
    if (event.type === "error") {
      if (event.code === "privacy_violation") {
        throw new PrivacyViolationError(event.message);
      }
      if (event.code === "model_unavailable" && mode === "LOCAL_ONLY") {
        throw new ModelUnavailableError(event.message, model);
      }
      failed = true;
    }
  }

  return failed || !text.trim() ? null : text.trim();
}

export const synthesize: PhaseHandler = async (input, ctx) => {
  let state = input;
  let written: string | null = null;
  if (state.facts.length > 0) {
    try {
      written = await streamSummary(state, ctx);
    } catch (error) {
      if (!(error instanceof ModelUnavailableError)) throw error;
      log.error("Local model lost before synthesis", {
        sessionId: state.sessionId,
        error: errorMessage(error),
      });
      state = recordModelLoss(state, error);
    }
  }
  const summary = written ?? fallbackSummary(state);

  const partial =
    state.facts.length === 0 ||
    state.notFound.length > 0 ||
    state.stopReason.includes(USER_STOP_REASON);
  const domain = state.domain ?? GENERAL_DOMAIN;
  const report = buildReport(state, summary, {
    partial,
    generatedAt: ctx.now(),
    verificationThreshold: getDomainConfig(domain, ctx.config).verificationThreshold,
  });

  await ctx.learning.recordSessionOutcome(
    domain,
    state.providersQueried,
    state.sourceResults
  );

  if (ctx.exporter) {
    try {
      await ctx.exporter.export(state.sessionId, report);
    } catch (error) {
      log.error("Report export failed", { sessionId: state.sessionId, error: errorMessage(error) });
    }
  }

  log.info("Report ready", {
    sessionId: state.sessionId,
    facts: report.factCount,
    sources: report.sourceCount,
    partial,
  });

  return { state: { ...state, report }, next: "done" };
};
