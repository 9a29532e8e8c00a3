/**
 * Report assembly
 *
 * Builds the structured report and its markdown from a finished session.
 * Nothing here calls a model; the executive summary is passed in.
 */

import type { Fact, ReportSection, ResearchReport, ResearchState } from "../../models/research-state";

export const NOT_FOUND_HEADING = "Not Found / Why";
const MAX_FINDINGS = 20;

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function rankFindings(facts: readonly Fact[]): Fact[] {
  return [...facts].sort(
    (a, b) =>
      Number(b.verified) - Number(a.verified) ||
      b.confidence - a.confidence ||
      b.sources.length - a.sources.length
  );
}

/**
 * Summary used when no model can write one
 */
export function fallbackSummary(state: ResearchState): string {
  if (state.facts.length === 0) {
    const reasons = state.notFound.map((entry) => entry.reason);
    return (
      `No findings could be established for "${state.refinedQuery || state.query}". ` +
      (reasons.length > 0
        ? `Reasons: ${[...new Set(reasons)].join("; ")}.`
        : "The query may need refinement or additional sources.")
    );
  }

  const top = rankFindings(state.facts).slice(0, 3);
  const verified = state.facts.filter((fact) => fact.verified).length;
  return (
    `${state.facts.length} findings from ${state.sourceResults.length} sources across ` +
    `${state.cycleHistory.length} research cycles (${verified} confirmed by more than one source). ` +
    `Highest-confidence findings: ${top.map((fact) => fact.statement).join(" ")}`
  );
}

function findingsSection(facts: readonly Fact[]): ReportSection {
  const ranked = rankFindings(facts).slice(0, MAX_FINDINGS);
  const body =
    ranked.length > 0
      ? ranked
          .map(
            (fact) =>
              `- ${fact.statement} (confidence ${percent(fact.confidence)}, ` +
              `${fact.sources.length} source${fact.sources.length === 1 ? "" : "s"}` +
              `${fact.verified ? ", verified" : ""})`
          )
          .join("\n")
      : "No facts were extracted from the collected sources.";
  return { heading: "Key Findings", body };
}

function contradictionsSection(facts: readonly Fact[]): ReportSection | null {
  const lines: string[] = [];
  const reported = new Set<string>();
  for (const fact of facts) {
    for (const other of fact.contradictions) {
      const key = [fact.statement, other].sort().join("\u0000");
      if (reported.has(key)) continue;
      reported.add(key);
      lines.push(`- "${fact.statement}" conflicts with "${other}"`);
    }
  }
  return lines.length > 0 ? { heading: "Contradictions", body: lines.join("\n") } : null;
}

function sourcesSection(state: ResearchState): ReportSection {
  const body =
    state.sourceResults.length > 0
      ? state.sourceResults
          .map((result, i) => `${i + 1}. [${result.title || result.url}](${result.url}) (${result.provider})`)
          .join("\n")
      : "No sources were collected.";
  return { heading: "Sources", body };
}

function limitationsSection(
  state: ResearchState,
  partial: boolean,
  verificationThreshold: number
): ReportSection {
  const lines = state.stopReason.map((reason) => `- Stopped: ${reason}`);
  const below = state.facts.filter((fact) => fact.confidence < verificationThreshold).length;
  if (below > 0) {
    lines.push(
      `- ${below} of ${state.facts.length} findings are below the ${percent(verificationThreshold)} confidence required for this domain.`
    );
  }
  if (partial) {
    lines.push("- This report is based on partial data.");
  }
  if (state.privacyMode === "LOCAL_ONLY") {
    lines.push("- Only local models were used to process this research.");
  }
  return {
    heading: "Limitations",
    body: lines.length > 0 ? lines.join("\n") : "- None recorded.",
  };
}

function notFoundSection(state: ResearchState): ReportSection | null {
  const entries = [...state.notFound];
  if (state.facts.length === 0 && !entries.some((entry) => entry.topic === state.refinedQuery)) {
    entries.push({
      topic: state.refinedQuery || state.query,
      reason: "no verifiable facts were extracted",
    });
  }
  if (entries.length === 0) return null;
  return {
    heading: NOT_FOUND_HEADING,
    body: entries.map((entry) => `- **${entry.topic}**: ${entry.reason}`).join("\n"),
  };
}

export interface ReportOptions {
  partial: boolean;
  generatedAt: number;
  /** Domain confidence bar; findings below it are called out as limitations */
  verificationThreshold: number;
}

export function buildReport(
  state: ResearchState,
  summary: string,
  options: ReportOptions
): ResearchReport {
  const { partial, generatedAt, verificationThreshold } = options;
  const sections: ReportSection[] = [
    { heading: "Executive Summary", body: summary },
    findingsSection(state.facts),
  ];
  const contradictions = contradictionsSection(state.facts);
  if (contradictions) sections.push(contradictions);
  sections.push(sourcesSection(state), limitationsSection(state, partial, verificationThreshold));
  const notFound = notFoundSection(state);
  if (notFound) sections.push(notFound);

  const title = `Research Report: ${state.refinedQuery || state.query}`;
  const meta =
    `_Domain: ${state.domain ?? "general"} | Privacy: ${state.privacyMode ?? "unknown"} | ` +
    `Cycles: ${state.cycleHistory.length} | Sources: ${state.sourceResults.length} | ` +
    `Facts: ${state.facts.length}_`;
  const markdown = [
    `# ${title}`,
    meta,
    ...sections.map((section) => `## ${section.heading}\n\n${section.body}`),
  ].join("\n\n");

  return {
    title,
    summary,
    sections,
    markdown: `${markdown}\n`,
    partial,
    factCount: state.facts.length,
    sourceCount: state.sourceResults.length,
    generatedAt,
  };
}
