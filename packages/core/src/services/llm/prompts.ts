/**
 * AI Prompt Configuration
 *
 * Centralized location for all prompts used by the research engine.
 *
 * Template syntax: {{placeholder}} - will be replaced with actual values
 */

import type { LLMMessage } from "../../models/model";

export interface PromptConfig {
  system: string;
  user: string;
  temperature: number;
  jsonMode: boolean;
}

/**
 * Entity and fact extraction from one collected document
 */
export const FACT_EXTRACTION_PROMPTS: PromptConfig = {
  system: `You extract verifiable information from research sources.

Return a JSON object with exactly this shape:
{
  "entities": [{ "name": "...", "type": "..." }],
  "facts": [{ "statement": "...", "confidence": 0.0 }]
}

Rules:
- Entities are named things central to the research question: drugs, organizations, people, products, methods, conditions, regulations.
- "type" is a single lowercase word (drug, organization, person, product, method, condition, regulation, concept).
- Facts are short, self-contained declarative sentences that can be checked against another source. Keep numbers, dates and units exactly as written.
- "confidence" is how clearly the source states the fact, from 0 to 1.
- Extract at most {{maxFacts}} facts. Return empty arrays when the source is not relevant.`,
  user: `Research question: {{query}}

Source title: {{title}}
Source URL: {{url}}

Source text:
{{content}}`,
  temperature: 0.1,
  jsonMode: true,
};

/**
 * Executive summary for the final report
 */
export const EXECUTIVE_SUMMARY_PROMPTS: PromptConfig = {
  system: `You are a research analyst writing the executive summary of a multi-source research report.

Write 2-4 short paragraphs of plain prose (no headings, no bullet lists):
- Answer the research question directly using only the findings provided.
- Mention where sources agree and flag any contradictions.
- State clearly what could not be established.
Do not invent facts, numbers or citations.`,
  user: `Research question: {{query}}
Domain: {{domain}}

Findings (confidence in brackets):
{{findings}}

Contradictions:
{{contradictions}}

Gaps:
{{gaps}}`,
  temperature: 0.3,
  jsonMode: false,
};

/**
 * Contradiction check across the facts collected so far
 */
export const CONTRADICTION_DETECTION_PROMPTS: PromptConfig = {
  system: `You compare research findings gathered from different sources and find the ones that cannot both be true.

Return a JSON object with exactly this shape:
{
  "contradictions": [{ "pair": [0, 1], "explanation": "one sentence" }]
}

Rules:
- "pair" holds the bracketed numbers of two findings that contradict each other.
- Two findings contradict when they make incompatible claims about the same subject: different numbers, dates, outcomes or directions of effect.
- Findings about different subjects, or that differ only in detail or wording, do not contradict.
- Return an empty array when nothing contradicts.`,
  user: `Findings:
{{facts}}`,
  temperature: 0.1,
  jsonMode: true,
};

/**
 * Privacy classification of a query. Only ever sent to a local model.
 */
export const PRIVACY_CLASSIFICATION_PROMPTS: PromptConfig = {
  system: `Decide whether a research query contains sensitive information that should not leave the user's machine: personal data, health records about an identifiable person, credentials, confidential business information, unpublished internal documents.

Return a JSON object: { "sensitive": true | false, "reason": "one sentence" }`,
  user: `Query: {{query}}`,
  temperature: 0,
  jsonMode: true,
};

/**
 * Replace {{placeholders}} in a template
 */
export function renderPrompt(
  template: string,
  variables: Record<string, string | number>
): string {
  let rendered = template;
  for (const [key, value] of Object.entries(variables)) {
    rendered = rendered.split(`{{${key}}}`).join(String(value));
  }
  return rendered;
}

/**
 * Build the system + user message pair for a prompt
 */
export function buildMessages(
  prompt: PromptConfig,
  variables: Record<string, string | number>
): LLMMessage[] {
  return [
    { role: "system", content: renderPrompt(prompt.system, variables) },
    { role: "user", content: renderPrompt(prompt.user, variables) },
  ];
}
