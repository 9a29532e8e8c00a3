/**
 * Entity and fact extraction for one document
 *
 * The model is asked for JSON first. When its answer cannot be used, or the
 * call fails for a reason other than the privacy boundary, a sentence
 * heuristic takes over so a cycle never ends without extraction.
 */

import { z } from "zod";
import type { ModelTier, PrivacyMode } from "../../../models/model";
import type { Entity } from "../../../models/research-state";
import { errorMessage, ModelUnavailableError, PrivacyViolationError } from "../../../errors";
import { createModuleLogger } from "../../../logger";
import { tokenize } from "../../../utils/deduplication";
import type { PrivacyRouter } from "../../llm/privacy-router";
import { buildMessages, FACT_EXTRACTION_PROMPTS } from "../../llm/prompts";
import { parseModelJson } from "../../llm/structured-output";

const log = createModuleLogger("fact-extraction");

export const MAX_FACTS_PER_DOCUMENT = 5;
const HEURISTIC_CONFIDENCE = 0.4;
const MAX_PROMPT_CONTENT = 8000;

const ExtractionSchema = z.object({
  entities: z
    .array(z.object({ name: z.string().min(1), type: z.string().default("concept") }))
    .default([]),
  facts: z
    .array(
      z.object({
        statement: z.string().min(1),
        confidence: z.number().min(0).max(1).default(0.5),
      })
    )
    .default([]),
});

export interface ExtractedFact {
  statement: string;
  confidence: number;
}

export interface Extraction {
  entities: Entity[];
  facts: ExtractedFact[];
  method: "model" | "heuristic";
}

export interface ExtractionInput {
  query: string;
  title: string;
  url: string;
  content: string;
}

/**
 * Sentence-level extraction used when no model answer is usable. Facts are
 * sentences of reasonable length that carry a number or a query term;
 * entities are capitalized phrases that do not open a sentence.
 */
export function extractHeuristically(input: ExtractionInput): Extraction {
  const queryTerms = new Set(tokenize(input.query));
  const sentences = input.content
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length >= 40 && sentence.length <= 300);

  const facts: ExtractedFact[] = [];
  for (const sentence of sentences) {
    if (facts.length >= MAX_FACTS_PER_DOCUMENT) break;
    const informative =
      /\d/.test(sentence) || tokenize(sentence).some((token) => queryTerms.has(token));
    if (informative) {
      facts.push({ statement: sentence, confidence: HEURISTIC_CONFIDENCE });
    }
  }

  const entities: Entity[] = [];
  const seen = new Set<string>();
  for (const sentence of sentences) {
    for (const match of sentence.matchAll(/(?<=\S\s+)[A-Z][\w-]+(?:\s+[A-Z][\w-]+)*/g)) {
      const name = match[0];
      const key = name.toLowerCase();
      if (name.length < 3 || seen.has(key)) continue;
      seen.add(key);
      entities.push({ name, type: "concept" });
    }
  }

  return { entities: entities.slice(0, MAX_FACTS_PER_DOCUMENT * 2), facts, method: "heuristic" };
}

export async function extractFacts(
  router: PrivacyRouter,
  model: ModelTier | null,
  privacyMode: PrivacyMode,
  input: ExtractionInput
): Promise<Extraction> {
  if (!model) {
    return extractHeuristically(input);
  }

  try {
    const text = await router.complete(
      buildMessages(FACT_EXTRACTION_PROMPTS, {
        query: input.query,
        title: input.title,
        url: input.url,
        content: input.content.slice(0, MAX_PROMPT_CONTENT),
        maxFacts: MAX_FACTS_PER_DOCUMENT,
      }),
      model,
      {
        privacyMode,
        temperature: FACT_EXTRACTION_PROMPTS.temperature,
        jsonMode: FACT_EXTRACTION_PROMPTS.jsonMode,
        maxTokens: 1500,
      }
    );

    const parsed = parseModelJson(text, ExtractionSchema);
    if (!parsed) {
      log.warn("Unusable extraction output, using heuristic", { url: input.url });
      return extractHeuristically(input);
    }
    return {
      entities: parsed.entities.map((entity) => ({
        name: entity.name.trim(),
        type: entity.type.toLowerCase(),
      })),
      facts: parsed.facts
        .slice(0, MAX_FACTS_PER_DOCUMENT)
        .map((fact) => ({ statement: fact.statement.trim(), confidence: fact.confidence })),
      method: "model",
    };
  } catch (error) {
    if (error instanceof PrivacyViolationError) throw error;
    // Under LOCAL_ONLY a failed local model ends collection; the heuristic is no substitute
    if (error instanceof ModelUnavailableError && privacyMode === "LOCAL_ONLY") throw error;
    log.warn("Extraction model call failed, using heuristic", {
      url: input.url,
      error: errorMessage(error),
    });
    return extractHeuristically(input);
  }
}
