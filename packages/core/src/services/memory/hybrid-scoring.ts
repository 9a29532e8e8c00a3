/**
 * Hybrid document ranking: 0.6 * semantic + 0.4 * keyword
 *
 * "Semantic" is cosine similarity between term-frequency vectors; "keyword"
 * is the share of distinct query terms found in the document.
 */

import type { RankedDocument, StoredDocument } from "../../interfaces/memory";
import { tokenize } from "../../utils/deduplication";

export const SEMANTIC_WEIGHT = 0.6;
export const KEYWORD_WEIGHT = 0.4;

function termFrequencies(tokens: string[]): Map<string, number> {
  const frequencies = new Map<string, number>();
  for (const token of tokens) {
    frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
  }
  return frequencies;
}

export function cosineSimilarity(a: Map<string, number>, b: Map<string, number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (const [term, weight] of a) {
    normA += weight * weight;
    dot += weight * (b.get(term) ?? 0);
  }
  for (const weight of b.values()) {
    normB += weight * weight;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function hybridScore(query: string, content: string): number {
  const queryTokens = tokenize(query);
  const docTokens = tokenize(content);
  if (queryTokens.length === 0 || docTokens.length === 0) return 0;

  const semantic = cosineSimilarity(termFrequencies(queryTokens), termFrequencies(docTokens));
  const docTerms = new Set(docTokens);
  const distinctQuery = [...new Set(queryTokens)];
  const keyword = distinctQuery.filter((term) => docTerms.has(term)).length / distinctQuery.length;

  return SEMANTIC_WEIGHT * semantic + KEYWORD_WEIGHT * keyword;
}

export function rankDocuments(
  query: string,
  documents: Iterable<StoredDocument>,
  limit: number
): RankedDocument[] {
  const ranked: RankedDocument[] = [];
  for (const document of documents) {
    const text = `${document.metadata.title ?? ""} ${document.content}`;
    const score = hybridScore(query, text);
    if (score > 0) {
      ranked.push({ ...document, score: Math.round(score * 10000) / 10000 });
    }
  }
  return ranked.sort((a, b) => b.score - a.score).slice(0, limit);
}
