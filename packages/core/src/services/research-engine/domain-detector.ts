/**
 * Keyword-based domain detection
 */

import keywords from "../../data/keywords.json";
import type { DomainConfig } from "./config";

export const GENERAL_DOMAIN = "general";

export interface DetectedDomain {
  domain: string;
  confidence: number;
  matchedKeywords: string[];
}

const BUILTIN_KEYWORDS: Record<string, string[]> = keywords.domains;

/**
 * Keyword lists per domain. A domain configured with its own `keywords`
 * replaces the built-in list; configured domains without keywords keep it.
 */
export function domainKeywords(
  domains: Record<string, DomainConfig> = {}
): Record<string, string[]> {
  const table: Record<string, string[]> = { ...BUILTIN_KEYWORDS };
  for (const [domain, config] of Object.entries(domains)) {
    if (config.keywords && config.keywords.length > 0) {
      table[domain] = config.keywords;
    }
  }
  return table;
}

export function detectDomain(
  query: string,
  table: Record<string, string[]> = BUILTIN_KEYWORDS
): DetectedDomain {
  const lower = query.toLowerCase();
  let best: DetectedDomain | null = null;

  for (const [domain, list] of Object.entries(table)) {
    if (list.length === 0) continue;
    const matched = list
      .map((keyword) => keyword.toLowerCase())
      .filter((keyword) => lower.includes(keyword));
    if (matched.length === 0) continue;

    const confidence = Math.min(
      0.95,
      matched.length / list.length + (matched.length - 1) * 0.1
    );
    if (
      !best ||
      confidence > best.confidence ||
      (confidence === best.confidence &&
        matched.length > best.matchedKeywords.length)
    ) {
      best = { domain, confidence, matchedKeywords: matched };
    }
  }

  return best ?? { domain: GENERAL_DOMAIN, confidence: 0.3, matchedKeywords: [] };
}
