/**
 * Deduplication utilities
 *
 * URL normalization for result merging and text normalization for fact
 * merging and similarity scoring.
 */

import keywords from "../data/keywords.json";

const STOPWORDS = new Set<string>(keywords.stopwords);

const TRACKING_PARAMS = /^(utm_|fbclid$|gclid$|ref$|ref_src$)/;

/**
 * Normalize URL for consistent comparison
 * - Remove www prefix
 * - Remove trailing slashes
 * - Drop fragments and tracking parameters, sort the rest
 * - Lowercase scheme and host
 */
export function normalizeUrl(url: string): string {
  let urlObj: URL;
  try {
    urlObj = new URL(url.trim());
  } catch {
    return url.toLowerCase().trim();
  }

  let hostname = urlObj.hostname.toLowerCase();
  if (hostname.startsWith("www.")) {
    hostname = hostname.substring(4);
  }

  let pathname = urlObj.pathname;
  if (pathname.endsWith("/") && pathname.length > 1) {
    pathname = pathname.slice(0, -1);
  }

  const params = [...urlObj.searchParams.entries()]
    .filter(([key]) => !TRACKING_PARAMS.test(key.toLowerCase()))
    .sort(([a], [b]) => a.localeCompare(b));
  const search =
    params.length > 0 ? `?${new URLSearchParams(params).toString()}` : "";

  return `${urlObj.protocol}//${hostname}${pathname === "/" ? "" : pathname}${search}`;
}

/**
 * Canonical form of a fact statement, used as its identity when merging
 */
export function normalizeStatement(statement: string): string {
  return statement
    .toLowerCase()
    .replace(/[^\p{L}\p{N}$%.\s]/gu, " ")
    .replace(/\.(?=\s|$)/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Lowercase word tokens with stopwords removed
 */
export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[\p{L}\p{N}]+(?:-[\p{L}\p{N}]+)*/gu) ?? []).filter(
    (token) => token.length > 1 && !STOPWORDS.has(token)
  );
}

export function jaccardSimilarity(a: Iterable<string>, b: Iterable<string>): number {
  const setA = new Set(a);
  const setB = new Set(b);
  if (setA.size === 0 && setB.size === 0) return 0;
  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) intersection++;
  }
  return intersection / (setA.size + setB.size - intersection);
}
