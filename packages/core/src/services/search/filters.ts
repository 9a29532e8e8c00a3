/**
 * Search filter helpers shared by the planner and the providers
 */

import type { SearchFilters } from "../../interfaces/search-provider";

/**
 * Append site: operators for the include and exclude lists (web providers only)
 */
export function applySiteFilters(query: string, filters?: SearchFilters): string {
  const parts = [query.trim()];
  const include = filters?.includeDomains ?? [];
  if (include.length > 0) {
    parts.push(`(${include.map((domain) => `site:${domain}`).join(" OR ")})`);
  }
  for (const domain of filters?.excludeDomains ?? []) {
    parts.push(`-site:${domain}`);
  }
  return parts.join(" ");
}

/**
 * Filters for one cycle: the request's own filters, with a `dateFrom` derived
 * from the domain's maximum source age when the request sets none
 */
export function planFilters(
  requested: SearchFilters | null,
  maxAgeYears: number | undefined,
  now: number
): SearchFilters | undefined {
  const filters: SearchFilters = { ...(requested ?? {}) };
  if (!filters.dateFrom && maxAgeYears !== undefined) {
    const from = new Date(now);
    from.setUTCFullYear(from.getUTCFullYear() - maxAgeYears);
    filters.dateFrom = from.toISOString().slice(0, 10);
  }
  return Object.keys(filters).length > 0 ? filters : undefined;
}

/**
 * Brave "freshness" bucket for a dateFrom filter
 */
export function freshnessFor(dateFrom: string, now: number = Date.now()): string | undefined {
  const from = Date.parse(dateFrom);
  if (Number.isNaN(from)) return undefined;
  const daysDiff = Math.floor((now - from) / (1000 * 60 * 60 * 24));

  if (daysDiff <= 1) return "pd";
  if (daysDiff <= 7) return "pw";
  if (daysDiff <= 31) return "pm";
  if (daysDiff <= 365) return "py";
  return undefined;
}

/**
 * Year extracted from an ISO date filter, for APIs that filter by year
 */
export function yearOf(isoDate: string | undefined): number | undefined {
  if (!isoDate) return undefined;
  const year = Number.parseInt(isoDate.slice(0, 4), 10);
  return Number.isFinite(year) ? year : undefined;
}

/**
 * arXiv `submittedDate:[from TO to]` clause for the date filters, if any
 */
export function submittedDateRange(filters?: SearchFilters): string | undefined {
  if (!filters?.dateFrom && !filters?.dateTo) return undefined;
  const from = filters.dateFrom ? `${compact(filters.dateFrom)}0000` : "190001010000";
  const to = filters.dateTo ? `${compact(filters.dateTo)}2359` : "300001010000";
  return `submittedDate:[${from} TO ${to}]`;
}

function compact(isoDate: string): string {
  return isoDate.slice(0, 10).replace(/-/g, "");
}
