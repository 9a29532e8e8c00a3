/**
 * Search Provider Interface
 *
 * Abstract interface for external research sources.
 * Providers are only ever called through a ProviderGate, which owns rate
 * limiting, retry and circuit breaking; a provider makes one raw call and
 * throws a taxonomy error (RateLimitError, AccessDeniedError, ...) on failure.
 */

/**
 * Search filters for customizing queries
 */
export interface SearchFilters {
  // Date filtering
  dateFrom?: string; // ISO date string (YYYY-MM-DD)
  dateTo?: string; // ISO date string (YYYY-MM-DD)

  // Location/language
  country?: string; // ISO 3166-1 alpha-2 country code (e.g., "US", "GB")
  language?: string; // ISO 639-1 language code (e.g., "en", "es")

  // Site filtering (applied to query string by web providers)
  includeDomains?: string[];
  excludeDomains?: string[];
}

/**
 * Single search result (provider-agnostic)
 */
export interface SearchResultItem {
  title: string;
  url: string;
  description: string;
  content?: string; // Full text or abstract when the provider returns one
  publishedDate?: string; // ISO date string
  authors?: string[];
  meta?: Record<string, string | number | boolean>;
}

export interface ProviderSearchOptions {
  limit: number;
  filters?: SearchFilters;
  signal?: AbortSignal;
}

/**
 * Search Provider interface
 * All search providers must implement these methods
 */
export interface SearchProvider {
  /**
   * Execute a single search. Results are returned in the provider's own order.
   */
  search(query: string, options: ProviderSearchOptions): Promise<SearchResultItem[]>;

  /**
   * Get the provider name (matches the key under search.providers in config)
   */
  getName(): string;
}
