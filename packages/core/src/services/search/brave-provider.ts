/**
 * Brave Search provider implementation
 */

import { z } from "zod";
import type {
  ProviderSearchOptions,
  SearchProvider,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { applySiteFilters, freshnessFor } from "./filters";
import { httpGetJson } from "./http";

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().default(""),
            url: z.string(),
            description: z.string().default(""),
            age: z.string().optional(),
            page_age: z.string().optional(),
            language: z.string().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

type BraveWebResult = NonNullable<
  z.infer<typeof BraveResponseSchema>["web"]
>["results"][number];

export class BraveSearchProvider implements SearchProvider {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string = "https://api.search.brave.com/res/v1"
  ) {}

  getName(): string {
    return "brave";
  }

  async search(
    query: string,
    options: ProviderSearchOptions
  ): Promise<SearchResultItem[]> {
    const { limit, filters, signal } = options;

    const params = new URLSearchParams({
      q: applySiteFilters(query, filters),
      count: Math.min(limit, 20).toString(),
    });
    if (filters?.country) params.append("country", filters.country);
    if (filters?.language) params.append("search_lang", filters.language);
    if (filters?.dateFrom) {
      const freshness = freshnessFor(filters.dateFrom);
      if (freshness) params.append("freshness", freshness);
    }

    const data = await httpGetJson(
      `${this.baseUrl}/web/search?${params.toString()}`,
      BraveResponseSchema,
      {
        provider: this.getName(),
        signal,
        headers: {
          "Accept-Encoding": "gzip",
          "X-Subscription-Token": this.apiKey,
        },
      }
    );

    return (data.web?.results ?? []).map((result) => this.convertResult(result));
  }

  private convertResult(result: BraveWebResult): SearchResultItem {
    return {
      title: result.title,
      url: result.url,
      description: result.description,
      publishedDate: result.page_age ?? result.age,
    };
  }
}

export function createBraveSearchProvider(
  apiKey: string,
  baseUrl?: string
): BraveSearchProvider {
  return new BraveSearchProvider(apiKey, baseUrl);
}
