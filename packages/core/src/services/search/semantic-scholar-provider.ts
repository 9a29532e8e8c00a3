/**
 * Semantic Scholar provider (Graph API paper search)
 */

import { z } from "zod";
import type {
  ProviderSearchOptions,
  SearchProvider,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { yearOf } from "./filters";
import { httpGetJson } from "./http";

const FIELDS = "title,abstract,url,year,venue,authors,citationCount";

const PaperSchema = z.object({
  paperId: z.string(),
  title: z.string().nullable().default(""),
  abstract: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  year: z.number().nullable().optional(),
  venue: z.string().nullable().optional(),
  citationCount: z.number().nullable().optional(),
  authors: z.array(z.object({ name: z.string().nullable() })).default([]),
});

const PaperSearchSchema = z.object({
  total: z.number().optional(),
  data: z.array(PaperSchema).default([]),
});

type Paper = z.infer<typeof PaperSchema>;

export class SemanticScholarProvider implements SearchProvider {
  constructor(
    private readonly baseUrl: string = "https://api.semanticscholar.org/graph/v1",
    private readonly apiKey?: string
  ) {}

  getName(): string {
    return "semantic_scholar";
  }

  async search(
    query: string,
    options: ProviderSearchOptions
  ): Promise<SearchResultItem[]> {
    const { limit, filters, signal } = options;

    const params = new URLSearchParams({
      query,
      limit: String(Math.min(limit, 100)),
      fields: FIELDS,
    });
    const fromYear = yearOf(filters?.dateFrom);
    const toYear = yearOf(filters?.dateTo);
    if (fromYear || toYear) {
      params.set("year", `${fromYear ?? ""}-${toYear ?? ""}`);
    }

    const data = await httpGetJson(
      `${this.baseUrl}/paper/search?${params.toString()}`,
      PaperSearchSchema,
      {
        provider: this.getName(),
        signal,
        headers: this.apiKey ? { "x-api-key": this.apiKey } : undefined,
      }
    );

    return data.data.map((paper) => this.convertPaper(paper));
  }

  private convertPaper(paper: Paper): SearchResultItem {
    const meta: Record<string, string | number> = { paperId: paper.paperId };
    if (typeof paper.citationCount === "number") {
      meta.citationCount = paper.citationCount;
    }
    return {
      title: paper.title ?? "",
      url: paper.url || `https://www.semanticscholar.org/paper/${paper.paperId}`,
      description: [paper.venue, paper.year].filter(Boolean).join(", "),
      content: paper.abstract ?? undefined,
      publishedDate: paper.year ? `${paper.year}-01-01` : undefined,
      authors: paper.authors
        .map((author) => author.name)
        .filter((name): name is string => Boolean(name)),
      meta,
    };
  }
}
