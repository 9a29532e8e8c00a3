/**
 * PubMed provider (NCBI E-utilities)
 *
 * Two requests per search: esearch for matching PMIDs, then esummary for
 * their titles, journals and dates.
 */

import { z } from "zod";
import type {
  ProviderSearchOptions,
  SearchProvider,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { yearOf } from "./filters";
import { httpGetJson } from "./http";

const ESearchSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()).default([]),
  }),
});

const ESummarySchema = z.object({
  result: z.record(z.string(), z.unknown()).default({}),
});

const SummaryEntrySchema = z.object({
  uid: z.string(),
  title: z.string().default(""),
  pubdate: z.string().optional(),
  source: z.string().optional(),
  authors: z.array(z.object({ name: z.string() })).default([]),
});

export class PubMedProvider implements SearchProvider {
  constructor(
    private readonly baseUrl: string = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils",
    private readonly apiKey?: string
  ) {}

  getName(): string {
    return "pubmed";
  }

  async search(
    query: string,
    options: ProviderSearchOptions
  ): Promise<SearchResultItem[]> {
    const { limit, filters, signal } = options;
    const requestOptions = { provider: this.getName(), signal };

    const searchParams = this.params({
      db: "pubmed",
      term: query,
      retmax: String(limit),
      retmode: "json",
      sort: "relevance",
    });
    const fromYear = yearOf(filters?.dateFrom);
    const toYear = yearOf(filters?.dateTo);
    if (fromYear || toYear) {
      searchParams.set("datetype", "pdat");
      searchParams.set("mindate", String(fromYear ?? 1800));
      searchParams.set("maxdate", String(toYear ?? 3000));
    }

    const found = await httpGetJson(
      `${this.baseUrl}/esearch.fcgi?${searchParams.toString()}`,
      ESearchSchema,
      requestOptions
    );
    const ids = found.esearchresult.idlist.slice(0, limit);
    if (ids.length === 0) {
      return [];
    }

    const summary = await httpGetJson(
      `${this.baseUrl}/esummary.fcgi?${this.params({
        db: "pubmed",
        id: ids.join(","),
        retmode: "json",
      }).toString()}`,
      ESummarySchema,
      requestOptions
    );

    const results: SearchResultItem[] = [];
    // esummary keys entries by PMID; keep esearch's relevance order
    for (const id of ids) {
      const entry = SummaryEntrySchema.safeParse(summary.result[id]);
      if (!entry.success) continue;
      const { uid, title, pubdate, source, authors } = entry.data;
      results.push({
        title,
        url: `https://pubmed.ncbi.nlm.nih.gov/${uid}/`,
        description: [source, pubdate].filter(Boolean).join(", "),
        publishedDate: pubdate,
        authors: authors.map((author) => author.name),
        meta: { pmid: uid },
      });
    }
    return results;
  }

  private params(values: Record<string, string>): URLSearchParams {
    const params = new URLSearchParams(values);
    if (this.apiKey) params.set("api_key", this.apiKey);
    return params;
  }
}
