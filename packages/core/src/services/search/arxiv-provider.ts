/**
 * arXiv provider (Atom export API)
 */

import * as cheerio from "cheerio";
import type {
  ProviderSearchOptions,
  SearchProvider,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { submittedDateRange } from "./filters";
import { httpGetText } from "./http";

export class ArxivProvider implements SearchProvider {
  constructor(private readonly baseUrl: string = "https://export.arxiv.org/api") {}

  getName(): string {
    return "arxiv";
  }

  async search(
    query: string,
    options: ProviderSearchOptions
  ): Promise<SearchResultItem[]> {
    const range = submittedDateRange(options.filters);
    const params = new URLSearchParams({
      search_query: range ? `all:${query} AND ${range}` : `all:${query}`,
      start: "0",
      max_results: String(options.limit),
      sortBy: "relevance",
    });

    const { text } = await httpGetText(`${this.baseUrl}/query?${params.toString()}`, {
      provider: this.getName(),
      signal: options.signal,
    });

    return parseArxivFeed(text);
  }
}

/**
 * Convert an arXiv Atom feed into result items
 */
export function parseArxivFeed(xml: string): SearchResultItem[] {
  const $ = cheerio.load(xml, { xml: true });
  const results: SearchResultItem[] = [];

  $("entry").each((_index, element) => {
    const entry = $(element);
    const url = entry.children("id").first().text().trim();
    if (!url) return;

    const summary = collapse(entry.children("summary").first().text());
    const published = entry.children("published").first().text().trim();
    const category = entry.find("arxiv\\:primary_category").attr("term");

    results.push({
      title: collapse(entry.children("title").first().text()),
      url,
      description: summary.slice(0, 300),
      content: summary || undefined,
      publishedDate: published || undefined,
      authors: entry
        .find("author > name")
        .map((_i, name) => $(name).text().trim())
        .get(),
      meta: category ? { category } : undefined,
    });
  });

  return results;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
