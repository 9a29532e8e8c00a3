/**
 * Content extraction service
 *
 * Fetches a result page and extracts its main text with cheerio. Pages that
 * deny access are recorded through Memory so later cycles and sessions skip
 * them.
 */

import * as cheerio from "cheerio";
import type { Memory } from "../interfaces/memory";
import { AccessDeniedError, errorMessage, TimeoutError } from "../errors";
import { createModuleLogger } from "../logger";
import { withTimeout } from "../utils/async";
import { httpGetText } from "./search/http";
import type { ExtractionConfig } from "./research-engine/config";

const log = createModuleLogger("content-extractor");

/**
 * Extracted content from a web page
 */
export interface ExtractedContent {
  url: string;
  title?: string;
  text: string;
  publishedDate?: string;
  wordCount: number;
  fetchStatus: "success" | "failed" | "timeout" | "blocked" | "skipped" | "unsupported";
  fetchError?: string;
}

const CONTENT_SELECTORS = [
  "article",
  '[role="main"]',
  "main",
  ".post-content",
  ".article-content",
  ".entry-content",
  "#content",
];

/**
 * Extract text from HTML, removing scripts and chrome
 */
function extractText($: cheerio.CheerioAPI, selector?: string): string {
  const element = selector ? $(selector).first() : $("body");
  element.find("script, style, nav, footer, header, aside, iframe, noscript").remove();
  return element.text().replace(/\s+/g, " ").trim();
}

/**
 * Main content of a page: first content container with real text, else body
 */
export function extractMainContent(html: string): {
  title?: string;
  text: string;
  publishedDate?: string;
} {
  const $ = cheerio.load(html);

  const title =
    $("title").first().text().trim() ||
    $('meta[property="og:title"]').attr("content") ||
    $("h1").first().text().trim() ||
    undefined;

  const publishedDate =
    $('meta[property="article:published_time"]').attr("content") ||
    $('meta[name="date"]').attr("content") ||
    $("time[datetime]").attr("datetime");

  for (const selector of CONTENT_SELECTORS) {
    const text = extractText($, selector);
    if (text.length > 100) {
      return { title, text, publishedDate };
    }
  }
  return { title, text: extractText($), publishedDate };
}

export class ContentExtractor {
  constructor(
    private readonly config: ExtractionConfig,
    private readonly memory: Pick<Memory, "isKnownFailure" | "recordAccessFailure">
  ) {}

  get enabled(): boolean {
    return this.config.enabled;
  }

  async extract(url: string, source: string): Promise<ExtractedContent> {
    const empty = { url, text: "", wordCount: 0 };

    if (await this.memory.isKnownFailure(url)) {
      return { ...empty, fetchStatus: "skipped", fetchError: "Known access failure" };
    }

    try {
      const { text: body, contentType } = await withTimeout(
        (signal) =>
          httpGetText(url, {
            provider: source,
            signal,
            headers: {
              "User-Agent": this.config.userAgent,
              Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.5",
              "Accept-Language": "en-US,en;q=0.9",
            },
          }),
        this.config.timeoutMs,
        () => new TimeoutError(`Fetching ${url} timed out`, { url })
      );

      if (contentType && !contentType.includes("html")) {
        return { ...empty, fetchStatus: "unsupported", fetchError: contentType };
      }

      const { title, text, publishedDate } = extractMainContent(body);
      const capped = text.slice(0, this.config.maxContentChars);
      return {
        url,
        title,
        text: capped,
        publishedDate,
        wordCount: capped ? capped.split(/\s+/).length : 0,
        fetchStatus: "success",
      };
    } catch (error) {
      if (error instanceof AccessDeniedError) {
        await this.recordFailure(url, source, error);
        return { ...empty, fetchStatus: "blocked", fetchError: error.message };
      }
      if (error instanceof TimeoutError) {
        return { ...empty, fetchStatus: "timeout", fetchError: error.message };
      }
      log.debug("Content fetch failed", { url, error: errorMessage(error) });
      return { ...empty, fetchStatus: "failed", fetchError: errorMessage(error) };
    }
  }

  private async recordFailure(url: string, source: string, error: AccessDeniedError): Promise<void> {
    try {
      await this.memory.recordAccessFailure(
        url,
        source,
        error.status === 404 ? "not_found" : "access_denied",
        error.message
      );
    } catch (storeError) {
      log.error("Could not record access failure", { url, error: errorMessage(storeError) });
    }
  }
}
