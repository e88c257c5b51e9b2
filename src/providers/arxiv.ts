/**
 * arXiv provider: queries the arXiv export API and maps Atom entries to
 * candidates.
 *
 * https://info.arxiv.org/help/api/basics.html
 */

import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import type { ArxivCandidate } from "@/types";
import { ARXIV_API_BASE, ARXIV_MAX_RESULTS } from "../config";
import { ProviderFailure, isRetryableStatus } from "../errors";
import type { SearchProvider } from "./types";

// ---------------------------------------------------------------------------
// Atom parsing
// ---------------------------------------------------------------------------

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (name) => name === "entry" || name === "link",
});

const linkSchema = z.object({
  "@_href": z.string(),
  "@_rel": z.string().optional(),
  "@_title": z.string().optional(),
});

const entrySchema = z.object({
  id: z.string(),
  title: z.string(),
  summary: z.string(),
  published: z.string().default(""),
  link: z.array(linkSchema).default([]),
});

const feedSchema = z.object({
  feed: z.object({
    entry: z.array(z.object({}).passthrough()).default([]),
  }),
});

/** Collapse the hard line wraps arXiv puts inside titles and abstracts. */
function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Parse an arXiv Atom feed into candidates, in feed order.
 *
 * Throws ProviderFailure when the document is not a feed or the API reports
 * a query error (arXiv answers malformed queries with a single error entry).
 */
export function parseArxivFeed(xml: string): ArxivCandidate[] {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    throw new ProviderFailure("arXiv", "arXiv returned malformed XML", { cause: error });
  }

  const feed = feedSchema.safeParse(document);
  if (!feed.success) {
    throw new ProviderFailure("arXiv", "arXiv response is not an Atom feed");
  }

  return feed.data.feed.entry.map((raw): ArxivCandidate => {
    const parsed = entrySchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderFailure("arXiv", "arXiv entry is missing required fields");
    }
    const entry = parsed.data;

    if (entry.id.includes("/api/errors")) {
      throw new ProviderFailure("arXiv", `arXiv rejected the query: ${collapseWhitespace(entry.summary)}`);
    }

    const articleUrl =
      entry.link.find((l) => l["@_rel"] === "alternate")?.["@_href"] ?? entry.id;
    const pdfUrl =
      entry.link.find((l) => l["@_title"] === "pdf")?.["@_href"] ??
      articleUrl.replace("/abs/", "/pdf/");

    return {
      engine: "arXiv",
      title: collapseWhitespace(entry.title),
      summary: collapseWhitespace(entry.summary),
      published: entry.published.slice(0, 10),
      articleUrl,
      pdfUrl,
    };
  });
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

/** Create a SearchProvider backed by the arXiv export API. */
export function createArxivProvider(
  baseUrl: string = ARXIV_API_BASE,
  maxResults: number = ARXIV_MAX_RESULTS,
): SearchProvider<ArxivCandidate> {
  return {
    engine: "arXiv",

    async search(keywords: string): Promise<ArxivCandidate[]> {
      const url = new URL(`${baseUrl.replace(/\/+$/, "")}/query`);
      url.searchParams.set("search_query", keywords);
      url.searchParams.set("start", "0");
      url.searchParams.set("max_results", String(maxResults));

      let response: Response;
      try {
        response = await fetch(url.toString(), {
          headers: { Accept: "application/atom+xml" },
        });
      } catch (error) {
        throw new ProviderFailure(
          "arXiv",
          `arXiv request failed: ${error instanceof Error ? error.message : String(error)}`,
          { retryable: true, cause: error },
        );
      }

      if (!response.ok) {
        const body = await response.text();
        throw new ProviderFailure(
          "arXiv",
          `arXiv search failed (${response.status}): ${body}`,
          { status: response.status, retryable: isRetryableStatus(response.status) },
        );
      }

      return parseArxivFeed(await response.text()).slice(0, maxResults);
    },
  };
}
