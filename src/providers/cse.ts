/**
 * Google Custom Search provider.
 *
 * Credentials come from GOOGLE_CSE_KEY and GOOGLE_CSE_ID, read at call time.
 */

import { z } from "zod";
import type { CseCandidate } from "@/types";
import { CSE_API_URL, getCseApiKey, getCseEngineId } from "../config";
import { ProviderFailure, isRetryableStatus } from "../errors";
import type { SearchProvider } from "./types";

const responseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string(),
        link: z.string(),
        snippet: z.string().optional(),
      }),
    )
    .default([]),
});

/** Create a SearchProvider backed by the Custom Search JSON API. */
export function createCseProvider(
  apiUrl: string = CSE_API_URL,
): SearchProvider<CseCandidate> {
  return {
    engine: "CSE",

    async search(keywords: string): Promise<CseCandidate[]> {
      let key: string;
      let cx: string;
      try {
        key = getCseApiKey();
        cx = getCseEngineId();
      } catch (error) {
        throw new ProviderFailure(
          "CSE",
          error instanceof Error ? error.message : String(error),
          { cause: error },
        );
      }

      const url = new URL(apiUrl);
      url.searchParams.set("q", keywords);
      url.searchParams.set("key", key);
      url.searchParams.set("cx", cx);

      let response: Response;
      try {
        response = await fetch(url.toString(), {
          headers: { Accept: "application/json" },
        });
      } catch (error) {
        throw new ProviderFailure(
          "CSE",
          `Custom Search request failed: ${error instanceof Error ? error.message : String(error)}`,
          { retryable: true, cause: error },
        );
      }

      if (!response.ok) {
        const body = await response.text();
        throw new ProviderFailure(
          "CSE",
          `Custom Search failed (${response.status}): ${body}`,
          { status: response.status, retryable: isRetryableStatus(response.status) },
        );
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch (error) {
        throw new ProviderFailure("CSE", "Custom Search returned non-JSON body", {
          cause: error,
        });
      }

      const parsed = responseSchema.safeParse(json);
      if (!parsed.success) {
        throw new ProviderFailure("CSE", "Unexpected Custom Search response shape");
      }

      return parsed.data.items.map((item): CseCandidate => ({
        engine: "CSE",
        title: item.title,
        snippet: item.snippet ?? "",
        link: item.link,
      }));
    },
  };
}
