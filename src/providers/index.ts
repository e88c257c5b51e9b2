import type { SearchEngine } from "@/types";
import { createArxivProvider } from "./arxiv";
import { createCseProvider } from "./cse";
import type { SearchProvider, SearchProviders } from "./types";

export type { SearchProvider, SearchProviders } from "./types";
export { createArxivProvider, parseArxivFeed } from "./arxiv";
export { createCseProvider } from "./cse";

/** The provider for one engine, configured from the environment. */
export function createSearchProvider(engine: SearchEngine): SearchProvider {
  return engine === "arXiv" ? createArxivProvider() : createCseProvider();
}

/** Providers for every engine, configured from the environment. */
export function createSearchProviders(): SearchProviders {
  return {
    arXiv: createSearchProvider("arXiv"),
    CSE: createSearchProvider("CSE"),
  };
}
