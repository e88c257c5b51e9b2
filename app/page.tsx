import { keywordsByEngine, listHistory } from "@/src/pipeline";
import { createFileStore } from "@/src/store";
import SearchApp from "./search/SearchApp";

// History lives on disk and changes with every search.
export const dynamic = "force-dynamic";

export default async function HomePage() {
  const listing = await listHistory(createFileStore());
  return <SearchApp initialHistory={keywordsByEngine(listing)} />;
}
