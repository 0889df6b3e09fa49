/**
 * search tool - general web search through SearXNG
 */

import { toolEntry, type ToolMapEntry } from "@searxng-mcp/shared/Types/tools.js";
import type { StandardResponse } from "@searxng-mcp/shared/Types/StandardResponse.js";
import type { SearchResponse } from "../services/mapper.js";
import { createSearchInputSchema, runSearch, type SearchInput, type SearchToolDeps } from "./search-input.js";

export const webSearchSchema = createSearchInputSchema('Search query, e.g. "rust borrow checker"');

export type WebSearchInput = SearchInput;

export type WebSearchToolResult = StandardResponse<SearchResponse>;

export function webSearchTool(deps: SearchToolDeps): ToolMapEntry {
  return toolEntry(
    {
      name: "search",
      description:
        "Search the web through a SearXNG metasearch instance. Returns ranked results with title, URL, snippet and the engine that found them, plus spelling corrections and related suggestions. Use page to go deeper into the results.",
      annotations: {
        title: "Web search",
        readOnlyHint: true,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    webSearchSchema,
    (input, context) => runSearch(deps, "text", input, context)
  );
}
