/**
 * search_videos tool - video search through SearXNG
 */

import { toolEntry, type ToolMapEntry } from "@searxng-mcp/shared/Types/tools.js";
import type { StandardResponse } from "@searxng-mcp/shared/Types/StandardResponse.js";
import type { SearchResponse } from "../services/mapper.js";
import { createSearchInputSchema, runSearch, type SearchInput, type SearchToolDeps } from "./search-input.js";

export const videoSearchSchema = createSearchInputSchema('Video search query, e.g. "sourdough baking"');

export type VideoSearchInput = SearchInput;

export type VideoSearchToolResult = StandardResponse<SearchResponse>;

export function videoSearchTool(deps: SearchToolDeps): ToolMapEntry {
  return toolEntry(
    {
      name: "search_videos",
      description:
        "Search for videos through SearXNG. Results include thumbnail_url, and media_url with an embeddable player when available, plus duration, author and publication date when the engine reports them.",
      annotations: {
        title: "Video search",
        readOnlyHint: true,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    videoSearchSchema,
    (input, context) => runSearch(deps, "video", input, context)
  );
}
