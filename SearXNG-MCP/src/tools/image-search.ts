/**
 * search_images tool - image search through SearXNG
 */

import { toolEntry, type ToolMapEntry } from "@searxng-mcp/shared/Types/tools.js";
import type { StandardResponse } from "@searxng-mcp/shared/Types/StandardResponse.js";
import type { SearchResponse } from "../services/mapper.js";
import { createSearchInputSchema, runSearch, type SearchInput, type SearchToolDeps } from "./search-input.js";

export const imageSearchSchema = createSearchInputSchema('Image search query, e.g. "red panda"');

export type ImageSearchInput = SearchInput;

export type ImageSearchToolResult = StandardResponse<SearchResponse>;

export function imageSearchTool(deps: SearchToolDeps): ToolMapEntry {
  return toolEntry(
    {
      name: "search_images",
      description:
        "Search for images through SearXNG. Every result carries thumbnail_url for a preview and, when the engine provides it, media_url pointing at the full-size image; url is the page the image appears on.",
      annotations: {
        title: "Image search",
        readOnlyHint: true,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    imageSearchSchema,
    (input, context) => runSearch(deps, "image", input, context)
  );
}
