/**
 * Export all tools
 */

import type { Logger } from "@searxng-mcp/shared/Utils/logger.js";
import { ToolRegistry } from "./registry.js";
import type { SearchToolDeps } from "./search-input.js";
import { webSearchTool } from "./web-search.js";
import { imageSearchTool } from "./image-search.js";
import { videoSearchTool } from "./video-search.js";

export {
  webSearchSchema,
  webSearchTool,
  type WebSearchInput,
  type WebSearchToolResult,
} from "./web-search.js";

export {
  imageSearchSchema,
  imageSearchTool,
  type ImageSearchInput,
  type ImageSearchToolResult,
} from "./image-search.js";

export {
  videoSearchSchema,
  videoSearchTool,
  type VideoSearchInput,
  type VideoSearchToolResult,
} from "./video-search.js";

export { ToolRegistry } from "./registry.js";
export { createSearchInputSchema, runSearch, type SearchInput, type SearchToolDeps } from "./search-input.js";

/**
 * Registry holding search, search_images and search_videos.
 */
export function createToolRegistry(deps: SearchToolDeps, logger?: Logger): ToolRegistry {
  return new ToolRegistry([webSearchTool(deps), imageSearchTool(deps), videoSearchTool(deps)], logger);
}
