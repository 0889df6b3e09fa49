/**
 * Input schema and pipeline shared by the three search tools
 */

import { z } from "zod";
import type { ToolContext } from "@searxng-mcp/shared/Types/tools.js";
import type { SearxngClient, SearchCategory } from "../services/searxng.js";
import { mapSearchResponse, type SearchResponse } from "../services/mapper.js";

export const MAX_PAGE = 100;

export interface SearchToolDeps {
  client: Pick<SearxngClient, "search">;
  maxResults: number;
  snippetLength?: number;
}

export function createSearchInputSchema(queryDescription: string) {
  return z.object({
    query: z
      .string()
      .trim()
      .min(1, "query must not be empty")
      .max(500)
      .describe(queryDescription),
    page: z
      .number()
      .int()
      .min(1)
      .max(MAX_PAGE)
      .default(1)
      .describe(`Result page, starting at 1 (default 1, at most ${MAX_PAGE})`),
    language: z
      .string()
      .trim()
      .min(1)
      .optional()
      .describe('Language code such as "en" or "de-DE"; defaults to the server setting'),
    time_range: z
      .enum(["day", "month", "year"])
      .optional()
      .describe("Only return results from the last day, month or year"),
    safesearch: z
      .union([z.literal(0), z.literal(1), z.literal(2)])
      .optional()
      .describe("0 = off, 1 = moderate, 2 = strict; defaults to the server setting"),
  });
}

export type SearchInput = z.infer<ReturnType<typeof createSearchInputSchema>>;

/**
 * Query SearXNG for one category and map the answer.
 */
export async function runSearch(
  deps: SearchToolDeps,
  category: SearchCategory,
  input: SearchInput,
  context: ToolContext
): Promise<SearchResponse> {
  const raw = await deps.client.search(
    {
      query: input.query,
      page: input.page,
      category,
      language: input.language,
      timeRange: input.time_range,
      safesearch: input.safesearch,
    },
    context.signal
  );

  return mapSearchResponse(raw, category, {
    query: input.query,
    page: input.page,
    maxResults: deps.maxResults,
    snippetLength: deps.snippetLength,
  });
}
