import { describe, it, expect, vi } from 'vitest';
import { ValidationError } from '@searxng-mcp/shared/Types/errors.js';
import type { RawSearchResponse, SearchRequest } from '../../src/services/searxng.js';
import {
  imageSearchTool,
  videoSearchTool,
  webSearchSchema,
  webSearchTool,
  type SearchToolDeps,
} from '../../src/tools/index.js';
import { MAX_PAGE } from '../../src/tools/search-input.js';

const emptyRaw: RawSearchResponse = {
  query: '',
  number_of_results: 0,
  results: [],
  suggestions: [],
  corrections: [],
  unresponsive_engines: [],
};

function deps(raw: RawSearchResponse = emptyRaw) {
  const search = vi.fn(async (_request: SearchRequest, _signal?: AbortSignal) => raw);
  const value: SearchToolDeps = { client: { search }, maxResults: 10 };
  return { search, deps: value };
}

const context = { signal: new AbortController().signal };

describe('search input schema', () => {
  it('trims the query and defaults page to 1', () => {
    const result = webSearchSchema.parse({ query: '  rust  ' });
    expect(result).toEqual({ query: 'rust', page: 1 });
  });

  it('accepts pages up to the limit', () => {
    expect(webSearchSchema.parse({ query: 'rust', page: 3 }).page).toBe(3);
    expect(webSearchSchema.parse({ query: 'rust', page: MAX_PAGE }).page).toBe(MAX_PAGE);
  });

  it.each([
    [{}, 'query: Required'],
    [{ query: '   ' }, 'query: query must not be empty'],
    [{ query: 'x'.repeat(501) }, 'query: String must contain at most 500 character(s)'],
    [{ query: 'rust', page: 0 }, 'page: Number must be greater than or equal to 1'],
    [{ query: 'rust', page: 1.5 }, 'page: Expected integer, received float'],
    [{ query: 'rust', page: '3' }, 'page: Expected number, received string'],
    [{ query: 'rust', page: 101 }, 'page: Number must be less than or equal to 100'],
    [{ query: 'rust', time_range: 'week' }, "time_range: Invalid enum value. Expected 'day' | 'month' | 'year', received 'week'"],
  ])('rejects %o', (input, message) => {
    const result = webSearchSchema.safeParse(input);
    expect(result.success).toBe(false);
    if (result.success) return;
    const issue = result.error.issues[0];
    expect(`${issue?.path.join('.')}: ${issue?.message}`).toBe(message);
  });

  it('rejects safesearch outside 0..2', () => {
    expect(webSearchSchema.safeParse({ query: 'rust', safesearch: 3 }).success).toBe(false);
    expect(webSearchSchema.safeParse({ query: 'rust', safesearch: 2 }).success).toBe(true);
  });
});

describe('tool definitions', () => {
  it('publishes names, annotations and the JSON input schema', () => {
    const { deps: d } = deps();
    const tools = [webSearchTool(d), imageSearchTool(d), videoSearchTool(d)].map((entry) => entry.tool);

    expect(tools.map((tool) => tool.name)).toEqual(['search', 'search_images', 'search_videos']);
    for (const tool of tools) {
      expect(tool.annotations).toMatchObject({ readOnlyHint: true, openWorldHint: true });
      expect(tool.inputSchema.required).toEqual(['query']);
      expect(Object.keys(tool.inputSchema.properties)).toEqual(['query', 'page', 'language', 'time_range', 'safesearch']);
    }
  });
});

describe('tool calls', () => {
  it('passes the category and options to the client', async () => {
    const { search, deps: d } = deps();

    await imageSearchTool(d).call(
      { query: 'red panda', page: 2, language: 'en', time_range: 'year', safesearch: 0 },
      context
    );

    expect(search).toHaveBeenCalledWith(
      { query: 'red panda', page: 2, category: 'image', language: 'en', timeRange: 'year', safesearch: 0 },
      context.signal
    );
  });

  it('leaves unset options for the client to default', async () => {
    const { search, deps: d } = deps();

    await videoSearchTool(d).call({ query: 'sourdough' }, context);

    expect(search).toHaveBeenCalledWith(
      {
        query: 'sourdough',
        page: 1,
        category: 'video',
        language: undefined,
        timeRange: undefined,
        safesearch: undefined,
      },
      context.signal
    );
  });

  it('returns the mapped response', async () => {
    const { deps: d } = deps({
      ...emptyRaw,
      results: [{ title: 'Rust', url: 'https://www.rust-lang.org/', engine: 'bing' }],
    });

    const result = await webSearchTool(d).call({ query: 'rust' }, context);

    expect(result).toEqual({
      query: 'rust',
      page: 1,
      results: [{ title: 'Rust', url: 'https://www.rust-lang.org/', snippet: '', engine_source: 'bing', engines: [] }],
      suggestions: [],
      corrections: [],
      unresponsive_engines: [],
    });
  });

  it('caps a web search at maxResults with absolute URLs in backend order', async () => {
    const results = Array.from({ length: 12 }, (_, index) => ({
      title: `Rust result ${index + 1}`,
      url: `https://rust.example.test/${index + 1}`,
      engine: 'duckduckgo',
    }));
    const { deps: d } = deps({ ...emptyRaw, query: 'rust programming', results });

    const result = await webSearchTool(d).call({ query: 'rust programming', page: 1 }, context);

    // toMatchObject compares arrays element by element, so exactly the first 10 must come back
    expect(result).toMatchObject({
      query: 'rust programming',
      page: 1,
      results: results.slice(0, 10).map(({ title, url }) => ({ title, url })),
    });
  });

  // Each case is wrapped so the array page reaches the test as one argument
  it.each<[unknown]>([[0], [-3], [2.5], [true], [[2]], ['0x10'], ['1e2'], ['2'], [1e300], [null]])(
    'rejects page %j without reaching the backend',
    async (page) => {
      const { search, deps: d } = deps();

      await expect(webSearchTool(d).call({ query: 'rust', page }, context)).rejects.toThrow(ValidationError);
      expect(search).not.toHaveBeenCalled();
    }
  );

  it('cuts snippets to the configured length', async () => {
    const { deps: d } = deps({
      ...emptyRaw,
      results: [{ title: 'Rust', url: 'https://www.rust-lang.org/', content: 'A language empowering everyone' }],
    });

    const result = await webSearchTool({ ...d, snippetLength: 10 }).call({ query: 'rust' }, context);

    expect(result).toMatchObject({ results: [{ snippet: 'A language...' }] });
  });

  it('never reaches the backend with invalid input', async () => {
    const { search, deps: d } = deps();

    await expect(webSearchTool(d).call({ query: '' }, context)).rejects.toThrow(ValidationError);
    expect(search).not.toHaveBeenCalled();
  });
});
