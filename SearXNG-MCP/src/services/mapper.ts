/**
 * Reshape SearXNG JSON into the tool result schema.
 */

import { isRecord } from "@searxng-mcp/shared/Utils/guards.js";
import type { RawSearchResponse, SearchCategory } from "./searxng.js";

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
  engine_source: string;
  engines: string[];
  /** Image or video preview; always present for image/video results */
  thumbnail_url?: string;
  /** Full-size image or embeddable player */
  media_url?: string;
  published_date?: string;
  duration?: string;
  author?: string;
}

export interface SearchResponse {
  query: string;
  page: number;
  results: SearchResult[];
  total_estimated?: number;
  suggestions: string[];
  corrections: string[];
  unresponsive_engines: string[];
}

export interface MapOptions {
  /** Echoed back when SearXNG omits the query */
  query: string;
  page: number;
  maxResults: number;
  /** Longer snippets are cut to this many characters plus an ellipsis; 0 or unset keeps them whole */
  snippetLength?: number;
}

// Field precedence differs by category: image engines fill thumbnail_src,
// video engines fill thumbnail, and img_src is the full image.
const THUMBNAIL_FIELDS: Record<SearchCategory, readonly string[]> = {
  text: [],
  image: ["thumbnail_src", "thumbnail", "img_src"],
  video: ["thumbnail", "thumbnail_src", "img_src"],
};

const MEDIA_FIELDS: Record<SearchCategory, readonly string[]> = {
  text: [],
  image: ["img_src"],
  video: ["iframe_src"],
};

function text(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

/**
 * Returns the value when it is an absolute http(s) URL. Protocol-relative
 * `//host/path` values, common for thumbnails, are promoted to https.
 */
export function absoluteUrl(value: string): string | undefined {
  const trimmed = value.trim();
  const candidate = trimmed.startsWith("//") ? `https:${trimmed}` : trimmed;
  if (!candidate) return undefined;
  try {
    const url = new URL(candidate);
    return url.protocol === "http:" || url.protocol === "https:" ? candidate : undefined;
  } catch {
    return undefined;
  }
}

function firstUrl(record: Record<string, unknown>, fields: readonly string[]): string | undefined {
  for (const field of fields) {
    const url = absoluteUrl(text(record, field));
    if (url) return url;
  }
  return undefined;
}

function clip(value: string, limit: number | undefined): string {
  if (!limit || value.length <= limit) return value;
  return `${value.slice(0, limit).trimEnd()}...`;
}

function mapResult(entry: unknown, category: SearchCategory, snippetLength?: number): SearchResult | undefined {
  if (!isRecord(entry)) return undefined;

  const title = text(entry, "title").trim();
  const url = absoluteUrl(text(entry, "url"));
  if (!title || !url) return undefined;

  const engines = Array.isArray(entry.engines)
    ? entry.engines.filter((engine): engine is string => typeof engine === "string")
    : [];

  const result: SearchResult = {
    title,
    url,
    snippet: clip(text(entry, "content").trim(), snippetLength),
    engine_source: text(entry, "engine") || engines[0] || "",
    engines,
  };

  if (category !== "text") {
    const thumbnail = firstUrl(entry, THUMBNAIL_FIELDS[category]);
    const media = firstUrl(entry, MEDIA_FIELDS[category]);
    if (!thumbnail && !media) return undefined;
    if (thumbnail) result.thumbnail_url = thumbnail;
    if (media) result.media_url = media;
  }

  const published = text(entry, "publishedDate");
  if (published) result.published_date = published;

  if (category === "video") {
    const length = entry.length;
    if (typeof length === "string" && length) result.duration = length;
    if (typeof length === "number") result.duration = String(length);
    const author = text(entry, "author");
    if (author) result.author = author;
  }

  return result;
}

/**
 * Map a raw SearXNG response, keeping backend rank order.
 * Entries without a title or absolute URL are dropped, as are image/video
 * entries with neither a thumbnail nor a media URL. At most `maxResults` survive.
 */
export function mapSearchResponse(
  raw: RawSearchResponse,
  category: SearchCategory,
  options: MapOptions
): SearchResponse {
  const results: SearchResult[] = [];
  for (const entry of raw.results) {
    if (results.length >= options.maxResults) break;
    const result = mapResult(entry, category, options.snippetLength);
    if (result) results.push(result);
  }

  const response: SearchResponse = {
    query: raw.query || options.query,
    page: options.page,
    results,
    suggestions: raw.suggestions,
    corrections: raw.corrections,
    unresponsive_engines: raw.unresponsive_engines,
  };
  if (raw.number_of_results > 0) {
    response.total_estimated = Math.round(raw.number_of_results);
  }
  return response;
}
