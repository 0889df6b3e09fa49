/**
 * SearXNG JSON API client
 */

import { z } from "zod";
import { BaseError, CancelledError, NetworkError, TimeoutError } from "@searxng-mcp/shared/Types/errors.js";
import { formatZodIssues } from "@searxng-mcp/shared/Types/tools.js";
import { Logger } from "@searxng-mcp/shared/Utils/logger.js";
import type { Config } from "../utils/config.js";
import { BackendError, ParseError } from "../utils/errors.js";

export type SearchCategory = "text" | "image" | "video";

export type TimeRange = "day" | "month" | "year";

export type SafeSearchLevel = 0 | 1 | 2;

const CATEGORY_PARAM: Record<SearchCategory, string> = {
  text: "general",
  image: "images",
  video: "videos",
};

export interface SearchRequest {
  query: string;
  page: number;
  category: SearchCategory;
  language?: string;
  timeRange?: TimeRange;
  safesearch?: SafeSearchLevel;
}

const BODY_EXCERPT_LENGTH = 200;

// Socket-level failures worth one more attempt; refused/DNS errors are not
const RETRYABLE_CODES = new Set(["ECONNRESET", "EPIPE", "UND_ERR_SOCKET"]);

// SearXNG reports failing engines as [name, reason] pairs
function engineName(entry: unknown): string | undefined {
  if (typeof entry === "string") return entry;
  if (Array.isArray(entry) && typeof entry[0] === "string") return entry[0];
  return undefined;
}

const rawSearchResponseSchema = z.object({
  query: z.string().catch(""),
  number_of_results: z.number().catch(0),
  results: z.array(z.unknown()),
  suggestions: z.array(z.string()).catch([]),
  corrections: z.array(z.string()).catch([]),
  unresponsive_engines: z
    .array(z.unknown())
    .catch([])
    .transform((entries) => entries.map(engineName).filter((name): name is string => name !== undefined)),
});

export type RawSearchResponse = z.infer<typeof rawSearchResponseSchema>;

export type SearxngClientConfig = Pick<
  Config,
  "searxngUrl" | "timeoutSeconds" | "retries" | "safesearch" | "language" | "userAgent"
>;

function excerpt(body: string): string {
  const flat = body.replace(/\s+/g, " ").trim();
  return flat.length > BODY_EXCERPT_LENGTH ? `${flat.slice(0, BODY_EXCERPT_LENGTH)}...` : flat;
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const source: unknown = error.cause ?? error;
  if (typeof source === "object" && source !== null && "code" in source && typeof source.code === "string") {
    return source.code;
  }
  return undefined;
}

export class SearxngClient {
  private readonly logger: Logger;

  constructor(
    private readonly config: SearxngClientConfig,
    logger: Logger = new Logger("searxng:client")
  ) {
    this.logger = logger;
  }

  /**
   * Build the GET URL for a request, e.g.
   * `http://localhost:8080/search?q=rust&pageno=1&categories=general&format=json&safesearch=1`
   */
  buildUrl(request: SearchRequest): string {
    const params = new URLSearchParams({
      q: request.query,
      pageno: String(request.page),
      categories: CATEGORY_PARAM[request.category],
      format: "json",
      safesearch: String(request.safesearch ?? this.config.safesearch),
    });
    const language = request.language ?? this.config.language;
    if (language) params.set("language", language);
    if (request.timeRange) params.set("time_range", request.timeRange);
    return `${this.config.searxngUrl}/search?${params.toString()}`;
  }

  /**
   * Run one search against SearXNG.
   *
   * @param signal - aborts the outbound request when the caller goes away
   * @throws BackendError on a non-2xx status
   * @throws TimeoutError when `timeoutSeconds` elapses first
   * @throws ParseError when the body is not a SearXNG JSON response
   * @throws CancelledError when `signal` fires
   * @throws NetworkError when SearXNG cannot be reached
   */
  async search(request: SearchRequest, signal?: AbortSignal): Promise<RawSearchResponse> {
    const url = this.buildUrl(request);
    this.logger.debug("Searching SearXNG", { query: request.query, page: request.page, category: request.category });

    try {
      const response = await this.searchWithRetry(url, signal);
      this.logger.info("Search completed", {
        query: request.query,
        category: request.category,
        results: response.results.length,
      });
      return response;
    } catch (error) {
      this.logger.warn("Search failed", { query: request.query, category: request.category, error });
      throw error;
    }
  }

  private async searchWithRetry(url: string, signal: AbortSignal | undefined): Promise<RawSearchResponse> {
    const timeoutMs = Math.round(this.config.timeoutSeconds * 1000);

    for (let attempt = 0; ; attempt++) {
      const timeoutSignal = AbortSignal.timeout(timeoutMs);
      const requestSignal = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

      try {
        return await this.fetchOnce(url, requestSignal);
      } catch (error) {
        if (error instanceof BaseError) throw error;
        if (signal?.aborted) {
          throw new CancelledError("Search cancelled by the caller");
        }
        if (timeoutSignal.aborted) {
          throw new TimeoutError(
            `SearXNG did not answer within ${this.config.timeoutSeconds}s; try again or narrow the query`,
            { timeoutSeconds: this.config.timeoutSeconds }
          );
        }

        const code = errorCode(error);
        if (code && RETRYABLE_CODES.has(code) && attempt < this.config.retries) {
          this.logger.warn("Connection reset by SearXNG, retrying", { attempt: attempt + 1, code });
          continue;
        }
        const reason = code ?? (error instanceof Error ? error.message : String(error));
        throw new NetworkError(`Could not reach SearXNG at ${this.config.searxngUrl}: ${reason}`, { code });
      }
    }
  }

  private async fetchOnce(url: string, signal: AbortSignal): Promise<RawSearchResponse> {
    const response = await fetch(url, {
      method: "GET",
      headers: {
        Accept: "application/json",
        "User-Agent": this.config.userAgent,
      },
      signal,
    });
    const body = await response.text();

    if (!response.ok) {
      throw new BackendError(response.status, excerpt(body));
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new ParseError("SearXNG returned a body that is not JSON (is the json format enabled on the instance?)", {
        bodyExcerpt: excerpt(body),
      });
    }

    const parsed = rawSearchResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ParseError(`Unexpected SearXNG response: ${formatZodIssues(parsed.error)}`);
    }
    return parsed.data;
  }
}
