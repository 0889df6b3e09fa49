import { BaseError } from "@searxng-mcp/shared/Types/errors.js";

/**
 * SearXNG answered with a non-2xx status.
 */
export class BackendError extends BaseError {
  constructor(
    public readonly statusCode: number,
    public readonly bodyExcerpt: string
  ) {
    super(
      `SearXNG returned HTTP ${statusCode}${bodyExcerpt ? `: ${bodyExcerpt}` : ""}`,
      "BACKEND_ERROR",
      { statusCode, bodyExcerpt }
    );
    this.name = "BackendError";
  }
}

/**
 * SearXNG answered 2xx but the body is not a usable search response.
 */
export class ParseError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, "PARSE_ERROR", details);
    this.name = "ParseError";
  }
}

/**
 * Fatal problem while starting the service (port in use, transport failure).
 */
export class StartupError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, "STARTUP_ERROR", details);
    this.name = "StartupError";
  }
}
