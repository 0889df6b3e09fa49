/**
 * Tool registry: lists the declared tools and dispatches calls to them.
 * Holds no per-call state, so concurrent dispatches never interact.
 */

import {
  createError,
  createErrorFromException,
  createSuccess,
  type StandardResponse,
} from "@searxng-mcp/shared/Types/StandardResponse.js";
import type { ToolContext, ToolDefinition, ToolMapEntry } from "@searxng-mcp/shared/Types/tools.js";
import { Logger } from "@searxng-mcp/shared/Utils/logger.js";

export class ToolRegistry {
  private readonly entries = new Map<string, ToolMapEntry>();
  private readonly logger: Logger;

  constructor(entries: readonly ToolMapEntry[], logger: Logger = new Logger("searxng:registry")) {
    this.logger = logger;
    for (const entry of entries) {
      if (this.entries.has(entry.tool.name)) {
        throw new Error(`Duplicate tool name: ${entry.tool.name}`);
      }
      this.entries.set(entry.tool.name, entry);
    }
  }

  list(): ToolDefinition[] {
    return Array.from(this.entries.values(), (entry) => entry.tool);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Validate and run one tool call. Never throws: every failure, including
   * bad input and unknown tool names, comes back as an error StandardResponse.
   */
  async dispatch(name: string, args: unknown, context: ToolContext): Promise<StandardResponse> {
    const entry = this.entries.get(name);
    if (!entry) {
      this.logger.warn("Unknown tool requested", { tool: name });
      return createError(`Unknown tool: ${name}`, "UNKNOWN_TOOL", { available: Array.from(this.entries.keys()) });
    }

    const startedAt = Date.now();
    try {
      const data = await entry.call(args ?? {}, context);
      this.logger.debug("Tool call completed", { tool: name, durationMs: Date.now() - startedAt });
      return createSuccess(data);
    } catch (error) {
      const response = createErrorFromException(error);
      this.logger.warn("Tool call failed", {
        tool: name,
        errorCode: response.errorCode,
        error: response.error,
        durationMs: Date.now() - startedAt,
      });
      return response;
    }
  }
}
