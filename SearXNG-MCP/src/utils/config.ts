/**
 * Configuration loading for SearXNG MCP.
 * Read once at startup, validated, frozen and passed to each component.
 */

import { z } from "zod";
import { ConfigurationError } from "@searxng-mcp/shared/Types/errors.js";
import { formatZodIssues } from "@searxng-mcp/shared/Types/tools.js";
import { getEnvFloat, getEnvInt, getEnvString, type Env } from "@searxng-mcp/shared/Utils/config.js";
import { parseLogLevel } from "@searxng-mcp/shared/Utils/logger.js";

export const DEFAULT_SEARXNG_URL = "http://localhost:8080";
export const DEFAULT_USER_AGENT = "searxng-mcp/1.0.0";

const TRANSPORT_ALIASES: Record<string, "stdio" | "sse"> = {
  stdio: "stdio",
  pipe: "stdio",
  sse: "sse",
  http: "sse",
  network: "sse",
};

export const ConfigSchema = z.object({
  searxngUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: "must be an http(s) URL" })
    .transform((value) => value.replace(/\/+$/, "")),
  timeoutSeconds: z.number().positive().max(300),
  maxResults: z.number().int().min(1).max(100),
  // 0 keeps snippets whole
  snippetLength: z.number().int().min(0).max(10000),
  // Extra attempts after a connection reset; 0 means a single attempt
  retries: z.number().int().min(0).max(3),
  safesearch: z.union([z.literal(0), z.literal(1), z.literal(2)]),
  language: z.string().min(1).optional(),
  userAgent: z.string().min(1),

  transport: z.string().transform((value, ctx) => {
    const mode = TRANSPORT_ALIASES[value.toLowerCase()];
    if (!mode) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown transport "${value}" (use stdio or sse)` });
      return z.NEVER;
    }
    return mode;
  }),
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  authToken: z.string().min(1).optional(),

  logLevel: z.string().transform((value, ctx) => {
    const level = parseLogLevel(value);
    if (!level) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level "${value}"` });
      return z.NEVER;
    }
    return level;
  }),
});

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    searxngUrl: getEnvString("SEARXNG_URL", DEFAULT_SEARXNG_URL, env),
    timeoutSeconds: getEnvFloat("SEARXNG_TIMEOUT", 30, env),
    maxResults: getEnvInt("SEARXNG_MAX_RESULTS", 10, env),
    snippetLength: getEnvInt("SEARXNG_SNIPPET_LENGTH", 0, env),
    retries: getEnvInt("SEARXNG_RETRIES", 0, env),
    safesearch: getEnvInt("SEARXNG_SAFESEARCH", 1, env),
    language: getEnvString("SEARXNG_LANGUAGE", undefined, env),
    userAgent: getEnvString("SEARXNG_USER_AGENT", DEFAULT_USER_AGENT, env),

    transport: getEnvString(["MCP_TRANSPORT", "TRANSPORT"], "stdio", env),
    host: getEnvString("MCP_HOST", "127.0.0.1", env),
    port: getEnvInt(["MCP_PORT", "PORT"], 3000, env),
    authToken: getEnvString("MCP_AUTH_TOKEN", undefined, env),

    logLevel: getEnvString("LOG_LEVEL", "info", env),
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatZodIssues(result.error)}`,
      result.error.flatten().fieldErrors
    );
  }

  return Object.freeze(result.data);
}
