/**
 * Shared logger for MCP services
 * Uses console.error for ALL log levels to keep stdout clean for MCP JSON-RPC protocol
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
};

/**
 * Parse a level name, case-insensitively. `warning` is accepted as `warn`.
 * Returns undefined for anything unrecognised.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  return LEVEL_ALIASES[value.trim().toLowerCase()];
}

/**
 * JSON replacer that serializes Error objects (whose properties are non-enumerable).
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    return obj;
  }
  return value;
}

export class Logger {
  private level: LogLevel;
  private context: string;
  private readonly children: Logger[] = [];

  constructor(context: string = 'mcp', level?: LogLevel) {
    this.context = context;
    this.level = level ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      console.error(this.formatMessage(level, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Create a child logger with additional context.
   * Children follow later setLevel() calls on their parent.
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`, this.level);
    this.children.push(child);
    return child;
  }

  /**
   * Set the context prefix (e.g. service name) for this logger.
   * Call early at startup so child loggers inherit the correct prefix.
   */
  setContext(context: string): void {
    this.context = context;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    for (const child of this.children) {
      child.setLevel(level);
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/** Default logger instance */
export const logger = new Logger();
