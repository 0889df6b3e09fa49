/**
 * Base error class for all MCP services.
 * Carries a stable machine-readable `code` and optional structured `details`
 * that StandardResponse forwards to the caller.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Configuration-related errors (missing env vars, invalid config, etc.)
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Input validation errors (invalid parameters, schema validation failures)
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Network/connectivity errors
 */
export class NetworkError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'TIMEOUT_ERROR', details);
    this.name = 'TimeoutError';
  }
}

/**
 * The caller went away (request cancelled or connection closed) before the work finished.
 */
export class CancelledError extends BaseError {
  constructor(message: string = 'Operation cancelled', details?: unknown) {
    super(message, 'CANCELLED', details);
    this.name = 'CancelledError';
  }
}
