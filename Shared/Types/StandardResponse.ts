import { BaseError } from './errors.js';
import { isRecord } from '../Utils/guards.js';

/**
 * Standardized response format used across all MCP tools
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  error?: string;
  errorCode?: string;
  errorDetails?: Record<string, unknown>;
  data?: T;
}

/**
 * Create a successful response with data
 */
export function createSuccess<T>(data: T): StandardResponse<T> {
  return { success: true, data };
}

/**
 * Create an error response, optionally with a structured error code and details.
 */
export function createError(
  error: string,
  errorCode?: string,
  errorDetails?: Record<string, unknown>,
): StandardResponse<never> {
  const response: StandardResponse<never> = { success: false, error };
  if (errorCode !== undefined) response.errorCode = errorCode;
  if (errorDetails !== undefined) response.errorDetails = errorDetails;
  return response;
}

/**
 * Create error from caught exception.
 * BaseError subclasses keep their code; details are forwarded when they are a plain object.
 * Stack traces are only attached when asked for, since tool errors travel to remote clients.
 */
export function createErrorFromException(error: unknown, includeStack: boolean = false): StandardResponse<never> {
  const response: StandardResponse<never> = {
    success: false,
    error: 'Unknown error',
  };

  if (error instanceof BaseError) {
    response.error = error.message;
    response.errorCode = error.code;
    if (isRecord(error.details)) response.errorDetails = { ...error.details };
  } else if (error instanceof Error) {
    response.error = error.message;
    response.errorCode = 'INTERNAL_ERROR';
  } else if (typeof error === 'string') {
    response.error = error;
    response.errorCode = 'UNKNOWN_ERROR';
  } else {
    response.error = String(error) || 'Unknown error occurred';
    response.errorCode = 'UNKNOWN_ERROR';
  }

  if (includeStack && error instanceof Error && error.stack) {
    response.errorDetails = { ...response.errorDetails, stack: error.stack };
  }

  return response;
}
