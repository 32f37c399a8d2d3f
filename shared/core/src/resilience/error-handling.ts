/**
 * Shared Error Handling Utilities
 *
 * Consistent error formatting for logs and API responses. The error classes
 * themselves live in @regionguard/types and are re-exported here.
 */

import { ErrorCode, ResilienceError } from '@regionguard/types';

export {
  ErrorCode,
  ErrorSeverity,
  ResilienceError,
  ProbeFailure,
  ModelFailure,
  ActionFailure,
  ConfigurationError,
  ValidationError,
  TimeoutError,
} from '@regionguard/types';

/**
 * Extract a message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Format error for logging.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof ResilienceError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { message: getErrorMessage(error) };
}

/**
 * Format error for API response.
 */
export function formatErrorForResponse(error: unknown): {
  code: number;
  message: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof ResilienceError) {
    return {
      code: error.code,
      message: error.message,
      details: error.context,
    };
  }

  return {
    code: ErrorCode.UNKNOWN_ERROR,
    message: getErrorMessage(error),
  };
}
