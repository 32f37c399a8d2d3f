/**
 * Resilience Module
 *
 * Error handling and recovery utilities including:
 * - Error handling: shared error classes and formatting helpers
 * - Retry mechanism: retry with exponential backoff
 *
 * @module resilience
 */

// Error Handling
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
  getErrorMessage,
  formatErrorForLog,
  formatErrorForResponse,
} from './error-handling';

// Retry Mechanism
export { RetryMechanism } from './retry-mechanism';
export type { RetryConfig, RetryResult } from './retry-mechanism';
