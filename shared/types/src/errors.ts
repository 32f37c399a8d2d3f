/**
 * Error Taxonomy
 *
 * Canonical error classes shared by every package. Only ConfigurationError is
 * fatal; the rest are handled locally by the component that raises them.
 *
 * - ProbeFailure: recorded as a zero-score sample
 * - ModelFailure: anomaly scorer degrades to a neutral score
 * - ActionFailure: retried with backoff, then surfaces as a standing alert
 * - ConfigurationError: aborts startup
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  NOT_FOUND = 1002,
  INVALID_STATE = 1005,

  // Probe errors (2000-2999)
  PROBE_FAILED = 2000,
  PROBE_TIMEOUT = 2001,

  // Model errors (3000-3999)
  MODEL_FIT_FAILED = 3000,
  MODEL_DEGENERATE_INPUT = 3001,

  // Remediation errors (4000-4999)
  ACTION_FAILED = 4000,
  ACTION_UNSUPPORTED = 4001,

  // Validation errors (6000-6999)
  VALIDATION_FAILED = 6000,
  INVALID_CONFIG = 6002,
}

export enum ErrorSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}

interface ResilienceErrorOptions {
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: Error;
}

// =============================================================================
// Base Class
// =============================================================================

/**
 * Base error with a code, severity and structured context for logging.
 */
export class ResilienceError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN_ERROR, options: ResilienceErrorOptions = {}) {
    super(message);
    this.name = 'ResilienceError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.context = options.context;
    this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
      cause: this.cause?.message,
    };
  }
}

// =============================================================================
// Taxonomy
// =============================================================================

export class ProbeFailure extends ResilienceError {
  readonly service: string;
  readonly region: string;

  constructor(message: string, options: { service: string; region: string; code?: ErrorCode; cause?: Error }) {
    super(message, options.code ?? ErrorCode.PROBE_FAILED, {
      severity: ErrorSeverity.WARNING,
      cause: options.cause,
      context: { service: options.service, region: options.region },
    });
    this.name = 'ProbeFailure';
    this.service = options.service;
    this.region = options.region;
  }
}

export class ModelFailure extends ResilienceError {
  constructor(message: string, options: { code?: ErrorCode; cause?: Error; context?: Record<string, unknown> } = {}) {
    super(message, options.code ?? ErrorCode.MODEL_FIT_FAILED, {
      severity: ErrorSeverity.WARNING,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'ModelFailure';
  }
}

export class ActionFailure extends ResilienceError {
  readonly actionId: string;

  constructor(message: string, options: { actionId: string; code?: ErrorCode; cause?: Error }) {
    super(message, options.code ?? ErrorCode.ACTION_FAILED, {
      severity: ErrorSeverity.ERROR,
      cause: options.cause,
      context: { actionId: options.actionId },
    });
    this.name = 'ActionFailure';
    this.actionId = options.actionId;
  }
}

/**
 * Invalid configuration. Carries every problem found, not only the first.
 */
export class ConfigurationError extends ResilienceError {
  readonly problems: readonly string[];

  constructor(message: string, problems: readonly string[] = []) {
    super(problems.length > 0 ? `${message}:\n${problems.map(p => `  - ${p}`).join('\n')}` : message, ErrorCode.INVALID_CONFIG, {
      severity: ErrorSeverity.CRITICAL,
      context: { problems },
    });
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export class ValidationError extends ResilienceError {
  readonly field?: string;

  constructor(message: string, options: { field?: string; code?: ErrorCode; context?: Record<string, unknown> } = {}) {
    super(message, options.code ?? ErrorCode.VALIDATION_FAILED, {
      severity: ErrorSeverity.WARNING,
      context: { ...options.context, field: options.field },
    });
    this.name = 'ValidationError';
    this.field = options.field;
  }
}

/**
 * Raised by withTimeout when an operation exceeds its budget.
 */
export class TimeoutError extends Error {
  constructor(
    /** What operation timed out */
    public readonly operation: string,
    /** The timeout duration in milliseconds */
    public readonly timeoutMs: number,
    /** Optional service name for context */
    public readonly service?: string
  ) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms${service ? ` in ${service}` : ''}`);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
