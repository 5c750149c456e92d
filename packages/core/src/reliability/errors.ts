/**
 * Error Taxonomy
 *
 * Standard error types for the build and release pipeline.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error knows whether it halts its scope
 * - Every error maps to an exit code
 *
 * Advisory conditions are not errors; they are recorded as warnings
 * (see WarningKind) and never change the exit status.
 *
 * @module @libforge/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes
 */
export type ForgeErrorCode =
  // Dependency verification
  | 'TOOL_MISSING'
  | 'VERSION_TOO_LOW'
  | 'VERSION_UNPARSEABLE'

  // Local build pipeline
  | 'PROJECT_DIRECTORY_MISSING'
  | 'MANAGED_BUILD_FAILED'
  | 'NO_ARTIFACTS_FOUND'
  | 'WORKSPACE_BUILD_FAILED'
  | 'STEP_FAILED'

  // Matrix and release
  | 'MATRIX_CELL_CRITICAL'
  | 'RELEASE_DIRECTORY_MISSING'
  | 'PUBLISH_FAILED'

  // Internal
  | 'CONFIGURATION_ERROR'
  | 'INTERRUPTED'
  | 'UNHANDLED_ERROR';

/**
 * Advisory failure kinds. Logged with detail, never escalated.
 */
export const WARNING_KINDS = [
  'SYNC_WARNING',
  'PROTO_COPY_WARNING',
  'PARTIAL_SYSTEMS_BUILD',
  'TEST_FAILURE',
  'MATRIX_CELL_DEGRADED',
  'CELL_STEP_WARNING',
] as const;

export type WarningKind = (typeof WARNING_KINDS)[number];

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Forge error options
 */
export interface ForgeErrorOptions {
  /** Error code */
  code: ForgeErrorCode;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base error class
 *
 * All pipeline errors extend this for consistent handling.
 */
export class ForgeError extends Error {
  readonly code: ForgeErrorCode;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;
  readonly timestamp: Date;

  constructor(message: string, options: ForgeErrorOptions) {
    super(message);
    this.name = 'ForgeError';
    this.code = options.code;
    this.context = options.context;
    this.cause = options.cause;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

// =============================================================================
// Specific Error Types
// =============================================================================

/**
 * A required toolchain could not be run
 */
export class ToolMissingError extends ForgeError {
  readonly tool: string;

  constructor(tool: string, options?: { context?: Record<string, unknown>; cause?: Error }) {
    super(`${tool} is not installed or not in PATH`, {
      code: 'TOOL_MISSING',
      context: { tool, ...options?.context },
      cause: options?.cause,
    });
    this.name = 'ToolMissingError';
    this.tool = tool;
  }
}

/**
 * The managed runtime is older than the pipeline supports
 */
export class VersionTooLowError extends ForgeError {
  readonly found: string;
  readonly foundValue: number;
  readonly required: number;

  constructor(tool: string, found: string, foundValue: number, required: number) {
    super(
      `${tool} version is ${found} (${foundValue}), which is below the required ${required}`,
      {
        code: 'VERSION_TOO_LOW',
        context: { tool, found, foundValue, required },
      }
    );
    this.name = 'VersionTooLowError';
    this.found = found;
    this.foundValue = foundValue;
    this.required = required;
  }
}

/**
 * A step whose failure is fatal exited unsuccessfully
 */
export class FatalStepError extends ForgeError {
  readonly stepName: string;
  readonly exitCode: number | null;

  constructor(
    code: ForgeErrorCode,
    stepName: string,
    exitCode: number | null,
    options?: { context?: Record<string, unknown>; cause?: Error }
  ) {
    const suffix = exitCode === null ? '' : ` (exit code: ${exitCode})`;
    super(`Failed: ${stepName}${suffix}`, {
      code,
      context: { stepName, exitCode, ...options?.context },
      cause: options?.cause,
    });
    this.name = 'FatalStepError';
    this.stepName = stepName;
    this.exitCode = exitCode;
  }
}

/**
 * Configuration error - invalid config file, env var, or flag
 */
export class ConfigurationError extends ForgeError {
  readonly fieldErrors?: Record<string, string>;

  constructor(
    message: string,
    options?: {
      fieldErrors?: Record<string, string>;
      context?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      context: options?.context,
      cause: options?.cause,
    });
    this.name = 'ConfigurationError';
    this.fieldErrors = options?.fieldErrors;
  }
}

/**
 * Host interrupt (SIGINT / SIGTERM)
 */
export class InterruptedError extends ForgeError {
  readonly signal: string;

  constructor(signal: string = 'SIGINT') {
    super(`Build interrupted by ${signal}`, {
      code: 'INTERRUPTED',
      context: { signal },
    });
    this.name = 'InterruptedError';
    this.signal = signal;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Map error to CLI exit code
 */
export function toExitCode(error: unknown): number {
  if (!(error instanceof ForgeError)) {
    return 1; // Generic error
  }

  switch (error.code) {
    // Dependency verification (20-29)
    case 'TOOL_MISSING':
      return 20;
    case 'VERSION_TOO_LOW':
      return 21;
    case 'VERSION_UNPARSEABLE':
      return 22;

    // Build pipeline (30-39)
    case 'PROJECT_DIRECTORY_MISSING':
      return 30;
    case 'MANAGED_BUILD_FAILED':
      return 31;
    case 'NO_ARTIFACTS_FOUND':
      return 32;
    case 'WORKSPACE_BUILD_FAILED':
      return 33;
    case 'STEP_FAILED':
      return 34;

    // Matrix and release (40-49)
    case 'MATRIX_CELL_CRITICAL':
      return 40;
    case 'RELEASE_DIRECTORY_MISSING':
      return 41;
    case 'PUBLISH_FAILED':
      return 42;

    // Internal
    case 'CONFIGURATION_ERROR':
      return 50;
    case 'INTERRUPTED':
      return 130;
    case 'UNHANDLED_ERROR':
      return 1;

    default:
      return 1;
  }
}

/**
 * Wrap any error as a ForgeError
 */
export function wrapError(error: unknown, defaults?: Partial<ForgeErrorOptions>): ForgeError {
  if (error instanceof ForgeError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new ForgeError(message, {
    code: defaults?.code ?? 'UNHANDLED_ERROR',
    cause,
    ...defaults,
  });
}
