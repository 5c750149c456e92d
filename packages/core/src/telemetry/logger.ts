/**
 * Structured Logger Module
 *
 * Provides structured logging with:
 * - Severity filtering
 * - Secret/token redaction
 * - Child loggers carrying step / stage / runtime fields
 * - Pluggable sinks (JSON to console by default)
 *
 * Every pipeline component receives a Logger explicitly; there is no
 * process-wide color or print state.
 *
 * @module @libforge/core/telemetry/logger
 */

// =============================================================================
// Logger Configuration
// =============================================================================

/**
 * Severity levels
 */
export const SEVERITIES = ['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * Receives every entry that passes the severity filter, after redaction
 */
export type LogSink = (entry: LogEntry) => void;

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Whether to pretty print JSON output */
  prettyPrint?: boolean;
  /** Additional default fields */
  defaultFields?: Record<string, unknown>;
  /** Custom redaction patterns */
  redactionPatterns?: RegExp[];
  /** Output sink; defaults to JSON on the console */
  sink?: LogSink;
}

/**
 * Default redaction patterns for sensitive data
 */
const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /ghp_[a-zA-Z0-9]{36}/g,            // GitHub personal access tokens
  /gho_[a-zA-Z0-9]{36}/g,            // GitHub OAuth tokens
  /ghs_[a-zA-Z0-9]{36}/g,            // GitHub Actions installation tokens
  /github_pat_[a-zA-Z0-9_]{22,}/g,   // GitHub fine-grained PATs
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi, // Bearer tokens
  /Authorization:\s*[^\s,;]+/gi,      // Authorization headers
];

/**
 * Severity level ordering (higher = more severe)
 */
const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5,
};

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

// =============================================================================
// Log Entry Types
// =============================================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  service: string;

  // Pipeline context
  stage?: string;
  step?: string;
  runtime?: string;
  eventName?: string;

  // Error details
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };

  // Additional data
  [key: string]: unknown;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Structured logger
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      prettyPrint: config.prettyPrint ?? false,
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
      sink: config.sink ?? ((entry) => this.output(entry)),
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  notice(message: string, data?: Record<string, unknown>): void {
    this.log('NOTICE', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('ERROR', message, { ...data, ...errorData });
  }

  critical(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('CRITICAL', message, { ...data, ...errorData });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log step start
   */
  stepStart(stepName: string, data?: Record<string, unknown>): void {
    this.info(stepName, {
      eventName: 'step.start',
      step: stepName,
      ...data,
    });
  }

  /**
   * Log step end. Advisory failures log at WARNING, fatal ones at ERROR.
   */
  stepEnd(
    stepName: string,
    status: 'success' | 'advisory' | 'fatal',
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity =
      status === 'success' ? 'NOTICE' : status === 'advisory' ? 'WARNING' : 'ERROR';
    const verb = status === 'success' ? 'Completed' : status === 'advisory' ? 'Continuing after failure' : 'Failed';
    this.log(severity, `${verb}: ${stepName}`, {
      eventName: `step.${status}`,
      step: stepName,
      durationMs,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    // Check minimum severity
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.config.minSeverity]) {
      return;
    }

    const entry = this.buildLogEntry(severity, message, data);

    // Redact sensitive data
    const redacted = this.redact(entry);

    this.config.sink(redacted);
  }

  private buildLogEntry(
    severity: Severity,
    message: string,
    data?: Record<string, unknown>
  ): LogEntry {
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      service: this.config.serviceName,

      // Default fields
      ...this.config.defaultFields,
    };

    // Merge additional data
    if (data) {
      Object.assign(entry, data);
    }

    return entry;
  }

  private formatError(error: unknown): Record<string, unknown> {
    if (!error) return {};

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        error: {
          message: error.message,
          stack: error.stack,
          code,
        },
      };
    }

    return {
      error: {
        message: String(error),
      },
    };
  }

  private redact(entry: LogEntry): LogEntry {
    const seen = new WeakSet<object>();
    const redacted: LogEntry = { ...entry, message: this.redactString(entry.message) };
    for (const [key, value] of Object.entries(entry)) {
      if (key === 'message') continue;
      redacted[key] = this.redactValue(value, seen);
    }
    return redacted;
  }

  private redactValue(value: unknown, seen: WeakSet<object>): unknown {
    if (typeof value === 'string') return this.redactString(value);
    if (typeof value !== 'object' || value === null) return value;

    if (seen.has(value)) return '[Circular]';
    seen.add(value);

    if (Array.isArray(value)) {
      return value.map((item) => this.redactValue(item, seen));
    }
    if (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null) {
      const copy: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        copy[key] = this.redactValue(item, seen);
      }
      return copy;
    }
    return value;
  }

  private redactString(text: string): string {
    let redacted = text;
    for (const pattern of this.redactionPatterns) {
      redacted = redacted.replace(pattern, '[REDACTED]');
    }
    return redacted;
  }

  private output(entry: LogEntry): void {
    const output = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    // Use appropriate console method based on severity
    switch (entry.severity) {
      case 'ERROR':
      case 'CRITICAL':
        console.error(output);
        break;
      case 'WARNING':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields
   */
  child(additionalFields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: {
        ...this.config.defaultFields,
        ...additionalFields,
      },
    });
  }
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a logger for a specific service
 */
export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    serviceName,
    ...config,
  });
}

/**
 * Logger that drops everything. Useful where output is irrelevant.
 */
export function createSilentLogger(): Logger {
  return new Logger({ serviceName: 'silent', sink: () => undefined });
}
