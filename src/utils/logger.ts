/**
 * Structured logging for sesame.
 *
 * Every entry is one JSON line on stderr, so progress and diagnostics never mix
 * with the command output printed on stdout.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: per-candidate diagnostics, only emitted in debug mode
 * - `info`: run lifecycle and progress
 * - `warn`: anomalies that do not stop the run (unexpected verifier failures, torn ledger lines)
 * - `error`: failures that end the run
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /**
   * Severity level of the log entry.
   */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "VerificationLoop"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "candidate_rejected"
   */
  readonly event: string;

  /**
   * Additional structured data. Bigint values are written as decimal strings.
   * @example { attempted: 1000, skipped: 12 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'VerificationLoop', debugMode: true });
 * logger.info('run_started', { identity: 'report.xlsx' });
 * logger.warn('verifier_anomaly', { detail: 'exit code 139' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Whether debug entries are written.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Returns a logger for another component with the same debug setting.
   *
   * @param component - Component name for the new logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is on.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    let line: string;
    try {
      line = JSON.stringify(entry, bigintReplacer);
    } catch (error) {
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    process.stderr.write(line + '\n');
  }
}
