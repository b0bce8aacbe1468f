/**
 * Structured logging utility.
 *
 * Every engine component logs through a {@link Logger} so that a batch run
 * over many species produces one JSON object per line, filterable by
 * component and event.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: per-step diagnostics (grid sizes, candidate Tmid residuals)
 * - `info`: normal progress (species started, model fitted)
 * - `warn`: recoverable anomalies (a species failed inside a batch)
 * - `error`: failures the caller is expected to act on
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
   * @example "NASAFitter"
   */
  readonly component: string;

  /**
   * Brief snake_case description of the logged event.
   * @example "tmid_selected"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { label: "N2H4", tmid: 1000 }
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
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Destination for serialized lines (each ends with a newline).
   * Defaults to `process.stderr`.
   */
  readonly write?: (line: string) => void;

  /**
   * Clock used for timestamps (injectable for testing).
   */
  readonly now?: () => Date;
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'SpeciesPipeline', debugMode: true });
 * logger.info('species_started', { label: 'N2H4' });
 * logger.debug('thermo_grid', { points: 80 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.write =
      options.write ??
      ((line: string): void => {
        process.stderr.write(line);
      });
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Returns a logger for another component sharing this logger's sink,
   * clock and debug setting.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      write: this.write,
      now: this.now,
    });
  }

  /**
   * Logs a debug-level message. Only output when debugMode is enabled.
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
    const base: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values end up here.
      line = JSON.stringify({
        ...base,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.write(line + '\n');
  }
}

/**
 * Logger that discards every entry.
 */
export const silentLogger = new Logger({
  component: 'silent',
  write: (): void => {
    /* discarded */
  },
});
