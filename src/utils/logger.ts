/**
 * Structured logging for nodeswap components.
 *
 * Every entry is a single JSON line on stderr so that operator-facing output
 * on stdout stays readable. Debug entries are only written when the logger was
 * created with `debugMode`, which is carried on the loaded configuration rather
 * than a process-wide flag.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry as written to stderr.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Component that produced the entry.
   * @example "QuorumManager"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "member_removed"
   */
  readonly event: string;

  /**
   * Additional JSON-serializable context.
   * @example { memberId: "8e9e05c52164694d", remaining: 2 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Structured logger that writes JSON lines to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'CommandExecutor', debugMode: config.cli.debug });
 * logger.debug('command_started', { args: ['get', 'bmh'] });
 * logger.warn('command_retry', { attempt: 2, delayMs: 3000 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /** Whether debug entries are written. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Creates a logger for another component that shares this logger's debug setting.
   *
   * @param component - Component name for the new logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debugMode is enabled.
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

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };

    const entry: LogEntry = data === undefined ? base : { ...base, data };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes a log entry, falling back to an entry without its data when the
 * data cannot be represented as JSON (circular references, BigInt values).
 *
 * @param entry - The entry to serialize.
 * @returns A single-line JSON string.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: message,
      originalData: '[unserializable]',
    });
  }
}

/**
 * Creates a logger for a component.
 *
 * @param component - Component name.
 * @param debugMode - Whether debug entries are written.
 */
export function createLogger(component: string, debugMode = false): Logger {
  return new Logger({ component, debugMode });
}
