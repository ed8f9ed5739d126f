/**
 * Logger Abstraction
 *
 * Console-backed logger shared by the CLI and every pipeline stage.
 * The level threshold and output format are set once at startup through
 * `configureLogger()`; stages receive their logger by injection and only
 * fall back to a prefixed logger from here.
 *
 * Supports both string messages (simple logging) and structured data objects
 * (JSON lines for log aggregators).
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

/**
 * Structured log entry.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'stage_complete', 'tool_executed') */
  readonly event: string;
  /** Optional message for human readability */
  readonly message?: string;
  /** Additional structured data */
  readonly [key: string]: unknown;
}

/**
 * Basic logger interface (string-based).
 */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

/**
 * Extended logger interface supporting structured logging.
 */
export interface StructuredLogger extends Logger {
  /**
   * Log structured data at the specified level.
   * In JSON mode, outputs one JSON line; otherwise a readable string.
   */
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

export interface LoggerSettings {
  /** Emit debug lines */
  readonly verbose: boolean;
  readonly format: LogFormat;
}

// ============================================================================
// Configuration
// ============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let settings: LoggerSettings = { verbose: false, format: 'text' };

/**
 * Applies logger settings. Called once by the CLI before the pipeline runs.
 */
export function configureLogger(next: Partial<LoggerSettings>): void {
  settings = { ...settings, ...next };
}

export function getLoggerSettings(): LoggerSettings {
  return settings;
}

function isEnabled(level: LogLevel): boolean {
  const threshold: LogLevel = settings.verbose ? 'debug' : 'info';
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

// ============================================================================
// String-Based Logger
// ============================================================================

/**
 * Root logger. Info and debug go to stdout, warnings and errors to stderr.
 */
export const logger: Logger = {
  info: (message: string) => {
    if (isEnabled('info')) console.log(message);
  },
  warn: (message: string) => {
    if (isEnabled('warn')) console.warn(message);
  },
  error: (message: string) => {
    if (isEnabled('error')) console.error(message);
  },
  debug: (message: string) => {
    if (isEnabled('debug')) console.log(message);
  },
};

/**
 * Creates a prefixed logger for specific modules.
 *
 * @example
 * const log = createPrefixedLogger('[Scout]');
 * log.info('Starting research'); // logs: "[Scout] Starting research"
 */
export function createPrefixedLogger(prefix: string): Logger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),
  };
}

// ============================================================================
// Structured Logger
// ============================================================================

/**
 * Formats a structured log entry as a readable string.
 */
export function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

/**
 * Formats a structured log entry as a JSON line.
 */
export function formatStructuredJson(
  prefix: string,
  level: LogLevel,
  entry: StructuredLogEntry,
  timestamp: string = new Date().toISOString()
): string {
  return JSON.stringify({
    timestamp,
    level,
    module: prefix.replace(/[[\]]/g, '').trim(),
    ...entry,
  });
}

/**
 * Creates a structured logger for specific modules.
 *
 * @example
 * const log = createStructuredLogger('[Pipeline]');
 * log.structured('info', {
 *   event: 'stage_complete',
 *   stage: 'scout',
 *   durationMs: 1500,
 *   stories: 12,
 * });
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  const base = createPrefixedLogger(prefix);

  return {
    ...base,
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted =
        settings.format === 'json'
          ? formatStructuredJson(prefix, level, entry)
          : formatStructuredEntry(prefix, entry);
      logger[level](formatted);
    },
  };
}
