/**
 * Logger Abstraction
 *
 * Console-backed logger shared by the pipeline, its agents and scripts.
 * Messages below LOG_LEVEL are dropped.
 *
 * Supports both string messages (simple logging) and structured data objects
 * (production-friendly JSON logging for better parsing and analysis).
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log level for structured logging.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for production logging.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'stage_complete', 'session_quarantined') */
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
   * In production (JSON mode), outputs as JSON.
   * In development, formats as readable string.
   */
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
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

/**
 * Whether to output logs as JSON (for production log aggregators).
 * Controlled by LOG_FORMAT environment variable.
 */
const isJsonLogging = (): boolean => process.env.LOG_FORMAT === 'json';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Minimum level that reaches the console. Read on every call so tests and
 * scripts can change LOG_LEVEL at runtime.
 */
function getMinimumLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getMinimumLevel()];
}

// ============================================================================
// String-Based Logger
// ============================================================================

/**
 * Default logger implementation writing to the console.
 */
export const logger: Logger = {
  info: (message: string) => {
    if (isLevelEnabled('info')) console.log(message);
  },
  warn: (message: string) => {
    if (isLevelEnabled('warn')) console.warn(message);
  },
  error: (message: string) => {
    if (isLevelEnabled('error')) console.error(message);
  },
  debug: (message: string) => {
    if (isLevelEnabled('debug')) console.debug(message);
  },
};

/**
 * Creates a prefixed logger for specific modules.
 *
 * @example
 * const log = createPrefixedLogger('[Researcher]');
 * log.info('Starting research'); // logs: "[Researcher] Starting research"
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
 * Formats a structured log entry as a readable string for development.
 */
export function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

/**
 * Formats a structured log entry as JSON for production.
 */
export function formatStructuredJson(
  prefix: string,
  level: LogLevel,
  entry: StructuredLogEntry,
  timestamp: Date = new Date()
): string {
  return JSON.stringify({
    timestamp: timestamp.toISOString(),
    level,
    module: prefix.replace(/[[\]]/g, '').trim(),
    ...entry,
  });
}

/**
 * Creates a structured logger for specific modules.
 * Supports both string messages and structured data objects.
 *
 * @example
 * const log = createStructuredLogger('[Orchestrator]');
 * log.structured('info', {
 *   event: 'stage_complete',
 *   stage: 'research',
 *   durationMs: 1500,
 * });
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  const base = createPrefixedLogger(prefix);

  return {
    ...base,
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      logger[level](formatted);
    },
  };
}

/**
 * Logger that discards everything. Handy as a default for library callers
 * that do not want console output.
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
