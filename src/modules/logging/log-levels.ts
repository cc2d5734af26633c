/**
 * Structured Log Levels: follows RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE : Full request/response bodies, raw directory entries.
 *   DEBUG : Per-item detail: each team created, each membership call.
 *   INFO  : Business events: user provisioned, franchise created, derivation finished.
 *   WARN  : Recoverable anomalies: drift, missing singleton, a skipped or failed batch item.
 *   ERROR : Failed operations: gateway unavailable, provisioning aborted.
 *   FATAL : Unrecoverable startup problems.
 *   OFF   : Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

/** String → enum mapping (case-insensitive). */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  // Look up named key; typeof check avoids numeric enum reverse-mapping ('0' → 'TRACE')
  const mapped: unknown = LogLevel[upper as keyof typeof LogLevel];
  if (typeof mapped === 'number') return mapped;
  const num = Number(upper);
  if (!isNaN(num) && num >= (LogLevel.TRACE as number) && num <= (LogLevel.OFF as number)) return num;
  return LogLevel.INFO;
}

/** Names accepted wherever a level is given as text. */
export const LOG_LEVEL_NAMES = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'OFF'] as const;

/** Exact lookup by name (case-insensitive); unlike parseLogLevel there is no fallback. */
export function findLogLevel(value: string): LogLevel | undefined {
  const index = LOG_LEVEL_NAMES.findIndex((name) => name === value.trim().toUpperCase());
  return index === -1 ? undefined : index;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/**
 * Log categories allow filtering by subsystem.
 */
export enum LogCategory {
  /** HTTP request/response lifecycle */
  HTTP = 'http',
  /** Directory gateway calls */
  DIRECTORY = 'directory',
  /** Groupware folder provisioning */
  FOLDER = 'folder',
  /** Franchise × division team derivation */
  DERIVATION = 'derivation',
  /** User provisioning and membership cascade */
  MEMBERSHIP = 'membership',
  /** Config vs. directory reconciliation */
  RECONCILE = 'reconcile',
  /** Configuration loading */
  CONFIG = 'config',
  /** General / uncategorized */
  GENERAL = 'general',
}

/**
 * Runtime-configurable log configuration.
 */
export interface LogConfig {
  /** Global minimum log level (default: INFO, overridden by LOG_LEVEL). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'derivation': LogLevel.DEBUG, 'http': LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum payload size to log in bytes (default: 8KB). Larger values are truncated. */
  maxPayloadSizeBytes: number;

  /** Output format: 'json' for structured (production), 'pretty' for human-readable (dev). */
  format: 'json' | 'pretty';
}

/** Build default log configuration from environment variables. */
export function buildDefaultLogConfig(): LogConfig {
  const isProd = process.env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(process.env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(process.env.LOG_CATEGORY_LEVELS),
    includeStackTraces: process.env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(process.env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd ? 'json' : parseFormat(process.env.LOG_FORMAT),
  };
}

function parseFormat(raw: string | undefined): LogConfig['format'] {
  return raw === 'json' ? 'json' : 'pretty';
}

export function isLogCategory(value: string): value is LogCategory {
  return (Object.values(LogCategory) as string[]).includes(value);
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "derivation=DEBUG,reconcile=WARN,http=TRACE"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
