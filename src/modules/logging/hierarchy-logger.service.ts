import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
} from './log-levels';
import { RecentLogBuffer, type RecentLogQuery, type StructuredLogEntry } from './recent-log-buffer';

export type { StructuredLogEntry } from './recent-log-buffer';

/**
 * Correlation context attached to every log entry within a single request.
 */
export interface CorrelationContext {
  /** Propagated from the X-Request-Id header or generated. */
  requestId: string;
  method?: string;
  path?: string;
  startTime?: number;
}

const SENSITIVE_KEY = /secret|password|token|authorization|bearer/i;

const ANSI_BY_LEVEL: Partial<Record<LogLevel, string>> = {
  [LogLevel.TRACE]: '90',
  [LogLevel.DEBUG]: '36',
  [LogLevel.INFO]: '32',
  [LogLevel.WARN]: '33',
  [LogLevel.ERROR]: '31',
  [LogLevel.FATAL]: '35',
};

/** Redact sensitive keys and cap each value at `maxBytes` characters. */
export function sanitizeLogData(data: Record<string, unknown>, maxBytes: number): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEY.test(key)) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      result[key] = value.length > maxBytes ? `${value.slice(0, maxBytes)}...[truncated ${value.length - maxBytes}B]` : value;
    } else if (typeof value === 'object' && value !== null) {
      const serialized = JSON.stringify(value);
      result[key] = serialized.length > maxBytes ? `${serialized.slice(0, maxBytes)}...[truncated]` : value;
    } else {
      result[key] = value;
    }
  }
  return result;
}

function describeError(error: unknown): StructuredLogEntry['error'] | undefined {
  if (!error) return undefined;
  if (error instanceof Error) {
    return { message: error.message, name: error.name, stack: error.stack };
  }
  return { message: String(error) };
}

/**
 * HierarchyLogger: structured, leveled, correlation-aware logger.
 *
 * Levels and per-category overrides come from the environment and can be
 * changed at runtime through `/logs/config`. The latest entries are kept in
 * memory for `/logs/recent`.
 *
 * Usage:
 *   this.logger.info(LogCategory.MEMBERSHIP, 'User provisioned', { uid: 'jdoe' });
 */
@Injectable()
export class HierarchyLogger {
  private readonly config: LogConfig = buildDefaultLogConfig();
  private readonly correlation = new AsyncLocalStorage<CorrelationContext>();
  private readonly recent = new RecentLogBuffer();

  /** Run a function within a correlation context (typically per-request). */
  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return this.correlation.run(ctx, fn);
  }

  // ─── Configuration ────────────────────────────────────────────────

  getConfig(): LogConfig {
    return { ...this.config, categoryLevels: { ...this.config.categoryLevels } };
  }

  updateConfig(partial: Partial<LogConfig>): void {
    Object.assign(this.config, partial);
  }

  setGlobalLevel(level: LogLevel): void {
    this.config.globalLevel = level;
  }

  /** Pass undefined to drop the override and fall back to the global level. */
  setCategoryLevel(category: LogCategory, level: LogLevel | undefined): void {
    if (level === undefined) {
      delete this.config.categoryLevels[category];
    } else {
      this.config.categoryLevels[category] = level;
    }
  }

  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    const override = category === undefined ? undefined : this.config.categoryLevels[category];
    return level >= (override ?? this.config.globalLevel);
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, describeError(error));
  }

  // ─── Recent entries ───────────────────────────────────────────────

  getRecentLogs(query?: RecentLogQuery): StructuredLogEntry[] {
    return this.recent.query(query);
  }

  clearRecentLogs(): void {
    this.recent.clear();
  }

  // ─── Emission ─────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    error?: StructuredLogEntry['error'],
  ): void {
    if (!this.isEnabled(level, category)) return;

    const ctx = this.correlation.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      requestId: ctx?.requestId,
      method: ctx?.method,
      path: ctx?.path,
    };
    if (ctx?.startTime) {
      entry.durationMs = Date.now() - ctx.startTime;
    }
    if (error) {
      entry.error = { ...error };
      if (!this.config.includeStackTraces) delete entry.error.stack;
    }
    if (data) {
      entry.data = sanitizeLogData(data, this.config.maxPayloadSizeBytes);
    }

    this.recent.push(entry);

    if (this.config.format === 'json') {
      const stream = level >= LogLevel.WARN ? process.stderr : process.stdout;
      stream.write(`${JSON.stringify(entry)}\n`);
    } else {
      this.writePretty(level, entry);
    }
  }

  /** `HH:mm:ss.SSS LEVEL category [request] +ms message | error | data` */
  private writePretty(level: LogLevel, entry: StructuredLogEntry): void {
    const parts = [
      entry.timestamp.slice(11, 23),
      this.colorize(level, entry.level.padEnd(5)),
      entry.category.padEnd(11),
    ];
    if (entry.requestId) parts.push(`[${entry.requestId.slice(0, 8)}]`);
    if (entry.durationMs !== undefined) parts.push(`+${entry.durationMs}ms`);
    parts.push(entry.message);

    let line = parts.join(' ');
    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack) line += `\n${entry.error.stack}`;
    }
    if (entry.data && Object.keys(entry.data).length > 0) {
      const compact = JSON.stringify(entry.data);
      if (level <= LogLevel.DEBUG || compact.length <= 200) line += ` | ${compact}`;
    }

    /* eslint-disable no-console */
    if (level <= LogLevel.DEBUG) console.debug(line);
    else if (level === LogLevel.INFO) console.log(line);
    else if (level === LogLevel.WARN) console.warn(line);
    else console.error(line);
    /* eslint-enable no-console */
  }

  private colorize(level: LogLevel, text: string): string {
    const code = ANSI_BY_LEVEL[level];
    return process.stdout.isTTY && code ? `\x1b[${code}m${text}\x1b[0m` : text;
  }
}
