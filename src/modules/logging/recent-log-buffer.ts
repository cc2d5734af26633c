import { parseLogLevel, type LogCategory, type LogLevel } from './log-levels';

/**
 * A single structured log entry.
 * In JSON format mode these are emitted as one JSON line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  requestId?: string;
  method?: string;
  path?: string;
  durationMs?: number;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
}

export interface RecentLogQuery {
  /** Newest entries kept after filtering (default 100). */
  limit?: number;
  /** Minimum level. */
  level?: LogLevel;
  category?: LogCategory;
  requestId?: string;
}

export const RECENT_LOG_CAPACITY = 500;
export const DEFAULT_RECENT_LOG_LIMIT = 100;

/** Fixed-size window over the latest entries, oldest first. */
export class RecentLogBuffer {
  private readonly entries: StructuredLogEntry[] = [];

  constructor(private readonly capacity: number = RECENT_LOG_CAPACITY) {}

  get size(): number {
    return this.entries.length;
  }

  push(entry: StructuredLogEntry): void {
    this.entries.push(entry);
    const overflow = this.entries.length - this.capacity;
    if (overflow > 0) {
      this.entries.splice(0, overflow);
    }
  }

  query({ limit = DEFAULT_RECENT_LOG_LIMIT, level, category, requestId }: RecentLogQuery = {}): StructuredLogEntry[] {
    const matches = this.entries.filter(
      (entry) =>
        (level === undefined || parseLogLevel(entry.level) >= level) &&
        (category === undefined || entry.category === category) &&
        (requestId === undefined || entry.requestId === requestId),
    );
    return limit > 0 ? matches.slice(-limit) : [];
  }

  clear(): void {
    this.entries.length = 0;
  }
}

