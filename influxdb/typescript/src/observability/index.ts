/**
 * Logging and export statistics for the InfluxDB exporter.
 */

// ============================================================================
// Logging
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Sensitive fields to redact from logs.
 */
const SENSITIVE_FIELDS = new Set(['password', 'token', 'authorization', 'secret']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redacts sensitive fields from an object.
 */
export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly format: 'json' | 'pretty';

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    format?: 'json' | 'pretty';
  } = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.format = options.format ?? 'pretty';
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const mergedContext = redactSensitive({ ...this.context, ...context });
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level].toUpperCase();

    if (this.format === 'json') {
      console.log(JSON.stringify({ timestamp, level: levelName, message, ...mergedContext }));
    } else {
      const contextStr = Object.keys(mergedContext).length > 0
        ? ` ${JSON.stringify(mergedContext)}`
        : '';
      console.log(`[${timestamp}] ${levelName}: ${message}${contextStr}`);
    }
  }
}

/**
 * No-op logger for disabled logging.
 */
export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(): Logger { return this; }
}

/**
 * Captured log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

/**
 * In-memory logger for testing.
 */
export class InMemoryLogger implements Logger {
  private logs: LogEntry[] = [];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.context = context;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    const child = new InMemoryLogger({ ...this.context, ...context });
    // Share the logs array
    child.logs = this.logs;
    return child;
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((log) => log.level === level);
  }

  hasLog(level: LogLevel, message: string): boolean {
    return this.logs.some((log) => log.level === level && log.message === message);
  }

  clear(): void {
    this.logs.length = 0;
  }

  private addLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.logs.push({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date(),
    });
  }
}

// ============================================================================
// Export statistics
// ============================================================================

/**
 * Counters kept by the export worker.
 */
export interface ExportStats {
  /** Snapshots accepted by addExport. */
  enqueued: number;
  /** Snapshots taken off the queue. */
  processed: number;
  /** Batches the server accepted. */
  sent: number;
  /** Batches dropped because a step failed. */
  failed: number;
  /** Snapshots that encoded to an empty body. */
  skipped: number;
}

/**
 * Mutable counter set behind {@link ExportStats}.
 */
export class ExportStatsRecorder {
  private readonly stats: ExportStats = {
    enqueued: 0,
    processed: 0,
    sent: 0,
    failed: 0,
    skipped: 0,
  };

  increment(counter: keyof ExportStats): void {
    this.stats[counter]++;
  }

  snapshot(): ExportStats {
    return { ...this.stats };
  }
}
