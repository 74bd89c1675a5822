/**
 * Structured Logger with Multiple Sinks
 *
 * Single logging entry point for snipshot. User-facing messages ("SVG saved
 * to: ...", warnings, errors) and debug traces all go through here.
 *
 * Sinks:
 * - cli: plain messages for the terminal (default)
 * - console: timestamped lines with structured data, used under --debug
 * - memory: ring buffer for tests and programmatic access
 *
 * Usage:
 *   import { logger } from './integrations/utilities/logger.js';
 *   logger.info('SVG saved to: out.svg');
 *   logger.warn('Unknown extension, defaulting to SVG', { output });
 */

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Default context merged into every log entry */
  defaultContext?: Record<string, unknown>;
}

// ─── Level Priority ──────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

// ─── Sinks ───────────────────────────────────────────────────────────

/** CLI sink: bare messages; warnings and errors go to stderr with a prefix */
export class CliSink implements LogSink {
  write(entry: LogEntry): void {
    switch (entry.level) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(`Error: ${entry.message}`);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.error(`Warning: ${entry.message}`);
        break;
      case 'info':
        // eslint-disable-next-line no-console
        console.log(entry.message);
        break;
      default:
        // eslint-disable-next-line no-console
        console.error(`[${entry.level}] ${entry.message}`);
        break;
    }
  }
}

/** Console sink: timestamped output with structured data */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    const line = `${prefix} ${entry.message}${dataStr}`;

    if (entry.level === 'info') {
      // eslint-disable-next-line no-console
      console.log(line);
    } else {
      // eslint-disable-next-line no-console
      console.error(line);
    }
  }
}

/** Memory sink: ring buffer for programmatic queries */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private minLevel: LogLevel;
  private sinks: LogSink[];
  private defaultContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new CliSink()];
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Create a child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: { ...this.defaultContext, ...context },
    });
  }

  /** Update the minimum log level at runtime */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch {
        // A sink failure must not abort the render
      }
    }
  }
}

// ─── Global singleton ────────────────────────────────────────────────

/**
 * Global logger instance. Defaults to the CLI sink at 'info' level.
 * Call `configureLogger()` early in startup to customize.
 */
export let logger = new StructuredLogger();

/**
 * Reconfigure the global logger.
 *
 * Example:
 *   configureLogger({ level: 'debug', sinks: [new ConsoleSink()] });
 */
export function configureLogger(config: LoggerConfig): void {
  logger = new StructuredLogger(config);
}

/**
 * Create a logger for a specific component (adds component name to context).
 * Resolves the global logger at call time so a later `configureLogger()`
 * is honored.
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}
