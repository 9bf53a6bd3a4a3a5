// src/core/logging/logger.ts
import { createWriteStream, type WriteStream } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
  };
}

/**
 * Destination for formatted log entries.
 * Sinks that hold a resource (file handle) release it in `close`.
 */
export interface LogSink {
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

export function formatLogLine(entry: LogEntry): string {
  let line = `${entry.timestamp} - ${entry.level.toUpperCase()} - ${entry.message}`;

  if (entry.context) {
    const pairs = Object.entries(entry.context)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${formatValue(value)}`);
    if (pairs.length > 0) {
      line += ` ${pairs.join(' ')}`;
    }
  }

  if (entry.error) {
    line += `: ${entry.error.message}`;
  }

  return line;
}

export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const line = formatLogLine(entry);
    if (entry.level === 'error' || entry.level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Appends one line per entry to a log file; never truncates.
 * A file that cannot be opened or written is reported once on stderr, and
 * later entries are dropped.
 */
export class FileSink implements LogSink {
  private stream: WriteStream;
  private failed = false;

  constructor(filePath: string) {
    this.stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    this.stream.on('error', error => {
      if (this.failed) return;
      this.failed = true;
      console.error(`Error: cannot write log file ${filePath}:`, error.message);
    });
  }

  write(entry: LogEntry): void {
    if (this.failed) return;
    this.stream.write(`${formatLogLine(entry)}\n`);
  }

  close(): Promise<void> {
    if (this.stream.closed) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.stream.once('close', () => resolve());
      this.stream.end();
    });
  }
}

/** Keeps entries in memory; used by tests and dry inspection. */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  lines(): string[] {
    return this.entries.map(formatLogLine);
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  sinks?: LogSink[];
  context?: LogContext;
  now?: () => Date;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly sinks: LogSink[];
  private readonly context: LogContext;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.sinks = options.sinks ?? [new ConsoleSink()];
    this.context = options.context ?? {};
    this.now = options.now ?? (() => new Date());
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log('error', message, context, error);
  }

  async close(): Promise<void> {
    for (const sink of this.sinks) {
      if (sink.close) {
        await sink.close();
      }
    }
  }

  private log(level: LogLevel, message: string, extra?: LogContext, error?: unknown): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
    };

    const combined = { ...this.context, ...extra };
    if (Object.keys(combined).length > 0) {
      entry.context = combined;
    }

    if (error !== undefined) {
      const err = error instanceof Error ? error : new Error(String(error));
      entry.error = { name: err.name, message: err.message };
    }

    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }
}

/** Logger that drops everything; default for components built without one. */
export function createSilentLogger(): Logger {
  return new Logger({ sinks: [] });
}
