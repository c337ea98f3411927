/**
 * Logger - Lightweight logging for the compiler and CLI
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context support for structured logging
 * - Console (stderr) and file output, or both via MultiLogger
 * - In-memory capture for tooling that inspects log output
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Compiled rules', { statements: 42 });
 *
 *   const logger = createLogger('info', { logFile: '.layoutforge/compile.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@layoutforge/types';

export type { Logger, LogLevel };

type LogMethod = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Minimum level required for each method
 */
const METHOD_LEVELS: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_LABELS: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

/**
 * Safe JSON stringify that handles circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

/**
 * Format log message with optional context
 */
export function formatLogMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Shared level filtering. Subclasses decide where a line goes.
 */
abstract class LevelLogger implements Logger {
  private readonly priority: number;

  constructor(readonly level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: LogMethod, message: string, context?: Record<string, unknown>): void;

  private emit(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_LEVELS[method]) return;
    this.write(method, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.emit('trace', message, context);
  }
}

/**
 * Console Logger. Writes to stderr so that compiler output on stdout stays
 * machine-readable.
 */
export class ConsoleLogger extends LevelLogger {
  private readonly sink: (line: string) => void;

  constructor(logLevel: LogLevel = 'info', sink?: (line: string) => void) {
    super(logLevel);
    this.sink = sink ?? ((line) => process.stderr.write(line + '\n'));
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    this.sink(formatLogMessage(`[${METHOD_LABELS[method]}] ${message}`, context));
  }
}

/**
 * Recorded log entry (MemoryLogger)
 */
export interface LogEntry {
  level: LogMethod;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Logger that keeps entries in memory.
 */
export class MemoryLogger extends LevelLogger {
  readonly entries: LogEntry[] = [];

  constructor(logLevel: LogLevel = 'debug') {
    super(logLevel);
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    this.entries.push(context ? { level: method, message, context } : { level: method, message });
  }

  messages(level?: LogMethod): string[] {
    return this.entries.filter(e => level === undefined || e.level === level).map(e => e.message);
  }
}

/**
 * File-based Logger
 *
 * Writes timestamped lines through a write stream. The file is truncated on
 * construction and parent directories are created.
 */
export class FileLogger extends LevelLogger {
  private readonly stream: WriteStream;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    const resolvedPath = resolve(filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });

    let isDirectory = false;
    try {
      isDirectory = statSync(resolvedPath).isDirectory();
    } catch {
      // File does not exist yet
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err) => {
      process.stderr.write(`[WARN] Log file write failed: ${err.message}\n`);
    });
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatLogMessage(`${timestamp} [${METHOD_LABELS[method]}] ${message}`, context) + '\n');
  }

  /** Flush and close the write stream. */
  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(done);
    });
  }
}

/**
 * Delegates to several loggers; each applies its own level filter.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger with the specified level.
 *
 * With logFile, console and file both receive output; the file always
 * captures at 'debug' level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}
