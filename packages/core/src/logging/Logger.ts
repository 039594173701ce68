/**
 * Logger - leveled logging for bifgen runs
 *
 * Console output goes through a ConsoleSink. `--log-file` adds a FileLogger
 * that records every message at debug level with a timestamp, whatever the
 * console level is.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Parsed builtin file', { builtins: 150 });
 */

import { createWriteStream, existsSync, mkdirSync, statSync, writeFileSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { LogLevel } from '@bifgen/types';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

/**
 * The console methods ConsoleLogger writes through.
 * Defaults to the global console; tests pass a capturing object.
 */
export type ConsoleSink = Pick<Console, 'error' | 'warn' | 'info' | 'debug'>;

type Severity = keyof Logger;

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/** Rank a level must reach for the severity to be written */
const SEVERITY_RANK: Record<Severity, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 4,
};

const TAGS: Record<Severity, string> = {
  error: '[ERROR]',
  warn: '[WARN]',
  info: '[INFO]',
  debug: '[DEBUG]',
  trace: '[TRACE]',
};

// Traces share the console's debug channel
const CONSOLE_METHODS: Record<Severity, keyof ConsoleSink> = {
  error: 'error',
  warn: 'warn',
  info: 'info',
  debug: 'debug',
  trace: 'debug',
};

/**
 * Message followed by its context as JSON. Contexts hold file names,
 * positions and counts only.
 */
export function formatMessage(message: string, context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} ${JSON.stringify(context)}`;
}

/**
 * Level filtering and line formatting; subclasses decide where a line goes.
 */
abstract class LeveledLogger implements Logger {
  private readonly rank: number;

  constructor(level: LogLevel) {
    this.rank = LEVEL_RANK[level];
  }

  protected abstract emit(severity: Severity, line: string): void;

  private log(severity: Severity, message: string, context?: LogContext): void {
    if (this.rank >= SEVERITY_RANK[severity]) {
      this.emit(severity, formatMessage(`${TAGS[severity]} ${message}`, context));
    }
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }
}

export class ConsoleLogger extends LeveledLogger {
  constructor(
    level: LogLevel = 'info',
    private readonly sink: ConsoleSink = console,
  ) {
    super(level);
  }

  protected emit(severity: Severity, line: string): void {
    this.sink[CONSOLE_METHODS[severity]](line);
  }
}

/**
 * Appends `<ISO timestamp> <line>` to a log file.
 *
 * The file is truncated on construction and its parent directories are
 * created. Throws if the path is a directory. Stream failures surface from
 * close().
 */
export class FileLogger extends LeveledLogger {
  private readonly stream: WriteStream;
  private streamError: Error | null = null;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    const path = resolve(filePath);
    mkdirSync(dirname(path), { recursive: true });
    if (existsSync(path) && statSync(path).isDirectory()) {
      throw new Error(`Cannot write log file: '${path}' is a directory`);
    }

    // Synchronous truncation reports an unwritable path here, not on close
    writeFileSync(path, '');
    this.stream = createWriteStream(path, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      if (this.streamError === null) {
        this.streamError = err;
      }
    });
  }

  protected emit(_severity: Severity, line: string): void {
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  /** Flush and close; rejects with the first stream error */
  close(): Promise<void> {
    return new Promise((resolvePromise, reject) => {
      this.stream.end(() => {
        if (this.streamError) {
          reject(this.streamError);
        } else {
          resolvePromise();
        }
      });
    });
  }
}

/**
 * Fans every call out to several loggers, each filtering on its own level.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: readonly Logger[]) {}

  error(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      await closeLogger(logger);
    }
  }
}

/**
 * Flush a logger returned by createLogger. Loggers without a file need
 * nothing.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}

/**
 * Console logger at `level`; with `logFile`, also a debug-level FileLogger.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string; sink?: ConsoleSink }): Logger {
  const consoleLogger = new ConsoleLogger(level, options?.sink);
  if (!options?.logFile) {
    return consoleLogger;
  }
  return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
}
