/**
 * Generate action - loads config, runs BuiltinGenerator, maps failures to
 * exit codes.
 */

import { resolve } from 'path';
import {
  BuiltinGenerator,
  ExitCode,
  GeneratorError,
  ParseError,
  closeLogger,
  createLogger,
  isLogLevel,
  loadConfig,
  type ExitCodeValue,
  type GeneratorPaths,
  type LogLevel,
  type Logger,
} from '@bifgen/core';
import type { CliIO } from '../io.js';
import { reportError } from '../utils/errorFormatter.js';

export interface GenerateOptions {
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
  logLevel?: string;
  logFile?: string;
}

/**
 * Determine log level from CLI options.
 * Priority: --log-level > --quiet > --verbose > default ('warnings')
 */
export function getLogLevel(options: GenerateOptions): LogLevel {
  if (isLogLevel(options.logLevel)) {
    return options.logLevel;
  }
  if (options.quiet) return 'silent';
  if (options.verbose) return 'info';
  return 'warnings';
}

export async function generateAction(paths: GeneratorPaths, options: GenerateOptions, io: CliIO): Promise<ExitCodeValue> {
  const logFile = options.logFile ? resolve(io.cwd, options.logFile) : undefined;

  let logger: Logger;
  try {
    logger = createLogger(getLogLevel(options), { logFile, sink: io.console });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    reportError(io.stderr, message, ['Check the --log-file path']);
    return ExitCode.BadArgs;
  }

  let exitCode: ExitCodeValue;
  try {
    const config = loadConfig(io.cwd, logger, options.config);
    const generator = new BuiltinGenerator({ config, logger });
    generator.run({
      builtins: resolve(io.cwd, paths.builtins),
      overloads: resolve(io.cwd, paths.overloads),
      declarations: resolve(io.cwd, paths.declarations),
      definitions: resolve(io.cwd, paths.definitions),
      aliases: resolve(io.cwd, paths.aliases),
    });
    exitCode = ExitCode.Ok;
  } catch (err) {
    exitCode = reportFailure(err, io, logger);
  }

  try {
    await closeLogger(logger);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    reportError(io.stderr, `Log file write failed: ${message}`);
  }
  return exitCode;
}

function reportFailure(err: unknown, io: CliIO, logger: Logger): ExitCodeValue {
  if (err instanceof GeneratorError) {
    logger.debug('Generation failed', { ...err.toJSON() });
    const title = err instanceof ParseError ? err.format() : err.message;
    reportError(io.stderr, title, err.suggestion ? [err.suggestion] : undefined);
    return err.exitCode;
  }

  const message = err instanceof Error ? err.message : String(err);
  reportError(io.stderr, `Internal error: ${message}`);
  return ExitCode.InternalError;
}
