/**
 * bifgen command definition
 */

import { Command, CommanderError, Option } from 'commander';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { ExitCode, LOG_LEVELS, PROGRAM_NAME, UsageError, readPackageVersion, type ExitCodeValue } from '@bifgen/core';
import { generateAction, type GenerateOptions } from './commands/generateAction.js';
import { processIO, type CliIO } from './io.js';
import { reportError } from './utils/errorFormatter.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));

export const CLI_VERSION: string = readPackageVersion(__dirname);

/**
 * Run bifgen with the given arguments (without node and script path).
 *
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO()): Promise<ExitCodeValue> {
  let exitCode: ExitCodeValue = ExitCode.Ok;

  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description('Generate builtin function tables from builtin and overload definition files')
    .version(CLI_VERSION)
    .argument('<builtins>', 'Builtin definition file')
    .argument('<overloads>', 'Overload definition file')
    .argument('<declarations>', 'Declarations header to generate')
    .argument('<definitions>', 'Definitions source to generate')
    .argument('<aliases>', 'Macro alias header to generate')
    .option('-c, --config <path>', 'Config file (default: bifgen.config.yaml in the working directory)')
    .option('-q, --quiet', 'Suppress all log output')
    .option('-v, --verbose', 'Show progress logs')
    .addOption(new Option('--log-level <level>', 'Set log level').choices(LOG_LEVELS))
    .option('--log-file <path>', 'Write all log output to a file')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
      // Parse errors are reported as UsageError below
      outputError: () => undefined,
    })
    .action(
      async (
        builtins: string,
        overloads: string,
        declarations: string,
        definitions: string,
        aliases: string,
        options: GenerateOptions,
      ) => {
        exitCode = await generateAction({ builtins, overloads, declarations, definitions, aliases }, options, io);
      },
    );

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version end with exit code 0
      if (err.exitCode === 0) {
        return ExitCode.Ok;
      }
      return reportUsage(toUsageError(err), io);
    }
    throw err;
  }
  return exitCode;
}

function toUsageError(err: CommanderError): UsageError {
  return new UsageError(err.message.replace(/^error: /, ''), `Run '${PROGRAM_NAME} --help' for usage`);
}

function reportUsage(err: UsageError, io: CliIO): ExitCodeValue {
  reportError(io.stderr, err.message, err.suggestion ? [err.suggestion] : undefined);
  return err.exitCode;
}
