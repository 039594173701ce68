/**
 * GeneratorError - Error hierarchy for bifgen
 *
 * Every failure the generator can report maps to exactly one exit code,
 * so a build step can tell which phase failed.
 *
 * Error types:
 * - UsageError: wrong invocation (fatal)
 * - ConfigError: configuration parsing/validation errors (fatal)
 * - InputNotFoundError: an input file cannot be read (fatal)
 * - OutputNotCreatableError: an output file cannot be created (fatal)
 * - ParseError: grammar violation in an input file (fatal)
 * - WriteError: I/O failure while writing generated code (fatal)
 * - InternalError: a condition that should be unreachable (fatal)
 */

/**
 * Process exit codes, one per failure phase.
 */
export const ExitCode = {
  Ok: 0,
  BadArgs: 1,
  NoBuiltinFile: 2,
  NoOverloadFile: 3,
  NoDeclarationFile: 4,
  NoDefinitionFile: 5,
  NoAliasFile: 6,
  ParseBuiltin: 7,
  ParseOverload: 8,
  WriteDeclarations: 9,
  WriteDefinitions: 10,
  WriteAliases: 11,
  InternalError: 12,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

/** Which input file a failure belongs to */
export type InputKind = 'builtin' | 'overload';

/** Which generated artifact a failure belongs to */
export type OutputKind = 'declarations' | 'definitions' | 'aliases';

export type GeneratorPhase =
  | 'ARGS'
  | 'CONFIG'
  | 'OPEN'
  | 'PARSE_BUILTIN'
  | 'PARSE_OVERLOAD'
  | 'WRITE_DECLARATIONS'
  | 'WRITE_DEFINITIONS'
  | 'WRITE_ALIASES';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  /** 1-based column */
  column?: number;
  phase?: GeneratorPhase;
  [key: string]: unknown;
}

/**
 * JSON representation of GeneratorError
 */
export interface GeneratorErrorJSON {
  code: string;
  severity: 'fatal' | 'error' | 'warning';
  exitCode: ExitCodeValue;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all bifgen errors.
 */
export abstract class GeneratorError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: ExitCodeValue;
  readonly severity: 'fatal' | 'error' | 'warning' = 'fatal';
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): GeneratorErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      exitCode: this.exitCode,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Wrong invocation - bad positional argument count, unknown option
 *
 * Codes: ERR_BAD_ARGS
 */
export class UsageError extends GeneratorError {
  readonly code = 'ERR_BAD_ARGS';
  readonly exitCode = ExitCode.BadArgs;

  constructor(message: string, suggestion?: string) {
    super(message, { phase: 'ARGS' }, suggestion);
  }
}

/**
 * Configuration error - config.yaml parsing, validation
 *
 * Reported with the BadArgs exit code: a bad configuration is a bad invocation.
 * Codes: ERR_CONFIG_INVALID, ERR_CONFIG_NOT_FOUND
 */
export class ConfigError extends GeneratorError {
  readonly code: string;
  readonly exitCode = ExitCode.BadArgs;

  constructor(message: string, code: string = 'ERR_CONFIG_INVALID', context: ErrorContext = {}, suggestion?: string) {
    super(message, { phase: 'CONFIG', ...context }, suggestion);
    this.code = code;
  }
}

/**
 * An input definition file cannot be read
 *
 * Codes: ERR_NO_BUILTIN_FILE, ERR_NO_OVERLOAD_FILE
 */
export class InputNotFoundError extends GeneratorError {
  readonly code: string;
  readonly exitCode: ExitCodeValue;
  readonly input: InputKind;

  constructor(input: InputKind, filePath: string) {
    super(`Cannot find input ${input === 'builtin' ? 'built-in' : 'overload'} file '${filePath}'`, {
      filePath,
      phase: 'OPEN',
    });
    this.input = input;
    this.code = input === 'builtin' ? 'ERR_NO_BUILTIN_FILE' : 'ERR_NO_OVERLOAD_FILE';
    this.exitCode = input === 'builtin' ? ExitCode.NoBuiltinFile : ExitCode.NoOverloadFile;
  }
}

const OUTPUT_CODES: Record<OutputKind, { create: string; write: string; createExit: ExitCodeValue; writeExit: ExitCodeValue; phase: GeneratorPhase }> = {
  declarations: {
    create: 'ERR_NO_DECL_FILE',
    write: 'ERR_WRITE_DECL',
    createExit: ExitCode.NoDeclarationFile,
    writeExit: ExitCode.WriteDeclarations,
    phase: 'WRITE_DECLARATIONS',
  },
  definitions: {
    create: 'ERR_NO_DEF_FILE',
    write: 'ERR_WRITE_DEF',
    createExit: ExitCode.NoDefinitionFile,
    writeExit: ExitCode.WriteDefinitions,
    phase: 'WRITE_DEFINITIONS',
  },
  aliases: {
    create: 'ERR_NO_ALIAS_FILE',
    write: 'ERR_WRITE_ALIAS',
    createExit: ExitCode.NoAliasFile,
    writeExit: ExitCode.WriteAliases,
    phase: 'WRITE_ALIASES',
  },
};

/**
 * An output file cannot be created
 *
 * Codes: ERR_NO_DECL_FILE, ERR_NO_DEF_FILE, ERR_NO_ALIAS_FILE
 */
export class OutputNotCreatableError extends GeneratorError {
  readonly code: string;
  readonly exitCode: ExitCodeValue;
  readonly output: OutputKind;

  constructor(output: OutputKind, filePath: string, cause?: string) {
    super(
      `Cannot open ${output} file '${filePath}' for output${cause ? `: ${cause}` : ''}`,
      { filePath, phase: 'OPEN' },
    );
    this.output = output;
    this.code = OUTPUT_CODES[output].create;
    this.exitCode = OUTPUT_CODES[output].createExit;
  }
}

/**
 * Grammar violation in an input file. Always carries the position.
 *
 * Codes: ERR_PARSE_BUILTIN, ERR_PARSE_OVERLOAD
 */
export class ParseError extends GeneratorError {
  readonly code: string;
  readonly exitCode: ExitCodeValue;
  readonly input: InputKind;

  constructor(input: InputKind, message: string, filePath: string, lineNumber: number, column: number) {
    super(message, {
      filePath,
      lineNumber,
      column,
      phase: input === 'builtin' ? 'PARSE_BUILTIN' : 'PARSE_OVERLOAD',
    });
    this.input = input;
    this.code = input === 'builtin' ? 'ERR_PARSE_BUILTIN' : 'ERR_PARSE_OVERLOAD';
    this.exitCode = input === 'builtin' ? ExitCode.ParseBuiltin : ExitCode.ParseOverload;
  }

  /** `<file>:<line>:<column>: <message>` */
  format(): string {
    return `${this.context.filePath}:${this.context.lineNumber}:${this.context.column}: ${this.message}`;
  }
}

/**
 * I/O failure while writing a generated file
 *
 * Codes: ERR_WRITE_DECL, ERR_WRITE_DEF, ERR_WRITE_ALIAS
 */
export class WriteError extends GeneratorError {
  readonly code: string;
  readonly exitCode: ExitCodeValue;
  readonly output: OutputKind;

  constructor(output: OutputKind, filePath: string, cause?: string) {
    super(`Output to '${filePath}' failed${cause ? `: ${cause}` : ''}`, {
      filePath,
      phase: OUTPUT_CODES[output].phase,
    });
    this.output = output;
    this.code = OUTPUT_CODES[output].write;
    this.exitCode = OUTPUT_CODES[output].writeExit;
  }
}

/**
 * A condition that should be unreachable: line-length overrun, a base type
 * the mangler has no mode for, insertion into a closed registry.
 *
 * Codes: ERR_INTERNAL
 */
export class InternalError extends GeneratorError {
  readonly code = 'ERR_INTERNAL';
  readonly exitCode = ExitCode.InternalError;
}
