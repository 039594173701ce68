/**
 * @bifgen/core - Builtin definition parser and code generator
 */

// Error types
export {
  ExitCode,
  GeneratorError,
  UsageError,
  ConfigError,
  InputNotFoundError,
  OutputNotCreatableError,
  ParseError,
  WriteError,
  InternalError,
} from './errors/GeneratorError.js';
export type {
  ExitCodeValue,
  ErrorContext,
  GeneratorErrorJSON,
  GeneratorPhase,
  InputKind,
  OutputKind,
} from './errors/GeneratorError.js';

// Logging
export { ConsoleLogger, FileLogger, MultiLogger, createLogger, closeLogger, formatMessage } from './logging/Logger.js';
export type { Logger, LogContext, ConsoleSink } from './logging/Logger.js';

// Config
export {
  loadConfig,
  DEFAULT_CONFIG,
  defaultConfig,
  CONFIG_FILE_NAME,
  MAX_RESTRICTED_OPERANDS_LIMIT,
  validateVersion,
  validatePrefix,
  validateMaxRestrictedOperands,
  validateBaseTypes,
  validateRegistrySoftLimit,
} from './config/index.js';
export type { GeneratorConfig } from './config/index.js';

// Version
export { GENERATOR_VERSION, getSchemaVersion, readPackageVersion } from './version.js';

// Diagnostics
export { DiagnosticSink } from './diagnostics/DiagnosticSink.js';

// Parsing
export { Scanner, MAX_LINE_LENGTH, COMMENT_MARKER } from './parser/Scanner.js';
export type { ParserContext } from './parser/ParserContext.js';
export { matchType, matchBaseType, matchConstRestriction } from './parser/TypeParser.js';
export { parsePrototype } from './parser/PrototypeParser.js';
export { parseBuiltinFile, parseGatingHeader, parseAttributes } from './parser/BuiltinFileParser.js';
export type { BuiltinParseResult } from './parser/BuiltinFileParser.js';
export { parseOverloadFile, parseOverloadHeader } from './parser/OverloadFileParser.js';
export type { OverloadParseResult } from './parser/OverloadFileParser.js';
export {
  BASE_TYPE_KEYWORDS,
  INTEGRAL_BASES,
  VECTOR_SHORTHANDS,
  FUNCTION_KIND_KEYWORDS,
  GATING_STANZAS,
} from './parser/vocabulary.js';
export type { VectorShorthand } from './parser/vocabulary.js';

// Registries
export { SymbolRegistry, compareIds } from './registry/SymbolRegistry.js';
export type { SymbolRegistryOptions } from './registry/SymbolRegistry.js';
export { createRegistries, closeRegistries } from './registry/registries.js';
export type { GeneratorRegistries } from './registry/registries.js';

// Mangling
export {
  mangle,
  typeFragment,
  splitTypeDescId,
  FTYPE_INFIX,
  POINTER_FRAGMENT,
  VOID_FRAGMENT,
  OPAQUE_FRAGMENT,
} from './mangle/mangle.js';
export { SCALAR_MODES, VECTOR_MODES, PIXEL_MODE } from './mangle/modes.js';

// Code generation
export { CodeWriter, tabAlign, generatedBanner } from './codegen/CodeWriter.js';
export { prefixNames } from './codegen/options.js';
export type { CodegenOptions, PrefixNames } from './codegen/options.js';
export { writeDeclarations, attributeBitMacro, RESTRICTION_ENUMERATORS } from './codegen/DeclarationWriter.js';
export { writeDefinitions, functionTypeInit, attributeMask, functionFlags } from './codegen/DefinitionWriter.js';
export { writeAliases } from './codegen/AliasWriter.js';
export { typeNodeForFragment } from './codegen/typeNodes.js';

// Pipeline
export type { GeneratorModel } from './model.js';
export { OutputFiles } from './io/OutputFiles.js';
export { BuiltinGenerator, PROGRAM_NAME } from './BuiltinGenerator.js';
export type { GeneratorPaths, GeneratorResult, BuiltinGeneratorOptions } from './BuiltinGenerator.js';

// Re-export types for convenience
export * from '@bifgen/types';
