/**
 * Parses inline definition files into a GeneratorModel for the writer tests.
 */

import {
  BuiltinGenerator,
  ConsoleLogger,
  PROGRAM_NAME,
  type CodegenOptions,
  type GeneratorConfig,
  type GeneratorModel,
} from '@bifgen/core';

export const CODEGEN_OPTIONS: CodegenOptions = {
  prefix: 'rs6000',
  maxRestrictedOperands: 2,
  programName: PROGRAM_NAME,
  builtinSource: 'builtins.def',
  overloadSource: 'overloads.def',
  declarationsInclude: 'builtins.h',
};

export function buildModel(builtins: string, overloads: string, config?: GeneratorConfig): GeneratorModel {
  const generator = new BuiltinGenerator({ config, logger: new ConsoleLogger('silent') });
  return generator.parse({ builtins: 'builtins.def', overloads: 'overloads.def' }, builtins, overloads);
}

/** The smallest useful pair of inputs: one builtin, one overload of it */
export const MINIMAL_BUILTINS = '[always]\n  const int __builtin_foo (int);\n    FOO foo_insn {}\n';
export const MINIMAL_OVERLOADS = '[OVLD_FOO, vec_foo, __builtin_vec_foo]\n  int __builtin_vec_foo (int);\n    FOO\n';
