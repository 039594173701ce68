/**
 * Declarations header: enumerations of builtin and overload ids, the
 * record structs, attribute macros, table externs and one extern per
 * function type.
 */

import { ATTRIBUTE_NAMES, GATING_TOKENS, type AttributeName } from '@bifgen/types';
import type { GeneratorModel } from '../model.js';
import { GATING_STANZAS } from '../parser/vocabulary.js';
import { CodeWriter, generatedBanner, tabAlign } from './CodeWriter.js';
import { prefixNames, type CodegenOptions } from './options.js';

const SYSTEM_INCLUDES = ['config.h', 'system.h', 'coretypes.h', 'backend.h', 'rtl.h', 'tree.h'];

/** Predicate macros whose name differs from the attribute */
const PREDICATE_NAMES: Partial<Record<AttributeName, string>> = { pred: 'predicate' };

export const RESTRICTION_ENUMERATORS = ['RES_NONE', 'RES_BITS', 'RES_RANGE', 'RES_VAR_RANGE', 'RES_VALUES'];

/** `bif_<name>_bit` */
export function attributeBitMacro(name: AttributeName): string {
  return `bif_${name}_bit`;
}

export function writeDeclarations(model: GeneratorModel, options: CodegenOptions): string {
  const names = prefixNames(options.prefix);
  const w = new CodeWriter();
  const n = options.maxRestrictedOperands;

  w.lines(generatedBanner(options.programName, options.builtinSource, options.overloadSource));
  for (const header of SYSTEM_INCLUDES) {
    w.line(`#include "${header}"`);
  }
  w.line();

  w.line(`enum ${names.bifEnum}`).line('{').line(`  ${names.bif('NONE')},`);
  for (const id of model.registries.builtinIds) {
    w.line(`  ${names.bif(id)},`);
  }
  w.line(`  ${names.bif('MAX')}`).line('};').line();

  w.line(`enum ${names.ovldEnum}`).line('{').line(`  ${names.ovld('NONE')} = ${names.bif('MAX')} + 1,`);
  for (const id of model.registries.overloadIds) {
    w.line(`  ${names.ovld(id)},`);
  }
  w.line(`  ${names.ovld('MAX')}`).line('};').line();

  writeEnum(w, 'restriction', RESTRICTION_ENUMERATORS);
  writeEnum(
    w,
    'bif_enable',
    GATING_TOKENS.map((token) => GATING_STANZAS[token].enableTag),
  );

  w.lines([
    'struct bifdata',
    '{',
    '  const char *bifname;',
    '  bif_enable enable;',
    '  tree fntype;',
    '  insn_code icode;',
    '  int  nargs;',
    '  int  bifattrs;',
    `  int  restr_opnd[${n}];`,
    `  restriction restr[${n}];`,
    `  int  restr_val1[${n}];`,
    `  int  restr_val2[${n}];`,
    '};',
    '',
  ]);

  ATTRIBUTE_NAMES.forEach((name, index) => {
    const bit = (1 << index).toString(16).padStart(8, '0');
    w.line(tabAlign(`#define ${attributeBitMacro(name)}`, `(0x${bit})`));
  });
  w.line();
  for (const name of ATTRIBUTE_NAMES) {
    const predicate = PREDICATE_NAMES[name] ?? name;
    w.line(tabAlign(`#define bif_is_${predicate}(x)`, `((x).bifattrs & ${attributeBitMacro(name)})`));
  }
  w.line();

  w.line(`extern bifdata ${names.builtinInfo}[];`).line();
  writeHasher(w, names.bifHasher, 'bifdata');
  w.line(`extern hash_table<${names.bifHasher}> bif_hash;`).line();

  w.lines([
    'struct ovlddata',
    '{',
    '  const char *bifname;',
    `  ${names.bifEnum} bifid;`,
    '  tree fntype;',
    '  ovlddata *next;',
    '};',
    '',
  ]);

  w.line(`extern ovlddata ${names.overloadInfo}[];`).line();
  writeHasher(w, names.ovldHasher, 'ovlddata');
  w.line(`extern hash_table<${names.ovldHasher}> ovld_hash;`).line();

  w.line(`extern void ${names.initFunction} ();`).line();

  for (const id of model.registries.typeDescIds) {
    w.line(`extern tree ${id};`);
  }
  w.line();

  return w.toString();
}

function writeEnum(w: CodeWriter, name: string, enumerators: readonly string[]): void {
  w.line(`enum ${name} {`);
  enumerators.forEach((enumerator, i) => {
    w.line(`  ${enumerator}${i < enumerators.length - 1 ? ',' : ''}`);
  });
  w.line('};').line();
}

function writeHasher(w: CodeWriter, hasher: string, record: string): void {
  w.lines([
    `struct ${hasher} : nofree_ptr_hash<${record}>`,
    '{',
    '  typedef const char *compare_type;',
    '',
    `  static hashval_t hash (${record} *);`,
    `  static bool equal (${record} *, const char *);`,
    '};',
    '',
  ]);
}
