/**
 * Definitions source: table storage, function-type trees, hasher bodies and
 * the initializer that fills the tables and registers every builtin.
 */

import {
  ATTRIBUTE_NAMES,
  restrictionValues,
  type BuiltinEntry,
  type FunctionKind,
  type OverloadEntry,
  type RestrictionKind,
} from '@bifgen/types';
import { splitTypeDescId } from '../mangle/mangle.js';
import type { GeneratorModel } from '../model.js';
import { CodeWriter, generatedBanner } from './CodeWriter.js';
import { attributeBitMacro } from './DeclarationWriter.js';
import { prefixNames, type CodegenOptions, type PrefixNames } from './options.js';
import { typeNodeForFragment } from './typeNodes.js';

const RESTRICTION_ENUMERATOR: Readonly<Record<RestrictionKind, string>> = {
  bits: 'RES_BITS',
  range: 'RES_RANGE',
  varRange: 'RES_VAR_RANGE',
  values: 'RES_VALUES',
};

/** Initial slot count of the generated hash tables */
const HASH_TABLE_SIZE = 1024;

export function writeDefinitions(model: GeneratorModel, options: CodegenOptions): string {
  const names = prefixNames(options.prefix);
  const w = new CodeWriter();

  w.lines(generatedBanner(options.programName, options.builtinSource, options.overloadSource));
  w.line(`#include "${options.declarationsInclude}"`).line();

  w.line(`bifdata ${names.builtinInfo}[${names.bif('MAX')}];`);
  w.line(`ovlddata ${names.overloadInfo}[${names.ovld('MAX')} - ${names.ovld('NONE')}];`).line();

  w.line(`hash_table<${names.bifHasher}> bif_hash (${HASH_TABLE_SIZE});`);
  w.line(`hash_table<${names.ovldHasher}> ovld_hash (${HASH_TABLE_SIZE});`).line();

  for (const id of model.registries.typeDescIds) {
    w.line(`tree ${id};`);
  }
  w.line();

  writeHasherBodies(w, names.bifHasher, 'bifdata', 'bd');
  writeHasherBodies(w, names.ovldHasher, 'ovlddata', 'od');

  w.lines(['void', `${names.initFunction} ()`, '{']);
  w.lines(['  tree t;', '  bifdata **bslot;', '  ovlddata **oslot;', '  hashval_t hash;', '']);

  for (const id of model.registries.typeDescIds) {
    w.line(`  ${id} = ${functionTypeInit(id)};`);
  }
  w.line();

  for (const entry of model.builtins) {
    writeBuiltinInit(w, names, entry);
  }

  writeOverloadInits(w, names, model.overloads);

  w.line('}').line();
  return w.toString();
}

/**
 * `build_function_type_list (<ret>, <args>..., NULL_TREE)` for a
 * type-descriptor id.
 */
export function functionTypeInit(typeDescId: string): string {
  const { returnFragment, argFragments } = splitTypeDescId(typeDescId);
  const nodes = [returnFragment, ...argFragments].map(typeNodeForFragment);
  return `build_function_type_list (${[...nodes, 'NULL_TREE'].join(', ')})`;
}

/** OR of the entry's attribute bit macros, in vocabulary order, or `0` */
export function attributeMask(entry: BuiltinEntry): string {
  const bits = ATTRIBUTE_NAMES.filter((name) => entry.attrs.has(name)).map(attributeBitMacro);
  return bits.length === 0 ? '0' : bits.join(' | ');
}

function writeHasherBodies(w: CodeWriter, hasher: string, record: string, param: string): void {
  w.lines([
    'hashval_t',
    `${hasher}::hash (${record} *${param})`,
    '{',
    `  return htab_hash_string (${param}->bifname);`,
    '}',
    '',
    'bool',
    `${hasher}::equal (${record} *${param}, const char *name)`,
    '{',
    `  return ${param} && name && !strcmp (${param}->bifname, name);`,
    '}',
    '',
  ]);
}

function writeBuiltinInit(w: CodeWriter, names: PrefixNames, entry: BuiltinEntry): void {
  const enumTag = names.bif(entry.id);
  const slot = `${names.builtinInfo}[${enumTag}]`;
  const { proto } = entry;

  w.line(`  ${slot}.bifname = "${proto.name}";`);
  w.line(`  ${slot}.enable = ${entry.stanza.enableTag};`);
  w.line(`  ${slot}.fntype = ${entry.typeDescId};`);
  w.line(`  ${slot}.icode = CODE_FOR_${entry.patternName};`);
  w.line(`  ${slot}.nargs = ${proto.args.length};`);
  w.line(`  ${slot}.bifattrs = ${attributeMask(entry)};`);
  proto.restrictedOperands.forEach(({ operand, restriction }, i) => {
    const [val1, val2] = restrictionValues(restriction);
    w.line(`  ${slot}.restr_opnd[${i}] = ${operand};`);
    w.line(`  ${slot}.restr[${i}] = ${RESTRICTION_ENUMERATOR[restriction.kind]};`);
    w.line(`  ${slot}.restr_val1[${i}] = ${val1};`);
    w.line(`  ${slot}.restr_val2[${i}] = ${val2};`);
  });

  w.line(`  hash = ${names.bifHasher}::hash (&${slot});`);
  w.line(`  bslot = bif_hash.find_slot_with_hash ("${proto.name}", hash, INSERT);`);
  w.line(`  *bslot = &${slot};`);

  const register = [
    `t = add_builtin_function ("${proto.name}", ${entry.typeDescId}, (int) ${enumTag}, BUILT_IN_MD, NULL, NULL_TREE);`,
    ...functionFlags(entry.kind),
  ];
  const { condition } = entry.stanza;
  if (condition === null) {
    w.lines(register.map((line) => `  ${line}`));
  } else {
    w.line(`  if (${condition})`);
    w.line('    {');
    w.lines(register.map((line) => `      ${line}`));
    w.line('    }');
  }
  w.line();
}

/** Tree flags set on a registered builtin, by purity */
export function functionFlags(kind: FunctionKind): string[] {
  switch (kind) {
    case 'const':
      return ['TREE_READONLY (t) = 1;', 'TREE_NOTHROW (t) = 1;'];
    case 'pure':
      return ['DECL_PURE_P (t) = 1;', 'TREE_NOTHROW (t) = 1;'];
    case 'fpmath':
      return [
        'TREE_NOTHROW (t) = 1;',
        'if (flag_rounding_math)',
        '  {',
        '    DECL_PURE_P (t) = 1;',
        '    DECL_IS_NOVOPS (t) = 1;',
        '  }',
        'else',
        '  TREE_READONLY (t) = 1;',
      ];
    case 'none':
      return [];
  }
}

/**
 * Overload records. Entries sharing an external name form a chain in file
 * order; only the head of each chain goes into `ovld_hash`.
 */
function writeOverloadInits(w: CodeWriter, names: PrefixNames, overloads: readonly OverloadEntry[]): void {
  const chains = new Map<string, OverloadEntry[]>();
  for (const entry of overloads) {
    const chain = chains.get(entry.stanza.externName);
    if (chain === undefined) {
      chains.set(entry.stanza.externName, [entry]);
    } else {
      chain.push(entry);
    }
  }

  const slotOf = (entry: OverloadEntry): string =>
    `${names.overloadInfo}[${names.ovld(entry.refId)} - ${names.ovld('NONE')}]`;

  for (const entry of overloads) {
    const chain = chains.get(entry.stanza.externName) ?? [entry];
    const next = chain[chain.indexOf(entry) + 1];
    const slot = slotOf(entry);

    w.line(`  ${slot}.bifname = "${entry.proto.name}";`);
    w.line(`  ${slot}.bifid = ${names.bif(entry.refId)};`);
    w.line(`  ${slot}.fntype = ${entry.typeDescId};`);
    w.line(`  ${slot}.next = ${next === undefined ? 'NULL' : `&${slotOf(next)}`};`);
    w.line();
  }

  for (const chain of chains.values()) {
    const head = chain[0];
    const slot = slotOf(head);
    w.line(`  hash = ${names.ovldHasher}::hash (&${slot});`);
    w.line(`  oslot = ovld_hash.find_slot_with_hash ("${head.proto.name}", hash, INSERT);`);
    w.line(`  *oslot = &${slot};`);
    w.line();
  }
}
