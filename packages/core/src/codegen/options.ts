/**
 * Settings shared by the three code generators.
 */
export interface CodegenOptions {
  /** Identifier prefix, e.g. `rs6000` */
  prefix: string;
  /** Size of the restriction arrays in `struct bifdata` */
  maxRestrictedOperands: number;
  /** Program name shown in the banner */
  programName: string;
  /** Basename of the builtin file, for the banner */
  builtinSource: string;
  /** Basename of the overload file, for the banner */
  overloadSource: string;
  /** File name the definitions `#include` */
  declarationsInclude: string;
}

/** Names derived from the prefix */
export interface PrefixNames {
  bifEnum: string;
  ovldEnum: string;
  bif: (id: string) => string;
  ovld: (id: string) => string;
  builtinInfo: string;
  overloadInfo: string;
  bifHasher: string;
  ovldHasher: string;
  initFunction: string;
}

export function prefixNames(prefix: string): PrefixNames {
  const upper = prefix.toUpperCase();
  return {
    bifEnum: `${prefix}_gen_builtins`,
    ovldEnum: `${prefix}_gen_overloads`,
    bif: (id) => `${upper}_BIF_${id}`,
    ovld: (id) => `${upper}_OVLD_${id}`,
    builtinInfo: `${prefix}_builtin_info`,
    overloadInfo: `${prefix}_overload_info`,
    bifHasher: `${prefix}_bif_hasher`,
    ovldHasher: `${prefix}_ovld_hasher`,
    initFunction: `${prefix}_init_generated_builtins`,
  };
}
