import type { BuiltinEntry, OverloadEntry, OverloadStanza } from '@bifgen/types';
import type { GeneratorRegistries } from './registry/registries.js';

/**
 * Everything the code generators consume: the parsed entries in file
 * order plus the closed registries.
 */
export interface GeneratorModel {
  builtins: BuiltinEntry[];
  overloadStanzas: OverloadStanza[];
  overloads: OverloadEntry[];
  registries: GeneratorRegistries;
}
