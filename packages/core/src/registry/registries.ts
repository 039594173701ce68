import type { Logger } from '../logging/Logger.js';
import { SymbolRegistry } from './SymbolRegistry.js';

/**
 * The three registries one generator run fills.
 */
export interface GeneratorRegistries {
  builtinIds: SymbolRegistry;
  /** Builtin ids referenced from the overload file */
  overloadIds: SymbolRegistry;
  typeDescIds: SymbolRegistry;
}

export function createRegistries(options: { softLimit?: number; logger?: Logger } = {}): GeneratorRegistries {
  return {
    builtinIds: new SymbolRegistry('builtin ids', options),
    overloadIds: new SymbolRegistry('overload ids', options),
    typeDescIds: new SymbolRegistry('type descriptors', options),
  };
}

export function closeRegistries(registries: GeneratorRegistries): void {
  registries.builtinIds.close();
  registries.overloadIds.close();
  registries.typeDescIds.close();
}
