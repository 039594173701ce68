import type { GeneratorModel } from '../model.js';
import { CodeWriter, generatedBanner } from './CodeWriter.js';
import type { CodegenOptions } from './options.js';

/**
 * One `#define <extern> <intern>` per overload stanza, in file order.
 */
export function writeAliases(model: GeneratorModel, options: CodegenOptions): string {
  const w = new CodeWriter();
  w.lines(generatedBanner(options.programName, options.builtinSource, options.overloadSource));
  for (const stanza of model.overloadStanzas) {
    w.line(`#define ${stanza.externName} ${stanza.internName}`);
  }
  return w.toString();
}
