/**
 * BuiltinGenerator - one batch run from the two definition files to the
 * three generated artifacts.
 *
 * Phases, each with its own failure code:
 *   open inputs -> create outputs -> parse builtin file -> parse overload
 *   file -> write declarations -> write definitions -> write aliases
 *
 * The first failure aborts the run. Once an output exists, a failure
 * removes every output before the error propagates.
 */

import { readFileSync } from 'fs';
import { basename } from 'path';
import { writeAliases } from './codegen/AliasWriter.js';
import { writeDeclarations } from './codegen/DeclarationWriter.js';
import { writeDefinitions } from './codegen/DefinitionWriter.js';
import type { CodegenOptions } from './codegen/options.js';
import { defaultConfig, type GeneratorConfig } from './config/ConfigLoader.js';
import { DiagnosticSink } from './diagnostics/DiagnosticSink.js';
import { InputNotFoundError, type InputKind } from './errors/GeneratorError.js';
import { OutputFiles } from './io/OutputFiles.js';
import { ConsoleLogger, type Logger } from './logging/Logger.js';
import type { GeneratorModel } from './model.js';
import { parseBuiltinFile } from './parser/BuiltinFileParser.js';
import { parseOverloadFile } from './parser/OverloadFileParser.js';
import type { ParserContext } from './parser/ParserContext.js';
import { Scanner } from './parser/Scanner.js';
import { closeRegistries, createRegistries } from './registry/registries.js';

export const PROGRAM_NAME = 'bifgen';

/**
 * The five paths of one run
 */
export interface GeneratorPaths {
  builtins: string;
  overloads: string;
  declarations: string;
  definitions: string;
  aliases: string;
}

export interface GeneratorResult {
  builtins: number;
  builtinStanzas: number;
  overloads: number;
  overloadStanzas: number;
  typeDescriptors: number;
}

export interface BuiltinGeneratorOptions {
  config?: GeneratorConfig;
  logger?: Logger;
}

export class BuiltinGenerator {
  private readonly config: GeneratorConfig;
  private readonly logger: Logger;

  constructor(options: BuiltinGeneratorOptions = {}) {
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? new ConsoleLogger('warnings');
  }

  run(paths: GeneratorPaths): GeneratorResult {
    const builtinSource = this.readInput('builtin', paths.builtins);
    const overloadSource = this.readInput('overload', paths.overloads);

    const outputs = new OutputFiles(this.logger);
    try {
      outputs.create('declarations', paths.declarations);
      outputs.create('definitions', paths.definitions);
      outputs.create('aliases', paths.aliases);

      const model = this.parse(paths, builtinSource, overloadSource);

      const codegen: CodegenOptions = {
        prefix: this.config.prefix,
        maxRestrictedOperands: this.config.maxRestrictedOperands,
        programName: PROGRAM_NAME,
        builtinSource: basename(paths.builtins),
        overloadSource: basename(paths.overloads),
        declarationsInclude: basename(paths.declarations),
      };

      outputs.write('declarations', writeDeclarations(model, codegen));
      outputs.write('definitions', writeDefinitions(model, codegen));
      outputs.write('aliases', writeAliases(model, codegen));

      const result: GeneratorResult = {
        builtins: model.builtins.length,
        builtinStanzas: new Set(model.builtins.map((b) => b.stanza.token)).size,
        overloads: model.overloads.length,
        overloadStanzas: model.overloadStanzas.length,
        typeDescriptors: model.registries.typeDescIds.size,
      };
      this.logger.info('Generation complete', { ...result });
      return result;
    } catch (err) {
      outputs.discard();
      throw err;
    }
  }

  /**
   * Parse both definition files into a model with closed registries.
   */
  parse(paths: Pick<GeneratorPaths, 'builtins' | 'overloads'>, builtinSource: string, overloadSource: string): GeneratorModel {
    const registries = createRegistries({ softLimit: this.config.registrySoftLimit, logger: this.logger });

    const builtinResult = parseBuiltinFile(this.context('builtin', paths.builtins, builtinSource), registries);
    registries.builtinIds.close();
    this.logger.info('Parsed builtin file', {
      file: paths.builtins,
      builtins: builtinResult.entries.length,
      stanzas: builtinResult.stanzaCount,
    });

    const overloadResult = parseOverloadFile(this.context('overload', paths.overloads, overloadSource), registries);
    closeRegistries(registries);
    this.logger.info('Parsed overload file', {
      file: paths.overloads,
      overloads: overloadResult.entries.length,
      stanzas: overloadResult.stanzas.length,
    });

    return {
      builtins: builtinResult.entries,
      overloadStanzas: overloadResult.stanzas,
      overloads: overloadResult.entries,
      registries,
    };
  }

  private context(input: InputKind, filePath: string, source: string): ParserContext {
    return {
      scanner: new Scanner(source, filePath),
      diag: new DiagnosticSink(input, filePath, this.logger),
      enabledBases: new Set(this.config.baseTypes),
      maxRestrictedOperands: this.config.maxRestrictedOperands,
    };
  }

  private readInput(input: InputKind, filePath: string): string {
    try {
      return readFileSync(filePath, 'utf-8');
    } catch (err) {
      this.logger.debug('Input read failed', { file: filePath, error: err instanceof Error ? err.message : String(err) });
      throw new InputNotFoundError(input, filePath);
    }
  }
}
