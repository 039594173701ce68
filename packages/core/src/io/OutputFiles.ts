/**
 * OutputFiles - the generated files of one run.
 *
 * Files are created up front and written in full once generation is done.
 * If anything fails, discard() closes and removes every file created so
 * far, so a dependent build step sees all three artifacts or none.
 */

import { closeSync, openSync, unlinkSync, writeSync } from 'fs';
import { OutputNotCreatableError, WriteError, type OutputKind } from '../errors/GeneratorError.js';
import type { Logger } from '../logging/Logger.js';

interface OpenOutput {
  kind: OutputKind;
  path: string;
  fd: number | null;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class OutputFiles {
  private readonly outputs = new Map<OutputKind, OpenOutput>();

  constructor(private readonly logger: Logger) {}

  /** Create (truncate) one output file */
  create(kind: OutputKind, path: string): void {
    let fd: number;
    try {
      fd = openSync(path, 'w');
    } catch (err) {
      throw new OutputNotCreatableError(kind, path, describe(err));
    }
    this.outputs.set(kind, { kind, path, fd });
    this.logger.debug('Created output file', { kind, path });
  }

  /** Write the whole content of an output and close it */
  write(kind: OutputKind, content: string): void {
    const output = this.outputs.get(kind);
    if (output === undefined || output.fd === null) {
      throw new WriteError(kind, output?.path ?? kind, 'file is not open');
    }
    try {
      writeSync(output.fd, content);
      closeSync(output.fd);
    } catch (err) {
      throw new WriteError(kind, output.path, describe(err));
    }
    output.fd = null;
    this.logger.debug('Wrote output file', { kind, path: output.path, bytes: Buffer.byteLength(content) });
  }

  /** Close and delete every file created so far */
  discard(): void {
    for (const output of this.outputs.values()) {
      if (output.fd !== null) {
        try {
          closeSync(output.fd);
        } catch (err) {
          this.logger.debug('Closing discarded output failed', { path: output.path, error: describe(err) });
        }
        output.fd = null;
      }
      try {
        unlinkSync(output.path);
        this.logger.debug('Removed output file', { path: output.path });
      } catch (err) {
        this.logger.warn(`Could not remove output file '${output.path}': ${describe(err)}`);
      }
    }
    this.outputs.clear();
  }
}
