/**
 * SymbolRegistry - uniqueness-checked set of identifiers with sorted iteration
 *
 * Identifiers are ordered byte-wise (code unit order), so generated
 * enumerations do not depend on file order or locale. A registry is
 * closed once its pass is complete; later insertions are a programming
 * error.
 */

import { InternalError } from '../errors/GeneratorError.js';
import type { Logger } from '../logging/Logger.js';

/** Byte-wise comparison, the order of C `strcmp` over ASCII identifiers */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export interface SymbolRegistryOptions {
  /** Warn once when the registry grows past this many ids */
  softLimit?: number;
  logger?: Logger;
}

export class SymbolRegistry implements Iterable<string> {
  private readonly ids = new Set<string>();
  private sorted: string[] | null = null;
  private closed = false;
  private warned = false;

  constructor(
    readonly name: string,
    private readonly options: SymbolRegistryOptions = {},
  ) {}

  /**
   * Insert an id if absent.
   * @returns false if the id was already present
   */
  insert(id: string): boolean {
    if (this.closed) {
      throw new InternalError(`insertion of '${id}' into closed registry '${this.name}'`);
    }
    if (this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);
    this.sorted = null;

    const { softLimit, logger } = this.options;
    if (softLimit !== undefined && !this.warned && this.ids.size > softLimit) {
      this.warned = true;
      logger?.warn(`Registry '${this.name}' exceeds ${softLimit} entries`, { size: this.ids.size });
    }
    return true;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Reject further insertions */
  close(): void {
    this.closed = true;
  }

  /** Ids in byte-wise order */
  toArray(): string[] {
    if (this.sorted === null) {
      this.sorted = [...this.ids].sort(compareIds);
    }
    return [...this.sorted];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.toArray()[Symbol.iterator]();
  }
}
