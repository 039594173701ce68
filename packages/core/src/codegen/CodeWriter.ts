/**
 * CodeWriter - accumulates generated C source line by line.
 */
export class CodeWriter {
  private readonly buf: string[] = [];

  /** Append one line; an empty call appends a blank line */
  line(text: string = ''): this {
    this.buf.push(`${text}\n`);
    return this;
  }

  lines(texts: readonly string[]): this {
    for (const text of texts) {
      this.line(text);
    }
    return this;
  }

  toString(): string {
    return this.buf.join('');
  }
}

const TAB_WIDTH = 8;

/**
 * Pad `text` with tabs so that `value` starts at `column` (0-based), always
 * with at least one tab.
 */
export function tabAlign(text: string, value: string, column: number = 32): string {
  const tabs = Math.max(1, Math.ceil((column - text.length) / TAB_WIDTH));
  return `${text}${'\t'.repeat(tabs)}${value}`;
}

/**
 * Comment naming the generator and its inputs. Only basenames appear, so
 * output does not depend on where the build runs.
 */
export function generatedBanner(programName: string, builtinSource: string, overloadSource: string): string[] {
  return [
    `/* Automatically generated by the program '${programName}'`,
    `   from the files '${builtinSource}' and '${overloadSource}'.  */`,
    '',
  ];
}
