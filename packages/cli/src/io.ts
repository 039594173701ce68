import type { ConsoleSink } from '@bifgen/core';

/**
 * Where the CLI reads its working directory from and writes its output to.
 * Tests substitute capturing streams.
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Sink for log messages */
  console: ConsoleSink;
  /** Directory relative paths and the default config are resolved against */
  cwd: string;
}

export function processIO(): CliIO {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    console,
    cwd: process.cwd(),
  };
}
