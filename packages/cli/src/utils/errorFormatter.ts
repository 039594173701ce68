/**
 * Standardized error formatting for the CLI
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

/**
 * Render an error message with optional next steps.
 *
 * @param title - Main error message; for parse failures the
 *   `file:line:column: message` diagnostic
 * @param nextSteps - Optional actionable suggestions
 *
 * @example
 * formatError('Cannot find input built-in file \'builtins.def\'', [
 *   'Check the first positional argument',
 * ]);
 */
export function formatError(title: string, nextSteps?: string[]): string {
  const lines = [`✗ ${title}`];

  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }

  return lines.join('\n') + '\n';
}

/**
 * Write a standardized error message to the given stream.
 * The caller decides the exit code.
 */
export function reportError(write: (text: string) => void, title: string, nextSteps?: string[]): void {
  write(formatError(title, nextSteps));
}
