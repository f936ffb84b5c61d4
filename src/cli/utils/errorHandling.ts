/**
 * Process-level error handling for the CLI entry point.
 */

import { classifyError, formatErrorWithSuggestions } from '../errors.js';
import { EXIT_CODES, type CliCommandResult } from '../types.js';

/**
 * Runs the command and exits the process with its exit code.
 *
 * An error that escapes the command is printed with suggestions for its
 * kind, and the process exits with 1.
 *
 * @param fn - The function to wrap (sync or async).
 */
export function withErrorHandling(fn: () => CliCommandResult | Promise<CliCommandResult>): void {
  void (async () => {
    try {
      const result = await fn();
      process.exit(result.exitCode);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(
        formatErrorWithSuggestions(message, { errorType: classifyError(error) }, { colors: false, unicode: false }) +
          '\n'
      );
      process.exit(EXIT_CODES.failure);
    }
  })();
}
