/**
 * CLI types for nodeswap.
 */

import type { OperationRequest } from '../orchestrator/plan.js';

/**
 * Parsed command line.
 */
export type CliOptions =
  | { readonly command: 'help' }
  | { readonly command: 'version' }
  | {
      readonly command: 'run';
      readonly request: OperationRequest;
      /** Explicit config file; otherwise `nodeswap.toml` in the working directory. */
      readonly configPath?: string;
      readonly debug: boolean;
    };

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * 0 on success, 1 on failure or usage error, 130 on interrupt.
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/** Exit codes the binary returns. */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  interrupted: 130,
} as const;
