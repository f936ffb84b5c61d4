/**
 * Operator-facing progress output.
 *
 * Structured logs go to stderr through the Logger; a Reporter carries the
 * human-readable narrative an operator follows while an operation runs.
 * Every phase transition, retry and terminal state is reported here with the
 * resource name and timing needed to diagnose a stuck operation.
 *
 * @packageDocumentation
 */

export interface Reporter {
  /** Section banner, e.g. the operation title. */
  header(text: string): void;
  /** Numbered plan step, printed as `[current/total] text`. */
  step(current: number, total: number, text: string): void;
  info(text: string): void;
  success(text: string): void;
  warn(text: string): void;
  error(text: string): void;
  /** Periodic status line from a polling loop. */
  progress(text: string): void;
}

/**
 * Remediation item shown with a failure.
 */
export interface Suggestion {
  /** What to check or do. */
  readonly text: string;
  /** Command to run for it, when there is one. */
  readonly action?: string;
}
