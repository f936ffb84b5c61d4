/**
 * `oc` client subprocess runner.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import { isJsonObject, parseJson, type JsonObject } from '../cluster/json.js';
import type { Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';
import {
  isRetryableError,
  withRetry,
  type AttemptResult,
  type RetryCallback,
  type RetryConfig,
} from './retry.js';
import type { CommandExecutor, RunOptions } from './types.js';

/**
 * Options for {@link OcExecutor}.
 */
export interface OcExecutorOptions {
  /** Path or name of the `oc` binary. */
  binary: string;
  /** Per-invocation timeout in milliseconds. */
  timeoutMs: number;
  retry: Partial<RetryConfig>;
  /** Clock used for backoff sleeps. */
  clock: Clock;
  logger: Logger;
  /** Invoked before each retry, with the command that failed. */
  onRetry?: (command: string, info: Parameters<RetryCallback>[0]) => void;
}

interface RawOutput {
  stdout: string;
  stderr: string;
  exitCode: number | undefined;
  timedOut: boolean;
}

/**
 * {@link CommandExecutor} that shells out to `oc` through execa.
 */
export class OcExecutor implements CommandExecutor {
  private readonly options: OcExecutorOptions;

  constructor(options: OcExecutorOptions) {
    this.options = options;
  }

  async run(args: readonly string[], options: RunOptions = {}): Promise<string | null> {
    return this.execute(args, false, options.timeoutMs ?? this.options.timeoutMs);
  }

  async runJson(args: readonly string[]): Promise<JsonObject | null> {
    const raw = await this.run([...args, '-o', 'json']);
    if (raw === null) {
      return null;
    }

    const parsed = parseJson(raw);
    if (!isJsonObject(parsed)) {
      this.options.logger.error('json_decode_failed', {
        command: this.describe(args),
        preview: raw.slice(0, 200),
      });
      return null;
    }
    return parsed;
  }

  async execIn(
    pod: string,
    command: readonly string[],
    namespace: string,
    container?: string
  ): Promise<string | null> {
    const args = ['exec', '-n', namespace, pod];
    if (container !== undefined) {
      args.push('-c', container);
    }
    args.push('--', ...command);

    return this.execute(args, true, this.options.timeoutMs);
  }

  private async execute(
    args: readonly string[],
    acceptReportingExit: boolean,
    timeoutMs: number
  ): Promise<string | null> {
    const command = this.describe(args);
    this.options.logger.debug('command_started', { command });

    const result = await withRetry(
      async (): Promise<AttemptResult<string>> => {
        const output = await this.spawn(args, timeoutMs);

        if (output.exitCode === 0) {
          return { ok: true, value: output.stdout.trim() };
        }
        if (acceptReportingExit && output.stdout.trim() !== '') {
          this.options.logger.debug('command_nonzero_with_output', {
            command,
            exitCode: output.exitCode,
          });
          return { ok: true, value: output.stdout.trim() };
        }
        return { ok: false, error: this.classify(output, timeoutMs) };
      },
      {
        config: this.options.retry,
        sleep: (ms) => this.options.clock.sleep(ms),
        onRetry: (info) => {
          this.options.logger.warn('command_retry', {
            command,
            attempt: info.attempt,
            totalAttempts: info.totalAttempts,
            delayMs: info.delayMs,
            error: info.previousError.message,
          });
          this.options.onRetry?.(command, info);
        },
      }
    );

    if (result.ok) {
      this.options.logger.debug('command_succeeded', { command });
      return result.value;
    }

    this.options.logger.debug('command_failed', { command, error: result.error.message });
    return null;
  }

  private async spawn(args: readonly string[], timeoutMs: number): Promise<RawOutput> {
    try {
      const result = await execa(this.options.binary, args, {
        timeout: timeoutMs,
        reject: false,
      });
      return {
        stdout: result.stdout,
        stderr: result.stderr,
        exitCode: result.exitCode,
        timedOut: result.timedOut,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { stdout: '', stderr: message, exitCode: undefined, timedOut: false };
    }
  }

  private classify(output: RawOutput, timeoutMs: number): { message: string; retryable: boolean } {
    if (output.timedOut) {
      return {
        message: `Command timeout after ${String(timeoutMs)}ms`,
        retryable: true,
      };
    }
    if (output.exitCode === undefined) {
      return {
        message: `Failed to start ${this.options.binary}: ${output.stderr || 'unknown error'}`,
        retryable: false,
      };
    }

    const text = output.stderr.trim() || output.stdout.trim();
    return {
      message: text || `Exited with code ${String(output.exitCode)}`,
      retryable: isRetryableError(text),
    };
  }

  private describe(args: readonly string[]): string {
    return [this.options.binary, ...args].join(' ');
  }
}
