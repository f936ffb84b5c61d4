/**
 * Contract between nodeswap's components and the `oc` client.
 *
 * @packageDocumentation
 */

import type { JsonObject } from '../cluster/json.js';

/**
 * Per-call overrides for {@link CommandExecutor.run}.
 */
export interface RunOptions {
  /** Replaces the configured per-invocation timeout. */
  readonly timeoutMs?: number;
}

/**
 * Runs `oc` commands against the cluster.
 *
 * Every method retries transient API and network failures internally and
 * resolves to `null` once retries are exhausted or the failure is not
 * transient (a missing resource, a forbidden request). Methods never reject.
 */
export interface CommandExecutor {
  /**
   * Runs `oc <args>` and returns trimmed stdout.
   *
   * @param args - Arguments after the binary, e.g. `['delete', 'bmh', 'worker-3', '-n', ns]`.
   */
  run(args: readonly string[], options?: RunOptions): Promise<string | null>;

  /**
   * Runs `oc <args> -o json` and returns the decoded object.
   *
   * @param args - Arguments without the output flag, e.g. `['get', 'bmh', '-n', ns]`.
   */
  runJson(args: readonly string[]): Promise<JsonObject | null>;

  /**
   * Runs a command inside a pod with `oc exec`.
   *
   * A non-zero exit that still printed to stdout yields that output, since
   * tools like `etcdctl endpoint health` exit non-zero while reporting.
   *
   * @param pod - Pod name.
   * @param command - Command and arguments to run in the pod.
   * @param namespace - Pod namespace.
   * @param container - Container to exec into, when the pod has several.
   */
  execIn(
    pod: string,
    command: readonly string[],
    namespace: string,
    container?: string
  ): Promise<string | null>;
}
