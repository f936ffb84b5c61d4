/**
 * Command dispatch for the nodeswap CLI.
 *
 * @packageDocumentation
 */

import type { EnvRecord } from '../config/index.js';
import { runOperation, loadConfig, type DependencyOverrides } from './app.js';
import { ArgumentError, parseArgs } from './args.js';
import { handleVersionCommand } from './commands/version.js';
import { classifyError, formatErrorWithSuggestions } from './errors.js';
import { ConsoleReporter } from './reporter.js';
import { EXIT_CODES, type CliOptions } from './types.js';

export const HELP_TEXT = `
nodeswap - replace, expand and add nodes on bare-metal OpenShift clusters

USAGE:
  nodeswap --replacement-node <name> --replacement-node-ip <ip>
           --replacement-node-bmc-ip <ip> --replacement-node-mac-address <mac>
           --replacement-node-role <role> [options]

MODES:
  (default)               Replace a failed control plane node
  --expand-control-plane  Add a control plane node next to healthy ones
  --add-new-node          Add a worker node through the worker MachineSet

REQUIRED:
  --replacement-node              Name of the new node
  --replacement-node-ip           IPv4 address of the new node
  --replacement-node-bmc-ip       IPv4 address of its BMC
  --replacement-node-mac-address  MAC address of its boot interface
  --replacement-node-role         master, control, control-plane or worker

OPTIONS:
  --sushy-uid <uid>    Redfish system UID for sushy-emulated BMCs
  --backup-dir <dir>   Workspace for backups and generated files
  --config <file>      Config file (default: ./nodeswap.toml)
  --debug              Write debug log entries to stderr
  --help, -h           Show this help message
  --version, -v        Show version information

Flags may also be written with underscores, e.g. --replacement_node_ip.

EXIT CODES:
  0  success    1  failure or usage error    130  interrupted

EXAMPLES:
  nodeswap --replacement-node master-2 --replacement-node-ip 192.168.10.22 \\
    --replacement-node-bmc-ip 10.0.0.22 --replacement-node-mac-address 52:54:00:aa:bb:02 \\
    --replacement-node-role master
  nodeswap --add-new-node --replacement-node worker-4 --replacement-node-ip 192.168.10.34 \\
    --replacement-node-bmc-ip 10.0.0.34 --replacement-node-mac-address 52:54:00:aa:bb:34 \\
    --replacement-node-role worker
`;

/**
 * Streams and collaborators the CLI runs against.
 */
export interface CliIo {
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  env?: EnvRecord;
  cwd?: string;
  overrides?: DependencyOverrides;
  /** Aborted to interrupt a running operation. */
  signal?: AbortSignal;
}

/**
 * Runs the CLI against the arguments after the program name.
 *
 * @returns The process exit code.
 */
export async function main(args: readonly string[], io: CliIo = {}): Promise<number> {
  const stdout =
    io.stdout ??
    ((text: string) => {
      process.stdout.write(text);
    });
  const stderr =
    io.stderr ??
    ((text: string) => {
      process.stderr.write(text);
    });
  const plain = { colors: false, unicode: false };

  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof ArgumentError)) {
      throw error;
    }
    stderr(formatErrorWithSuggestions(error.message, { errorType: 'usage' }, plain) + '\n');
    return EXIT_CODES.failure;
  }

  if (options.command === 'help') {
    stdout(HELP_TEXT);
    return EXIT_CODES.success;
  }
  if (options.command === 'version') {
    return handleVersionCommand(stdout).exitCode;
  }

  const loadOptions = {
    debug: options.debug,
    ...(options.configPath === undefined ? {} : { configPath: options.configPath }),
    ...(io.cwd === undefined ? {} : { cwd: io.cwd }),
    ...(io.env === undefined ? {} : { env: io.env }),
  };

  try {
    const { config } = await loadConfig(loadOptions);
    const reporter = new ConsoleReporter({
      colors: config.cli.colors,
      unicode: config.cli.unicode,
      write: stdout,
    });
    const result = await runOperation(options.request, config, reporter, io.overrides, io.signal);
    return result.exitCode;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    stderr(
      formatErrorWithSuggestions(
        message,
        {
          errorType: classifyError(error),
          ...(options.configPath === undefined ? {} : { configPath: options.configPath }),
        },
        plain
      ) + '\n'
    );
    return EXIT_CODES.failure;
  }
}
