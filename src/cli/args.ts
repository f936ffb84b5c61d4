/**
 * Command line parsing for nodeswap.
 *
 * Flags take their value as the next argument or after `=`, and may be
 * written with dashes or underscores (`--replacement_node_ip`).
 *
 * @packageDocumentation
 */

import { normalizeRole } from '../materialize/node-configurator.js';
import type { NodeParameters } from '../materialize/types.js';
import type { OperationKind } from '../orchestrator/plan.js';
import type { CliOptions } from './types.js';

/**
 * Error thrown for a command line that cannot be run.
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

const VALUE_FLAGS = [
  'replacement-node',
  'replacement-node-ip',
  'replacement-node-bmc-ip',
  'replacement-node-mac-address',
  'replacement-node-role',
  'sushy-uid',
  'backup-dir',
  'config',
] as const;

const BOOLEAN_FLAGS = ['add-new-node', 'expand-control-plane', 'debug', 'help', 'version'] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];
type BooleanFlag = (typeof BOOLEAN_FLAGS)[number];

const REQUIRED_FLAGS: readonly ValueFlag[] = [
  'replacement-node',
  'replacement-node-ip',
  'replacement-node-bmc-ip',
  'replacement-node-mac-address',
  'replacement-node-role',
];

const SHORT_FLAGS: Readonly<Record<string, BooleanFlag>> = {
  '-h': 'help',
  '-v': 'version',
};

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

function isBooleanFlag(name: string): name is BooleanFlag {
  return BOOLEAN_FLAGS.some((flag) => flag === name);
}

const MAC_PATTERN = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i;

/**
 * Whether the text is a dotted-quad IPv4 address with octets 0-255.
 */
export function isValidIpv4(text: string): boolean {
  const octets = text.split('.');
  if (octets.length !== 4) {
    return false;
  }
  return octets.every((octet) => /^\d{1,3}$/.test(octet) && Number(octet) <= 255);
}

/**
 * Whether the text is a colon-separated MAC address.
 */
export function isValidMac(text: string): boolean {
  return MAC_PATTERN.test(text);
}

interface RawArgs {
  readonly values: Map<ValueFlag, string>;
  readonly switches: Set<BooleanFlag>;
}

function collect(args: readonly string[]): RawArgs {
  const values = new Map<ValueFlag, string>();
  const switches = new Set<BooleanFlag>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }

    const short = SHORT_FLAGS[arg];
    if (short !== undefined) {
      switches.add(short);
      continue;
    }

    if (!arg.startsWith('--')) {
      throw new ArgumentError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf('=');
    const name = (eq === -1 ? arg.slice(2) : arg.slice(2, eq)).replace(/_/g, '-');
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    if (isBooleanFlag(name)) {
      if (inline !== undefined) {
        throw new ArgumentError(`Option --${name} does not take a value`);
      }
      switches.add(name);
      continue;
    }

    if (!isValueFlag(name)) {
      throw new ArgumentError(`Unknown option: --${name}`);
    }

    let value = inline;
    if (value === undefined) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }
    if (value === undefined || value.trim() === '') {
      throw new ArgumentError(`Option --${name} requires a value`);
    }
    values.set(name, value.trim());
  }

  return { values, switches };
}

function operationKind(switches: ReadonlySet<BooleanFlag>): OperationKind {
  const adding = switches.has('add-new-node');
  const expanding = switches.has('expand-control-plane');
  if (adding && expanding) {
    throw new ArgumentError('--add-new-node and --expand-control-plane cannot be combined');
  }
  if (adding) {
    return 'addition';
  }
  return expanding ? 'expansion' : 'replacement';
}

/**
 * Parses the arguments after the program name.
 *
 * @throws {ArgumentError} For unknown or malformed options, missing required
 *   options and role or mode combinations that cannot run.
 *
 * @example
 * ```typescript
 * const options = parseArgs([
 *   '--replacement-node', 'worker-4',
 *   '--replacement-node-ip', '192.168.10.34',
 *   '--replacement-node-bmc-ip', '10.0.0.34',
 *   '--replacement-node-mac-address', '52:54:00:aa:bb:34',
 *   '--replacement-node-role', 'worker',
 *   '--add-new-node',
 * ]);
 * // options.command === 'run', options.request.kind === 'addition'
 * ```
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const { values, switches } = collect(args);

  if (switches.has('help')) {
    return { command: 'help' };
  }
  if (switches.has('version')) {
    return { command: 'version' };
  }

  const missing = REQUIRED_FLAGS.filter((flag) => !values.has(flag));
  if (missing.length > 0) {
    throw new ArgumentError(
      `Missing required option${missing.length === 1 ? '' : 's'}: ${missing.map((flag) => `--${flag}`).join(', ')}`
    );
  }

  const required = (flag: ValueFlag): string => values.get(flag) ?? '';
  const ip = required('replacement-node-ip');
  const bmcIp = required('replacement-node-bmc-ip');
  const macAddress = required('replacement-node-mac-address');
  const roleText = required('replacement-node-role');

  if (!isValidIpv4(ip)) {
    throw new ArgumentError(`Invalid IPv4 address for --replacement-node-ip: ${ip}`);
  }
  if (!isValidIpv4(bmcIp)) {
    throw new ArgumentError(`Invalid IPv4 address for --replacement-node-bmc-ip: ${bmcIp}`);
  }
  if (!isValidMac(macAddress)) {
    throw new ArgumentError(`Invalid MAC address for --replacement-node-mac-address: ${macAddress}`);
  }

  const role = normalizeRole(roleText);
  if (role === undefined) {
    throw new ArgumentError(
      `Invalid role '${roleText}': expected master, control, control-plane or worker`
    );
  }

  const kind = operationKind(switches);
  if (role === 'worker' && kind !== 'addition') {
    throw new ArgumentError('Worker nodes can only be added with --add-new-node');
  }
  if (role === 'master' && kind === 'addition') {
    throw new ArgumentError(
      '--add-new-node adds worker nodes; use --expand-control-plane for control plane nodes'
    );
  }

  const sushyUid = values.get('sushy-uid');
  const node: NodeParameters = {
    nodeName: required('replacement-node'),
    ip,
    bmcIp,
    macAddress,
    role,
    ...(sushyUid === undefined ? {} : { sushyUid }),
  };

  const backupDir = values.get('backup-dir');
  const configPath = values.get('config');
  return {
    command: 'run',
    request: { kind, node, ...(backupDir === undefined ? {} : { backupDir }) },
    ...(configPath === undefined ? {} : { configPath }),
    debug: switches.has('debug'),
  };
}
