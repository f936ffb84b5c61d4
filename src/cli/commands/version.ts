/**
 * Version command handler for the nodeswap CLI.
 *
 * Reads the version from package.json, which sits three levels up from
 * both src/cli/commands and dist/cli/commands.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliCommandResult } from '../types.js';

const UNKNOWN_VERSION = '(unknown)';

const PACKAGE_JSON_PATH = join(dirname(fileURLToPath(import.meta.url)), '../../../package.json');

/** Version recorded in package.json, or '(unknown)' when it cannot be read. */
export function getVersionFromPackageJson(): string {
  let manifest: unknown;
  try {
    manifest = JSON.parse(readFileSync(PACKAGE_JSON_PATH, 'utf-8'));
  } catch {
    return UNKNOWN_VERSION;
  }
  if (typeof manifest !== 'object' || manifest === null || !('version' in manifest)) {
    return UNKNOWN_VERSION;
  }
  return typeof manifest.version === 'string' ? manifest.version : UNKNOWN_VERSION;
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(write: (text: string) => void): CliCommandResult {
  write(`nodeswap v${getVersionFromPackageJson()}\n`);
  return { exitCode: 0 };
}
