#!/usr/bin/env node

/**
 * nodeswap CLI entry point.
 *
 * The first SIGINT interrupts the running operation at its next wait, so it
 * can report where it stopped; a second one exits at once.
 */

import { main } from './main.js';
import { EXIT_CODES } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';

const controller = new AbortController();

process.on('SIGINT', () => {
  if (controller.signal.aborted) {
    process.exit(EXIT_CODES.interrupted);
  }
  process.stderr.write('\nInterrupt received, stopping at the next wait (Ctrl-C again to exit now)\n');
  controller.abort();
});

withErrorHandling(async () => ({
  exitCode: await main(process.argv.slice(2), { signal: controller.signal }),
}));
