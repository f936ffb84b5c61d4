/**
 * In-process stand-ins used by the test suites.
 *
 * @packageDocumentation
 */

export { FakeClock } from './fake-clock.js';
export { FakeExecutor, sequence } from './fake-executor.js';
export type { CallKind, RecordedCall } from './fake-executor.js';
export { RecordingReporter } from './recording-reporter.js';
export type { ReportLevel, ReportLine } from './recording-reporter.js';

import { Logger } from '../utils/logger.js';

/**
 * Logger for tests. Warn and error entries still reach stderr, so tests that
 * assert on them capture stderr themselves.
 */
export function quietLogger(component = 'test'): Logger {
  return new Logger({ component, debugMode: false });
}
