/**
 * Terminal report of an operation and how it is told to the operator.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { ENABLE_GUARD_COMMAND } from '../quorum/quorum-manager.js';
import type { Reporter, Suggestion } from '../reporting/types.js';
import { formatRuntime } from '../utils/clock.js';
import type { OperationKind } from './plan.js';

export type OperationReport =
  | {
      readonly kind: 'succeeded';
      readonly operation: OperationKind;
      readonly nodeName: string;
      readonly stepsCompleted: number;
      readonly totalSteps: number;
      readonly elapsedMs: number;
      /** Machine the new node runs on. */
      readonly machineName?: string;
      readonly guardLeftDisabled: boolean;
    }
  | {
      readonly kind: 'failed';
      readonly operation: OperationKind;
      readonly nodeName: string;
      /** Step that failed, 1-based; 0 before the first step. */
      readonly step: number;
      readonly stepText: string;
      readonly totalSteps: number;
      readonly reason: string;
      readonly remediation: readonly Suggestion[];
      readonly elapsedMs: number;
      readonly guardLeftDisabled: boolean;
      /** Backups of removed resources, restorable with `oc apply -f`. */
      readonly backups: readonly string[];
      readonly interrupted: boolean;
    };

/**
 * Restore command for each retained backup file.
 */
export function restoreSuggestions(backups: readonly string[]): Suggestion[] {
  return backups.map((file) => ({
    text: `Restore ${path.basename(file)}`,
    action: `oc apply -f ${file}`,
  }));
}

function formatSuggestion(suggestion: Suggestion): string {
  return suggestion.action === undefined
    ? `  - ${suggestion.text}`
    : `  - ${suggestion.text}: ${suggestion.action}`;
}

function successHeadline(operation: OperationKind, nodeName: string): { title: string; detail: string } {
  if (operation === 'addition') {
    return {
      title: `Worker node '${nodeName}' addition completed successfully!`,
      detail: 'New worker node is ready and available for workloads',
    };
  }
  return {
    title: `Control plane node '${nodeName}' operation completed successfully!`,
    detail: 'The new control plane node is operational and part of the cluster',
  };
}

/**
 * Prints the closing narrative of an operation.
 */
export function presentReport(report: OperationReport, reporter: Reporter): void {
  if (report.kind === 'succeeded') {
    const { title, detail } = successHeadline(report.operation, report.nodeName);
    reporter.header(title);
    reporter.success(detail);
    if (report.machineName !== undefined) {
      reporter.info(`Machine: ${report.machineName}`);
    }
    if (report.guardLeftDisabled) {
      reporter.warn('The etcd quorum guard is still disabled');
      reporter.info(`Re-enable it once all etcd members are healthy: ${ENABLE_GUARD_COMMAND}`);
    }
    reporter.info(
      `Completed ${String(report.stepsCompleted)}/${String(report.totalSteps)} steps. Total runtime: ${formatRuntime(report.elapsedMs)}`
    );
    return;
  }

  if (report.interrupted) {
    reporter.error(`Operation interrupted during step ${String(report.step)}: ${report.stepText}`);
  } else {
    reporter.error(`Node operation failed at step ${String(report.step)}/${String(report.totalSteps)}: ${report.reason}`);
  }
  reporter.error(`Total runtime before failure: ${formatRuntime(report.elapsedMs)}`);

  if (report.guardLeftDisabled) {
    reporter.warn('The cluster is running in reduced quorum: the etcd quorum guard is disabled');
    reporter.info(`Re-enable it with: ${ENABLE_GUARD_COMMAND}`);
  }

  if (report.remediation.length > 0) {
    reporter.info(['Suggested next steps:', ...report.remediation.map(formatSuggestion)].join('\n'));
  }

  if (report.backups.length > 0) {
    reporter.info(
      ['Backups of removed resources were kept:', ...restoreSuggestions(report.backups).map(formatSuggestion)].join(
        '\n'
      )
    );
  }
  reporter.info('You may need to clean up partially created resources manually');
}
