/**
 * Operation plans and step accounting.
 *
 * A plan is computed once, before anything in the cluster changes, and fixes
 * the number of steps the operator will see. A {@link StepTracker} then counts
 * through those steps without ever going back.
 *
 * @packageDocumentation
 */

import type { NodeParameters } from '../materialize/types.js';
import type { Reporter } from '../reporting/types.js';
import { CONFLICT_STEPS } from '../resources/conflict-resolver.js';
import type { MacConflict } from '../resources/types.js';

export const OPERATION_KINDS = ['addition', 'expansion', 'replacement'] as const;

/**
 * - `addition`: a worker joins through the worker MachineSet.
 * - `expansion`: a control-plane node is added next to healthy ones.
 * - `replacement`: a failed control-plane node is removed and rebuilt.
 */
export type OperationKind = (typeof OPERATION_KINDS)[number];

/**
 * Steps each operation takes when no MAC conflict has to be cleared.
 */
export const BASE_STEPS: Readonly<Record<OperationKind, number>> = {
  addition: 6,
  expansion: 9,
  replacement: 12,
};

export interface OperationRequest {
  readonly kind: OperationKind;
  readonly node: NodeParameters;
  /** Workspace directory; defaults to a per-cluster directory. */
  readonly backupDir?: string;
}

export interface OperationPlan {
  readonly kind: OperationKind;
  readonly totalSteps: number;
  readonly replacementNode: string;
  readonly node: NodeParameters;
  readonly backupDir?: string;
  /** Running node that already uses the new node's MAC address. */
  readonly macConflict?: MacConflict;
}

/**
 * Fixes the plan for a request.
 *
 * @param macConflict - Result of conflict detection, which runs first.
 */
export function computePlan(request: OperationRequest, macConflict?: MacConflict): OperationPlan {
  const totalSteps = BASE_STEPS[request.kind] + (macConflict === undefined ? 0 : CONFLICT_STEPS);
  return Object.freeze({
    kind: request.kind,
    totalSteps,
    replacementNode: request.node.nodeName,
    node: request.node,
    ...(request.backupDir === undefined ? {} : { backupDir: request.backupDir }),
    ...(macConflict === undefined ? {} : { macConflict }),
  });
}

/**
 * Operator-facing title of an operation.
 */
export function operationTitle(plan: OperationPlan): string {
  switch (plan.kind) {
    case 'addition':
      return `Adding worker node ${plan.replacementNode}`;
    case 'expansion':
      return `Expanding control plane with ${plan.replacementNode}`;
    case 'replacement':
      return `Replacing control plane node with ${plan.replacementNode}`;
  }
}

/**
 * Error thrown when an operation takes more steps than its plan allows.
 */
export class StepOverflowError extends Error {
  constructor(step: number, total: number) {
    super(`Step ${String(step)} exceeds the plan of ${String(total)} steps`);
    this.name = 'StepOverflowError';
  }
}

/**
 * Counts plan steps and prints each as it starts.
 */
export class StepTracker {
  private count = 0;
  private currentText = '';

  constructor(
    private readonly total: number,
    private readonly reporter: Reporter
  ) {}

  /**
   * Starts the next step.
   *
   * @returns The step number.
   * @throws {StepOverflowError} Past the planned total.
   */
  next(text: string): number {
    if (this.count >= this.total) {
      throw new StepOverflowError(this.count + 1, this.total);
    }
    this.count++;
    this.currentText = text;
    this.reporter.step(this.count, this.total, text);
    return this.count;
  }

  /** Steps started so far. */
  get completed(): number {
    return this.count;
  }

  get totalSteps(): number {
    return this.total;
  }

  /** Description of the most recent step, empty before the first. */
  get currentStep(): string {
    return this.currentText;
  }
}
