import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { NodeParameters } from '../materialize/types.js';
import { RecordingReporter } from '../testing/recording-reporter.js';
import {
  BASE_STEPS,
  OPERATION_KINDS,
  StepOverflowError,
  StepTracker,
  computePlan,
  operationTitle,
} from './plan.js';

const NODE: NodeParameters = {
  nodeName: 'master-3',
  ip: '192.168.10.23',
  bmcIp: '10.0.0.23',
  macAddress: '52:54:00:aa:bb:03',
  role: 'master',
};

const CONFLICT = {
  claimName: 'worker-old',
  machineName: 'ocp4-x7k2p-worker-0-old12',
  nodeName: 'worker-old',
  nodePresent: true,
};

describe('computePlan', () => {
  it('uses the base step count of each operation', () => {
    expect(computePlan({ kind: 'addition', node: NODE }).totalSteps).toBe(6);
    expect(computePlan({ kind: 'expansion', node: NODE }).totalSteps).toBe(9);
    expect(computePlan({ kind: 'replacement', node: NODE }).totalSteps).toBe(12);
  });

  it('adds three steps for a MAC conflict', () => {
    expect(computePlan({ kind: 'addition', node: NODE }, CONFLICT).totalSteps).toBe(9);
    expect(computePlan({ kind: 'expansion', node: NODE }, CONFLICT).totalSteps).toBe(12);
    expect(computePlan({ kind: 'replacement', node: NODE }, CONFLICT).totalSteps).toBe(15);
  });

  it('freezes the plan', () => {
    const plan = computePlan({ kind: 'replacement', node: NODE, backupDir: '/tmp/ws' }, CONFLICT);

    expect(Object.isFrozen(plan)).toBe(true);
    expect(plan).toEqual({
      kind: 'replacement',
      totalSteps: 15,
      replacementNode: 'master-3',
      node: NODE,
      backupDir: '/tmp/ws',
      macConflict: CONFLICT,
    });
  });

  it('titles each operation', () => {
    expect(operationTitle(computePlan({ kind: 'addition', node: NODE }))).toBe('Adding worker node master-3');
    expect(operationTitle(computePlan({ kind: 'expansion', node: NODE }))).toBe(
      'Expanding control plane with master-3'
    );
  });
});

describe('StepTracker', () => {
  it('prints each step against the total', () => {
    const reporter = new RecordingReporter();
    const tracker = new StepTracker(2, reporter);

    expect(tracker.next('Setting up backup directory')).toBe(1);
    expect(tracker.next('Getting template configuration')).toBe(2);

    expect(reporter.textOf('step')).toEqual([
      '[1/2] Setting up backup directory',
      '[2/2] Getting template configuration',
    ]);
    expect(tracker.currentStep).toBe('Getting template configuration');
  });

  it('refuses to go past the plan', () => {
    const tracker = new StepTracker(1, new RecordingReporter());
    tracker.next('only');

    expect(() => tracker.next('extra')).toThrow(StepOverflowError);
    expect(() => tracker.next('extra')).toThrow('Step 2 exceeds the plan of 1 steps');
    expect(tracker.completed).toBe(1);
  });

  it('numbers steps consecutively up to any planned total', () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...OPERATION_KINDS),
        fc.boolean(),
        fc.nat(20),
        (kind, conflicted, requested) => {
          const plan = computePlan({ kind, node: NODE }, conflicted ? CONFLICT : undefined);
          const tracker = new StepTracker(plan.totalSteps, new RecordingReporter());
          const taken = Math.min(requested, plan.totalSteps);

          const numbers = Array.from({ length: taken }, (_, i) => tracker.next(`step ${String(i)}`));

          expect(numbers).toEqual(Array.from({ length: taken }, (_, i) => i + 1));
          expect(plan.totalSteps).toBe(BASE_STEPS[kind] + (conflicted ? 3 : 0));
        }
      )
    );
  });
});
