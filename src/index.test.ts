import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { BASE_STEPS } from './orchestrator/plan.js';
import { ENABLE_GUARD_COMMAND, VERSION, computePlan } from './index.js';

describe('nodeswap', () => {
  it('matches the package version', () => {
    const packageJson: unknown = JSON.parse(
      readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf-8')
    );

    expect(packageJson).toMatchObject({ name: 'nodeswap', version: VERSION });
  });

  it('exposes planning and the guard restore command', () => {
    const plan = computePlan({
      kind: 'expansion',
      node: {
        nodeName: 'master-3',
        ip: '192.168.10.23',
        bmcIp: '10.0.0.23',
        macAddress: '52:54:00:aa:bb:03',
        role: 'master',
      },
    });

    expect(plan.totalSteps).toBe(BASE_STEPS.expansion);
    expect(ENABLE_GUARD_COMMAND).toBe(
      `oc patch etcd/cluster --type=merge -p '{"spec": {"unsupportedConfigOverrides": null}}'`
    );
  });
});
