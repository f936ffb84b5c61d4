/**
 * Tests for config loading and component wiring.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigParseError, ConfigValidationError, getDefaultConfig } from '../config/index.js';
import type { OperationReport } from '../orchestrator/report.js';
import { FakeClock, FakeExecutor, RecordingReporter } from '../testing/index.js';
import { createDependencies, exitCodeFor, loadConfig } from './app.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nodeswap-app-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses defaults when no config file exists', async () => {
    const loaded = await loadConfig({ cwd: dir, env: {} });

    expect(loaded).toEqual({ config: getDefaultConfig() });
  });

  it('reads nodeswap.toml from the working directory', async () => {
    await writeFile(join(dir, 'nodeswap.toml'), '[monitor]\ntimeout_minutes = 60\n\n[cli]\ncolors = false\n');

    const loaded = await loadConfig({ cwd: dir, env: {} });

    expect(loaded.source).toBe(join(dir, 'nodeswap.toml'));
    expect(loaded.config.monitor.timeout_minutes).toBe(60);
    expect(loaded.config.monitor.check_interval_seconds).toBe(25);
    expect(loaded.config.cli.colors).toBe(false);
  });

  it('lets the environment and the debug flag override the file', async () => {
    await writeFile(join(dir, 'lab.toml'), '[monitor]\ntimeout_minutes = 60\n');

    const loaded = await loadConfig({
      cwd: dir,
      configPath: 'lab.toml',
      env: { NODESWAP_MONITOR_TIMEOUT_MINUTES: '90' },
      debug: true,
    });

    expect(loaded.config.monitor.timeout_minutes).toBe(90);
    expect(loaded.config.cli.debug).toBe(true);
  });

  it('requires an explicit config file to exist', async () => {
    const pending = loadConfig({ cwd: dir, configPath: 'missing.toml', env: {} });

    await expect(pending).rejects.toThrow(ConfigParseError);
    await expect(loadConfig({ cwd: dir, configPath: 'missing.toml', env: {} })).rejects.toThrow(
      `Config file not found: ${join(dir, 'missing.toml')}`
    );
  });

  it('rejects values that fail validation', async () => {
    await writeFile(join(dir, 'nodeswap.toml'), '[monitor]\ncheck_interval_seconds = 0\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(ConfigValidationError);
  });
});

describe('createDependencies', () => {
  it('routes workspace lookups through the configured executor', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'nodeswap-app-'));
    try {
      const executor = new FakeExecutor().onRun('get dns cluster', 'lab.example.test');
      const config = getDefaultConfig();
      const deps = createDependencies(config, new RecordingReporter(), {
        executor,
        clock: new FakeClock(0),
        homeDir: dir,
      });

      const workspace = await deps.prepareWorkspace();

      expect(workspace).toEqual({
        dir: join(dir, 'backup_yamls', 'lab.example.test'),
        created: true,
        clusterName: 'lab.example.test',
      });
      expect(deps.settings).toEqual({
        machineApiNamespace: 'openshift-machine-api',
        etcdNamespace: 'openshift-etcd',
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('exitCodeFor', () => {
  const failed: OperationReport = {
    kind: 'failed',
    operation: 'addition',
    nodeName: 'worker-4',
    step: 6,
    stepText: 'Monitoring new worker provisioning',
    totalSteps: 6,
    reason: 'Provisioning monitor interrupted',
    remediation: [],
    elapsedMs: 0,
    guardLeftDisabled: false,
    backups: [],
    interrupted: false,
  };

  it('maps reports to exit codes', () => {
    expect(
      exitCodeFor({
        kind: 'succeeded',
        operation: 'addition',
        nodeName: 'worker-4',
        stepsCompleted: 6,
        totalSteps: 6,
        elapsedMs: 1,
        guardLeftDisabled: false,
      })
    ).toBe(0);
    expect(exitCodeFor(failed)).toBe(1);
    expect(exitCodeFor({ ...failed, interrupted: true })).toBe(130);
  });
});
