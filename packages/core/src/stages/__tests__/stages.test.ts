/**
 * Build stage tests: sync, managed build, systems build, test
 */

import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { commandOutput, FakeCommandRunner, testContext } from '../../testing/fakes.js';
import { DependencySynchronizer } from '../dependency-synchronizer.js';
import { ManagedBuildStage } from '../managed-build.js';
import { SystemsBuildStage } from '../systems-build.js';
import { TestStage } from '../test-stage.js';

describe('DependencySynchronizer', () => {
  it('records a failed submodule update as a sync warning', async () => {
    const runner = new FakeCommandRunner().on('git submodule', commandOutput({ exitCode: 128 }));

    const report = await new DependencySynchronizer(testContext('/work/project', { runner })).execute();

    expect(runner.commandLines).toEqual(['git submodule update --init --recursive']);
    expect(report.results[0].outcome).toEqual({ kind: 'advisory', warning: 'SYNC_WARNING', reason: 'exit code 128' });
  });
});

describe('ManagedBuildStage', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'libforge-managed-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('fails without invoking the build when the SDK directory is missing', async () => {
    const runner = new FakeCommandRunner();
    const stage = new ManagedBuildStage(testContext(root, { runner }));

    const result = await stage.build();

    expect(runner.calls).toHaveLength(0);
    expect(result.outcome.kind).toBe('fatal');
    if (result.outcome.kind === 'fatal') {
      expect(result.outcome.error.code).toBe('PROJECT_DIRECTORY_MISSING');
      expect(result.outcome.error.message).toBe(
        `SDK directory not found: ${join(root, 'Proton.SDK')}. Make sure git submodules are initialized.`
      );
    }
  });

  it('builds in Release inside the SDK directory', async () => {
    await mkdir(join(root, 'Proton.SDK'));
    const runner = new FakeCommandRunner();
    const stage = new ManagedBuildStage(testContext(root, { runner }));

    const result = await stage.build();

    expect(result.outcome.kind).toBe('success');
    expect(runner.commandLines).toEqual(['dotnet build -c Release']);
    expect(runner.calls[0].spec.cwd).toBe(join(root, 'Proton.SDK'));
  });

  it('fails with the managed build code', async () => {
    await mkdir(join(root, 'Proton.SDK'));
    const runner = new FakeCommandRunner().on('dotnet build', commandOutput({ exitCode: 1 }));

    const result = await new ManagedBuildStage(testContext(root, { runner })).build();

    expect(result.outcome.kind === 'fatal' && result.outcome.error.message).toBe(
      'Failed: Building Proton.SDK (exit code: 1)'
    );
    expect(result.outcome.kind === 'fatal' && result.outcome.error.code).toBe('MANAGED_BUILD_FAILED');
  });
});

describe('SystemsBuildStage', () => {
  it('continues past binding failures and gates on the workspace build', async () => {
    const runner = new FakeCommandRunner().on('cargo build -p proton-sdk-sys', commandOutput({ exitCode: 101 }));

    const report = await new SystemsBuildStage(testContext('/work/project', { runner })).execute();

    expect(runner.commandLines).toEqual([
      'cargo build -p proton-sdk-sys',
      'cargo build -p proton-sdk-rs',
      'cargo build --workspace',
    ]);
    expect(report.results.map((r) => [r.stepName, r.outcome.kind])).toEqual([
      ['Building proton-sdk-sys', 'advisory'],
      ['Building proton-sdk-rs', 'success'],
      ['Building workspace', 'success'],
    ]);
  });

  it('fails when the workspace does not build', async () => {
    const runner = new FakeCommandRunner().on('cargo build --workspace', commandOutput({ exitCode: 101 }));

    const report = await new SystemsBuildStage(testContext('/work/project', { runner })).execute();

    const last = report.results[2].outcome;
    expect(last.kind === 'fatal' && last.error.code).toBe('WORKSPACE_BUILD_FAILED');
  });

  it('exports the native library directory to cargo', async () => {
    const runner = new FakeCommandRunner();
    await new SystemsBuildStage(testContext('/work/project', { runner })).execute();
    expect(runner.calls[0].spec.env).toEqual({ PROTON_SDK_LIB_DIR: join('/work/project', 'native-libs') });
  });
});

describe('TestStage', () => {
  it('records failing tests as a warning', async () => {
    const runner = new FakeCommandRunner().on('cargo test', commandOutput({ exitCode: 101 }));

    const report = await new TestStage(testContext('/work/project', { runner })).execute();

    expect(runner.commandLines).toEqual(['cargo test --workspace']);
    expect(report.results[0].outcome).toEqual({ kind: 'advisory', warning: 'TEST_FAILURE', reason: 'exit code 101' });
  });
});
