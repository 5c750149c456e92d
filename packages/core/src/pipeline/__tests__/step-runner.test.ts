/**
 * Step runner tests
 */

import { describe, it, expect } from 'vitest';
import { FatalStepError } from '../../reliability/errors.js';
import { captureLogger, commandOutput, FakeCommandRunner, testContext } from '../../testing/fakes.js';
import { failureReason, inProcessResult, interruptSignal, StepRunner } from '../step-runner.js';
import { advisoryStep, fatalStep } from '../types.js';

const tests = advisoryStep('Running tests', { command: 'cargo', args: ['test', '--workspace'] }, 'TEST_FAILURE');
const workspace = fatalStep(
  'Building workspace',
  { command: 'cargo', args: ['build', '--workspace'] },
  'WORKSPACE_BUILD_FAILED'
);

describe('StepRunner', () => {
  it('records a successful step', async () => {
    const { logger, entries } = captureLogger();
    const runner = new StepRunner(new FakeCommandRunner(), logger);

    const result = await runner.run(tests);

    expect(result).toMatchObject({ stepName: 'Running tests', succeeded: true, exitCode: 0, outcome: { kind: 'success' } });
    expect(entries.map((entry) => entry.message)).toEqual(['Running tests', 'Completed: Running tests']);
    expect(entries[0]).toMatchObject({ step: 'Running tests', command: 'cargo test --workspace', severity: 'INFO' });
  });

  it('turns an advisory failure into a warning', async () => {
    const fake = new FakeCommandRunner().on('cargo test', commandOutput({ exitCode: 1 }));
    const { logger } = captureLogger();

    const result = await new StepRunner(fake, logger).run(tests);

    expect(result.succeeded).toBe(false);
    expect(result.outcome).toEqual({ kind: 'advisory', warning: 'TEST_FAILURE', reason: 'exit code 1' });
  });

  it('turns a fatal failure into a FatalStepError with the stderr tail', async () => {
    const fake = new FakeCommandRunner().on(
      'cargo build',
      commandOutput({ exitCode: 101, stderr: 'error[E0425]: cannot find value\n' })
    );
    const { logger } = captureLogger();

    const result = await new StepRunner(fake, logger).run(workspace);

    expect(result.outcome.kind).toBe('fatal');
    if (result.outcome.kind === 'fatal') {
      expect(result.outcome.error).toBeInstanceOf(FatalStepError);
      expect(result.outcome.error.code).toBe('WORKSPACE_BUILD_FAILED');
      expect(result.outcome.error.message).toBe('Failed: Building workspace (exit code: 101)');
      expect(result.outcome.error.context).toMatchObject({ stderr: 'error[E0425]: cannot find value' });
    }
  });

  it('treats an interrupted advisory step as fatal', async () => {
    const controller = new AbortController();
    controller.abort('SIGTERM');
    const fake = new FakeCommandRunner().on('cargo test', commandOutput({ exitCode: null, interrupted: true }));
    const { logger } = captureLogger();

    const result = await new StepRunner(fake, logger, { signal: controller.signal }).run(tests);

    expect(result.outcome.kind).toBe('fatal');
    if (result.outcome.kind === 'fatal') {
      expect(result.outcome.error.code).toBe('INTERRUPTED');
      expect(result.outcome.error.message).toBe('Build interrupted by SIGTERM');
    }
  });

  it('stops runAll at the first fatal step', async () => {
    const fake = new FakeCommandRunner().on('cargo', commandOutput({ exitCode: 1 }));
    const { logger } = captureLogger();

    const results = await new StepRunner(fake, logger).runAll([tests, workspace, tests]);

    expect(results.map((r) => r.outcome.kind)).toEqual(['advisory', 'fatal']);
    expect(fake.calls).toHaveLength(2);
  });

  it('exports the native library directory from the context', async () => {
    const fake = new FakeCommandRunner();
    const ctx = testContext('/work/project', { runner: fake });

    await StepRunner.fromContext(ctx).run(tests);
    await StepRunner.fromContext(ctx, '/out/linux-x64').run(tests);

    expect(fake.calls[0].spec.env).toEqual({ PROTON_SDK_LIB_DIR: '/work/project/native-libs' });
    expect(fake.calls[1].spec.env).toEqual({ PROTON_SDK_LIB_DIR: '/out/linux-x64' });
  });
});

describe('failureReason', () => {
  it('describes why a command failed', () => {
    expect(failureReason(commandOutput({ interrupted: true }))).toBe('interrupted');
    expect(failureReason(commandOutput({ exitCode: null, spawnError: new Error('spawn go ENOENT') }))).toBe(
      'spawn go ENOENT'
    );
    expect(failureReason(commandOutput({ exitCode: null, signal: 'SIGKILL' }))).toBe('terminated by SIGKILL');
    expect(failureReason(commandOutput({ exitCode: 2 }))).toBe('exit code 2');
  });
});

describe('inProcessResult', () => {
  it('has no exit code', () => {
    expect(inProcessResult('Collecting native libraries', Date.now())).toMatchObject({
      succeeded: true,
      exitCode: null,
      outcome: { kind: 'success' },
    });
  });
});

describe('interruptSignal', () => {
  it('reads a string abort reason', () => {
    const controller = new AbortController();
    controller.abort('SIGINT');
    expect(interruptSignal(controller.signal)).toBe('SIGINT');
    expect(interruptSignal(undefined)).toBeUndefined();
  });
});
