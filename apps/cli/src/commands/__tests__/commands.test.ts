/**
 * CLI command tests
 *
 * Commands run against a temp project root and a scripted command runner.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ConfigurationError,
  createSilentLogger,
  loadConfig,
  type CommandOutput,
  type CommandRunner,
  type CommandSpec,
  type ReleasePublisher,
} from '@libforge/core';
import type { CliContext } from '../../context.js';
import { buildCommand } from '../build.js';
import { doctorCommand } from '../doctor.js';
import { matrixTargets, parseExcludes, parseMaxParallel } from '../matrix.js';
import { packageCommand } from '../package.js';
import { createProgram, reportError } from '../../program.js';

// =============================================================================
// Helpers
// =============================================================================

function output(stdout: string, exitCode = 0): CommandOutput {
  return { exitCode, signal: null, stdout, stderr: '', durationMs: 1, interrupted: false };
}

const missing: CommandOutput = {
  exitCode: null,
  signal: null,
  stdout: '',
  stderr: '',
  durationMs: 1,
  interrupted: false,
  spawnError: new Error('spawn ENOENT'),
};

/**
 * Runner answering by command name
 */
function scriptedRunner(responses: Record<string, CommandOutput>): CommandRunner {
  return {
    run: vi.fn(async (spec: CommandSpec) => responses[spec.command] ?? missing),
  };
}

function testContext(rootDir: string, runner: CommandRunner): CliContext {
  return {
    config: loadConfig({ rootDir, env: {} }),
    logger: createSilentLogger(),
    runner,
    json: true,
    verbose: false,
  };
}

function lastJson(spy: { mock: { calls: unknown[][] } }): unknown {
  const calls = spy.mock.calls;
  const last = calls[calls.length - 1];
  return JSON.parse(String(last?.[0]));
}

// =============================================================================
// Tests
// =============================================================================

describe('CLI commands', () => {
  let root: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'libforge-cli-'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await rm(root, { recursive: true, force: true });
  });

  describe('createProgram', () => {
    it('registers every command', () => {
      const names = createProgram().commands.map((command) => command.name());
      expect(names).toEqual(['build', 'doctor', 'matrix', 'package', 'clean']);
    });
  });

  describe('reportError', () => {
    it('prints field errors and maps configuration errors to 50', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const code = reportError(
        new ConfigurationError('Invalid configuration', { fieldErrors: { outputDir: 'Required' } })
      );
      expect(code).toBe(50);
      expect(errorSpy).toHaveBeenCalledTimes(2);
    });

    it('maps unknown errors to 1', () => {
      expect(reportError(new Error('boom'))).toBe(1);
    });
  });

  describe('matrix option parsing', () => {
    it('accepts known cell steps', () => {
      expect(parseExcludes(['clone', 'dll'])).toEqual(['clone', 'dll']);
    });

    it('rejects unknown cell steps', () => {
      expect(() => parseExcludes(['link'])).toThrow('Unknown cell step "link" (expected one of: clone, crypto, sdk, dll)');
    });

    it('parses --max-parallel', () => {
      expect(parseMaxParallel(undefined)).toBeUndefined();
      expect(parseMaxParallel('2')).toBe(2);
      expect(() => parseMaxParallel('0')).toThrow('--max-parallel must be a positive integer, got "0"');
    });

    it('selects only the host target with --host', () => {
      const host = () => ({ osFamily: 'macos' as const, architecture: 'arm64' as const, runtimeIdentifier: 'osx-arm64' });

      expect(matrixTargets({ host: true }, host).map((t) => t.runtimeIdentifier)).toEqual(['osx-arm64']);
      expect(matrixTargets({}, host)).toHaveLength(4);
      expect(matrixTargets({ target: ['win-x64'] }, host).map((t) => t.runtimeIdentifier)).toEqual(['win-x64']);
    });

    it('rejects a host that is not a matrix target', () => {
      const host = () => ({ osFamily: 'linux' as const, architecture: 'arm64' as const, runtimeIdentifier: 'linux-arm64' });

      expect(() => matrixTargets({ host: true }, host)).toThrow(
        'Host linux-arm64 is not a matrix target (expected one of: win-x64, linux-x64, osx-x64, osx-arm64)'
      );
    });

    it('rejects --host together with --target', () => {
      expect(() => matrixTargets({ host: true, target: ['win-x64'] })).toThrow('--host cannot be combined with --target');
    });
  });

  describe('buildCommand', () => {
    it('aborts at the first step when the managed runtime is missing', async () => {
      const ctx = testContext(root, scriptedRunner({}));

      const exitCode = await buildCommand(ctx);

      expect(exitCode).toBe(20);
      expect(lastJson(consoleLogSpy)).toMatchObject({
        status: 'aborted',
        exitCode: 20,
        artifactsCopied: 0,
        warnings: {},
        abortedAt: {
          stepNumber: 1,
          stepName: 'Checking dependencies',
          code: 'TOOL_MISSING',
          message: 'dotnet is not installed or not in PATH',
        },
      });
    });
  });

  describe('doctorCommand', () => {
    it('reports matrix-only tools as warnings', async () => {
      vi.stubEnv('GITHUB_TOKEN', 'test-secret');
      const ctx = testContext(
        root,
        scriptedRunner({
          dotnet: output('9.0.100\n'),
          cargo: output('cargo 1.80.0 (376290515 2024-07-16)\n'),
          git: output('git version 2.45.0\n'),
          gcc: output('gcc (GCC) 13.2.0\n'),
        })
      );

      const exitCode = await doctorCommand(ctx);

      expect(exitCode).toBe(0);
      const report = lastJson(consoleLogSpy);
      expect(report).toMatchObject({
        checks: [
          { name: 'dotnet', status: 'ok', value: '9.0.100' },
          { name: 'cargo', status: 'ok', value: 'cargo 1.80.0 (376290515 2024-07-16)' },
          { name: 'git', status: 'ok' },
          { name: 'go', status: 'warn', message: 'go is not installed or not in PATH (needed for matrix builds)' },
          { name: 'gcc', status: 'ok' },
          { name: 'SDK checkout', status: 'warn' },
          { name: 'Config file', status: 'warn' },
          { name: 'ENV: GITHUB_TOKEN', status: 'ok', value: 'set' },
        ],
        summary: { total: 8, ok: 5, warn: 3, error: 0 },
      });
    });

    it('fails with the version exit code when the managed runtime is too old', async () => {
      const ctx = testContext(
        root,
        scriptedRunner({ dotnet: output('8.0.400\n'), cargo: output('cargo 1.80.0\n') })
      );

      const exitCode = await doctorCommand(ctx);

      expect(exitCode).toBe(21);
      const report = lastJson(consoleLogSpy);
      expect(report).toMatchObject({ summary: { total: 8, error: 1 } });
      expect(report).toHaveProperty('checks.0', {
        name: 'dotnet',
        status: 'error',
        message: 'dotnet version is 8.0.400 (80), which is below the required 90',
      });
    });
  });

  describe('packageCommand', () => {
    const rids = ['win-x64', 'linux-x64', 'osx-x64', 'osx-arm64'];

    async function writeOutputs(skip?: string): Promise<void> {
      for (const rid of rids) {
        if (rid === skip) continue;
        const dir = join(root, 'native-libs', rid);
        await mkdir(dir, { recursive: true });
        if (rid === 'osx-arm64') {
          await writeFile(join(dir, 'README.txt'), 'osx-arm64 Build Notice\n');
        } else {
          await writeFile(join(dir, `proton_sdk_${rid}.lib`), rid);
        }
      }
    }

    it('archives every platform and publishes through the publisher', async () => {
      await writeOutputs();
      const publish = vi.fn(async () => ({ url: 'https://example.test/releases/v1.0.0', assets: [] }));
      const publisher: ReleasePublisher = { publish };

      const exitCode = await packageCommand(testContext(root, scriptedRunner({})), {
        tag: 'v1.0.0',
        publish: true,
        publisherFactory: () => publisher,
      });

      expect(exitCode).toBe(0);
      expect(publish).toHaveBeenCalledTimes(1);
      expect(lastJson(consoleLogSpy)).toMatchObject({
        tag: 'v1.0.0',
        name: 'Proton SDK Native Libraries v1.0.0',
        prerelease: false,
        assets: [
          { runtime: 'win-x64', path: join(root, 'release-assets', 'proton-sdk-native-win-x64.zip'), placeholder: false, files: ['proton_sdk_win-x64.lib'] },
          { runtime: 'linux-x64', placeholder: false, files: ['proton_sdk_linux-x64.lib'] },
          { runtime: 'osx-x64', placeholder: false },
          { runtime: 'osx-arm64', placeholder: true, files: ['README.txt'] },
          { runtime: 'all', path: join(root, 'release-assets', 'proton-sdk-native-all-platforms.tar.gz') },
        ],
      });
    });

    it('returns 41 when a platform directory is missing', async () => {
      await writeOutputs('osx-x64');

      const exitCode = await packageCommand(testContext(root, scriptedRunner({})), { tag: 'v1.0.0' });

      expect(exitCode).toBe(41);
    });

    it('returns 42 when publishing fails', async () => {
      await writeOutputs();
      const publisher: ReleasePublisher = {
        publish: vi.fn(async () => {
          throw new Error('HTTP 422');
        }),
      };

      const exitCode = await packageCommand(testContext(root, scriptedRunner({})), {
        tag: 'v1.0.0-rc.1',
        publish: true,
        publisherFactory: () => publisher,
      });

      expect(exitCode).toBe(42);
    });

    it('refuses to publish without a repository', async () => {
      await writeOutputs();

      await expect(
        packageCommand(testContext(root, scriptedRunner({})), { tag: 'v1.0.0', publish: true })
      ).rejects.toThrow('No repository to publish to: set release.repository or GITHUB_REPOSITORY');
    });
  });
});
