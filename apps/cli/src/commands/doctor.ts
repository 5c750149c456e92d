/**
 * Doctor Command
 *
 * Environment health check for building and releasing.
 *
 * Checks:
 * - Required toolchains and the managed runtime's minimum version
 * - Matrix-only tools (git, go, gcc)
 * - SDK checkout and config file presence
 * - GITHUB_TOKEN presence (never prints its value)
 *
 * @module @libforge/cli/commands/doctor
 */

import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  createSilentLogger,
  DependencyVerifier,
  resolvePath,
  toExitCode,
  type ForgeError,
  type ToolProbe,
} from '@libforge/core';
import type { CliContext } from '../context.js';

/**
 * Health check result
 */
export interface HealthCheck {
  name: string;
  status: 'ok' | 'warn' | 'error';
  value?: string;
  message?: string;
}

/**
 * Doctor report
 */
export interface DoctorReport {
  timestamp: string;
  checks: HealthCheck[];
  summary: {
    total: number;
    ok: number;
    warn: number;
    error: number;
  };
}

async function checkTool(
  ctx: CliContext,
  probe: ToolProbe,
  required: boolean
): Promise<{ check: HealthCheck; error?: ForgeError }> {
  const verifier = new DependencyVerifier({ ...ctx, logger: createSilentLogger() }, [probe]);
  const verified = await verifier.verify();

  if (verified.ok) {
    return { check: { name: probe.name, status: 'ok', value: verified.value[probe.name]?.raw } };
  }
  return {
    check: {
      name: probe.name,
      status: required ? 'error' : 'warn',
      message: required ? verified.error.message : `${verified.error.message} (needed for matrix builds)`,
    },
    error: required ? verified.error : undefined,
  };
}

export async function runDoctorChecks(ctx: CliContext): Promise<{ report: DoctorReport; firstError?: ForgeError }> {
  const { config } = ctx;
  const checks: HealthCheck[] = [];
  let firstError: ForgeError | undefined;

  // 1. Toolchains
  const probes: [ToolProbe, boolean][] = [
    [config.toolchain.managedRuntime, true],
    [config.toolchain.systems, true],
    ...config.toolchain.matrixExtras.map((probe): [ToolProbe, boolean] => [probe, false]),
  ];
  for (const [probe, required] of probes) {
    const { check, error } = await checkTool(ctx, probe, required);
    checks.push(check);
    firstError ??= error;
  }

  // 2. SDK checkout
  const sdkDir = resolvePath(config, config.sdkDir);
  const sdkExists = existsSync(sdkDir);
  checks.push({
    name: 'SDK checkout',
    status: sdkExists ? 'ok' : 'warn',
    value: sdkDir,
    message: sdkExists ? undefined : 'Not found; run git submodule update --init --recursive',
  });

  // 3. Config file
  const configPath = join(config.rootDir, CONFIG_FILE_NAME);
  const hasConfig = existsSync(configPath);
  checks.push({
    name: 'Config file',
    status: hasConfig ? 'ok' : 'warn',
    value: hasConfig ? configPath : undefined,
    message: hasConfig ? undefined : `No ${CONFIG_FILE_NAME}; using defaults`,
  });

  // 4. Publishing credentials (only show set/unset)
  const hasToken = Boolean(process.env.GITHUB_TOKEN);
  checks.push({
    name: 'ENV: GITHUB_TOKEN',
    status: hasToken ? 'ok' : 'warn',
    value: hasToken ? 'set' : 'unset',
    message: hasToken ? undefined : 'Needed for package --publish',
  });

  const report: DoctorReport = {
    timestamp: new Date().toISOString(),
    checks,
    summary: {
      total: checks.length,
      ok: checks.filter((c) => c.status === 'ok').length,
      warn: checks.filter((c) => c.status === 'warn').length,
      error: checks.filter((c) => c.status === 'error').length,
    },
  };

  return { report, firstError };
}

/**
 * Execute the doctor command
 */
export async function doctorCommand(ctx: CliContext): Promise<number> {
  const { report, firstError } = await runDoctorChecks(ctx);
  const exitCode = firstError ? toExitCode(firstError) : 0;

  if (ctx.json) {
    console.log(JSON.stringify(report, null, 2));
    return exitCode;
  }

  console.log(chalk.blue.bold('\n  libforge - Doctor\n'));

  for (const check of report.checks) {
    const icon =
      check.status === 'ok' ? chalk.green('✓') :
      check.status === 'warn' ? chalk.yellow('!') :
      chalk.red('✗');

    const value = check.value ? chalk.dim(` (${check.value})`) : '';
    console.log(`  ${icon} ${check.name}${value}`);

    if (check.message && (ctx.verbose || check.status !== 'ok')) {
      console.log(chalk.dim(`    ${check.message}`));
    }
  }

  console.log();
  console.log(chalk.bold('  Summary:'));
  console.log(`    ${chalk.green(report.summary.ok)} ok, ${chalk.yellow(report.summary.warn)} warnings, ${chalk.red(report.summary.error)} errors`);

  if (report.summary.error > 0) {
    console.log(chalk.red('\n  ✗ Environment cannot build the SDK\n'));
  } else if (report.summary.warn > 0) {
    console.log(chalk.yellow('\n  ! Environment can build but has warnings\n'));
  } else {
    console.log(chalk.green('\n  ✓ Environment is healthy\n'));
  }

  return exitCode;
}
