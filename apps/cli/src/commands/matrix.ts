/**
 * libforge matrix
 *
 * Builds the native library for every platform target (or the ones named
 * with --target, or only the host's with --host), writing a placeholder for
 * platforms that cannot be built.
 */

import chalk from 'chalk';
import {
  CELL_STEPS,
  ConfigurationError,
  detectHost,
  findTarget,
  isCellStep,
  PLATFORM_TARGETS,
  PlatformMatrixCoordinator,
  selectTargets,
  type CellStepId,
  type HostPlatform,
  type MatrixOutcome,
  type PlatformTarget,
} from '@libforge/core';
import type { CliContext } from '../context.js';

export interface MatrixCommandOptions {
  target?: string[];
  host?: boolean;
  exclude?: string[];
  maxParallel?: string;
}

export function parseExcludes(values: readonly string[]): CellStepId[] {
  return values.map((value) => {
    if (!isCellStep(value)) {
      throw new ConfigurationError(`Unknown cell step "${value}" (expected one of: ${CELL_STEPS.join(', ')})`, {
        fieldErrors: { exclude: `unknown step ${value}` },
      });
    }
    return value;
  });
}

/**
 * Targets for this run: the host's alone with --host, else --target or all
 */
export function matrixTargets(
  options: Pick<MatrixCommandOptions, 'target' | 'host'>,
  host: () => HostPlatform = () => detectHost()
): PlatformTarget[] {
  if (!options.host) return selectTargets(options.target ?? []);

  if (options.target && options.target.length > 0) {
    throw new ConfigurationError('--host cannot be combined with --target', {
      fieldErrors: { host: 'conflicts with --target' },
    });
  }
  const { runtimeIdentifier } = host();
  const target = findTarget(runtimeIdentifier);
  if (!target) {
    const known = PLATFORM_TARGETS.map((t) => t.runtimeIdentifier).join(', ');
    throw new ConfigurationError(`Host ${runtimeIdentifier} is not a matrix target (expected one of: ${known})`, {
      fieldErrors: { host: `unsupported runtime identifier ${runtimeIdentifier}` },
    });
  }
  return [target];
}

export function parseMaxParallel(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`--max-parallel must be a positive integer, got "${value}"`, {
      fieldErrors: { maxParallel: 'expected a positive integer' },
    });
  }
  return parsed;
}

export function matrixReport(outcome: MatrixOutcome): Record<string, unknown> {
  return {
    success: outcome.success,
    exitCode: outcome.exitCode,
    cells: outcome.cells.map((cell) => ({
      runtime: cell.target.runtimeIdentifier,
      status: cell.status,
      placeholder: cell.placeholder,
      outputDir: cell.outputDir,
      failedStep: cell.failedStep,
      error: cell.error && { code: cell.error.code, message: cell.error.message },
      durationMs: cell.durationMs,
    })),
    warnings: outcome.warnings,
  };
}

export async function matrixCommand(ctx: CliContext, options: MatrixCommandOptions): Promise<number> {
  const coordinator = new PlatformMatrixCoordinator(ctx, {
    targets: matrixTargets(options),
    exclude: parseExcludes(options.exclude ?? []),
    maxParallel: parseMaxParallel(options.maxParallel),
  });

  const outcome = await coordinator.run();

  if (ctx.json) {
    console.log(JSON.stringify(matrixReport(outcome), null, 2));
    return outcome.exitCode;
  }

  console.log(chalk.bold('\n  Platform matrix:\n'));
  for (const cell of outcome.cells) {
    const icon =
      cell.status === 'ok' ? chalk.green('✓') :
      cell.status === 'degraded' ? chalk.yellow('!') :
      chalk.red('✗');
    const note = cell.placeholder ? chalk.dim(' (placeholder)') : '';
    console.log(`  ${icon} ${cell.target.runtimeIdentifier.padEnd(10)} ${cell.status}${note}`);
    if (cell.error && cell.status !== 'ok') {
      console.log(chalk.dim(`    ${cell.error.message}`));
    }
  }
  console.log();

  return outcome.exitCode;
}
