/**
 * Platform Matrix Coordinator
 *
 * Runs one cell per platform target with bounded parallelism, then
 * classifies each cell:
 *
 * - ok: every step succeeded and the output directory exists
 * - degraded: only the native library step failed; its output directory
 *   is replaced by a placeholder holding only README.txt
 * - critical: an earlier step failed, or no output directory could be
 *   made; the output directory is removed so packaging for that platform
 *   fails
 *
 * Each cell's output directory is cleared before the cell starts, so
 * nothing from an earlier run counts as output.
 *
 * `run()` resolves only after every cell has settled.
 *
 * @module @libforge/core/matrix/coordinator
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { resolvePath } from '../config/index.js';
import { ForgeError, InterruptedError, toExitCode, wrapError } from '../reliability/errors.js';
import { interruptSignal } from '../pipeline/step-runner.js';
import type { PipelineWarning, StageContext, StepResult } from '../pipeline/types.js';
import { PLATFORM_TARGETS, type PlatformTarget } from '../platform/targets.js';
import { isDirectory } from '../utils/fs.js';
import { MatrixCell, type CellExecutor, type CellRun, type CellStepId } from './cell.js';

export const PLACEHOLDER_FILE = 'README.txt';

export type CellStatus = 'ok' | 'degraded' | 'critical';

export interface CellReport {
  target: PlatformTarget;
  status: CellStatus;
  outputDir: string;
  /** True when the output directory holds only the placeholder notice */
  placeholder: boolean;
  results: StepResult[];
  failedStep?: CellStepId;
  error?: ForgeError;
  durationMs: number;
}

export interface MatrixOutcome {
  cells: CellReport[];
  /** False when any cell is critical */
  success: boolean;
  exitCode: number;
  warnings: PipelineWarning[];
}

export interface MatrixOptions {
  targets?: readonly PlatformTarget[];
  exclude?: readonly CellStepId[];
  /** Defaults to config.matrix.maxParallelCells */
  maxParallel?: number;
  /** Builds the executor for a target; defaults to MatrixCell */
  cellFactory?: (target: PlatformTarget) => CellExecutor;
}

/**
 * Text of the placeholder notice for a platform that could not be built
 */
export function placeholderNotice(target: PlatformTarget): string {
  const rid = target.runtimeIdentifier;
  return [
    `${rid} Build Notice`,
    '='.repeat(`${rid} Build Notice`.length),
    '',
    `The native library for ${rid} could not be built in this environment.`,
    `AOT compilation for ${target.osFamily}/${target.architecture} requires native hardware for that architecture.`,
    '',
    `To build for ${rid}:`,
    `1. Use a native ${target.architecture} ${target.osFamily} machine`,
    `2. Run: libforge matrix --target ${rid}`,
    '',
    'Cross-compilation limitations:',
    '- .NET AOT requires the native target architecture',
    '- Hosted ARM64 runners are limited',
    '',
  ].join('\n');
}

export class PlatformMatrixCoordinator {
  private readonly targets: readonly PlatformTarget[];
  private readonly maxParallel: number;
  private readonly cellFactory: (target: PlatformTarget) => CellExecutor;

  constructor(
    private readonly ctx: StageContext,
    options: MatrixOptions = {}
  ) {
    this.targets = options.targets ?? PLATFORM_TARGETS;
    this.maxParallel = Math.max(1, options.maxParallel ?? ctx.config.matrix.maxParallelCells);
    this.cellFactory =
      options.cellFactory ?? ((target) => new MatrixCell(ctx, target, { exclude: options.exclude }));
  }

  async run(): Promise<MatrixOutcome> {
    const { logger } = this.ctx;
    const reports = new Map<string, CellReport>();
    const pending = [...this.targets];
    const running = new Map<string, Promise<void>>();

    logger.info(`Running ${pending.length} matrix cell(s), at most ${this.maxParallel} at a time`, {
      targets: pending.map((t) => t.runtimeIdentifier),
    });

    while (pending.length > 0 || running.size > 0) {
      while (pending.length > 0 && running.size < this.maxParallel) {
        const target = pending.shift();
        if (!target) break;
        const rid = target.runtimeIdentifier;
        const cellPromise = this.runCell(target).then((report) => {
          reports.set(rid, report);
          running.delete(rid);
        });
        running.set(rid, cellPromise);
      }

      if (running.size > 0) {
        await Promise.race(running.values());
      }
    }

    const cells = this.targets.flatMap((target) => {
      const report = reports.get(target.runtimeIdentifier);
      return report ? [report] : [];
    });

    const warnings: PipelineWarning[] = [];
    for (const cell of cells) {
      for (const result of cell.results) {
        if (result.outcome.kind === 'advisory') {
          warnings.push({ kind: result.outcome.warning, step: result.stepName, reason: result.outcome.reason });
        }
      }
      if (cell.status === 'degraded') {
        warnings.push({
          kind: 'MATRIX_CELL_DEGRADED',
          step: cell.target.runtimeIdentifier,
          reason: cell.error?.message ?? 'native library step failed',
        });
      }
    }

    const critical = cells.filter((cell) => cell.status === 'critical');
    const interrupted = critical.find((cell) => cell.error?.code === 'INTERRUPTED');
    const worst = interrupted ?? critical[0];
    const outcome: MatrixOutcome = {
      cells,
      success: critical.length === 0,
      exitCode: worst ? toExitCode(worst.error) : 0,
      warnings,
    };

    for (const cell of cells) {
      const line = `${cell.target.runtimeIdentifier}: ${cell.status}${cell.placeholder ? ' (placeholder)' : ''}`;
      if (cell.status === 'ok') logger.notice(line, { runtime: cell.target.runtimeIdentifier });
      else if (cell.status === 'degraded') logger.warn(line, { runtime: cell.target.runtimeIdentifier });
      else logger.error(line, cell.error, { runtime: cell.target.runtimeIdentifier });
    }

    return outcome;
  }

  private async runCell(target: PlatformTarget): Promise<CellReport> {
    const startedAt = Date.now();
    const rid = target.runtimeIdentifier;

    if (this.ctx.signal?.aborted) {
      const outputDir = join(resolvePath(this.ctx.config, this.ctx.config.outputDir), rid);
      return this.critical(target, outputDir, [], startedAt, new InterruptedError(interruptSignal(this.ctx.signal)));
    }

    const cell = this.cellFactory(target);
    let run: CellRun;
    try {
      await rm(cell.outputDir, { recursive: true, force: true });
      run = await cell.run();
    } catch (error) {
      run = { results: [], error: wrapError(error, { context: { runtime: rid } }), filesCopied: 0 };
    }

    const base = {
      target,
      outputDir: cell.outputDir,
      results: run.results,
      failedStep: run.failedStep,
      durationMs: 0,
    };

    if (!run.error) {
      if (await isDirectory(cell.outputDir)) {
        return { ...base, status: 'ok', placeholder: false, durationMs: Date.now() - startedAt };
      }
      return this.degradeWithPlaceholder(base, startedAt);
    }

    // Only a failed native library build may degrade; anything earlier is critical
    if (run.failedStep !== 'dll' || run.error.code === 'INTERRUPTED') {
      return this.critical(target, cell.outputDir, run.results, startedAt, run.error, run.failedStep);
    }

    return this.degradeWithPlaceholder({ ...base, error: run.error }, startedAt);
  }

  private async degradeWithPlaceholder(
    base: Omit<CellReport, 'status' | 'placeholder'>,
    startedAt: number
  ): Promise<CellReport> {
    const { target, outputDir } = base;
    try {
      // Anything a failed step left behind is not a release artifact
      await rm(outputDir, { recursive: true, force: true });
      await mkdir(outputDir, { recursive: true });
      await writeFile(join(outputDir, PLACEHOLDER_FILE), placeholderNotice(target), 'utf-8');
    } catch (error) {
      return this.critical(target, outputDir, base.results, startedAt, wrapError(error), base.failedStep);
    }
    this.ctx.logger.warn(`Created placeholder for ${target.runtimeIdentifier}`, {
      runtime: target.runtimeIdentifier,
      outputDir,
    });
    return { ...base, status: 'degraded', placeholder: true, durationMs: Date.now() - startedAt };
  }

  private async critical(
    target: PlatformTarget,
    outputDir: string,
    results: StepResult[],
    startedAt: number,
    cause?: ForgeError,
    failedStep?: CellStepId
  ): Promise<CellReport> {
    try {
      await rm(outputDir, { recursive: true, force: true });
    } catch (error) {
      this.ctx.logger.error(`Could not remove ${outputDir}`, error, { runtime: target.runtimeIdentifier });
    }
    const error =
      cause?.code === 'INTERRUPTED'
        ? cause
        : new ForgeError(`No output directory for ${target.runtimeIdentifier}`, {
            code: 'MATRIX_CELL_CRITICAL',
            context: { runtime: target.runtimeIdentifier, outputDir, failedStep },
            cause,
          });
    return {
      target,
      status: 'critical',
      outputDir,
      placeholder: false,
      results,
      failedStep,
      error,
      durationMs: Date.now() - startedAt,
    };
  }
}
