/**
 * Local Build Pipeline
 *
 * Drives the stages in fixed order through the state machine:
 * verify → sync → managed build → collect → protobuf copy → systems build
 * → test.
 * The first fatal outcome moves the run to `aborted`; advisory outcomes
 * are recorded as warnings and the run moves on.
 *
 * @module @libforge/core/pipeline
 */

import { ArtifactCollector } from '../artifacts/collector.js';
import { InterruptedError, toExitCode, WARNING_KINDS, wrapError, type WarningKind } from '../reliability/errors.js';
import { DependencySynchronizer } from '../stages/dependency-synchronizer.js';
import { DependencyVerifier } from '../stages/dependency-verifier.js';
import { ManagedBuildStage } from '../stages/managed-build.js';
import { ProtoSyncStage } from '../stages/proto-sync.js';
import { SystemsBuildStage } from '../stages/systems-build.js';
import { TestStage } from '../stages/test-stage.js';
import { PipelineStateMachine } from './state-machine.js';
import { inProcessResult, interruptSignal } from './step-runner.js';
import {
  firstFatal,
  type PipelineOutcome,
  type PipelineStage,
  type PipelineWarning,
  type StageContext,
  type StageReport,
  type StepResult,
} from './types.js';

/**
 * The fixed stage sequence of a local run
 */
export function createLocalStages(ctx: StageContext): PipelineStage[] {
  return [
    new DependencyVerifier(ctx),
    new DependencySynchronizer(ctx),
    new ManagedBuildStage(ctx),
    new ArtifactCollector(ctx),
    new ProtoSyncStage(ctx),
    new SystemsBuildStage(ctx),
    new TestStage(ctx),
  ];
}

export class Pipeline {
  private readonly stages: PipelineStage[];

  constructor(
    private readonly ctx: StageContext,
    stages?: PipelineStage[]
  ) {
    this.stages = stages ?? createLocalStages(ctx);
  }

  async run(): Promise<PipelineOutcome> {
    const { logger, signal } = this.ctx;
    const machine = new PipelineStateMachine();
    const results: StepResult[] = [];
    const warnings: PipelineWarning[] = [];
    let artifactsCopied = 0;

    logger.info('Starting build pipeline', { rootDir: this.ctx.config.rootDir });

    for (const stage of this.stages) {
      let report: StageReport;

      if (signal?.aborted) {
        report = {
          results: [inProcessResult(`Interrupted before ${stage.state}`, Date.now(), new InterruptedError(interruptSignal(signal)))],
        };
      } else {
        machine.transition(stage.state);
        report = await this.executeStage(stage);
      }

      const offset = results.length;
      results.push(...report.results);
      artifactsCopied += report.artifactsCopied ?? 0;

      for (const result of report.results) {
        if (result.outcome.kind === 'advisory') {
          warnings.push({ kind: result.outcome.warning, step: result.stepName, reason: result.outcome.reason });
        }
      }

      const fatal = firstFatal(report.results);
      if (fatal) {
        const state = machine.state;
        machine.transition('aborted');
        const outcome: PipelineOutcome = {
          status: 'aborted',
          success: false,
          exitCode: toExitCode(fatal.error),
          results,
          artifactsCopied,
          warnings,
          abortedAt: {
            stepNumber: offset + fatal.index + 1,
            stepName: fatal.result.stepName,
            state,
            error: fatal.error,
          },
        };
        this.logSummary(outcome);
        return outcome;
      }
    }

    machine.transition('done');
    const outcome: PipelineOutcome = {
      status: 'done',
      success: true,
      exitCode: 0,
      results,
      artifactsCopied,
      warnings,
    };
    this.logSummary(outcome);
    return outcome;
  }

  private async executeStage(stage: PipelineStage): Promise<StageReport> {
    const startedAt = Date.now();
    try {
      return await stage.execute();
    } catch (error) {
      const wrapped = wrapError(error, { context: { state: stage.state } });
      this.ctx.logger.error(`Unexpected failure in ${stage.state}`, wrapped);
      return { results: [inProcessResult(stage.state, startedAt, wrapped)] };
    }
  }

  private logSummary(outcome: PipelineOutcome): void {
    const lines = formatSummary(outcome);
    const data = {
      eventName: 'pipeline.summary',
      status: outcome.status,
      artifactsCopied: outcome.artifactsCopied,
      warnings: countWarnings(outcome.warnings),
    };
    if (outcome.success) {
      this.ctx.logger.notice(lines.join('\n'), data);
    } else {
      this.ctx.logger.error(lines.join('\n'), outcome.abortedAt?.error, data);
    }
  }
}

/**
 * Advisory warning counts by kind, in declaration order
 */
export function countWarnings(warnings: PipelineWarning[]): Partial<Record<WarningKind, number>> {
  const counts: Partial<Record<WarningKind, number>> = {};
  for (const kind of WARNING_KINDS) {
    const count = warnings.filter((warning) => warning.kind === kind).length;
    if (count > 0) counts[kind] = count;
  }
  return counts;
}

/**
 * Final status lines
 */
export function formatSummary(outcome: PipelineOutcome): string[] {
  const lines: string[] = [];

  if (outcome.status === 'done') {
    lines.push('Build completed successfully');
  } else if (outcome.abortedAt) {
    const { stepNumber, stepName, error } = outcome.abortedAt;
    lines.push(`Build aborted at step ${stepNumber} (${stepName}): ${error.message}`);
  } else {
    lines.push('Build aborted');
  }

  lines.push(`Artifacts copied: ${outcome.artifactsCopied}`);

  const counts = Object.entries(countWarnings(outcome.warnings));
  lines.push(
    counts.length === 0
      ? 'Advisory warnings: none'
      : `Advisory warnings: ${counts.map(([kind, count]) => `${kind} x${count}`).join(', ')}`
  );

  return lines;
}
