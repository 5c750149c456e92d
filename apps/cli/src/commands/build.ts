/**
 * libforge build
 *
 * Runs the local pipeline: verify → sync → managed build → collect →
 * systems build → test.
 */

import { countWarnings, Pipeline, type PipelineOutcome } from '@libforge/core';
import type { CliContext } from '../context.js';

/**
 * Machine-readable build report
 */
export function buildReport(outcome: PipelineOutcome): Record<string, unknown> {
  return {
    status: outcome.status,
    exitCode: outcome.exitCode,
    artifactsCopied: outcome.artifactsCopied,
    warnings: countWarnings(outcome.warnings),
    steps: outcome.results.map((result) => ({
      name: result.stepName,
      outcome: result.outcome.kind,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
    })),
    abortedAt: outcome.abortedAt && {
      stepNumber: outcome.abortedAt.stepNumber,
      stepName: outcome.abortedAt.stepName,
      code: outcome.abortedAt.error.code,
      message: outcome.abortedAt.error.message,
    },
  };
}

export async function buildCommand(ctx: CliContext): Promise<number> {
  const outcome = await new Pipeline(ctx).run();

  if (ctx.json) {
    console.log(JSON.stringify(buildReport(outcome), null, 2));
  }

  return outcome.exitCode;
}
