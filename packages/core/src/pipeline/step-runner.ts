/**
 * Step Runner
 *
 * Executes one BuildStep through the CommandRunner and turns the raw
 * process result into a tagged StepOutcome. Logs one start line and one
 * end line per step.
 *
 * @module @libforge/core/pipeline/step-runner
 */

import { resolvePath } from '../config/index.js';
import { formatCommand, succeeded, type CommandOutput, type CommandRunner } from '../process/command-runner.js';
import { FatalStepError, ForgeError, InterruptedError } from '../reliability/errors.js';
import type { Logger } from '../telemetry/logger.js';
import type { BuildStep, StageContext, StepOutcome, StepResult } from './types.js';

export interface StepRunnerOptions {
  signal?: AbortSignal;
  /** Environment added to every command */
  env?: Record<string, string>;
}

export class StepRunner {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    private readonly options: StepRunnerOptions = {}
  ) {}

  /**
   * Runner for a stage: carries the host interrupt and exports the native
   * library directory to every child as PROTON_SDK_LIB_DIR
   */
  static fromContext(ctx: StageContext, libDir?: string): StepRunner {
    return new StepRunner(ctx.runner, ctx.logger, {
      signal: ctx.signal,
      env: { PROTON_SDK_LIB_DIR: libDir ?? resolvePath(ctx.config, ctx.config.outputDir) },
    });
  }

  /**
   * Run steps in order, stopping after the first fatal outcome
   */
  async runAll(steps: BuildStep[]): Promise<StepResult[]> {
    const results: StepResult[] = [];
    for (const step of steps) {
      const result = await this.run(step);
      results.push(result);
      if (result.outcome.kind === 'fatal') break;
    }
    return results;
  }

  async run(step: BuildStep): Promise<StepResult> {
    const log = this.logger.child({ step: step.name });
    log.stepStart(step.name, {
      command: formatCommand(step.command),
      cwd: step.command.cwd,
      stepSeverity: step.severity,
    });

    const output = await this.runner.run(
      {
        ...step.command,
        env: { ...this.options.env, ...step.command.env },
      },
      { signal: this.options.signal }
    );

    const outcome = toOutcome(step, output, interruptSignal(this.options.signal));
    const result: StepResult = {
      stepName: step.name,
      succeeded: outcome.kind === 'success',
      exitCode: output.exitCode,
      durationMs: output.durationMs,
      outcome,
    };

    switch (outcome.kind) {
      case 'success':
        log.stepEnd(step.name, 'success', output.durationMs);
        break;
      case 'advisory':
        log.stepEnd(step.name, 'advisory', output.durationMs, {
          warning: outcome.warning,
          reason: outcome.reason,
          exitCode: output.exitCode,
        });
        break;
      case 'fatal':
        log.stepEnd(step.name, 'fatal', output.durationMs, {
          code: outcome.error.code,
          exitCode: output.exitCode,
        });
        break;
    }

    return result;
  }
}

/**
 * Describe why a command did not succeed
 */
export function failureReason(output: CommandOutput): string {
  if (output.interrupted) return 'interrupted';
  if (output.spawnError) return output.spawnError.message;
  if (output.signal) return `terminated by ${output.signal}`;
  return `exit code ${output.exitCode}`;
}

function toOutcome(step: BuildStep, output: CommandOutput, signalName?: string): StepOutcome {
  if (succeeded(output)) {
    return { kind: 'success' };
  }

  // An interrupt aborts the scope whatever the step severity
  if (output.interrupted) {
    return { kind: 'fatal', error: new InterruptedError(signalName) };
  }

  if (step.severity === 'advisory') {
    return { kind: 'advisory', warning: step.warning, reason: failureReason(output) };
  }

  return {
    kind: 'fatal',
    error: new FatalStepError(step.errorCode, step.name, output.exitCode, {
      cause: output.spawnError,
      context: { stderr: tail(output.stderr) },
    }),
  };
}

/**
 * Build a result for work done in-process (verification, collection)
 */
export function inProcessResult(stepName: string, startedAt: number, error?: ForgeError): StepResult {
  return {
    stepName,
    succeeded: error === undefined,
    exitCode: null,
    durationMs: Date.now() - startedAt,
    outcome: error === undefined ? { kind: 'success' } : { kind: 'fatal', error },
  };
}

/**
 * Signal name carried as the abort reason, when there is one
 */
export function interruptSignal(signal?: AbortSignal): string | undefined {
  return typeof signal?.reason === 'string' ? signal.reason : undefined;
}

function tail(text: string, lines = 20): string {
  return text.trimEnd().split('\n').slice(-lines).join('\n');
}
