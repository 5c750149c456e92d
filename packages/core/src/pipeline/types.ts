/**
 * Pipeline Types
 *
 * Build steps, tagged step outcomes and the aggregate pipeline outcome.
 *
 * @module @libforge/core/pipeline/types
 */

import type { ForgeConfig } from '../config/index.js';
import type { CommandRunner, CommandSpec } from '../process/command-runner.js';
import type { ForgeError, ForgeErrorCode, WarningKind } from '../reliability/errors.js';
import type { Logger } from '../telemetry/logger.js';

/**
 * Success value or error, for operations whose failure is an expected outcome
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

// =============================================================================
// Build Steps
// =============================================================================

interface BuildStepBase {
  /** Human-readable step name, e.g. "Building proton-sdk-sys" */
  readonly name: string;
  readonly command: CommandSpec;
}

/**
 * A step whose failure halts its scope
 */
export interface FatalBuildStep extends BuildStepBase {
  readonly severity: 'fatal';
  /** Error code raised when the step fails */
  readonly errorCode: ForgeErrorCode;
}

/**
 * A step whose failure is recorded and skipped past
 */
export interface AdvisoryBuildStep extends BuildStepBase {
  readonly severity: 'advisory';
  /** Warning recorded when the step fails */
  readonly warning: WarningKind;
}

export type BuildStep = FatalBuildStep | AdvisoryBuildStep;

export type StepSeverity = BuildStep['severity'];

export function fatalStep(name: string, command: CommandSpec, errorCode: ForgeErrorCode): FatalBuildStep {
  return { name, command, severity: 'fatal', errorCode };
}

export function advisoryStep(name: string, command: CommandSpec, warning: WarningKind): AdvisoryBuildStep {
  return { name, command, severity: 'advisory', warning };
}

// =============================================================================
// Step Results
// =============================================================================

export type StepOutcome =
  | { kind: 'success' }
  | { kind: 'advisory'; warning: WarningKind; reason: string }
  | { kind: 'fatal'; error: ForgeError };

export interface StepResult {
  stepName: string;
  succeeded: boolean;
  /** null for in-process steps and for processes that never exited normally */
  exitCode: number | null;
  durationMs: number;
  outcome: StepOutcome;
}

/**
 * Advisory failure recorded during a run
 */
export interface PipelineWarning {
  kind: WarningKind;
  step: string;
  reason: string;
}

// =============================================================================
// Pipeline State and Outcome
// =============================================================================

export type PipelineState =
  | 'init'
  | 'checking_deps'
  | 'syncing'
  | 'managed_build'
  | 'collecting'
  | 'copying_protos'
  | 'systems_build'
  | 'testing'
  | 'done'
  | 'aborted';

export interface AbortInfo {
  /** 1-based position of the failed step among the steps that ran */
  stepNumber: number;
  stepName: string;
  state: PipelineState;
  error: ForgeError;
}

export interface PipelineOutcome {
  status: 'done' | 'aborted';
  success: boolean;
  exitCode: number;
  results: StepResult[];
  artifactsCopied: number;
  warnings: PipelineWarning[];
  abortedAt?: AbortInfo;
}

// =============================================================================
// Stage Contract
// =============================================================================

/**
 * Shared collaborators handed to every stage
 */
export interface StageContext {
  config: ForgeConfig;
  runner: CommandRunner;
  logger: Logger;
  /** Host interrupt */
  signal?: AbortSignal;
}

export interface StageReport {
  results: StepResult[];
  /** Set by the artifact collection stage */
  artifactsCopied?: number;
}

/**
 * One state of the local pipeline
 */
export interface PipelineStage {
  readonly state: PipelineState;
  execute(): Promise<StageReport>;
}

/**
 * Find the first fatal outcome in a set of results
 */
export function firstFatal(results: StepResult[]): { index: number; result: StepResult; error: ForgeError } | undefined {
  for (let index = 0; index < results.length; index++) {
    const result = results[index];
    if (result.outcome.kind === 'fatal') {
      return { index, result, error: result.outcome.error };
    }
  }
  return undefined;
}
