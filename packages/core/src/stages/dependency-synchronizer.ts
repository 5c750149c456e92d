/**
 * Dependency Synchronizer
 *
 * Brings the nested SDK checkout up to date. A failure is recorded as a
 * SYNC_WARNING and the pipeline carries on with whatever copy is present.
 *
 * @module @libforge/core/stages/dependency-synchronizer
 */

import { StepRunner } from '../pipeline/step-runner.js';
import { advisoryStep, type AdvisoryBuildStep, type PipelineStage, type StageContext, type StageReport, type StepResult } from '../pipeline/types.js';

export class DependencySynchronizer implements PipelineStage {
  readonly state = 'syncing';

  constructor(private readonly ctx: StageContext) {}

  step(): AdvisoryBuildStep {
    return advisoryStep(
      'Updating git submodules',
      {
        command: 'git',
        args: ['submodule', 'update', '--init', '--recursive'],
        cwd: this.ctx.config.rootDir,
      },
      'SYNC_WARNING'
    );
  }

  async sync(): Promise<StepResult> {
    return StepRunner.fromContext(this.ctx).run(this.step());
  }

  async execute(): Promise<StageReport> {
    return { results: [await this.sync()] };
  }
}
