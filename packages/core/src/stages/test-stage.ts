/**
 * Test Stage
 *
 * Runs the workspace tests once. Failures are recorded as TEST_FAILURE and
 * never change the pipeline outcome.
 *
 * @module @libforge/core/stages/test-stage
 */

import { StepRunner } from '../pipeline/step-runner.js';
import { advisoryStep, type AdvisoryBuildStep, type PipelineStage, type StageContext, type StageReport, type StepResult } from '../pipeline/types.js';

export class TestStage implements PipelineStage {
  readonly state = 'testing';

  constructor(private readonly ctx: StageContext) {}

  step(): AdvisoryBuildStep {
    return advisoryStep(
      'Running tests',
      {
        command: this.ctx.config.toolchain.systems.command,
        args: ['test', '--workspace'],
        cwd: this.ctx.config.rootDir,
      },
      'TEST_FAILURE'
    );
  }

  async test(): Promise<StepResult> {
    return StepRunner.fromContext(this.ctx).run(this.step());
  }

  async execute(): Promise<StageReport> {
    return { results: [await this.test()] };
  }
}
