/**
 * Systems Build Stage
 *
 * Builds the binding crate, then the wrapper crate, then the whole
 * workspace. The first two only surface early diagnostics; the workspace
 * build is the gate.
 *
 * @module @libforge/core/stages/systems-build
 */

import { StepRunner } from '../pipeline/step-runner.js';
import {
  advisoryStep,
  fatalStep,
  type BuildStep,
  type PipelineStage,
  type StageContext,
  type StageReport,
  type StepResult,
} from '../pipeline/types.js';

export class SystemsBuildStage implements PipelineStage {
  readonly state = 'systems_build';

  constructor(private readonly ctx: StageContext) {}

  steps(): BuildStep[] {
    const { config } = this.ctx;
    const cargo = config.toolchain.systems.command;
    const cwd = config.rootDir;

    return [
      advisoryStep(
        `Building ${config.systems.bindingPackage}`,
        { command: cargo, args: ['build', '-p', config.systems.bindingPackage], cwd },
        'PARTIAL_SYSTEMS_BUILD'
      ),
      advisoryStep(
        `Building ${config.systems.wrapperPackage}`,
        { command: cargo, args: ['build', '-p', config.systems.wrapperPackage], cwd },
        'PARTIAL_SYSTEMS_BUILD'
      ),
      fatalStep(
        'Building workspace',
        { command: cargo, args: ['build', '--workspace'], cwd },
        'WORKSPACE_BUILD_FAILED'
      ),
    ];
  }

  async build(): Promise<StepResult[]> {
    return StepRunner.fromContext(this.ctx).runAll(this.steps());
  }

  async execute(): Promise<StageReport> {
    return { results: await this.build() };
  }
}
