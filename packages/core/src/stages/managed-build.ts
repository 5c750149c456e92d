/**
 * Managed Build Stage
 *
 * Builds the SDK in Release configuration. The SDK directory must exist;
 * the build system is never invoked without it.
 *
 * @module @libforge/core/stages/managed-build
 */

import { basename } from 'node:path';
import { resolvePath } from '../config/index.js';
import { ForgeError } from '../reliability/errors.js';
import { inProcessResult, StepRunner } from '../pipeline/step-runner.js';
import { fatalStep, type FatalBuildStep, type PipelineStage, type StageContext, type StageReport, type StepResult } from '../pipeline/types.js';
import { isDirectory } from '../utils/fs.js';

export class ManagedBuildStage implements PipelineStage {
  readonly state = 'managed_build';
  private readonly sdkDir: string;

  constructor(
    private readonly ctx: StageContext,
    sdkDir?: string,
    private readonly libDir?: string
  ) {
    this.sdkDir = sdkDir ?? resolvePath(ctx.config, ctx.config.sdkDir);
  }

  get stepName(): string {
    return `Building ${basename(this.sdkDir)}`;
  }

  step(): FatalBuildStep {
    return fatalStep(
      this.stepName,
      {
        command: this.ctx.config.toolchain.managedRuntime.command,
        args: ['build', '-c', 'Release'],
        cwd: this.sdkDir,
      },
      'MANAGED_BUILD_FAILED'
    );
  }

  async build(): Promise<StepResult> {
    const startedAt = Date.now();

    if (!(await isDirectory(this.sdkDir))) {
      const error = new ForgeError(
        `SDK directory not found: ${this.sdkDir}. Make sure git submodules are initialized.`,
        { code: 'PROJECT_DIRECTORY_MISSING', context: { sdkDir: this.sdkDir } }
      );
      this.ctx.logger.error(error.message, error, { step: this.stepName });
      return inProcessResult(this.stepName, startedAt, error);
    }

    return StepRunner.fromContext(this.ctx, this.libDir).run(this.step());
  }

  async execute(): Promise<StageReport> {
    return { results: [await this.build()] };
  }
}
