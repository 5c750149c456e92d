/**
 * Protobuf Copy Stage
 *
 * Replaces the `.proto` files in the binding crate's `protos` directory
 * with the ones from the SDK checkout, so the systems build generates
 * code from the same schema the managed SDK was built with.
 *
 * A missing source or crate directory skips the stage with a log warning.
 * A failed copy is a PROTO_COPY_WARNING; the systems build still runs.
 *
 * @module @libforge/core/stages/proto-sync
 */

import { copyFile, mkdir, readdir, rm } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { resolvePath } from '../config/index.js';
import { inProcessResult } from '../pipeline/step-runner.js';
import type { PipelineStage, StageContext, StageReport, StepResult } from '../pipeline/types.js';
import { isDirectory } from '../utils/fs.js';

export const PROTO_STEP_NAME = 'Copying protobuf files';

export interface ProtoSyncPaths {
  sourceDir: string;
  crateDir: string;
  targetDir: string;
}

export function protoSyncPaths(ctx: Pick<StageContext, 'config'>): ProtoSyncPaths {
  const { config } = ctx;
  const crateDir = resolvePath(config, config.systems.bindingPackage);
  return {
    sourceDir: join(resolvePath(config, config.sdkDir), 'protos'),
    crateDir,
    targetDir: join(crateDir, 'protos'),
  };
}

export class ProtoSyncStage implements PipelineStage {
  readonly state = 'copying_protos';

  constructor(private readonly ctx: StageContext) {}

  /**
   * Copies the schema files; resolves to no result when the stage was skipped
   */
  async copy(): Promise<StepResult | undefined> {
    const { logger } = this.ctx;
    const { sourceDir, crateDir, targetDir } = protoSyncPaths(this.ctx);

    if (!(await isDirectory(sourceDir))) {
      logger.warn(`Protobuf directory not found at ${sourceDir}, skipping protobuf copy`);
      return undefined;
    }
    if (!(await isDirectory(crateDir))) {
      logger.warn(`${this.ctx.config.systems.bindingPackage} not found at ${crateDir}, skipping protobuf copy`);
      return undefined;
    }

    const startedAt = Date.now();
    logger.stepStart(PROTO_STEP_NAME, { sourceDir, targetDir });

    try {
      await mkdir(targetDir, { recursive: true });

      for (const name of protoFiles(await readdir(targetDir))) {
        await rm(join(targetDir, name), { force: true });
        logger.debug(`Removed old ${name}`);
      }

      const names = protoFiles(await readdir(sourceDir));
      for (const name of names) {
        await copyFile(join(sourceDir, name), join(targetDir, name));
        logger.info(`Copied ${name}`);
      }

      if (names.length === 0) {
        logger.warn(`No .proto files found in ${sourceDir}`);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const durationMs = Date.now() - startedAt;
      logger.stepEnd(PROTO_STEP_NAME, 'advisory', durationMs, { reason });
      return {
        stepName: PROTO_STEP_NAME,
        succeeded: false,
        exitCode: null,
        durationMs,
        outcome: { kind: 'advisory', warning: 'PROTO_COPY_WARNING', reason },
      };
    }

    const result = inProcessResult(PROTO_STEP_NAME, startedAt);
    logger.stepEnd(PROTO_STEP_NAME, 'success', result.durationMs);
    return result;
  }

  async execute(): Promise<StageReport> {
    const result = await this.copy();
    return { results: result ? [result] : [] };
  }
}

function protoFiles(names: string[]): string[] {
  return names.filter((name) => extname(name) === '.proto').sort();
}
