/**
 * Clean
 *
 * Removes build outputs and copied protobuf files, and runs `cargo clean` in each crate directory.
 * Every failure is a warning; cleaning never aborts part-way.
 *
 * @module @libforge/core/clean
 */

import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { resolvePath } from '../config/index.js';
import { formatCommand, succeeded } from '../process/command-runner.js';
import { failureReason } from '../pipeline/step-runner.js';
import type { StageContext } from '../pipeline/types.js';
import { protoSyncPaths } from '../stages/proto-sync.js';
import { isDirectory } from '../utils/fs.js';

export interface CleanTarget {
  path: string;
  description: string;
}

export interface CleanReport {
  removed: string[];
  missing: string[];
  failed: { path: string; reason: string }[];
}

/**
 * Every directory `clean` removes, for the current configuration
 */
export async function cleanTargets(ctx: Pick<StageContext, 'config'>): Promise<CleanTarget[]> {
  const { config } = ctx;
  const at = (path: string): string => resolvePath(config, path);
  const cryptoDir = at(config.matrix.cryptoDir);

  const targets: CleanTarget[] = [
    { path: at(config.outputDir), description: 'native libraries' },
    { path: join(cryptoDir, 'bin'), description: `${config.matrix.cryptoDir} build outputs` },
    { path: join(cryptoDir, 'obj'), description: `${config.matrix.cryptoDir} intermediate files` },
    { path: join(cryptoDir, config.matrix.localPackageRepository), description: `${config.matrix.cryptoDir} package repository` },
    { path: at(config.matrix.localPackageRepository), description: 'local package repository' },
    { path: at(config.matrix.workDir), description: 'matrix cell checkouts' },
    { path: at(config.release.assetsDir), description: 'release archives' },
    { path: protoSyncPaths(ctx).targetDir, description: 'copied protobuf files' },
  ];

  const sdkSrc = join(at(config.sdkDir), 'src');
  if (await isDirectory(sdkSrc)) {
    const projects = (await readdir(sdkSrc, { withFileTypes: true })).filter((entry) => entry.isDirectory());
    for (const project of projects) {
      targets.push(
        { path: join(sdkSrc, project.name, 'bin'), description: `${project.name} build outputs` },
        { path: join(sdkSrc, project.name, 'obj'), description: `${project.name} intermediate files` }
      );
    }
  }

  return targets;
}

export async function clean(ctx: StageContext): Promise<CleanReport> {
  const { config, logger, runner, signal } = ctx;
  const report: CleanReport = { removed: [], missing: [], failed: [] };

  for (const target of await cleanTargets(ctx)) {
    if (!(await isDirectory(target.path))) {
      logger.debug(`Not found: ${target.path} (${target.description})`);
      report.missing.push(target.path);
      continue;
    }
    try {
      await rm(target.path, { recursive: true, force: true });
      logger.info(`Removed: ${target.path} (${target.description})`);
      report.removed.push(target.path);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not remove ${target.path}`, { reason });
      report.failed.push({ path: target.path, reason });
    }
  }

  for (const crate of config.systems.cleanDirs) {
    const dir = resolvePath(config, crate);
    if (!(await isDirectory(dir))) continue;

    const spec = { command: config.toolchain.systems.command, args: ['clean'], cwd: dir };
    const output = await runner.run(spec, { signal });
    if (succeeded(output)) {
      logger.info(`${formatCommand(spec)} completed in ${crate}`);
    } else {
      const reason = failureReason(output);
      logger.warn(`${formatCommand(spec)} failed in ${crate}`, { reason });
      report.failed.push({ path: dir, reason });
    }
  }

  logger.notice(`Clean completed: ${report.removed.length} removed, ${report.failed.length} failed`);
  return report;
}
