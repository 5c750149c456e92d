/**
 * Artifact Collector
 *
 * Walks the output directory of each export project, picks the dynamic
 * libraries whose names classify as `match`, and copies them into the flat
 * native library directory. A missing project directory is skipped with a
 * warning; zero matches overall is fatal.
 *
 * @module @libforge/core/artifacts/collector
 */

import { copyFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { resolvePath, type ExportProject } from '../config/index.js';
import { ForgeError } from '../reliability/errors.js';
import { inProcessResult } from '../pipeline/step-runner.js';
import type { PipelineStage, Result, StageContext, StageReport } from '../pipeline/types.js';
import { isDirectory, walkFiles } from '../utils/fs.js';
import { classify, isLibraryFile, type Classification } from './classify.js';

export const COLLECT_STEP_NAME = 'Collecting native libraries';

export interface Artifact {
  sourcePath: string;
  fileName: string;
  classification: Classification;
}

export interface ProjectScan {
  project: ExportProject;
  directory: string;
  present: boolean;
  /** Library files found, matched or not */
  artifacts: Artifact[];
  copied: number;
}

export interface CollectionReport {
  count: number;
  outputDir: string;
  projects: ProjectScan[];
}

export class ArtifactCollector implements PipelineStage {
  readonly state = 'collecting';
  private readonly sdkDir: string;
  private readonly outputDir: string;

  constructor(private readonly ctx: StageContext) {
    this.sdkDir = resolvePath(ctx.config, ctx.config.sdkDir);
    this.outputDir = resolvePath(ctx.config, ctx.config.outputDir);
  }

  async collect(): Promise<Result<CollectionReport, ForgeError>> {
    const { logger, config } = this.ctx;
    await mkdir(this.outputDir, { recursive: true });

    const projects: ProjectScan[] = [];
    for (const project of config.exportProjects) {
      projects.push(await this.scanProject(project));
    }

    const count = projects.reduce((sum, scan) => sum + scan.copied, 0);
    const report: CollectionReport = { count, outputDir: this.outputDir, projects };

    if (count === 0) {
      await this.logDiagnostics(projects);
      const error = new ForgeError('No native libraries found in any export project', {
        code: 'NO_ARTIFACTS_FOUND',
        context: {
          projects: projects.map((scan) => ({ name: scan.project.name, present: scan.present })),
        },
      });
      logger.error(error.message, error);
      return { ok: false, error };
    }

    logger.notice(`Copied ${count} native ${count === 1 ? 'library' : 'libraries'} to ${this.outputDir}`, {
      count,
    });
    return { ok: true, value: report };
  }

  async execute(): Promise<StageReport> {
    const startedAt = Date.now();
    this.ctx.logger.stepStart(COLLECT_STEP_NAME);
    const collected = await this.collect();
    const result = inProcessResult(COLLECT_STEP_NAME, startedAt, collected.ok ? undefined : collected.error);
    this.ctx.logger.stepEnd(COLLECT_STEP_NAME, collected.ok ? 'success' : 'fatal', result.durationMs);
    return {
      results: [result],
      artifactsCopied: collected.ok ? collected.value.count : 0,
    };
  }

  private async scanProject(project: ExportProject): Promise<ProjectScan> {
    const { logger, config } = this.ctx;
    const directory = join(this.sdkDir, project.relativeOutputPath);

    if (!(await isDirectory(directory))) {
      logger.warn(`${project.name} output directory not found, skipping`, {
        project: project.name,
        directory,
      });
      return { project, directory, present: false, artifacts: [], copied: 0 };
    }

    const artifacts: Artifact[] = (await walkFiles(directory))
      .filter((file) => isLibraryFile(file.name, config.libraryExtensions))
      .map((file) => ({ sourcePath: file.path, fileName: file.name, classification: classify(file.name) }));

    let copied = 0;
    for (const artifact of artifacts) {
      if (artifact.classification === 'skip') {
        logger.debug(`Skipping ${artifact.fileName}`, { project: project.name });
        continue;
      }
      try {
        await copyFile(artifact.sourcePath, join(this.outputDir, artifact.fileName));
        copied++;
        logger.info(`Copied ${artifact.fileName}`, { project: project.name, source: artifact.sourcePath });
      } catch (error) {
        logger.warn(`Could not copy ${artifact.fileName}`, {
          project: project.name,
          source: artifact.sourcePath,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return { project, directory, present: true, artifacts, copied };
  }

  private async logDiagnostics(projects: ProjectScan[]): Promise<void> {
    for (const scan of projects) {
      if (!scan.present) continue;
      const files = await walkFiles(scan.directory);
      this.ctx.logger.info(`${files.length} file(s) under ${scan.project.name}`, {
        project: scan.project.name,
        files: files.map((file) => file.relativePath),
      });
    }
  }
}
