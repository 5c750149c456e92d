/**
 * Matrix Cell
 *
 * One platform's sub-pipeline: clone → crypto → sdk → dll. Every cell works
 * in its own checkout under `<workDir>/<runtime-identifier>` and writes only
 * `<outputDir>/<runtime-identifier>`, so cells share no mutable state.
 *
 * @module @libforge/core/matrix/cell
 */

import { copyFile, mkdir, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { extname, join } from 'node:path';
import { resolvePath } from '../config/index.js';
import { ForgeError, type WarningKind } from '../reliability/errors.js';
import { inProcessResult, StepRunner } from '../pipeline/step-runner.js';
import {
  advisoryStep,
  fatalStep,
  firstFatal,
  type BuildStep,
  type StageContext,
  type StepResult,
} from '../pipeline/types.js';
import { goOs, libraryExtension, type PlatformTarget } from '../platform/targets.js';
import { ManagedBuildStage } from '../stages/managed-build.js';
import { isDirectory, walkFiles } from '../utils/fs.js';

export const CELL_STEPS = ['clone', 'crypto', 'sdk', 'dll'] as const;

export type CellStepId = (typeof CELL_STEPS)[number];

export function isCellStep(value: string): value is CellStepId {
  return CELL_STEPS.some((step) => step === value);
}

const CELL_WARNING: WarningKind = 'CELL_STEP_WARNING';

const NUGET_CONFIG = `<?xml version="1.0" encoding="utf-8"?>
<configuration>
  <packageSources />
</configuration>
`;

/**
 * What a cell's sub-pipeline produced
 */
export interface CellRun {
  results: StepResult[];
  /** Step whose fatal outcome ended the sequence */
  failedStep?: CellStepId;
  error?: ForgeError;
  /** Files copied into the cell's output directory */
  filesCopied: number;
}

/**
 * Anything that can run one cell; the coordinator only needs this
 */
export interface CellExecutor {
  readonly target: PlatformTarget;
  readonly outputDir: string;
  run(): Promise<CellRun>;
}

export interface MatrixCellOptions {
  exclude?: readonly CellStepId[];
}

export class MatrixCell implements CellExecutor {
  readonly cellDir: string;
  readonly outputDir: string;
  private readonly ctx: StageContext;
  private readonly exclude: ReadonlySet<CellStepId>;
  private readonly steps: StepRunner;
  private filesCopied = 0;

  constructor(
    ctx: StageContext,
    readonly target: PlatformTarget,
    options: MatrixCellOptions = {}
  ) {
    const rid = target.runtimeIdentifier;
    this.ctx = { ...ctx, logger: ctx.logger.child({ runtime: rid }) };
    this.cellDir = join(resolvePath(ctx.config, ctx.config.matrix.workDir), rid);
    this.outputDir = join(resolvePath(ctx.config, ctx.config.outputDir), rid);
    this.exclude = new Set(options.exclude ?? []);
    this.steps = StepRunner.fromContext(this.ctx, this.outputDir);
  }

  async run(): Promise<CellRun> {
    const { logger } = this.ctx;
    const results: StepResult[] = [];
    await mkdir(this.cellDir, { recursive: true });

    logger.info(`Building ${this.target.runtimeIdentifier} (${this.target.osFamily}/${this.target.architecture})`, {
      cellDir: this.cellDir,
    });

    for (const id of CELL_STEPS) {
      if (this.exclude.has(id)) {
        logger.info(`Skipping ${id} (excluded)`);
        continue;
      }

      const stepResults = await this.runStep(id);
      results.push(...stepResults);

      const fatal = firstFatal(stepResults);
      if (fatal) {
        return { results, failedStep: id, error: fatal.error, filesCopied: this.filesCopied };
      }
    }

    return { results, filesCopied: this.filesCopied };
  }

  private runStep(id: CellStepId): Promise<StepResult[]> {
    switch (id) {
      case 'clone':
        return this.clone();
      case 'crypto':
        return this.buildCrypto();
      case 'sdk':
        return this.buildSdk();
      case 'dll':
        return this.buildNativeLibrary();
    }
  }

  // ===========================================================================
  // clone
  // ===========================================================================

  private async clone(): Promise<StepResult[]> {
    const steps: BuildStep[] = [];
    for (const repo of this.ctx.config.matrix.repositories) {
      const target = join(this.cellDir, repo.name);
      if (existsSync(target)) {
        this.ctx.logger.info(`Repository ${repo.name} already exists, skipping clone`);
        continue;
      }
      steps.push(
        fatalStep(
          `Cloning ${repo.name}`,
          { command: 'git', args: ['clone', repo.url, target], cwd: this.cellDir },
          'STEP_FAILED'
        )
      );
    }
    return this.steps.runAll(steps);
  }

  // ===========================================================================
  // crypto
  // ===========================================================================

  private async buildCrypto(): Promise<StepResult[]> {
    const { config, logger, runner, signal } = this.ctx;
    const matrix = config.matrix;
    const dotnet = config.toolchain.managedRuntime.command;
    const cryptoDir = join(this.cellDir, matrix.cryptoDir);
    const localRepo = join(this.cellDir, matrix.localPackageRepository);
    const nugetConfig = join(this.cellDir, 'nuget.config');

    const results: StepResult[] = [];

    const goSteps = await this.goBuildSteps(cryptoDir);
    if (goSteps.length > 0) {
      await mkdir(join(cryptoDir, 'bin', 'runtimes', this.target.runtimeIdentifier, 'native'), { recursive: true });
      results.push(...(await this.steps.runAll(goSteps)));
      if (firstFatal(results)) return results;
    }

    await mkdir(localRepo, { recursive: true });
    if (!existsSync(nugetConfig)) {
      await writeFile(nugetConfig, NUGET_CONFIG, 'utf-8');
    }

    // Removing an unregistered source fails; that is the normal first-run case
    const removed = await runner.run(
      {
        command: dotnet,
        args: ['nuget', 'remove', 'source', matrix.packageSourceName, '--configfile', nugetConfig],
        cwd: this.cellDir,
      },
      { signal, quiet: true }
    );
    logger.debug(
      removed.exitCode === 0
        ? `Removed existing ${matrix.packageSourceName} source`
        : `${matrix.packageSourceName} source was not registered`
    );

    const packSteps: BuildStep[] = [
      fatalStep(
        `Registering ${matrix.packageSourceName} package source`,
        {
          command: dotnet,
          args: ['nuget', 'add', 'source', localRepo, '--name', matrix.packageSourceName, '--configfile', nugetConfig],
          cwd: this.cellDir,
        },
        'STEP_FAILED'
      ),
      fatalStep(
        `Packing ${matrix.cryptoDir}`,
        {
          command: dotnet,
          args: ['pack', '-c', 'Release', `-p:Version=${matrix.packageVersion}`, matrix.cryptoProject, '--output', localRepo],
          cwd: cryptoDir,
        },
        'STEP_FAILED'
      ),
    ];
    results.push(...(await this.steps.runAll(packSteps)));
    return results;
  }

  /**
   * One go build per build mode; a failed mode is a warning
   */
  private async goBuildSteps(cryptoDir: string): Promise<BuildStep[]> {
    const { config, logger } = this.ctx;
    const goSrc = join(cryptoDir, config.matrix.goSourceDir);
    if (!(await isDirectory(goSrc))) {
      logger.warn(`Go source directory not found at ${goSrc}, skipping Go build`);
      return [];
    }

    const env = this.goEnvironment();
    const nativeDir = join(cryptoDir, 'bin', 'runtimes', this.target.runtimeIdentifier, 'native');

    return (['c-shared', 'c-archive'] as const).map((mode) => {
      const fileName = cryptoOutputName(this.target, config.matrix.cryptoLibraryName, mode);
      return advisoryStep(
        `Building ${fileName} (${mode})`,
        {
          command: 'go',
          args: ['build', '-C', goSrc, `-buildmode=${mode}`, '-o', join(nativeDir, fileName)],
          cwd: cryptoDir,
          env,
        },
        CELL_WARNING
      );
    });
  }

  private goEnvironment(): Record<string, string> {
    const env: Record<string, string> = {
      GOFLAGS: '-trimpath',
      CGO_ENABLED: '1',
      CGO_LDFLAGS: '-s -w',
      GOOS: goOs(this.target.osFamily),
      GOARCH: this.target.architecture,
      CC: 'gcc',
    };
    if (this.target.osFamily === 'windows') {
      env.CXX = 'g++';
      env.CGO_CFLAGS = '-O2';
      env.CGO_LDFLAGS = '-s -w -static -static-libgcc -static-libstdc++';
    }
    return env;
  }

  // ===========================================================================
  // sdk
  // ===========================================================================

  private async buildSdk(): Promise<StepResult[]> {
    const stage = new ManagedBuildStage(this.ctx, join(this.cellDir, this.ctx.config.sdkDir), this.outputDir);
    return [await stage.build()];
  }

  // ===========================================================================
  // dll
  // ===========================================================================

  private async buildNativeLibrary(): Promise<StepResult[]> {
    const { config, logger } = this.ctx;
    const { aotProject, targetFramework } = config.matrix;
    const rid = this.target.runtimeIdentifier;
    const dotnet = config.toolchain.managedRuntime.command;
    const projectDir = join(this.cellDir, config.sdkDir, 'src', aotProject);
    const projectFile = join(projectDir, `${aotProject}.csproj`);
    const stepName = `Publishing ${aotProject} for ${rid}`;
    const startedAt = Date.now();

    if (!existsSync(projectFile)) {
      const error = new ForgeError(`${aotProject}.csproj not found at ${projectFile}`, {
        code: 'PROJECT_DIRECTORY_MISSING',
        context: { projectFile },
      });
      logger.error(error.message, error);
      return [inProcessResult(stepName, startedAt, error)];
    }

    const results = await this.steps.runAll([
      advisoryStep(
        `Restoring ${aotProject}`,
        { command: dotnet, args: ['restore', projectFile], cwd: this.cellDir },
        CELL_WARNING
      ),
      fatalStep(
        stepName,
        {
          command: dotnet,
          args: ['publish', projectFile, '-c', 'Release', '-r', rid, '--self-contained', '-p:PublishAot=true'],
          cwd: this.cellDir,
        },
        'STEP_FAILED'
      ),
    ]);
    if (firstFatal(results)) return results;

    const copyStart = Date.now();
    const outputBase = join(projectDir, 'bin', 'Release', targetFramework, rid);
    const publishDir = join(outputBase, 'publish');
    const sourceDir = (await isDirectory(publishDir)) ? publishDir : (await isDirectory(outputBase)) ? outputBase : undefined;

    if (!sourceDir) {
      const error = new ForgeError(`No AOT output found for ${rid}`, {
        code: 'STEP_FAILED',
        context: { publishDir, outputBase },
      });
      logger.error(error.message, error);
      return [...results, inProcessResult(`Copying ${rid} libraries`, copyStart, error)];
    }

    logger.info(`Found AOT output at ${sourceDir}`);

    const mainExtension = libraryExtension(this.target.osFamily);
    try {
      await mkdir(this.outputDir, { recursive: true });
      for (const file of await walkFiles(sourceDir)) {
        if (extname(file.name).toLowerCase() === '.pdb') {
          logger.debug(`Skipping PDB file: ${file.name}`);
          continue;
        }
        await copyFile(file.path, join(this.outputDir, file.name));
        this.filesCopied++;
        logger.info(`Copied ${file.name}${file.name.toLowerCase().endsWith(mainExtension) ? ' (main library)' : ''}`);
      }
    } catch (cause) {
      // A partial copy is not a usable library set
      this.filesCopied = 0;
      await rm(this.outputDir, { recursive: true, force: true });
      const reason = cause instanceof Error ? cause.message : String(cause);
      const error = new ForgeError(`Copying ${rid} libraries failed: ${reason}`, {
        code: 'STEP_FAILED',
        context: { sourceDir, outputDir: this.outputDir },
        cause: cause instanceof Error ? cause : undefined,
      });
      logger.error(error.message, error);
      return [...results, inProcessResult(`Copying ${rid} libraries`, copyStart, error)];
    }

    if (this.filesCopied === 0) {
      logger.warn(`No files were copied from ${sourceDir}`);
    } else {
      logger.notice(`Copied ${this.filesCopied} file(s) to ${this.outputDir}`);
    }

    return [...results, inProcessResult(`Copying ${rid} libraries`, copyStart)];
  }
}

/**
 * Output name of the crypto library for a target and Go build mode
 */
export function cryptoOutputName(
  target: PlatformTarget,
  libName: string,
  mode: 'c-shared' | 'c-archive'
): string {
  switch (target.osFamily) {
    case 'windows':
      return mode === 'c-shared' ? `${libName}.dll` : `${libName}.a`;
    case 'linux':
      return mode === 'c-shared' ? `lib${libName}.so` : `lib${libName}.a`;
    case 'macos':
      return mode === 'c-shared' ? `${libName}.dylib` : `${libName}.a`;
  }
}
