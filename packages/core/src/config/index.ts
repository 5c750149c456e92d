/**
 * Build Configuration
 *
 * Layered configuration for the pipeline, validated with zod.
 *
 * Precedence (lowest to highest):
 *   built-in defaults → libforge.config.json → environment → explicit overrides
 *
 * @module @libforge/core/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../reliability/errors.js';
import { SEVERITIES } from '../telemetry/logger.js';

export const CONFIG_FILE_NAME = 'libforge.config.json';

// =============================================================================
// ZOD SCHEMAS
// =============================================================================

export const ToolProbeSchema = z.object({
  /** Display name, e.g. "dotnet" */
  name: z.string().min(1),
  /** Executable to run */
  command: z.string().min(1),
  /** Arguments that make the tool print its version */
  versionArgs: z.array(z.string()).default(['--version']),
  /** Minimum `major * 10 + minor`, if the tool is version-gated */
  minimumVersion: z.number().int().nonnegative().optional(),
});

export const ExportProjectSchema = z.object({
  name: z.string().min(1),
  /** Output path relative to the SDK root */
  relativeOutputPath: z.string().min(1),
});

export const RepositorySchema = z.object({
  url: z.string().min(1),
  /** Directory name under the project root */
  name: z.string().min(1),
});

const DEFAULT_EXPORT_PROJECTS = [
  'Proton.Sdk.CExports',
  'Proton.Sdk.Drive.CExports',
  'Proton.Sdk.Instrumentation.CExport',
].map((name) => ({ name, relativeOutputPath: `src/${name}/bin/Release` }));

export const ForgeConfigSchema = z.object({
  /** Project root; every relative path below resolves against it */
  rootDir: z.string().min(1),

  /** Managed SDK checkout */
  sdkDir: z.string().min(1).default('Proton.SDK'),

  /** Flat native library output directory */
  outputDir: z.string().min(1).default('native-libs'),

  logLevel: z.enum(SEVERITIES).default('INFO'),

  toolchain: z
    .object({
      managedRuntime: ToolProbeSchema.default({
        name: 'dotnet',
        command: 'dotnet',
        versionArgs: ['--version'],
        minimumVersion: 90,
      }),
      systems: ToolProbeSchema.default({
        name: 'cargo',
        command: 'cargo',
        versionArgs: ['--version'],
      }),
      /** Extra tools required inside a matrix cell */
      matrixExtras: z.array(ToolProbeSchema).default([
        { name: 'git', command: 'git', versionArgs: ['--version'] },
        { name: 'go', command: 'go', versionArgs: ['version'] },
        { name: 'gcc', command: 'gcc', versionArgs: ['--version'] },
      ]),
    })
    .default({}),

  exportProjects: z.array(ExportProjectSchema).min(1).default(DEFAULT_EXPORT_PROJECTS),

  libraryExtensions: z.array(z.string().startsWith('.')).min(1).default(['.dll', '.so', '.dylib']),

  systems: z
    .object({
      bindingPackage: z.string().min(1).default('proton-sdk-sys'),
      wrapperPackage: z.string().min(1).default('proton-sdk-rs'),
      /** Crates whose directories `clean` runs `cargo clean` in */
      cleanDirs: z.array(z.string()).default(['proton-sdk-rs', 'proton-sdk-sys']),
    })
    .default({}),

  matrix: z
    .object({
      maxParallelCells: z.number().int().positive().default(4),
      /** Per-cell checkouts live under <workDir>/<runtime-identifier> */
      workDir: z.string().min(1).default('.libforge/cells'),
      repositories: z.array(RepositorySchema).default([]),
      cryptoDir: z.string().min(1).default('dotnet-crypto'),
      cryptoProject: z.string().min(1).default('src/dotnet/Proton.Cryptography.csproj'),
      /** Go sources of the crypto library, relative to cryptoDir */
      goSourceDir: z.string().min(1).default('src/go'),
      cryptoLibraryName: z.string().min(1).default('proton_crypto'),
      packageVersion: z.string().min(1).default('1.0.0'),
      packageSourceName: z.string().min(1).default('ProtonRepository'),
      localPackageRepository: z.string().min(1).default('local-nuget-repository'),
      aotProject: z.string().min(1).default('Proton.Sdk.Drive.CExports'),
      targetFramework: z.string().min(1).default('net9.0'),
    })
    .default({}),

  release: z
    .object({
      archivePrefix: z.string().min(1).default('proton-sdk-native'),
      releaseName: z.string().min(1).default('Proton SDK Native Libraries'),
      assetsDir: z.string().min(1).default('release-assets'),
      notesFile: z.string().min(1).default('RELEASE.md'),
      /** owner/repo; falls back to GITHUB_REPOSITORY */
      repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/).optional(),
    })
    .default({}),
});

export type ToolProbe = z.infer<typeof ToolProbeSchema>;
export type ExportProject = z.infer<typeof ExportProjectSchema>;
export type Repository = z.infer<typeof RepositorySchema>;
export type ForgeConfig = z.infer<typeof ForgeConfigSchema>;
export type ForgeConfigInput = z.input<typeof ForgeConfigSchema>;

// =============================================================================
// Loading
// =============================================================================

export interface LoadConfigOptions {
  /** Project root (default: cwd) */
  rootDir?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, typically CLI flags */
  overrides?: Partial<ForgeConfigInput>;
}

/**
 * Read libforge.config.json from the project root, if present
 */
export function readConfigFile(rootDir: string): Record<string, unknown> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Could not parse ${configPath}`, {
      cause: error instanceof Error ? error : undefined,
      context: { configPath },
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`${configPath} must contain a JSON object`, {
      context: { configPath },
    });
  }
  return { ...parsed };
}

/**
 * Pick the config values carried by environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const fromEnv: Record<string, unknown> = {};

  if (env.LIBFORGE_SDK_DIR) fromEnv.sdkDir = env.LIBFORGE_SDK_DIR;
  if (env.LIBFORGE_OUTPUT_DIR) fromEnv.outputDir = env.LIBFORGE_OUTPUT_DIR;
  if (env.LIBFORGE_LOG_LEVEL) fromEnv.logLevel = env.LIBFORGE_LOG_LEVEL.toUpperCase();
  if (env.LIBFORGE_MAX_PARALLEL_CELLS) {
    fromEnv.matrix = { maxParallelCells: Number(env.LIBFORGE_MAX_PARALLEL_CELLS) };
  }
  if (env.GITHUB_REPOSITORY) {
    fromEnv.release = { repository: env.GITHUB_REPOSITORY };
  }

  return fromEnv;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge config layers; plain objects merge key by key at every depth,
 * arrays and other values replace
 */
export function mergeLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const existing = merged[key];
      merged[key] = isPlainObject(existing) && isPlainObject(value) ? mergeLayers(existing, value) : value;
    }
  }
  return merged;
}

/**
 * Load and validate the configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): ForgeConfig {
  const rootDir = resolve(options.rootDir ?? process.cwd());
  const env = options.env ?? process.env;

  // Defaults form the base layer so a partial section keeps its other fields
  const merged = mergeLayers(
    ForgeConfigSchema.parse({ rootDir }),
    readConfigFile(rootDir),
    configFromEnv(env),
    { ...options.overrides },
    { rootDir }
  );

  const result = ForgeConfigSchema.safeParse(merged);
  if (!result.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of result.error.issues) {
      fieldErrors[issue.path.join('.') || '(root)'] = issue.message;
    }
    const summary = Object.entries(fieldErrors)
      .map(([field, message]) => `${field}: ${message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${summary}`, { fieldErrors });
  }

  return result.data;
}

/**
 * Resolve a config path against the project root
 */
export function resolvePath(config: ForgeConfig, path: string): string {
  return isAbsolute(path) ? path : join(config.rootDir, path);
}
