/**
 * Release Packager
 *
 * Archives each platform directory (zip for windows, tar.gz otherwise),
 * builds one combined archive of every platform, and hands the set to a
 * ReleasePublisher. Platform directories are only read, never written.
 *
 * @module @libforge/core/release/packager
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { resolvePath, type ForgeConfig } from '../config/index.js';
import { ConfigurationError, ForgeError, wrapError } from '../reliability/errors.js';
import type { Result } from '../pipeline/types.js';
import { archiveFormatFor, PLATFORM_TARGETS, type ArchiveFormat, type PlatformTarget } from '../platform/targets.js';
import type { Logger } from '../telemetry/logger.js';
import { isDirectory } from '../utils/fs.js';
import { PLACEHOLDER_FILE } from '../matrix/coordinator.js';
import {
  collectArchiveEntries,
  computeChecksum,
  createTarGz,
  createZip,
  readTarGzEntries,
  readZipEntries,
  type ArchiveEntry,
} from './archive.js';
import type { PublishedRelease, ReleasePublisher } from './publisher.js';

// =============================================================================
// Types
// =============================================================================

export interface ReleaseBundle {
  platform: PlatformTarget;
  artifactDir: string;
  archivePath: string;
  archiveFormat: ArchiveFormat;
  /** The directory held only the placeholder notice */
  placeholder: boolean;
  /** Files inside the archive, read back after writing */
  files: string[];
  checksum: string;
}

export interface CombinedArchive {
  archivePath: string;
  files: string[];
  checksum: string;
}

export interface ReleasePackage {
  tag: string;
  name: string;
  prerelease: boolean;
  notes: string;
  assetsDir: string;
  bundles: ReleaseBundle[];
  combined: CombinedArchive;
}

export interface PackagerContext {
  config: ForgeConfig;
  logger: Logger;
}

export interface PackageOptions {
  /** Release notes file; defaults to config.release.notesFile when present */
  notesFile?: string;
}

// =============================================================================
// Tag helpers
// =============================================================================

/**
 * Explicit tag first, then a `refs/tags/<tag>` ref
 */
export function resolveTag(explicit?: string, ref?: string): string {
  if (explicit && explicit.trim() !== '') {
    return explicit.trim();
  }
  if (ref?.startsWith('refs/tags/')) {
    const tag = ref.slice('refs/tags/'.length);
    if (tag !== '') return tag;
  }
  throw new ConfigurationError('No release tag: pass --tag or run on a refs/tags/<tag> ref', {
    fieldErrors: { tag: 'required' },
  });
}

export function isPrerelease(tag: string): boolean {
  return tag.includes('-');
}

export function archiveName(prefix: string, target: PlatformTarget): string {
  return `${prefix}-${target.runtimeIdentifier}.${archiveFormatFor(target.osFamily)}`;
}

// =============================================================================
// Packager
// =============================================================================

export class ReleasePackager {
  private readonly sourceDir: string;
  private readonly assetsDir: string;

  constructor(
    private readonly ctx: PackagerContext,
    private readonly targets: readonly PlatformTarget[] = PLATFORM_TARGETS
  ) {
    this.sourceDir = resolvePath(ctx.config, ctx.config.outputDir);
    this.assetsDir = resolvePath(ctx.config, ctx.config.release.assetsDir);
  }

  platformDir(target: PlatformTarget): string {
    return join(this.sourceDir, target.runtimeIdentifier);
  }

  async package(tag: string, options: PackageOptions = {}): Promise<Result<ReleasePackage, ForgeError>> {
    const { logger, config } = this.ctx;

    if (options.notesFile && !existsSync(resolvePath(config, options.notesFile))) {
      const error = new ConfigurationError(`Release notes file not found: ${options.notesFile}`, {
        fieldErrors: { notes: 'not found' },
      });
      logger.error(error.message, error);
      return { ok: false, error };
    }

    const missing: string[] = [];
    for (const target of this.targets) {
      if (!(await isDirectory(this.platformDir(target)))) {
        missing.push(target.runtimeIdentifier);
      }
    }
    if (missing.length > 0) {
      const error = new ForgeError(`No output directory for declared platform(s): ${missing.join(', ')}`, {
        code: 'RELEASE_DIRECTORY_MISSING',
        context: { missing, sourceDir: this.sourceDir },
      });
      logger.error(error.message, error);
      return { ok: false, error };
    }

    await mkdir(this.assetsDir, { recursive: true });

    const bundles: ReleaseBundle[] = [];
    const combinedEntries: ArchiveEntry[] = [];

    for (const target of this.targets) {
      const artifactDir = this.platformDir(target);
      const format = archiveFormatFor(target.osFamily);
      const archivePath = join(this.assetsDir, archiveName(config.release.archivePrefix, target));

      const entries = await collectArchiveEntries(artifactDir);
      const archive = format === 'zip' ? createZip(entries) : createTarGz(entries);
      await writeFile(archivePath, archive);

      const written = await readFile(archivePath);
      const files = listFiles(format === 'zip' ? readZipEntries(written) : readTarGzEntries(written));
      const placeholder = await isPlaceholderDir(artifactDir);

      bundles.push({
        platform: target,
        artifactDir,
        archivePath,
        archiveFormat: format,
        placeholder,
        files,
        checksum: computeChecksum(written),
      });
      logger.info(`Created ${basename(archivePath)}${placeholder ? ' (placeholder)' : ''}`, {
        runtime: target.runtimeIdentifier,
        files: files.length,
      });

      combinedEntries.push(...(await collectArchiveEntries(artifactDir, `native-libs-${target.runtimeIdentifier}/`)));
    }

    const combinedPath = join(this.assetsDir, `${config.release.archivePrefix}-all-platforms.tar.gz`);
    await writeFile(combinedPath, createTarGz(combinedEntries));
    const combinedWritten = await readFile(combinedPath);
    const combined: CombinedArchive = {
      archivePath: combinedPath,
      files: listFiles(readTarGzEntries(combinedWritten)),
      checksum: computeChecksum(combinedWritten),
    };
    logger.info(`Created ${basename(combinedPath)}`, { files: combined.files.length });

    const name = `${config.release.releaseName} ${tag}`;
    const notes = await this.releaseNotes(name, bundles, combined, options.notesFile);

    return {
      ok: true,
      value: {
        tag,
        name,
        prerelease: isPrerelease(tag),
        notes,
        assetsDir: this.assetsDir,
        bundles,
        combined,
      },
    };
  }

  /**
   * Publish a packaged release; any publisher failure becomes PUBLISH_FAILED
   */
  async publish(release: ReleasePackage, publisher: ReleasePublisher): Promise<Result<PublishedRelease, ForgeError>> {
    try {
      const published = await publisher.publish(release);
      this.ctx.logger.notice(`Published ${release.name}`, { tag: release.tag, url: published.url });
      return { ok: true, value: published };
    } catch (error) {
      const wrapped =
        error instanceof ForgeError && error.code === 'PUBLISH_FAILED'
          ? error
          : new ForgeError(`Publishing ${release.tag} failed: ${error instanceof Error ? error.message : String(error)}`, {
              code: 'PUBLISH_FAILED',
              context: { tag: release.tag },
              cause: wrapError(error),
            });
      this.ctx.logger.error(wrapped.message, wrapped);
      return { ok: false, error: wrapped };
    }
  }

  private async releaseNotes(
    name: string,
    bundles: ReleaseBundle[],
    combined: CombinedArchive,
    notesFile?: string
  ): Promise<string> {
    const path = resolvePath(this.ctx.config, notesFile ?? this.ctx.config.release.notesFile);
    if (existsSync(path)) {
      this.ctx.logger.info(`Using release notes from ${basename(path)}`);
      return readFile(path, 'utf-8');
    }
    return generateReleaseNotes(name, bundles, combined);
  }
}

/**
 * Release notes listing every platform archive, placeholders labelled
 */
export function generateReleaseNotes(name: string, bundles: ReleaseBundle[], combined: CombinedArchive): string {
  const lines = [`# ${name}`, '', '## Platforms', ''];
  for (const bundle of bundles) {
    const { platform } = bundle;
    const label = bundle.placeholder ? ` (not built, see ${PLACEHOLDER_FILE})` : '';
    lines.push(
      `- ${platform.runtimeIdentifier} (${platform.osFamily}/${platform.architecture}): ${basename(bundle.archivePath)}${label}`
    );
  }
  lines.push('', `All platforms: ${basename(combined.archivePath)}`, '');
  return lines.join('\n');
}

function listFiles(entries: ArchiveEntry[]): string[] {
  return entries.filter((entry) => !entry.isDirectory).map((entry) => entry.name);
}

async function isPlaceholderDir(dir: string): Promise<boolean> {
  const items = await readdir(dir);
  return items.length === 1 && items[0] === PLACEHOLDER_FILE;
}
