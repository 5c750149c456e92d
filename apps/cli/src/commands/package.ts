/**
 * libforge package
 *
 * Archives every platform directory into release assets and, with
 * --publish, creates the GitHub release.
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  ConfigurationError,
  ReleasePackager,
  resolveTag,
  toExitCode,
  type ReleasePackage,
  type ReleasePublisher,
} from '@libforge/core';
import { GitHubReleasePublisher } from '@libforge/integrations';
import type { CliContext } from '../context.js';

export interface PackageCommandOptions {
  tag?: string;
  notes?: string;
  publish?: boolean;
  /** Builds the publisher; defaults to GitHub Releases */
  publisherFactory?: (ctx: CliContext) => ReleasePublisher;
}

function githubPublisher(ctx: CliContext): ReleasePublisher {
  const repository = ctx.config.release.repository;
  if (!repository) {
    throw new ConfigurationError('No repository to publish to: set release.repository or GITHUB_REPOSITORY', {
      fieldErrors: { 'release.repository': 'required for --publish' },
    });
  }
  return new GitHubReleasePublisher({ repository, logger: ctx.logger });
}

export function packageReport(release: ReleasePackage): Record<string, unknown> {
  return {
    tag: release.tag,
    name: release.name,
    prerelease: release.prerelease,
    assets: [
      ...release.bundles.map((bundle) => ({
        runtime: bundle.platform.runtimeIdentifier,
        path: bundle.archivePath,
        placeholder: bundle.placeholder,
        files: bundle.files,
        checksum: bundle.checksum,
      })),
      { runtime: 'all', path: release.combined.archivePath, files: release.combined.files, checksum: release.combined.checksum },
    ],
  };
}

export async function packageCommand(ctx: CliContext, options: PackageCommandOptions): Promise<number> {
  const tag = resolveTag(options.tag, process.env.GITHUB_REF);
  // Fail before archiving when publishing cannot work
  const publisher = options.publish ? (options.publisherFactory ?? githubPublisher)(ctx) : undefined;

  const packager = new ReleasePackager(ctx);
  const spinner = ora({ isSilent: ctx.json });

  spinner.start(`Packaging ${tag}...`);
  const packaged = await packager.package(tag, { notesFile: options.notes });
  if (!packaged.ok) {
    spinner.fail(packaged.error.message);
    return toExitCode(packaged.error);
  }
  const release = packaged.value;
  spinner.succeed(`Packaged ${release.bundles.length + 1} archives into ${release.assetsDir}`);

  if (!ctx.json) {
    for (const bundle of release.bundles) {
      const note = bundle.placeholder ? chalk.yellow(' (placeholder)') : '';
      console.log(`  ${chalk.green('✓')} ${bundle.archivePath}${note}`);
    }
    console.log(`  ${chalk.green('✓')} ${release.combined.archivePath}`);
  }

  if (publisher) {
    spinner.start(`Publishing ${release.name}...`);
    const published = await packager.publish(release, publisher);
    if (!published.ok) {
      spinner.fail(published.error.message);
      return toExitCode(published.error);
    }
    spinner.succeed(published.value.url ? `Published ${published.value.url}` : `Published ${release.name}`);
  }

  if (ctx.json) {
    console.log(JSON.stringify(packageReport(release), null, 2));
  }

  return 0;
}
