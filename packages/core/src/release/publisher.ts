/**
 * Release publishing contract. Implementations live outside core
 * (see @libforge/integrations for GitHub).
 *
 * @module @libforge/core/release/publisher
 */

import type { ReleasePackage } from './packager.js';

export interface PublishedRelease {
  /** Release page, when the host has one */
  url?: string;
  /** Names of the uploaded assets */
  assets: string[];
}

export interface ReleasePublisher {
  publish(release: ReleasePackage): Promise<PublishedRelease>;
}

/**
 * Every archive of a package, per-platform first, combined last
 */
export function releaseAssetPaths(release: ReleasePackage): string[] {
  return [...release.bundles.map((bundle) => bundle.archivePath), release.combined.archivePath];
}
