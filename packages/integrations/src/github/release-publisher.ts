/**
 * GitHub Release Publisher
 *
 * Creates a release for the tag and uploads every archive as an asset.
 * Uses Octokit under the hood.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { Octokit } from 'octokit';
import {
  ConfigurationError,
  releaseAssetPaths,
  type Logger,
  type PublishedRelease,
  type ReleasePackage,
  type ReleasePublisher,
} from '@libforge/core';

/**
 * Release as returned by the API
 */
export interface CreatedRelease {
  id: number;
  htmlUrl: string;
  /** Hypermedia upload URL, e.g. `https://uploads.github.com/.../assets{?name,label}` */
  uploadUrl: string;
}

export interface CreateReleaseInput {
  owner: string;
  repo: string;
  tagName: string;
  name: string;
  body: string;
  prerelease: boolean;
}

/**
 * The two release endpoints the publisher needs
 */
export interface ReleaseApi {
  createRelease(input: CreateReleaseInput): Promise<CreatedRelease>;
  uploadAsset(uploadUrl: string, name: string, content: Buffer, contentType: string): Promise<void>;
}

/**
 * ReleaseApi backed by an Octokit instance
 */
export function octokitReleaseApi(octokit: Octokit): ReleaseApi {
  return {
    async createRelease(input) {
      const { data } = await octokit.rest.repos.createRelease({
        owner: input.owner,
        repo: input.repo,
        tag_name: input.tagName,
        name: input.name,
        body: input.body,
        draft: false,
        prerelease: input.prerelease,
      });
      return { id: data.id, htmlUrl: data.html_url, uploadUrl: data.upload_url };
    },

    async uploadAsset(uploadUrl, name, content, contentType) {
      await octokit.request(`POST ${uploadUrl}`, {
        name,
        data: content,
        headers: {
          'content-type': contentType,
          'content-length': content.length,
        },
      });
    },
  };
}

export interface GitHubReleasePublisherConfig {
  /** owner/repo */
  repository: string;
  token?: string;
  /** Injected API; defaults to Octokit authenticated with the token */
  api?: ReleaseApi;
  logger?: Logger;
}

/**
 * Parse "owner/repo"
 */
export function parseRepository(repository: string): { owner: string; repo: string } {
  const match = /^([^/\s]+)\/([^/\s]+)$/.exec(repository.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid repository "${repository}" (expected owner/repo)`, {
      fieldErrors: { 'release.repository': 'expected owner/repo' },
    });
  }
  return { owner: match[1], repo: match[2] };
}

export function assetContentType(fileName: string): string {
  return fileName.endsWith('.zip') ? 'application/zip' : 'application/gzip';
}

export class GitHubReleasePublisher implements ReleasePublisher {
  private readonly owner: string;
  private readonly repo: string;
  private readonly api: ReleaseApi;
  private readonly logger?: Logger;

  constructor(config: GitHubReleasePublisherConfig) {
    const { owner, repo } = parseRepository(config.repository);
    this.owner = owner;
    this.repo = repo;
    this.logger = config.logger;

    if (config.api) {
      this.api = config.api;
    } else {
      const token = config.token ?? process.env.GITHUB_TOKEN;
      if (!token) {
        throw new ConfigurationError('GitHub token is required. Set GITHUB_TOKEN environment variable.', {
          fieldErrors: { GITHUB_TOKEN: 'required' },
        });
      }
      this.api = octokitReleaseApi(new Octokit({ auth: token }));
    }
  }

  async publish(release: ReleasePackage): Promise<PublishedRelease> {
    const created = await this.api.createRelease({
      owner: this.owner,
      repo: this.repo,
      tagName: release.tag,
      name: release.name,
      body: release.notes,
      prerelease: release.prerelease,
    });
    this.logger?.info(`Created release ${release.name}`, { releaseId: created.id, url: created.htmlUrl });

    const assets: string[] = [];
    for (const path of releaseAssetPaths(release)) {
      const name = basename(path);
      await this.api.uploadAsset(created.uploadUrl, name, await readFile(path), assetContentType(name));
      assets.push(name);
      this.logger?.info(`Uploaded ${name}`);
    }

    return { url: created.htmlUrl, assets };
  }
}
