/**
 * GitHub Release Publisher Tests
 *
 * All tests use mocked Octokit responses - no network calls.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PLATFORM_TARGETS, type ReleasePackage } from '@libforge/core';
import {
  GitHubReleasePublisher,
  assetContentType,
  parseRepository,
  type ReleaseApi,
} from '../release-publisher.js';

const { createRelease, request, Octokit } = vi.hoisted(() => {
  const createRelease = vi.fn();
  const request = vi.fn();
  const Octokit = vi.fn().mockImplementation(() => ({
    rest: { repos: { createRelease } },
    request,
  }));
  return { createRelease, request, Octokit };
});

vi.mock('octokit', () => ({ Octokit }));

const UPLOAD_URL = 'https://uploads.github.com/repos/acme/sdk/releases/7/assets{?name,label}';

describe('parseRepository', () => {
  it('splits owner/repo', () => {
    expect(parseRepository('acme/sdk')).toEqual({ owner: 'acme', repo: 'sdk' });
  });

  it('rejects values without exactly one slash', () => {
    expect(() => parseRepository('acme')).toThrow('Invalid repository "acme" (expected owner/repo)');
    expect(() => parseRepository('a/b/c')).toThrow('expected owner/repo');
  });
});

describe('assetContentType', () => {
  it('maps archive formats to content types', () => {
    expect(assetContentType('libs-win-x64.zip')).toBe('application/zip');
    expect(assetContentType('libs-linux-x64.tar.gz')).toBe('application/gzip');
  });
});

describe('GitHubReleasePublisher', () => {
  let dir: string;
  let release: ReleasePackage;
  const savedToken = process.env.GITHUB_TOKEN;

  beforeEach(async () => {
    vi.clearAllMocks();
    createRelease.mockResolvedValue({
      data: { id: 7, html_url: 'https://github.com/acme/sdk/releases/tag/v1.2.0', upload_url: UPLOAD_URL },
    });
    request.mockResolvedValue({ data: {} });

    dir = await mkdtemp(join(tmpdir(), 'libforge-publish-'));
    const winPath = join(dir, 'libs-win-x64.zip');
    const combinedPath = join(dir, 'libs-all-platforms.tar.gz');
    await writeFile(winPath, 'zip-bytes');
    await writeFile(combinedPath, 'tar-bytes');

    release = {
      tag: 'v1.2.0',
      name: 'SDK v1.2.0',
      prerelease: false,
      notes: '# SDK v1.2.0',
      assetsDir: dir,
      bundles: [
        {
          platform: PLATFORM_TARGETS[0],
          artifactDir: join(dir, 'win-x64'),
          archivePath: winPath,
          archiveFormat: 'zip',
          placeholder: false,
          files: ['proton.dll'],
          checksum: 'sha256:00',
        },
      ],
      combined: { archivePath: combinedPath, files: ['native-libs-win-x64/proton.dll'], checksum: 'sha256:11' },
    };
  });

  afterEach(async () => {
    if (savedToken === undefined) {
      delete process.env.GITHUB_TOKEN;
    } else {
      process.env.GITHUB_TOKEN = savedToken;
    }
    await rm(dir, { recursive: true, force: true });
  });

  it('requires a token when no API is injected', () => {
    delete process.env.GITHUB_TOKEN;
    expect(() => new GitHubReleasePublisher({ repository: 'acme/sdk' })).toThrow('GitHub token is required');
  });

  it('authenticates Octokit with the token from the environment', () => {
    process.env.GITHUB_TOKEN = 'test-secret';
    new GitHubReleasePublisher({ repository: 'acme/sdk' });
    expect(Octokit).toHaveBeenCalledWith({ auth: 'test-secret' });
  });

  it('creates the release and uploads every archive', async () => {
    const publisher = new GitHubReleasePublisher({ repository: 'acme/sdk', token: 'test-secret' });

    const published = await publisher.publish(release);

    expect(createRelease).toHaveBeenCalledWith({
      owner: 'acme',
      repo: 'sdk',
      tag_name: 'v1.2.0',
      name: 'SDK v1.2.0',
      body: '# SDK v1.2.0',
      draft: false,
      prerelease: false,
    });
    expect(request).toHaveBeenCalledTimes(2);
    expect(request).toHaveBeenNthCalledWith(1, `POST ${UPLOAD_URL}`, {
      name: 'libs-win-x64.zip',
      data: Buffer.from('zip-bytes'),
      headers: { 'content-type': 'application/zip', 'content-length': 9 },
    });
    expect(request.mock.calls[1][1]).toMatchObject({
      name: 'libs-all-platforms.tar.gz',
      headers: { 'content-type': 'application/gzip' },
    });
    expect(published).toEqual({
      url: 'https://github.com/acme/sdk/releases/tag/v1.2.0',
      assets: ['libs-win-x64.zip', 'libs-all-platforms.tar.gz'],
    });
  });

  it('propagates API failures', async () => {
    const api: ReleaseApi = {
      createRelease: vi.fn().mockRejectedValue(new Error('Validation Failed: tag already exists')),
      uploadAsset: vi.fn(),
    };
    const publisher = new GitHubReleasePublisher({ repository: 'acme/sdk', api });

    await expect(publisher.publish(release)).rejects.toThrow('tag already exists');
    expect(api.uploadAsset).not.toHaveBeenCalled();
  });
});
