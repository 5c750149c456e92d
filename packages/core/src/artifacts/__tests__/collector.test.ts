/**
 * Artifact collector tests
 */

import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { testContext } from '../../testing/fakes.js';
import { ArtifactCollector } from '../collector.js';

async function touch(path: string, content = 'binary'): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}

describe('ArtifactCollector', () => {
  let root: string;
  const release = (project: string) => join(root, 'Proton.SDK', 'src', project, 'bin', 'Release');

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'libforge-collect-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('copies matching libraries from nested output directories into one flat directory', async () => {
    await touch(join(release('Proton.Sdk.CExports'), 'net9.0', 'win-x64', 'proton_sdk.dll'));
    await touch(join(release('Proton.Sdk.CExports'), 'net9.0', 'helper.dll'));
    await touch(join(release('Proton.Sdk.CExports'), 'net9.0', 'proton_sdk.pdb'));
    await touch(join(release('Proton.Sdk.Drive.CExports'), 'libproton_drive.so'));
    const ctx = testContext(root);

    const collected = await new ArtifactCollector(ctx).collect();

    expect(collected.ok).toBe(true);
    if (collected.ok) {
      expect(collected.value.count).toBe(2);
      expect(collected.value.projects.map((p) => [p.project.name, p.present, p.copied])).toEqual([
        ['Proton.Sdk.CExports', true, 1],
        ['Proton.Sdk.Drive.CExports', true, 1],
        ['Proton.Sdk.Instrumentation.CExport', false, 0],
      ]);
    }
    expect((await readdir(join(root, 'native-libs'))).sort()).toEqual(['libproton_drive.so', 'proton_sdk.dll']);
    expect(ctx.entries.some((e) => e.message === 'Proton.Sdk.Instrumentation.CExport output directory not found, skipping')).toBe(true);
  });

  it('fails when no export project produced a library', async () => {
    await touch(join(release('Proton.Sdk.CExports'), 'helper.dll'));
    const ctx = testContext(root);

    const collected = await new ArtifactCollector(ctx).collect();

    expect(collected.ok).toBe(false);
    if (!collected.ok) {
      expect(collected.error.code).toBe('NO_ARTIFACTS_FOUND');
      expect(collected.error.message).toBe('No native libraries found in any export project');
    }
    expect(ctx.entries.find((e) => e.message === '1 file(s) under Proton.Sdk.CExports')).toMatchObject({
      files: ['helper.dll'],
    });
  });

  it('fails when every export project is missing', async () => {
    const collected = await new ArtifactCollector(testContext(root)).collect();
    expect(!collected.ok && collected.error.code).toBe('NO_ARTIFACTS_FOUND');
  });

  it('reports the copy count to the pipeline', async () => {
    await touch(join(release('Proton.Sdk.CExports'), 'proton_sdk.dylib'));

    const report = await new ArtifactCollector(testContext(root)).execute();

    expect(report.artifactsCopied).toBe(1);
    expect(report.results[0]).toMatchObject({ stepName: 'Collecting native libraries', succeeded: true });
  });
});
