/**
 * Platform target tests
 */

import { describe, it, expect } from 'vitest';
import {
  archiveFormatFor,
  detectHost,
  goOs,
  libraryExtension,
  PLATFORM_TARGETS,
  runtimeIdentifier,
  selectTargets,
} from '../targets.js';

describe('PLATFORM_TARGETS', () => {
  it('declares the release matrix', () => {
    expect(PLATFORM_TARGETS.map((t) => t.runtimeIdentifier)).toEqual(['win-x64', 'linux-x64', 'osx-x64', 'osx-arm64']);
  });
});

describe('naming', () => {
  it('builds runtime identifiers', () => {
    expect(runtimeIdentifier('windows', 'amd64')).toBe('win-x64');
    expect(runtimeIdentifier('macos', 'arm64')).toBe('osx-arm64');
    expect(runtimeIdentifier('linux', '386')).toBe('linux-x86');
  });

  it('uses zip only for windows', () => {
    expect(archiveFormatFor('windows')).toBe('zip');
    expect(archiveFormatFor('linux')).toBe('tar.gz');
    expect(archiveFormatFor('macos')).toBe('tar.gz');
  });

  it('maps library extensions and Go OS names', () => {
    expect(libraryExtension('windows')).toBe('.dll');
    expect(libraryExtension('linux')).toBe('.so');
    expect(libraryExtension('macos')).toBe('.dylib');
    expect(goOs('macos')).toBe('darwin');
    expect(goOs('linux')).toBe('linux');
  });
});

describe('selectTargets', () => {
  it('selects every target when none is named', () => {
    expect(selectTargets([])).toHaveLength(4);
  });

  it('selects named targets in the given order', () => {
    expect(selectTargets(['osx-arm64', 'win-x64']).map((t) => t.osFamily)).toEqual(['macos', 'windows']);
  });

  it('rejects unknown runtime identifiers', () => {
    expect(() => selectTargets(['win-arm64'])).toThrow(
      'Unknown target "win-arm64" (expected one of: win-x64, linux-x64, osx-x64, osx-arm64)'
    );
  });
});

describe('detectHost', () => {
  it('maps Node platform and arch names', () => {
    expect(detectHost('darwin', 'arm64')).toEqual({ osFamily: 'macos', architecture: 'arm64', runtimeIdentifier: 'osx-arm64' });
    expect(detectHost('win32', 'ia32').runtimeIdentifier).toBe('win-x86');
    expect(detectHost('linux', 'x64').runtimeIdentifier).toBe('linux-x64');
  });

  it('rejects unsupported hosts', () => {
    expect(() => detectHost('freebsd', 'x64')).toThrow('Unsupported host platform: freebsd');
    expect(() => detectHost('linux', 'riscv64')).toThrow('Unsupported host architecture: riscv64');
  });
});
