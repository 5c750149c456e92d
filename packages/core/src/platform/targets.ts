/**
 * Platform Targets
 *
 * The fixed OS/architecture release matrix and host detection.
 *
 * @module @libforge/core/platform/targets
 */

import { ConfigurationError } from '../reliability/errors.js';

export type OsFamily = 'windows' | 'linux' | 'macos';

export type Architecture = 'amd64' | 'arm64' | '386';

export type ArchiveFormat = 'zip' | 'tar.gz';

export interface PlatformTarget {
  osFamily: OsFamily;
  architecture: Architecture;
  /** .NET runtime identifier, e.g. "osx-arm64" */
  runtimeIdentifier: string;
  /** CI runner image the cell runs on */
  runner: string;
}

export const PLATFORM_TARGETS: readonly PlatformTarget[] = [
  { osFamily: 'windows', architecture: 'amd64', runtimeIdentifier: 'win-x64', runner: 'windows-latest' },
  { osFamily: 'linux', architecture: 'amd64', runtimeIdentifier: 'linux-x64', runner: 'ubuntu-latest' },
  { osFamily: 'macos', architecture: 'amd64', runtimeIdentifier: 'osx-x64', runner: 'macos-latest' },
  { osFamily: 'macos', architecture: 'arm64', runtimeIdentifier: 'osx-arm64', runner: 'macos-latest' },
];

const RID_OS: Record<OsFamily, string> = { windows: 'win', linux: 'linux', macos: 'osx' };
const RID_ARCH: Record<Architecture, string> = { amd64: 'x64', arm64: 'arm64', '386': 'x86' };

export function runtimeIdentifier(osFamily: OsFamily, architecture: Architecture): string {
  return `${RID_OS[osFamily]}-${RID_ARCH[architecture]}`;
}

/**
 * zip for the windows family, tar.gz for everything else
 */
export function archiveFormatFor(osFamily: OsFamily): ArchiveFormat {
  return osFamily === 'windows' ? 'zip' : 'tar.gz';
}

export function libraryExtension(osFamily: OsFamily): '.dll' | '.so' | '.dylib' {
  switch (osFamily) {
    case 'windows':
      return '.dll';
    case 'macos':
      return '.dylib';
    case 'linux':
      return '.so';
  }
}

/**
 * Go toolchain name of the OS family
 */
export function goOs(osFamily: OsFamily): string {
  return osFamily === 'macos' ? 'darwin' : osFamily;
}

export function findTarget(rid: string): PlatformTarget | undefined {
  return PLATFORM_TARGETS.find((target) => target.runtimeIdentifier === rid);
}

/**
 * Resolve runtime identifiers to targets; unknown ids are a configuration error
 */
export function selectTargets(rids: readonly string[]): PlatformTarget[] {
  if (rids.length === 0) return [...PLATFORM_TARGETS];

  return rids.map((rid) => {
    const target = findTarget(rid);
    if (!target) {
      const known = PLATFORM_TARGETS.map((t) => t.runtimeIdentifier).join(', ');
      throw new ConfigurationError(`Unknown target "${rid}" (expected one of: ${known})`, {
        fieldErrors: { target: `unknown runtime identifier ${rid}` },
      });
    }
    return target;
  });
}

export interface HostPlatform {
  osFamily: OsFamily;
  architecture: Architecture;
  runtimeIdentifier: string;
}

/**
 * Map Node's platform/arch names onto the matrix vocabulary
 */
export function detectHost(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): HostPlatform {
  let osFamily: OsFamily;
  switch (platform) {
    case 'win32':
      osFamily = 'windows';
      break;
    case 'darwin':
      osFamily = 'macos';
      break;
    case 'linux':
      osFamily = 'linux';
      break;
    default:
      throw new ConfigurationError(`Unsupported host platform: ${platform}`);
  }

  let architecture: Architecture;
  switch (arch) {
    case 'x64':
      architecture = 'amd64';
      break;
    case 'arm64':
      architecture = 'arm64';
      break;
    case 'ia32':
      architecture = '386';
      break;
    default:
      throw new ConfigurationError(`Unsupported host architecture: ${arch}`);
  }

  return { osFamily, architecture, runtimeIdentifier: runtimeIdentifier(osFamily, architecture) };
}
