/**
 * Artifact classification
 *
 * @module @libforge/core/artifacts/classify
 */

import { extname } from 'node:path';

export type Classification = 'match' | 'skip';

/**
 * Case-sensitive substring every packaged library name carries
 */
export const ARTIFACT_MARKER = 'proton';

/**
 * `match` iff the file name contains "proton" (case-sensitive)
 *
 * @example
 * ```typescript
 * classify('libproton_sdk.dll') // => 'match'
 * classify('Proton.dll')        // => 'skip'
 * ```
 */
export function classify(name: string): Classification {
  return name.includes(ARTIFACT_MARKER) ? 'match' : 'skip';
}

/**
 * True when the file has one of the dynamic-library extensions (case-insensitive)
 */
export function isLibraryFile(name: string, extensions: readonly string[]): boolean {
  const ext = extname(name).toLowerCase();
  return ext !== '' && extensions.some((candidate) => candidate.toLowerCase() === ext);
}
