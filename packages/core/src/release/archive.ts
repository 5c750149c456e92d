/**
 * Release Archives
 *
 * Deterministic tar.gz and zip creation and reading.
 *
 * Determinism rules:
 * - Entries sorted by path
 * - Timestamps normalized (tar: Unix epoch, zip: 1980-01-01 DOS time)
 * - Permissions normalized (0644 files, 0755 dirs)
 * - Compression level 9
 *
 * @module @libforge/core/release/archive
 */

import { createHash } from 'node:crypto';
import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { deflateRawSync, gunzipSync, gzipSync, inflateRawSync } from 'node:zlib';

// =============================================================================
// Types
// =============================================================================

export interface ArchiveEntry {
  /** Path inside the archive, `/`-separated; directories end with `/` */
  name: string;
  content: Buffer;
  isDirectory: boolean;
}

// =============================================================================
// Collecting entries
// =============================================================================

/**
 * Collect every file and directory under `dir`, prefixing names with `prefix`
 *
 * With a prefix such as `native-libs-linux-x64/`, the prefix itself is
 * emitted as a directory entry.
 */
export async function collectArchiveEntries(dir: string, prefix = ''): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];
  if (prefix !== '') {
    entries.push({ name: prefix, content: Buffer.alloc(0), isDirectory: true });
  }

  async function visit(current: string, base: string): Promise<void> {
    const items = await readdir(current, { withFileTypes: true });
    for (const item of items) {
      const fullPath = join(current, item.name);
      const name = `${base}${item.name}`;
      if (item.isDirectory()) {
        entries.push({ name: `${name}/`, content: Buffer.alloc(0), isDirectory: true });
        await visit(fullPath, `${name}/`);
      } else if (item.isFile()) {
        entries.push({ name, content: await readFile(fullPath), isDirectory: false });
      }
    }
  }

  await visit(dir, prefix);
  return sortEntries(entries);
}

export function sortEntries(entries: ArchiveEntry[]): ArchiveEntry[] {
  return [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

// =============================================================================
// tar.gz
// =============================================================================

const TAR_BLOCK_SIZE = 512;
const TAR_NAME_SIZE = 100;
const TAR_MODE_OFFSET = 100;
const TAR_UID_OFFSET = 108;
const TAR_GID_OFFSET = 116;
const TAR_SIZE_OFFSET = 124;
const TAR_MTIME_OFFSET = 136;
const TAR_CHECKSUM_OFFSET = 148;
const TAR_TYPEFLAG_OFFSET = 156;
const TAR_MAGIC_OFFSET = 257;
const TAR_VERSION_OFFSET = 263;
const TAR_PREFIX_OFFSET = 345;
const TAR_PREFIX_SIZE = 155;

/**
 * Create a gzipped ustar archive
 */
export function createTarGz(entries: ArchiveEntry[]): Buffer {
  const blocks: Buffer[] = [];

  for (const entry of sortEntries(entries)) {
    blocks.push(createTarHeader(entry));

    if (!entry.isDirectory && entry.content.length > 0) {
      blocks.push(entry.content);

      // Pad to block boundary
      const padding = TAR_BLOCK_SIZE - (entry.content.length % TAR_BLOCK_SIZE);
      if (padding < TAR_BLOCK_SIZE) {
        blocks.push(Buffer.alloc(padding));
      }
    }
  }

  // Two empty blocks mark the end of the archive
  blocks.push(Buffer.alloc(TAR_BLOCK_SIZE));
  blocks.push(Buffer.alloc(TAR_BLOCK_SIZE));

  return gzipSync(Buffer.concat(blocks), { level: 9 });
}

/**
 * Split a long path into ustar prefix and name fields
 */
function splitTarName(name: string): { prefix: string; name: string } {
  if (Buffer.byteLength(name) <= TAR_NAME_SIZE) {
    return { prefix: '', name };
  }

  // Directories keep their trailing slash in the name part
  const body = name.endsWith('/') ? name.slice(0, -1) : name;
  const trailing = name.endsWith('/') ? '/' : '';
  for (let i = body.lastIndexOf('/'); i > 0; i = body.lastIndexOf('/', i - 1)) {
    const prefix = body.slice(0, i);
    const rest = body.slice(i + 1) + trailing;
    if (Buffer.byteLength(prefix) <= TAR_PREFIX_SIZE && Buffer.byteLength(rest) <= TAR_NAME_SIZE) {
      return { prefix, name: rest };
    }
  }

  throw new Error(`Path too long for a tar archive: ${name}`);
}

function createTarHeader(entry: ArchiveEntry): Buffer {
  const header = Buffer.alloc(TAR_BLOCK_SIZE);
  const { prefix, name } = splitTarName(entry.name);

  header.write(name, 0, TAR_NAME_SIZE, 'utf-8');

  const mode = entry.isDirectory ? '0000755' : '0000644';
  header.write(mode + ' ', TAR_MODE_OFFSET, 8, 'utf-8');

  // UID/GID normalized to 0
  header.write('0000000 ', TAR_UID_OFFSET, 8, 'utf-8');
  header.write('0000000 ', TAR_GID_OFFSET, 8, 'utf-8');

  const size = (entry.isDirectory ? 0 : entry.content.length).toString(8).padStart(11, '0');
  header.write(size + ' ', TAR_SIZE_OFFSET, 12, 'utf-8');

  // Mtime normalized to the Unix epoch
  header.write('00000000000 ', TAR_MTIME_OFFSET, 12, 'utf-8');

  // Checksum is computed with this field as spaces
  header.write('        ', TAR_CHECKSUM_OFFSET, 8, 'utf-8');

  header[TAR_TYPEFLAG_OFFSET] = entry.isDirectory ? 53 : 48; // '5' or '0'

  header.write('ustar\0', TAR_MAGIC_OFFSET, 6, 'utf-8');
  header.write('00', TAR_VERSION_OFFSET, 2, 'utf-8');

  if (prefix !== '') {
    header.write(prefix, TAR_PREFIX_OFFSET, TAR_PREFIX_SIZE, 'utf-8');
  }

  let checksum = 0;
  for (let i = 0; i < TAR_BLOCK_SIZE; i++) {
    checksum += header[i];
  }
  header.write(checksum.toString(8).padStart(6, '0') + '\0 ', TAR_CHECKSUM_OFFSET, 8, 'utf-8');

  return header;
}

function readField(header: Buffer, offset: number, size: number): string {
  return header.subarray(offset, offset + size).toString('utf-8').replace(/\0.*$/s, '');
}

/**
 * Read every entry of a gzipped tar archive
 */
export function readTarGzEntries(archive: Buffer): ArchiveEntry[] {
  const tar = gunzipSync(archive);
  const entries: ArchiveEntry[] = [];
  let offset = 0;

  while (offset + TAR_BLOCK_SIZE <= tar.length) {
    const header = tar.subarray(offset, offset + TAR_BLOCK_SIZE);
    offset += TAR_BLOCK_SIZE;

    if (header.every((b) => b === 0)) {
      break;
    }

    const baseName = readField(header, 0, TAR_NAME_SIZE);
    const magic = readField(header, TAR_MAGIC_OFFSET, 6);
    const prefix = magic.startsWith('ustar') ? readField(header, TAR_PREFIX_OFFSET, TAR_PREFIX_SIZE) : '';
    const name = prefix === '' ? baseName : `${prefix}/${baseName}`;
    const size = parseInt(readField(header, TAR_SIZE_OFFSET, 12).trim(), 8) || 0;
    const isDirectory = header[TAR_TYPEFLAG_OFFSET] === 53 || name.endsWith('/');

    if (isDirectory) {
      entries.push({ name, content: Buffer.alloc(0), isDirectory: true });
    } else {
      entries.push({ name, content: Buffer.from(tar.subarray(offset, offset + size)), isDirectory: false });
      offset += Math.ceil(size / TAR_BLOCK_SIZE) * TAR_BLOCK_SIZE;
    }
  }

  return entries;
}

// =============================================================================
// zip
// =============================================================================

const ZIP_LOCAL_HEADER = 0x04034b50;
const ZIP_CENTRAL_HEADER = 0x02014b50;
const ZIP_END_OF_CENTRAL_DIR = 0x06054b50;
const ZIP_VERSION = 20;
const ZIP_UTF8_FLAG = 0x0800;
const ZIP_STORED = 0;
const ZIP_DEFLATED = 8;
// 1980-01-01 00:00:00 in DOS format
const ZIP_DOS_DATE = (1 << 5) | 1;
const ZIP_DOS_TIME = 0;
const ZIP_DIRECTORY_ATTR = 0x10;

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

export function crc32(data: Buffer): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    crc = CRC_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Create a zip archive (deflate, or stored when deflate does not shrink the entry)
 */
export function createZip(entries: ArchiveEntry[]): Buffer {
  const localParts: Buffer[] = [];
  const centralParts: Buffer[] = [];
  let offset = 0;
  const sorted = sortEntries(entries);

  for (const entry of sorted) {
    const name = Buffer.from(entry.name, 'utf-8');
    const content = entry.isDirectory ? Buffer.alloc(0) : entry.content;
    const deflated = content.length > 0 ? deflateRawSync(content, { level: 9 }) : content;
    const useDeflate = deflated.length < content.length;
    const data = useDeflate ? deflated : content;
    const method = useDeflate ? ZIP_DEFLATED : ZIP_STORED;
    const crc = crc32(content);

    const local = Buffer.alloc(30);
    local.writeUInt32LE(ZIP_LOCAL_HEADER, 0);
    local.writeUInt16LE(ZIP_VERSION, 4);
    local.writeUInt16LE(ZIP_UTF8_FLAG, 6);
    local.writeUInt16LE(method, 8);
    local.writeUInt16LE(ZIP_DOS_TIME, 10);
    local.writeUInt16LE(ZIP_DOS_DATE, 12);
    local.writeUInt32LE(crc, 14);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(content.length, 22);
    local.writeUInt16LE(name.length, 26);
    local.writeUInt16LE(0, 28);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(ZIP_CENTRAL_HEADER, 0);
    central.writeUInt16LE(ZIP_VERSION, 4);
    central.writeUInt16LE(ZIP_VERSION, 6);
    central.writeUInt16LE(ZIP_UTF8_FLAG, 8);
    central.writeUInt16LE(method, 10);
    central.writeUInt16LE(ZIP_DOS_TIME, 12);
    central.writeUInt16LE(ZIP_DOS_DATE, 14);
    central.writeUInt32LE(crc, 16);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(content.length, 24);
    central.writeUInt16LE(name.length, 28);
    central.writeUInt16LE(0, 30); // extra
    central.writeUInt16LE(0, 32); // comment
    central.writeUInt16LE(0, 34); // disk
    central.writeUInt16LE(0, 36); // internal attributes
    central.writeUInt32LE(entry.isDirectory ? ZIP_DIRECTORY_ATTR : 0, 38);
    central.writeUInt32LE(offset, 42);

    localParts.push(local, name, data);
    centralParts.push(central, name);
    offset += local.length + name.length + data.length;
  }

  const centralDir = Buffer.concat(centralParts);
  const end = Buffer.alloc(22);
  end.writeUInt32LE(ZIP_END_OF_CENTRAL_DIR, 0);
  end.writeUInt16LE(0, 4);
  end.writeUInt16LE(0, 6);
  end.writeUInt16LE(sorted.length, 8);
  end.writeUInt16LE(sorted.length, 10);
  end.writeUInt32LE(centralDir.length, 12);
  end.writeUInt32LE(offset, 16);
  end.writeUInt16LE(0, 20);

  return Buffer.concat([...localParts, centralDir, end]);
}

/**
 * Read every entry of a zip archive through its central directory
 */
export function readZipEntries(archive: Buffer): ArchiveEntry[] {
  let endOffset = -1;
  for (let i = archive.length - 22; i >= 0; i--) {
    if (archive.readUInt32LE(i) === ZIP_END_OF_CENTRAL_DIR) {
      endOffset = i;
      break;
    }
  }
  if (endOffset < 0) {
    throw new Error('Not a zip archive: end of central directory not found');
  }

  const count = archive.readUInt16LE(endOffset + 10);
  let cursor = archive.readUInt32LE(endOffset + 16);
  const entries: ArchiveEntry[] = [];

  for (let i = 0; i < count; i++) {
    if (archive.readUInt32LE(cursor) !== ZIP_CENTRAL_HEADER) {
      throw new Error(`Corrupt zip archive: bad central directory entry ${i}`);
    }
    const method = archive.readUInt16LE(cursor + 10);
    const crc = archive.readUInt32LE(cursor + 16);
    const compressedSize = archive.readUInt32LE(cursor + 20);
    const nameLength = archive.readUInt16LE(cursor + 28);
    const extraLength = archive.readUInt16LE(cursor + 30);
    const commentLength = archive.readUInt16LE(cursor + 32);
    const localOffset = archive.readUInt32LE(cursor + 42);
    const name = archive.subarray(cursor + 46, cursor + 46 + nameLength).toString('utf-8');
    cursor += 46 + nameLength + extraLength + commentLength;

    const localNameLength = archive.readUInt16LE(localOffset + 26);
    const localExtraLength = archive.readUInt16LE(localOffset + 28);
    const dataStart = localOffset + 30 + localNameLength + localExtraLength;
    const data = archive.subarray(dataStart, dataStart + compressedSize);
    const content = method === ZIP_DEFLATED ? inflateRawSync(data) : Buffer.from(data);

    if (crc32(content) !== crc) {
      throw new Error(`Corrupt zip archive: CRC mismatch for ${name}`);
    }

    entries.push({ name, content, isDirectory: name.endsWith('/') });
  }

  return entries;
}

// =============================================================================
// Checksums
// =============================================================================

export function computeChecksum(archive: Buffer): string {
  return `sha256:${createHash('sha256').update(archive).digest('hex')}`;
}
