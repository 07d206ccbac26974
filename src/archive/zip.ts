import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { inflateRawSync } from 'node:zlib';

import {
  CorruptArchiveError,
  EntryNotFoundError,
  UnsupportedCompressionError,
  UnsupportedFormatError
} from '../core/errors.js';
import { crc32 } from './crc32.js';

/** ZIP local-file header signature. */
const ZIP_LOCAL_HEADER_SIGNATURE = 0x04034b50;
/** ZIP central-directory file-header signature. */
const ZIP_CENTRAL_DIRECTORY_SIGNATURE = 0x02014b50;
/** ZIP end-of-central-directory signature. */
const ZIP_END_OF_CENTRAL_DIRECTORY_SIGNATURE = 0x06054b50;
/** Fixed EOCD record length, excluding the trailing comment. */
const ZIP_EOCD_LENGTH = 22;
/** Maximum ZIP comment size used by EOCD backwards scan. */
const ZIP_MAX_COMMENT_LENGTH = 0xffff;
/** Fixed central-directory header length, excluding variable fields. */
const ZIP_CENTRAL_HEADER_LENGTH = 46;
/** Fixed local-file header length, excluding variable fields. */
const ZIP_LOCAL_HEADER_LENGTH = 30;

/** General-purpose flag: entry is encrypted. */
const FLAG_ENCRYPTED = 0x0001;
/** General-purpose flag: CRC and sizes live in a trailing data descriptor. */
const FLAG_DATA_DESCRIPTOR = 0x0008;

/** Supported compression methods. */
export const COMPRESSION_STORED = 0;
export const COMPRESSION_DEFLATE = 8;

/** Central-directory metadata for one archive entry. */
export interface ArchiveEntry {
  name: string;
  compressionMethod: number;
  compressedSize: number;
  uncompressedSize: number;
  /** Offset of the entry's local file header. */
  offset: number;
  crc32: number;
  flags: number;
}

/** Read the entry index from the archive's central directory. */
export function listEntries(data: Uint8Array): ArchiveEntry[] {
  const eocdOffset = findEndOfCentralDirectoryOffset(data);
  const totalEntries = readUInt16LE(data, eocdOffset + 10);
  const centralDirectorySize = readUInt32LE(data, eocdOffset + 12);
  const centralDirectoryOffset = readUInt32LE(data, eocdOffset + 16);

  if (totalEntries === 0xffff || centralDirectoryOffset === 0xffffffff || centralDirectorySize === 0xffffffff) {
    throw new UnsupportedFormatError('ZIP64 archives are not supported.', { offset: eocdOffset });
  }

  if (centralDirectoryOffset + centralDirectorySize > eocdOffset) {
    throw new CorruptArchiveError('Central directory exceeds archive bounds.', { offset: centralDirectoryOffset });
  }

  const entries: ArchiveEntry[] = [];
  let cursor = centralDirectoryOffset;

  for (let index = 0; index < totalEntries; index += 1) {
    ensureBounds(data, cursor, ZIP_CENTRAL_HEADER_LENGTH, 'central directory header');
    if (readUInt32LE(data, cursor) !== ZIP_CENTRAL_DIRECTORY_SIGNATURE) {
      throw new CorruptArchiveError('Central directory header signature is invalid.', { offset: cursor });
    }

    const flags = readUInt16LE(data, cursor + 8);
    const compressionMethod = readUInt16LE(data, cursor + 10);
    const checksum = readUInt32LE(data, cursor + 16);
    const compressedSize = readUInt32LE(data, cursor + 20);
    const uncompressedSize = readUInt32LE(data, cursor + 24);
    const fileNameLength = readUInt16LE(data, cursor + 28);
    const extraLength = readUInt16LE(data, cursor + 30);
    const fileCommentLength = readUInt16LE(data, cursor + 32);
    const localHeaderOffset = readUInt32LE(data, cursor + 42);

    const nameOffset = cursor + ZIP_CENTRAL_HEADER_LENGTH;
    ensureBounds(data, nameOffset, fileNameLength, 'central directory file name');
    const name = decodeEntryName(data.subarray(nameOffset, nameOffset + fileNameLength));

    entries.push({
      name,
      compressionMethod,
      compressedSize,
      uncompressedSize,
      offset: localHeaderOffset,
      crc32: checksum,
      flags
    });

    cursor = nameOffset + fileNameLength + extraLength + fileCommentLength;
  }

  return entries;
}

/**
 * Extract one entry into memory.
 * The payload is inflated when deflated, copied otherwise, and always checked
 * against the declared length and CRC-32.
 */
export function extractEntry(data: Uint8Array, name: string): Uint8Array {
  const entry = findEntry(listEntries(data), name);
  if (!entry) {
    throw new EntryNotFoundError(name);
  }

  return readEntryPayload(data, entry);
}

/** Extract one entry and write it to `targetPath`, creating parent directories. */
export async function extractEntryToFile(data: Uint8Array, name: string, targetPath: string): Promise<void> {
  const payload = extractEntry(data, name);
  await mkdir(path.dirname(targetPath), { recursive: true });
  await writeFile(targetPath, payload);
}

/** Find an entry by normalized path, falling back to a case-insensitive match. */
export function findEntry(entries: readonly ArchiveEntry[], name: string): ArchiveEntry | undefined {
  const normalized = normalizeEntryPath(name);
  const exact = entries.find((entry) => entry.name === normalized);
  if (exact) {
    return exact;
  }

  const lower = normalized.toLowerCase();
  return entries.find((entry) => entry.name.toLowerCase() === lower);
}

/** Decode, inflate and verify an entry located through the central directory. */
export function readEntryPayload(data: Uint8Array, entry: ArchiveEntry): Uint8Array {
  const headerOffset = entry.offset;
  ensureBounds(data, headerOffset, ZIP_LOCAL_HEADER_LENGTH, 'local file header');

  if (readUInt32LE(data, headerOffset) !== ZIP_LOCAL_HEADER_SIGNATURE) {
    throw new CorruptArchiveError(`Local file header is invalid for entry '${entry.name}'.`, {
      offset: headerOffset,
      element: entry.name
    });
  }

  const localFlags = readUInt16LE(data, headerOffset + 6);
  if ((localFlags | entry.flags) & FLAG_ENCRYPTED) {
    throw new UnsupportedCompressionError(
      entry.compressionMethod,
      `Entry '${entry.name}' is encrypted.`,
      { offset: headerOffset, element: entry.name }
    );
  }

  // With a data descriptor the local header carries zeroes; the central directory has the real values.
  const usesDescriptor = (localFlags & FLAG_DATA_DESCRIPTOR) !== 0;
  const expectedCrc = usesDescriptor ? entry.crc32 : readUInt32LE(data, headerOffset + 14);
  const fileNameLength = readUInt16LE(data, headerOffset + 26);
  const extraLength = readUInt16LE(data, headerOffset + 28);
  const payloadOffset = headerOffset + ZIP_LOCAL_HEADER_LENGTH + fileNameLength + extraLength;
  ensureBounds(data, payloadOffset, entry.compressedSize, `entry payload '${entry.name}'`);

  const compressed = data.subarray(payloadOffset, payloadOffset + entry.compressedSize);
  const payload = decompress(compressed, entry, payloadOffset);

  if (payload.length !== entry.uncompressedSize) {
    throw new CorruptArchiveError(
      `Entry '${entry.name}' inflated to ${payload.length} bytes but declares ${entry.uncompressedSize}.`,
      { offset: payloadOffset, element: entry.name }
    );
  }

  const actualCrc = crc32(payload);
  if (actualCrc !== expectedCrc) {
    throw new CorruptArchiveError(
      `CRC-32 mismatch for entry '${entry.name}': expected ${formatHex(expectedCrc)}, got ${formatHex(actualCrc)}.`,
      { offset: payloadOffset, element: entry.name }
    );
  }

  return payload;
}

/** Normalize ZIP paths for matching and map lookups. */
export function normalizeEntryPath(value: string): string {
  return value.replace(/\\/g, '/').replace(/^\/+/, '');
}

function decompress(compressed: Uint8Array, entry: ArchiveEntry, payloadOffset: number): Uint8Array {
  if (entry.compressionMethod === COMPRESSION_STORED) {
    return compressed.slice();
  }

  if (entry.compressionMethod === COMPRESSION_DEFLATE) {
    try {
      // Output past the declared size aborts the inflate instead of allocating it.
      return new Uint8Array(inflateRawSync(compressed, { maxOutputLength: Math.max(1, entry.uncompressedSize) }));
    } catch (error) {
      throw new CorruptArchiveError(
        `Entry '${entry.name}' failed to inflate: ${error instanceof Error ? error.message : String(error)}`,
        { offset: payloadOffset, element: entry.name }
      );
    }
  }

  throw new UnsupportedCompressionError(
    entry.compressionMethod,
    `Unsupported compression method ${entry.compressionMethod} for entry '${entry.name}'.`,
    { offset: entry.offset, element: entry.name }
  );
}

/** Locate EOCD signature by scanning backwards from archive tail. */
function findEndOfCentralDirectoryOffset(data: Uint8Array): number {
  const minOffset = Math.max(0, data.length - (ZIP_EOCD_LENGTH + ZIP_MAX_COMMENT_LENGTH));
  for (let offset = data.length - ZIP_EOCD_LENGTH; offset >= minOffset; offset -= 1) {
    if (readUInt32LE(data, offset) === ZIP_END_OF_CENTRAL_DIRECTORY_SIGNATURE) {
      return offset;
    }
  }

  throw new CorruptArchiveError('End-of-central-directory signature not found.', { offset: data.length });
}

/** Decode a ZIP entry name. */
function decodeEntryName(bytes: Uint8Array): string {
  return normalizeEntryPath(new TextDecoder().decode(bytes));
}

function formatHex(value: number): string {
  return `0x${value.toString(16).padStart(8, '0')}`;
}

/** Read unsigned 16-bit little-endian value with bounds checks. */
function readUInt16LE(data: Uint8Array, offset: number): number {
  ensureBounds(data, offset, 2, 'u16');
  return data[offset]! | (data[offset + 1]! << 8);
}

/** Read unsigned 32-bit little-endian value with bounds checks. */
function readUInt32LE(data: Uint8Array, offset: number): number {
  ensureBounds(data, offset, 4, 'u32');
  return (
    data[offset]! |
    (data[offset + 1]! << 8) |
    (data[offset + 2]! << 16) |
    (data[offset + 3]! << 24)
  ) >>> 0;
}

/** Ensure read windows are within archive bounds. */
function ensureBounds(data: Uint8Array, offset: number, length: number, label: string): void {
  if (offset < 0 || length < 0 || offset + length > data.length) {
    throw new CorruptArchiveError(`ZIP ${label} exceeds archive bounds.`, { offset });
  }
}
