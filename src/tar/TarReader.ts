import { ArchiveError } from '../archive/errors.js';
import { readAllBytes, type ByteSource } from '../io/buffer.js';
import { resolveLimits, type ResolvedResourceLimits } from '../limits.js';
import { throwIfAborted } from '../abort.js';
import { decodeNullTerminatedUtf8, decodeUtf8 } from '../binary.js';
import type { TarEntry, TarReaderOptions } from './types.js';

const BLOCK_SIZE = 512;

type TarEntryRecord = TarEntry & {
  dataOffset: number;
  dataSize: number;
};

/** Read TAR archives held in memory. */
export class TarReader {
  private readonly limits: ResolvedResourceLimits;
  private readonly signal: AbortSignal | undefined;
  private readonly records: TarEntryRecord[] = [];
  private readonly handles = new WeakMap<TarEntry, TarEntryRecord>();

  private constructor(
    private readonly data: Uint8Array,
    options?: TarReaderOptions
  ) {
    this.limits = resolveLimits(options?.limits);
    this.signal = options?.signal;
  }

  /** Create a reader from in-memory bytes. */
  static async fromUint8Array(data: Uint8Array, options?: TarReaderOptions): Promise<TarReader> {
    const reader = new TarReader(data, options);
    reader.init();
    return reader;
  }

  /** Buffer `source` (bounded by `limits.maxInputBytes`) and read it. */
  static async fromSource(source: ByteSource, options?: TarReaderOptions): Promise<TarReader> {
    const limits = resolveLimits(options?.limits);
    let data: Uint8Array;
    try {
      data = await readAllBytes(source, { signal: options?.signal, maxBytes: limits.maxInputBytes });
    } catch (err) {
      if (err instanceof RangeError) {
        throw new ArchiveError('ARCHIVE_LIMIT_EXCEEDED', 'TAR input exceeds size limit', {
          context: { maxInputBytes: limits.maxInputBytes.toString() },
          cause: err
        });
      }
      throw err;
    }
    return TarReader.fromUint8Array(data, options);
  }

  /** Entries in archive order. */
  entries(): TarEntry[] {
    return this.records.map((record) => this.expose(record));
  }

  async *iterEntries(): AsyncGenerator<TarEntry> {
    for (const record of this.records) {
      throwIfAborted(this.signal);
      yield this.expose(record);
    }
  }

  /** Contents of an entry previously returned by this reader. */
  read(entry: TarEntry): Uint8Array {
    const record = this.handles.get(entry);
    if (!record) {
      throw new ArchiveError('ARCHIVE_BAD_HEADER', 'Entry does not belong to this archive', {
        entryName: entry.name
      });
    }
    return this.data.subarray(record.dataOffset, record.dataOffset + record.dataSize);
  }

  private expose(record: TarEntryRecord): TarEntry {
    const entry: TarEntry = {
      name: record.name,
      size: record.size,
      type: record.type,
      isDirectory: record.isDirectory,
      isSymlink: record.isSymlink
    };
    if (record.mtime) entry.mtime = record.mtime;
    this.handles.set(entry, record);
    return entry;
  }

  private init(): void {
    this.records.push(...parseTarEntries(this.data, { limits: this.limits, signal: this.signal }));
  }
}

function parseTarEntries(
  data: Uint8Array,
  options: { limits: ResolvedResourceLimits; signal: AbortSignal | undefined }
): TarEntryRecord[] {
  const entries: TarEntryRecord[] = [];

  let offset = 0;
  let globalPax: Record<string, string> | null = null;
  let pendingPax: Record<string, string> | null = null;
  let totalBytes = 0n;

  while (offset + BLOCK_SIZE <= data.length) {
    throwIfAborted(options.signal);
    const header = data.subarray(offset, offset + BLOCK_SIZE);
    if (isZeroBlock(header)) {
      const next = data.subarray(offset + BLOCK_SIZE, offset + BLOCK_SIZE * 2);
      if (next.length < BLOCK_SIZE || isZeroBlock(next)) break;
      offset += BLOCK_SIZE;
      continue;
    }

    const checksumStored = parseOctal(header.subarray(148, 156));
    if (checksumStored === undefined || Number(checksumStored) !== computeChecksum(header)) {
      throw new ArchiveError('ARCHIVE_BAD_HEADER', 'Header checksum mismatch', { offset: BigInt(offset) });
    }

    const name = readString(header, 0, 100);
    const headerSize = parseNumeric(header.subarray(124, 136));
    const mtime = parseNumeric(header.subarray(136, 148));
    const typeflag = readString(header, 156, 1) || '0';
    const isUstar = readString(header, 257, 6) === 'ustar';
    const prefix = isUstar ? readString(header, 345, 155) : '';

    const dataOffset = offset + BLOCK_SIZE;

    if (typeflag === 'x' || typeflag === 'g') {
      const paxSize = checkedSize(headerSize ?? 0n, dataOffset, data.length, offset);
      const records = parsePaxRecords(data.subarray(dataOffset, dataOffset + paxSize));
      if (typeflag === 'g') {
        globalPax = { ...(globalPax ?? {}), ...records };
        pendingPax = null;
      } else {
        pendingPax = { ...(globalPax ?? {}), ...records };
      }
      offset = dataOffset + paddedSize(paxSize);
      continue;
    }

    const pax = pendingPax ? { ...pendingPax } : globalPax ? { ...globalPax } : undefined;
    pendingPax = null;

    const fullName = pax?.path ?? (prefix ? `${prefix}/${name}` : name);
    const size = (pax?.size !== undefined ? parsePaxSize(pax.size) : undefined) ?? headerSize ?? 0n;
    const entryType = typeFromFlag(typeflag);
    const isDirectory = entryType === 'directory' || fullName.endsWith('/');
    const hasData = entryType === 'file' || entryType === 'unknown';
    const dataSize = hasData ? checkedSize(size, dataOffset, data.length, offset) : 0;

    const entry: TarEntryRecord = {
      name: fullName,
      size: hasData ? size : 0n,
      type: entryType,
      isDirectory,
      isSymlink: entryType === 'symlink',
      dataOffset,
      dataSize
    };
    const entryMtime = pax?.mtime !== undefined ? parseMtime(pax.mtime) : mtime !== undefined ? new Date(Number(mtime) * 1000) : undefined;
    if (entryMtime) entry.mtime = entryMtime;

    entries.push(entry);
    totalBytes += entry.size;

    if (entries.length > options.limits.maxEntries) {
      throw new ArchiveError('ARCHIVE_LIMIT_EXCEEDED', 'Too many TAR entries', {
        context: { maxEntries: String(options.limits.maxEntries) }
      });
    }
    if (entry.size > options.limits.maxUncompressedEntryBytes) {
      throw new ArchiveError('ARCHIVE_LIMIT_EXCEEDED', 'TAR entry exceeds size limit', { entryName: entry.name });
    }
    if (totalBytes > options.limits.maxTotalUncompressedBytes) {
      throw new ArchiveError('ARCHIVE_LIMIT_EXCEEDED', 'TAR total size exceeds limit');
    }

    offset = dataOffset + paddedSize(dataSize);
  }

  return entries;
}

function checkedSize(size: bigint, dataOffset: number, length: number, headerOffset: number): number {
  if (BigInt(dataOffset) + size > BigInt(length)) {
    throw new ArchiveError('ARCHIVE_TRUNCATED', 'TAR entry truncated', { offset: BigInt(headerOffset) });
  }
  return Number(size);
}

function paddedSize(size: number): number {
  return Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;
}

// Text fields end at the first NUL; spaces are part of the value.
function readString(buffer: Uint8Array, start: number, length: number): string {
  return decodeNullTerminatedUtf8(buffer.subarray(start, start + length));
}

function parseNumeric(buffer: Uint8Array): bigint | undefined {
  if (buffer.length === 0) return undefined;
  const first = buffer[0] ?? 0;
  if ((first & 0x80) !== 0) {
    return parseBase256(buffer);
  }
  return parseOctal(buffer);
}

function parseOctal(buffer: Uint8Array): bigint | undefined {
  const text = decodeNullTerminatedUtf8(buffer).trim();
  if (!/^[0-7]+$/.test(text)) return undefined;
  return BigInt(`0o${text}`);
}

function parseBase256(buffer: Uint8Array): bigint {
  let result = 0n;
  for (const byte of buffer) {
    result = (result << 8n) | BigInt(byte & 0xff);
  }
  // Clear the sign bit.
  const bits = BigInt(buffer.length * 8 - 1);
  const mask = (1n << bits) - 1n;
  return result & mask;
}

function parseMtime(value: string): Date | undefined {
  const num = Number(value);
  if (!Number.isFinite(num)) return undefined;
  return new Date(num * 1000);
}

function parsePaxSize(value: string): bigint | undefined {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return BigInt(trimmed);
}

function computeChecksum(header: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < header.length; i += 1) {
    if (i >= 148 && i < 156) {
      sum += 0x20;
    } else {
      sum += header[i]!;
    }
  }
  return sum;
}

function isZeroBlock(block: Uint8Array): boolean {
  for (let i = 0; i < block.length; i += 1) {
    if (block[i] !== 0) return false;
  }
  return true;
}

function typeFromFlag(flag: string): TarEntry['type'] {
  switch (flag) {
    case '0':
    case '7':
      return 'file';
    case '1':
      return 'link';
    case '2':
      return 'symlink';
    case '3':
      return 'character';
    case '4':
      return 'block';
    case '5':
      return 'directory';
    case '6':
      return 'fifo';
    default:
      return 'unknown';
  }
}

function parsePaxRecords(buffer: Uint8Array): Record<string, string> {
  const out: Record<string, string> = {};
  let offset = 0;
  while (offset < buffer.length) {
    const spaceIndex = buffer.indexOf(0x20, offset);
    if (spaceIndex === -1) break;
    const length = parseInt(decodeUtf8(buffer.subarray(offset, spaceIndex)), 10);
    if (!Number.isFinite(length) || length <= 0) break;
    const record = decodeUtf8(buffer.subarray(spaceIndex + 1, offset + length));
    const eqIndex = record.indexOf('=');
    if (eqIndex > 0) {
      out[record.slice(0, eqIndex)] = record.slice(eqIndex + 1).replace(/\n$/, '');
    }
    offset += length;
  }
  return out;
}
