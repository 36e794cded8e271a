import { ArchiveError } from '../archive/errors.js';
import { readAllBytes } from '../io/buffer.js';
import type { Sink } from '../io/Sink.js';
import { encodeUtf8 } from '../binary.js';
import { throwIfAborted } from '../abort.js';
import type { TarWriterAddOptions, TarWriterOptions } from './types.js';

const BLOCK_SIZE = 512;

type HeaderType = 'file' | 'directory' | 'pax';

/** Write ustar archives, with PAX records for names and sizes that do not fit. */
export class TarWriter {
  private readonly deterministic: boolean;
  private readonly signal: AbortSignal | undefined;
  private closed = false;
  private paxCounter = 0;

  private constructor(
    private readonly sink: Sink,
    options?: TarWriterOptions
  ) {
    this.deterministic = options?.isDeterministic ?? false;
    this.signal = options?.signal;
  }

  /** Create a TAR writer that appends to `sink`. */
  static toSink(sink: Sink, options?: TarWriterOptions): TarWriter {
    return new TarWriter(sink, options);
  }

  /** Add an entry to the TAR archive. Names ending in `/` are directories. */
  async add(
    name: string,
    source?: Uint8Array | AsyncIterable<Uint8Array>,
    options?: TarWriterAddOptions
  ): Promise<void> {
    throwIfAborted(this.signal);
    if (this.closed) throw new ArchiveError('ARCHIVE_BAD_HEADER', 'Writer is closed', { entryName: name });
    if (name.includes('\u0000')) {
      throw new ArchiveError('ARCHIVE_BAD_HEADER', 'Entry name contains NUL byte', { entryName: name });
    }

    const type = options?.type ?? (name.endsWith('/') ? 'directory' : 'file');
    const normalizedName = type === 'directory' && !name.endsWith('/') ? `${name}/` : name;

    const data =
      type === 'directory' || source === undefined
        ? new Uint8Array(0)
        : source instanceof Uint8Array
          ? source
          : await readAllBytes(source, { signal: this.signal });
    const size = BigInt(data.length);
    const mtime = this.deterministic ? new Date(0) : options?.mtime ?? new Date();
    const mode = type === 'directory' ? 0o755 : 0o644;

    const paxRecords: Record<string, string> = {};
    const nameForHeader = fitName(normalizedName, paxRecords);
    if (!Number.isInteger(mtime.getTime() / 1000)) {
      paxRecords.mtime = (mtime.getTime() / 1000).toString();
    }
    if (!fitsInOctal(size, 12)) {
      paxRecords.size = size.toString();
    }
    if (Object.keys(paxRecords).length > 0) {
      await this.writePaxHeader(paxRecords, mtime);
    }

    await this.writeChunk(createTarHeader({ name: nameForHeader, mode, size, mtime, type }));
    if (data.length > 0) await this.writeChunk(data);
    await this.writePadding(size);
  }

  /** Write the end-of-archive marker. The sink stays open. */
  async close(): Promise<void> {
    if (this.closed) return;
    await this.writeChunk(new Uint8Array(BLOCK_SIZE * 2));
    this.closed = true;
  }

  private async writePaxHeader(records: Record<string, string>, mtime: Date): Promise<void> {
    const data = encodePaxRecords(records);
    const name = `PaxHeader/${++this.paxCounter}`;
    await this.writeChunk(
      createTarHeader({ name, mode: 0o644, size: BigInt(data.length), mtime, type: 'pax' })
    );
    await this.writeChunk(data);
    await this.writePadding(BigInt(data.length));
  }

  private async writePadding(size: bigint): Promise<void> {
    const padding = Number((BigInt(BLOCK_SIZE) - (size % BigInt(BLOCK_SIZE))) % BigInt(BLOCK_SIZE));
    if (padding > 0) {
      await this.writeChunk(new Uint8Array(padding));
    }
  }

  private async writeChunk(chunk: Uint8Array): Promise<void> {
    throwIfAborted(this.signal);
    await this.sink.write(chunk);
  }
}

// The ustar name field holds 100 bytes; anything longer goes to a PAX `path` record.
function fitName(value: string, pax: Record<string, string>): string {
  if (encodeUtf8(value).length <= 100) return value;
  pax.path = value;
  return value.slice(0, 100);
}

function createTarHeader(options: {
  name: string;
  mode: number;
  size: bigint;
  mtime: Date;
  type: HeaderType;
}): Uint8Array {
  const header = new Uint8Array(BLOCK_SIZE);
  writeString(header, 0, 100, options.name);
  writeOctal(header, 100, 8, BigInt(options.mode));
  writeOctal(header, 108, 8, 0n);
  writeOctal(header, 116, 8, 0n);
  writeOctal(header, 124, 12, options.size);
  writeOctal(header, 136, 12, BigInt(Math.max(0, Math.floor(options.mtime.getTime() / 1000))));
  // checksum is computed over spaces
  for (let i = 148; i < 156; i += 1) header[i] = 0x20;
  header[156] = typeFlag(options.type);
  writeString(header, 257, 6, 'ustar');
  writeString(header, 263, 2, '00');
  writeChecksum(header, computeChecksum(header));
  return header;
}

function typeFlag(type: HeaderType): number {
  switch (type) {
    case 'file':
      return 0x30;
    case 'directory':
      return 0x35;
    case 'pax':
      return 0x78;
    default: {
      const exhaustive: never = type;
      return exhaustive;
    }
  }
}

function computeChecksum(header: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < header.length; i += 1) {
    sum += header[i]!;
  }
  return sum;
}

function writeString(buffer: Uint8Array, offset: number, length: number, value: string): void {
  buffer.set(encodeUtf8(value).subarray(0, length), offset);
}

function writeOctal(buffer: Uint8Array, offset: number, length: number, value: bigint): void {
  if (!fitsInOctal(value, length)) {
    writeBase256(buffer, offset, length, value);
    return;
  }
  const encoded = encodeUtf8(value.toString(8).padStart(length - 1, '0'));
  buffer.set(encoded, offset + (length - 1 - encoded.length));
  buffer[offset + length - 1] = 0;
}

function writeChecksum(buffer: Uint8Array, value: number): void {
  buffer.set(encodeUtf8(value.toString(8).padStart(6, '0')), 148);
  buffer[154] = 0;
  buffer[155] = 0x20;
}

function fitsInOctal(value: bigint, length: number): boolean {
  const max = (1n << BigInt((length - 1) * 3)) - 1n;
  return value >= 0n && value <= max;
}

function writeBase256(buffer: Uint8Array, offset: number, length: number, value: bigint): void {
  let remaining = value;
  for (let i = offset + length - 1; i >= offset; i -= 1) {
    buffer[i] = Number(remaining & 0xffn);
    remaining >>= 8n;
  }
  buffer[offset] = (buffer[offset] ?? 0) | 0x80;
}

// Each record is "<len> key=value\n" where <len> counts the whole record in bytes, itself included.
function encodePaxRecords(records: Record<string, string>): Uint8Array {
  let out = '';
  for (const [key, value] of Object.entries(records)) {
    const record = `${key}=${value}\n`;
    const recordBytes = encodeUtf8(record).length;
    let length = recordBytes + 2;
    while (true) {
      const total = `${length} `.length + recordBytes;
      if (total === length) break;
      length = total;
    }
    out += `${length} ${record}`;
  }
  return encodeUtf8(out);
}
