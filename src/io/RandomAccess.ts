import { open, type FileHandle } from 'node:fs/promises';
import { throwIfAborted } from '../abort.js';

/** Seekable byte source: the footer is located by reading backwards from `size()`. */
export interface RandomAccess {
  size(signal?: AbortSignal): Promise<bigint>;
  read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array>;
  close(): Promise<void>;
}

export class BufferRandomAccess implements RandomAccess {
  constructor(private readonly data: Uint8Array) {}

  async size(signal?: AbortSignal): Promise<bigint> {
    throwIfAborted(signal);
    return BigInt(this.data.length);
  }

  async read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfAborted(signal);
    const start = Number(offset);
    const end = Math.min(this.data.length, start + length);
    return this.data.subarray(start, end);
  }

  async close(): Promise<void> {
    return;
  }
}

export class FileRandomAccess implements RandomAccess {
  private constructor(private readonly handle: FileHandle) {}

  /** Open `path` read-only. Rejects with the underlying fs error (e.g. ENOENT). */
  static async open(path: string): Promise<FileRandomAccess> {
    return new FileRandomAccess(await open(path, 'r'));
  }

  async size(signal?: AbortSignal): Promise<bigint> {
    throwIfAborted(signal);
    const stat = await this.handle.stat();
    throwIfAborted(signal);
    return BigInt(stat.size);
  }

  async read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfAborted(signal);
    const buffer = new Uint8Array(length);
    const { bytesRead } = await this.handle.read(buffer, 0, length, Number(offset));
    throwIfAborted(signal);
    if (bytesRead === length) return buffer;
    return buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/** Open a file, run `fn` against it and always release the handle. */
export async function withFileRandomAccess<T>(path: string, fn: (access: RandomAccess) => Promise<T>): Promise<T> {
  const access = await FileRandomAccess.open(path);
  try {
    return await fn(access);
  } finally {
    await access.close();
  }
}
