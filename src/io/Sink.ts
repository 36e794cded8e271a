import { open, type FileHandle } from 'node:fs/promises';
import { concatBytes } from '../binary.js';

export interface Sink {
  position: bigint;
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/** Sink that keeps every chunk in memory. */
export class BufferSink implements Sink {
  position: bigint = 0n;
  private readonly chunks: Uint8Array[] = [];

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    this.chunks.push(chunk.slice());
    this.position += BigInt(chunk.length);
  }

  async close(): Promise<void> {
    return;
  }

  /** Everything written so far, as one contiguous buffer. */
  toUint8Array(): Uint8Array {
    return concatBytes(this.chunks);
  }
}

export class FileSink implements Sink {
  position: bigint = 0n;
  private closed = false;

  private constructor(private readonly handle: FileHandle) {}

  /** Create (or truncate) `path` for writing. `exclusive` fails if it already exists. */
  static async open(path: string, options?: { exclusive?: boolean }): Promise<FileSink> {
    return new FileSink(await open(path, options?.exclusive ? 'wx' : 'w'));
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    let written = 0;
    while (written < chunk.length) {
      const { bytesWritten } = await this.handle.write(
        chunk,
        written,
        chunk.length - written,
        Number(this.position)
      );
      written += bytesWritten;
      this.position += BigInt(bytesWritten);
    }
  }

  /** Flush file data to disk before the handle is closed. */
  async sync(): Promise<void> {
    await this.handle.sync();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
