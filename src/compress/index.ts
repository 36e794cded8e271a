import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip, createGzip, type Gunzip, type Gzip } from 'node:zlib';
import { isAbortError, throwIfAborted } from '../abort.js';
import { concatBytes } from '../binary.js';
import { chunkBytes, readAllBytes, type ByteSource } from '../io/buffer.js';
import { CompressionError } from './errors.js';
import type { CompressOptions, DecompressOptions } from './types.js';

export type { CompressOptions, DecompressOptions } from './types.js';
export { CompressionError } from './errors.js';
export type { CompressionErrorCode } from './errors.js';

const DEFAULT_CHUNK_SIZE = 64 * 1024;

/** Gzip `source` into a single buffer. */
export async function compress(source: ByteSource, options?: CompressOptions): Promise<Uint8Array> {
  const input = await readAllBytes(source, { signal: options?.signal });
  const stream = createGzip(options?.level !== undefined ? { level: options.level } : undefined);
  return run('compress', input, stream, options?.chunkSize, options?.signal);
}

/** Gunzip `source` into a single buffer. */
export async function decompress(source: ByteSource, options?: DecompressOptions): Promise<Uint8Array> {
  const input = await readAllBytes(source, { signal: options?.signal });
  const max = options?.maxOutputBytes;
  return run(
    'decompress',
    input,
    createGunzip(),
    options?.chunkSize,
    options?.signal,
    max === undefined ? undefined : typeof max === 'bigint' ? max : BigInt(max)
  );
}

async function run(
  mode: 'compress' | 'decompress',
  input: Uint8Array,
  stream: Gzip | Gunzip,
  chunkSize = DEFAULT_CHUNK_SIZE,
  signal?: AbortSignal,
  maxOutputBytes?: bigint
): Promise<Uint8Array> {
  throwIfAborted(signal);
  const chunks: Uint8Array[] = [];
  let total = 0n;

  async function* feed(): AsyncGenerator<Uint8Array> {
    for (const chunk of chunkBytes(input, chunkSize)) {
      throwIfAborted(signal);
      yield chunk;
    }
  }

  try {
    await pipeline(
      Readable.from(feed()),
      stream,
      async (output: AsyncIterable<Uint8Array>) => {
        for await (const chunk of output) {
          total += BigInt(chunk.length);
          if (maxOutputBytes !== undefined && total > maxOutputBytes) {
            throw new CompressionError('COMPRESSION_RESOURCE_LIMIT', 'Decompressed data exceeds the output limit', {
              algorithm: 'gzip',
              context: { maxOutputBytes: maxOutputBytes.toString() }
            });
          }
          chunks.push(chunk);
        }
      },
      signal ? { signal } : {}
    );
  } catch (err) {
    throwIfAborted(signal);
    if (err instanceof CompressionError || isAbortError(err)) throw err;
    throw new CompressionError(
      'COMPRESSION_BAD_DATA',
      mode === 'decompress' ? 'Input is not valid gzip data' : 'Gzip compression failed',
      { algorithm: 'gzip', cause: err }
    );
  }
  return concatBytes(chunks);
}
