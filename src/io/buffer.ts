import { throwIfAborted } from '../abort.js';
import { concatBytes } from '../binary.js';

/** Byte source accepted by the buffering helpers. */
export type ByteSource = Uint8Array | AsyncIterable<Uint8Array>;

export async function readAllBytes(
  source: ByteSource,
  options?: { signal?: AbortSignal | undefined; maxBytes?: bigint | number | undefined }
): Promise<Uint8Array> {
  const maxBytes = options?.maxBytes !== undefined ? toBigInt(options.maxBytes) : undefined;
  if (source instanceof Uint8Array) {
    throwIfAborted(options?.signal);
    if (maxBytes !== undefined && BigInt(source.length) > maxBytes) {
      throw new RangeError('Stream exceeds maximum allowed size');
    }
    return source;
  }
  const chunks: Uint8Array[] = [];
  let total = 0n;

  for await (const value of source) {
    throwIfAborted(options?.signal);
    if (value.length === 0) continue;
    total += BigInt(value.length);
    if (maxBytes !== undefined && total > maxBytes) {
      throw new RangeError('Stream exceeds maximum allowed size');
    }
    chunks.push(value);
  }
  throwIfAborted(options?.signal);

  if (chunks.length === 0) return new Uint8Array(0);
  if (chunks.length === 1) return chunks[0]!;
  return concatBytes(chunks);
}

/** Split bytes into fixed-size views so consumers can check cancellation between chunks. */
export function* chunkBytes(data: Uint8Array, chunkSize: number): Generator<Uint8Array> {
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    yield data.subarray(offset, Math.min(data.length, offset + chunkSize));
  }
}

function toBigInt(value: bigint | number): bigint {
  return typeof value === 'bigint' ? value : BigInt(value);
}
