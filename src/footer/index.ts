import { throwIfAborted } from '../abort.js';
import { bytesEqual, concatBytes, decodeUtf8, encodeUtf8, readUint32LE, writeUint32LE } from '../binary.js';
import { ContainerError } from '../errors.js';
import { withFileRandomAccess, type RandomAccess } from '../io/RandomAccess.js';
import type { Sink } from '../io/Sink.js';
import { parseFooterJson, serializeFooter } from './schema.js';
import {
  FOOTER_MAGIC,
  MAX_SUPPORTED_MAJOR_VERSION,
  MIN_CONTAINER_SIZE,
  TRAILER_SIZE,
  type Footer
} from './types.js';

export {
  FOOTER_MAGIC,
  FORMAT_VERSION,
  MAX_SUPPORTED_MAJOR_VERSION,
  MIN_CONTAINER_SIZE,
  TRAILER_SIZE
} from './types.js';
export type { Footer } from './types.js';
export { FooterJsonSchema, parseFooterJson, serializeFooter } from './schema.js';

/** Chunk size used when copying container content out of a file. */
export const CONTENT_CHUNK_SIZE = 81920;

const MAGIC_BYTES = encodeUtf8(FOOTER_MAGIC);

type Trailer = { size: bigint; footerLength: number };

type SignalOptions = { signal?: AbortSignal | undefined };

/** Read and validate the footer. Any structural or schema problem yields `undefined`. */
export async function readFooter(access: RandomAccess, options?: SignalOptions): Promise<Footer | undefined> {
  const trailer = await readTrailer(access, options?.signal);
  if (!trailer) return undefined;
  const offset = trailer.size - BigInt(TRAILER_SIZE) - BigInt(trailer.footerLength);
  const bytes = await access.read(offset, trailer.footerLength, options?.signal);
  if (bytes.length !== trailer.footerLength) return undefined;
  let text: string;
  try {
    text = decodeUtf8(bytes, true);
  } catch {
    return undefined;
  }
  return parseFooterJson(text);
}

/** Append footer JSON, its length and the magic at the sink's current position. */
export async function writeFooter(sink: Sink, footer: Footer): Promise<void> {
  const json = encodeUtf8(serializeFooter(footer));
  const trailer = new Uint8Array(TRAILER_SIZE);
  writeUint32LE(trailer, 0, json.length);
  trailer.set(MAGIC_BYTES, 4);
  await sink.write(concatBytes([json, trailer]));
}

/** Bytes preceding the footer, or `-1n` when the trailer is missing or inconsistent. */
export async function getContentLength(access: RandomAccess, options?: SignalOptions): Promise<bigint> {
  const trailer = await readTrailer(access, options?.signal);
  if (!trailer) return -1n;
  return trailer.size - BigInt(TRAILER_SIZE) - BigInt(trailer.footerLength);
}

/** Read exactly the content region, `chunkSize` bytes at a time. */
export async function readContent(
  access: RandomAccess,
  options?: SignalOptions & { chunkSize?: number }
): Promise<Uint8Array> {
  const signal = options?.signal;
  const chunkSize = options?.chunkSize ?? CONTENT_CHUNK_SIZE;
  const length = await getContentLength(access, { signal });
  if (length < 0n) {
    throw new ContainerError('CONTAINER_BAD_FORMAT', 'Container trailer is missing or invalid');
  }
  const out = new Uint8Array(Number(length));
  let offset = 0;
  while (offset < out.length) {
    throwIfAborted(signal);
    const want = Math.min(chunkSize, out.length - offset);
    const chunk = await access.read(BigInt(offset), want, signal);
    if (chunk.length === 0) {
      throw new ContainerError('CONTAINER_BAD_FORMAT', 'Container content is truncated', {
        context: { expected: length.toString(), read: String(offset) }
      });
    }
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** True when the footer's major version is a plain integer no greater than the supported major. */
export function isVersionCompatible(footer: Pick<Footer, 'version'>): boolean {
  const major = footer.version.split('.')[0] ?? '';
  if (!/^\d+$/.test(major)) return false;
  return Number(major) <= MAX_SUPPORTED_MAJOR_VERSION;
}

export async function readFooterFromFile(path: string, options?: SignalOptions): Promise<Footer | undefined> {
  return withFileRandomAccess(path, (access) => readFooter(access, options));
}

export async function getContentLengthFromFile(path: string, options?: SignalOptions): Promise<bigint> {
  return withFileRandomAccess(path, (access) => getContentLength(access, options));
}

export async function readContentFromFile(
  path: string,
  options?: SignalOptions & { chunkSize?: number }
): Promise<Uint8Array> {
  return withFileRandomAccess(path, (access) => readContent(access, options));
}

/** True when `path` is a readable file with a valid footer. Never throws. */
export async function isValidContainerFile(path: string): Promise<boolean> {
  try {
    return (await readFooterFromFile(path)) !== undefined;
  } catch {
    return false;
  }
}

async function readTrailer(access: RandomAccess, signal?: AbortSignal): Promise<Trailer | undefined> {
  const size = await access.size(signal);
  if (size < BigInt(MIN_CONTAINER_SIZE)) return undefined;
  const trailer = await access.read(size - BigInt(TRAILER_SIZE), TRAILER_SIZE, signal);
  if (trailer.length !== TRAILER_SIZE) return undefined;
  if (!bytesEqual(trailer.subarray(4), MAGIC_BYTES)) return undefined;
  const footerLength = readUint32LE(trailer, 0);
  if (footerLength < 1 || BigInt(footerLength) > size - BigInt(TRAILER_SIZE)) return undefined;
  return { size, footerLength };
}
