import { createHmac, pbkdf2Sync, randomBytes, timingSafeEqual } from 'node:crypto';
import { encodeUtf8 } from '../binary.js';
import { CryptoError } from './errors.js';

export const PBKDF2_ITERATIONS = 100_000;
export const SALT_SIZE = 32;
export const KEY_SIZE = 32;
export const HASH_SIZE = 32;
/** AES-GCM nonce size. */
export const IV_SIZE = 12;
export const TAG_SIZE = 16;

const VERIFIER_LABEL = encodeUtf8('coffer/password-verifier/v1');

export function generateSalt(): Uint8Array {
  return toUint8Array(randomBytes(SALT_SIZE));
}

export function generateIv(): Uint8Array {
  return toUint8Array(randomBytes(IV_SIZE));
}

/** PBKDF2-HMAC-SHA256 over the UTF-8 password. Same inputs always give the same key. */
export function deriveKey(password: string, salt: Uint8Array): Uint8Array {
  if (password.length === 0) {
    throw new CryptoError('CRYPTO_BAD_INPUT', 'Password must not be empty');
  }
  if (salt.length === 0) {
    throw new CryptoError('CRYPTO_BAD_INPUT', 'Salt must not be empty');
  }
  return toUint8Array(pbkdf2Sync(encodeUtf8(password), salt, PBKDF2_ITERATIONS, KEY_SIZE, 'sha256'));
}

/**
 * Password verifier stored in the footer.
 *
 * The verifier is an HMAC of a fixed label keyed by the derived key, so it can be
 * checked without decrypting and does not disclose the key itself.
 */
export function hashPassword(password: string, salt: Uint8Array): Uint8Array {
  const key = deriveKey(password, salt);
  return toUint8Array(createHmac('sha256', key).update(VERIFIER_LABEL).digest());
}

export function verifyPassword(password: string, hash: Uint8Array, salt: Uint8Array): boolean {
  const expected = hashPassword(password, salt);
  if (expected.length !== hash.length) return false;
  return timingSafeEqual(expected, hash);
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

export function fromBase64(value: string): Uint8Array {
  return toUint8Array(Buffer.from(value, 'base64'));
}

function toUint8Array(buffer: Buffer): Uint8Array {
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}
