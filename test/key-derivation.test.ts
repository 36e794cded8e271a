import test from 'node:test';
import assert from 'node:assert/strict';
import { CryptoError } from '../src/crypto/errors.js';
import {
  HASH_SIZE,
  IV_SIZE,
  KEY_SIZE,
  PBKDF2_ITERATIONS,
  SALT_SIZE,
  TAG_SIZE,
  deriveKey,
  fromBase64,
  generateIv,
  generateSalt,
  hashPassword,
  toBase64,
  verifyPassword
} from '../src/crypto/keyDerivation.js';

const salt = new Uint8Array(SALT_SIZE).fill(7);

test('constants describe PBKDF2-SHA256 and AES-256-GCM sizes', () => {
  assert.equal(PBKDF2_ITERATIONS, 100_000);
  assert.equal(SALT_SIZE, 32);
  assert.equal(KEY_SIZE, 32);
  assert.equal(HASH_SIZE, 32);
  assert.equal(IV_SIZE, 12);
  assert.equal(TAG_SIZE, 16);
});

test('generated salts and IVs have the expected sizes and differ', () => {
  const a = generateSalt();
  const b = generateSalt();
  assert.equal(a.length, SALT_SIZE);
  assert.notDeepEqual(a, b);
  assert.equal(generateIv().length, IV_SIZE);
});

test('deriveKey is deterministic and salt dependent', () => {
  const first = deriveKey('test-password', salt);
  const second = deriveKey('test-password', salt);
  assert.equal(first.length, KEY_SIZE);
  assert.deepEqual(first, second);
  assert.notDeepEqual(first, deriveKey('test-password', new Uint8Array(SALT_SIZE).fill(8)));
  assert.notDeepEqual(first, deriveKey('other-password', salt));
});

test('password verifier never equals the derived key', () => {
  const key = deriveKey('test-password', salt);
  const hash = hashPassword('test-password', salt);
  assert.equal(hash.length, HASH_SIZE);
  assert.notDeepEqual(hash, key);
});

test('verifyPassword accepts the right password only', () => {
  const hash = hashPassword('test-password', salt);
  assert.equal(verifyPassword('test-password', hash, salt), true);
  assert.equal(verifyPassword('test-passwore', hash, salt), false);
  assert.equal(verifyPassword('test-password', hash.subarray(0, 16), salt), false);
});

test('empty password or salt is rejected', () => {
  assert.throws(
    () => deriveKey('', salt),
    (err: unknown) => err instanceof CryptoError && err.code === 'CRYPTO_BAD_INPUT'
  );
  assert.throws(
    () => deriveKey('test-password', new Uint8Array(0)),
    (err: unknown) => err instanceof CryptoError && err.code === 'CRYPTO_BAD_INPUT'
  );
});

test('base64 helpers use the standard alphabet', () => {
  assert.equal(toBase64(new Uint8Array([1, 2, 3])), 'AQID');
  assert.equal(toBase64(new Uint8Array([0xfb, 0xff])), '+/8=');
  assert.deepEqual(fromBase64('AQID'), new Uint8Array([1, 2, 3]));
});
