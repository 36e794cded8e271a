import { createCipheriv, createDecipheriv } from 'node:crypto';
import { concatBytes } from '../binary.js';
import { readAllBytes, type ByteSource } from '../io/buffer.js';
import { CryptoError } from './errors.js';
import {
  IV_SIZE,
  TAG_SIZE,
  deriveKey,
  generateIv,
  generateSalt,
  hashPassword,
  verifyPassword
} from './keyDerivation.js';

/** Password-based authenticated encryption used for container content. */
export interface EncryptionService {
  generateSalt(): Uint8Array;
  generateIv(): Uint8Array;
  deriveKey(password: string, salt: Uint8Array): Uint8Array;
  hashPassword(password: string, salt: Uint8Array): Uint8Array;
  verifyPassword(password: string, hash: Uint8Array, salt: Uint8Array): boolean;
  /** Returns `ciphertext || tag`. */
  encrypt(data: Uint8Array, password: string, salt: Uint8Array, iv: Uint8Array): Uint8Array;
  /** Throws `CRYPTO_AUTH_FAILED` instead of returning unauthenticated plaintext. */
  decrypt(data: Uint8Array, password: string, salt: Uint8Array, iv: Uint8Array): Uint8Array;
}

export class AesGcmEncryption implements EncryptionService {
  generateSalt(): Uint8Array {
    return generateSalt();
  }

  generateIv(): Uint8Array {
    return generateIv();
  }

  deriveKey(password: string, salt: Uint8Array): Uint8Array {
    return deriveKey(password, salt);
  }

  hashPassword(password: string, salt: Uint8Array): Uint8Array {
    return hashPassword(password, salt);
  }

  verifyPassword(password: string, hash: Uint8Array, salt: Uint8Array): boolean {
    return verifyPassword(password, hash, salt);
  }

  encrypt(data: Uint8Array, password: string, salt: Uint8Array, iv: Uint8Array): Uint8Array {
    assertIv(iv);
    const key = deriveKey(password, salt);
    const cipher = createCipheriv('aes-256-gcm', key, iv, { authTagLength: TAG_SIZE });
    const head = cipher.update(data);
    const tail = cipher.final();
    return concatBytes([head, tail, cipher.getAuthTag()]);
  }

  decrypt(data: Uint8Array, password: string, salt: Uint8Array, iv: Uint8Array): Uint8Array {
    assertIv(iv);
    if (data.length < TAG_SIZE) {
      throw new CryptoError('CRYPTO_AUTH_FAILED', 'Ciphertext is shorter than the authentication tag', {
        context: { length: String(data.length) }
      });
    }
    const key = deriveKey(password, salt);
    const ciphertext = data.subarray(0, data.length - TAG_SIZE);
    const tag = data.subarray(data.length - TAG_SIZE);
    const decipher = createDecipheriv('aes-256-gcm', key, iv, { authTagLength: TAG_SIZE });
    decipher.setAuthTag(tag);
    const head = decipher.update(ciphertext);
    try {
      const tail = decipher.final();
      return concatBytes([head, tail]);
    } catch (err) {
      throw new CryptoError('CRYPTO_AUTH_FAILED', 'Ciphertext failed authentication', { cause: err });
    }
  }
}

/** Buffer `source` completely, then encrypt it in one pass. */
export async function encryptStream(
  service: EncryptionService,
  source: ByteSource,
  password: string,
  salt: Uint8Array,
  iv: Uint8Array,
  options?: { signal?: AbortSignal | undefined }
): Promise<Uint8Array> {
  const data = await readAllBytes(source, { signal: options?.signal });
  return service.encrypt(data, password, salt, iv);
}

/** Buffer `source` completely, then decrypt and authenticate it in one pass. */
export async function decryptStream(
  service: EncryptionService,
  source: ByteSource,
  password: string,
  salt: Uint8Array,
  iv: Uint8Array,
  options?: { signal?: AbortSignal | undefined }
): Promise<Uint8Array> {
  const data = await readAllBytes(source, { signal: options?.signal });
  return service.decrypt(data, password, salt, iv);
}

function assertIv(iv: Uint8Array): void {
  if (iv.length !== IV_SIZE) {
    throw new CryptoError('CRYPTO_BAD_INPUT', `IV must be ${IV_SIZE} bytes`, {
      context: { length: String(iv.length) }
    });
  }
}
