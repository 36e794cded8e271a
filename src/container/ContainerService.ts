import { randomUUID } from 'node:crypto';
import { rename, rm } from 'node:fs/promises';
import type { z } from 'zod';
import { isAbortError, throwIfAborted } from '../abort.js';
import { archiveDirectory, extractArchive } from '../archive/directory.js';
import { compress, decompress } from '../compress/index.js';
import { AesGcmEncryption, type EncryptionService } from '../crypto/encryption.js';
import { fromBase64, toBase64 } from '../crypto/keyDerivation.js';
import { ContainerError } from '../errors.js';
import {
  FORMAT_VERSION,
  isVersionCompatible,
  isValidContainerFile,
  readContentFromFile,
  readFooterFromFile,
  writeFooter,
  type Footer
} from '../footer/index.js';
import { FileSink } from '../io/Sink.js';
import { resolveLimits, type ResolvedResourceLimits, type ResourceLimits } from '../limits.js';
import type { ContainerWarning, WarningHandler } from '../types.js';
import {
  isNotFound,
  readContainerMetadata,
  readDocument,
  writeDefaultDocuments,
  writeDocument
} from './documents.js';
import { createScratchDirectory, defaultScratchRoot, removeScratchDirectory } from './scratch.js';

/** Service-wide configuration. Every field is optional. */
export type ContainerServiceOptions = {
  /** Encryption backend. Defaults to `AesGcmEncryption`. */
  encryption?: EncryptionService;
  /** Parent of per-session scratch directories. Defaults to `<tmpdir>/coffer`. */
  scratchRoot?: string;
  /** gzip level used when saving. */
  compressionLevel?: number;
  limits?: ResourceLimits;
  onWarning?: WarningHandler;
  /** Clock used for footer timestamps. */
  now?: () => Date;
};

export type CreateOptions = { signal?: AbortSignal };

export type OpenOptions = {
  /** Required when the container is encrypted. */
  password?: string;
  signal?: AbortSignal;
};

export type SaveOptions = {
  /** Encrypt with this password. Absent, `null` or empty means no encryption. */
  password?: string | null;
  signal?: AbortSignal;
};

export type SessionSaveOptions = {
  /** `undefined` keeps the session password, `null` removes it, a string replaces it. */
  password?: string | null;
  /** Save to a different file; the session follows it. */
  path?: string;
  signal?: AbortSignal;
};

export type ContainerState = 'open' | 'closed';

type EncryptionFields = { salt: Uint8Array; passwordHash: Uint8Array; iv: Uint8Array };

/** Creates, opens and saves container files. */
export class ContainerService {
  private readonly encryption: EncryptionService;
  private readonly scratchRoot: string;
  private readonly compressionLevel: number | undefined;
  private readonly limits: ResolvedResourceLimits;
  private readonly onWarning: WarningHandler | undefined;
  private readonly now: () => Date;

  constructor(options?: ContainerServiceOptions) {
    this.encryption = options?.encryption ?? new AesGcmEncryption();
    this.scratchRoot = options?.scratchRoot ?? defaultScratchRoot();
    this.compressionLevel = options?.compressionLevel;
    this.limits = resolveLimits(options?.limits);
    this.onWarning = options?.onWarning;
    this.now = options?.now ?? (() => new Date());
  }

  /** Write a new unencrypted container holding the default documents and open it. */
  async create(path: string, name: string, options?: CreateOptions): Promise<ContainerSession> {
    const signal = options?.signal;
    throwIfAborted(signal);
    const directory = await createScratchDirectory(this.scratchRoot);
    try {
      await writeDefaultDocuments(directory, name, { signal });
      await this.save(path, directory, signal ? { signal } : {});
    } catch (err) {
      await this.close(directory);
      throw err;
    }
    return new ContainerSession(this, path, directory, undefined);
  }

  /**
   * Verify and unpack a container into a new scratch directory.
   *
   * The password is checked against the stored verifier before any content is
   * decrypted.
   */
  async open(path: string, options?: OpenOptions): Promise<ContainerSession> {
    const signal = options?.signal;
    throwIfAborted(signal);
    const footer = await readFooterFromFile(path, { signal });
    if (!footer) {
      throw new ContainerError('CONTAINER_BAD_FORMAT', 'Invalid file format or corrupted file', { path });
    }
    if (!isVersionCompatible(footer)) {
      throw new ContainerError('CONTAINER_UNSUPPORTED_VERSION', `File version ${footer.version} is not supported`, {
        path,
        context: { version: footer.version }
      });
    }

    let password: string | undefined;
    let fields: EncryptionFields | undefined;
    if (footer.isEncrypted) {
      password = options?.password;
      if (!password) {
        throw new ContainerError('CONTAINER_PASSWORD_REQUIRED', 'Password is required for this file', { path });
      }
      fields = encryptionFields(footer, path);
      if (!this.encryption.verifyPassword(password, fields.passwordHash, fields.salt)) {
        throw new ContainerError('CONTAINER_BAD_PASSWORD', 'Invalid password', { path });
      }
    }

    const content = await readContentFromFile(path, { signal });
    const compressed =
      password !== undefined && fields ? this.encryption.decrypt(content, password, fields.salt, fields.iv) : content;
    const archive = await decompress(compressed, {
      maxOutputBytes: this.limits.maxInputBytes,
      ...(signal ? { signal } : {})
    });

    const directory = await createScratchDirectory(this.scratchRoot);
    try {
      await extractArchive(archive, directory, {
        limits: this.limits,
        ...(signal ? { signal } : {}),
        ...(this.onWarning ? { onWarning: this.onWarning } : {})
      });
    } catch (err) {
      await this.close(directory);
      throw err;
    }
    return new ContainerSession(this, path, directory, password);
  }

  /**
   * Pack `directory` into `path`, replacing the file only once the new one is complete.
   *
   * A fresh salt and IV are generated for every encrypted save. `createdAt` is
   * carried over from the file being replaced when its footer is readable.
   */
  async save(path: string, directory: string, options?: SaveOptions): Promise<Footer> {
    const signal = options?.signal;
    const password = options?.password ? options.password : undefined;
    throwIfAborted(signal);

    const archive = await archiveDirectory(directory, { includeRootName: false, ...(signal ? { signal } : {}) });
    const compressed = await compress(archive, {
      ...(this.compressionLevel !== undefined ? { level: this.compressionLevel } : {}),
      ...(signal ? { signal } : {})
    });

    let content = compressed;
    let encryption: { salt: string; passwordHash: string; iv: string } | undefined;
    if (password !== undefined) {
      const salt = this.encryption.generateSalt();
      const iv = this.encryption.generateIv();
      const passwordHash = this.encryption.hashPassword(password, salt);
      content = this.encryption.encrypt(compressed, password, salt, iv);
      encryption = { salt: toBase64(salt), passwordHash: toBase64(passwordHash), iv: toBase64(iv) };
    }

    const metadata = await readContainerMetadata(directory, { signal });
    const modifiedAt = this.now();
    const footer: Footer = {
      version: FORMAT_VERSION,
      isEncrypted: encryption !== undefined,
      ...(encryption ?? {}),
      accountants: metadata.accountants,
      companyName: metadata.companyName,
      createdAt: (await this.previousCreatedAt(path, signal)) ?? modifiedAt,
      modifiedAt,
      biometricEnabled: metadata.biometricEnabled
    };

    const staged = `${path}.${randomUUID()}.tmp`;
    const sink = await FileSink.open(staged, { exclusive: true });
    try {
      throwIfAborted(signal);
      await sink.write(content);
      await writeFooter(sink, footer);
      await sink.sync();
      await sink.close();
      throwIfAborted(signal);
      await rename(staged, path);
    } catch (err) {
      await this.release(sink, staged);
      await this.discard(staged);
      throw err;
    }
    return footer;
  }

  /** Delete a scratch directory. Failures are reported as warnings. */
  async close(directory: string): Promise<void> {
    try {
      await removeScratchDirectory(directory);
    } catch (err) {
      this.warn({
        code: 'CONTAINER_CLEANUP_FAILED',
        message: `Could not remove scratch directory: ${describe(err)}`,
        path: directory
      });
    }
  }

  /** True when `path` has a valid footer that marks it encrypted. Missing files are not encrypted. */
  async isEncrypted(path: string): Promise<boolean> {
    try {
      return (await readFooterFromFile(path))?.isEncrypted ?? false;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  /** True when `path` is a readable file with a valid footer. Never throws. */
  async isValidContainer(path: string): Promise<boolean> {
    return isValidContainerFile(path);
  }

  /** Footer of `path`, or `undefined` when it has none. */
  async readFooter(path: string, options?: { signal?: AbortSignal }): Promise<Footer | undefined> {
    return readFooterFromFile(path, { signal: options?.signal });
  }

  private async previousCreatedAt(path: string, signal: AbortSignal | undefined): Promise<Date | undefined> {
    try {
      return (await readFooterFromFile(path, { signal }))?.createdAt;
    } catch (err) {
      if (isAbortError(err)) throw err;
      throwIfAborted(signal);
      if (isNotFound(err)) return undefined;
      this.warn({
        code: 'CONTAINER_FOOTER_UNREADABLE',
        message: `Existing footer could not be read: ${describe(err)}`,
        path
      });
      return undefined;
    }
  }

  private async release(sink: FileSink, staged: string): Promise<void> {
    try {
      await sink.close();
    } catch (err) {
      this.warn({
        code: 'CONTAINER_CLEANUP_FAILED',
        message: `Could not close staged file: ${describe(err)}`,
        path: staged
      });
    }
  }

  private async discard(staged: string): Promise<void> {
    try {
      await rm(staged, { force: true });
    } catch (err) {
      this.warn({
        code: 'CONTAINER_CLEANUP_FAILED',
        message: `Could not remove staged file: ${describe(err)}`,
        path: staged
      });
    }
  }

  private warn(warning: ContainerWarning): void {
    this.onWarning?.(warning);
  }
}

/** An opened container: its file, its scratch directory and the password it was opened with. */
export class ContainerSession {
  private current: ContainerState = 'open';

  /** @internal */
  constructor(
    private readonly service: ContainerService,
    private filePath: string,
    readonly directory: string,
    private password: string | undefined
  ) {}

  get state(): ContainerState {
    return this.current;
  }

  get path(): string {
    return this.filePath;
  }

  /** Whether the next save encrypts. */
  get isEncrypted(): boolean {
    return this.password !== undefined;
  }

  /** Save the scratch directory back to the session file (or to `options.path`). */
  async save(options?: SessionSaveOptions): Promise<Footer> {
    this.assertOpen('save');
    const target = options?.path ?? this.filePath;
    const password = options?.password === undefined ? this.password : options.password || undefined;
    const footer = await this.service.save(target, this.directory, {
      ...(password !== undefined ? { password } : {}),
      ...(options?.signal ? { signal: options.signal } : {})
    });
    this.filePath = target;
    this.password = password;
    return footer;
  }

  /** Remove the scratch directory. Calling it again does nothing. */
  async close(): Promise<void> {
    if (this.current === 'closed') return;
    this.current = 'closed';
    await this.service.close(this.directory);
  }

  async readDocument<T>(
    name: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: { signal?: AbortSignal }
  ): Promise<T | undefined> {
    this.assertOpen('readDocument');
    return readDocument(this.directory, name, schema, { signal: options?.signal });
  }

  async writeDocument(name: string, data: unknown, options?: { signal?: AbortSignal }): Promise<void> {
    this.assertOpen('writeDocument');
    await writeDocument(this.directory, name, data, { signal: options?.signal });
  }

  private assertOpen(operation: string): void {
    if (this.current !== 'open') {
      throw new ContainerError('CONTAINER_INVALID_STATE', `Cannot ${operation} a closed container`, {
        path: this.filePath,
        context: { operation }
      });
    }
  }
}

function encryptionFields(footer: Footer, path: string): EncryptionFields {
  if (footer.salt === undefined || footer.passwordHash === undefined || footer.iv === undefined) {
    throw new ContainerError('CONTAINER_BAD_FORMAT', 'Encrypted footer is missing key material', { path });
  }
  return {
    salt: fromBase64(footer.salt),
    passwordHash: fromBase64(footer.passwordHash),
    iv: fromBase64(footer.iv)
  };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
