export { ContainerService, ContainerSession } from './container/ContainerService.js';
export type {
  ContainerServiceOptions,
  ContainerState,
  CreateOptions,
  OpenOptions,
  SaveOptions,
  SessionSaveOptions
} from './container/ContainerService.js';
export {
  ACCOUNTANTS_DOCUMENT,
  ATTACHMENTS_DIRECTORY,
  COLLECTION_DOCUMENTS,
  ID_COUNTERS_DOCUMENT,
  SETTINGS_DOCUMENT,
  SettingsDocumentSchema,
  createDefaultSettings,
  findFileInDirectory,
  readContainerMetadata,
  readDocument,
  resolveDocumentDirectory,
  writeDefaultDocuments,
  writeDocument
} from './container/documents.js';
export type { ContainerMetadata } from './container/documents.js';
export { ContainerError } from './errors.js';
export type { ContainerErrorCode } from './errors.js';
export type { ErrorReport } from './errorReport.js';
export type { ContainerWarning, ContainerWarningCode, WarningHandler } from './types.js';
export { DEFAULT_RESOURCE_LIMITS } from './limits.js';
export type { ResourceLimits } from './limits.js';
export { isAbortError } from './abort.js';

export {
  CONTENT_CHUNK_SIZE,
  FOOTER_MAGIC,
  FORMAT_VERSION,
  FooterJsonSchema,
  MAX_SUPPORTED_MAJOR_VERSION,
  MIN_CONTAINER_SIZE,
  TRAILER_SIZE,
  getContentLength,
  getContentLengthFromFile,
  isValidContainerFile,
  isVersionCompatible,
  parseFooterJson,
  readContent,
  readContentFromFile,
  readFooter,
  readFooterFromFile,
  serializeFooter,
  writeFooter
} from './footer/index.js';
export type { Footer } from './footer/index.js';

export { AesGcmEncryption, decryptStream, encryptStream } from './crypto/encryption.js';
export type { EncryptionService } from './crypto/encryption.js';
export {
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
} from './crypto/keyDerivation.js';
export { CryptoError } from './crypto/errors.js';
export type { CryptoErrorCode } from './crypto/errors.js';
export {
  PASSWORD_MAX_LENGTH,
  PASSWORD_MIN_LENGTH,
  describePasswordStrength,
  getPasswordStrengthScore,
  getPasswordValidationError,
  getPasswordValidationErrors,
  isPasswordValid
} from './crypto/passwordPolicy.js';
export type { PasswordStrength } from './crypto/passwordPolicy.js';

export { compress, decompress, CompressionError } from './compress/index.js';
export type { CompressOptions, CompressionErrorCode, DecompressOptions } from './compress/index.js';
export { archiveDirectory, extractArchive, sanitizeEntryName } from './archive/directory.js';
export type { ArchiveDirectoryOptions, ExtractArchiveOptions, ExtractSummary } from './archive/directory.js';
export { ArchiveError } from './archive/errors.js';
export type { ArchiveErrorCode } from './archive/errors.js';
export { TarReader, TarWriter } from './tar/index.js';
export type { TarEntry, TarEntryType, TarReaderOptions, TarWriterAddOptions, TarWriterOptions } from './tar/index.js';

export { BufferRandomAccess, FileRandomAccess } from './io/RandomAccess.js';
export type { RandomAccess } from './io/RandomAccess.js';
export { BufferSink, FileSink } from './io/Sink.js';
export type { Sink } from './io/Sink.js';
export type { ByteSource } from './io/buffer.js';
