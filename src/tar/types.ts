import type { ResourceLimits } from '../limits.js';

/** TAR entry type identifiers. */
export type TarEntryType =
  | 'file'
  | 'directory'
  | 'symlink'
  | 'link'
  | 'character'
  | 'block'
  | 'fifo'
  | 'unknown';

/** TAR entry metadata exposed by TarReader. */
export type TarEntry = {
  name: string;
  size: bigint;
  mtime?: Date;
  type: TarEntryType;
  isDirectory: boolean;
  isSymlink: boolean;
};

/** Options for creating TarReader instances. */
export type TarReaderOptions = {
  limits?: ResourceLimits;
  signal?: AbortSignal;
};

/** Options for creating TarWriter instances. */
export type TarWriterOptions = {
  /** Zero every mtime so equal input gives equal bytes. */
  isDeterministic?: boolean;
  signal?: AbortSignal;
};

/** Options for adding entries with TarWriter. */
export type TarWriterAddOptions = {
  type?: 'file' | 'directory';
  mtime?: Date;
};
