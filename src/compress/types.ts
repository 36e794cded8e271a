/** Options for `compress`. */
export type CompressOptions = {
  /** zlib level, 0-9. Defaults to zlib's default. */
  level?: number;
  signal?: AbortSignal;
  /** Input chunk size fed to zlib between cancellation checks. */
  chunkSize?: number;
};

/** Options for `decompress`. */
export type DecompressOptions = {
  signal?: AbortSignal;
  /** Fail with `COMPRESSION_RESOURCE_LIMIT` once output exceeds this many bytes. */
  maxOutputBytes?: bigint | number;
  chunkSize?: number;
};
