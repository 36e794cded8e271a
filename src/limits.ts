/** Resource ceilings applied while decoding untrusted container content. */
export type ResourceLimits = {
  maxEntries?: number;
  maxUncompressedEntryBytes?: bigint | number;
  maxTotalUncompressedBytes?: bigint | number;
  maxInputBytes?: bigint | number;
};

/** Limits with every field resolved to its canonical type. */
export type ResolvedResourceLimits = {
  maxEntries: number;
  maxUncompressedEntryBytes: bigint;
  maxTotalUncompressedBytes: bigint;
  maxInputBytes: bigint;
};

const DEFAULT_LIMITS = Object.freeze({
  maxEntries: 10000,
  maxUncompressedEntryBytes: 512n * 1024n * 1024n,
  maxTotalUncompressedBytes: 2n * 1024n * 1024n * 1024n,
  maxInputBytes: 2n * 1024n * 1024n * 1024n
} satisfies ResolvedResourceLimits);

export const DEFAULT_RESOURCE_LIMITS: Readonly<ResolvedResourceLimits> = DEFAULT_LIMITS;

export function resolveLimits(
  limits?: ResourceLimits,
  defaults: Readonly<ResolvedResourceLimits> = DEFAULT_LIMITS
): ResolvedResourceLimits {
  return {
    maxEntries:
      typeof limits?.maxEntries === 'number' && Number.isFinite(limits.maxEntries)
        ? Math.max(0, Math.floor(limits.maxEntries))
        : defaults.maxEntries,
    maxUncompressedEntryBytes: toBigInt(limits?.maxUncompressedEntryBytes) ?? defaults.maxUncompressedEntryBytes,
    maxTotalUncompressedBytes: toBigInt(limits?.maxTotalUncompressedBytes) ?? defaults.maxTotalUncompressedBytes,
    maxInputBytes: toBigInt(limits?.maxInputBytes) ?? defaults.maxInputBytes
  };
}

function toBigInt(value?: bigint | number): bigint | undefined {
  if (value === undefined) return undefined;
  return typeof value === 'bigint' ? value : BigInt(Math.floor(value));
}
