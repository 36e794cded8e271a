import { mkdir, readdir, readFile, stat, utimes, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { throwIfAborted } from '../abort.js';
import type { ByteSource } from '../io/buffer.js';
import { BufferSink } from '../io/Sink.js';
import type { ResourceLimits } from '../limits.js';
import { TarReader } from '../tar/TarReader.js';
import { TarWriter } from '../tar/TarWriter.js';
import type { WarningHandler } from '../types.js';

/** Options for `archiveDirectory`. */
export type ArchiveDirectoryOptions = {
  /** Prefix every entry with the directory's own name. Defaults to true. */
  includeRootName?: boolean;
  /** Zero timestamps so equal trees give equal bytes. */
  isDeterministic?: boolean;
  signal?: AbortSignal;
};

/** Options for `extractArchive`. */
export type ExtractArchiveOptions = {
  signal?: AbortSignal;
  limits?: ResourceLimits;
  onWarning?: WarningHandler;
};

/** Counts reported by `extractArchive`. */
export type ExtractSummary = {
  files: number;
  directories: number;
  skipped: number;
};

type PendingDirectory = { absolute: string; relative: string };

/**
 * Serialize a directory tree into TAR bytes.
 *
 * Within each directory, files are written before subdirectories and names are
 * visited in code-unit order. Empty directories get their own entry; anything
 * that is neither a regular file nor a directory is left out.
 */
export async function archiveDirectory(root: string, options?: ArchiveDirectoryOptions): Promise<Uint8Array> {
  const signal = options?.signal;
  const base = path.resolve(root);
  const prefix = (options?.includeRootName ?? true) ? `${path.basename(base)}/` : '';
  const deterministic = options?.isDeterministic ?? false;

  const sink = new BufferSink();
  const writer = TarWriter.toSink(sink, {
    isDeterministic: deterministic,
    ...(signal ? { signal } : {})
  });

  const stack: PendingDirectory[] = [{ absolute: base, relative: '' }];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    const children = await readdir(current.absolute, { withFileTypes: true });
    children.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const entryDir = `${prefix}${current.relative}`;
    if (children.length === 0 && entryDir !== '') {
      throwIfAborted(signal);
      await writer.add(entryDir, undefined, { type: 'directory', ...(await mtimeOf(current.absolute, deterministic)) });
      continue;
    }

    const subdirectories: PendingDirectory[] = [];
    for (const child of children) {
      throwIfAborted(signal);
      const absolute = path.join(current.absolute, child.name);
      if (child.isFile()) {
        const data = await readFile(absolute);
        await writer.add(`${entryDir}${child.name}`, data, { type: 'file', ...(await mtimeOf(absolute, deterministic)) });
      } else if (child.isDirectory()) {
        subdirectories.push({ absolute, relative: `${current.relative}${child.name}/` });
      }
    }
    for (let i = subdirectories.length - 1; i >= 0; i -= 1) {
      stack.push(subdirectories[i]!);
    }
  }

  await writer.close();
  return sink.toUint8Array();
}

/**
 * Extract TAR bytes below `destination`.
 *
 * Entry names pass through `sanitizeEntryName`; entries that still resolve outside
 * the destination, have no usable name, or are links and devices are skipped and
 * reported through `onWarning`. Existing files are overwritten and files take
 * the entry's modification time.
 */
export async function extractArchive(
  source: ByteSource,
  destination: string,
  options?: ExtractArchiveOptions
): Promise<ExtractSummary> {
  const signal = options?.signal;
  const onWarning = options?.onWarning;
  const baseDir = path.resolve(destination);
  const reader = await TarReader.fromSource(source, {
    ...(signal ? { signal } : {}),
    ...(options?.limits ? { limits: options.limits } : {})
  });
  const summary: ExtractSummary = { files: 0, directories: 0, skipped: 0 };
  await mkdir(baseDir, { recursive: true });

  for await (const entry of reader.iterEntries()) {
    throwIfAborted(signal);
    if (entry.type !== 'file' && entry.type !== 'directory') {
      summary.skipped += 1;
      onWarning?.({
        code: 'ARCHIVE_UNSUPPORTED_ENTRY',
        message: `Skipping ${entry.type} entry`,
        entryName: entry.name
      });
      continue;
    }

    const relative = sanitizeEntryName(entry.name);
    if (relative === '' || relative.includes('\u0000')) {
      summary.skipped += 1;
      if (!entry.isDirectory) {
        onWarning?.({ code: 'ARCHIVE_EMPTY_NAME', message: 'Skipping entry without a usable name', entryName: entry.name });
      }
      continue;
    }

    const targetPath = path.resolve(baseDir, ...relative.split('/'));
    if (!targetPath.startsWith(baseDir + path.sep)) {
      summary.skipped += 1;
      onWarning?.({
        code: 'ARCHIVE_PATH_TRAVERSAL',
        message: 'Entry path escapes destination directory',
        entryName: entry.name
      });
      continue;
    }

    if (entry.isDirectory) {
      await mkdir(targetPath, { recursive: true });
      summary.directories += 1;
      continue;
    }
    await mkdir(path.dirname(targetPath), { recursive: true });
    await writeFile(targetPath, reader.read(entry));
    if (entry.mtime) await utimes(targetPath, entry.mtime, entry.mtime);
    summary.files += 1;
  }
  return summary;
}

/**
 * Reduce an archive entry name to a relative `/`-separated path.
 *
 * Leading `/`, `\` and `.` characters are stripped, backslashes become slashes
 * and `.`, `..` and empty segments are dropped.
 */
export function sanitizeEntryName(name: string): string {
  return name
    .replace(/^[/\\.]+/, '')
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.' && segment !== '..')
    .join('/');
}

async function mtimeOf(target: string, deterministic: boolean): Promise<{ mtime?: Date }> {
  if (deterministic) return {};
  const info = await stat(target);
  return { mtime: new Date(Math.floor(info.mtimeMs / 1000) * 1000) };
}
