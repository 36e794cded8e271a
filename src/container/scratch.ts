import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

/** Default parent for per-session working directories. */
export function defaultScratchRoot(): string {
  return path.join(tmpdir(), 'coffer');
}

/** Create a fresh, uniquely named directory under `root`. */
export async function createScratchDirectory(root: string): Promise<string> {
  await mkdir(root, { recursive: true });
  return mkdtemp(path.join(root, 'session-'));
}

/** Recursively delete `directory`. Missing directories are not an error. */
export async function removeScratchDirectory(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true, maxRetries: 2 });
}
