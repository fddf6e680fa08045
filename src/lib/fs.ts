/**
 * File system helpers for payload files and scratch directories.
 *
 * Payload files use the write-tmp-fsync-rename pattern so a hook never
 * sees a half-written JSON document.
 */

import { mkdtemp, open, rename, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Error thrown when a file system operation fails.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Atomically writes JSON data to a file.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/tmp/trudger-notify-x/payload.json', { event: 'run_start' });
 * ```
 */
export async function atomicWriteJson<T>(filePath: string, data: T): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    const content = JSON.stringify(data, null, 2) + '\n';
    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content, 'utf-8');
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;
    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch((closeError: unknown) => {
        console.warn(`Warning: failed to close ${tmpPath}: ${describeError(closeError)}`);
      });
    }
    await rm(tmpPath, { force: true });

    throw new AtomicFsError(
      `Failed to atomically write JSON to ${filePath}: ${describeError(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Creates a fresh private directory under the system temp dir.
 *
 * @throws {AtomicFsError} If the directory cannot be created
 */
export async function createScratchDir(prefix: string): Promise<string> {
  const base = join(tmpdir(), prefix);
  try {
    return await mkdtemp(base);
  } catch (error) {
    throw new AtomicFsError(
      `Failed to create scratch directory ${base}*: ${describeError(error)}`,
      base,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Recursively removes a directory. A missing directory is not an error.
 *
 * @throws {AtomicFsError} If removal fails
 */
export async function removeDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    throw new AtomicFsError(
      `Failed to remove ${dir}: ${describeError(error)}`,
      dir,
      error instanceof Error ? error : undefined
    );
  }
}
