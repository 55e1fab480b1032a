/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename helpers so a reader never sees a half-written
 * product at its final path.
 *
 * **Pattern:**
 * 1. Write to a temporary sibling (PID + timestamp in the name)
 * 2. Rename onto the target path (atomic on POSIX within one filesystem)
 * 3. Remove the temporary file on error, restore the previous tree
 */

import { createWriteStream } from 'node:fs';
import { mkdir, rename, rm, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { errnoCode } from '../errors.js';

let tempSequence = 0;

/**
 * Temporary sibling name for a target path, unique within the process
 */
export function tempPathFor(filePath: string): string {
  tempSequence += 1;
  return `${filePath}.${process.pid}.${Date.now()}.${tempSequence}.tmp`;
}

/**
 * Atomically stream a body to file
 *
 * The source is fully drained into the temporary file before the rename, so
 * an aborted or failed download leaves nothing at `filePath`.
 *
 * @returns Number of bytes written
 */
export async function atomicWriteStream(
  filePath: string,
  source: Readable | AsyncIterable<Uint8Array>,
  signal?: AbortSignal
): Promise<number> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);
  const sink = createWriteStream(tempPath);

  try {
    await pipeline(source, sink, { signal });
    await rename(tempPath, filePath);
    return sink.bytesWritten;
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (errnoCode(cleanupError) !== 'ENOENT') throw cleanupError;
    });
    throw error;
  }
}

/**
 * Move a fully written tree onto its final path, replacing any previous tree.
 *
 * The previous tree is first renamed aside so the final path only ever holds
 * a complete tree.
 */
export async function replaceTree(sourcePath: string, targetPath: string): Promise<void> {
  await mkdir(dirname(targetPath), { recursive: true });
  const asidePath = tempPathFor(targetPath);

  let movedAside = false;
  try {
    await rename(targetPath, asidePath);
    movedAside = true;
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') throw error;
  }

  try {
    await rename(sourcePath, targetPath);
  } catch (error) {
    if (movedAside) {
      await rename(asidePath, targetPath);
    }
    throw error;
  }

  if (movedAside) {
    await rm(asidePath, { recursive: true, force: true });
  }
}
