/**
 * Local file tree helpers
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Regular files below a directory as sorted POSIX paths relative to it
 */
export async function walkFiles(root: string): Promise<string[]> {
  const files: string[] = [];

  const visit = async (relative: string): Promise<void> => {
    const entries = await readdir(join(root, relative), { withFileTypes: true });
    for (const entry of entries) {
      const path = relative === '' ? entry.name : `${relative}/${entry.name}`;
      if (entry.isDirectory()) {
        await visit(path);
      } else if (entry.isFile()) {
        files.push(path);
      }
    }
  };

  await visit('');
  return files.sort();
}

/**
 * Total byte size of files relative to a root
 */
export async function totalSize(root: string, files: readonly string[]): Promise<number> {
  const sizes = await Promise.all(files.map(async (file) => (await stat(join(root, ...file.split('/')))).size));
  return sizes.reduce((sum, size) => sum + size, 0);
}

/**
 * SHA-256 hex digest of a file's content
 */
export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
