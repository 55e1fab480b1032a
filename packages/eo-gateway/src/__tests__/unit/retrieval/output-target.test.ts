/**
 * Output directory preparation
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, chmod, mkdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { InvalidOutputTargetError } from '../../../core/errors.js';
import { prepareOutputDirectory } from '../../../retrieval/output-target.js';
import { makeTempDir, removeDir } from '../../utils/mocks.js';

vi.mock('node:fs/promises', async () => {
  const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises');
  return { ...actual, access: vi.fn(actual.access) };
});

describe('prepareOutputDirectory', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should create missing directories', async () => {
    const path = await prepareOutputDirectory(join(root, 'a', 'b'));

    expect(path).toBe(join(root, 'a', 'b'));
    expect((await stat(path)).isDirectory()).toBe(true);
  });

  it('should accept an existing directory', async () => {
    await expect(prepareOutputDirectory(root)).resolves.toBe(root);
  });

  it('should reject empty paths and files', async () => {
    await writeFile(join(root, 'file'), '');

    await expect(prepareOutputDirectory('  ')).rejects.toThrow('Invalid output directory "  ": path is empty');
    await expect(prepareOutputDirectory(join(root, 'file'))).rejects.toThrow(
      `Invalid output directory "${join(root, 'file')}": not a directory`
    );
    await expect(prepareOutputDirectory(join(root, 'file', 'below'))).rejects.toBeInstanceOf(InvalidOutputTargetError);
  });

  it('should reject a directory that fails the write check', async () => {
    vi.mocked(access).mockRejectedValueOnce(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));

    await expect(prepareOutputDirectory(root)).rejects.toThrow(`Invalid output directory "${root}": not writable`);
  });

  // root bypasses mode bits
  it.skipIf(process.getuid?.() === 0)('should reject a directory the process cannot write to', async () => {
    const locked = join(root, 'locked');
    await mkdir(locked, { mode: 0o555 });
    await chmod(locked, 0o555);

    try {
      await expect(prepareOutputDirectory(locked)).rejects.toThrow(`Invalid output directory "${locked}": not writable`);
      await expect(prepareOutputDirectory(join(locked, 'inner'))).rejects.toThrow(
        `Invalid output directory "${join(locked, 'inner')}": cannot create:`
      );
    } finally {
      await chmod(locked, 0o755);
    }
  });
});
