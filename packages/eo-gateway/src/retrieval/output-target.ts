/**
 * Output directory checks, run before any network activity
 */

import { constants } from 'node:fs';
import { access, mkdir, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { InvalidOutputTargetError, errnoCode, errorMessage } from '../core/errors.js';

/**
 * Resolve the output directory, creating it when missing
 *
 * @returns Absolute path of a writable directory
 * @throws {InvalidOutputTargetError} for an empty path, a non-directory, or a
 *   directory the process cannot write to
 */
export async function prepareOutputDirectory(outputDirectory: string): Promise<string> {
  if (outputDirectory.trim() === '') {
    throw new InvalidOutputTargetError(outputDirectory, 'path is empty');
  }
  const path = resolve(outputDirectory);

  try {
    const info = await stat(path);
    if (!info.isDirectory()) {
      throw new InvalidOutputTargetError(path, 'not a directory');
    }
  } catch (error) {
    if (error instanceof InvalidOutputTargetError) throw error;
    if (errnoCode(error) !== 'ENOENT') {
      throw new InvalidOutputTargetError(path, errorMessage(error));
    }
    try {
      await mkdir(path, { recursive: true });
    } catch (mkdirError) {
      throw new InvalidOutputTargetError(path, `cannot create: ${errorMessage(mkdirError)}`);
    }
  }

  try {
    await access(path, constants.W_OK);
  } catch {
    throw new InvalidOutputTargetError(path, 'not writable');
  }
  return path;
}
