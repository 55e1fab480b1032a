#!/usr/bin/env node
/**
 * EO Gateway CLI Entry Point
 *
 * @module eo-gateway-cli
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { createProgram, EXIT_CODES } from '../src/cli/index.js';
import { errorMessage } from '../src/core/errors.js';

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json, found next to bin/ or, once built, dist/bin/
 */
function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  for (const candidate of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    if (!existsSync(candidate)) continue;
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(candidate, 'utf-8')));
    if (parsed.success) return parsed.data.version;
  }
  return '0.0.0';
}

async function main(): Promise<void> {
  const controller = new AbortController();
  const cancel = (): void => controller.abort(new Error('interrupted'));
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  const program = createProgram(getVersion(), controller.signal);

  try {
    await program.parseAsync(process.argv);
  } finally {
    process.removeListener('SIGINT', cancel);
    process.removeListener('SIGTERM', cancel);
  }
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
