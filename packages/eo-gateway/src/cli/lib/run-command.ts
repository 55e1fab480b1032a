/**
 * Command runner
 *
 * Wraps a command body with start / end logging and turns any failure into
 * the error report and exit code of its kind.
 *
 * @module cli/lib/run-command
 */

import { isGatewayError } from '../../core/errors.js';
import type { LogMetadata } from '../../core/utils/logger.js';
import { getGlobalContext, type GlobalContext } from './context.js';
import { EXIT_CODES, exitCodeFor, printError, type ExitCode } from './output.js';

export async function runCommand(
  name: string,
  options: LogMetadata,
  body: (context: GlobalContext) => Promise<void>
): Promise<void> {
  const context = getGlobalContext();
  context.logger.commandStart(name, options);

  let code: ExitCode = EXIT_CODES.SUCCESS;
  try {
    await body(context);
    context.logger.commandEnd(true);
  } catch (error) {
    code = exitCodeFor(error);
    context.logger.commandEnd(false, isGatewayError(error) ? { kind: error.kind } : {});
    printError(error, context.config.json);
  }

  if (code !== EXIT_CODES.SUCCESS) {
    process.exit(code);
  }
}
