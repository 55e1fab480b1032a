/**
 * Register every eo-gateway command
 */

import type { Command } from 'commander';
import { registerDemIdsCommand } from './dem-ids.js';
import { registerListCommand } from './list.js';
import { registerDemCommand, registerProductCommand, registerTileCommand } from './retrieval.js';
import { registerUploadCommand, registerUploadProductCommand } from './upload.js';

export function registerCommands(program: Command): void {
  registerTileCommand(program);
  registerProductCommand(program);
  registerDemCommand(program);
  registerDemIdsCommand(program);
  registerUploadCommand(program);
  registerUploadProductCommand(program);
  registerListCommand(program);
}
