/**
 * Upload Commands
 *
 * Usage:
 *   eo-gateway upload <localPath> <destKey> [--archive ard|prd]
 *   eo-gateway upload-product <localDir> <destPrefix> [--archive ard|prd] [--suffix <s> | --all]
 *
 * The bucket is the production or development bucket of the archive,
 * following EWOC_DEV_MODE / --dev.
 *
 * @module cli/commands/upload
 */

import { Option, type Command } from 'commander';
import { ArchiveUploader, DEFAULT_PRODUCT_SUFFIX, type ArchiveKind } from '../../upload/archive-uploader.js';
import type { GlobalContext } from '../lib/context.js';
import { formatBytes } from '../lib/logger.js';
import { formatJson, printOutput } from '../lib/output.js';
import { runCommand } from '../lib/run-command.js';

const ARCHIVE_KINDS: readonly ArchiveKind[] = ['ard', 'prd'];

interface UploadOptions {
  readonly archive: ArchiveKind;
}

interface UploadProductOptions {
  readonly archive: ArchiveKind;
  readonly suffix: string;
  readonly all?: boolean;
}

function uploaderFor(context: GlobalContext, archive: ArchiveKind): ArchiveUploader {
  return new ArchiveUploader(context.config, {
    archive,
    logger: context.logger.child({ module: 'upload' }),
  });
}

function archiveOption(): Option {
  return new Option('--archive <archive>', 'Target archive').choices(ARCHIVE_KINDS).default('ard');
}

export function registerUploadCommand(program: Command): void {
  program
    .command('upload <localPath> <destKey>')
    .description('Upload one file to the archive, replacing any object under the key')
    .addOption(archiveOption())
    .action(async (localPath: string, destKey: string, options: UploadOptions) => {
      await runCommand('upload', { localPath, destKey, archive: options.archive }, async (context) => {
        const uploaded = await uploaderFor(context, options.archive).uploadFile(localPath, destKey);
        printOutput(
          context.config.json
            ? formatJson({ success: true, object: uploaded })
            : `s3://${uploaded.bucket}/${uploaded.key} (${formatBytes(uploaded.byteSize)})`
        );
      });
    });
}

export function registerUploadProductCommand(program: Command): void {
  program
    .command('upload-product <localDir> <destPrefix>')
    .description('Upload the files of a product directory below a key prefix')
    .addOption(archiveOption())
    .addOption(
      new Option('--suffix <suffix>', 'Upload only files ending with this suffix')
        .default(DEFAULT_PRODUCT_SUFFIX)
        .conflicts('all')
    )
    .option('--all', 'Upload every file')
    .action(async (localDir: string, destPrefix: string, options: UploadProductOptions) => {
      const suffix = options.all ? null : options.suffix;
      await runCommand('upload-product', { localDir, destPrefix, archive: options.archive, suffix }, async (context) => {
        const uploader = uploaderFor(context, options.archive);
        const summary = await uploader.uploadProduct(localDir, destPrefix, uploader.defaultNamespace, { suffix });
        printOutput(
          context.config.json
            ? formatJson({ success: true, upload: summary })
            : [
                ...summary.keys.map((key) => `s3://${summary.bucket}/${key}`),
                `${summary.keys.length} file(s), ${formatBytes(summary.byteSize)}`,
              ].join('\n')
        );
      });
    });
}
