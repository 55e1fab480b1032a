/**
 * List Command
 *
 * Lists the keys (or, with --products, the distinct product prefixes) stored
 * below a prefix of a bucket family.
 *
 * Usage:
 *   eo-gateway list <family> <prefix> [--products]
 *
 * Examples:
 *   eo-gateway list ewoc-ard c728b264/OPTICAL/31/TC/J/
 *   eo-gateway list aws-s2-cogs sentinel-s2-l2a-cogs/31/T/CJ/2021/7/ --products
 *
 * @module cli/commands/list
 */

import { Argument, type Command } from 'commander';
import { BucketAccessAdapter } from '../../buckets/bucket-access.js';
import { BUCKET_FAMILIES, type BucketFamily } from '../../buckets/bucket-families.js';
import { formatJson, printOutput } from '../lib/output.js';
import { runCommand } from '../lib/run-command.js';

interface ListOptions {
  readonly products?: boolean;
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List the objects stored below a prefix')
    .addArgument(new Argument('<family>', 'Bucket family').choices(BUCKET_FAMILIES))
    .addArgument(new Argument('<prefix>', 'Key prefix'))
    .option('--products', 'List distinct product prefixes instead of keys')
    .action(async (family: BucketFamily, prefix: string, options: ListOptions) => {
      await runCommand('list', { family, prefix, products: options.products === true }, async (context) => {
        const buckets = new BucketAccessAdapter(context.config, {
          logger: context.logger.child({ module: 'buckets' }),
        });
        const listOptions = { signal: context.signal };

        if (options.products) {
          const prefixes = await buckets.listProductPrefixes(family, prefix, listOptions);
          printOutput(context.config.json ? formatJson(prefixes) : prefixes.join('\n'));
          return;
        }

        if (context.config.json) {
          const keys: string[] = [];
          for await (const key of buckets.listUnder(family, prefix, listOptions)) keys.push(key);
          printOutput(formatJson(keys));
          return;
        }

        let count = 0;
        for await (const key of buckets.listUnder(family, prefix, listOptions)) {
          printOutput(key);
          count++;
        }
        context.logger.info('Listing complete', { bucket: buckets.bucketFor(family).bucket, keys: count });
      });
    });
}
