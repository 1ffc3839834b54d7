#!/usr/bin/env node

/**
 * apidoc-codegen
 *
 * Crawls the REST API documentation and writes one model class per resource.
 *
 *   apidoc-codegen generate ./generated --mode streaming --target ts
 *
 * Configuration comes from CODEGEN_* environment variables; flags override them.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runGenerate } from './generate-command.js';
import { crawlModeSchema, emitTargetSchema } from './utils/config-schemas.js';

await yargs(hideBin(process.argv))
  .scriptName('apidoc-codegen')
  .command(
    'generate <output>',
    'Crawl the documentation and generate model classes',
    (command) =>
      command
        .positional('output', {
          type: 'string',
          demandOption: true,
          describe: 'Directory the Models/ tree is written to',
        })
        .option('log-file', {
          type: 'string',
          describe: 'Also write JSON log lines to this file',
        })
        .option('verbose', {
          alias: 'v',
          type: 'boolean',
          default: false,
          describe: 'Log at debug level',
        })
        .option('mode', {
          type: 'string',
          choices: crawlModeSchema.options,
          default: 'batch',
          describe: 'batch writes after all pages are parsed; streaming writes as each batch is parsed',
        })
        .option('target', {
          type: 'string',
          choices: emitTargetSchema.options,
          default: 'ts',
          describe: 'Language of the generated models',
        })
        .option('concurrency', {
          type: 'number',
          describe: 'Detail pages fetched per batch (defaults to env CODEGEN_MAX_CONCURRENT or 5)',
        })
        .option('delay', {
          type: 'number',
          describe: 'Pause between batches in ms (defaults to env CODEGEN_BATCH_DELAY_MS or 1000)',
        })
        .option('index-url', {
          type: 'string',
          describe: 'Documentation index page',
        })
        .option('keep-minimal', {
          type: 'boolean',
          default: false,
          describe: 'Generate index-only models for resources whose detail page failed',
        }),
    async (argv) => {
      process.exitCode = await runGenerate({
        output: argv.output,
        mode: crawlModeSchema.parse(argv.mode),
        target: emitTargetSchema.parse(argv.target),
        verbose: argv.verbose,
        logFile: argv['log-file'],
        concurrency: argv.concurrency,
        delay: argv.delay,
        indexUrl: argv['index-url'],
        keepMinimal: argv['keep-minimal'],
      });
    }
  )
  .demandCommand(1)
  .strict()
  .help()
  .parseAsync();
