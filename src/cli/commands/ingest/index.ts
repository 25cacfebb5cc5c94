/**
 * Ingest Command
 * Reads scanner text dumps and sorts the records they hold into chunk files
 */

import { resolve } from 'path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { confirm } from '@inquirer/prompts';
import type { Command } from 'commander';
import { ingestSymbols } from '../../../core/orchestration/index.js';
import type { IngestResult } from '../../../core/orchestration/index.js';
import { TextDumpDecoder } from '../../../core/symbols/index.js';
import { formatError } from '../../../utils/errors.js';
import { info, isQuietMode } from '../../../utils/logger.js';
import { divider, formatBytes, handleCommandError, passwordProvider, prepareRun } from '../../utils.js';

interface IngestCliOptions {
  output?: string;
  autoReconstruct?: boolean;
  password?: string;
  force?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

function displayIngestSummary(result: IngestResult): void {
  const { stats } = result;
  info();
  info(chalk.bold.white('📊 Scan summary'));
  info(divider());
  info(chalk.gray('  Sources processed: ') + chalk.white(String(stats.sourcesProcessed)));
  info(chalk.gray('  Records found:     ') + chalk.white(String(stats.symbolsFound)));
  info(chalk.gray('  Valid records:     ') + chalk.white(String(stats.validRecords)));
  info(chalk.gray('  Errors:            ') + (stats.errors > 0 ? chalk.red : chalk.white)(String(stats.errors)));
  info(chalk.gray('  Complete files:    ') + chalk.white(String(result.complete.length)));
  info(divider());

  for (const filename of result.complete) {
    info(chalk.green('  ✓ ') + chalk.white(filename));
  }
  for (const file of result.incomplete) {
    info(
      chalk.red('  ✗ ') +
        chalk.white(file.filename) +
        chalk.gray(` missing [${file.missing.join(', ')}] of ${file.total}`)
    );
  }

  if (result.reconstruction) {
    for (const file of result.reconstruction.verified) {
      info(chalk.green('  ✅ Reconstructed ') + chalk.white(file.filename) + chalk.gray(` (${formatBytes(file.bytes)})`));
    }
    for (const file of result.reconstruction.failed) {
      info(chalk.red('  ❌ ') + chalk.white(file.filename) + chalk.gray(`: ${formatError(file.error)}`));
    }
    for (const failure of result.reconstruction.writeFailed) {
      info(
        chalk.red('  ❌ ') +
          chalk.white(failure.path ?? failure.filename) +
          chalk.gray(`: not written, ${formatError(failure.error)}`)
      );
    }
  }
  info(chalk.gray(`  Report: ${result.reportPath}`));
  info();
}

/**
 * Register the ingest command with the CLI program
 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest <inputs...>')
    .description('Collect records from scanner text dumps into a chunk directory')
    .option('-o, --output <directory>', 'Directory for chunk files and the scan report')
    .option('-a, --auto-reconstruct', 'Rebuild complete files right away')
    .option('-p, --password <password>', 'Decryption password for auto-reconstruction')
    .option('-f, --force', 'Overwrite reconstructed files without asking')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Only warnings and errors')
    .action(async (inputs: string[], options: IngestCliOptions) => {
      const sources = inputs.map((input) => resolve(input));
      let outputDir = options.output ? resolve(options.output) : undefined;

      let spinner: Ora | undefined;

      try {
        const config = await prepareRun(options);
        outputDir ??= resolve(config.scanning.outputDir);
        const force = options.force ?? config.output.force;

        const active = ora({ text: 'Reading scans...', color: 'cyan', isSilent: isQuietMode() }).start();
        spinner = active;
        const askPassword = passwordProvider(options.password);
        const result = await ingestSymbols(
          sources,
          new TextDumpDecoder(),
          {
            outputDir,
            autoReconstruct: options.autoReconstruct ?? config.scanning.autoReconstruct,
            force,
            passwordProvider: async (attempt) => {
              active.stop();
              return askPassword(attempt);
            },
            maxPasswordAttempts:
              options.password === undefined ? config.security.passwordAttempts : 1,
          },
          {
            onSourceStart: (source, current, total) => {
              active.text = chalk.gray(`Reading ${current}/${total} `) + chalk.cyan(source);
            },
            onSourceFailed: (source, error) => {
              active.warn(chalk.yellow(`${source}: ${error.message}`));
              active.start();
            },
            confirmOverwrite: async (path) => {
              active.stop();
              return force || confirm({ message: `${path} exists. Overwrite?`, default: false });
            },
          }
        );
        active.succeed(chalk.bold.green(`Processed ${sources.length} source(s)`));

        displayIngestSummary(result);
        const reconstruction = result.reconstruction;
        if (
          result.complete.length === 0 ||
          (reconstruction !== undefined &&
            (reconstruction.failed.length > 0 || reconstruction.writeFailed.length > 0))
        ) {
          process.exitCode = 1;
        }
      } catch (error) {
        spinner?.stop();
        await handleCommandError('Ingest failed', error, {
          operation: 'ingest',
          command: 'ingest',
          inputPath: sources.join(', '),
          outputPath: outputDir,
        });
      }
    });
}
