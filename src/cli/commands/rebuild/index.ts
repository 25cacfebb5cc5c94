/**
 * Rebuild Command
 * Verifies a chunk directory and writes every file that checks out
 */

import { resolve } from 'path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { confirm } from '@inquirer/prompts';
import type { Command } from 'commander';
import { rebuildTransfer } from '../../../core/orchestration/index.js';
import type { RebuildSummary } from '../../../core/orchestration/index.js';
import { info, isQuietMode } from '../../../utils/logger.js';
import { divider, formatBytes, handleCommandError, passwordProvider, prepareRun } from '../../utils.js';

interface RebuildCliOptions {
  output: string;
  password?: string;
  verifyOnly?: boolean;
  force?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

function displayRebuildSummary(summary: RebuildSummary, verifyOnly: boolean): void {
  info();
  info(chalk.bold.white(verifyOnly ? '🔍 Verification' : '🔧 Reconstruction'));
  info(divider());
  info(
    chalk.gray('  Chunk files read: ') +
      chalk.white(String(summary.collected.files)) +
      chalk.gray(`  (${summary.collected.records} records, ${summary.collected.rejected.length} unusable)`)
  );

  for (const file of summary.verified) {
    info(
      chalk.green('  ✓ ') +
        chalk.white(file.filename) +
        chalk.gray(` ${file.total} part(s), ${formatBytes(file.bytes)}${file.encrypted ? ', encrypted' : ''}`)
    );
  }
  for (const file of summary.failed) {
    info(chalk.red('  ✗ ') + chalk.white(file.filename) + chalk.gray(`: ${file.error.message}`));
  }
  for (const path of summary.written) {
    info(chalk.gray('  → ') + chalk.cyan(path));
  }
  for (const path of summary.skipped) {
    info(chalk.yellow('  ↷ ') + chalk.gray(`kept existing ${path}`));
  }
  for (const failure of summary.writeFailed) {
    info(
      chalk.red('  ✗ ') +
        chalk.white(failure.path ?? failure.filename) +
        chalk.gray(`: not written, ${failure.error.message}`)
    );
  }
  info(divider());
  info();
}

/**
 * Register the rebuild command with the CLI program
 */
export function registerRebuildCommand(program: Command): void {
  program
    .command('rebuild [chunkDir]')
    .description('Verify chunk files and reconstruct the original file(s)')
    .option('-o, --output <directory>', 'Directory for reconstructed files', '.')
    .option('-p, --password <password>', 'Decryption password (prompted when needed)')
    .option('--verify-only', 'Check integrity without writing anything')
    .option('-f, --force', 'Overwrite existing files without asking')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Only warnings and errors')
    .action(async (chunkDir: string | undefined, options: RebuildCliOptions) => {
      const outputDir = resolve(options.output);
      let sourceDir = chunkDir ? resolve(chunkDir) : undefined;

      let spinner: Ora | undefined;

      try {
        const config = await prepareRun(options);
        sourceDir ??= resolve(config.scanning.outputDir);
        const force = options.force ?? config.output.force;
        const verifyOnly = options.verifyOnly ?? false;

        const active = ora({ text: 'Reading chunk files...', color: 'cyan', isSilent: isQuietMode() }).start();
        spinner = active;
        const askPassword = passwordProvider(options.password);

        const summary = await rebuildTransfer(
          {
            chunkDir: sourceDir,
            outputDir,
            verifyOnly,
            force,
            passwordProvider: async (attempt) => {
              active.stop();
              return askPassword(attempt);
            },
            maxPasswordAttempts:
              options.password === undefined ? config.security.passwordAttempts : 1,
          },
          {
            onCollected: (stats, filenames) => {
              active.succeed(
                chalk.bold.green(`Found ${chalk.white(filenames.length)} file(s)`) +
                  chalk.gray(` in ${stats.files} chunk file(s)`)
              );
              active.start(chalk.gray('Verifying...'));
            },
            onFileVerified: (file) => {
              active.text = chalk.gray('Verified ') + chalk.cyan(file.filename);
            },
            confirmOverwrite: async (path) => {
              active.stop();
              return confirm({ message: `${path} exists. Overwrite?`, default: false });
            },
          }
        );
        active.stop();

        displayRebuildSummary(summary, verifyOnly);
        if (
          summary.failed.length > 0 ||
          summary.writeFailed.length > 0 ||
          summary.verified.length === 0
        ) {
          process.exitCode = 1;
        }
      } catch (error) {
        spinner?.stop();
        await handleCommandError('Rebuild failed', error, {
          operation: 'rebuild',
          command: 'rebuild',
          inputPath: sourceDir,
          outputPath: outputDir,
        });
      }
    });
}
