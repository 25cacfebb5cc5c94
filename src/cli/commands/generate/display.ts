/**
 * Display Functions
 * Output for the generate command
 */

import chalk from 'chalk';
import { basename } from 'path';
import type { GeneratedTransfer } from '../../../core/orchestration/index.js';
import { info } from '../../../utils/logger.js';
import { CLI_CONSTANTS, divider, formatBytes } from '../../utils.js';

export function displayGenerateHeader(config: {
  sourcePath: string;
  outputDir: string;
  encrypt: boolean;
  concurrency: number;
  images?: string;
}): void {
  info();
  info(chalk.bold.white('📋 Generate'));
  info(divider());
  info(chalk.gray('  Source:      ') + chalk.cyan(config.sourcePath));
  info(chalk.gray('  Output:      ') + chalk.cyan(config.outputDir));
  info(
    chalk.gray('  Encryption:  ') +
      (config.encrypt ? chalk.green('AES-256-CBC') : chalk.yellow('none'))
  );
  info(chalk.gray('  Workers:     ') + chalk.white(String(config.concurrency)));
  if (config.images) {
    info(chalk.gray('  Images:      ') + chalk.white(config.images));
  }
  info(divider());
}

export function displayGenerateResult(result: GeneratedTransfer): void {
  info();
  info(chalk.bold.white('📦 Chunk files'));
  info(divider());
  for (const file of result.files) {
    info(chalk.gray('  ├─ ') + chalk.white(basename(file).padEnd(CLI_CONSTANTS.FILENAME_MAX_LENGTH)));
  }
  info(divider());
  info(chalk.gray('  File:        ') + chalk.white(result.filename));
  info(chalk.gray('  Size:        ') + chalk.white(formatBytes(result.bytes)));
  info(chalk.gray('  Chunks:      ') + chalk.white(String(result.totalChunks)));
  if (result.images.length > 0) {
    info(chalk.gray('  Images:      ') + chalk.white(String(result.images.length)));
  }
  info(chalk.gray('  File hash:   ') + chalk.cyan(result.fileHash));
  if (result.oversized.length > 0) {
    info(
      chalk.yellow(`  ⚠️  Part(s) ${result.oversized.join(', ')} exceed ${result.maxChunkBytes} bytes`) +
        chalk.gray(' and may not fit one code')
    );
  }
  if (result.encrypted) {
    info(chalk.gray('  Records are encrypted; the receiver needs the password to rebuild.'));
  }
  info();
}
