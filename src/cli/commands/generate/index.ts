/**
 * Generate Command
 * Splits a file into chunk files ready to be rendered as codes
 */

import { resolve } from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { CryptoEngine } from '../../../core/crypto/index.js';
import { defaultPoolSize } from '../../../core/encoding/index.js';
import { checkSourceFile, generateTransfer } from '../../../core/orchestration/index.js';
import { QrImageEncoder } from '../../../core/symbols/index.js';
import { handleCommandError, parsePositiveInt, prepareRun } from '../../utils.js';
import { promptCapacityConfirmation, resolveEncryptionPassword } from './input.js';
import { displayGenerateHeader, displayGenerateResult } from './display.js';
import { GenerateProgressHandler } from './progress.js';

interface GenerateCliOptions {
  output: string;
  encrypt?: boolean;
  password?: string;
  maxChunkBytes?: number;
  concurrency?: number;
  parallel: boolean;
  images?: boolean;
  force?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Register the generate command with the CLI program
 */
export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <file>')
    .description('Split a text file into chunk files, one per code')
    .option('-o, --output <directory>', 'Directory for the chunk files', '.')
    .option('-e, --encrypt', 'Encrypt every chunk with a password')
    .option('-p, --password <password>', 'Encryption password (prompted when omitted)')
    .option('--max-chunk-bytes <bytes>', 'Body size cap per chunk', parsePositiveInt)
    .option('-c, --concurrency <workers>', 'Parallel encoding workers', parsePositiveInt)
    .option('--no-parallel', 'Encode chunks one at a time')
    .option('-i, --images', 'Also render each record as a PNG QR code')
    .option('-f, --force', 'Skip the confirmation for large chunk counts')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Only warnings and errors')
    .action(async (file: string, options: GenerateCliOptions) => {
      const sourcePath = resolve(file);
      const outputDir = resolve(options.output);
      let progress: GenerateProgressHandler | undefined;

      try {
        const config = await prepareRun(options);
        const encrypt = options.encrypt ?? options.password !== undefined;
        // Fail on a bad path before asking for a password
        await checkSourceFile(sourcePath);
        const password = encrypt ? await resolveEncryptionPassword(options.password) : undefined;
        const concurrency = options.parallel
          ? (options.concurrency ?? Math.min(config.encoding.maxWorkers, defaultPoolSize()))
          : 1;
        const force = options.force ?? config.output.force;

        const { symbols } = config;
        displayGenerateHeader({
          sourcePath,
          outputDir,
          encrypt,
          concurrency,
          images: options.images
            ? `PNG, box ${symbols.boxSize}, border ${symbols.border}, level ${symbols.errorCorrectionLevel}`
            : undefined,
        });

        progress = new GenerateProgressHandler(force ? undefined : promptCapacityConfirmation);
        const result = await generateTransfer(
          {
            sourcePath,
            outputDir,
            encrypt,
            password,
            crypto: encrypt ? new CryptoEngine() : undefined,
            sizing: {
              maxPayloadBytes: config.chunking.maxPayloadBytes,
              safetyMargin: config.chunking.safetyMargin,
            },
            maxChunkBytes: options.maxChunkBytes,
            capacityThreshold: config.chunking.capacityThreshold,
            concurrency,
            parallelThreshold: config.encoding.parallelThreshold,
            renderer: options.images ? new QrImageEncoder() : undefined,
            symbolOptions: symbols,
          },
          progress.getCallbacks()
        );

        if (result.status === 'cancelled') {
          progress.finish(false, chalk.yellow(`Cancelled: ${result.totalChunks} chunks not written`));
          return;
        }

        progress.finish(true, chalk.bold.green(`Wrote ${result.files.length} chunk file(s)`));
        displayGenerateResult(result);
      } catch (error) {
        progress?.finish(false, chalk.red('Generation failed'));
        await handleCommandError('Generation failed', error, {
          operation: 'generate',
          command: 'generate',
          inputPath: sourcePath,
          outputPath: outputDir,
        });
      }
    });
}
