/**
 * Progress Tracking
 * Spinner state for the generate command
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { basename } from 'path';
import type { GenerateCallbacks } from '../../../core/orchestration/index.js';
import { isQuietMode } from '../../../utils/logger.js';
import { formatBytes } from '../../utils.js';

type CapacityPrompt = (total: number, threshold: number) => Promise<boolean>;

export class GenerateProgressHandler {
  private spinner: Ora;

  constructor(private readonly capacityPrompt?: CapacityPrompt) {
    this.spinner = ora({ text: 'Reading source file...', color: 'cyan', isSilent: isQuietMode() });
  }

  /**
   * Get callbacks object for generateTransfer
   */
  public getCallbacks(): GenerateCallbacks {
    return {
      onReadStart: this.onReadStart.bind(this),
      onChunksPlanned: this.onChunksPlanned.bind(this),
      confirmCapacity: this.capacityPrompt ? this.confirmCapacity.bind(this) : undefined,
      onEncodeProgress: this.onEncodeProgress.bind(this),
      onChunkWritten: this.onChunkWritten.bind(this),
      onImageWritten: this.onImageWritten.bind(this),
    };
  }

  private onReadStart(sourcePath: string, bytes: number): void {
    this.spinner.start(chalk.gray(`Reading ${basename(sourcePath)} (${formatBytes(bytes)})`));
  }

  private onChunksPlanned(total: number, maxChunkBytes: number): void {
    this.spinner.succeed(
      chalk.bold.green(`Split into ${chalk.white(total)} chunk(s)`) +
        chalk.gray(` (max ${maxChunkBytes} bytes each)`)
    );
    this.spinner = ora({ text: 'Encoding chunks...', color: 'yellow', isSilent: isQuietMode() }).start();
  }

  private async confirmCapacity(total: number, threshold: number): Promise<boolean> {
    this.spinner.stop();
    const accepted = this.capacityPrompt ? await this.capacityPrompt(total, threshold) : true;
    if (accepted) this.spinner.start();
    return accepted;
  }

  private onEncodeProgress(completed: number, total: number): void {
    this.spinner.text = chalk.gray(`Encoding ${completed}/${total}`);
  }

  private onChunkWritten(path: string, index: number, total: number): void {
    this.spinner.text = chalk.gray(`Writing ${index}/${total} `) + chalk.cyan(basename(path));
  }

  private onImageWritten(path: string, index: number, total: number): void {
    this.spinner.text = chalk.gray(`Rendering ${index}/${total} `) + chalk.cyan(basename(path));
  }

  /**
   * Stop the spinner; `ok` decides the symbol left behind
   */
  public finish(ok: boolean, message: string): void {
    if (ok) {
      this.spinner.succeed(message);
    } else {
      this.spinner.fail(message);
    }
  }
}
