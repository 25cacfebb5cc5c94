/**
 * Input & Validation Functions
 * Handles user prompts for the generate command
 */

import chalk from 'chalk';
import { confirm } from '@inquirer/prompts';
import { validatePassword } from '../../../core/crypto/index.js';
import { promptPassword } from '../../utils.js';

/**
 * Password for encryption: the flag value when given, else asked twice
 */
export async function resolveEncryptionPassword(flagValue: string | undefined): Promise<string> {
  if (flagValue !== undefined) {
    validatePassword(flagValue);
    return flagValue;
  }

  console.log(chalk.gray('The password is never stored. Share it with the receiver separately.'));
  return promptPassword('Encryption password:', true);
}

/**
 * Ask before producing more codes than the configured threshold
 */
export async function promptCapacityConfirmation(total: number, threshold: number): Promise<boolean> {
  console.log();
  console.log(
    chalk.yellow(`⚠️  This file needs ${chalk.bold(String(total))} codes (more than ${threshold}).`)
  );
  console.log(chalk.gray('   Consider compressing or splitting the file first.'));

  return confirm({ message: 'Generate them anyway?', default: false });
}
