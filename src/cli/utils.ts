/**
 * CLI Utility Functions
 * Shared helpers for CLI commands
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { password } from '@inquirer/prompts';
import { loadConfig, type TransferConfig } from '../config.js';
import { checkPassword, validatePasswordConfirmation } from '../core/crypto/index.js';
import type { PasswordProvider } from '../core/reassembly/index.js';
import {
  formatError,
  InputError,
  isTransferError,
  PasswordMismatchError,
} from '../utils/errors.js';
import { logError, type ErrorLogContext } from '../utils/errorLogger.js';
import { setDebugMode, setQuietMode } from '../utils/logger.js';

// ============================================================================
// Constants
// ============================================================================

export const CLI_CONSTANTS = {
  // Display formatting
  FILENAME_MAX_LENGTH: 35,
  DIVIDER_LENGTH: 70,
  PASSWORD_MASK: '•',
} as const;

// ============================================================================
// Type Definitions
// ============================================================================

export interface OutputFlags {
  verbose?: boolean;
  quiet?: boolean;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Loads settings and applies --verbose / --quiet on top of them
 */
export async function prepareRun(flags: OutputFlags): Promise<TransferConfig> {
  const config = await loadConfig();
  if (flags.verbose && flags.quiet) {
    throw new InputError('--verbose and --quiet cannot be used together');
  }

  // A flag beats either setting from the config file
  const verbose = flags.verbose ?? (flags.quiet ? false : config.output.verbose);
  const quiet = flags.quiet ?? (verbose ? false : config.output.quiet);
  setDebugMode(verbose);
  setQuietMode(quiet);
  return config;
}

/**
 * Asks for a password; with `confirmation` it is asked twice and must match
 */
export async function promptPassword(message: string, confirmation: boolean): Promise<string> {
  for (;;) {
    const first = await password({
      message,
      mask: CLI_CONSTANTS.PASSWORD_MASK,
      validate: (value: string) => checkPassword(value),
    });
    if (!confirmation) return first;

    const second = await password({
      message: 'Confirm password:',
      mask: CLI_CONSTANTS.PASSWORD_MASK,
    });
    try {
      validatePasswordConfirmation(first, second);
      return first;
    } catch (error) {
      if (!(error instanceof PasswordMismatchError)) throw error;
      console.log(chalk.yellow(`${error.message}, try again.`));
    }
  }
}

/**
 * Password source for decryption: the flag value when given, else a prompt
 * that says so when the previous password was rejected
 */
export function passwordProvider(flagValue: string | undefined): PasswordProvider {
  if (flagValue !== undefined) {
    return async () => flagValue;
  }
  return async (attempt) => {
    const message = attempt === 1 ? 'Decryption password:' : `Wrong password, try again (attempt ${attempt}):`;
    return password({ message, mask: CLI_CONSTANTS.PASSWORD_MASK });
  };
}

/**
 * Reports a failed command and sets a failing exit code
 *
 * Expected failures print their message; anything else is also written to
 * an error log for later inspection.
 */
export async function handleCommandError(
  title: string,
  error: unknown,
  context: ErrorLogContext
): Promise<void> {
  console.error(chalk.red(`\n❌ ${title}:`));
  console.error(chalk.red(formatError(error)));

  if (!isTransferError(error)) {
    try {
      const logPath = await logError(error, context);
      console.error(chalk.gray(`   Details written to ${logPath}`));
    } catch (logFailure) {
      console.error(chalk.gray(`   Could not write error log: ${formatError(logFailure)}`));
    }
  }

  process.exitCode = 1;
}

export function divider(): string {
  return chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH));
}
