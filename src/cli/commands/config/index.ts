/**
 * Config Commands
 * Show, reset and sample the settings file
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import {
  createSampleConfig,
  getDefaultConfigPath,
  loadConfig,
  resetConfig,
} from '../../../config.js';
import { pathExists } from '../../../utils/files.js';
import { divider, handleCommandError } from '../../utils.js';

/**
 * Register config commands with the CLI program
 */
export function registerConfigCommands(program: Command): void {
  const configCommand = program.command('config').description('Manage the settings file');

  configCommand
    .command('show')
    .description('Print the effective settings (defaults, file, environment)')
    .action(async () => {
      const path = getDefaultConfigPath();
      try {
        const config = await loadConfig({ path });
        const exists = await pathExists(path);
        console.log(chalk.bold.white('⚙️  Settings'));
        console.log(divider());
        console.log(chalk.gray('  File: ') + chalk.cyan(path) + (exists ? '' : chalk.gray(' (not found, defaults)')));
        console.log(divider());
        console.log(JSON.stringify(config, null, 2));
      } catch (error) {
        await handleCommandError('Could not read settings', error, {
          operation: 'config show',
          command: 'config',
          inputPath: path,
        });
      }
    });

  configCommand
    .command('reset')
    .description('Overwrite the settings file with defaults')
    .action(async () => {
      const path = getDefaultConfigPath();
      try {
        await resetConfig(path);
        console.log(chalk.green('✓ Settings reset: ') + chalk.cyan(path));
      } catch (error) {
        await handleCommandError('Could not reset settings', error, {
          operation: 'config reset',
          command: 'config',
          outputPath: path,
        });
      }
    });

  configCommand
    .command('sample')
    .description('Write a sample settings file to the current directory')
    .action(async () => {
      try {
        const path = await createSampleConfig();
        console.log(chalk.green('✓ Sample settings written: ') + chalk.cyan(path));
        console.log(chalk.gray(`  Copy it to ${getDefaultConfigPath()} or point AIRGAP_CONFIG at it.`));
      } catch (error) {
        await handleCommandError('Could not write sample settings', error, {
          operation: 'config sample',
          command: 'config',
        });
      }
    });

  configCommand
    .command('path')
    .description('Print where the settings file is looked up')
    .action(() => {
      console.log(getDefaultConfigPath());
    });
}
