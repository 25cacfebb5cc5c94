#!/usr/bin/env node

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { registerGenerateCommand } from './commands/generate/index.js';
import { registerIngestCommand } from './commands/ingest/index.js';
import { registerRebuildCommand } from './commands/rebuild/index.js';
import { registerConfigCommands } from './commands/config/index.js';

const packageJson: unknown = JSON.parse(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
);
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

const program = new Command();

program
  .name('airgap')
  .description('Move text files across an air gap as hash-verified chunks for optical codes')
  .version(version);

// Register all commands
registerGenerateCommand(program);
registerIngestCommand(program);
registerRebuildCommand(program);
registerConfigCommands(program);

await program.parseAsync();
