#!/usr/bin/env node
/**
 * @reliquary/cli - CLI for the Reliquary resource registry
 */

import { Command } from 'commander';
import { RELIQUARY_VERSION } from '@reliquary/core';
import { loadCommand } from './commands/load.js';
import { typesCommand } from './commands/types.js';

const program = new Command();

program
  .name('reliquary')
  .description('Load and inspect Reliquary resource manifests')
  .version(RELIQUARY_VERSION);

program.addCommand(loadCommand);
program.addCommand(typesCommand);

await program.parseAsync(process.argv);
