/**
 * Load command - create the resources declared in one or more manifests
 */

import { Command } from 'commander';
import { loadAction, type LoadOptions } from './loadAction.js';

export const loadCommand = new Command('load')
  .description('Create the resources declared in manifest files')
  .argument('[manifests...]', 'Manifest files (YAML or JSON); defaults to the config manifests')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-j, --json', 'Output as JSON')
  .option('--log-level <level>', 'Log level: silent, errors, warnings, info, debug')
  .option('--log-file <path>', 'Also write debug logs to this file')
  .addHelpText('after', `
Examples:
  reliquary load resources.yaml            Load one manifest
  reliquary load a.yaml b.json --json      Load two manifests, JSON report
  reliquary load -p ./game                 Load manifests listed in ./game/.reliquary/config.yaml
`)
  .action(async (manifests: string[], options: LoadOptions) => {
    process.exitCode = await loadAction(manifests, options);
  });
