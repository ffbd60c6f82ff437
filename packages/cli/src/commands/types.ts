/**
 * Types command - list the resource types a runtime registers
 *
 * Ids depend on registration order and are only meaningful within one run.
 */

import { Command } from 'commander';
import { createRuntime } from '@reliquary/core';
import { consoleOutput, type Output } from '../utils/output.js';

interface TypesOptions {
  json?: boolean;
}

export async function typesAction(options: TypesOptions, output: Output = consoleOutput): Promise<number> {
  const runtime = createRuntime({ logLevel: 'silent' });
  const types = runtime.registry.listTypes();
  await runtime.dispose();

  if (options.json) {
    output.log(JSON.stringify({ types, totalTypes: types.length }, null, 2));
    return 0;
  }

  output.log('Resource Types:');
  output.log('');
  const maxIdLen = Math.max(...types.map((t) => String(t.id).length));
  for (const tag of types) {
    output.log(`  ${String(tag.id).padStart(maxIdLen)}  ${tag.name}`);
  }
  output.log('');
  output.log(`Total: ${types.length} types`);
  return 0;
}

export const typesCommand = new Command('types')
  .description('List registered resource types')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: TypesOptions) => {
    process.exitCode = await typesAction(options);
  });
