/**
 * Tests for the installed `reliquary` launcher
 *
 * Runs bin/reliquary.js in a child process so the sources load the same
 * way they do for an installed command.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { spawnSync } from 'node:child_process';
import { fileURLToPath } from 'node:url';

const launcher = fileURLToPath(new URL('../bin/reliquary.js', import.meta.url));

function runCli(args: string[]) {
  return spawnSync(process.execPath, [launcher, ...args], { encoding: 'utf-8' });
}

describe('reliquary launcher', () => {
  it('should run the types command', () => {
    const result = runCli(['types', '--json']);

    assert.strictEqual(result.status, 0, result.stderr);
    const parsed = JSON.parse(result.stdout);
    assert.strictEqual(parsed.totalTypes, 1);
    assert.strictEqual(parsed.types[0].name, 'TextFile');
  });

  it('should print the version', () => {
    const result = runCli(['--version']);

    assert.strictEqual(result.status, 0, result.stderr);
    assert.strictEqual(result.stdout.trim(), '0.3.0');
  });
});
