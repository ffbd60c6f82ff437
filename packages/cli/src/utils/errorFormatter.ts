/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import type { Output } from './output.js';

/**
 * Build the error block as lines.
 */
export function formatError(title: string, nextSteps?: string[]): string[] {
  const lines = [`✗ ${title}`];
  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines;
}

/**
 * Write the error block to an output's error stream.
 *
 * @example
 * printError(output, 'No manifests to load', ['Pass a manifest path']);
 */
export function printError(output: Output, title: string, nextSteps?: string[]): void {
  for (const line of formatError(title, nextSteps)) {
    output.error(line);
  }
}
