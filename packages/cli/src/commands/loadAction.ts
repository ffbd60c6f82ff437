/**
 * Load command action - boots a runtime, applies manifests, reports what was
 * created.
 *
 * Kept apart from load.ts so the command definition stays declarative and
 * the logic can run in process.
 */

import { resolve } from 'path';
import {
  ConfigError,
  ManifestError,
  createRuntime,
  isLogLevel,
  loadConfig,
  loadManifest,
  LOG_LEVELS,
  CONFIG_DIR,
  type LogLevel,
  type ManifestLoadResult,
  type ReliquaryConfig,
  type Runtime,
} from '@reliquary/core';
import { consoleOutput, type Output } from '../utils/output.js';
import { printError } from '../utils/errorFormatter.js';

export interface LoadOptions {
  project: string;
  json?: boolean;
  logLevel?: string;
  logFile?: string;
}

export interface LoadedResource {
  name: string;
  type: string;
}

export interface LoadReport {
  manifests: ManifestLoadResult[];
  /** Manifests that could not be read or parsed */
  errors: Array<{ manifest: string; code: string; message: string }>;
  /** Everything published in the registry once all manifests ran */
  resources: LoadedResource[];
}

/**
 * Resolve the log level. An explicit --log-level wins over the config.
 * Returns null for an unknown level.
 */
export function resolveLogLevel(option: string | undefined, config: ReliquaryConfig): LogLevel | null {
  if (option === undefined) return config.logLevel;
  return isLogLevel(option) ? option : null;
}

/**
 * @returns process exit code: 0 when every entry was created, 1 otherwise
 */
export async function loadAction(manifests: string[], options: LoadOptions, output: Output = consoleOutput): Promise<number> {
  const projectPath = resolve(options.project);

  let config: ReliquaryConfig;
  try {
    config = loadConfig(projectPath, { warn: (msg) => output.error(msg) });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    printError(output, err.message, err.suggestion ? [err.suggestion] : undefined);
    return 1;
  }

  const logLevel = resolveLogLevel(options.logLevel, config);
  if (logLevel === null) {
    printError(output, `Unknown log level: ${options.logLevel}`, [`Use one of: ${LOG_LEVELS.join(', ')}`]);
    return 1;
  }

  const manifestPaths = manifests.length > 0
    ? manifests.map((m) => resolve(m))
    : config.manifests.map((m) => resolve(projectPath, m));

  if (manifestPaths.length === 0) {
    printError(output, 'No manifests to load', [
      'Pass one: reliquary load resources.yaml',
      `Or list them under "manifests" in ${CONFIG_DIR}/config.yaml`,
    ]);
    return 1;
  }

  const logFile = options.logFile ?? config.logFile;
  let runtime: Runtime;
  try {
    runtime = createRuntime({
      logLevel,
      logFile: logFile ? resolve(projectPath, logFile) : undefined,
    });
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    printError(output, err.message, [`Point --log-file or logFile in ${CONFIG_DIR}/config.yaml at a writable file`]);
    return 1;
  }

  const report: LoadReport = { manifests: [], errors: [], resources: [] };
  try {
    for (const manifestPath of manifestPaths) {
      try {
        report.manifests.push(loadManifest(runtime.registry, manifestPath, { logger: runtime.logger }));
      } catch (err) {
        if (!(err instanceof ManifestError)) throw err;
        report.errors.push({ manifest: manifestPath, code: err.code, message: err.message });
      }
    }

    report.resources = runtime.registry.names().map((name) => ({
      name,
      type: runtime.registry.typeOf(name)?.name ?? 'unregistered',
    }));
  } finally {
    await runtime.dispose();
  }

  if (options.json) {
    output.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report, output);
  }

  const failed = report.manifests.some((m) => m.failed.length > 0);
  return failed || report.errors.length > 0 ? 1 : 0;
}

function printReport(report: LoadReport, output: Output): void {
  for (const result of report.manifests) {
    output.log(`Manifest: ${result.source}`);
    for (const entry of result.created) {
      const suffix = entry.status === 'existing' ? ' [already loaded]' : '';
      output.log(`  ✓ ${entry.name} (${entry.type})${suffix}`);
    }
    for (const failure of result.failed) {
      output.log(`  ✗ ${failure.name} (${failure.type}): ${failure.message}`);
    }
  }

  for (const error of report.errors) {
    printError(output, error.message, [`Manifest: ${error.manifest}`]);
  }

  const created = report.manifests.reduce((sum, m) => sum + m.created.length, 0);
  const failed = report.manifests.reduce((sum, m) => sum + m.failed.length, 0);
  output.log('');
  output.log(`Resources: ${created} loaded, ${failed} failed, ${report.resources.length} in registry`);
}
