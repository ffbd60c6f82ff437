import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError } from '../errors/ReliquaryError.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../logging/Logger.js';
import { RELIQUARY_VERSION, getSchemaVersion } from '../version.js';

/** Directory under the project root that holds Reliquary files */
export const CONFIG_DIR = '.reliquary';

/**
 * Reliquary configuration schema.
 *
 * Location: .reliquary/config.yaml (preferred) or .reliquary/config.json (deprecated)
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.3.0"
 * logLevel: info
 * logFile: .reliquary/reliquary.log
 * manifests:
 *   - assets/resources.yaml
 * ```
 */
export interface ReliquaryConfig {
  /**
   * Config schema version (major.minor.patch). If omitted, no version check.
   */
  version?: string;

  /** Console log threshold */
  logLevel: LogLevel;

  /** Optional file receiving every message at debug level */
  logFile?: string;

  /** Manifests loaded by `reliquary load` when none are given, relative to the project root */
  manifests: string[];
}

export const DEFAULT_CONFIG: ReliquaryConfig = {
  version: getSchemaVersion(RELIQUARY_VERSION),
  logLevel: 'warnings',
  manifests: [],
};

/**
 * Load Reliquary config from a project directory.
 *
 * Priority:
 * 1. config.yaml
 * 2. config.json (deprecated)
 * 3. DEFAULT_CONFIG
 *
 * A file that cannot be parsed logs a warning and yields the defaults.
 * A file that parses but holds invalid values throws ConfigError.
 *
 * @param projectPath - Absolute path to project root
 * @param logger - Receives warnings (defaults to console)
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): ReliquaryConfig {
  const configDir = join(projectPath, CONFIG_DIR);
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  let filePath: string;
  let parse: (content: string) => unknown;

  if (existsSync(yamlPath)) {
    filePath = yamlPath;
    parse = (content) => parseYAML(content);
  } else if (existsSync(jsonPath)) {
    logger.warn('⚠ config.json is deprecated. Rename it to config.yaml (JSON is valid YAML)');
    filePath = jsonPath;
    parse = (content) => JSON.parse(content);
  } else {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse ${filePath}: ${error.message}`);
    logger.warn('Using default configuration');
    return DEFAULT_CONFIG;
  }

  // Empty file or comments only
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError('Config error: root must be a mapping', { filePath });
  }

  // Validation happens outside the parse try/catch: invalid values must throw
  const user: Record<string, unknown> = { ...parsed };
  validateVersion(user.version);
  validateLogLevel(user.logLevel);
  validateManifests(user.manifests);
  if (user.logFile !== undefined && user.logFile !== null && typeof user.logFile !== 'string') {
    throw new ConfigError(`Config error: logFile must be a string, got ${typeof user.logFile}`, { filePath });
  }

  return mergeConfig(DEFAULT_CONFIG, {
    version: typeof user.version === 'string' ? user.version : undefined,
    logLevel: isLogLevel(user.logLevel) ? user.logLevel : undefined,
    logFile: typeof user.logFile === 'string' ? user.logFile : undefined,
    manifests: Array.isArray(user.manifests) ? user.manifests.map(String) : undefined,
  });
}

/**
 * Check the config version against the running Reliquary version.
 * Compares major.minor.patch; missing version passes.
 *
 * @param currentVersion - Override for testing (defaults to RELIQUARY_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${typeof configVersion}`);
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty');
  }

  const current = currentVersion ?? RELIQUARY_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with Reliquary ${current}. Expected "${currentSchema}".`,
      {},
      `Set version: "${currentSchema}" in ${CONFIG_DIR}/config.yaml`
    );
  }
}

export function validateLogLevel(logLevel: unknown): void {
  if (logLevel === undefined || logLevel === null) return;
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Config error: logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(logLevel)}`
    );
  }
}

export function validateManifests(manifests: unknown): void {
  if (manifests === undefined || manifests === null) return;
  if (!Array.isArray(manifests)) {
    throw new ConfigError(`Config error: manifests must be an array, got ${typeof manifests}`);
  }
  manifests.forEach((entry: unknown, i: number) => {
    if (typeof entry !== 'string' || entry.trim() === '') {
      throw new ConfigError(`Config error: manifests[${i}] must be a non-empty string`);
    }
  });
}

/**
 * Merge user config with defaults. Missing fields use defaults.
 */
export function mergeConfig(defaults: ReliquaryConfig, user: Partial<ReliquaryConfig>): ReliquaryConfig {
  return {
    version: user.version ?? defaults.version,
    logLevel: user.logLevel ?? defaults.logLevel,
    logFile: user.logFile ?? defaults.logFile,
    manifests: user.manifests ?? defaults.manifests,
  };
}
