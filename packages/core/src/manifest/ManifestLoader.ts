/**
 * ManifestLoader - declares resources in a YAML or JSON document and creates
 * them through a registry's runtime-typed path.
 *
 * The loader only uses the public registry contract: it resolves each type
 * name with getTypeIdFromName() and calls create(typeId, name, properties).
 *
 * Example manifest.yaml:
 *
 * ```yaml
 * resources:
 *   - name: readme
 *     type: TextFile
 *     properties:
 *       filename: README.md        # scalar: kind inferred
 *       encoding: utf-8
 *   - name: ratio
 *     type: Setting
 *     properties:
 *       value: { kind: float, value: 1 }   # explicit kind
 * ```
 *
 * YAML is a superset of JSON, so .json manifests go through the same parser.
 */

import { readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import type { Property, ResourceStore } from '@reliquary/types';
import { ManifestError, PropertyError } from '../errors/ReliquaryError.js';
import { getString, isPropertyKind, propertyFrom, stringProperty } from '../properties/Property.js';
import { INVALID_TYPE_ID } from '../reflection/TypeTags.js';
import type { Logger } from '../logging/Logger.js';

export interface ManifestEntry {
  name: string;
  type: string;
  properties: Property[];
}

export type ManifestFailureReason = 'unknown-type' | 'initialize-failed' | 'invalid-property';

export interface ManifestFailure {
  name: string;
  type: string;
  reason: ManifestFailureReason;
  message: string;
}

export interface ManifestOutcome {
  name: string;
  type: string;
  /** 'existing' when the name was already published before this entry */
  status: 'created' | 'existing';
}

export interface ParsedManifest {
  source: string;
  entries: ManifestEntry[];
  /** Entries rejected while building their properties */
  invalid: ManifestFailure[];
}

export interface ManifestLoadResult {
  source: string;
  created: ManifestOutcome[];
  failed: ManifestFailure[];
}

export interface ManifestOptions {
  logger?: Pick<Logger, 'warn' | 'debug'>;
  /**
   * Directory that relative path properties are resolved against.
   * loadManifest() defaults it to the manifest's own directory.
   */
  baseDir?: string;
  /** String properties treated as file paths. Default: ['filename'] */
  pathProperties?: string[];
  /** Resolve relative path properties against baseDir. Default: true */
  resolvePaths?: boolean;
}

const DEFAULT_PATH_PROPERTIES = ['filename'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, source: string, context: Record<string, unknown> = {}): ManifestError {
  return new ManifestError(message, 'ERR_MANIFEST_INVALID', { filePath: source, ...context });
}

/**
 * Parse manifest text. Structural problems throw ManifestError; a bad
 * property value only rejects its own entry.
 */
export function parseManifest(text: string, source = '<inline>'): ParsedManifest {
  let doc: unknown;
  try {
    doc = parseYAML(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw invalid(`Failed to parse manifest: ${message}`, source);
  }

  // Empty document declares nothing
  if (doc === null || doc === undefined) {
    return { source, entries: [], invalid: [] };
  }
  if (!isRecord(doc)) {
    throw invalid('Manifest root must be a mapping', source);
  }

  const resources = doc.resources ?? [];
  if (!Array.isArray(resources)) {
    throw invalid(`"resources" must be an array, got ${typeof resources}`, source);
  }

  const entries: ManifestEntry[] = [];
  const rejected: ManifestFailure[] = [];

  resources.forEach((item: unknown, index: number) => {
    if (!isRecord(item)) {
      throw invalid(`resources[${index}] must be a mapping`, source, { index });
    }
    const { name, type, properties = {} } = item;
    if (typeof name !== 'string' || name.length === 0) {
      throw invalid(`resources[${index}].name must be a non-empty string`, source, { index });
    }
    if (typeof type !== 'string' || type.length === 0) {
      throw invalid(`resources[${index}].type must be a non-empty string`, source, { index, resourceName: name });
    }
    if (!isRecord(properties)) {
      throw invalid(`resources[${index}].properties must be a mapping`, source, { index, resourceName: name });
    }

    try {
      entries.push({ name, type, properties: buildProperties(properties) });
    } catch (err) {
      if (!(err instanceof PropertyError)) throw err;
      rejected.push({ name, type, reason: 'invalid-property', message: err.message });
    }
  });

  return { source, entries, invalid: rejected };
}

function buildProperties(raw: Record<string, unknown>): Property[] {
  return Object.entries(raw).map(([propName, value]) => {
    if (isRecord(value)) {
      const { kind } = value;
      if (!isPropertyKind(kind)) {
        throw new PropertyError(`Property "${propName}" has unknown kind ${String(kind)}`, { property: propName });
      }
      return propertyFrom(propName, value.value, kind);
    }
    return propertyFrom(propName, value);
  });
}

function resolvePathProperties(properties: Property[], baseDir: string, pathProperties: string[]): Property[] {
  return properties.map((property) => {
    if (!pathProperties.includes(property.name)) return property;
    const value = getString([property], property.name);
    if (value === null || isAbsolute(value)) return property;
    return stringProperty(property.name, resolve(baseDir, value));
  });
}

/**
 * Create every entry of a parsed manifest. Entries are processed in order;
 * a failed entry does not stop the rest.
 */
export function applyManifest(
  registry: ResourceStore,
  manifest: ParsedManifest,
  options: ManifestOptions = {}
): ManifestLoadResult {
  const pathProperties = options.pathProperties ?? DEFAULT_PATH_PROPERTIES;
  const created: ManifestOutcome[] = [];
  const failed: ManifestFailure[] = [...manifest.invalid];

  for (const entry of manifest.entries) {
    const typeId = registry.getTypeIdFromName(entry.type);
    if (typeId === INVALID_TYPE_ID) {
      failed.push({
        name: entry.name,
        type: entry.type,
        reason: 'unknown-type',
        message: `Unknown resource type "${entry.type}"`,
      });
      continue;
    }

    const properties = options.baseDir && options.resolvePaths !== false
      ? resolvePathProperties(entry.properties, options.baseDir, pathProperties)
      : entry.properties;

    const existed = registry.exists(entry.name);
    const resource = registry.create(typeId, entry.name, properties);
    if (resource === null) {
      failed.push({
        name: entry.name,
        type: entry.type,
        reason: 'initialize-failed',
        message: `Resource "${entry.name}" failed to initialize`,
      });
      continue;
    }
    created.push({ name: entry.name, type: entry.type, status: existed ? 'existing' : 'created' });
  }

  for (const failure of failed) {
    options.logger?.warn(`Manifest entry skipped: ${failure.message}`, { source: manifest.source, name: failure.name, reason: failure.reason });
  }
  options.logger?.debug('Applied manifest', { source: manifest.source, created: created.length, failed: failed.length });

  return { source: manifest.source, created, failed };
}

/**
 * Read, parse and apply a manifest file.
 *
 * @throws ManifestError ERR_MANIFEST_UNREADABLE if the file cannot be read,
 *   ERR_MANIFEST_INVALID if it is not a well-formed manifest
 */
export function loadManifest(
  registry: ResourceStore,
  manifestPath: string,
  options: ManifestOptions = {}
): ManifestLoadResult {
  const absolutePath = resolve(manifestPath);
  let text: string;
  try {
    text = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ManifestError(
      `Cannot read manifest: ${message}`,
      'ERR_MANIFEST_UNREADABLE',
      { filePath: absolutePath },
      'Check the manifest path'
    );
  }

  const manifest = parseManifest(text, absolutePath);
  return applyManifest(registry, manifest, { ...options, baseDir: options.baseDir ?? dirname(absolutePath) });
}
