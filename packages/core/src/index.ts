/**
 * @reliquary/core - Resource registry: type tags, factories and named instances
 */

// Error types
export {
  ReliquaryError,
  ConfigError,
  PropertyError,
  TypeRegistrationError,
  ManifestError,
} from './errors/ReliquaryError.js';
export type { ErrorContext, ErrorSeverity, ReliquaryErrorJSON } from './errors/ReliquaryError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  formatMessage,
  isLogLevel,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel, LogContext } from './logging/Logger.js';

// Config
export {
  loadConfig,
  mergeConfig,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  validateVersion,
  validateLogLevel,
  validateManifests,
} from './config/index.js';
export type { ReliquaryConfig } from './config/index.js';

// Version
export { RELIQUARY_VERSION, getSchemaVersion } from './version.js';

// Properties
export {
  PROPERTY_KINDS,
  isPropertyKind,
  createProperty,
  booleanProperty,
  integerProperty,
  floatProperty,
  stringProperty,
  propertyFrom,
  findProperty,
  getBoolean,
  getInteger,
  getFloat,
  getString,
} from './properties/Property.js';

// Type tags
export { INVALID_TYPE_ID, getTypeId, getTypeName, getTypeTag, hasTypeTag } from './reflection/TypeTags.js';

// Registry
export { ResourceRegistry } from './registry/ResourceRegistry.js';
export type { ResourceRegistryOptions } from './registry/ResourceRegistry.js';
export { FactoryTable, constructResource } from './registry/FactoryTable.js';
export type { FactoryEntry, ResourceFactory } from './registry/FactoryTable.js';

// Resource kinds
export { TextFile, BUILTIN_RESOURCE_TYPES } from './resources/index.js';

// Manifests
export { parseManifest, applyManifest, loadManifest } from './manifest/ManifestLoader.js';
export type {
  ManifestEntry,
  ManifestFailure,
  ManifestFailureReason,
  ManifestOutcome,
  ManifestOptions,
  ManifestLoadResult,
  ParsedManifest,
} from './manifest/ManifestLoader.js';

// Runtime
export { createRuntime } from './Runtime.js';
export type { Runtime, RuntimeOptions } from './Runtime.js';

// Shared types
export type {
  Property,
  PropertyKind,
  PropertyList,
  PropertyValue,
  Resource,
  ResourceStore,
  ResourceType,
  TypeId,
  TypeTag,
} from '@reliquary/types';
