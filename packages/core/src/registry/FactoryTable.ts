/**
 * FactoryTable - type-erased constructors for registered resource classes
 *
 * Each entry captures one class behind a uniform signature: take a property
 * list, return an initialized instance or null. This is what lets a caller
 * that only holds a type id (from a manifest or script) create a resource.
 */

import type { PropertyList, Resource, ResourceType, TypeId, TypeTag } from '@reliquary/types';
import { getTypeName, getTypeTag, INVALID_TYPE_ID } from '../reflection/TypeTags.js';
import { TypeRegistrationError } from '../errors/ReliquaryError.js';
import type { Logger } from '../logging/Logger.js';

/**
 * Construct and initialize one instance. Never throws.
 */
export type ResourceFactory = (properties: PropertyList, name: string) => Resource | null;

export interface FactoryEntry {
  readonly tag: TypeTag;
  readonly type: ResourceType;
  readonly construct: ResourceFactory;
}

/**
 * Build a fresh instance of `type` and initialize it.
 *
 * Returns null when initialize() reports failure or when construction or
 * initialization throws; the thrown error is logged, not rethrown.
 */
export function constructResource<T extends Resource>(
  type: ResourceType<T>,
  properties: PropertyList,
  name: string,
  logger: Logger
): T | null {
  const typeName = getTypeName(type);
  try {
    const instance = new type();
    if (instance.initialize(properties)) {
      return instance;
    }
    logger.warn('Resource failed to initialize', { name, type: typeName });
    return null;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('Resource threw during initialization', { name, type: typeName, error: message });
    return null;
  }
}

export class FactoryTable {
  /** Type id → factory entry */
  private entries = new Map<TypeId, FactoryEntry>();

  /** Type name → type id, for name lookups from loaders */
  private idsByName = new Map<string, TypeId>();

  constructor(private readonly logger: Logger) {}

  /**
   * Register a class. Registering the same class again returns its tag and
   * changes nothing.
   *
   * @throws TypeRegistrationError if a different class already owns the name
   */
  register<T extends Resource>(type: ResourceType<T>): TypeTag {
    const tag = getTypeTag(type);
    const existing = this.entries.get(tag.id);
    if (existing) return existing.tag;

    const ownerId = this.idsByName.get(tag.name);
    if (ownerId !== undefined) {
      throw new TypeRegistrationError(
        `Type name "${tag.name}" is already registered by another class`,
        { typeName: tag.name, existingId: ownerId, conflictingId: tag.id },
        'Declare a distinct static typeName on one of the classes'
      );
    }

    const logger = this.logger;
    this.entries.set(tag.id, {
      tag,
      type,
      construct: (properties, name) => constructResource(type, properties, name, logger),
    });
    this.idsByName.set(tag.name, tag.id);
    this.logger.debug('Registered resource type', { id: tag.id, type: tag.name });
    return tag;
  }

  /**
   * Id of the registered class with this type name, or INVALID_TYPE_ID.
   */
  getTypeIdFromName(name: string): TypeId {
    return this.idsByName.get(name) ?? INVALID_TYPE_ID;
  }

  has(id: TypeId): boolean {
    return this.entries.has(id);
  }

  get(id: TypeId): FactoryEntry | null {
    return this.entries.get(id) ?? null;
  }

  /**
   * Tag of the registered class `instance` was constructed from, if any.
   * Matches the exact class, not a registered base class.
   */
  tagOf(instance: Resource): TypeTag | null {
    for (const entry of this.entries.values()) {
      if (Object.getPrototypeOf(instance) === entry.type.prototype) {
        return entry.tag;
      }
    }
    return null;
  }

  /**
   * Registered tags, ordered by id.
   */
  list(): TypeTag[] {
    return [...this.entries.values()].map((e) => e.tag).sort((a, b) => a.id - b.id);
  }

  get size(): number {
    return this.entries.size;
  }
}
