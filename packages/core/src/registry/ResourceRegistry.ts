/**
 * ResourceRegistry - named-instance store for resources
 *
 * Composes the factory table (type id → constructor) with a name → instance
 * map. One registry is created by the owning context at start-up (see
 * createRuntime) and passed explicitly to every subsystem that needs it.
 *
 * Contract:
 * - At most one instance per name. create() on a taken name returns the
 *   stored instance without constructing or re-initializing anything.
 * - A resource that fails to initialize is never published.
 * - Nothing here throws on a failed lookup or creation; results are null or
 *   false. register() is the exception (name conflicts are a setup bug).
 *
 * Every operation is synchronous, so no other caller can interleave. An
 * initialize() may still call back into the registry under the same name;
 * publishing re-checks the name and the first published instance wins.
 *
 * Usage:
 *   const registry = new ResourceRegistry({ logger });
 *   registry.register(TextFile);
 *
 *   // Class in hand
 *   const readme = registry.create(TextFile, 'readme', [stringProperty('filename', 'README.md')]);
 *
 *   // Type resolved at runtime
 *   const id = registry.getTypeIdFromName('TextFile');
 *   const notes = registry.create(id, 'notes', props);
 */

import type {
  PropertyList,
  Resource,
  ResourceStore,
  ResourceType,
  TypeId,
  TypeTag,
} from '@reliquary/types';
import { FactoryTable, constructResource } from './FactoryTable.js';
import { getTypeName } from '../reflection/TypeTags.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';

export interface ResourceRegistryOptions {
  /** Defaults to a ConsoleLogger at 'warnings' */
  logger?: Logger;
}

export class ResourceRegistry implements ResourceStore {
  private readonly logger: Logger;
  private readonly factories: FactoryTable;

  /** Name → published instance */
  private instances = new Map<string, Resource>();

  constructor(options: ResourceRegistryOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger('warnings');
    this.factories = new FactoryTable(this.logger);
  }

  register<T extends Resource>(type: ResourceType<T>): TypeTag {
    return this.factories.register(type);
  }

  getTypeIdFromName(name: string): TypeId {
    return this.factories.getTypeIdFromName(name);
  }

  isRegistered(typeId: TypeId): boolean {
    return this.factories.has(typeId);
  }

  /**
   * Registered types, ordered by id.
   */
  listTypes(): TypeTag[] {
    return this.factories.list();
  }

  create<T extends Resource>(type: ResourceType<T>, name: string, properties: PropertyList): T | null;
  create(typeId: TypeId, name: string, properties: PropertyList): Resource | null;
  create<T extends Resource>(
    typeOrId: ResourceType<T> | TypeId,
    name: string,
    properties: PropertyList
  ): T | Resource | null {
    if (typeof typeOrId === 'number') {
      return this.createById(typeOrId, name, properties);
    }

    const existing = this.instances.get(name);
    if (existing !== undefined) {
      return this.narrow(typeOrId, name, existing);
    }

    const instance = constructResource(typeOrId, properties, name, this.logger);
    if (instance === null) return null;
    const stored = this.publish(name, instance, getTypeName(typeOrId));
    return stored === instance ? instance : this.narrow(typeOrId, name, stored);
  }

  private createById(typeId: TypeId, name: string, properties: PropertyList): Resource | null {
    // Unknown ids are rejected before looking at the name or allocating
    const entry = this.factories.get(typeId);
    if (!entry) {
      this.logger.debug('Create requested for unregistered type id', { typeId, name });
      return null;
    }

    const existing = this.instances.get(name);
    if (existing !== undefined) return existing;

    const instance = entry.construct(properties, name);
    if (instance === null) return null;
    return this.publish(name, instance, entry.tag.name);
  }

  /**
   * Publish an already-initialized instance, sharing the caller's reference.
   * A taken name is left as it is and false is returned.
   */
  add<T extends Resource>(name: string, resource: T): boolean {
    const existing = this.instances.get(name);
    if (existing !== undefined) {
      if (existing !== resource) {
        this.logger.warn('Refusing to add resource under a name already in use', { name });
      }
      return false;
    }
    this.publish(name, resource, this.factories.tagOf(resource)?.name ?? 'unregistered');
    return true;
  }

  get(name: string): Resource | null;
  get<T extends Resource>(type: ResourceType<T>, name: string): T | null;
  get<T extends Resource>(typeOrName: ResourceType<T> | string, name?: string): T | Resource | null {
    if (typeof typeOrName === 'string') {
      return this.instances.get(typeOrName) ?? null;
    }
    const key = name ?? '';
    const existing = this.instances.get(key);
    if (existing === undefined) return null;
    return this.narrow(typeOrName, key, existing);
  }

  exists(name: string): boolean {
    return this.instances.has(name);
  }

  /**
   * Drop the registry's reference. The instance lives on for any caller
   * still holding it.
   */
  remove(name: string): boolean {
    const removed = this.instances.delete(name);
    if (removed) {
      this.logger.debug('Removed resource', { name });
    }
    return removed;
  }

  /**
   * Tag of the registered class the stored instance belongs to.
   */
  typeOf(name: string): TypeTag | null {
    const existing = this.instances.get(name);
    return existing === undefined ? null : this.factories.tagOf(existing);
  }

  names(): string[] {
    return [...this.instances.keys()];
  }

  entries(): Array<[string, Resource]> {
    return [...this.instances.entries()];
  }

  get size(): number {
    return this.instances.size;
  }

  /**
   * Drop every instance. Registered types are kept.
   */
  clear(): void {
    const count = this.instances.size;
    this.instances.clear();
    this.logger.debug('Cleared registry', { count });
  }

  /**
   * Store `instance` unless the name was published while it was being
   * initialized. Returns whichever instance ends up stored.
   */
  private publish(name: string, instance: Resource, typeName: string): Resource {
    const existing = this.instances.get(name);
    if (existing !== undefined) {
      this.logger.debug('Name published during initialization, discarding new instance', { name, type: typeName });
      return existing;
    }
    this.instances.set(name, instance);
    this.logger.debug('Published resource', { name, type: typeName });
    return instance;
  }

  private narrow<T extends Resource>(type: ResourceType<T>, name: string, existing: Resource): T | null {
    if (existing instanceof type) return existing;
    this.logger.warn('Stored resource is not of the requested type', {
      name,
      requested: getTypeName(type),
    });
    return null;
  }
}
