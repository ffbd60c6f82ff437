/**
 * Resource Types - the contract every creatable entity satisfies, the type
 * tag that identifies a resource class at runtime, and the registry that
 * owns named instances.
 */

import type { PropertyList } from './properties.js';

/**
 * Runtime identifier of a resource class.
 * Assigned on first use, stable for the lifetime of the process only.
 * 0 is reserved for "no type".
 */
export type TypeId = number;

/**
 * The (id, name) pair identifying a resource class.
 */
export interface TypeTag {
  readonly id: TypeId;
  readonly name: string;
}

/**
 * Base interface for all resources.
 *
 * A resource is constructed empty and must be initialized exactly once
 * before use. Returning false marks the instance unusable; the registry
 * never publishes it.
 */
export interface Resource {
  initialize(properties: PropertyList): boolean;
}

/**
 * A resource class: zero-argument constructor plus an optional explicit
 * type name. Without `typeName` the class name is used.
 */
export type ResourceType<T extends Resource = Resource> = (new () => T) & {
  readonly typeName?: string;
};

/**
 * Named-instance store for resources.
 *
 * Creation is idempotent per name. No operation throws on lookup or
 * creation failure: absent or failed results come back as null/false.
 */
export interface ResourceStore {
  /**
   * Register a resource class for runtime-typed creation.
   * Registering the same class again is a no-op.
   */
  register<T extends Resource>(type: ResourceType<T>): TypeTag;

  /**
   * Resolve a registered type name to its id. Returns 0 if unknown.
   */
  getTypeIdFromName(name: string): TypeId;

  /**
   * Create (or return the existing) instance stored under `name`.
   * With a class the result is typed; with a type id it is resolved
   * against the registered factories first.
   */
  create<T extends Resource>(type: ResourceType<T>, name: string, properties: PropertyList): T | null;
  create(typeId: TypeId, name: string, properties: PropertyList): Resource | null;

  /**
   * Publish an already-initialized instance. Returns false if `name` is taken.
   */
  add<T extends Resource>(name: string, resource: T): boolean;

  get(name: string): Resource | null;
  get<T extends Resource>(type: ResourceType<T>, name: string): T | null;

  exists(name: string): boolean;

  /**
   * Drop the instance stored under `name`. Returns false if there was none.
   */
  remove(name: string): boolean;
}
