/**
 * TypeTags - runtime identity for resource classes
 *
 * Every resource class gets an integer id and a name the first time it is
 * seen. The id comes from a module-wide counter, so it is stable for the
 * lifetime of the process but depends on first-use order: never hard-code
 * one, resolve it through getTypeId() or a registry name lookup.
 *
 * The name is the class's own static `typeName` when declared, otherwise the
 * class name. A subclass does not inherit its parent's `typeName`.
 *
 * Usage:
 *   class Shader implements Resource {
 *     static readonly typeName = 'Shader';
 *     initialize(properties: PropertyList): boolean { ... }
 *   }
 *   getTypeTag(Shader); // { id: 1, name: 'Shader' }
 */

import type { Resource, ResourceType, TypeId, TypeTag } from '@reliquary/types';

/** Sentinel id meaning "no type". Never assigned to a class. */
export const INVALID_TYPE_ID: TypeId = 0;

const tags = new WeakMap<ResourceType, TypeTag>();
let nextTypeId: TypeId = INVALID_TYPE_ID + 1;

/**
 * Deterministic name for a resource class, independent of call order.
 */
export function getTypeName<T extends Resource>(type: ResourceType<T>): string {
  const cached = tags.get(type);
  if (cached) return cached.name;
  return deriveName(type);
}

/**
 * Process-wide id of a resource class. Assigned on first call.
 */
export function getTypeId<T extends Resource>(type: ResourceType<T>): TypeId {
  return getTypeTag(type).id;
}

export function getTypeTag<T extends Resource>(type: ResourceType<T>): TypeTag {
  const existing = tags.get(type);
  if (existing) return existing;

  // Synchronous read-then-assign: nothing else runs in this realm in between
  const tag: TypeTag = Object.freeze({ id: nextTypeId++, name: deriveName(type) });
  tags.set(type, tag);
  return tag;
}

/**
 * Whether a class has already been assigned an id.
 */
export function hasTypeTag<T extends Resource>(type: ResourceType<T>): boolean {
  return tags.has(type);
}

function deriveName(type: ResourceType): string {
  if (Object.hasOwn(type, 'typeName') && typeof type.typeName === 'string' && type.typeName.length > 0) {
    return type.typeName;
  }
  return type.name || 'AnonymousResource';
}
