/**
 * Property construction and typed reads.
 *
 * Properties are frozen on construction. Readers return null when a property
 * is missing or carries a different kind, so a resource can treat both as
 * "not configured".
 *
 * Usage:
 *   const props = [stringProperty('filename', 'notes.txt'), integerProperty('limit', 10)];
 *   const filename = getString(props, 'filename'); // 'notes.txt'
 */

import type { Property, PropertyKind, PropertyList, PropertyValue } from '@reliquary/types';
import { PropertyError } from '../errors/ReliquaryError.js';

export const PROPERTY_KINDS: readonly PropertyKind[] = ['boolean', 'integer', 'float', 'string'];

export function isPropertyKind(value: unknown): value is PropertyKind {
  return PROPERTY_KINDS.some((kind) => kind === value);
}

function validateValue(name: string, value: PropertyValue): void {
  switch (value.kind) {
    case 'boolean':
      if (typeof value.value !== 'boolean') {
        throw new PropertyError(`Property "${name}" must be a boolean`, { property: name });
      }
      return;
    case 'integer':
      if (!Number.isSafeInteger(value.value)) {
        throw new PropertyError(`Property "${name}" must be an integer, got ${value.value}`, { property: name });
      }
      return;
    case 'float':
      if (typeof value.value !== 'number' || !Number.isFinite(value.value)) {
        throw new PropertyError(`Property "${name}" must be a finite number, got ${value.value}`, { property: name });
      }
      return;
    case 'string':
      if (typeof value.value !== 'string') {
        throw new PropertyError(`Property "${name}" must be a string`, { property: name });
      }
      return;
  }
}

/**
 * Build an immutable property. Throws PropertyError on an empty name or a
 * value that does not fit its kind.
 */
export function createProperty(name: string, value: PropertyValue): Property {
  if (typeof name !== 'string' || name.length === 0) {
    throw new PropertyError('Property name must be a non-empty string', {}, 'Give every property a name');
  }
  validateValue(name, value);
  return Object.freeze({ name, value: Object.freeze({ ...value }) });
}

export function booleanProperty(name: string, value: boolean): Property {
  return createProperty(name, { kind: 'boolean', value });
}

export function integerProperty(name: string, value: number): Property {
  return createProperty(name, { kind: 'integer', value });
}

export function floatProperty(name: string, value: number): Property {
  return createProperty(name, { kind: 'float', value });
}

export function stringProperty(name: string, value: string): Property {
  return createProperty(name, { kind: 'string', value });
}

/**
 * Build a property from an untyped value, e.g. a scalar read from a
 * document. Numbers without a fractional part become integers.
 *
 * @param kind - Explicit kind; inferred from the value when omitted
 */
export function propertyFrom(name: string, raw: unknown, kind?: PropertyKind): Property {
  const resolvedKind = kind ?? inferKind(name, raw);
  switch (resolvedKind) {
    case 'boolean':
      if (typeof raw !== 'boolean') break;
      return booleanProperty(name, raw);
    case 'integer':
      if (typeof raw !== 'number') break;
      return integerProperty(name, raw);
    case 'float':
      if (typeof raw !== 'number') break;
      return floatProperty(name, raw);
    case 'string':
      if (typeof raw !== 'string') break;
      return stringProperty(name, raw);
  }
  throw new PropertyError(
    `Property "${name}" declared as ${resolvedKind} but got ${typeof raw}`,
    { property: name }
  );
}

function inferKind(name: string, raw: unknown): PropertyKind {
  switch (typeof raw) {
    case 'boolean':
      return 'boolean';
    case 'string':
      return 'string';
    case 'number':
      return Number.isInteger(raw) ? 'integer' : 'float';
    default:
      throw new PropertyError(
        `Property "${name}" has unsupported value type ${raw === null ? 'null' : typeof raw}`,
        { property: name },
        'Use a boolean, number or string'
      );
  }
}

/**
 * First property with the given name, or null.
 */
export function findProperty(properties: PropertyList, name: string): Property | null {
  return properties.find((p) => p.name === name) ?? null;
}

export function getBoolean(properties: PropertyList, name: string): boolean | null {
  const value = findProperty(properties, name)?.value;
  return value?.kind === 'boolean' ? value.value : null;
}

export function getInteger(properties: PropertyList, name: string): number | null {
  const value = findProperty(properties, name)?.value;
  return value?.kind === 'integer' ? value.value : null;
}

/**
 * Reads float properties, and integer properties widened to a float.
 */
export function getFloat(properties: PropertyList, name: string): number | null {
  const property = findProperty(properties, name);
  if (!property) return null;
  if (property.value.kind === 'float' || property.value.kind === 'integer') {
    return property.value.value;
  }
  return null;
}

export function getString(properties: PropertyList, name: string): string | null {
  const value = findProperty(properties, name)?.value;
  return value?.kind === 'string' ? value.value : null;
}
