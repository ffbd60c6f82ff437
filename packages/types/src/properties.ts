/**
 * Property Types - named, typed configuration values handed to a Resource
 * at creation time.
 *
 * A property's value is a closed tagged union. The `kind` tag is what a
 * resource checks before reading `value`, so `1` declared as a float and `1`
 * declared as an integer stay distinguishable.
 */

/**
 * Primitive kinds a property can carry.
 */
export type PropertyKind = 'boolean' | 'integer' | 'float' | 'string';

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: number;
}

export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

/**
 * Tagged union of every value a property may hold.
 */
export type PropertyValue = BooleanValue | IntegerValue | FloatValue | StringValue;

/**
 * Maps a kind to the JS type of its value.
 *
 * @example
 * type N = PropertyValueOf<'integer'>; // number
 */
export type PropertyValueOf<K extends PropertyKind> = Extract<PropertyValue, { kind: K }>['value'];

/**
 * A named configuration value. Immutable once constructed.
 */
export interface Property {
  readonly name: string;
  readonly value: PropertyValue;
}

/**
 * The ordered sequence of properties consumed by one `initialize` call.
 */
export type PropertyList = readonly Property[];
