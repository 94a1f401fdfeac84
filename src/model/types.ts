/**
 * Type definitions for model descriptions
 */

import type { z } from 'zod';

/** Kinds compared by value; these need conversion before they can be sorted uniformly */
export type ValueKind = 'number' | 'boolean' | 'date' | 'bigint';

/** Kinds compared by reference */
export type ReferenceKind = 'string' | 'enum' | 'object' | 'array' | 'unknown';

/** Declared kind of a model attribute */
export type PropertyKind = ValueKind | ReferenceKind;

/** Declared type of a model attribute */
export interface PropertyType {
  kind: PropertyKind;
  /** Set when the schema wraps the attribute in `.nullable()` or `.optional()` */
  nullable: boolean;
}

/** Schema shape accepted as a model */
export type ModelSchema = z.AnyZodObject;

/** A named model whose attributes are described by a zod object schema */
export interface ModelDefinition<S extends ModelSchema = ModelSchema> {
  readonly name: string;
  readonly schema: S;
}

/** Record type of a model */
export type ModelRecord<S extends ModelSchema> = z.output<S>;

/** Resolved model attribute */
export interface PropertyDescriptor<T> {
  /** Attribute name as declared on the model (dot-separated for nested attributes) */
  readonly name: string;
  readonly path: readonly string[];
  readonly type: PropertyType;
  /** Reads the attribute from a record, `undefined` if an intermediate object is missing */
  getValue(record: T): unknown;
}

/** How column names are matched against attribute names */
export type PropertyNameMatching = 'exact' | 'ignoreCase';

const VALUE_KINDS: ReadonlySet<PropertyKind> = new Set<PropertyKind>([
  'number',
  'boolean',
  'date',
  'bigint',
]);

export function isValueKind(kind: PropertyKind): kind is ValueKind {
  return VALUE_KINDS.has(kind);
}

/**
 * Nullable wrapper around a value kind, e.g. `z.number().nullable()`
 */
export function isNullableValueType(type: PropertyType): boolean {
  return type.nullable && isValueKind(type.kind);
}

/**
 * Formats a property type for diagnostics, e.g. `number | null`
 */
export function formatPropertyType(type: PropertyType): string {
  return type.nullable ? `${type.kind} | null` : type.kind;
}
