/**
 * PropertyResolver - Maps column names to model attributes
 *
 * Attributes are read from the model's zod object schema. Dot notation
 * reaches into nested object schemas:
 *
 * @example
 * ```typescript
 * const resolver = new PropertyResolver(Person);
 * resolver.resolve('address.city');
 * // { name: 'address.city', path: ['address', 'city'], type: { kind: 'string', nullable: false }, ... }
 * ```
 */

import { z } from 'zod';
import { PropertyNotFoundError } from '../errors.js';
import type {
  ModelDefinition,
  ModelRecord,
  ModelSchema,
  PropertyDescriptor,
  PropertyKind,
  PropertyNameMatching,
} from './types.js';

interface UnwrappedSchema {
  schema: z.ZodTypeAny;
  nullable: boolean;
}

/**
 * Strips wrappers that do not change the declared type
 * Only `nullable` and `optional` make the attribute nullable; a pipeline
 * is described by its output schema.
 */
function unwrapSchema(schema: z.ZodTypeAny): UnwrappedSchema {
  let current = schema;
  let nullable = false;

  for (;;) {
    if (current instanceof z.ZodNullable || current instanceof z.ZodOptional) {
      nullable = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else if (current instanceof z.ZodCatch) {
      current = current.removeCatch();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodBranded || current instanceof z.ZodReadonly) {
      current = current.unwrap();
    } else if (current instanceof z.ZodPipeline) {
      current = current._def.out;
    } else if (current instanceof z.ZodLazy) {
      current = current.schema;
    } else {
      return { schema: current, nullable };
    }
  }
}

function literalKind(value: unknown): PropertyKind {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'bigint':
      return 'bigint';
    default:
      return 'unknown';
  }
}

/**
 * Declared kind of an unwrapped schema
 */
export function kindOf(schema: z.ZodTypeAny): PropertyKind {
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodDate) return 'date';
  if (schema instanceof z.ZodBigInt) return 'bigint';
  if (schema instanceof z.ZodNativeEnum) return nativeEnumKind(schema.enum);
  if (schema instanceof z.ZodEnum) return 'enum';
  if (schema instanceof z.ZodObject) return 'object';
  if (schema instanceof z.ZodArray) return 'array';
  if (schema instanceof z.ZodLiteral) return literalKind(schema.value);
  return 'unknown';
}

/**
 * Native enums whose members are all numbers compare as numbers
 * Reverse mappings of TypeScript numeric enums (`{ 0: 'Low' }`) are skipped.
 */
function nativeEnumKind(values: Record<string, unknown>): PropertyKind {
  const members = Object.values(values).filter(
    (value) => !(typeof value === 'string' && typeof values[value] === 'number')
  );
  if (members.length > 0 && members.every((value) => typeof value === 'number')) {
    return 'number';
  }
  return 'enum';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readPath(record: unknown, path: readonly string[]): unknown {
  let current = record;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export class PropertyResolver<S extends ModelSchema = ModelSchema> {
  private readonly model: ModelDefinition<S>;
  private readonly matching: PropertyNameMatching;

  constructor(model: ModelDefinition<S>, matching: PropertyNameMatching = 'ignoreCase') {
    this.model = model;
    this.matching = matching;
  }

  get modelName(): string {
    return this.model.name;
  }

  /**
   * Resolve an attribute by name
   *
   * @throws PropertyNotFoundError if the model has no such attribute
   */
  resolve(name: string): PropertyDescriptor<ModelRecord<S>> {
    const path: string[] = [];
    let current: z.ZodTypeAny = this.model.schema;
    let nullable = false;

    for (const segment of name.split('.')) {
      const container = unwrapSchema(current);
      if (!(container.schema instanceof z.ZodObject)) {
        throw new PropertyNotFoundError(name, this.model.name);
      }

      const shape: Record<string, z.ZodTypeAny> = container.schema.shape;
      const key = this.findKey(shape, segment);
      const next = key === undefined ? undefined : shape[key];
      if (key === undefined || next === undefined) {
        throw new PropertyNotFoundError(name, this.model.name);
      }

      // A missing parent object leaves the attribute without a value
      nullable ||= container.nullable;
      path.push(key);
      current = next;
    }

    const leaf = unwrapSchema(current);
    const resolvedPath: readonly string[] = Object.freeze(path);

    return Object.freeze({
      name: resolvedPath.join('.'),
      path: resolvedPath,
      type: Object.freeze({ kind: kindOf(leaf.schema), nullable: nullable || leaf.nullable }),
      getValue: (record: ModelRecord<S>): unknown => readPath(record, resolvedPath),
    });
  }

  private findKey(shape: Record<string, z.ZodTypeAny>, segment: string): string | undefined {
    if (Object.hasOwn(shape, segment)) {
      return segment;
    }
    if (this.matching === 'exact') {
      return undefined;
    }

    const lower = segment.toLowerCase();
    return Object.keys(shape).find((key) => key.toLowerCase() === lower);
  }
}
