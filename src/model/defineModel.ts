import type { ModelDefinition, ModelSchema } from './types.js';

/**
 * Names a zod object schema so it can be used as a grid model
 *
 * @example
 * ```typescript
 * const Person = defineModel('Person', z.object({
 *   name: z.string(),
 *   age: z.number().int().nullable(),
 * }));
 * ```
 */
export function defineModel<S extends ModelSchema>(name: string, schema: S): ModelDefinition<S> {
  return Object.freeze({ name, schema });
}
