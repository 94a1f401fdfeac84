import type { PropertyResolver } from '../model/PropertyResolver.js';
import type { ModelRecord, ModelSchema } from '../model/types.js';
import { sourceName } from '../request/types.js';
import type { Column, Search } from '../request/types.js';
import type { ProviderRegistry } from './ProviderRegistry.js';
import type { FilterExpression } from './types.js';

/**
 * Build the filter expression for one column
 *
 * Returns `null` when the column's provider declines the search value.
 *
 * @throws PropertyNotFoundError if the column does not resolve to an attribute
 * @throws CreatorNotFoundError if no provider handles the attribute's kind
 */
export function createFilterExpression<S extends ModelSchema>(
  column: Column,
  search: Search,
  resolver: PropertyResolver<S>,
  registry: ProviderRegistry
): FilterExpression<ModelRecord<S>> | null {
  const property = resolver.resolve(sourceName(column));
  const provider = registry.require(property, resolver.modelName);

  const matches = provider.createPredicate({ column, search, property });
  if (matches === null) {
    return null;
  }

  return Object.freeze({
    column,
    search,
    predicate: (record: ModelRecord<S>): boolean => matches(property.getValue(record)),
  });
}
