/**
 * Column filters - one predicate per filtered column, to be AND-combined
 */

import { ProviderDeclinedError } from '../errors.js';
import type { PropertyResolver } from '../model/PropertyResolver.js';
import type { ModelRecord, ModelSchema } from '../model/types.js';
import { hasCriterion, sourceName } from '../request/types.js';
import type { Column, GridRequest, Search } from '../request/types.js';
import { createFilterExpression } from './filterExpression.js';
import type { ProviderRegistry } from './ProviderRegistry.js';
import type { FilterExpression } from './types.js';

type FilteredColumn = Column & { search: Search };

function isFiltered(column: Column): column is FilteredColumn {
  return hasCriterion(column.search);
}

/**
 * Build the per-column filter expressions of a request
 *
 * Filters apply whether or not the column is flagged searchable.
 * Returns `null` if no column carries a filter value.
 *
 * @throws ProviderDeclinedError if a provider cannot build a filter for its column
 */
export function createColumnFilterExpressions<S extends ModelSchema>(
  request: GridRequest,
  resolver: PropertyResolver<S>,
  registry: ProviderRegistry
): FilterExpression<ModelRecord<S>>[] | null {
  const filteredColumns = request.columns.filter(isFiltered);
  if (filteredColumns.length === 0) {
    return null;
  }

  return filteredColumns.map((column) => {
    const expression = createFilterExpression(column, column.search, resolver, registry);
    if (expression === null) {
      throw new ProviderDeclinedError(sourceName(column), column.search.value, resolver.modelName);
    }
    return expression;
  });
}
