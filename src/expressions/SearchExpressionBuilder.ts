/**
 * Global search - one predicate per searchable column, to be OR-combined
 */

import type { PropertyResolver } from '../model/PropertyResolver.js';
import type { ModelRecord, ModelSchema } from '../model/types.js';
import { hasCriterion } from '../request/types.js';
import type { GridRequest } from '../request/types.js';
import { createFilterExpression } from './filterExpression.js';
import type { ProviderRegistry } from './ProviderRegistry.js';
import type { FilterExpression } from './types.js';

/**
 * Build the global search expressions of a request
 *
 * Returns `null` if there is no search value or no searchable column.
 * Columns whose provider declines the value are left out, so the list
 * may be empty.
 */
export function createSearchExpressions<S extends ModelSchema>(
  request: GridRequest,
  resolver: PropertyResolver<S>,
  registry: ProviderRegistry
): FilterExpression<ModelRecord<S>>[] | null {
  const search = request.search;
  if (!hasCriterion(search)) {
    return null;
  }

  const searchableColumns = request.columns.filter((column) => column.isSearchable);
  if (searchableColumns.length === 0) {
    return null;
  }

  const expressions: FilterExpression<ModelRecord<S>>[] = [];
  for (const column of searchableColumns) {
    const expression = createFilterExpression(column, search, resolver, registry);
    if (expression !== null) {
      expressions.push(expression);
    }
  }

  return expressions;
}
