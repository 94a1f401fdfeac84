/**
 * Sort keys - ordered refinements, one or two per sorted column
 *
 * A nullable value attribute (e.g. `z.number().nullable()`) gets two keys:
 * first whether a value is present, then the value itself. The presence key
 * decides where missing values go; the value key only separates records whose
 * presence key is equal.
 */

import type { PropertyResolver } from '../model/PropertyResolver.js';
import { isNullableValueType } from '../model/types.js';
import type { ModelRecord, ModelSchema, PropertyDescriptor } from '../model/types.js';
import { sourceName } from '../request/types.js';
import type { Column, GridRequest, Sort } from '../request/types.js';
import type { ComparableValue, OrderExpression, SortKey } from './types.js';

type SortedColumn = Column & { sort: Sort };

function isSorted(column: Column): column is SortedColumn {
  return column.isSortable && column.sort !== null && column.sort !== undefined;
}

/**
 * Converts an attribute value to its comparable form
 *
 * Dates become epoch milliseconds. Strings, numbers, bigints and booleans are
 * kept as they are. Objects and arrays are keyed by their JSON text.
 */
export function toComparable(value: unknown): ComparableValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return value.getTime();
  }
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return value;
    case 'object':
      return JSON.stringify(value);
    default:
      return String(value);
  }
}

/**
 * Compares sort priorities, placing `NaN` after every number
 */
function compareOrder(a: Sort, b: Sort): number {
  const left = Number.isNaN(a.order) ? Infinity : a.order;
  const right = Number.isNaN(b.order) ? Infinity : b.order;
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function createSortKeys<T>(property: PropertyDescriptor<T>): SortKey<T>[] {
  const valueKey: SortKey<T> = (record) => toComparable(property.getValue(record));

  if (isNullableValueType(property.type)) {
    const presenceKey: SortKey<T> = (record) => {
      const value = property.getValue(record);
      return value !== null && value !== undefined;
    };
    return [presenceKey, valueKey];
  }

  return [valueKey];
}

/**
 * Build the sort expressions of a request
 *
 * Sortable columns with a sort directive are taken in ascending `order`,
 * keeping request order among equal priorities. A `NaN` order sorts last.
 *
 * @throws PropertyNotFoundError if a sorted column does not resolve to an attribute
 */
export function createSortExpressions<S extends ModelSchema>(
  request: GridRequest,
  resolver: PropertyResolver<S>
): OrderExpression<ModelRecord<S>>[] {
  // Array.prototype.sort is stable
  const sortedColumns = request.columns.filter(isSorted).sort((a, b) => compareOrder(a.sort, b.sort));

  const expressions: OrderExpression<ModelRecord<S>>[] = [];
  for (const column of sortedColumns) {
    const property = resolver.resolve(sourceName(column));
    for (const keySelector of createSortKeys(property)) {
      expressions.push(
        Object.freeze({ column, sort: column.sort, direction: column.sort.direction, keySelector })
      );
    }
  }

  return expressions;
}
