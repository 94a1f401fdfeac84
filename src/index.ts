/**
 * grid-query-expressions - Filter and sort expressions for data grid requests
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { ExpressionCreator, defineModel } from 'grid-query-expressions';
 *
 * const Person = defineModel('Person', z.object({
 *   name: z.string(),
 *   age: z.number().int().nullable(),
 * }));
 *
 * const creator = new ExpressionCreator(Person, {
 *   search: { value: 'ann' },
 *   columns: [
 *     { name: 'name', isSearchable: true, isSortable: true, sort: { order: 0, direction: 'asc' } },
 *     { name: 'age', isSearchable: false, isSortable: true },
 *   ],
 * }, { searchProviders: [stringContains] });
 *
 * const { searchExpressions, sortExpressions } = creator.createExpressions();
 * ```
 */

// Expressions
export { ExpressionCreator } from './expressions/ExpressionCreator.js';
export type { ExpressionCreatorOptions } from './expressions/ExpressionCreator.js';
export { ProviderRegistry } from './expressions/ProviderRegistry.js';
export { createSearchExpressions } from './expressions/SearchExpressionBuilder.js';
export { createColumnFilterExpressions } from './expressions/ColumnFilterExpressionBuilder.js';
export { createSortExpressions, toComparable } from './expressions/SortExpressionBuilder.js';
export type {
  ComparableValue,
  ExpressionProvider,
  FilterContext,
  FilterExpression,
  OrderExpression,
  Predicate,
  QueryableExpressions,
  SortKey,
  ValuePredicate,
} from './expressions/types.js';

// Models
export { defineModel } from './model/defineModel.js';
export { PropertyResolver, kindOf } from './model/PropertyResolver.js';
export { isNullableValueType, isValueKind, formatPropertyType } from './model/types.js';
export type {
  ModelDefinition,
  ModelRecord,
  ModelSchema,
  PropertyDescriptor,
  PropertyKind,
  PropertyNameMatching,
  PropertyType,
  ReferenceKind,
  ValueKind,
} from './model/types.js';

// Requests
export { hasCriterion, sourceName } from './request/types.js';
export type { Column, GridRequest, Search, Sort, SortDirection } from './request/types.js';

// Errors
export {
  GridExpressionError,
  PropertyNotFoundError,
  CreatorNotFoundError,
  ProviderDeclinedError,
  isGridExpressionError,
} from './errors.js';
