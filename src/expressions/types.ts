/**
 * Core type definitions for grid expressions
 */

import type { PropertyDescriptor, PropertyKind } from '../model/types.js';
import type { Column, Search, Sort, SortDirection } from '../request/types.js';

/** Function from a record to a match result */
export type Predicate<T> = (record: T) => boolean;

/** Function from an attribute value to a match result */
export type ValuePredicate = (value: unknown) => boolean;

/** Value produced by a sort key, comparable across records of one model */
export type ComparableValue = string | number | bigint | boolean | null;

/** Key-extraction function used to order records */
export type SortKey<T> = (record: T) => ComparableValue;

/** Everything a provider gets to build a predicate for one column */
export interface FilterContext {
  readonly column: Column;
  readonly search: Search;
  readonly property: PropertyDescriptor<unknown>;
}

/**
 * Type-specific builder of filter predicates
 *
 * @example
 * ```typescript
 * const stringContains: ExpressionProvider = {
 *   targetType: 'string',
 *   createPredicate: ({ search }) => {
 *     const needle = search.value.toLowerCase();
 *     return (value) => typeof value === 'string' && value.toLowerCase().includes(needle);
 *   },
 * };
 * ```
 */
export interface ExpressionProvider {
  /** Attribute kind this provider handles; nullable attributes of that kind match too */
  readonly targetType: PropertyKind;
  /**
   * Build a predicate over the attribute value
   * Returns `null` when the search value cannot be applied to this column,
   * e.g. a number provider asked to match "abc".
   */
  createPredicate(context: FilterContext): ValuePredicate | null;
}

/** Predicate built for one column, tagged with where it came from */
export interface FilterExpression<T> {
  readonly column: Column;
  readonly search: Search;
  readonly predicate: Predicate<T>;
}

/** Sort key built for one column */
export interface OrderExpression<T> {
  readonly column: Column;
  readonly sort: Sort;
  readonly direction: SortDirection;
  readonly keySelector: SortKey<T>;
}

/**
 * Result of turning a grid request into expressions
 *
 * `null` means no criteria of that kind were given and that kind of filtering
 * should be skipped. An empty list means criteria were given but no column
 * could use them.
 */
export interface QueryableExpressions<T> {
  /** OR-combine these; a record matches the global search if any predicate holds */
  readonly searchExpressions: readonly FilterExpression<T>[] | null;
  /** AND-combine these; a record must satisfy every column filter */
  readonly columnFilterExpressions: readonly FilterExpression<T>[] | null;
  /** Apply in order, each key breaking ties left by the previous ones */
  readonly sortExpressions: readonly OrderExpression<T>[];
}
