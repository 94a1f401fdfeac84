/**
 * ExpressionCreator - Turns a grid request into filter and sort expressions
 *
 * @example
 * ```typescript
 * const creator = new ExpressionCreator(Person, request, {
 *   searchProviders: [stringContains, numberEquals],
 * });
 *
 * const { searchExpressions, columnFilterExpressions, sortExpressions } = creator.createExpressions();
 *
 * let rows = people;
 * if (searchExpressions !== null && searchExpressions.length > 0) {
 *   const matches = ExpressionCreator.combine(searchExpressions.map((e) => e.predicate));
 *   rows = rows.filter(matches);
 * }
 * ```
 */

import { PropertyResolver } from '../model/PropertyResolver.js';
import type { ModelDefinition, ModelRecord, ModelSchema, PropertyNameMatching } from '../model/types.js';
import type { GridRequest } from '../request/types.js';
import { createColumnFilterExpressions } from './ColumnFilterExpressionBuilder.js';
import { ProviderRegistry } from './ProviderRegistry.js';
import { createSearchExpressions } from './SearchExpressionBuilder.js';
import { createSortExpressions } from './SortExpressionBuilder.js';
import type {
  ExpressionProvider,
  FilterExpression,
  OrderExpression,
  Predicate,
  QueryableExpressions,
} from './types.js';

/** Expression creator configuration */
export interface ExpressionCreatorOptions {
  /** Providers used for the global search */
  searchProviders: readonly ExpressionProvider[];

  /**
   * Providers used for per-column filters
   * @default searchProviders
   */
  columnFilterProviders?: readonly ExpressionProvider[];

  /**
   * How column names are matched against model attributes
   * @default 'ignoreCase'
   */
  propertyNameMatching?: PropertyNameMatching;
}

export class ExpressionCreator<S extends ModelSchema> {
  private readonly request: GridRequest;
  private readonly resolver: PropertyResolver<S>;
  private readonly searchRegistry: ProviderRegistry;
  private readonly columnFilterRegistry: ProviderRegistry;

  constructor(model: ModelDefinition<S>, request: GridRequest, options: ExpressionCreatorOptions) {
    this.request = request;
    this.resolver = new PropertyResolver(model, options.propertyNameMatching ?? 'ignoreCase');
    this.searchRegistry = new ProviderRegistry(options.searchProviders);
    this.columnFilterRegistry =
      options.columnFilterProviders !== undefined
        ? new ProviderRegistry(options.columnFilterProviders)
        : this.searchRegistry;
  }

  /**
   * OR-combine predicates into one, folding left from the first
   * Use it on the search expressions; column filters are meant to be AND-combined.
   *
   * @throws RangeError if `predicates` is empty
   */
  static combine<T>(predicates: readonly Predicate<T>[]): Predicate<T> {
    const [first, ...rest] = predicates;
    if (first === undefined) {
      throw new RangeError('Cannot combine an empty list of predicates');
    }

    return rest.reduce<Predicate<T>>(
      (combined, next) => (record) => combined(record) || next(record),
      first
    );
  }

  /**
   * Build all expressions for the request
   * Any failure aborts the whole call; nothing built so far is returned.
   */
  createExpressions(): QueryableExpressions<ModelRecord<S>> {
    const searchExpressions = this.createSearchExpressions();
    const columnFilterExpressions = this.createColumnFilterExpressions();
    const sortExpressions = this.createSortExpressions();

    return Object.freeze({ searchExpressions, columnFilterExpressions, sortExpressions });
  }

  createSearchExpressions(): FilterExpression<ModelRecord<S>>[] | null {
    return createSearchExpressions(this.request, this.resolver, this.searchRegistry);
  }

  createColumnFilterExpressions(): FilterExpression<ModelRecord<S>>[] | null {
    return createColumnFilterExpressions(this.request, this.resolver, this.columnFilterRegistry);
  }

  createSortExpressions(): OrderExpression<ModelRecord<S>>[] {
    return createSortExpressions(this.request, this.resolver);
  }
}
