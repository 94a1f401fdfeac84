import { describe, it, expect } from 'vitest';
import { createColumnFilterExpressions } from '../expressions/ColumnFilterExpressionBuilder.js';
import { ProviderRegistry } from '../expressions/ProviderRegistry.js';
import { PropertyResolver } from '../model/PropertyResolver.js';
import { CreatorNotFoundError, ProviderDeclinedError } from '../errors.js';
import type { GridRequest } from '../request/types.js';
import { Person, column, person, searchProviders } from './fixtures.js';

describe('createColumnFilterExpressions()', () => {
  const resolver = new PropertyResolver(Person);
  const registry = new ProviderRegistry(searchProviders);

  const build = (request: GridRequest) => createColumnFilterExpressions(request, resolver, registry);

  it('should return null when no column has a filter value', () => {
    const request: GridRequest = {
      columns: [
        column('name', { isSearchable: true }),
        column('score', { search: null }),
        column('role', { search: { value: ' ' } }),
      ],
      search: { value: 'ann' },
    };

    expect(build(request)).toBeNull();
  });

  it('should build one expression per filtered column in column order', () => {
    const request: GridRequest = {
      columns: [
        column('score', { search: { value: '10' } }),
        column('name'),
        column('role', { isSearchable: true, search: { value: 'admin' } }),
      ],
    };

    const expressions = build(request);
    expect(expressions?.map((e) => e.column.name)).toEqual(['score', 'role']);
    expect(expressions?.[0]?.search).toBe(request.columns[0]?.search);
  });

  it('should filter columns that are not flagged searchable', () => {
    const expressions = build({ columns: [column('name', { search: { value: 'pet' } })] });

    expect(expressions).toHaveLength(1);
    expect(expressions?.[0]?.predicate(person({ name: 'Petras' }))).toBe(true);
    expect(expressions?.[0]?.predicate(person({ name: 'Anna' }))).toBe(false);
  });

  it('should throw ProviderDeclinedError when a provider cannot use the value', () => {
    let caught: unknown;
    try {
      build({ columns: [column('score', { search: { value: 'abc' } })] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ProviderDeclinedError);
    if (caught instanceof ProviderDeclinedError) {
      expect(caught.propertyName).toBe('score');
      expect(caught.value).toBe('abc');
      expect(caught.modelName).toBe('Person');
    }
  });

  it('should throw CreatorNotFoundError for a type without a provider', () => {
    expect(() => build({ columns: [column('active', { search: { value: 'true' } })] })).toThrow(
      CreatorNotFoundError
    );
  });
});
