import { z } from 'zod';
import { defineModel } from '../model/defineModel.js';
import type { ModelRecord } from '../model/types.js';
import type { ExpressionProvider } from '../expressions/types.js';
import type { Column } from '../request/types.js';

export const Person = defineModel(
  'Person',
  z.object({
    name: z.string(),
    email: z.string().nullable(),
    age: z.number().int().nullable(),
    score: z.number(),
    visits: z.number().default(0),
    active: z.boolean(),
    joinedAt: z.date(),
    role: z.enum(['admin', 'member']),
    address: z.object({ city: z.string() }).nullable(),
    tags: z.array(z.string()),
  })
);

export type PersonRecord = ModelRecord<typeof Person.schema>;

export function person(overrides: Partial<PersonRecord> = {}): PersonRecord {
  return {
    name: 'Anna',
    email: 'anna@example.com',
    age: 30,
    score: 10,
    visits: 0,
    active: true,
    joinedAt: new Date('2024-01-02T00:00:00Z'),
    role: 'member',
    address: { city: 'Vilnius' },
    tags: [],
    ...overrides,
  };
}

export function column(name: string, overrides: Partial<Column> = {}): Column {
  return { name, isSearchable: false, isSortable: false, ...overrides };
}

/** Case-insensitive substring match */
export const stringContains: ExpressionProvider = {
  targetType: 'string',
  createPredicate: ({ search }) => {
    const needle = search.value.toLowerCase();
    return (value) => typeof value === 'string' && value.toLowerCase().includes(needle);
  },
};

/** Exact string match */
export const stringEquals: ExpressionProvider = {
  targetType: 'string',
  createPredicate: ({ search }) => (value) => value === search.value,
};

/** Numeric equality, declines values that are not numbers */
export const numberEquals: ExpressionProvider = {
  targetType: 'number',
  createPredicate: ({ search }) => {
    const expected = Number(search.value);
    if (Number.isNaN(expected)) {
      return null;
    }
    return (value) => value === expected;
  },
};

export const enumEquals: ExpressionProvider = {
  targetType: 'enum',
  createPredicate: ({ search }) => (value) => value === search.value,
};

export const searchProviders: readonly ExpressionProvider[] = [stringContains, numberEquals, enumEquals];
