/**
 * Type definitions for grid request descriptors
 *
 * These mirror what a data grid sends for a page of rows: one entry per
 * column, an optional global search and optional per-column sort directives.
 * Turning an HTTP request into these descriptors is left to the caller.
 */

/** Sort direction */
export type SortDirection = 'asc' | 'desc';

/** A search or filter criterion */
export interface Search {
  value: string;
  /** Whether the grid asked for the value to be treated as a regular expression */
  isRegex?: boolean;
}

/** A sort directive for a single column */
export interface Sort {
  /** Priority among sorted columns, lowest first */
  order: number;
  direction: SortDirection;
}

/** A grid column */
export interface Column {
  name: string;
  /**
   * Model attribute backing the column
   * When set, resolution uses this instead of `name`
   */
  field?: string | null;
  isSearchable: boolean;
  isSortable: boolean;
  /** Per-column filter value */
  search?: Search | null;
  sort?: Sort | null;
}

/** Grid request descriptor */
export interface GridRequest {
  columns: readonly Column[];
  /** Global search applied across all searchable columns */
  search?: Search | null;
}

/**
 * Checks whether a search carries a usable value
 * Absent and whitespace-only values both count as "no criterion".
 */
export function hasCriterion(search: Search | null | undefined): search is Search {
  return search !== null && search !== undefined && search.value.trim() !== '';
}

/**
 * Name used to look up the model attribute for a column
 */
export function sourceName(column: Column): string {
  return column.field ?? column.name;
}
