import { ALL_YEARS, DEFAULT_FILTER_STATE } from './constants.js';
import { isSortOrder } from './filters/apply.js';
import type { FilterState, SortOrder, YearFilter } from './types.js';

const YEAR_PATTERN = /^\d{4}$/;

/**
 * `"all"` or a four digit year; anything else becomes `"all"`.
 * @param value
 */
export function normalizeYear(value: unknown): YearFilter {
  if (typeof value !== 'string') {
    return ALL_YEARS;
  }
  const trimmed = value.trim();
  return YEAR_PATTERN.test(trimmed) ? trimmed : ALL_YEARS;
}

export function normalizeSortOrder(value: unknown): SortOrder {
  return isSortOrder(value) ? value : DEFAULT_FILTER_STATE.sortOrder;
}

/**
 * Build a complete, frozen filter state from loose input, substituting defaults
 * for missing or malformed fields.
 * @param input
 */
export function createFilterState(input: Partial<Record<keyof FilterState, unknown>> = {}): FilterState {
  return Object.freeze({
    searchTerm: typeof input.searchTerm === 'string' ? input.searchTerm : DEFAULT_FILTER_STATE.searchTerm,
    year: normalizeYear(input.year),
    sortOrder: normalizeSortOrder(input.sortOrder)
  });
}

export function filterStatesEqual(left: FilterState, right: FilterState): boolean {
  return left.searchTerm === right.searchTerm && left.year === right.year && left.sortOrder === right.sortOrder;
}

export function isDefaultFilterState(state: FilterState): boolean {
  return (
    state.searchTerm.trim() === DEFAULT_FILTER_STATE.searchTerm &&
    state.year === DEFAULT_FILTER_STATE.year &&
    state.sortOrder === DEFAULT_FILTER_STATE.sortOrder
  );
}
