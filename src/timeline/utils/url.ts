import { logger } from '../../utils/logger.js';
import { DEFAULT_FILTER_STATE, URL_PARAMS } from '../constants.js';
import { createFilterState } from '../state.js';
import type { FilterState, HistoryLike, LocationLike } from '../types.js';

/**
 * Query string for a filter state, without the leading `?`. Fields equal to their
 * default are left out, so the default state encodes to `""`.
 * @param state
 */
export function encodeFilterState(state: FilterState): string {
  const params = new URLSearchParams();
  const search = state.searchTerm.trim();

  if (search) {
    params.set(URL_PARAMS.SEARCH, search);
  }
  if (state.year && state.year !== DEFAULT_FILTER_STATE.year) {
    params.set(URL_PARAMS.YEAR, state.year);
  }
  if (state.sortOrder !== DEFAULT_FILTER_STATE.sortOrder) {
    params.set(URL_PARAMS.SORT, state.sortOrder);
  }

  return params.toString();
}

/**
 * Filter state from a query string (leading `?` optional). Missing keys take their
 * default, unknown keys are ignored and malformed values fall back to the default.
 * @param query
 */
export function decodeFilterState(query: string | null | undefined): FilterState {
  let params: URLSearchParams;
  try {
    params = new URLSearchParams(typeof query === 'string' ? query : '');
  } catch (error) {
    logger.debug('Unreadable query string, using default filters', error);
    return createFilterState();
  }

  const search = params.get(URL_PARAMS.SEARCH);
  return createFilterState({
    searchTerm: search && search.trim() ? search : DEFAULT_FILTER_STATE.searchTerm,
    year: params.get(URL_PARAMS.YEAR) ?? undefined,
    sortOrder: params.get(URL_PARAMS.SORT) ?? undefined
  });
}

/**
 * `pathname` alone for the default state, otherwise `pathname?query`
 * @param pathname
 * @param state
 */
export function buildStateUrl(pathname: string, state: FilterState): string {
  const query = encodeFilterState(state);
  return query ? `${pathname}?${query}` : pathname;
}

/**
 * Mirror the state into the address bar through `history.replaceState`, so filter
 * changes never add history entries.
 * @returns whether the URL was rewritten
 */
export function replaceUrlState(state: FilterState, loc: LocationLike, history: HistoryLike): boolean {
  const nextUrl = buildStateUrl(loc.pathname, state);
  if (nextUrl === `${loc.pathname}${loc.search}`) {
    return false;
  }
  history.replaceState({}, '', nextUrl);
  return true;
}
