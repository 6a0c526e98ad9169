import type { GameRecord } from '../../types/index.js';
import { ALL_YEARS, SORT_ORDERS } from '../constants.js';
import type { FilterState, SortOrder } from '../types.js';
import { dateSortKey, localYearOf } from '../utils/dates.js';

/**
 * Lower-cased, trimmed search needle; empty string means "no search".
 * @param searchTerm
 */
export function normalizeSearchTerm(searchTerm: unknown): string {
  return typeof searchTerm === 'string' ? searchTerm.trim().toLowerCase() : '';
}

export function isSortOrder(value: unknown): value is SortOrder {
  return typeof value === 'string' && (SORT_ORDERS as readonly string[]).includes(value);
}

/**
 * Name contains the (already normalized) needle, case-insensitively.
 */
export function matchesSearch(game: GameRecord, needle: string): boolean {
  if (!needle) {
    return true;
  }
  return typeof game.name === 'string' && game.name.toLowerCase().includes(needle);
}

/**
 * Local calendar year of `firstFreeDate` equals `year`. Unparsable dates never match
 * a specific year.
 */
export function matchesYear(game: GameRecord, year: string): boolean {
  if (!year || year === ALL_YEARS) {
    return true;
  }
  const gameYear = localYearOf(game.firstFreeDate);
  return gameYear !== null && String(gameYear) === year;
}

interface DecoratedGame {
  game: GameRecord;
  index: number;
  key: number | string;
}

function compareNumbers(left: number, right: number): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function sortKeyFor(game: GameRecord, order: SortOrder): number | string {
  switch (order) {
    case 'alpha':
      return typeof game.name === 'string' ? game.name : '';
    case 'rating':
      return typeof game.rating === 'number' && Number.isFinite(game.rating) ? game.rating : 0;
    case 'oldest':
    case 'newest':
    default:
      return dateSortKey(game.firstFreeDate);
  }
}

function compareDecorated(order: SortOrder, left: DecoratedGame, right: DecoratedGame): number {
  let result: number;
  if (typeof left.key === 'string' && typeof right.key === 'string') {
    result = left.key.localeCompare(right.key);
  } else {
    const leftKey = typeof left.key === 'number' ? left.key : 0;
    const rightKey = typeof right.key === 'number' ? right.key : 0;
    result = compareNumbers(leftKey, rightKey);
    if (order === 'newest' || order === 'rating') {
      result = -result;
    }
  }
  return result !== 0 ? result : left.index - right.index;
}

/**
 * Return a sorted copy. Ties keep their input order; unknown orders sort as `newest`.
 * @param games
 * @param sortOrder
 */
export function sortGames(games: readonly GameRecord[], sortOrder: unknown): GameRecord[] {
  const order: SortOrder = isSortOrder(sortOrder) ? sortOrder : 'newest';
  const decorated: DecoratedGame[] = games.map((game, index) => ({
    game,
    index,
    key: sortKeyFor(game, order)
  }));
  decorated.sort((left, right) => compareDecorated(order, left, right));
  return decorated.map(entry => entry.game);
}

/**
 * The filter/sort pipeline: search, then year, then sort. Pure; the input array is
 * never modified.
 * @param games - Full game list from the dataset snapshot
 * @param state - Current filter state
 */
export function applyFilters(games: readonly GameRecord[], state: FilterState): GameRecord[] {
  const needle = normalizeSearchTerm(state.searchTerm);
  const year = typeof state.year === 'string' ? state.year : ALL_YEARS;

  const filtered = games.filter(game => matchesSearch(game, needle) && matchesYear(game, year));
  return sortGames(filtered, state.sortOrder);
}
