import type { FilterState, SortOrder } from './types.js';

export const SORT_ORDERS: readonly SortOrder[] = ['newest', 'oldest', 'alpha', 'rating'];

export const DEFAULT_FILTER_STATE: FilterState = Object.freeze({
  searchTerm: '',
  year: 'all',
  sortOrder: 'newest'
});

export const ALL_YEARS = 'all';

export const URL_PARAMS = {
  SEARCH: 'search',
  YEAR: 'year',
  SORT: 'sort'
} as const;

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December'
] as const;

export const UNDATED_LABEL = 'Unknown Date';

export const PLATFORM_ICONS: Readonly<Record<string, string>> = {
  PC: '🖥️',
  IOS: '📱',
  ANDROID: '🤖'
};

export const FALLBACK_PLATFORM_ICON = '🎮';

export const SORT_LABELS: Readonly<Record<SortOrder, string>> = {
  newest: 'Newest First',
  oldest: 'Oldest First',
  alpha: 'A-Z',
  rating: 'Highest Rated'
};

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;
