import { CONFIG } from '../../config.js';

/**
 * Parse an artifact date string. Returns null for missing or unparsable input.
 * @param value
 */
export function parseGameDate(value: string | null | undefined): Date | null {
  if (!value || typeof value !== 'string') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Epoch milliseconds for sorting; unparsable dates sort as the smallest value.
 * @param value
 */
export function dateSortKey(value: string | null | undefined): number {
  const date = parseGameDate(value);
  return date ? date.getTime() : Number.NEGATIVE_INFINITY;
}

/**
 * Local calendar year of a date string, or null
 * @param value
 */
export function localYearOf(value: string | null | undefined): number | null {
  const date = parseGameDate(value);
  return date ? date.getFullYear() : null;
}

/**
 * "Jun 1, 2019" style label; "Unknown" for missing or bad input
 * @param value
 */
export function formatDisplayDate(value: string | null | undefined): string {
  const date = parseGameDate(value);
  if (!date) {
    return 'Unknown';
  }
  return date.toLocaleDateString(CONFIG.DATES.LOCALE, { month: 'short', day: 'numeric', year: 'numeric' });
}
