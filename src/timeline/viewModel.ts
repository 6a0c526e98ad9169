import type { GameRecord, StatisticsSummary } from '../types/index.js';
import { FALLBACK_PLATFORM_ICON, PLATFORM_ICONS } from './constants.js';
import type { MonthGroup, YearGroup } from './types.js';
import { formatDisplayDate } from './utils/dates.js';

export interface GameCardModel {
  id: string;
  name: string;
  link: string;
  image: string | null;
  platform: string;
  platformIcon: string;
  dateLabel: string;
  /** null when the game has no rating */
  ratingLabel: string | null;
}

export interface MonthSectionModel {
  heading: string;
  cards: GameCardModel[];
}

export interface YearSectionModel {
  year: number | null;
  heading: string;
  months: MonthSectionModel[];
}

export interface SummaryTileModel {
  value: string;
  label: string;
}

export function getPlatformIcon(platform: unknown): string {
  if (typeof platform !== 'string') {
    return FALLBACK_PLATFORM_ICON;
  }
  return PLATFORM_ICONS[platform.toUpperCase()] ?? FALLBACK_PLATFORM_ICON;
}

/**
 * Rating as shown on cards, or null for a missing, zero or non-numeric rating.
 * @param rating
 * @param suffix - "/5" on timeline cards, " / 5.00" on upcoming cards
 */
export function formatRating(rating: unknown, suffix = '/5'): string | null {
  if (typeof rating !== 'number' || !Number.isFinite(rating) || rating <= 0) {
    return null;
  }
  return `${rating.toFixed(2)}${suffix}`;
}

export function buildGameCardModel(game: GameRecord): GameCardModel {
  const platform = typeof game.platform === 'string' && game.platform ? game.platform : 'UNKNOWN';
  return {
    id: String(game.id),
    name: game.name,
    link: game.link,
    image: typeof game.image === 'string' && game.image ? game.image : null,
    platform,
    platformIcon: getPlatformIcon(platform),
    dateLabel: `Free: ${formatDisplayDate(game.firstFreeDate)}`,
    ratingLabel: formatRating(game.rating)
  };
}

function pluralGames(count: number): string {
  return `${count} ${count === 1 ? 'game' : 'games'}`;
}

export function buildMonthSectionModel(group: MonthGroup): MonthSectionModel {
  return {
    heading: `${group.label} (${pluralGames(group.games.length)})`,
    cards: group.games.map(buildGameCardModel)
  };
}

/**
 * View model for one year section of the timeline
 * @param group
 */
export function buildYearSectionModel(group: YearGroup): YearSectionModel {
  return {
    year: group.year,
    heading: group.label,
    months: group.months.map(buildMonthSectionModel)
  };
}

export function describeResultCount(shown: number, total: number): string {
  return `Showing ${shown} of ${total} games`;
}

/**
 * Headline numbers for the summary cards. Optional statistics fields only get a
 * card when the dataset carries them; "Free Now" is always shown.
 * @param statistics
 * @param currentCount - Number of games free right now
 */
export function buildSummaryTiles(statistics: StatisticsSummary, currentCount: number): SummaryTileModel[] {
  const tiles: SummaryTileModel[] = [];
  if (statistics.totalGames !== undefined) {
    tiles.push({ value: String(statistics.totalGames), label: 'Total Games' });
  }
  tiles.push({ value: String(currentCount), label: 'Free Now' });
  if (statistics.totalPromotions !== undefined) {
    tiles.push({ value: String(statistics.totalPromotions), label: 'Total Promotions' });
  }
  if (statistics.avgGamesPerWeek !== undefined) {
    tiles.push({ value: statistics.avgGamesPerWeek.toFixed(1), label: 'Games/Week' });
  }
  if (statistics.firstGameDate) {
    tiles.push({ value: formatDisplayDate(statistics.firstGameDate), label: 'Tracking Since' });
  }
  return tiles;
}
