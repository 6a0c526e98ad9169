import type { GameRecord, StatisticsSummary } from '../types/index.js';
import type { ChartModel } from './types.js';
import { localYearOf } from './utils/dates.js';

/**
 * Per-year counts of the given list, keyed by year string. Games without a usable
 * date are not counted.
 * @param games
 */
export function countGamesByYear(games: readonly GameRecord[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const game of games) {
    const year = localYearOf(game.firstFreeDate);
    if (year === null) {
      continue;
    }
    const key = String(year);
    counts[key] = (counts[key] || 0) + 1;
  }
  return counts;
}

/**
 * Chart labels and values with years ascending, whatever order the list is in.
 * Non-numeric keys and non-finite counts are dropped.
 * @param gamesByYear
 */
export function buildChartModel(gamesByYear: Readonly<Record<string, number>>): ChartModel {
  const entries = Object.entries(gamesByYear)
    .filter(([year, count]) => /^\d+$/.test(year) && Number.isFinite(count))
    .sort(([left], [right]) => Number(left) - Number(right));

  return {
    labels: entries.map(([year]) => year),
    values: entries.map(([, count]) => count)
  };
}

/**
 * Year select options, newest first, from the precomputed summary.
 * @param statistics
 */
export function listSummaryYears(statistics: StatisticsSummary): string[] {
  return buildChartModel(statistics.gamesByYear).labels.slice().reverse();
}
