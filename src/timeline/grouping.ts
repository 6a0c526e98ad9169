import type { GameRecord } from '../types/index.js';
import { MONTH_NAMES, UNDATED_LABEL } from './constants.js';
import type { MonthGroup, YearGroup } from './types.js';
import { parseGameDate } from './utils/dates.js';

/**
 * Partition an ordered game list into years (newest first) and months (December
 * first). Order inside a month is the input order; nothing here re-sorts games.
 * Records whose date does not parse go to one trailing "Unknown Date" group, so
 * every input game lands in exactly one group.
 * @param games - Output of the filter/sort pipeline
 */
export function groupGamesByDate(games: readonly GameRecord[]): YearGroup[] {
  const buckets = new Map<number, Map<number, GameRecord[]>>();
  const undated: GameRecord[] = [];

  for (const game of games) {
    const date = parseGameDate(game.firstFreeDate);
    if (!date) {
      undated.push(game);
      continue;
    }
    const year = date.getFullYear();
    const month = date.getMonth();

    let months = buckets.get(year);
    if (!months) {
      months = new Map();
      buckets.set(year, months);
    }
    const bucket = months.get(month);
    if (bucket) {
      bucket.push(game);
    } else {
      months.set(month, [game]);
    }
  }

  const groups: YearGroup[] = Array.from(buckets.entries())
    .sort(([leftYear], [rightYear]) => rightYear - leftYear)
    .map(([year, months]) => {
      const monthGroups: MonthGroup[] = Array.from(months.entries())
        .sort(([leftMonth], [rightMonth]) => rightMonth - leftMonth)
        .map(([month, monthGames]) => ({
          month,
          label: MONTH_NAMES[month],
          games: monthGames
        }));
      return {
        year,
        label: String(year),
        count: monthGroups.reduce((total, group) => total + group.games.length, 0),
        months: monthGroups
      };
    });

  if (undated.length > 0) {
    groups.push({
      year: null,
      label: UNDATED_LABEL,
      count: undated.length,
      months: [{ month: null, label: UNDATED_LABEL, games: undated }]
    });
  }

  return groups;
}

export function countGroupedGames(groups: readonly YearGroup[]): number {
  return groups.reduce((total, group) => total + group.count, 0);
}
