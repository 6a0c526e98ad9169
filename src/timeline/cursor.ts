import { CONFIG } from '../config.js';
import { countGroupedGames } from './grouping.js';
import type { CursorStep, RenderCursor, YearGroup } from './types.js';

/**
 * Fresh cursor at the start of a grouped list.
 * @param groups
 * @param generation - Identifies the filter pass this cursor belongs to
 */
export function createCursor(groups: readonly YearGroup[], generation: number): RenderCursor {
  return Object.freeze({
    groups,
    groupIndex: 0,
    displayedCount: 0,
    totalCount: countGroupedGames(groups),
    generation
  });
}

export function hasMore(cursor: RenderCursor): boolean {
  return cursor.groupIndex < cursor.groups.length;
}

/**
 * Append whole year groups until this step has added at least `batchSize` games or
 * the groups run out. A year is never split, so a step can overshoot the batch size
 * by up to one year's worth of games.
 * @param cursor
 * @param batchSize
 */
export function advanceCursor(cursor: RenderCursor, batchSize: number = CONFIG.UI.BATCH_SIZE): CursorStep {
  const limit = Math.max(1, Math.floor(batchSize));
  const appended: YearGroup[] = [];
  let groupIndex = cursor.groupIndex;
  let loaded = 0;

  while (groupIndex < cursor.groups.length && loaded < limit) {
    const group = cursor.groups[groupIndex];
    appended.push(group);
    loaded += group.count;
    groupIndex++;
  }

  if (appended.length === 0) {
    return { cursor, appended };
  }

  return {
    cursor: Object.freeze({
      ...cursor,
      groupIndex,
      displayedCount: cursor.displayedCount + loaded
    }),
    appended
  };
}

/**
 * "X of Y shown"
 * @param cursor
 */
export function describeProgress(cursor: RenderCursor): string {
  return `${cursor.displayedCount} of ${cursor.totalCount} shown`;
}

export function loadMoreLabel(cursor: RenderCursor): string {
  return `Load More Games (${describeProgress(cursor)})`;
}
