import type { GameRecord } from '../types/index.js';

export type SortOrder = 'newest' | 'oldest' | 'alpha' | 'rating';

/** `"all"` or a four digit year such as `"2021"` */
export type YearFilter = 'all' | (string & {});

export interface FilterState {
  readonly searchTerm: string;
  readonly year: YearFilter;
  readonly sortOrder: SortOrder;
}

export interface MonthGroup {
  /** 0 = January; null for the bucket of games without a usable date */
  readonly month: number | null;
  readonly label: string;
  readonly games: readonly GameRecord[];
}

export interface YearGroup {
  /** null for the trailing "Unknown Date" group */
  readonly year: number | null;
  readonly label: string;
  readonly count: number;
  readonly months: readonly MonthGroup[];
}

export interface RenderCursor {
  readonly groups: readonly YearGroup[];
  readonly groupIndex: number;
  readonly displayedCount: number;
  readonly totalCount: number;
  /** Changes with every filter change; a load-more for an older generation is dropped */
  readonly generation: number;
}

export interface CursorStep {
  readonly cursor: RenderCursor;
  readonly appended: readonly YearGroup[];
}

export interface ChartModel {
  readonly labels: readonly string[];
  readonly values: readonly number[];
}

/**
 * Draws the per-year chart. `update` replaces the drawing made by `render`.
 */
export interface ChartAdapter {
  render(model: ChartModel): void;
  update(model: ChartModel): void;
  destroy?(): void;
}

/**
 * Output side of the engine. Implementations turn group batches into a view.
 */
export interface TimelineRenderer {
  /** Clear previous output ahead of a new filtered list */
  reset(totalCount: number): void;
  appendGroups(groups: readonly YearGroup[]): void;
  showEmpty(): void;
  /** `null` removes the control */
  updateLoadMore(cursor: RenderCursor | null): void;
}

export interface TimelineObservers {
  onFilter?: (games: readonly GameRecord[], state: FilterState) => void;
  onBatch?: (appended: readonly YearGroup[], cursor: RenderCursor) => void;
  onStateChange?: (state: FilterState) => void;
}

export interface CountdownTarget {
  readonly end: string | null;
  write(text: string): void;
}

/** The pieces of `window.location` the URL codec reads */
export interface LocationLike {
  readonly pathname: string;
  readonly search: string;
}

/** The piece of `window.history` the URL codec writes */
export interface HistoryLike {
  replaceState(data: unknown, unused: string, url?: string | URL | null): void;
}
