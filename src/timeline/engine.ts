import { CONFIG } from '../config.js';
import type { Dataset, GameRecord } from '../types/index.js';
import { CleanupManager, Debouncer, browserTimerHost, type TimerHost } from '../utils/cleanupManager.js';
import { safeSync } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';
import { CountdownScheduler } from './countdown.js';
import { advanceCursor, createCursor, hasMore } from './cursor.js';
import { applyFilters } from './filters/apply.js';
import { groupGamesByDate } from './grouping.js';
import { createFilterState, filterStatesEqual, isDefaultFilterState } from './state.js';
import { StatisticsView } from './statisticsView.js';
import type {
  ChartAdapter,
  ChartModel,
  CountdownTarget,
  FilterState,
  HistoryLike,
  LocationLike,
  RenderCursor,
  SortOrder,
  TimelineObservers,
  TimelineRenderer,
  YearGroup
} from './types.js';
import { decodeFilterState, replaceUrlState } from './utils/url.js';

const log = logger.child('timeline');

export interface TimelineEngineOptions {
  renderer: TimelineRenderer;
  chart?: ChartAdapter | null;
  observers?: TimelineObservers;
  /** Countdown elements currently on screen; omit to run without countdowns */
  countdownTargets?: () => readonly CountdownTarget[];
  /** Source of the initial filter state and target of `replaceState` */
  location?: LocationLike | null;
  history?: HistoryLike | null;
  timers?: TimerHost;
  batchSize?: number;
  debounceMs?: number;
  countdownIntervalMs?: number;
  now?: () => number;
}

interface CommitOptions {
  syncUrl: boolean;
  updateChart: boolean;
}

type ResolvedObservers = Required<TimelineObservers>;

const noop = (): void => {};

/**
 * One per page. Owns the filter state, the render cursor, the search debounce
 * and the countdown interval; every mutation goes through its methods.
 */
export class TimelineEngine {
  private readonly dataset: Dataset;
  private readonly renderer: TimelineRenderer;
  private readonly observers: ResolvedObservers;
  private readonly location: LocationLike | null;
  private readonly history: HistoryLike | null;
  private readonly batchSize: number;
  private readonly resources: CleanupManager;
  private readonly searchDebouncer: Debouncer<[string]>;
  private readonly statistics: StatisticsView | null;
  private readonly countdowns: CountdownScheduler | null;

  private state: FilterState;
  private filtered: readonly GameRecord[];
  private cursor: RenderCursor;
  private generation: number;
  private started: boolean;
  private disposed: boolean;

  constructor(dataset: Dataset, options: TimelineEngineOptions) {
    this.dataset = dataset;
    this.renderer = options.renderer;
    this.observers = {
      onFilter: options.observers?.onFilter ?? noop,
      onBatch: options.observers?.onBatch ?? noop,
      onStateChange: options.observers?.onStateChange ?? noop
    };
    this.location = options.location ?? null;
    this.history = options.history ?? null;
    this.batchSize = options.batchSize ?? CONFIG.UI.BATCH_SIZE;
    this.resources = new CleanupManager(options.timers ?? browserTimerHost);
    this.searchDebouncer = new Debouncer<[string]>(
      term => this.commitSearch(term),
      options.debounceMs ?? CONFIG.UI.DEBOUNCE_MS,
      this.resources
    );
    this.statistics = options.chart ? new StatisticsView(options.chart) : null;
    this.countdowns = options.countdownTargets
      ? new CountdownScheduler({
          collect: options.countdownTargets,
          manager: this.resources,
          intervalMs: options.countdownIntervalMs ?? CONFIG.UI.COUNTDOWN_INTERVAL_MS,
          now: options.now
        })
      : null;
    if (this.countdowns) {
      const countdowns = this.countdowns;
      this.resources.addCleanupCallback(() => countdowns.stop());
    }
    if (this.statistics) {
      const statistics = this.statistics;
      this.resources.addCleanupCallback(() => statistics.destroy());
    }

    this.state = createFilterState();
    this.filtered = [];
    this.generation = 0;
    this.cursor = createCursor([], this.generation);
    this.started = false;
    this.disposed = false;
  }

  /**
   * Read the filter state from the URL, render the first batch, draw the chart and
   * start the countdowns. The URL is left untouched.
   */
  start(): void {
    if (this.started || this.disposed) {
      return;
    }
    this.started = true;

    const initial = this.location ? decodeFilterState(this.location.search) : this.state;
    log.debug('Starting timeline', initial);

    if (this.statistics) {
      const statistics = this.statistics;
      safeSync<ChartModel | null>(
        () => statistics.render(this.dataset.statistics),
        'Failed to draw the initial chart',
        null
      );
    }
    this.commit(initial, { syncUrl: false, updateChart: !isDefaultFilterState(initial) });
    this.countdowns?.start();
    log.info(`Timeline ready with ${this.dataset.allGames.length} games`);
  }

  /**
   * Queue a search. Only the last term of a burst is applied, once typing has been
   * idle for the debounce delay.
   * @param term
   */
  setSearchTerm(term: string): void {
    if (this.disposed) {
      return;
    }
    this.searchDebouncer.schedule(typeof term === 'string' ? term : '');
  }

  /**
   * Apply a queued search immediately
   * @returns whether a search was pending
   */
  flushSearch(): boolean {
    return this.searchDebouncer.flush();
  }

  get searchPending(): boolean {
    return this.searchDebouncer.pending;
  }

  setYear(year: string): void {
    this.update({ year });
  }

  setSortOrder(sortOrder: SortOrder | string): void {
    this.update({ sortOrder });
  }

  /**
   * Replace the whole filter state at once, e.g. after back/forward navigation
   * @param query - location.search style string
   */
  restoreFromQuery(query: string): void {
    if (this.disposed) {
      return;
    }
    this.searchDebouncer.cancel();
    this.commit(decodeFilterState(query), { syncUrl: false, updateChart: true });
  }

  /**
   * Reveal the next batch of year groups.
   * @param generation - Cursor generation the request was issued for; a request from
   *   before the latest filter change is ignored
   * @returns whether anything was appended
   */
  loadMore(generation?: number): boolean {
    if (this.disposed) {
      return false;
    }
    if (generation !== undefined && generation !== this.cursor.generation) {
      log.debug('Ignoring load-more for a stale cursor', { generation, current: this.cursor.generation });
      return false;
    }
    if (!hasMore(this.cursor)) {
      return false;
    }
    return safeSync(() => this.step(), 'Failed to load more games', false);
  }

  getState(): FilterState {
    return this.state;
  }

  getCursor(): RenderCursor {
    return this.cursor;
  }

  getFilteredGames(): readonly GameRecord[] {
    return this.filtered;
  }

  /** Listeners and timers registered here are released by `dispose()` */
  get cleanup(): CleanupManager {
    return this.resources;
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    log.debug('Disposing timeline', this.resources.getStats());
    this.searchDebouncer.cancel();
    this.resources.cleanup();
  }

  private update(patch: Partial<Record<keyof FilterState, unknown>>): void {
    if (this.disposed) {
      return;
    }
    const next = createFilterState({ ...this.state, ...patch });
    if (this.started && filterStatesEqual(next, this.state)) {
      return;
    }
    this.commit(next, { syncUrl: true, updateChart: true });
  }

  private commitSearch(term: string): void {
    this.update({ searchTerm: term });
  }

  /**
   * Run the pipeline for `next` and rebuild the cursor from scratch. On failure the
   * previous state, list and cursor stay in place.
   */
  private commit(next: FilterState, options: CommitOptions): void {
    const previous = { state: this.state, filtered: this.filtered, cursor: this.cursor };

    const ok = safeSync(
      () => {
        const filtered = applyFilters(this.dataset.allGames, next);
        const groups = groupGamesByDate(filtered);

        this.generation += 1;
        this.state = next;
        this.filtered = filtered;
        this.cursor = createCursor(groups, this.generation);

        this.renderer.reset(this.cursor.totalCount);
        if (this.cursor.totalCount === 0) {
          this.renderer.showEmpty();
          this.renderer.updateLoadMore(null);
        } else {
          this.step();
        }
        return true;
      },
      'Failed to apply filters',
      false
    );

    if (!ok) {
      this.state = previous.state;
      this.filtered = previous.filtered;
      this.cursor = previous.cursor;
      return;
    }

    log.debug(`Showing ${this.filtered.length} of ${this.dataset.allGames.length} games`);

    if (options.syncUrl && this.location && this.history) {
      const loc = this.location;
      const history = this.history;
      safeSync(() => replaceUrlState(this.state, loc, history), 'Failed to update the URL', false);
    }
    if (options.updateChart && this.statistics) {
      const statistics = this.statistics;
      safeSync<ChartModel | null>(() => statistics.update(this.filtered), 'Failed to update the chart', null);
    }

    this.notify('onStateChange', () => this.observers.onStateChange(this.state));
    this.notify('onFilter', () => this.observers.onFilter(this.filtered, this.state));
  }

  private step(): boolean {
    const { cursor, appended } = advanceCursor(this.cursor, this.batchSize);
    if (appended.length === 0) {
      return false;
    }
    this.cursor = cursor;
    this.renderer.appendGroups(appended);
    this.renderer.updateLoadMore(hasMore(cursor) ? cursor : null);
    this.notifyBatch(appended, cursor);
    return true;
  }

  private notifyBatch(appended: readonly YearGroup[], cursor: RenderCursor): void {
    this.notify('onBatch', () => this.observers.onBatch(appended, cursor));
  }

  private notify(name: keyof TimelineObservers, call: () => void): void {
    safeSync(call, `Timeline observer ${name} failed`, undefined);
  }
}
