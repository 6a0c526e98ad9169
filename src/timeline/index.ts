import { fetchDataset } from '../api.js';
import type { Dataset } from '../types/index.js';
import { getUserMessage } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';
import { TimelineEngine } from './engine.js';
import { SvgBarChart } from './ui/chart.js';
import { bindControls, populateFilterOptions, syncControls } from './ui/controls.js';
import { getTimelineElements, type TimelineElements } from './ui/elements.js';
import {
  LOAD_FAILURE_MESSAGE,
  collectCountdownTargets,
  renderLastUpdated,
  renderSummaryTiles,
  showLoadFailure,
  updateResultCount
} from './ui/page.js';
import { DomTimelineRenderer } from './ui/render.js';
import { renderCurrentGames, renderUpcomingGames } from './ui/upcoming.js';
import { formatDisplayDate } from './utils/dates.js';
import { buildSummaryTiles, describeResultCount } from './viewModel.js';

export { TimelineEngine } from './engine.js';
export type { TimelineEngineOptions } from './engine.js';
export { applyFilters, sortGames } from './filters/apply.js';
export { groupGamesByDate } from './grouping.js';
export { advanceCursor, createCursor, hasMore } from './cursor.js';
export { decodeFilterState, encodeFilterState } from './utils/url.js';
export { formatTimeRemaining } from './countdown.js';
export type * from './types.js';

/**
 * Wire a loaded dataset to the page: static sections, the engine and its controls.
 * Returns null when the page has no timeline container.
 */
export function mountTimeline(dataset: Dataset, elements: TimelineElements = getTimelineElements()): TimelineEngine | null {
  const { timeline } = elements;
  if (!timeline) {
    logger.warn('Timeline container not found, skipping initialization');
    return null;
  }

  renderCurrentGames(elements.currentGrid, dataset.currentGames);
  renderUpcomingGames(elements.upcomingGrid, elements.upcomingSection, dataset.upcomingGames);
  renderLastUpdated(elements.lastUpdated, dataset.lastUpdated ? formatDisplayDate(dataset.lastUpdated) : null);
  renderSummaryTiles(elements.statsGrid, buildSummaryTiles(dataset.statistics, dataset.currentGames.length));
  populateFilterOptions(elements, dataset.statistics);

  let engine: TimelineEngine | null = null;
  const renderer = new DomTimelineRenderer({
    timeline,
    noResults: elements.noResults,
    loadingMessage: elements.loadingMessage,
    onLoadMore: generation => engine?.loadMore(generation)
  });

  engine = new TimelineEngine(dataset, {
    renderer,
    chart: elements.chart ? new SvgBarChart(elements.chart) : null,
    countdownTargets: () => collectCountdownTargets(document),
    location: window.location,
    history: window.history,
    observers: {
      onStateChange: state => syncControls(elements, state),
      onFilter: games => updateResultCount(elements.resultCount, describeResultCount(games.length, dataset.allGames.length))
    }
  });

  bindControls(engine, elements);
  engine.start();
  return engine;
}

/**
 * Page entry point: load the dataset, then mount the timeline. A failed load leaves
 * one visible status message and nothing else initialized.
 */
export async function initTimelinePage(): Promise<TimelineEngine | null> {
  if (typeof document === 'undefined') {
    return null;
  }

  const elements = getTimelineElements();
  let dataset: Dataset;
  try {
    dataset = await fetchDataset();
  } catch (error) {
    logger.exception('Failed to load games data', error);
    showLoadFailure(elements, `${LOAD_FAILURE_MESSAGE}. ${getUserMessage(error)}`);
    return null;
  }

  const engine = mountTimeline(dataset, elements);
  if (engine) {
    const activeEngine = engine;
    window.addEventListener('pagehide', () => activeEngine.dispose(), { once: true });
  }
  return engine;
}
