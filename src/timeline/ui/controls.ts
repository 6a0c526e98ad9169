import type { StatisticsSummary } from '../../types/index.js';
import { createElement } from '../../utils/dom.js';
import { ALL_YEARS, SORT_LABELS, SORT_ORDERS } from '../constants.js';
import type { TimelineEngine } from '../engine.js';
import { listSummaryYears } from '../stats.js';
import type { FilterState } from '../types.js';
import type { TimelineElements } from './elements.js';

type ControlElements = Pick<TimelineElements, 'searchInput' | 'yearFilter' | 'sortOrder'>;

/**
 * Fill the year select from the summary ("All Years" first, newest year next) and
 * the sort select from the known orders, keeping any options already present.
 */
export function populateFilterOptions(elements: ControlElements, statistics: StatisticsSummary): void {
  const { yearFilter, sortOrder } = elements;

  if (yearFilter && yearFilter.options.length === 0) {
    yearFilter.appendChild(createElement('option', { textContent: 'All Years', attributes: { value: ALL_YEARS } }));
    listSummaryYears(statistics).forEach(year => {
      yearFilter.appendChild(createElement('option', { textContent: year, attributes: { value: year } }));
    });
  }

  if (sortOrder && sortOrder.options.length === 0) {
    SORT_ORDERS.forEach(order => {
      sortOrder.appendChild(createElement('option', { textContent: SORT_LABELS[order], attributes: { value: order } }));
    });
  }
}

/**
 * Reflect a filter state in the form controls without firing their events.
 * A year missing from the select (e.g. from a hand-edited URL) is added so the
 * control shows what is applied.
 */
export function syncControls(elements: ControlElements, state: FilterState): void {
  const { searchInput, yearFilter, sortOrder } = elements;

  if (searchInput && searchInput.value !== state.searchTerm && document.activeElement !== searchInput) {
    searchInput.value = state.searchTerm;
  }
  if (yearFilter) {
    const hasOption = Array.from(yearFilter.options).some(option => option.value === state.year);
    if (!hasOption) {
      yearFilter.appendChild(createElement('option', { textContent: state.year, attributes: { value: state.year } }));
    }
    yearFilter.value = state.year;
  }
  if (sortOrder) {
    sortOrder.value = state.sortOrder;
  }
}

/**
 * Route control events into the engine. Listeners are released with the engine.
 */
export function bindControls(engine: TimelineEngine, elements: ControlElements, win: Window = window): void {
  const { searchInput, yearFilter, sortOrder } = elements;
  const { cleanup } = engine;

  if (searchInput) {
    cleanup.addEventListener(searchInput, 'input', () => {
      engine.setSearchTerm(searchInput.value);
    });
    cleanup.addEventListener(searchInput, 'keydown', event => {
      if (event instanceof KeyboardEvent && event.key === 'Enter') {
        engine.flushSearch();
      }
    });
  }

  if (yearFilter) {
    cleanup.addEventListener(yearFilter, 'change', () => {
      engine.setYear(yearFilter.value);
    });
  }

  if (sortOrder) {
    cleanup.addEventListener(sortOrder, 'change', () => {
      engine.setSortOrder(sortOrder.value);
    });
  }

  cleanup.addEventListener(win, 'popstate', () => {
    engine.restoreFromQuery(win.location.search);
  });
}
