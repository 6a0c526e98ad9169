import { createElement, setVisible } from '../../utils/dom.js';
import type { CountdownTarget } from '../types.js';
import type { SummaryTileModel } from '../viewModel.js';
import type { TimelineElements } from './elements.js';

export const LOAD_FAILURE_MESSAGE = 'Failed to load games data';

/**
 * Every `.countdown[data-end]` element under `root`, as countdown targets.
 * An empty `data-end` is passed through and rendered as the placeholder.
 */
export function collectCountdownTargets(root: ParentNode = document): CountdownTarget[] {
  return Array.from(root.querySelectorAll<HTMLElement>('.countdown[data-end]')).map(element => ({
    end: element.getAttribute('data-end'),
    write(text: string) {
      if (element.textContent !== text) {
        element.textContent = text;
      }
    }
  }));
}

/**
 * The single visible status for a dataset that could not be loaded.
 */
export function showLoadFailure(elements: Pick<TimelineElements, 'loadingMessage'>, message = LOAD_FAILURE_MESSAGE): void {
  if (elements.loadingMessage) {
    setVisible(elements.loadingMessage, true);
    elements.loadingMessage.textContent = message;
    elements.loadingMessage.setAttribute('data-state', 'error');
  }
}

export function updateResultCount(element: HTMLElement | null, text: string): void {
  if (element) {
    element.textContent = text;
  }
}

export function renderLastUpdated(element: HTMLElement | null, label: string | null): void {
  if (!element) {
    return;
  }
  setVisible(element, Boolean(label));
  element.textContent = label ? `Last updated: ${label}` : '';
}

/**
 * Replace the summary cards above the timeline; the grid is hidden when empty.
 */
export function renderSummaryTiles(container: HTMLElement | null, tiles: readonly SummaryTileModel[]): void {
  if (!container) {
    return;
  }
  container.replaceChildren(
    ...tiles.map(tile =>
      createElement('div', {
        className: 'stat-card',
        children: [
          createElement('div', { className: 'stat-number', textContent: tile.value }),
          createElement('div', { className: 'stat-label', textContent: tile.label })
        ]
      })
    )
  );
  setVisible(container, tiles.length > 0);
}
