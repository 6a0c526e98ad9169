import { batchAppend, createElement, createExternalLink, setVisible } from '../../utils/dom.js';
import { loadMoreLabel } from '../cursor.js';
import type { RenderCursor, TimelineRenderer, YearGroup } from '../types.js';
import {
  buildYearSectionModel,
  type GameCardModel,
  type MonthSectionModel,
  type YearSectionModel
} from '../viewModel.js';

const LOAD_MORE_SECTION_ID = 'loadMoreSection';

export function createGameCard(model: GameCardModel): HTMLElement {
  const imageDiv = createElement('div', { className: 'game-card-image' });
  if (model.image) {
    imageDiv.appendChild(
      createElement('img', { attributes: { src: model.image, alt: model.name, loading: 'lazy' } })
    );
  } else {
    imageDiv.appendChild(createElement('div', { className: 'placeholder', textContent: 'No Image Available' }));
  }

  const title = createElement('h3', {
    className: 'game-card-title',
    children: [createExternalLink(model.link, model.name)]
  });

  const meta = createElement('div', {
    className: 'game-card-meta',
    children: [
      createElement('span', {
        className: 'game-card-platform',
        textContent: model.platformIcon,
        attributes: { title: model.platform }
      }),
      createElement('div', { className: 'game-card-date', textContent: model.dateLabel })
    ]
  });
  if (model.ratingLabel) {
    meta.appendChild(createElement('div', { className: 'game-card-rating', textContent: model.ratingLabel }));
  }

  return createElement('div', {
    className: 'game-card animate',
    attributes: { 'data-game-id': model.id, 'data-platform': model.platform },
    children: [imageDiv, createElement('div', { className: 'game-card-body', children: [title, meta] })]
  });
}

function createMonthSection(model: MonthSectionModel): HTMLElement {
  return createElement('div', {
    className: 'timeline-month',
    children: [
      createElement('h4', { className: 'timeline-month-header', textContent: model.heading }),
      createElement('div', { className: 'timeline-games', children: model.cards.map(createGameCard) })
    ]
  });
}

export function createYearSection(model: YearSectionModel): HTMLElement {
  return createElement('div', {
    className: 'timeline-year',
    attributes: { 'data-year': model.year === null ? 'unknown' : String(model.year) },
    children: [
      createElement('h3', { className: 'timeline-year-header', textContent: model.heading }),
      ...model.months.map(createMonthSection)
    ]
  });
}

interface DomTimelineRendererOptions {
  timeline: HTMLElement;
  noResults?: HTMLElement | null;
  loadingMessage?: HTMLElement | null;
  /** Called with the cursor generation shown on the button when it is clicked */
  onLoadMore: (generation: number) => void;
}

/**
 * Timeline renderer writing year sections into the page.
 */
export class DomTimelineRenderer implements TimelineRenderer {
  private readonly timeline: HTMLElement;
  private readonly noResults: HTMLElement | null;
  private readonly loadingMessage: HTMLElement | null;
  private readonly onLoadMore: (generation: number) => void;
  private loadMoreSection: HTMLElement | null = null;
  private loadMoreButton: HTMLButtonElement | null = null;

  constructor({ timeline, noResults = null, loadingMessage = null, onLoadMore }: DomTimelineRendererOptions) {
    this.timeline = timeline;
    this.noResults = noResults;
    this.loadingMessage = loadingMessage;
    this.onLoadMore = onLoadMore;
  }

  reset(totalCount: number): void {
    if (this.loadingMessage) {
      setVisible(this.loadingMessage, false);
    }
    if (this.noResults) {
      setVisible(this.noResults, totalCount === 0);
    }
    this.timeline.replaceChildren();
  }

  appendGroups(groups: readonly YearGroup[]): void {
    batchAppend(
      this.timeline,
      groups.map(group => createYearSection(buildYearSectionModel(group)))
    );
  }

  showEmpty(): void {
    this.timeline.replaceChildren();
    if (this.noResults) {
      setVisible(this.noResults, true);
    }
  }

  updateLoadMore(cursor: RenderCursor | null): void {
    if (!cursor) {
      this.loadMoreSection?.remove();
      this.loadMoreSection = null;
      this.loadMoreButton = null;
      return;
    }

    if (!this.loadMoreSection || !this.loadMoreButton) {
      const button = createElement('button', {
        className: 'load-more-button',
        attributes: { id: 'loadMoreButton', type: 'button' }
      });
      button.addEventListener('click', () => {
        this.onLoadMore(Number(button.dataset.generation));
      });
      this.loadMoreButton = button;
      this.loadMoreSection = createElement('div', {
        className: 'load-more',
        attributes: { id: LOAD_MORE_SECTION_ID },
        children: [button]
      });
      this.timeline.after(this.loadMoreSection);
    }

    this.loadMoreButton.dataset.generation = String(cursor.generation);
    this.loadMoreButton.textContent = loadMoreLabel(cursor);
  }
}
