import type { GameRecord, UpcomingGameRecord } from '../../types/index.js';
import { createElement, createExternalLink, setVisible } from '../../utils/dom.js';
import { logger } from '../../utils/logger.js';
import { COUNTDOWN_PLACEHOLDER } from '../countdown.js';
import { buildUpcomingCardModel, type UpcomingCardModel } from '../upcoming.js';

function createImage(image: string | null, alt: string, className: string, placeholder: string): HTMLElement {
  const imageDiv = createElement('div', { className });
  if (image) {
    imageDiv.appendChild(createElement('img', { attributes: { src: image, alt, loading: 'lazy' } }));
  } else {
    imageDiv.appendChild(createElement('div', { className: 'placeholder', textContent: placeholder }));
  }
  return imageDiv;
}

export function createUpcomingGameCard(model: UpcomingCardModel): HTMLElement {
  const imageDiv = createImage(model.image, model.name, 'upcoming-card-image', 'No Image');
  imageDiv.appendChild(createElement('div', { className: 'upcoming-badge', textContent: 'UPCOMING' }));

  const dateInfo = createElement('div', { className: 'upcoming-card-date' });
  if (model.availability.headline) {
    dateInfo.appendChild(createElement('strong', { textContent: model.availability.headline }));
    dateInfo.appendChild(createElement('br'));
  }
  dateInfo.appendChild(createElement('span', { className: 'date-range', textContent: model.availability.range }));

  const content = createElement('div', {
    className: 'upcoming-card-content',
    children: [
      createElement('h3', {
        className: 'upcoming-card-title',
        children: [createExternalLink(model.link, model.name)]
      }),
      dateInfo
    ]
  });
  if (model.ratingLabel) {
    content.appendChild(createElement('div', { className: 'upcoming-card-rating', textContent: model.ratingLabel }));
  }
  content.appendChild(createExternalLink(model.link, 'View on Epic Store', 'upcoming-cta-button'));

  return createElement('div', { className: 'upcoming-card animate', children: [imageDiv, content] });
}

/**
 * Fill the "Coming Soon" grid; the whole section is hidden when nothing is upcoming.
 */
export function renderUpcomingGames(
  container: HTMLElement | null,
  section: HTMLElement | null,
  games: readonly UpcomingGameRecord[],
  now: number = Date.now()
): void {
  if (!container) {
    logger.debug('Upcoming games container not found');
    return;
  }

  container.replaceChildren();
  if (games.length === 0) {
    if (section) {
      setVisible(section, false);
    }
    return;
  }

  if (section) {
    setVisible(section, true);
  }
  games.forEach(game => container.appendChild(createUpcomingGameCard(buildUpcomingCardModel(game, now))));
  logger.debug(`Rendered ${games.length} upcoming game(s)`);
}

/**
 * Hero cards for games free right now, each with a countdown to its end date.
 */
export function renderCurrentGames(container: HTMLElement | null, games: readonly GameRecord[]): void {
  if (!container) {
    return;
  }

  if (games.length === 0) {
    container.replaceChildren(createElement('p', { className: 'no-games', textContent: 'No free games available right now.' }));
    return;
  }

  container.replaceChildren(
    ...games.map(game =>
      createElement('div', {
        className: 'hero-card',
        children: [
          createImage(game.image, game.name, 'hero-card-image', 'No Image'),
          createElement('div', {
            className: 'hero-card-content',
            children: [
              createElement('h3', { textContent: game.name }),
              createElement('div', {
                className: 'countdown',
                textContent: COUNTDOWN_PLACEHOLDER,
                attributes: { 'data-end': game.endDate ?? '' }
              }),
              createExternalLink(game.link, 'Get It Free', 'cta-button')
            ]
          })
        ]
      })
    )
  );
}
