import type { UpcomingGameRecord } from '../types/index.js';
import { MS_PER_DAY } from './constants.js';
import { formatDisplayDate, parseGameDate } from './utils/dates.js';
import { formatRating, getPlatformIcon } from './viewModel.js';

export interface Availability {
  /** "Available in 3 days", "Available Today!", "Available Now"; null when dates are unknown */
  headline: string | null;
  /** "Jun 1, 2024 - Jun 8, 2024" or "Date TBA" */
  range: string;
}

export interface UpcomingCardModel {
  id: string;
  name: string;
  link: string;
  image: string | null;
  platformIcon: string;
  availability: Availability;
  ratingLabel: string | null;
}

export const DATE_TBA = 'Date TBA';

/**
 * When an upcoming promotion starts, relative to `now`.
 * @param game
 * @param now - Epoch milliseconds
 */
export function describeAvailability(
  game: Pick<UpcomingGameRecord, 'startDate' | 'endDate'>,
  now: number = Date.now()
): Availability {
  const start = parseGameDate(game.startDate);
  const end = parseGameDate(game.endDate);
  if (!start || !end) {
    return { headline: null, range: DATE_TBA };
  }

  const range = `${formatDisplayDate(game.startDate)} - ${formatDisplayDate(game.endDate)}`;
  const daysUntil = Math.ceil((start.getTime() - now) / MS_PER_DAY);

  if (daysUntil > 0) {
    return { headline: `Available in ${daysUntil} day${daysUntil === 1 ? '' : 's'}`, range };
  }
  if (daysUntil === 0) {
    return { headline: 'Available Today!', range };
  }
  return { headline: 'Available Now', range };
}

export function buildUpcomingCardModel(game: UpcomingGameRecord, now: number = Date.now()): UpcomingCardModel {
  return {
    id: String(game.id),
    name: game.name,
    link: game.link,
    image: typeof game.image === 'string' && game.image ? game.image : null,
    platformIcon: getPlatformIcon(game.platform),
    availability: describeAvailability(game, now),
    ratingLabel: formatRating(game.rating, ' / 5.00')
  };
}
