import test from 'node:test';
import assert from 'node:assert/strict';

import { groupGamesByDate } from '../../src/timeline/grouping.js';
import { DATE_TBA, buildUpcomingCardModel, describeAvailability } from '../../src/timeline/upcoming.js';
import {
  buildGameCardModel,
  buildSummaryTiles,
  buildYearSectionModel,
  describeResultCount,
  formatRating,
  getPlatformIcon
} from '../../src/timeline/viewModel.js';
import { makeGame, makeUpcoming } from '../__utils__/test-helpers.js';

const now = new Date('2024-06-01T12:00:00').getTime();

test('getPlatformIcon maps known tags case-insensitively', () => {
  assert.equal(getPlatformIcon('PC'), '🖥️');
  assert.equal(getPlatformIcon('ios'), '📱');
  assert.equal(getPlatformIcon('Android'), '🤖');
  assert.equal(getPlatformIcon('SWITCH'), '🎮');
  assert.equal(getPlatformIcon(undefined), '🎮');
});

test('formatRating hides missing and zero ratings', () => {
  assert.equal(formatRating(4.5), '4.50/5');
  assert.equal(formatRating(3, ' / 5.00'), '3.00 / 5.00');
  assert.equal(formatRating(0), null);
  assert.equal(formatRating(null), null);
});

test('buildGameCardModel fills the card fields', () => {
  const card = buildGameCardModel(
    makeGame({ id: 42, name: 'Lighthouse', platform: 'ios', rating: 4.25, firstFreeDate: '2020-06-15T12:00:00' })
  );
  assert.equal(card.id, '42');
  assert.equal(card.platformIcon, '📱');
  assert.equal(card.dateLabel, 'Free: Jun 15, 2020');
  assert.equal(card.ratingLabel, '4.25/5');
  assert.equal(card.image, null);
});

test('buildYearSectionModel headings count games per month', () => {
  const [group] = groupGamesByDate([
    makeGame({ firstFreeDate: '2020-06-01T12:00:00' }),
    makeGame({ firstFreeDate: '2020-03-01T12:00:00' }),
    makeGame({ firstFreeDate: '2020-03-08T12:00:00' })
  ]);
  const section = buildYearSectionModel(group);
  assert.equal(section.heading, '2020');
  assert.deepEqual(
    section.months.map(month => month.heading),
    ['June (1 game)', 'March (2 games)']
  );
});

test('describeResultCount', () => {
  assert.equal(describeResultCount(3, 10), 'Showing 3 of 10 games');
});

test('describeAvailability counts whole days until the start', () => {
  const availability = describeAvailability(
    { startDate: '2024-06-04T12:00:00', endDate: '2024-06-11T12:00:00' },
    now
  );
  assert.deepEqual(availability, { headline: 'Available in 3 days', range: 'Jun 4, 2024 - Jun 11, 2024' });
});

test('describeAvailability rounds a partial day up', () => {
  const availability = describeAvailability(
    { startDate: '2024-06-02T00:00:00', endDate: '2024-06-09T00:00:00' },
    now
  );
  assert.equal(availability.headline, 'Available in 1 day');
});

test('describeAvailability for a start earlier today and for a past start', () => {
  assert.equal(
    describeAvailability({ startDate: '2024-06-01T06:00:00', endDate: '2024-06-08T06:00:00' }, now).headline,
    'Available Today!'
  );
  assert.equal(
    describeAvailability({ startDate: '2024-05-28T12:00:00', endDate: '2024-06-04T12:00:00' }, now).headline,
    'Available Now'
  );
});

test('describeAvailability without dates shows the TBA label', () => {
  assert.deepEqual(describeAvailability({ startDate: null, endDate: '2024-06-04T12:00:00' }, now), {
    headline: null,
    range: DATE_TBA
  });
});

test('buildUpcomingCardModel uses the long rating suffix', () => {
  const card = buildUpcomingCardModel(makeUpcoming({ rating: 4.8, startDate: null, endDate: null }), now);
  assert.equal(card.ratingLabel, '4.80 / 5.00');
  assert.equal(card.availability.range, 'Date TBA');
});

test('buildSummaryTiles only shows the statistics the dataset carries', () => {
  assert.deepEqual(buildSummaryTiles({ gamesByYear: {} }, 0), [{ value: '0', label: 'Free Now' }]);
  assert.deepEqual(
    buildSummaryTiles({ gamesByYear: {}, totalGames: 7, firstGameDate: '2019-12-05T12:00:00' }, 1),
    [
      { value: '7', label: 'Total Games' },
      { value: '1', label: 'Free Now' },
      { value: 'Dec 5, 2019', label: 'Tracking Since' }
    ]
  );
});
