import test from 'node:test';
import assert from 'node:assert/strict';

import {
  createFilterState,
  filterStatesEqual,
  isDefaultFilterState,
  normalizeYear
} from '../../src/timeline/state.js';
import {
  buildStateUrl,
  decodeFilterState,
  encodeFilterState,
  replaceUrlState
} from '../../src/timeline/utils/url.js';
import { SORT_ORDERS } from '../../src/timeline/constants.js';
import { RecordingHistory } from '../__utils__/test-helpers.js';

test('encodeFilterState omits every default', () => {
  assert.equal(encodeFilterState(createFilterState()), '');
  assert.equal(encodeFilterState(createFilterState({ searchTerm: '   ' })), '');
});

test('encodeFilterState writes non-default fields', () => {
  const state = createFilterState({ searchTerm: ' space quest ', year: '2021', sortOrder: 'alpha' });
  assert.equal(encodeFilterState(state), 'search=space+quest&year=2021&sort=alpha');
});

test('decodeFilterState reads what encodeFilterState wrote', () => {
  const state = createFilterState({ searchTerm: 'rogue & co', year: '2019', sortOrder: 'rating' });
  assert.ok(filterStatesEqual(decodeFilterState(`?${encodeFilterState(state)}`), state));
});

test('every sort, year and reserved-character search survives the URL', () => {
  const searches = ['', 'a+b', '100%', 'x=y&z', 'who?#1'];
  for (const sortOrder of SORT_ORDERS) {
    for (const year of ['all', '2019', '2024']) {
      for (const searchTerm of searches) {
        const state = createFilterState({ searchTerm, year, sortOrder });
        const url = buildStateUrl('/', state);
        const decoded = decodeFilterState(url.slice(1));
        assert.deepEqual(decoded, state, url);
      }
    }
  }
  assert.equal(encodeFilterState(createFilterState({ searchTerm: 'a+b' })), 'search=a%2Bb');
  assert.equal(encodeFilterState(createFilterState({ searchTerm: '100%' })), 'search=100%25');
});

test('decodeFilterState falls back to defaults for malformed values', () => {
  const state = decodeFilterState('?year=20x1&sort=bogus&search=%20%20&extra=1');
  assert.deepEqual(state, { searchTerm: '', year: 'all', sortOrder: 'newest' });
});

test('decodeFilterState of nothing is the default state', () => {
  assert.ok(isDefaultFilterState(decodeFilterState('')));
  assert.ok(isDefaultFilterState(decodeFilterState(null)));
});

test('normalizeYear accepts only four digit years', () => {
  assert.equal(normalizeYear(' 2022 '), '2022');
  assert.equal(normalizeYear('22'), 'all');
  assert.equal(normalizeYear(2022), 'all');
});

test('buildStateUrl returns the bare path for the default state', () => {
  assert.equal(buildStateUrl('/timeline', createFilterState()), '/timeline');
  assert.equal(buildStateUrl('/timeline', createFilterState({ year: '2020' })), '/timeline?year=2020');
});

test('replaceUrlState replaces the entry only when the URL changes', () => {
  const history = new RecordingHistory();
  const state = createFilterState({ sortOrder: 'oldest' });

  assert.equal(replaceUrlState(state, { pathname: '/', search: '' }, history), true);
  assert.deepEqual(history.urls, ['/?sort=oldest']);

  assert.equal(replaceUrlState(state, { pathname: '/', search: '?sort=oldest' }, history), false);
  assert.equal(history.urls.length, 1);
});
