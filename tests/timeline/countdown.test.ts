import test from 'node:test';
import assert from 'node:assert/strict';

import {
  COUNTDOWN_EXPIRED,
  COUNTDOWN_PLACEHOLDER,
  CountdownScheduler,
  formatTimeRemaining
} from '../../src/timeline/countdown.js';
import type { CountdownTarget } from '../../src/timeline/types.js';
import { CleanupManager } from '../../src/utils/cleanupManager.js';
import { ManualClock } from '../__utils__/test-helpers.js';

const END = '2024-01-10T12:00:00Z';
const endMs = Date.parse(END);
const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

test('formatTimeRemaining uses hours and minutes under a day', () => {
  assert.equal(formatTimeRemaining(END, endMs - 90 * MINUTE), '1h 30m remaining');
});

test('formatTimeRemaining uses days and hours from one day up', () => {
  assert.equal(formatTimeRemaining(END, endMs - (2 * DAY + 3 * HOUR + 20 * MINUTE)), '2 days 3h remaining');
  assert.equal(formatTimeRemaining(END, endMs - DAY), '1 day 0h remaining');
});

test('formatTimeRemaining uses minutes under an hour', () => {
  assert.equal(formatTimeRemaining(END, endMs - 5 * MINUTE), '5 minutes remaining');
  assert.equal(formatTimeRemaining(END, endMs - MINUTE - 1000), '1 minute remaining');
});

test('formatTimeRemaining reports expiry at and after the end', () => {
  assert.equal(formatTimeRemaining(END, endMs), COUNTDOWN_EXPIRED);
  assert.equal(formatTimeRemaining(END, endMs + HOUR), 'Expired');
});

test('formatTimeRemaining shows the placeholder for a bad end date', () => {
  assert.equal(formatTimeRemaining('whenever', endMs), COUNTDOWN_PLACEHOLDER);
  assert.equal(formatTimeRemaining(null, endMs), 'Time remaining...');
});

/** Displayed remaining time in minutes; "Expired" counts as zero */
function displayedMinutes(text: string): number {
  const days = /^(\d+) days? (\d+)h remaining$/.exec(text);
  if (days) {
    return Number(days[1]) * 24 * 60 + Number(days[2]) * 60;
  }
  const hours = /^(\d+)h (\d+)m remaining$/.exec(text);
  if (hours) {
    return Number(hours[1]) * 60 + Number(hours[2]);
  }
  const minutes = /^(\d+) minutes? remaining$/.exec(text);
  if (minutes) {
    return Number(minutes[1]);
  }
  assert.equal(text, COUNTDOWN_EXPIRED);
  return 0;
}

test('formatTimeRemaining never grows as time moves forward', () => {
  const step = 7 * MINUTE + 13 * 1000;
  let previous = displayedMinutes(formatTimeRemaining(END, endMs - 3 * DAY));
  assert.equal(previous, 3 * 24 * 60);

  for (let now = endMs - 3 * DAY + step; now <= endMs + HOUR; now += step) {
    const current = displayedMinutes(formatTimeRemaining(END, now));
    assert.ok(current <= previous, `${current} > ${previous} at ${new Date(now).toISOString()}`);
    previous = current;
  }
  assert.equal(previous, 0);
});

test('CountdownScheduler writes on start and on every interval', () => {
  const clock = new ManualClock();
  clock.now = endMs - 90 * MINUTE;
  const written: string[] = [];
  const targets: CountdownTarget[] = [{ end: END, write: text => written.push(text) }];

  const scheduler = new CountdownScheduler({
    collect: () => targets,
    manager: new CleanupManager(clock),
    intervalMs: MINUTE,
    now: () => clock.now
  });

  scheduler.start();
  assert.deepEqual(written, ['1h 30m remaining']);
  assert.equal(scheduler.running, true);

  clock.advance(MINUTE);
  assert.deepEqual(written, ['1h 30m remaining', '1h 29m remaining']);

  scheduler.stop();
  assert.equal(scheduler.running, false);
  assert.equal(clock.pendingCount, 0);
  clock.advance(10 * MINUTE);
  assert.equal(written.length, 2);
});

test('CountdownScheduler keeps going when one target fails', () => {
  const written: string[] = [];
  const scheduler = new CountdownScheduler({
    collect: () => [
      {
        end: END,
        write: () => {
          throw new Error('detached');
        }
      },
      { end: END, write: text => written.push(text) }
    ],
    manager: new CleanupManager(new ManualClock()),
    now: () => endMs + 1
  });

  assert.equal(scheduler.tick(), 1);
  assert.deepEqual(written, ['Expired']);
});
