import test from 'node:test';
import assert from 'node:assert/strict';

import { CleanupManager, Debouncer } from '../../src/utils/cleanupManager.js';
import { ManualClock } from '../__utils__/test-helpers.js';

test('cleanup removes registered listeners', () => {
  const manager = new CleanupManager(new ManualClock());
  const target = new EventTarget();
  let hits = 0;

  manager.addEventListener(target, 'ping', () => {
    hits += 1;
  });
  target.dispatchEvent(new Event('ping'));
  assert.equal(manager.getStats().eventListeners, 1);

  manager.cleanup();
  target.dispatchEvent(new Event('ping'));
  assert.equal(hits, 1);
  assert.equal(manager.getStats().eventListeners, 0);
});

test('the remover returned by addEventListener detaches one listener', () => {
  const manager = new CleanupManager(new ManualClock());
  const target = new EventTarget();
  let hits = 0;

  const remove = manager.addEventListener(target, 'ping', () => {
    hits += 1;
  });
  remove();
  target.dispatchEvent(new Event('ping'));
  assert.equal(hits, 0);
  assert.equal(manager.getStats().eventListeners, 0);
});

test('timeouts are forgotten once they fire and intervals stop on cleanup', () => {
  const clock = new ManualClock();
  const manager = new CleanupManager(clock);
  let timeouts = 0;
  let ticks = 0;

  manager.setTimeout(() => {
    timeouts += 1;
  }, 10);
  manager.setInterval(() => {
    ticks += 1;
  }, 5);
  assert.equal(manager.getStats().timers, 2);

  clock.advance(10);
  assert.equal(timeouts, 1);
  assert.equal(ticks, 2);
  assert.equal(manager.getStats().timers, 1);

  manager.cleanup();
  clock.advance(50);
  assert.equal(ticks, 2);
  assert.equal(clock.pendingCount, 0);
});

test('cleanup runs callbacks even when one throws', () => {
  const manager = new CleanupManager(new ManualClock());
  const ran: string[] = [];
  manager.addCleanupCallback(() => {
    throw new Error('first');
  });
  manager.addCleanupCallback(() => ran.push('second'));

  manager.cleanup();
  assert.deepEqual(ran, ['second']);
  assert.equal(manager.getStats().cleanupCallbacks, 0);
});

test('Debouncer runs only the last scheduled call', () => {
  const clock = new ManualClock();
  const calls: string[] = [];
  const debouncer = new Debouncer<[string]>(value => calls.push(value), 300, new CleanupManager(clock));

  debouncer.schedule('a');
  clock.advance(200);
  debouncer.schedule('ab');
  clock.advance(200);
  assert.deepEqual(calls, []);
  assert.equal(debouncer.pending, true);

  clock.advance(100);
  assert.deepEqual(calls, ['ab']);
  assert.equal(debouncer.pending, false);
});

test('Debouncer flush and cancel', () => {
  const clock = new ManualClock();
  const calls: string[] = [];
  const debouncer = new Debouncer<[string]>(value => calls.push(value), 300, new CleanupManager(clock));

  debouncer.schedule('now');
  assert.equal(debouncer.flush(), true);
  assert.equal(debouncer.flush(), false);

  debouncer.schedule('never');
  debouncer.cancel();
  clock.advance(1000);

  assert.deepEqual(calls, ['now']);
  assert.equal(clock.pendingCount, 0);
});
