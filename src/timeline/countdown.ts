import { CONFIG } from '../config.js';
import type { CancelTimer, CleanupManager } from '../utils/cleanupManager.js';
import { logger } from '../utils/logger.js';
import { MS_PER_DAY, MS_PER_HOUR, MS_PER_MINUTE } from './constants.js';
import type { CountdownTarget } from './types.js';
import { parseGameDate } from './utils/dates.js';

export const COUNTDOWN_PLACEHOLDER = 'Time remaining...';
export const COUNTDOWN_EXPIRED = 'Expired';

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/**
 * Remaining time until `end`, in the coarsest unit that applies:
 * "2 days 3h remaining", "1h 30m remaining", "5 minutes remaining" or "Expired".
 * Missing or unparsable targets give a neutral placeholder.
 * @param end - ISO-8601 end timestamp
 * @param now - Epoch milliseconds, defaults to the current time
 */
export function formatTimeRemaining(end: string | null | undefined, now: number = Date.now()): string {
  const endDate = parseGameDate(end);
  if (!endDate || !Number.isFinite(now)) {
    return COUNTDOWN_PLACEHOLDER;
  }

  const diff = endDate.getTime() - now;
  if (diff <= 0) {
    return COUNTDOWN_EXPIRED;
  }

  const days = Math.floor(diff / MS_PER_DAY);
  const hours = Math.floor((diff % MS_PER_DAY) / MS_PER_HOUR);
  if (days > 0) {
    return `${plural(days, 'day')} ${hours}h remaining`;
  }

  const minutes = Math.floor((diff % MS_PER_HOUR) / MS_PER_MINUTE);
  if (hours > 0) {
    return `${hours}h ${minutes}m remaining`;
  }
  return `${plural(minutes, 'minute')} remaining`;
}

export interface CountdownSchedulerOptions {
  /** Returns the countdown targets currently on screen */
  collect: () => readonly CountdownTarget[];
  manager: CleanupManager;
  intervalMs?: number;
  now?: () => number;
}

/**
 * Refreshes every rendered countdown once on start and then on a fixed interval.
 */
export class CountdownScheduler {
  private readonly collect: () => readonly CountdownTarget[];
  private readonly manager: CleanupManager;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private cancelInterval: CancelTimer | null = null;

  constructor({ collect, manager, intervalMs = CONFIG.UI.COUNTDOWN_INTERVAL_MS, now = Date.now }: CountdownSchedulerOptions) {
    this.collect = collect;
    this.manager = manager;
    this.intervalMs = intervalMs;
    this.now = now;
  }

  get running(): boolean {
    return this.cancelInterval !== null;
  }

  start(): void {
    if (this.cancelInterval) {
      return;
    }
    this.tick();
    this.cancelInterval = this.manager.setInterval(() => this.tick(), this.intervalMs);
  }

  stop(): void {
    if (this.cancelInterval) {
      this.cancelInterval();
      this.cancelInterval = null;
    }
  }

  /**
   * Recompute all targets now
   * @returns number of targets written
   */
  tick(): number {
    let targets: readonly CountdownTarget[];
    try {
      targets = this.collect();
    } catch (error) {
      logger.exception('Failed to collect countdown targets', error);
      return 0;
    }

    const now = this.now();
    let written = 0;
    for (const target of targets) {
      try {
        target.write(formatTimeRemaining(target.end, now));
        written++;
      } catch (error) {
        logger.exception('Failed to update countdown', error);
      }
    }
    return written;
  }
}
