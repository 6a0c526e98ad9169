/**
 * Ownership of event listeners and timers, plus the debounce primitive built on it
 * @module utils/cleanupManager
 */

import { logger } from './logger.js';

/** Cancels the timer it was returned for. Calling it twice is harmless. */
export type CancelTimer = () => void;

/**
 * Minimal timer API the engine schedules through. The browser's timers back the
 * default host; tests pass a manual clock.
 */
export interface TimerHost {
    setTimeout(callback: () => void, delay: number): CancelTimer;
    setInterval(callback: () => void, interval: number): CancelTimer;
}

export const browserTimerHost: TimerHost = {
    setTimeout(callback, delay) {
        const id = setTimeout(callback, delay);
        return () => clearTimeout(id);
    },
    setInterval(callback, interval) {
        const id = setInterval(callback, interval);
        return () => clearInterval(id);
    }
};

interface EventListenerEntry {
    target: EventTarget;
    eventType: string;
    handler: EventListenerOrEventListenerObject;
    options: boolean | AddEventListenerOptions;
}

interface CleanupStats {
    eventListeners: number;
    timers: number;
    cleanupCallbacks: number;
}

/**
 * CleanupManager releases everything a page component registered through it
 * in one `cleanup()` call.
 */
export class CleanupManager {
    readonly timerHost: TimerHost;
    private eventListeners: Set<EventListenerEntry>;
    private timers: Set<CancelTimer>;
    private cleanupCallbacks: Set<() => void>;

    constructor(timerHost: TimerHost = browserTimerHost) {
        this.timerHost = timerHost;
        this.eventListeners = new Set();
        this.timers = new Set();
        this.cleanupCallbacks = new Set();
    }

    /**
     * Add an event listener that will be removed on cleanup
     * @returns Cleanup function for this specific listener
     */
    addEventListener(
        target: EventTarget,
        eventType: string,
        handler: EventListenerOrEventListenerObject,
        options: boolean | AddEventListenerOptions = false
    ): () => void {
        if (!target || typeof target.addEventListener !== 'function') {
            logger.warn('CleanupManager: Invalid event target provided');
            return () => {};
        }

        const listenerEntry: EventListenerEntry = { target, eventType, handler, options };
        this.eventListeners.add(listenerEntry);
        target.addEventListener(eventType, handler, options);

        return () => {
            target.removeEventListener(eventType, handler, options);
            this.eventListeners.delete(listenerEntry);
        };
    }

    /**
     * One-shot timer, forgotten once it fires
     * @param callback
     * @param delay
     */
    setTimeout(callback: () => void, delay: number): CancelTimer {
        let cancel: CancelTimer = () => {};
        const release = (): void => {
            cancel();
            this.timers.delete(release);
        };
        cancel = this.timerHost.setTimeout(() => {
            this.timers.delete(release);
            callback();
        }, delay);
        this.timers.add(release);
        return release;
    }

    /**
     * Repeating timer, kept until cancelled or cleaned up
     * @param callback
     * @param interval
     */
    setInterval(callback: () => void, interval: number): CancelTimer {
        const cancel = this.timerHost.setInterval(callback, interval);
        const release = (): void => {
            cancel();
            this.timers.delete(release);
        };
        this.timers.add(release);
        return release;
    }

    addCleanupCallback(cleanupFunction: () => void): void {
        this.cleanupCallbacks.add(cleanupFunction);
    }

    /**
     * Clean up all managed resources
     */
    cleanup(): void {
        for (const { target, eventType, handler, options } of this.eventListeners) {
            try {
                target.removeEventListener(eventType, handler, options);
            } catch (error) {
                logger.warn('CleanupManager: Error removing event listener:', error);
            }
        }
        this.eventListeners.clear();

        for (const release of Array.from(this.timers)) {
            try {
                release();
            } catch (error) {
                logger.warn('CleanupManager: Error clearing timer:', error);
            }
        }
        this.timers.clear();

        for (const cleanupFunction of this.cleanupCallbacks) {
            try {
                cleanupFunction();
            } catch (error) {
                logger.warn('CleanupManager: Error in cleanup callback:', error);
            }
        }
        this.cleanupCallbacks.clear();
    }

    getStats(): CleanupStats {
        return {
            eventListeners: this.eventListeners.size,
            timers: this.timers.size,
            cleanupCallbacks: this.cleanupCallbacks.size
        };
    }
}

/**
 * Trailing-edge debounce owning a single timer handle.
 * Each `schedule` replaces the pending call; only the last one runs.
 */
export class Debouncer<TArgs extends unknown[]> {
    private readonly action: (...args: TArgs) => void;
    private readonly delay: number;
    private readonly manager: CleanupManager;
    private cancelPending: CancelTimer | null;
    private pendingArgs: TArgs | null;

    constructor(action: (...args: TArgs) => void, delay: number, manager: CleanupManager) {
        this.action = action;
        this.delay = delay;
        this.manager = manager;
        this.cancelPending = null;
        this.pendingArgs = null;
    }

    schedule(...args: TArgs): void {
        this.cancel();
        this.pendingArgs = args;
        this.cancelPending = this.manager.setTimeout(() => {
            this.cancelPending = null;
            this.run();
        }, this.delay);
    }

    cancel(): void {
        if (this.cancelPending) {
            this.cancelPending();
            this.cancelPending = null;
        }
        this.pendingArgs = null;
    }

    /**
     * Run the pending call now, if there is one
     * @returns whether a call ran
     */
    flush(): boolean {
        if (!this.pendingArgs) {
            return false;
        }
        if (this.cancelPending) {
            this.cancelPending();
            this.cancelPending = null;
        }
        this.run();
        return true;
    }

    get pending(): boolean {
        return this.pendingArgs !== null;
    }

    private run(): void {
        const args = this.pendingArgs;
        this.pendingArgs = null;
        if (args) {
            this.action(...args);
        }
    }
}
