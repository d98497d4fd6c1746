import type { LogEvent, LogSink } from '../types/watch-session.js';
import { logActivity, scrubSensitiveText } from '../utils/logger.js';

export interface LogChannelOptions {
    /** Events kept for `recent()`; the oldest are dropped first. @default 500 */
    capacity?: number;
    /** Append every event to the daily activity log. @default true */
    persist?: boolean;
}

export interface LogChannelStats {
    published: number;
    dropped: number;
    buffered: number;
    capacity: number;
}

const DEFAULT_CAPACITY = 500;

/**
 * Bounded hand-off between the monitoring worker and whatever presents its
 * activity (console, control-plane API).
 */
export class LogChannel {
    readonly #capacity: number;
    readonly #persist: boolean;
    readonly #buffer: LogEvent[] = [];
    readonly #listeners: Set<LogSink> = new Set();
    #published = 0;
    #dropped = 0;
    /** Daily-log appends, one after another in publish order. */
    #persistQueue: Promise<void> = Promise.resolve();

    constructor(options: LogChannelOptions = {}) {
        this.#capacity = Math.max(1, Math.floor(options.capacity ?? DEFAULT_CAPACITY));
        this.#persist = options.persist ?? true;
    }

    /** Sink to hand to a {@link WatchSession}. */
    readonly publish: LogSink = (event) => {
        const scrubbed: LogEvent = { ...event, message: scrubSensitiveText(event.message) };

        this.#buffer.push(scrubbed);
        if (this.#buffer.length > this.#capacity) {
            this.#buffer.shift();
            this.#dropped++;
        }
        this.#published++;

        if (this.#persist) {
            // logActivity reports its own failures and never rejects.
            this.#persistQueue = this.#persistQueue.then(() =>
                logActivity(scrubbed.level, scrubbed.message, new Date(scrubbed.timestampMs)));
        }

        for (const listener of this.#listeners) {
            try {
                listener(scrubbed);
            } catch (err) {
                console.error('[LogChannel] Listener threw an error:', err);
            }
        }
    };

    /** Subscribe to new events. Returns an unsubscribe function. */
    subscribe(listener: LogSink): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    /** Most recent events, oldest first. */
    recent(limit: number = this.#capacity): LogEvent[] {
        if (limit <= 0) return [];
        return this.#buffer.slice(-limit);
    }

    /** Resolves once every event published so far has reached the daily log. */
    flush(): Promise<void> {
        return this.#persistQueue;
    }

    stats(): LogChannelStats {
        return {
            published: this.#published,
            dropped: this.#dropped,
            buffered: this.#buffer.length,
            capacity: this.#capacity,
        };
    }
}
