import { stat } from 'node:fs/promises';
import type { StabilityOutcome } from '../types/watch-session.js';

export interface StabilityCheckerOptions {
    /** Delay between two size samples. @default 500 */
    pollIntervalMs?: number;
    /** Consecutive equal, non-zero samples required. @default 3 */
    requiredStableSamples?: number;
    /** Give up after this long; 0 polls until the file settles or disappears. @default 0 */
    maxWaitMs?: number;
    /** Size of the file in bytes, or null when it does not exist. */
    statSize?: (filePath: string) => Promise<number | null>;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

const DEFAULT_POLL_INTERVAL_MS = 500;
const DEFAULT_REQUIRED_SAMPLES = 3;

async function statFileSize(filePath: string): Promise<number | null> {
    try {
        const info = await stat(filePath);
        return info.size;
    } catch (error) {
        if (isMissingFileError(error)) return null;
        throw error;
    }
}

function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Decides when a freshly created file has been completely written by polling
 * its size. Creation events usually fire before the producer has flushed, so
 * the file only counts as ready once its size stayed the same, and above zero,
 * for `requiredStableSamples` samples in a row.
 */
export class StabilityChecker {
    readonly #pollIntervalMs: number;
    readonly #requiredSamples: number;
    readonly #maxWaitMs: number;
    readonly #statSize: (filePath: string) => Promise<number | null>;
    readonly #sleep: (ms: number) => Promise<void>;
    readonly #now: () => number;

    constructor(options: StabilityCheckerOptions = {}) {
        this.#pollIntervalMs = Math.max(0, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
        this.#requiredSamples = Math.max(1, Math.floor(options.requiredStableSamples ?? DEFAULT_REQUIRED_SAMPLES));
        this.#maxWaitMs = Math.max(0, options.maxWaitMs ?? 0);
        this.#statSize = options.statSize ?? statFileSize;
        this.#sleep = options.sleep ?? sleep;
        this.#now = options.now ?? (() => Date.now());
    }

    get pollIntervalMs(): number {
        return this.#pollIntervalMs;
    }

    get requiredStableSamples(): number {
        return this.#requiredSamples;
    }

    /**
     * Poll until the file is stable, vanishes, or the optional bound elapses.
     * `maxWaitMs` overrides the bound configured on the checker.
     */
    async waitUntilStable(filePath: string, maxWaitMs: number = this.#maxWaitMs): Promise<StabilityOutcome> {
        const startedAt = this.#now();
        let samples = 0;
        let run = 0;
        let lastSize: number | null = null;

        for (;;) {
            const size = await this.#statSize(filePath);
            samples++;

            if (size === null) {
                return { status: 'vanished', samples };
            }

            if (size > 0 && size === lastSize) {
                run++;
            } else {
                run = size > 0 ? 1 : 0;
            }
            lastSize = size;

            if (run >= this.#requiredSamples) {
                return { status: 'ready', size, samples };
            }

            if (maxWaitMs > 0 && this.#now() - startedAt >= maxWaitMs) {
                return { status: 'timedOut', samples, lastSize };
            }

            await this.#sleep(this.#pollIntervalMs);
        }
    }
}
