import { stat, unlink } from 'node:fs/promises';
import path from 'node:path';
import type { CreatedEntry, EventSource } from '../types/file-watcher.js';
import {
    InvalidConfigError,
    MAX_UPLOAD_DELAY_SECONDS,
    MIN_UPLOAD_DELAY_SECONDS,
    type LogLevel,
    type LogSink,
    type StabilityOutcome,
    type UploadResult,
    type WatchConfig,
    type WatchSessionState,
} from '../types/watch-session.js';
import type { UploadRequest } from './upload-client.js';

export interface FileStabilityChecker {
    waitUntilStable(filePath: string, maxWaitMs?: number): Promise<StabilityOutcome>;
}

export interface Uploader {
    upload(request: UploadRequest): Promise<UploadResult>;
}

export interface WatchSessionDeps {
    eventSource: EventSource;
    stabilityChecker: FileStabilityChecker;
    uploader: Uploader;
    sink: LogSink;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
    removeFile?: (filePath: string) => Promise<void>;
}

/** Settings the operator may change while the session runs. */
interface LiveSettings {
    uploadDelaySeconds: number;
    deleteAfterUpload: boolean;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function formatSeconds(ms: number): string {
    return (ms / 1000).toFixed(2);
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export const UPLOAD_DELAY_ISSUE =
    `Upload delay must be a whole number between ${MIN_UPLOAD_DELAY_SECONDS} and ${MAX_UPLOAD_DELAY_SECONDS} seconds.`;

export function isValidUploadDelay(seconds: number): boolean {
    return Number.isInteger(seconds)
        && seconds >= MIN_UPLOAD_DELAY_SECONDS
        && seconds <= MAX_UPLOAD_DELAY_SECONDS;
}

/**
 * Check a watch configuration before a session binds to it.
 * Returns the list of problems; empty when the config is usable.
 */
export async function validateWatchConfig(config: WatchConfig): Promise<string[]> {
    const issues: string[] = [];

    if (config.directory.trim() === '') {
        issues.push('Watch directory is not set.');
    } else {
        try {
            const info = await stat(config.directory);
            if (!info.isDirectory()) {
                issues.push(`Watch path is not a directory: ${config.directory}`);
            }
        } catch {
            issues.push(`Watch directory does not exist: ${config.directory}`);
        }
    }

    const webhookUrl = config.webhookUrl.trim();
    if (webhookUrl === '') {
        issues.push('Webhook URL is not set.');
    } else if (!/^https?:\/\//i.test(webhookUrl)) {
        issues.push('Webhook URL must start with http:// or https://.');
    }

    if (!isValidUploadDelay(config.uploadDelaySeconds)) {
        issues.push(UPLOAD_DELAY_ISSUE);
    }

    if (config.allowedExtensions.size === 0) {
        issues.push('At least one allowed file extension is required.');
    }

    return issues;
}

/**
 * Monitors one directory and forwards every new, fully written image to the
 * configured webhook.
 *
 * Created entries are processed one at a time, in detection order, by a single
 * promise-chained worker:
 *
 *   stability check → upload delay → extension filter → upload → optional delete
 *
 * Nothing that happens to one file stops the session; every outcome is
 * reported to the log sink instead.
 */
export class WatchSession {
    readonly #eventSource: EventSource;
    readonly #checker: FileStabilityChecker;
    readonly #uploader: Uploader;
    readonly #sink: LogSink;
    readonly #sleep: (ms: number) => Promise<void>;
    readonly #now: () => number;
    readonly #removeFile: (filePath: string) => Promise<void>;

    #state: WatchSessionState = 'idle';
    #config: WatchConfig | null = null;
    #live: LiveSettings = { uploadDelaySeconds: 0, deleteAfterUpload: false };
    #worker: Promise<void> = Promise.resolve();
    #pending = 0;
    #stopping: Promise<void> | null = null;

    constructor(deps: WatchSessionDeps) {
        this.#eventSource = deps.eventSource;
        this.#checker = deps.stabilityChecker;
        this.#uploader = deps.uploader;
        this.#sink = deps.sink;
        this.#sleep = deps.sleep ?? sleep;
        this.#now = deps.now ?? (() => Date.now());
        this.#removeFile = deps.removeFile ?? unlink;
    }

    get state(): WatchSessionState {
        return this.#state;
    }

    get directory(): string | null {
        return this.#config?.directory ?? null;
    }

    get uploadDelaySeconds(): number {
        return this.#live.uploadDelaySeconds;
    }

    get deleteAfterUpload(): boolean {
        return this.#live.deleteAfterUpload;
    }

    /** Number of entries queued or in flight. */
    get pendingCount(): number {
        return this.#pending;
    }

    async start(config: WatchConfig): Promise<void> {
        if (this.#state !== 'idle') {
            throw new Error(`Cannot start a watch session that is ${this.#state}.`);
        }

        const issues = await validateWatchConfig(config);
        if (issues.length > 0) {
            throw new InvalidConfigError(issues);
        }

        this.#config = config;
        this.#live = {
            uploadDelaySeconds: config.uploadDelaySeconds,
            deleteAfterUpload: config.deleteAfterUpload,
        };
        this.#state = 'running';

        try {
            await this.#eventSource.watch(
                config.directory,
                { recursive: false },
                (entry) => this.#enqueue(entry),
                (error) => this.#handleWatchError(error),
            );
        } catch (error) {
            this.#state = 'idle';
            this.#config = null;
            throw error;
        }

        this.#emit('info', `Monitoring started: ${config.directory}`);
    }

    updateDelay(seconds: number): void {
        if (!isValidUploadDelay(seconds)) {
            throw new InvalidConfigError([UPLOAD_DELAY_ISSUE]);
        }
        this.#live.uploadDelaySeconds = seconds;
        this.#emit('info', `Updated upload delay to ${seconds} seconds.`);
    }

    updateDeleteAfterUpload(enabled: boolean): void {
        this.#live.deleteAfterUpload = enabled;
        this.#emit('info', enabled ? 'Files will be deleted after upload.' : 'Files will be kept after upload.');
    }

    /**
     * Stop watching, let the in-flight entry finish, and drop anything queued
     * behind it. Calling it again while idle does nothing.
     */
    stop(): Promise<void> {
        if (this.#state === 'idle') return Promise.resolve();
        if (this.#stopping) return this.#stopping;

        this.#state = 'stopping';
        this.#stopping = this.#shutdown().finally(() => {
            this.#stopping = null;
        });
        return this.#stopping;
    }

    /** Resolves once no entry is queued or being processed. */
    async drain(): Promise<void> {
        let observed: Promise<void>;
        do {
            observed = this.#worker;
            await observed;
        } while (observed !== this.#worker);
    }

    async #shutdown(): Promise<void> {
        try {
            await this.#eventSource.stopWatching();
        } finally {
            await this.drain();
            this.#state = 'idle';
            this.#config = null;
            this.#emit('info', 'Monitoring stopped.');
        }
    }

    #enqueue(entry: CreatedEntry): void {
        if (this.#state !== 'running') return;

        this.#pending++;
        this.#worker = this.#worker.then(async () => {
            try {
                if (this.#state !== 'running') {
                    if (!entry.isDirectory) {
                        this.#emit('warning', `Discarded ${path.basename(entry.path)}: monitoring stopped before it was processed.`);
                    }
                    return;
                }
                await this.#process(entry);
            } catch (error) {
                this.#emit('error', `Unexpected error while processing ${path.basename(entry.path)}: ${errorMessage(error)}`);
            } finally {
                this.#pending--;
            }
        });
    }

    async #process(entry: CreatedEntry): Promise<UploadResult> {
        if (entry.isDirectory) {
            return { kind: 'skipped', reason: 'Entry is a directory.' };
        }

        const config = this.#config;
        if (!config) {
            return { kind: 'skipped', reason: 'Session has no configuration.' };
        }

        const fileName = path.basename(entry.path);
        this.#emit('info', `Detected ${fileName}.`);

        const stability = await this.#checker.waitUntilStable(entry.path, config.stabilityTimeoutMs);
        if (stability.status === 'vanished') {
            const reason = `Skipped ${fileName}: file disappeared before it finished writing.`;
            this.#emit('warning', reason);
            return { kind: 'skipped', reason };
        }
        if (stability.status === 'timedOut') {
            const reason = `Skipped ${fileName}: file size did not settle after ${stability.samples} checks.`;
            this.#emit('warning', reason);
            return { kind: 'skipped', reason };
        }

        const delaySeconds = this.#live.uploadDelaySeconds;
        if (delaySeconds > 0) {
            await this.#sleep(delaySeconds * 1000);
        }

        const extension = path.extname(fileName).toLowerCase();
        if (!config.allowedExtensions.has(extension)) {
            const reason = `Ignored ${fileName} (unsupported file type).`;
            this.#emit('warning', reason);
            return { kind: 'skipped', reason };
        }

        const result = await this.#uploader.upload({
            webhookUrl: config.webhookUrl,
            fileName,
            filePath: entry.path,
            detectedAtMs: entry.detectedAtMs,
            timeoutMs: config.requestTimeoutMs,
        });

        switch (result.kind) {
            case 'success':
                this.#emit(
                    'success',
                    `Uploaded ${fileName} in ${formatSeconds(result.uploadDurationMs)} sec (total: ${formatSeconds(result.totalDurationMs)} sec).`,
                );
                if (this.#live.deleteAfterUpload) {
                    await this.#deleteUploaded(entry.path, fileName);
                }
                break;
            case 'failed':
                this.#emit('error', `Upload of ${fileName} failed: ${result.message}`);
                break;
            case 'skipped':
                this.#emit('warning', `Skipped ${fileName}: ${result.reason}`);
                break;
        }

        return result;
    }

    async #deleteUploaded(filePath: string, fileName: string): Promise<void> {
        try {
            await this.#removeFile(filePath);
            this.#emit('info', `Deleted ${fileName} after upload.`);
        } catch (error) {
            this.#emit('warning', `Could not delete ${fileName} after upload: ${errorMessage(error)}`);
        }
    }

    #handleWatchError(error: Error): void {
        this.#emit('error', `Directory watcher error: ${error.message}`);

        const directory = this.#config?.directory;
        if (!directory || this.#state !== 'running') return;

        void stat(directory).then(
            (info) => {
                if (!info.isDirectory()) this.#abort(directory);
            },
            () => this.#abort(directory),
        );
    }

    #abort(directory: string): void {
        if (this.#state !== 'running') return;
        this.#emit('error', `Watched directory is no longer available: ${directory}. Stopping monitoring.`);
        this.stop().catch((error: unknown) => {
            this.#emit('error', `Failed to stop monitoring: ${errorMessage(error)}`);
        });
    }

    #emit(level: LogLevel, message: string): void {
        this.#sink({ timestampMs: this.#now(), level, message });
    }
}
