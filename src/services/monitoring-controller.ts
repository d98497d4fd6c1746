import {
    readConfig,
    toWatchConfig,
    updateConfig,
} from '../config/json-config.js';
import {
    InvalidConfigError,
    MonitoringConflictError,
    type WatchSessionState,
} from '../types/watch-session.js';
import { registerSensitiveValue } from '../utils/logger.js';
import { isValidUploadDelay, UPLOAD_DELAY_ISSUE, type WatchSession } from './watch-session.js';

export interface MonitoringStatus {
    state: WatchSessionState;
    directory: string | null;
    uploadDelaySeconds: number | null;
    deleteAfterUpload: boolean | null;
    startedAt: string | null;
    pendingFiles: number;
}

export interface MonitoringSettingsUpdate {
    uploadDelaySeconds?: number;
    deleteAfterUpload?: boolean;
}

export interface MonitoringControllerOptions {
    /** Builds a fresh session for every start. */
    createSession: () => WatchSession;
    /** Config file location; defaults to the standard lookup. */
    configPath?: string;
    now?: () => Date;
}

/**
 * Process-wide owner of the watch session. Starting twice is refused, so at
 * most one directory is monitored per process. Start, stop and settings
 * changes are persisted to the config file so monitoring resumes after a
 * restart.
 */
export class MonitoringController {
    readonly #createSession: () => WatchSession;
    readonly #configPath: string | undefined;
    readonly #now: () => Date;
    #session: WatchSession | null = null;
    #startedAt: Date | null = null;
    #pendingStart: Promise<void> | null = null;

    constructor(options: MonitoringControllerOptions) {
        this.#createSession = options.createSession;
        this.#configPath = options.configPath;
        this.#now = options.now ?? (() => new Date());
    }

    get running(): boolean {
        return this.#session !== null && this.#session.state !== 'idle';
    }

    status(): MonitoringStatus {
        const session = this.#session;
        if (!session || session.state === 'idle') {
            return {
                state: 'idle',
                directory: null,
                uploadDelaySeconds: null,
                deleteAfterUpload: null,
                startedAt: null,
                pendingFiles: 0,
            };
        }
        return {
            state: session.state,
            directory: session.directory,
            uploadDelaySeconds: session.uploadDelaySeconds,
            deleteAfterUpload: session.deleteAfterUpload,
            startedAt: this.#startedAt?.toISOString() ?? null,
            pendingFiles: session.pendingCount,
        };
    }

    async start(): Promise<MonitoringStatus> {
        if (this.running || this.#pendingStart) {
            throw new MonitoringConflictError();
        }

        const starting = this.#startSession();
        this.#pendingStart = starting;
        try {
            await starting;
        } finally {
            this.#pendingStart = null;
        }
        return this.status();
    }

    async #startSession(): Promise<void> {
        const config = await readConfig(this.#configPath);
        const watchConfig = toWatchConfig(config);
        if (watchConfig.webhookUrl !== '') {
            registerSensitiveValue(watchConfig.webhookUrl);
        }

        const session = this.#createSession();
        this.#session = session;
        try {
            await session.start(watchConfig);
        } catch (error) {
            this.#session = null;
            throw error;
        }
        this.#startedAt = this.#now();

        await updateConfig((next) => {
            next.monitoring.monitoringActive = true;
        }, this.#configPath);
    }

    /** Resolves once an in-flight `start()` has finished, whatever its outcome. */
    async #settleStart(): Promise<void> {
        const pending = this.#pendingStart;
        if (!pending) return;
        // The caller of start() receives its own failure.
        await pending.then(
            () => undefined,
            () => undefined,
        );
    }

    /** Stop monitoring and remember that it should not resume. */
    async stop(): Promise<MonitoringStatus> {
        await this.shutdown();
        await updateConfig((next) => {
            next.monitoring.monitoringActive = false;
        }, this.#configPath);
        return this.status();
    }

    /**
     * Stop the session without changing the persisted resume flag. A start
     * that is still binding is allowed to finish first, then stopped.
     */
    async shutdown(): Promise<void> {
        await this.#settleStart();
        const session = this.#session;
        if (!session) return;
        await session.stop();
        this.#session = null;
        this.#startedAt = null;
    }

    async updateSettings(update: MonitoringSettingsUpdate): Promise<MonitoringStatus> {
        if (update.uploadDelaySeconds !== undefined && !isValidUploadDelay(update.uploadDelaySeconds)) {
            throw new InvalidConfigError([UPLOAD_DELAY_ISSUE]);
        }

        await updateConfig((next) => {
            if (update.uploadDelaySeconds !== undefined) {
                next.monitoring.uploadDelaySeconds = update.uploadDelaySeconds;
            }
            if (update.deleteAfterUpload !== undefined) {
                next.monitoring.deleteAfterUpload = update.deleteAfterUpload;
            }
        }, this.#configPath);

        const session = this.#session;
        if (session && session.state === 'running') {
            if (update.uploadDelaySeconds !== undefined) session.updateDelay(update.uploadDelaySeconds);
            if (update.deleteAfterUpload !== undefined) session.updateDeleteAfterUpload(update.deleteAfterUpload);
        }
        return this.status();
    }

    /**
     * Start monitoring at launch when it was active at the last shutdown and
     * the directory and webhook are configured. Returns whether it started.
     */
    async resumeIfActive(): Promise<boolean> {
        const config = await readConfig(this.#configPath);
        const monitoring = config.monitoring;
        if (!monitoring.monitoringActive) return false;
        if (monitoring.watchDirectory.trim() === '' || monitoring.webhookUrl.trim() === '') return false;
        await this.start();
        return true;
    }
}
