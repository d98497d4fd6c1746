export type LogLevel = 'info' | 'success' | 'warning' | 'error';

/** One entry of the activity log shown to the operator. */
export interface LogEvent {
    timestampMs: number;
    level: LogLevel;
    message: string;
}

export type LogSink = (event: LogEvent) => void;

export const DEFAULT_ALLOWED_EXTENSIONS: readonly string[] = ['.png', '.jpg', '.jpeg', '.gif', '.bmp'];

export const MIN_UPLOAD_DELAY_SECONDS = 0;
export const MAX_UPLOAD_DELAY_SECONDS = 30;

export interface WatchConfig {
    /** Directory to monitor (non-recursive). */
    directory: string;
    webhookUrl: string;
    /** Whole seconds to wait between stability and upload. */
    uploadDelaySeconds: number;
    deleteAfterUpload: boolean;
    /** Lower-case extensions including the leading dot. */
    allowedExtensions: ReadonlySet<string>;
    /** Upper bound for the stability wait; 0 waits indefinitely. */
    stabilityTimeoutMs?: number;
    /** Abort the webhook POST after this many milliseconds; 0 disables. */
    requestTimeoutMs?: number;
}

export type UploadErrorKind = 'network' | 'httpStatus' | 'unknown';

export type UploadResult =
    | { kind: 'success'; uploadDurationMs: number; totalDurationMs: number }
    | { kind: 'skipped'; reason: string }
    | { kind: 'failed'; errorKind: UploadErrorKind; message: string; status?: number };

export type StabilityOutcome =
    | { status: 'ready'; size: number; samples: number }
    | { status: 'vanished'; samples: number }
    | { status: 'timedOut'; samples: number; lastSize: number | null };

export type WatchSessionState = 'idle' | 'running' | 'stopping';

export class InvalidConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid watch configuration: ${issues.join(' ')}`);
        this.name = 'InvalidConfigError';
        this.issues = issues;
    }
}

export class MonitoringConflictError extends Error {
    constructor(message = 'Monitoring is already running.') {
        super(message);
        this.name = 'MonitoringConflictError';
    }
}
