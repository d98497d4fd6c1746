import { Blob } from 'node:buffer';
import { readFile } from 'node:fs/promises';
import { performance } from 'node:perf_hooks';
import type { UploadResult } from '../types/watch-session.js';
import { scrubSensitiveText } from '../utils/logger.js';

export interface UploadRequest {
    webhookUrl: string;
    /** Base name sent as the multipart filename. */
    fileName: string;
    /** File contents; read from `filePath` when omitted. */
    data?: Uint8Array;
    filePath?: string;
    /** Epoch ms of the creation event, used for `totalDurationMs`. */
    detectedAtMs?: number;
    /** Overrides the client-wide timeout; 0 disables it. */
    timeoutMs?: number;
}

export interface UploadClientOptions {
    /** @default 60000 */
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
    now?: () => number;
}

const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_ERROR_BODY_CHARS = 200;

/** Aborts surface as DOMException, which is not always an `Error` instance. */
function isTimeoutError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('name' in error)) return false;
    return error.name === 'TimeoutError' || error.name === 'AbortError';
}

function describeNetworkError(error: TypeError): string {
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) {
        return `${error.message} (${cause.message})`;
    }
    return error.message;
}

/**
 * Posts one file as multipart field `file` to a webhook. A single attempt is
 * made; failures are classified and returned, never thrown.
 */
export class UploadClient {
    readonly #timeoutMs: number;
    readonly #fetch: typeof fetch;
    readonly #now: () => number;

    constructor(options: UploadClientOptions = {}) {
        this.#timeoutMs = Math.max(0, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
        this.#fetch = options.fetchImpl ?? fetch;
        this.#now = options.now ?? (() => Date.now());
    }

    async upload(request: UploadRequest): Promise<UploadResult> {
        if (request.webhookUrl.trim() === '') {
            return { kind: 'skipped', reason: 'No webhook URL configured.' };
        }

        let data: Uint8Array;
        try {
            data = request.data ?? (await this.#readSource(request));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            return { kind: 'failed', errorKind: 'unknown', message: `Could not read file: ${message}` };
        }

        const form = new FormData();
        form.append('file', new Blob([data]), request.fileName);

        const timeoutMs = request.timeoutMs ?? this.#timeoutMs;
        const startedAt = performance.now();

        try {
            const response = await this.#fetch(request.webhookUrl, {
                method: 'POST',
                body: form,
                signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
            });
            const body = await response.text();
            const uploadDurationMs = performance.now() - startedAt;

            if (response.status < 200 || response.status > 299) {
                const detail = body.trim().slice(0, MAX_ERROR_BODY_CHARS);
                return {
                    kind: 'failed',
                    errorKind: 'httpStatus',
                    status: response.status,
                    message: scrubSensitiveText(
                        detail ? `Status code: ${response.status} (${detail})` : `Status code: ${response.status}`,
                    ),
                };
            }

            const totalDurationMs = request.detectedAtMs !== undefined
                ? Math.max(uploadDurationMs, this.#now() - request.detectedAtMs)
                : uploadDurationMs;
            return { kind: 'success', uploadDurationMs, totalDurationMs };
        } catch (error) {
            if (isTimeoutError(error)) {
                return { kind: 'failed', errorKind: 'network', message: `Request timed out after ${timeoutMs}ms.` };
            }
            if (error instanceof TypeError) {
                return { kind: 'failed', errorKind: 'network', message: scrubSensitiveText(describeNetworkError(error)) };
            }
            const message = error instanceof Error ? error.message : String(error);
            return { kind: 'failed', errorKind: 'unknown', message: scrubSensitiveText(message) };
        }
    }

    async #readSource(request: UploadRequest): Promise<Uint8Array> {
        if (!request.filePath) {
            throw new Error('Upload request carries neither data nor a file path.');
        }
        return readFile(request.filePath);
    }
}
