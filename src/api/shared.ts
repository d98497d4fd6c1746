import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { logActivity, scrubSensitiveText } from '../utils/logger.js';

// ── Response Helpers ────────────────────────────────────────────────────────

function readCorrelationId(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const correlationId = readCorrelationId(res);
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError<T>(res: Response, message: string, status = 400, data?: T): void {
    const correlationId = readCorrelationId(res);
    const body: ApiEnvelope<T> = {
        ok: false,
        error: scrubSensitiveText(message),
        data,
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    void logActivity('info', `[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
