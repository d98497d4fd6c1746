import type { Request, Response } from 'express';
import type { InvalidConfigDiagnostics, MonitoringLogsData } from '../../types/api.js';
import type { LogChannel } from '../../services/log-channel.js';
import type {
    MonitoringController,
    MonitoringSettingsUpdate,
} from '../../services/monitoring-controller.js';
import { InvalidConfigError, MonitoringConflictError } from '../../types/watch-session.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface MonitoringDeps {
    controller: MonitoringController;
    logChannel: LogChannel;
}

const DEFAULT_LOG_LIMIT = 100;
const MAX_LOG_LIMIT = 500;

function sendControllerError(res: Response, error: unknown): void {
    if (error instanceof InvalidConfigError) {
        sendError<InvalidConfigDiagnostics>(res, error.message, 400, { issues: error.issues });
        return;
    }
    if (error instanceof MonitoringConflictError) {
        sendError(res, error.message, 409);
        return;
    }
    const { status, message } = mapError(error);
    sendError(res, message, status);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBody(req: Request): Record<string, unknown> {
    const body: unknown = req.body;
    return isRecord(body) ? body : {};
}

/** GET /monitoring */
export function handleMonitoringStatus(deps: MonitoringDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, deps.controller.status());
    };
}

/** POST /monitoring/start */
export function handleMonitoringStart(deps: MonitoringDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            sendOk(res, await deps.controller.start());
        } catch (error) {
            sendControllerError(res, error);
        }
    };
}

/** POST /monitoring/stop */
export function handleMonitoringStop(deps: MonitoringDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            sendOk(res, await deps.controller.stop());
        } catch (error) {
            sendControllerError(res, error);
        }
    };
}

/** PATCH /monitoring/settings */
export function handleMonitoringSettings(deps: MonitoringDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const body = readBody(req);
        const update: MonitoringSettingsUpdate = {};
        const hints: string[] = [];

        if (body.uploadDelaySeconds !== undefined) {
            if (typeof body.uploadDelaySeconds === 'number') {
                update.uploadDelaySeconds = body.uploadDelaySeconds;
            } else {
                hints.push('uploadDelaySeconds must be a number.');
            }
        }
        if (body.deleteAfterUpload !== undefined) {
            if (typeof body.deleteAfterUpload === 'boolean') {
                update.deleteAfterUpload = body.deleteAfterUpload;
            } else {
                hints.push('deleteAfterUpload must be a boolean.');
            }
        }
        if (hints.length === 0 && update.uploadDelaySeconds === undefined && update.deleteAfterUpload === undefined) {
            hints.push('Provide uploadDelaySeconds and/or deleteAfterUpload.');
        }

        if (hints.length > 0) {
            sendError<InvalidConfigDiagnostics>(res, 'Invalid settings payload.', 400, { issues: hints });
            return;
        }

        try {
            sendOk(res, await deps.controller.updateSettings(update));
        } catch (error) {
            sendControllerError(res, error);
        }
    };
}

/** GET /monitoring/logs?limit=N */
export function handleMonitoringLogs(deps: MonitoringDeps) {
    return (req: Request, res: Response): void => {
        const requestedLimit = Math.floor(Number(req.query.limit ?? DEFAULT_LOG_LIMIT));
        const limit = Number.isFinite(requestedLimit) && requestedLimit >= 1
            ? Math.min(MAX_LOG_LIMIT, requestedLimit)
            : DEFAULT_LOG_LIMIT;

        const data: MonitoringLogsData = {
            events: deps.logChannel.recent(limit),
            dropped: deps.logChannel.stats().dropped,
        };
        sendOk(res, data);
    };
}
