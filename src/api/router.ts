import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth } from './handlers/health.js';
import {
    handleMonitoringLogs,
    handleMonitoringSettings,
    handleMonitoringStart,
    handleMonitoringStatus,
    handleMonitoringStop,
    type MonitoringDeps,
} from './handlers/monitoring.js';
import { requestLogger, sendError } from './shared.js';
import type { LogChannel } from '../services/log-channel.js';
import type { MonitoringController } from '../services/monitoring-controller.js';
import { logActivity } from '../utils/logger.js';

export interface ApiServerDeps {
    controller: MonitoringController;
    logChannel: LogChannel;
}

export interface ApiServerOptions {
    host: string;
    port: number;
}

/**
 * Build the control-plane app.
 *
 * Endpoints:
 *   GET   /health               Process health and monitoring state
 *   GET   /monitoring           Current session status
 *   POST  /monitoring/start     Start monitoring from the saved config
 *   POST  /monitoring/stop      Stop monitoring
 *   PATCH /monitoring/settings  Update delay / delete-after-upload live
 *   GET   /monitoring/logs      Recent activity log entries
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json());
    app.use(requestLogger);

    const monitoringDeps: MonitoringDeps = {
        controller: deps.controller,
        logChannel: deps.logChannel,
    };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(monitoringDeps));
    app.get('/monitoring', handleMonitoringStatus(monitoringDeps));
    app.post('/monitoring/start', handleMonitoringStart(monitoringDeps));
    app.post('/monitoring/stop', handleMonitoringStop(monitoringDeps));
    app.patch('/monitoring/settings', handleMonitoringSettings(monitoringDeps));
    app.get('/monitoring/logs', handleMonitoringLogs(monitoringDeps));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Create the control-plane app and listen on `host:port`. */
export function startApiServer(deps: ApiServerDeps, options: ApiServerOptions): Promise<Server> {
    const server = createServer(createApiApp(deps));

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(options.port, options.host, () => {
            server.off('error', reject);
            console.log(`[shotrelay API] Control plane listening on http://${options.host}:${options.port}`);
            void logActivity('info', `[API] HTTP server started on ${options.host}:${options.port}.`);
            resolve(server);
        });
    });
}
