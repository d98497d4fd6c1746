import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { LogChannel } from '../../services/log-channel.js';
import type { MonitoringController } from '../../services/monitoring-controller.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    controller: MonitoringController;
    logChannel: LogChannel;
}

/** GET /health: process uptime plus the monitoring state. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const status = deps.controller.status();
        const data: HealthData = {
            status: status.state === 'stopping' ? 'degraded' : 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            monitoring: status.state,
            logs: deps.logChannel.stats(),
        };
        sendOk(res, data);
    };
}
