import type { LogChannelStats } from '../services/log-channel.js';
import type { MonitoringStatus } from '../services/monitoring-controller.js';
import type { LogEvent, WatchSessionState } from './watch-session.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    monitoring: WatchSessionState;
    logs: LogChannelStats;
}

// ── Monitoring ──────────────────────────────────────────────────────────────

export type MonitoringStatusData = MonitoringStatus;

export interface MonitoringLogsData {
    events: LogEvent[];
    dropped: number;
}

export interface InvalidConfigDiagnostics {
    issues: string[];
}
