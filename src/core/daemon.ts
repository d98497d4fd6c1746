import type { Server } from 'node:http';
import { startApiServer } from '../api/router.js';
import { readConfig, resolveApiPort } from '../config/json-config.js';
import { FileWatcherService } from '../services/file-watcher.js';
import { LogChannel } from '../services/log-channel.js';
import { MonitoringController } from '../services/monitoring-controller.js';
import { StabilityChecker } from '../services/stability-checker.js';
import { UploadClient } from '../services/upload-client.js';
import { WatchSession } from '../services/watch-session.js';
import { InvalidConfigError, type LogEvent } from '../types/watch-session.js';
import { scrubSensitiveText } from '../utils/logger.js';

export interface Runtime {
    logChannel: LogChannel;
    controller: MonitoringController;
}

export interface RuntimeOptions {
    configPath?: string;
    /** Write channel events to the daily log file. @default true */
    persistLogs?: boolean;
}

export interface DaemonOptions extends RuntimeOptions {
    /** Start monitoring right away instead of only resuming a previous run. */
    startImmediately: boolean;
}

export function formatConsoleLine(event: LogEvent): string {
    const time = new Date(event.timestampMs).toISOString().slice(11, 19);
    return `[shotrelay] ${time} [${event.level}] ${event.message}`;
}

/** Wire the log channel and monitoring controller with production collaborators. */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
    const logChannel = new LogChannel({ persist: options.persistLogs ?? true });
    const controller = new MonitoringController({
        configPath: options.configPath,
        createSession: () => new WatchSession({
            eventSource: new FileWatcherService(),
            stabilityChecker: new StabilityChecker(),
            uploader: new UploadClient(),
            sink: logChannel.publish,
        }),
    });
    return { logChannel, controller };
}

function describeStartFailure(error: unknown): string {
    if (error instanceof InvalidConfigError) {
        return error.issues.join(' ');
    }
    return scrubSensitiveText(error instanceof Error ? error.message : String(error));
}

/**
 * Run until SIGINT/SIGTERM: control-plane API plus the monitoring session.
 * Resolves once the server is listening.
 */
export async function runDaemon(options: DaemonOptions): Promise<Server> {
    const runtime = createRuntime(options);
    const { controller, logChannel } = runtime;

    logChannel.subscribe((event) => {
        const line = formatConsoleLine(event);
        if (event.level === 'error') console.error(line);
        else if (event.level === 'warning') console.warn(line);
        else console.log(line);
    });

    const config = await readConfig(options.configPath);
    const server = await startApiServer(runtime, {
        host: config.runtime.apiHost,
        port: resolveApiPort(config),
    });

    try {
        if (options.startImmediately) {
            await controller.start();
        } else if (!(await controller.resumeIfActive())) {
            console.log("[shotrelay] Monitoring is idle. POST /monitoring/start or run 'shotrelay watch' to begin.");
        }
    } catch (error) {
        console.error(`[shotrelay] Could not start monitoring: ${describeStartFailure(error)}`);
        if (options.startImmediately) process.exitCode = 1;
    }

    let shuttingDown = false;
    const shutdown = (signal: NodeJS.Signals): void => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`[shotrelay] Received ${signal}, stopping...`);
        void controller.shutdown()
            .catch((error: unknown) => {
                console.error(`[shotrelay] Failed to stop monitoring: ${describeStartFailure(error)}`);
                process.exitCode = 1;
            })
            .then(() => logChannel.flush())
            .finally(() => {
                server.close(() => process.exit(process.exitCode ?? 0));
            });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    return server;
}
