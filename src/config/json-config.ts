import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
    DEFAULT_ALLOWED_EXTENSIONS,
    MAX_UPLOAD_DELAY_SECONDS,
    MIN_UPLOAD_DELAY_SECONDS,
    type WatchConfig,
} from '../types/watch-session.js';

export interface MonitoringSettings {
    watchDirectory: string;
    webhookUrl: string;
    uploadDelaySeconds: number;
    deleteAfterUpload: boolean;
    allowedExtensions: string[];
    /** Resume monitoring on the next launch. */
    monitoringActive: boolean;
    /** 0 waits for a file to settle indefinitely. */
    stabilityTimeoutSeconds: number;
    /** 0 disables the webhook request timeout. */
    requestTimeoutSeconds: number;
}

export interface ShotRelayConfig {
    monitoring: MonitoringSettings;
    runtime: {
        apiHost: string;
        apiPort: number;
    };
}

export const DEFAULT_CONFIG: ShotRelayConfig = {
    monitoring: {
        watchDirectory: '',
        webhookUrl: '',
        uploadDelaySeconds: 2,
        deleteAfterUpload: false,
        allowedExtensions: [...DEFAULT_ALLOWED_EXTENSIONS],
        monitoringActive: false,
        stabilityTimeoutSeconds: 300,
        requestTimeoutSeconds: 60,
    },
    runtime: {
        apiHost: '127.0.0.1',
        apiPort: 18790,
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.SHOTRELAY_CONFIG_PATH) {
        return path.resolve(process.env.SHOTRELAY_CONFIG_PATH);
    }
    return path.join(os.homedir(), '.shotrelay', 'config.json');
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

export async function readConfig(overridePath?: string): Promise<ShotRelayConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (errorCode(error) === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${errorMessage(error)}`);
    }
    try {
        const parsed: unknown = JSON.parse(rawData);
        return mergeWithDefaults(parsed);
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${errorMessage(error)}`);
    }
}

export async function writeConfig(config: ShotRelayConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        if (existsSync(tempPath)) {
            await fs.unlink(tempPath).catch((cleanupError: unknown) => {
                console.error(`[shotrelay] Failed to remove temp config ${tempPath}:`, cleanupError);
            });
        }
        throw new Error(`Failed to save config to ${targetPath}: ${errorMessage(error)}`);
    }
}

/** Read, modify and write the config file in one step. */
export async function updateConfig(
    mutate: (config: ShotRelayConfig) => void,
    overridePath?: string,
): Promise<ShotRelayConfig> {
    const config = await readConfig(overridePath);
    mutate(config);
    await writeConfig(config, overridePath);
    return config;
}

/** `.PNG`, `png` and ` .png ` all become `.png`. */
export function normalizeExtension(extension: string): string {
    const trimmed = extension.trim().toLowerCase();
    if (trimmed === '') return '';
    return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function clampUploadDelay(seconds: number): number {
    if (!Number.isFinite(seconds)) return DEFAULT_CONFIG.monitoring.uploadDelaySeconds;
    return Math.min(MAX_UPLOAD_DELAY_SECONDS, Math.max(MIN_UPLOAD_DELAY_SECONDS, Math.round(seconds)));
}

/** Build the snapshot a watch session starts from. */
export function toWatchConfig(config: ShotRelayConfig): WatchConfig {
    const monitoring = config.monitoring;
    const extensions = monitoring.allowedExtensions
        .map(normalizeExtension)
        .filter((value) => value !== '');

    return {
        directory: monitoring.watchDirectory,
        webhookUrl: monitoring.webhookUrl.trim(),
        uploadDelaySeconds: clampUploadDelay(monitoring.uploadDelaySeconds),
        deleteAfterUpload: monitoring.deleteAfterUpload,
        allowedExtensions: new Set(extensions),
        stabilityTimeoutMs: Math.max(0, monitoring.stabilityTimeoutSeconds) * 1000,
        requestTimeoutMs: Math.max(0, monitoring.requestTimeoutSeconds) * 1000,
    };
}

/** Port for the control plane; `SHOTRELAY_API_PORT` wins over the file. */
export function resolveApiPort(config: ShotRelayConfig): number {
    const override = Number(process.env.SHOTRELAY_API_PORT);
    if (Number.isInteger(override) && override > 0 && override < 65536) {
        return override;
    }
    return config.runtime.apiPort;
}

function pickString(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

function pickNumber(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}

function mergeWithDefaults(loaded: unknown): ShotRelayConfig {
    const loadedRecord = asRecord(loaded);
    const monitoring = asRecord(loadedRecord.monitoring);
    const runtime = asRecord(loadedRecord.runtime);
    const defaults = DEFAULT_CONFIG.monitoring;

    return {
        monitoring: {
            watchDirectory: pickString(monitoring.watchDirectory, defaults.watchDirectory),
            webhookUrl: pickString(monitoring.webhookUrl, defaults.webhookUrl),
            uploadDelaySeconds: pickNumber(monitoring.uploadDelaySeconds, defaults.uploadDelaySeconds),
            deleteAfterUpload: pickBoolean(monitoring.deleteAfterUpload, defaults.deleteAfterUpload),
            allowedExtensions: Array.isArray(monitoring.allowedExtensions)
                ? monitoring.allowedExtensions.filter((value): value is string => typeof value === 'string')
                : [...defaults.allowedExtensions],
            monitoringActive: pickBoolean(monitoring.monitoringActive, defaults.monitoringActive),
            stabilityTimeoutSeconds: pickNumber(monitoring.stabilityTimeoutSeconds, defaults.stabilityTimeoutSeconds),
            requestTimeoutSeconds: pickNumber(monitoring.requestTimeoutSeconds, defaults.requestTimeoutSeconds),
        },
        runtime: {
            apiHost: pickString(runtime.apiHost, DEFAULT_CONFIG.runtime.apiHost),
            apiPort: pickNumber(runtime.apiPort, DEFAULT_CONFIG.runtime.apiPort),
        },
    };
}

function errorCode(error: unknown): string | undefined {
    if (isRecord(error) && typeof error.code === 'string') return error.code;
    return undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
