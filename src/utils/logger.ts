import * as fs from 'node:fs/promises';
import path from 'node:path';
import type { LogLevel } from '../types/watch-session.js';

const REDACTED = '[REDACTED]';

/** Values that must never appear verbatim in logs or API responses. */
const sensitiveValues = new Set<string>();

const SECRET_ASSIGNMENT_PATTERN = /\b(token|secret|password|api[_-]?key)(\s*[=:]\s*)([^\s&"',]+)/gi;
const WEBHOOK_TOKEN_PATTERN = /(\/api\/webhooks\/\d+\/)[\w-]+/gi;

export function registerSensitiveValue(value: string): void {
    const trimmed = value.trim();
    if (trimmed.length >= 8) {
        sensitiveValues.add(trimmed);
    }
}

export function clearSensitiveValuesForTests(): void {
    sensitiveValues.clear();
}

/**
 * Redact webhook tokens and other credentials from free-form text.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const value of sensitiveValues) {
        scrubbed = scrubbed.split(value).join(REDACTED);
    }
    return scrubbed
        .replace(WEBHOOK_TOKEN_PATTERN, `$1${REDACTED}`)
        .replace(SECRET_ASSIGNMENT_PATTERN, `$1$2${REDACTED}`);
}

export function getLogDir(): string {
    const override = process.env.SHOTRELAY_LOG_DIR;
    if (override && override.trim() !== '') return path.resolve(override);
    return path.resolve('logs');
}

export function dailyLogPath(date: Date = new Date()): string {
    return path.join(getLogDir(), `${date.toISOString().slice(0, 10)}.md`);
}

export function formatLogEntry(level: LogLevel, message: string, timestamp: Date): string {
    return `## ${level.toUpperCase()} @ ${timestamp.toISOString()}\n${scrubSensitiveText(message)}\n\n`;
}

/**
 * Append an entry to today's activity log (`<logDir>/<YYYY-MM-DD>.md`).
 * Write failures go to stderr and never reject.
 */
export async function logActivity(level: LogLevel, message: string, timestamp: Date = new Date()): Promise<void> {
    const target = dailyLogPath(timestamp);
    try {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.appendFile(target, formatLogEntry(level, message, timestamp), 'utf8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[shotrelay] Failed to write activity log ${target}: ${reason}`);
    }
}
