import path from 'node:path';
import {
    clampUploadDelay,
    normalizeExtension,
    readConfig,
    writeConfig,
    type ShotRelayConfig,
} from '../config/json-config.js';
import { registerSensitiveValue, scrubSensitiveText } from '../utils/logger.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: shotrelay [command] [options]

Commands:
  (none)                    Run the daemon; resumes monitoring if it was active
  watch                     Run the daemon and start monitoring immediately
  config show               Print the current configuration
  config set <key> <value>  Change a setting (see keys below)
  logs [--follow]           Print or follow today's activity log

Config keys:
  watchDirectory            Directory to monitor for new screenshots
  webhookUrl                Webhook that receives each file
  uploadDelaySeconds        Seconds to wait before uploading (0-30)
  deleteAfterUpload         true | false
  allowedExtensions         Comma-separated list, e.g. .png,.jpg

Options:
  --help, -h                Show this help message

Examples:
  shotrelay config set watchDirectory ~/Pictures/Screenshots
  shotrelay config set webhookUrl https://example.com/hooks/upload
  shotrelay config set uploadDelaySeconds 2
  shotrelay watch
  shotrelay logs --follow
`.trim();

export const CONFIG_KEYS = [
    'watchDirectory',
    'webhookUrl',
    'uploadDelaySeconds',
    'deleteAfterUpload',
    'allowedExtensions',
] as const;

export type ConfigKey = typeof CONFIG_KEYS[number];

function isConfigKey(value: string): value is ConfigKey {
    return CONFIG_KEYS.some((key) => key === value);
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (!argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    if (argv.length === 0) return false;

    const command = argv[0];
    const KNOWN_COMMANDS = new Set(['watch', 'config', 'logs', '--help', '-h']);

    if (KNOWN_COMMANDS.has(command)) {
        return false;
    }

    console.error(`[shotrelay] Unknown command: '${command}'`);
    console.error(`Run 'shotrelay --help' to see available commands.`);
    process.exitCode = 1;
    return true;
}

/** Copy of the config that is safe to print. */
export function redactConfig(config: ShotRelayConfig): ShotRelayConfig {
    if (config.monitoring.webhookUrl !== '') {
        registerSensitiveValue(config.monitoring.webhookUrl);
    }
    return {
        ...config,
        monitoring: {
            ...config.monitoring,
            webhookUrl: config.monitoring.webhookUrl === '' ? '' : scrubSensitiveText(config.monitoring.webhookUrl),
        },
    };
}

function parseBoolean(raw: string): boolean | null {
    const value = raw.trim().toLowerCase();
    if (['true', 'yes', '1', 'on'].includes(value)) return true;
    if (['false', 'no', '0', 'off'].includes(value)) return false;
    return null;
}

/**
 * Apply one `config set` assignment. Returns an error message, or null when
 * the value was accepted.
 */
export function applyConfigValue(config: ShotRelayConfig, key: ConfigKey, raw: string): string | null {
    const monitoring = config.monitoring;
    switch (key) {
        case 'watchDirectory':
            monitoring.watchDirectory = path.resolve(raw.trim());
            return null;
        case 'webhookUrl':
            monitoring.webhookUrl = raw.trim();
            return null;
        case 'uploadDelaySeconds': {
            const seconds = Number(raw);
            if (!Number.isFinite(seconds)) return `uploadDelaySeconds must be a number, got '${raw}'.`;
            monitoring.uploadDelaySeconds = clampUploadDelay(seconds);
            return null;
        }
        case 'deleteAfterUpload': {
            const flag = parseBoolean(raw);
            if (flag === null) return `deleteAfterUpload must be true or false, got '${raw}'.`;
            monitoring.deleteAfterUpload = flag;
            return null;
        }
        case 'allowedExtensions': {
            const extensions = raw.split(',').map(normalizeExtension).filter((value) => value !== '');
            if (extensions.length === 0) return 'allowedExtensions needs at least one extension.';
            monitoring.allowedExtensions = [...new Set(extensions)];
            return null;
        }
    }
}

/**
 * Handle the `config` command (`show` / `set`).
 * Returns `true` when the command was recognized and handled.
 */
export async function handleConfigCli(argv: string[], configPath?: string): Promise<boolean> {
    if (argv[0] !== 'config') return false;

    const subcommand = argv[1] ?? 'show';

    try {
        if (subcommand === 'show') {
            const config = await readConfig(configPath);
            console.log(JSON.stringify(redactConfig(config), null, 2));
            process.exitCode = 0;
            return true;
        }

        if (subcommand === 'set') {
            const key = argv[2];
            const value = argv.slice(3).join(' ');
            if (!key || argv.length < 4) {
                console.error('[shotrelay] Usage: shotrelay config set <key> <value>');
                process.exitCode = 1;
                return true;
            }
            if (!isConfigKey(key)) {
                console.error(`[shotrelay] Unknown config key '${key}'. Expected one of: ${CONFIG_KEYS.join(', ')}.`);
                process.exitCode = 1;
                return true;
            }

            const config = await readConfig(configPath);
            const problem = applyConfigValue(config, key, value);
            if (problem) {
                console.error(`[shotrelay] ${problem}`);
                process.exitCode = 1;
                return true;
            }
            await writeConfig(config, configPath);
            console.log(`[shotrelay] Saved ${key}.`);
            process.exitCode = 0;
            return true;
        }

        console.error(`[shotrelay] Unknown config subcommand '${subcommand}'. Use 'show' or 'set'.`);
        process.exitCode = 1;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[shotrelay] Config command failed: ${scrubSensitiveText(message)}`);
        process.exitCode = 1;
    }

    return true;
}
