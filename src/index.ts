#!/usr/bin/env node
import { handleConfigCli, handleHelpCli, handleUnknownCommand } from './core/cli.js';
import { runDaemon } from './core/daemon.js';
import { handleLogsCli } from './core/logs-cli.js';

const argv = process.argv.slice(2);

// ── One-shot CLI commands (no daemon startup) ────────────────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

if (await handleConfigCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (!(await handleLogsCli(argv))) {
    // ── Daemon ───────────────────────────────────────────────────────────────
    try {
        await runDaemon({ startImmediately: argv[0] === 'watch' });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[shotrelay] Startup failed: ${message}`);
        process.exit(1);
    }
}
