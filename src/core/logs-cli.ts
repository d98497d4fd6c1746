import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { dailyLogPath } from '../utils/logger.js';

/**
 * Handle the `logs` command.
 * Reads or tails today's activity log file.
 */
export async function handleLogsCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const follow = argv.includes('--follow') || argv.includes('-f');
    const logPath = dailyLogPath();

    if (!fs.existsSync(logPath)) {
        console.error(`[shotrelay logs] No logs found for today at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (follow) {
        console.log(`[shotrelay logs] Following logs from ${logPath}...\n`);
        try {
            // The watcher keeps the process alive until interrupted.
            followLogFile(logPath);
        } catch (err) {
            console.error(`[shotrelay logs] Failed to watch file: ${err instanceof Error ? err.message : String(err)}`);
            process.exitCode = 1;
        }
    } else {
        const contents = await fsPromises.readFile(logPath, 'utf8');
        process.stdout.write(contents);
        process.exitCode = 0;
    }

    return true;
}

const BACKLOG_BYTES = 4096;

export type ChunkWriter = (chunk: string) => void;

function writeToStdout(chunk: string): void {
    process.stdout.write(chunk);
}

function readRange(filePath: string, start: number, end: number): string {
    const length = end - start;
    if (length <= 0) return '';
    const buffer = Buffer.alloc(length);
    const fd = fs.openSync(filePath, 'r');
    try {
        const bytesRead = fs.readSync(fd, buffer, 0, length, start);
        return buffer.subarray(0, bytesRead).toString('utf8');
    } finally {
        fs.closeSync(fd);
    }
}

/**
 * Print the last 4 KB of `filePath`, then every byte appended to it.
 * A watch or read failure is reported on stderr, sets a failing exit code
 * and closes the returned watcher.
 */
export function followLogFile(filePath: string, write: ChunkWriter = writeToStdout): fs.FSWatcher {
    let position = fs.statSync(filePath).size;
    const backlog = readRange(filePath, Math.max(0, position - BACKLOG_BYTES), position);
    if (backlog !== '') write(backlog);

    const watcher = fs.watch(filePath);
    const stop = (reason: string): void => {
        console.error(`[shotrelay logs] Stopped following ${filePath}: ${reason}`);
        process.exitCode = 1;
        watcher.close();
    };

    watcher.on('change', () => {
        try {
            const size = fs.statSync(filePath).size;
            if (size > position) {
                const appended = readRange(filePath, position, size);
                position = size;
                write(appended);
            } else if (size < position) {
                // truncated
                position = size;
            }
        } catch (err) {
            stop(err instanceof Error ? err.message : String(err));
        }
    });
    watcher.on('error', (error) => stop(error.message));

    return watcher;
}
