import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import type {
    CreatedEntryListener,
    EventSource,
    WatchErrorListener,
    WatchOptions,
} from '../types/file-watcher.js';

/**
 * {@link EventSource} backed by `chokidar`.
 *
 * Only creations are reported (`add` / `addDir`). Entries already present when
 * watching starts are not reported. Removal of the watched directory itself is
 * surfaced through the error listener.
 *
 * Usage:
 * ```ts
 * const watcher = new FileWatcherService();
 * await watcher.watch('/home/me/Pictures/Screenshots', { recursive: false },
 *     (entry) => console.log(entry.path),
 *     (err) => console.error(err));
 * await watcher.stopWatching();
 * ```
 */
export class FileWatcherService implements EventSource {
    #watcher: FSWatcher | null = null;
    readonly #now: () => number;

    constructor(now: () => number = () => Date.now()) {
        this.#now = now;
    }

    get active(): boolean {
        return this.#watcher !== null;
    }

    async watch(
        directory: string,
        options: WatchOptions,
        onCreated: CreatedEntryListener,
        onError: WatchErrorListener,
    ): Promise<void> {
        if (this.#watcher) {
            throw new Error(`[FileWatcher] Already watching; stop before watching '${directory}'.`);
        }

        const watcher = watch(directory, {
            persistent: true,
            ignoreInitial: true,
            depth: options.recursive ? undefined : 0,
        });

        watcher.on('add', (filePath: string) => {
            onCreated({ path: filePath, isDirectory: false, detectedAtMs: this.#now() });
        });
        watcher.on('addDir', (dirPath: string) => {
            onCreated({ path: dirPath, isDirectory: true, detectedAtMs: this.#now() });
        });
        const root = path.resolve(directory);
        watcher.on('unlinkDir', (dirPath: string) => {
            if (path.resolve(dirPath) === root) {
                onError(new Error(`Watched directory was removed: ${directory}`));
            }
        });
        watcher.on('error', (err: unknown) => {
            onError(err instanceof Error ? err : new Error(String(err)));
        });

        this.#watcher = watcher;

        await new Promise<void>((resolve) => {
            watcher.once('ready', () => resolve());
        });
    }

    async stopWatching(): Promise<void> {
        const watcher = this.#watcher;
        if (!watcher) return;
        this.#watcher = null;
        await watcher.close();
    }
}
