import { beforeEach, describe, expect, it, vi } from 'vitest';
import path from 'node:path';
import { FileWatcherService } from '../../src/services/file-watcher.js';
import type { CreatedEntry } from '../../src/types/file-watcher.js';

const chokidarMock = vi.hoisted(() => {
    type Handler = (...args: unknown[]) => void;

    class FakeWatcher {
        readonly handlers = new Map<string, Handler[]>();
        closed = false;

        on(event: string, handler: Handler): this {
            this.handlers.set(event, [...(this.handlers.get(event) ?? []), handler]);
            return this;
        }

        once(event: string, handler: Handler): this {
            const wrapped: Handler = (...args) => {
                this.handlers.set(event, (this.handlers.get(event) ?? []).filter((h) => h !== wrapped));
                handler(...args);
            };
            return this.on(event, wrapped);
        }

        emit(event: string, ...args: unknown[]): void {
            for (const handler of this.handlers.get(event) ?? []) handler(...args);
        }

        async close(): Promise<void> {
            this.closed = true;
        }
    }

    const watchers: FakeWatcher[] = [];
    const watch = vi.fn((_paths: string, _options: unknown) => {
        const watcher = new FakeWatcher();
        watchers.push(watcher);
        setImmediate(() => watcher.emit('ready'));
        return watcher;
    });

    return { watch, watchers };
});

vi.mock('chokidar', () => ({ watch: chokidarMock.watch }));

const DIR = path.resolve('/shots');

describe('FileWatcherService', () => {
    let created: CreatedEntry[];
    let errors: Error[];

    beforeEach(() => {
        chokidarMock.watch.mockClear();
        chokidarMock.watchers.length = 0;
        created = [];
        errors = [];
    });

    async function startWatching(recursive = false): Promise<FileWatcherService> {
        const service = new FileWatcherService(() => 123);
        await service.watch(
            DIR,
            { recursive },
            (entry) => created.push(entry),
            (error) => errors.push(error),
        );
        return service;
    }

    function currentWatcher() {
        const watcher = chokidarMock.watchers.at(-1);
        if (!watcher) throw new Error('no watcher was created');
        return watcher;
    }

    it('watches only the top level and skips pre-existing entries', async () => {
        const service = await startWatching();

        expect(chokidarMock.watch).toHaveBeenCalledWith(DIR, {
            persistent: true,
            ignoreInitial: true,
            depth: 0,
        });
        expect(service.active).toBe(true);
    });

    it('lifts the depth limit when recursive', async () => {
        await startWatching(true);

        expect(chokidarMock.watch).toHaveBeenCalledWith(DIR, {
            persistent: true,
            ignoreInitial: true,
            depth: undefined,
        });
    });

    it('reports new files and directories with their detection time', async () => {
        await startWatching();
        const watcher = currentWatcher();

        watcher.emit('add', path.join(DIR, 'shot.png'));
        watcher.emit('addDir', path.join(DIR, 'album'));

        expect(created).toEqual([
            { path: path.join(DIR, 'shot.png'), isDirectory: false, detectedAtMs: 123 },
            { path: path.join(DIR, 'album'), isDirectory: true, detectedAtMs: 123 },
        ]);
    });

    it('reports removal of the watched directory as an error', async () => {
        await startWatching();
        const watcher = currentWatcher();

        watcher.emit('unlinkDir', path.join(DIR, 'album'));
        watcher.emit('unlinkDir', DIR);

        expect(errors.map((error) => error.message)).toEqual([`Watched directory was removed: ${DIR}`]);
    });

    it('forwards watcher errors, wrapping non-Error values', async () => {
        await startWatching();
        const watcher = currentWatcher();

        watcher.emit('error', new Error('EMFILE: too many open files'));
        watcher.emit('error', 'plain failure');

        expect(errors.map((error) => error.message)).toEqual(['EMFILE: too many open files', 'plain failure']);
    });

    it('refuses to watch twice without stopping', async () => {
        const service = await startWatching();

        await expect(service.watch(DIR, { recursive: false }, () => undefined, () => undefined))
            .rejects.toThrow(/Already watching/);
        expect(chokidarMock.watch).toHaveBeenCalledTimes(1);
    });

    it('closes the watcher on stop and tolerates a second stop', async () => {
        const service = await startWatching();
        const watcher = currentWatcher();

        await service.stopWatching();
        await service.stopWatching();

        expect(watcher.closed).toBe(true);
        expect(service.active).toBe(false);
    });
});
