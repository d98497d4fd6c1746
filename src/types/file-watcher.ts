/** A filesystem entry that appeared in a watched directory. */
export interface CreatedEntry {
    /** Absolute path of the new file or directory. */
    path: string;
    isDirectory: boolean;
    /** Epoch milliseconds when the creation was observed. */
    detectedAtMs: number;
}

/** Callback invoked for every entry created in the watched directory. */
export type CreatedEntryListener = (entry: CreatedEntry) => void;

/** Callback invoked when the underlying watcher reports a failure. */
export type WatchErrorListener = (error: Error) => void;

export interface WatchOptions {
    /** Only direct children of the directory are reported when false. */
    recursive: boolean;
}

/**
 * Directory-watching capability the watch session is built on.
 * `watch` resolves once the watcher is ready to report events.
 */
export interface EventSource {
    watch(
        directory: string,
        options: WatchOptions,
        onCreated: CreatedEntryListener,
        onError: WatchErrorListener,
    ): Promise<void>;
    stopWatching(): Promise<void>;
}
