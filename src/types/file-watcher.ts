/** Types of filesystem changes the watcher receives. */
export type FileEventType = 'add' | 'change' | 'unlink' | 'addDir' | 'unlinkDir';

/** Normalized filesystem event payload. */
export interface FileEvent {
    type: FileEventType;
    /** Absolute path of the affected file. */
    path: string;
    /** ISO-8601 timestamp when the event was detected. */
    timestamp: string;
}

/** Callback invoked once per debounce window when a relevant change occurs. */
export type WatchCallback = (event: FileEvent) => Promise<void> | void;

/** Native notification source wrapped by the watch controller. */
export interface WatchSource {
    close(): Promise<void>;
}

export interface WatchSourceHandlers {
    /** Paths for which this returns `true` are not watched at all. */
    ignored: (filePath: string) => boolean;
    onEvent: (type: FileEventType, filePath: string) => void;
    onError: (error: unknown) => void;
}

export type WatchSourceFactory = (directory: string, handlers: WatchSourceHandlers) => WatchSource;

/** Hands work from the notification source to the event loop. */
export type TaskScheduler = (task: () => void) => void;

export interface WatchOptions {
    /** Minimum time between two callback invocations. @default 2000 */
    debounceMs?: number;
    /** Path segments to ignore (e.g. `.git`, `node_modules`). */
    ignore?: string[];
    createSource?: WatchSourceFactory;
    schedule?: TaskScheduler;
    now?: () => number;
}
