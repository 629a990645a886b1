import path from 'node:path';
import { watch } from 'chokidar';
import type { ResourceHandle } from '../types/lifecycle.js';
import type {
    FileEvent,
    FileEventType,
    TaskScheduler,
    WatchCallback,
    WatchOptions,
    WatchSource,
    WatchSourceFactory,
} from '../types/file-watcher.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_DEBOUNCE_MS = 2_000;
const DEFAULT_IGNORE = ['.git', 'node_modules', '.astro', '__pycache__', '.aether'];

/** Default notification source backed by `chokidar`. */
export const createChokidarSource: WatchSourceFactory = (directory, handlers) => {
    const watcher = watch(directory, {
        ignored: handlers.ignored,
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: {
            stabilityThreshold: 300,
            pollInterval: 100,
        },
    });
    watcher.on('all', (eventName, filePath) => handlers.onEvent(eventName, filePath));
    watcher.on('error', (error) => handlers.onError(error));
    return { close: () => watcher.close() };
};

const scheduleOnEventLoop: TaskScheduler = (task) => {
    setImmediate(task);
};

/** `true` when any path segment below `rootDir` is on the ignore list. */
export function isIgnoredPath(filePath: string, rootDir: string, ignore: readonly string[]): boolean {
    const relative = path.relative(rootDir, filePath);
    if (!relative) return false;
    return relative.split(/[\\/]/).some((segment) => ignore.includes(segment));
}

/**
 * Debounced change detector for one target directory.
 *
 * Directory events and ignored paths are dropped. Any other event triggers
 * the callback once, provided more than `debounceMs` elapsed since the last
 * trigger. The callback runs on the event loop through the scheduler, never
 * inside the notification source's own handler.
 *
 * ```ts
 * const controller = new WatchController('/repo', () => runPipeline('/repo'));
 * await controller.start();
 * await registry.register('/repo', controller);
 * ```
 */
export class WatchController implements ResourceHandle {
    readonly targetDir: string;
    readonly description: string;
    readonly #callback: WatchCallback;
    readonly #debounceMs: number;
    readonly #ignore: readonly string[];
    readonly #createSource: WatchSourceFactory;
    readonly #schedule: TaskScheduler;
    readonly #now: () => number;
    readonly #blockedCallers: Array<() => void> = [];
    #source: WatchSource | null = null;
    #lastTriggerTime = Number.NEGATIVE_INFINITY;
    #triggerCount = 0;
    #stopping: Promise<void> | null = null;

    constructor(targetDir: string, callback: WatchCallback, options: WatchOptions = {}) {
        this.targetDir = path.resolve(targetDir);
        this.description = `watcher:${this.targetDir}`;
        this.#callback = callback;
        this.#debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
        this.#ignore = options.ignore ?? DEFAULT_IGNORE;
        this.#createSource = options.createSource ?? createChokidarSource;
        this.#schedule = options.schedule ?? scheduleOnEventLoop;
        this.#now = options.now ?? Date.now;
    }

    get active(): boolean {
        return this.#source !== null && this.#stopping === null;
    }

    get triggerCount(): number {
        return this.#triggerCount;
    }

    /**
     * Begin watching. With `blocking`, the returned promise settles only
     * after {@link stop} is called.
     */
    async start(options: { blocking?: boolean } = {}): Promise<void> {
        if (this.#stopping) {
            throw new Error(`[Watcher] ${this.targetDir} was stopped and cannot be restarted.`);
        }
        if (!this.#source) {
            this.#source = this.#createSource(this.targetDir, {
                ignored: (filePath) => isIgnoredPath(filePath, this.targetDir, this.#ignore),
                onEvent: (type, filePath) => {
                    this.handleRawEvent(type, filePath);
                },
                onError: (error) => {
                    const message = error instanceof Error ? error.message : String(error);
                    void logThought(`[Watcher] Error on ${this.targetDir}: ${message}`);
                },
            });
            await logThought(`[Watcher] Watching ${this.targetDir} for changes (debounce ${this.#debounceMs}ms).`);
        }

        if (options.blocking) {
            await new Promise<void>((resolve) => {
                this.#blockedCallers.push(resolve);
            });
        }
    }

    /**
     * Apply filtering and debounce to one raw notification.
     *
     * @returns `true` when the event triggered the callback.
     */
    handleRawEvent(type: FileEventType, filePath: string): boolean {
        if (this.#stopping) return false;
        if (type === 'addDir' || type === 'unlinkDir') return false;
        if (isIgnoredPath(filePath, this.targetDir, this.#ignore)) return false;

        const now = this.#now();
        if (now - this.#lastTriggerTime <= this.#debounceMs) {
            return false;
        }
        this.#lastTriggerTime = now;
        this.#triggerCount++;

        const event: FileEvent = {
            type,
            path: filePath,
            timestamp: new Date(now).toISOString(),
        };
        this.#schedule(() => {
            void this.#invoke(event);
        });
        return true;
    }

    stop(): Promise<void> {
        if (!this.#stopping) {
            this.#stopping = this.#close();
        }
        return this.#stopping;
    }

    async #close(): Promise<void> {
        const source = this.#source;
        this.#source = null;
        try {
            if (source) {
                await source.close();
                await logThought(`[Watcher] Stopped watching ${this.targetDir}.`);
            }
        } finally {
            for (const release of this.#blockedCallers.splice(0)) {
                release();
            }
        }
    }

    async #invoke(event: FileEvent): Promise<void> {
        await logThought(`[Watcher] ${event.type} on ${event.path}; triggering callback.`);
        try {
            await this.#callback(event);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            await logThought(`[Watcher] Callback for ${this.targetDir} failed: ${message}`);
        }
    }
}
