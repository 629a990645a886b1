import path from 'node:path';
import type { ResourceHandle } from '../types/lifecycle.js';
import { logThought } from '../utils/logger.js';

/**
 * Tracks background resources (watchers, processes, compose projects) per
 * target directory so they can be torn down together.
 *
 * One instance is created at process start and passed to every component
 * that starts or stops resources. All mutations go through a single
 * critical section.
 */
export class LifecycleRegistry {
    readonly #entries = new Map<string, ResourceHandle[]>();
    #lock: Promise<void> = Promise.resolve();

    async register(targetDir: string, handle: ResourceHandle): Promise<void> {
        const key = normalizeKey(targetDir);
        await this.#exclusive(() => {
            const handles = this.#entries.get(key) ?? [];
            handles.push(handle);
            this.#entries.set(key, handles);
        });
        void logThought(`[Lifecycle] Registered ${handle.description} for ${key}.`);
    }

    /**
     * Stop every handle registered for `targetDir` and forget the key.
     * Teardown failures are logged and do not prevent the remaining handles
     * from being stopped.
     *
     * @returns `true` when at least one handle was found.
     */
    async stop(targetDir: string): Promise<boolean> {
        const key = normalizeKey(targetDir);
        return this.#exclusive(async () => {
            const handles = this.#entries.get(key);
            this.#entries.delete(key);
            if (!handles || handles.length === 0) {
                return false;
            }

            for (const handle of handles) {
                try {
                    await handle.stop();
                } catch (error) {
                    const message = error instanceof Error ? error.message : String(error);
                    void logThought(`[Lifecycle] Failed to stop ${handle.description} for ${key}: ${message}`);
                }
            }
            void logThought(`[Lifecycle] Stopped ${handles.length} resource(s) for ${key}.`);
            return true;
        });
    }

    /**
     * Forget a single handle without stopping it; used by owners that tear
     * the handle down themselves. The key goes away with its last handle.
     */
    async unregister(targetDir: string, handle: ResourceHandle): Promise<boolean> {
        const key = normalizeKey(targetDir);
        return this.#exclusive(() => {
            const handles = this.#entries.get(key);
            const index = handles ? handles.indexOf(handle) : -1;
            if (!handles || index < 0) return false;
            handles.splice(index, 1);
            if (handles.length === 0) this.#entries.delete(key);
            return true;
        });
    }

    /** Snapshot of the handles currently registered for `targetDir`. */
    async handles(targetDir: string): Promise<ResourceHandle[]> {
        const key = normalizeKey(targetDir);
        return this.#exclusive(() => [...(this.#entries.get(key) ?? [])]);
    }

    async listActive(): Promise<string[]> {
        return this.#exclusive(() => [...this.#entries.keys()]);
    }

    /** Stop everything; used on process shutdown. */
    async stopAll(): Promise<number> {
        const keys = await this.listActive();
        let stopped = 0;
        for (const key of keys) {
            if (await this.stop(key)) stopped++;
        }
        return stopped;
    }

    #exclusive<T>(work: () => T | Promise<T>): Promise<T> {
        const run = this.#lock.then(work);
        this.#lock = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }
}

function normalizeKey(targetDir: string): string {
    return path.resolve(targetDir);
}
