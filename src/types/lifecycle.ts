/**
 * Anything started in the background for a target directory that must be
 * torn down explicitly: a watcher, a spawned process, a compose project.
 */
export interface ResourceHandle {
    /** Short human-readable label used in logs (e.g. `watcher:/repo`). */
    readonly description: string;
    /** Terminate the resource. Must be safe to call more than once. */
    stop(): Promise<void>;
}
