import path from 'node:path';
import { readPipelineConfig, type ConfigOverrides, type PipelineConfig } from '../config/pipeline-config.js';
import { WatchController } from '../services/file-watcher.js';
import type { LifecycleRegistry } from '../services/lifecycle-registry.js';
import type { FileEvent, WatchOptions } from '../types/file-watcher.js';
import type { PipelineRunResult } from '../types/pipeline.js';
import { logThought } from '../utils/logger.js';
import { errorMessage } from './errors.js';
import type { PipelineEventEmitter } from './events.js';
import type { PipelineRunOptions } from './pipeline-controller.js';

/** What the orchestrator needs from a `PipelineController`. */
export interface PipelineRunner {
    readonly registry: LifecycleRegistry;
    runPipeline(targetDir: string, options?: PipelineRunOptions): Promise<PipelineRunResult>;
}

export interface StartWatchOptions {
    /** Run the pipeline once before the first change arrives. */
    initialRun?: boolean;
    /** Settle only after the watcher is stopped. */
    blocking?: boolean;
    overrides?: ConfigOverrides;
    emitter?: PipelineEventEmitter;
    env?: NodeJS.ProcessEnv;
    onRun?: (result: PipelineRunResult) => void;
    watch?: Pick<WatchOptions, 'createSource' | 'schedule' | 'now'>;
}

export interface WatchSession {
    watcher: WatchController;
    /** `false` when the directory was already being watched. */
    started: boolean;
    initialRun?: PipelineRunResult;
}

export interface WatchOrchestratorOptions {
    loadConfig?: (targetDir: string, overrides: ConfigOverrides, env: NodeJS.ProcessEnv) => Promise<PipelineConfig>;
}

/**
 * Runs at most one pipeline at a time. Triggers that arrive mid-run collapse
 * into a single rerun carrying the latest event. Once `isOpen` reports
 * `false`, a queued rerun is dropped.
 */
class SerialRunner {
    readonly #run: (event: FileEvent) => Promise<void>;
    readonly #isOpen: () => boolean;
    #running: Promise<void> | null = null;
    #pending: FileEvent | null = null;

    constructor(run: (event: FileEvent) => Promise<void>, isOpen: () => boolean) {
        this.#run = run;
        this.#isOpen = isOpen;
    }

    trigger(event: FileEvent): Promise<void> {
        if (!this.#isOpen()) return this.#running ?? Promise.resolve();
        this.#pending = event;
        if (!this.#running) {
            this.#running = this.#drain().finally(() => {
                this.#running = null;
            });
        }
        return this.#running;
    }

    async #drain(): Promise<void> {
        let event = this.#pending;
        while (event && this.#isOpen()) {
            this.#pending = null;
            await this.#run(event);
            event = this.#pending;
        }
        this.#pending = null;
    }
}

/** Binds file watchers to pipeline runs, one watcher per target directory. */
export class WatchOrchestrator {
    readonly #pipeline: PipelineRunner;
    readonly #loadConfig: NonNullable<WatchOrchestratorOptions['loadConfig']>;
    readonly #starting = new Map<string, Promise<WatchSession>>();

    constructor(pipeline: PipelineRunner, options: WatchOrchestratorOptions = {}) {
        this.#pipeline = pipeline;
        this.#loadConfig = options.loadConfig ?? readPipelineConfig;
    }

    async startWatch(targetDir: string, options: StartWatchOptions = {}): Promise<WatchSession> {
        const dir = path.resolve(targetDir);
        let starting = this.#starting.get(dir);
        if (!starting) {
            starting = this.#start(dir, options).finally(() => {
                this.#starting.delete(dir);
            });
            this.#starting.set(dir, starting);
        }
        const session = await starting;

        if (options.blocking && session.started) {
            await session.watcher.start({ blocking: true });
        }
        return session;
    }

    /** Stop the watcher and every other resource registered for `targetDir`. */
    stopWatch(targetDir: string): Promise<boolean> {
        return this.#pipeline.registry.stop(targetDir);
    }

    /** Directories that currently have a watcher. */
    async activeWatchers(): Promise<string[]> {
        const registry = this.#pipeline.registry;
        const active: string[] = [];
        for (const dir of await registry.listActive()) {
            if ((await registry.handles(dir)).some((handle) => handle instanceof WatchController)) {
                active.push(dir);
            }
        }
        return active;
    }

    async #start(dir: string, options: StartWatchOptions): Promise<WatchSession> {
        const registry = this.#pipeline.registry;
        const existing = (await registry.handles(dir)).find(
            (handle): handle is WatchController => handle instanceof WatchController,
        );
        if (existing) {
            await logThought(`[Watch] ${dir} is already being watched.`);
            return { watcher: existing, started: false };
        }

        const env = options.env ?? process.env;
        const config = await this.#loadConfig(dir, options.overrides ?? {}, env);
        const run = async (context: string): Promise<PipelineRunResult> => {
            const result = await this.#pipeline.runPipeline(dir, {
                invocation: 'watch',
                overrides: options.overrides,
                emitter: options.emitter,
                env,
                context,
            });
            options.onRun?.(result);
            return result;
        };

        let initialRun: PipelineRunResult | undefined;
        if (options.initialRun) {
            initialRun = await run('initial run');
        }

        const runner: SerialRunner = new SerialRunner(async (event) => {
            try {
                await run(`${event.type} ${event.path}`);
            } catch (error) {
                const message = `Watch-triggered run failed: ${errorMessage(error)}`;
                options.emitter?.log(message, 'ERROR');
                await logThought(`[Watch] ${message}`);
            }
        }, () => watcher.active);
        const watcher: WatchController = new WatchController(dir, (event) => runner.trigger(event), {
            debounceMs: config.watch.debounceMs,
            ignore: config.watch.ignore,
            ...options.watch,
        });
        await watcher.start();
        await registry.register(dir, watcher);
        options.emitter?.log(`Watching ${dir} for changes.`);
        return { watcher, started: true, initialRun };
    }
}
