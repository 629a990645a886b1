import type { AutomationBrowser } from '../services/browser-driver.js';
import { parseViewport } from '../services/browser-driver.js';
import type { ExecutionEnvironment } from '../services/execution-environment.js';
import type { VisualCheckOutcome, VisualCheckRequest } from '../services/visual-checker.js';
import type { ExecutionEnvKind, ExecutionResult, TestDescriptor } from '../types/pipeline.js';
import { logThought } from '../utils/logger.js';
import { errorMessage } from './errors.js';
import { testFinished, testProgress, testStarted, type PipelineEventEmitter } from './events.js';

/** Returns the environment a descriptor runs on; `undefined` means the pipeline default. */
export type EnvironmentResolver = (override: ExecutionEnvKind | undefined) => ExecutionEnvironment;

/** Anything that can hand out a connected browser, typically an `EndpointProvider`. */
export interface BrowserSource {
    acquire(): Promise<AutomationBrowser>;
}

export interface VisualCheck {
    check(browser: AutomationBrowser, request: VisualCheckRequest): Promise<VisualCheckOutcome>;
}

export interface TestDispatcherOptions {
    emitter: PipelineEventEmitter;
    resolveEnvironment: EnvironmentResolver;
    /** `null` when the run has no browser endpoint; visual tests are then skipped. */
    browser: BrowserSource | null;
    visualChecker?: VisualCheck;
}

export interface DispatchContext {
    strategy: string;
    targetDir: string;
}

interface Outcome {
    status: ExecutionResult['status'];
    error?: string;
    artifact?: string;
    baseline?: string;
}

/**
 * Runs test descriptors and reports their progress as pipeline events.
 *
 * A descriptor never throws out of `dispatch`: every failure becomes a
 * `FAILED` result so sibling tests keep running.
 */
export class TestDispatcher {
    readonly #emitter: PipelineEventEmitter;
    readonly #resolveEnvironment: EnvironmentResolver;
    readonly #browser: BrowserSource | null;
    readonly #visualChecker?: VisualCheck;

    constructor(options: TestDispatcherOptions) {
        this.#emitter = options.emitter;
        this.#resolveEnvironment = options.resolveEnvironment;
        this.#browser = options.browser;
        this.#visualChecker = options.visualChecker;
    }

    /** Dispatch every descriptor concurrently; results keep the input order. */
    dispatchAll(tests: readonly TestDescriptor[], context: DispatchContext): Promise<ExecutionResult[]> {
        return Promise.all(tests.map((test) => this.dispatch(test, context)));
    }

    async dispatch(test: TestDescriptor, context: DispatchContext): Promise<ExecutionResult> {
        this.#emitter.emit(testStarted(test.label, test.kind, context.strategy));

        let outcome: Outcome;
        try {
            outcome = test.kind === 'visual'
                ? await this.#runVisual(test)
                : await this.#runCommand(test, context.targetDir);
        } catch (error) {
            outcome = { status: 'FAILED', error: errorMessage(error) };
        }

        const result: ExecutionResult = {
            kind: test.kind,
            label: test.label,
            status: outcome.status,
            error: outcome.error,
            artifact: outcome.artifact,
            baseline: outcome.baseline,
            strategy: context.strategy,
        };
        this.#emitter.emit(testFinished(result));
        void logThought(`[Dispatcher] ${result.status} ${result.label} (${result.kind}).`);
        return result;
    }

    async #runCommand(test: TestDescriptor, targetDir: string): Promise<Outcome> {
        const environment = this.#resolveEnvironment(test.executionEnv);
        this.#emitter.emit(testProgress(test.label, `running on ${environment.kind}`));
        const outcome = await environment.runCommand(test.commandOrPath, targetDir);
        if (outcome.success) {
            return { status: 'PASSED', artifact: outcome.artifact };
        }
        return {
            status: 'FAILED',
            error: outcome.output || 'Command failed without output.',
            artifact: outcome.artifact,
        };
    }

    async #runVisual(test: TestDescriptor): Promise<Outcome> {
        if (!this.#browser || !this.#visualChecker) {
            return { status: 'SKIPPED', error: 'No browser endpoint configured for visual tests.' };
        }

        this.#emitter.emit(testProgress(test.label, 'acquiring browser'));
        let browser: AutomationBrowser;
        try {
            browser = await this.#browser.acquire();
        } catch (error) {
            return { status: 'FAILED', error: `Browser unavailable: ${errorMessage(error)}` };
        }

        this.#emitter.emit(testProgress(test.label, 'capturing'));
        try {
            const outcome = await this.#visualChecker.check(browser, {
                label: test.label,
                pathOrUrl: test.commandOrPath,
                viewport: parseViewport(test.viewport),
            });
            if (outcome.success) {
                this.#emitter.emit(testProgress(test.label, outcome.message));
                return { status: 'PASSED', artifact: outcome.artifact, baseline: outcome.baseline };
            }
            return {
                status: 'FAILED',
                error: outcome.message,
                artifact: outcome.artifact,
                baseline: outcome.baseline,
            };
        } catch (error) {
            return { status: 'FAILED', error: `Visual test error: ${errorMessage(error)}` };
        }
    }
}
