import path from 'node:path';
import { readPipelineConfig, type ConfigOverrides, type PipelineConfig } from '../config/pipeline-config.js';
import { AllureResultsReporter } from '../services/allure-reporter.js';
import {
    EndpointProvider,
    resolveEndpointStrategy,
    type ConfirmFn,
} from '../services/endpoint-provider.js';
import { createExecutionEnvironment, type ExecutionEnvironment } from '../services/execution-environment.js';
import type { LifecycleRegistry } from '../services/lifecycle-registry.js';
import { ServiceManager, type ServiceManagerOptions } from '../services/service-manager.js';
import { saveSession } from '../services/session-store.js';
import { VisualChecker } from '../services/visual-checker.js';
import type { LogLevel } from '../types/events.js';
import type { ResourceHandle } from '../types/lifecycle.js';
import {
    FULL_RUN_SIGNAL,
    type ExecutionEnvKind,
    type ExecutionResult,
    type InvocationContext,
    type PipelineOutcome,
    type PipelinePhase,
    type PipelineRunResult,
    type Reporter,
    type TestDescriptor,
    type TestPlanner,
} from '../types/pipeline.js';
import { logThought } from '../utils/logger.js';
import { PipelineCancelledError, errorMessage } from './errors.js';
import { PipelineEventEmitter, pipelineResult } from './events.js';
import { applyQualityGuard } from './quality-guard.js';
import {
    TestDispatcher,
    type BrowserSource,
    type DispatchContext,
    type TestDispatcherOptions,
    type VisualCheck,
} from './test-dispatcher.js';
import { DefinitionFilePlanner, analyzeChanges, readChangeArtifact } from './test-plan.js';

/** The slice of an endpoint provider the controller drives. */
export interface ManagedBrowserSource extends BrowserSource {
    close(): Promise<void>;
}

export interface Dispatcher {
    dispatchAll(tests: readonly TestDescriptor[], context: DispatchContext): Promise<ExecutionResult[]>;
}

export interface ProvisioningContext {
    config: PipelineConfig;
    targetDir: string;
    onLog: (message: string) => void;
}

/** Collaborators of a controller. Every one has a production default. */
export interface PipelineControllerDeps {
    registry: LifecycleRegistry;
    planner?: TestPlanner;
    reporter?: Reporter;
    confirm?: ConfirmFn;
    loadConfig?: (targetDir: string, overrides: ConfigOverrides, env: NodeJS.ProcessEnv) => Promise<PipelineConfig>;
    readDiff?: (targetDir: string, env: NodeJS.ProcessEnv) => Promise<string>;
    createServiceManager?: (options: ServiceManagerOptions) => Pick<ServiceManager, 'startService' | 'runDeployment'>;
    createEnvironment?: (kind: ExecutionEnvKind, config: PipelineConfig, targetDir: string) => ExecutionEnvironment;
    createBrowserSource?: (context: ProvisioningContext) => ManagedBrowserSource | null;
    createVisualChecker?: (context: ProvisioningContext) => VisualCheck;
    createDispatcher?: (options: TestDispatcherOptions) => Dispatcher;
    saveSession?: typeof saveSession;
}

export interface PipelineRunOptions {
    invocation?: InvocationContext;
    overrides?: ConfigOverrides;
    emitter?: PipelineEventEmitter;
    signal?: AbortSignal;
    /** Free-form description of why the run happened, handed to the planner. */
    context?: string;
    env?: NodeJS.ProcessEnv;
}

/** Everything one run owns; passed explicitly between the phases. */
interface RunState {
    targetDir: string;
    invocation: InvocationContext;
    emitter: PipelineEventEmitter;
    signal?: AbortSignal;
    phase: PipelinePhase;
    env: NodeJS.ProcessEnv;
    config?: PipelineConfig;
    owned: ResourceHandle[];
    browser: ManagedBrowserSource | null;
    results: ExecutionResult[];
    executed: boolean;
    outcome: PipelineOutcome;
    error?: string;
    sessionPath?: string;
    reportPaths: string[];
}

/**
 * Runs the five pipeline phases for a target directory:
 * Preparation, Analysis, Quality Guard, Execution and Cleanup.
 *
 * Cleanup always runs. Phase-level failures end the run with an `aborted`
 * outcome; individual test failures only show up in their results.
 */
export class PipelineController {
    readonly #deps: PipelineControllerDeps;

    constructor(deps: PipelineControllerDeps) {
        this.#deps = deps;
    }

    get registry(): LifecycleRegistry {
        return this.#deps.registry;
    }

    async runPipeline(targetDir: string, options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
        const state: RunState = {
            targetDir: path.resolve(targetDir),
            invocation: options.invocation ?? 'cli',
            emitter: options.emitter ?? new PipelineEventEmitter(),
            signal: options.signal,
            phase: 'PREPARATION',
            env: options.env ?? process.env,
            owned: [],
            browser: null,
            results: [],
            executed: false,
            outcome: 'completed',
            reportPaths: [],
        };

        const loadConfig = this.#deps.loadConfig ?? readPipelineConfig;
        try {
            state.config = await loadConfig(state.targetDir, options.overrides ?? {}, state.env);
        } catch (error) {
            this.#log(state, `ERROR: ${errorMessage(error)}`, 'ERROR');
            await state.emitter.flush();
            throw error;
        }
        const config = state.config;

        try {
            await this.#runPhases(state, config, options.context);
        } catch (error) {
            // Work interrupted mid-phase surfaces as whatever the interrupted call threw.
            const cancelled = error instanceof PipelineCancelledError || state.signal?.aborted === true;
            state.outcome = cancelled ? 'cancelled' : 'aborted';
            state.error = cancelled && !(error instanceof PipelineCancelledError)
                ? errorMessage(new PipelineCancelledError(state.phase))
                : errorMessage(error);
            this.#log(state, `ERROR: ${state.error}`, 'ERROR');
        } finally {
            await this.#cleanup(state, config);
        }

        return {
            outcome: state.outcome,
            results: state.results,
            sessionPath: state.sessionPath,
            reportPaths: state.reportPaths,
            error: state.error,
        };
    }

    async #runPhases(state: RunState, config: PipelineConfig, context: string | undefined): Promise<void> {
        // ── Preparation ────────────────────────────────────────────────────
        this.#enterPhase(state, 'PREPARATION');
        this.#log(state, `Pipeline triggered for ${state.targetDir} (strategy: ${config.strategy}, environment: ${config.executionEnv})`);
        const defaultEnvironment = this.#createEnvironment(config.executionEnv, config, state.targetDir);
        await this.#prepare(state, config);

        // ── Analysis ───────────────────────────────────────────────────────
        this.#enterPhase(state, 'ANALYSIS');
        const readDiff = this.#deps.readDiff ?? ((dir, env) => readChangeArtifact(dir, { env }));
        let diff = await readDiff(state.targetDir, state.env);
        if (!diff.trim()) {
            if (state.invocation !== 'cli') {
                this.#log(state, 'No changes detected. Skipping analysis.', 'WARNING');
                state.outcome = 'no_changes';
                return;
            }
            this.#log(state, 'No changes detected; requesting a full run.');
            diff = FULL_RUN_SIGNAL;
        }

        const analysis = await analyzeChanges({
            planner: this.#deps.planner ?? new DefinitionFilePlanner(),
            targetDir: state.targetDir,
            diff,
            context: context ?? state.invocation,
            strategy: config.strategy,
            customInstruction: config.customInstruction,
            fallbackTest: config.fallbackTest,
        });
        if (analysis.usedFallback) {
            this.#log(state, `Planner recommended no tests; running fallback: ${config.fallbackTest.label}`, 'WARNING');
        } else {
            this.#log(state, `Planner recommended ${analysis.tests.length} test(s) for ${analysis.strategies.join(', ')}.`);
        }
        let tests = analysis.tests;

        // ── Quality Guard ──────────────────────────────────────────────────
        if (config.qualityChecks.enabled) {
            this.#enterPhase(state, 'QUALITY GUARD');
            const guard = applyQualityGuard(tests, config.qualityChecks);
            for (const provider of guard.unknownProviders) {
                this.#log(state, `Unknown quality provider '${provider}' skipped.`, 'WARNING');
            }
            tests = guard.tests;
        }

        // ── Execution ──────────────────────────────────────────────────────
        this.#enterPhase(state, 'EXECUTION');
        const provisioning: ProvisioningContext = {
            config,
            targetDir: state.targetDir,
            onLog: (message) => this.#log(state, message),
        };
        if (tests.some((test) => test.kind === 'visual')) {
            state.browser = this.#createBrowserSource(provisioning);
        }

        const environments = new Map<ExecutionEnvKind, ExecutionEnvironment>([[config.executionEnv, defaultEnvironment]]);
        const dispatcherOptions: TestDispatcherOptions = {
            emitter: state.emitter,
            resolveEnvironment: (override) => {
                const kind = override ?? config.executionEnv;
                let environment = environments.get(kind);
                if (!environment) {
                    environment = this.#createEnvironment(kind, config, state.targetDir);
                    environments.set(kind, environment);
                }
                return environment;
            },
            browser: state.browser,
            visualChecker: state.browser ? this.#createVisualChecker(provisioning) : undefined,
        };
        const dispatcher = this.#deps.createDispatcher?.(dispatcherOptions) ?? new TestDispatcher(dispatcherOptions);

        state.results = await dispatcher.dispatchAll(tests, { strategy: config.strategy, targetDir: state.targetDir });
        this.#checkCancelled(state);
        state.executed = true;
        state.emitter.emit(pipelineResult(state.results));
    }

    async #prepare(state: RunState, config: PipelineConfig): Promise<void> {
        const services = (this.#deps.createServiceManager ?? ((options) => new ServiceManager(options)))({
            onLog: (message) => this.#log(state, message),
            signal: state.signal,
        });

        for (const service of config.services) {
            const handle = await services.startService(service, state.targetDir);
            if (handle) await this.#own(state, handle);
            this.#checkCancelled(state);
        }

        const deployment = config.deployment[config.executionEnv] ?? config.deployment[config.browser.strategy];
        if (deployment) {
            const handle = await services.runDeployment(deployment, state.targetDir);
            if (handle) await this.#own(state, handle);
            this.#checkCancelled(state);
        }
    }

    async #own(state: RunState, handle: ResourceHandle): Promise<void> {
        state.owned.push(handle);
        await this.#deps.registry.register(state.targetDir, handle);
    }

    async #cleanup(state: RunState, config: PipelineConfig): Promise<void> {
        state.phase = 'CLEANUP';
        this.#log(state, 'PHASE: CLEANUP');

        if (state.executed) {
            await this.#persist(state, config);
        }

        if (state.browser) {
            try {
                await state.browser.close();
            } catch (error) {
                this.#log(state, `Failed to close browser endpoint: ${errorMessage(error)}`, 'ERROR');
            }
        }

        for (const handle of [...state.owned].reverse()) {
            this.#log(state, `Stopping ${handle.description}`);
            try {
                await handle.stop();
            } catch (error) {
                this.#log(state, `Failed to stop ${handle.description}: ${errorMessage(error)}`, 'ERROR');
            }
            await this.#deps.registry.unregister(state.targetDir, handle);
        }

        if (state.signal?.aborted && (state.outcome === 'completed' || state.outcome === 'no_changes')) {
            state.outcome = 'cancelled';
            state.error = errorMessage(new PipelineCancelledError('CLEANUP'));
            this.#log(state, `ERROR: ${state.error}`, 'ERROR');
        }
        if (state.outcome === 'cancelled' && (await this.#deps.registry.stop(state.targetDir))) {
            this.#log(state, `Stopped remaining background resources for ${state.targetDir}.`);
        }
        await state.emitter.flush();
    }

    async #persist(state: RunState, config: PipelineConfig): Promise<void> {
        try {
            const saved = await (this.#deps.saveSession ?? saveSession)(state.targetDir, config.strategy, state.results);
            state.sessionPath = saved.filePath;
            this.#log(state, `Session saved: ${path.basename(saved.filePath)}`);
        } catch (error) {
            this.#log(state, `Failed to save session: ${errorMessage(error)}`, 'ERROR');
        }

        if (config.allureStrategy === 'none') return;
        const reporter = this.#deps.reporter ?? new AllureResultsReporter();
        try {
            state.reportPaths = await reporter.report(state.results, state.targetDir);
            this.#log(state, `Reports written: ${state.reportPaths.join(', ')}`);
        } catch (error) {
            this.#log(state, `Reporting failed: ${errorMessage(error)}`, 'ERROR');
        }
    }

    #enterPhase(state: RunState, phase: PipelinePhase): void {
        state.phase = phase;
        this.#checkCancelled(state);
        this.#log(state, `PHASE: ${phase}`);
    }

    #checkCancelled(state: RunState): void {
        if (state.signal?.aborted) {
            throw new PipelineCancelledError(state.phase);
        }
    }

    #createEnvironment(kind: ExecutionEnvKind, config: PipelineConfig, targetDir: string): ExecutionEnvironment {
        return (this.#deps.createEnvironment ?? createExecutionEnvironment)(kind, config, targetDir);
    }

    #createBrowserSource(context: ProvisioningContext): ManagedBrowserSource | null {
        if (this.#deps.createBrowserSource) {
            return this.#deps.createBrowserSource(context);
        }
        const strategy = resolveEndpointStrategy(context.config.browser);
        if (!strategy) return null;
        return new EndpointProvider({
            strategy,
            confirm: this.#deps.confirm,
            readiness: context.config.browser.readiness,
            onLog: context.onLog,
        });
    }

    #createVisualChecker(context: ProvisioningContext): VisualCheck {
        if (this.#deps.createVisualChecker) {
            return this.#deps.createVisualChecker(context);
        }
        return new VisualChecker({ targetDir: context.targetDir, baseUrl: context.config.appUrl });
    }

    #log(state: RunState, message: string, level: LogLevel = 'INFO'): void {
        state.emitter.log(message, level);
        void logThought(`[Pipeline] ${message}`);
    }
}
