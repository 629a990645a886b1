import { randomUUID } from 'node:crypto';
import { createServer } from 'node:net';
import * as readline from 'node:readline';
import { ProvisioningError, ToolNotFoundError, errorMessage } from '../core/errors.js';
import type { BrowserConfig, ReadinessConfig } from '../config/pipeline-config.js';
import type { ResourceHandle } from '../types/lifecycle.js';
import { probeHttp, type HttpProbe } from '../utils/http-probe.js';
import { logThought } from '../utils/logger.js';
import { pollUntilReady } from '../utils/retry.js';
import {
    DryRunBrowser,
    playwrightLauncher,
    type AutomationBrowser,
    type BrowserLauncher,
} from './browser-driver.js';
import { runProgram, spawnProgram, type ProgramRunner } from './process-runner.js';

export type EndpointState = 'idle' | 'launching' | 'waiting_ready' | 'connected' | 'closed';

export interface EndpointSnapshot {
    state: EndpointState;
    endpointUrl?: string;
    /** Description of the spawned container/pod, while one is owned. */
    ownedResource?: string;
    /** `true` once a failed attach was replaced by a local browser. */
    fellBack: boolean;
}

/** Asks the operator (or a policy) a yes/no question. */
export type ConfirmFn = (question: string, defaultAnswer: boolean) => Promise<boolean>;

/** A container or pod started to host the browser endpoint. */
export interface SpawnedEndpoint extends ResourceHandle {
    /** CDP endpoint to attach to once ready. */
    readonly endpointUrl: string;
    /** HTTP URL polled for readiness. */
    readonly readinessUrl: string;
    isAlive(): Promise<boolean>;
}

export interface EndpointSpawner {
    spawn(): Promise<SpawnedEndpoint>;
}

export type EndpointStrategy =
    | { kind: 'local'; headless: boolean }
    | { kind: 'attach'; endpointUrl: string; allowFallback: boolean; headless: boolean }
    | { kind: 'spawn'; spawner: EndpointSpawner }
    | { kind: 'dry-run' };

export interface EndpointProviderOptions {
    strategy: EndpointStrategy;
    launcher?: BrowserLauncher;
    confirm?: ConfirmFn;
    probe?: HttpProbe;
    readiness?: Partial<ReadinessConfig>;
    /** Receives user-facing provisioning messages (mirrored to the event stream). */
    onLog?: (message: string) => void;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

export const FALLBACK_QUESTION = 'Launch local browser as fallback?';

/**
 * Prompts on an interactive terminal; answers `defaultAnswer` otherwise.
 */
export const terminalConfirm: ConfirmFn = async (question, defaultAnswer) => {
    if (!process.stdin.isTTY || !process.stdout.isTTY) {
        return defaultAnswer;
    }
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
        const hint = defaultAnswer ? '[Y/n]' : '[y/N]';
        const answer = await new Promise<string>((resolve) => {
            rl.question(`${question} ${hint} `, (reply) => resolve(reply.trim().toLowerCase()));
        });
        if (!answer) return defaultAnswer;
        return answer === 'y' || answer === 'yes';
    } finally {
        rl.close();
    }
};

/** Ask the OS for a free TCP port on the loopback interface. */
export function allocateFreePort(): Promise<number> {
    return new Promise((resolve, reject) => {
        const server = createServer();
        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            const port = typeof address === 'object' && address ? address.port : 0;
            server.close(() => {
                if (port > 0) resolve(port);
                else reject(new Error('Could not determine a free port.'));
            });
        });
    });
}

/**
 * Obtains a usable browser automation endpoint for one pipeline run.
 *
 * State machine: `idle → [launching → waiting_ready →] connected → closed`.
 * `launching` and `waiting_ready` only occur for strategies that spawn the
 * resource they connect to. `start()` is memoized, so concurrent visual tests
 * share one provisioning attempt (and one failure).
 */
export class EndpointProvider {
    readonly #strategy: EndpointStrategy;
    readonly #launcher: BrowserLauncher;
    readonly #confirm: ConfirmFn;
    readonly #probe: HttpProbe;
    readonly #readiness: Partial<ReadinessConfig>;
    readonly #onLog: (message: string) => void;
    readonly #sleep?: (ms: number) => Promise<void>;
    readonly #now?: () => number;

    #state: EndpointState = 'idle';
    #endpointUrl?: string;
    #owned: SpawnedEndpoint | null = null;
    #browser: AutomationBrowser | null = null;
    #starting: Promise<AutomationBrowser> | null = null;
    #closing: Promise<void> | null = null;
    #fellBack = false;

    constructor(options: EndpointProviderOptions) {
        this.#strategy = options.strategy;
        this.#launcher = options.launcher ?? playwrightLauncher;
        this.#confirm = options.confirm ?? terminalConfirm;
        this.#probe = options.probe ?? ((url) => probeHttp(url));
        this.#readiness = options.readiness ?? {};
        this.#onLog = options.onLog ?? (() => undefined);
        this.#sleep = options.sleep;
        this.#now = options.now;
    }

    get state(): EndpointState {
        return this.#state;
    }

    get strategyKind(): EndpointStrategy['kind'] {
        return this.#strategy.kind;
    }

    snapshot(): EndpointSnapshot {
        return {
            state: this.#state,
            endpointUrl: this.#endpointUrl,
            ownedResource: this.#owned?.description,
            fellBack: this.#fellBack,
        };
    }

    /** Provision and connect. Safe to call repeatedly. */
    async start(): Promise<void> {
        await this.acquire();
    }

    /** Connected browser, provisioning it on first use. */
    acquire(): Promise<AutomationBrowser> {
        if (this.#closing) {
            return Promise.reject(new ProvisioningError('Endpoint provider is already closed.'));
        }
        if (!this.#starting) {
            this.#starting = this.#provision();
        }
        return this.#starting;
    }

    /** Release the connection and any owned container/pod. Idempotent. */
    close(): Promise<void> {
        if (!this.#closing) {
            this.#closing = this.#teardown();
        }
        return this.#closing;
    }

    async #provision(): Promise<AutomationBrowser> {
        try {
            const browser = await this.#connectByStrategy();
            this.#browser = browser;
            this.#state = 'connected';
            return browser;
        } catch (error) {
            this.#report(`[Browser] Provisioning failed: ${errorMessage(error)}`);
            await this.#releaseOwned();
            this.#state = 'closed';
            throw error;
        }
    }

    async #connectByStrategy(): Promise<AutomationBrowser> {
        const strategy = this.#strategy;
        switch (strategy.kind) {
            case 'dry-run':
                this.#endpointUrl = 'dry-run';
                this.#report('[Browser] Using log-only strategy (dry run).');
                return new DryRunBrowser((message) => this.#report(message));
            case 'local':
                return this.#launchLocal(strategy.headless);
            case 'attach':
                return this.#attachWithFallback(strategy.endpointUrl, strategy.allowFallback, strategy.headless);
            case 'spawn':
                return this.#spawnAndAttach(strategy.spawner);
        }
    }

    async #launchLocal(headless: boolean): Promise<AutomationBrowser> {
        this.#report('[Browser] Starting local browser...');
        const browser = await this.#launcher.launch({ headless });
        this.#endpointUrl = 'local';
        this.#report('[Browser] Local browser started.');
        return browser;
    }

    async #attachWithFallback(endpointUrl: string, allowFallback: boolean, headless: boolean): Promise<AutomationBrowser> {
        this.#endpointUrl = endpointUrl;
        this.#report(`[Browser] Connecting to ${endpointUrl}...`);
        try {
            const browser = await this.#launcher.connect(endpointUrl);
            this.#report('[Browser] Connected to remote browser.');
            return browser;
        } catch (error) {
            const reason = errorMessage(error);
            this.#report(`[Browser] Could not connect to ${endpointUrl}: ${reason}`);
            if (!allowFallback) {
                throw new ProvisioningError(
                    `Could not connect to browser endpoint ${endpointUrl}: ${reason}`,
                    'Start the endpoint, or use --launch-browser to spawn one.',
                );
            }

            const confirmed = await this.#confirm(FALLBACK_QUESTION, true);
            if (!confirmed) {
                throw new ProvisioningError(
                    `Could not connect to browser endpoint ${endpointUrl} and local fallback was declined.`,
                    'Use --launch-browser to spawn a browser container automatically.',
                );
            }

            this.#report('[Browser] Switching to local browser strategy...');
            const browser = await this.#launcher.launch({ headless });
            this.#fellBack = true;
            this.#endpointUrl = 'local';
            this.#report('[Browser] Local browser started (fallback).');
            return browser;
        }
    }

    async #spawnAndAttach(spawner: EndpointSpawner): Promise<AutomationBrowser> {
        this.#state = 'launching';
        const owned = await spawner.spawn();
        this.#owned = owned;
        this.#endpointUrl = owned.endpointUrl;
        this.#report(`[Browser] Started ${owned.description}; waiting for ${owned.readinessUrl}...`);

        this.#state = 'waiting_ready';
        const poll = await pollUntilReady(async () => (await this.#probe(owned.readinessUrl)).ok, {
            ...this.#readiness,
            label: owned.description,
            isAlive: () => owned.isAlive(),
            sleep: this.#sleep,
            now: this.#now,
        });
        this.#report(`[Browser] ${owned.description} ready after ${poll.attempts} probe(s).`);

        const browser = await this.#launcher.connect(owned.endpointUrl);
        this.#report(`[Browser] Connected to ${owned.endpointUrl}.`);
        return browser;
    }

    async #teardown(): Promise<void> {
        if (this.#starting) {
            // Let an in-flight provisioning settle so its resources are known.
            await this.#starting.then(
                () => undefined,
                () => undefined,
            );
        }

        const browser = this.#browser;
        this.#browser = null;
        if (browser) {
            try {
                await browser.close();
            } catch (error) {
                this.#report(`[Browser] Failed to close browser: ${errorMessage(error)}`);
            }
        }
        await this.#releaseOwned();
        this.#state = 'closed';
    }

    async #releaseOwned(): Promise<void> {
        const owned = this.#owned;
        this.#owned = null;
        if (!owned) return;
        this.#report(`[Browser] Stopping ${owned.description}...`);
        try {
            await owned.stop();
        } catch (error) {
            this.#report(`[Browser] Failed to stop ${owned.description}: ${errorMessage(error)}`);
        }
    }

    #report(message: string): void {
        this.#onLog(message);
        void logThought(message);
    }
}

// ── Spawners ────────────────────────────────────────────────────────────────

const BROWSER_CONTAINER_PORT = 3000;

export interface ContainerSpawnerOptions {
    image: string;
    runProgram?: ProgramRunner;
    allocatePort?: () => Promise<number>;
}

/** Runs the browser image as a detached container on a random host port. */
export class ContainerEndpointSpawner implements EndpointSpawner {
    readonly #image: string;
    readonly #run: ProgramRunner;
    readonly #allocatePort: () => Promise<number>;

    constructor(options: ContainerSpawnerOptions) {
        this.#image = options.image;
        this.#run = options.runProgram ?? runProgram;
        this.#allocatePort = options.allocatePort ?? allocateFreePort;
    }

    async spawn(): Promise<SpawnedEndpoint> {
        const port = await this.#allocatePort();
        const result = await this.#run('docker', [
            'run',
            '-d',
            '--rm',
            '-p',
            `127.0.0.1:${port}:${BROWSER_CONTAINER_PORT}`,
            '--add-host',
            'host.docker.internal:host-gateway',
            this.#image,
        ]);
        if (result.notFound) {
            throw new ToolNotFoundError('docker', 'Install Docker and make sure the daemon is running.');
        }
        const containerId = result.output.trim().split('\n').pop()?.trim() ?? '';
        if (!result.ok || !containerId) {
            throw new ProvisioningError(
                `Failed to start browser container (${this.#image}): ${result.output || `exit ${result.exitCode}`}`,
                'Check that Docker is running and the image can be pulled.',
            );
        }
        return new BrowserContainer(containerId, port, this.#run);
    }
}

class BrowserContainer implements SpawnedEndpoint {
    readonly description: string;
    readonly endpointUrl: string;
    readonly readinessUrl: string;
    readonly #containerId: string;
    readonly #run: ProgramRunner;
    #stopped = false;

    constructor(containerId: string, port: number, run: ProgramRunner) {
        this.#containerId = containerId;
        this.#run = run;
        this.description = `container ${containerId.slice(0, 12)}`;
        this.endpointUrl = `ws://127.0.0.1:${port}`;
        this.readinessUrl = `http://127.0.0.1:${port}/json/version`;
    }

    async isAlive(): Promise<boolean> {
        const result = await this.#run('docker', ['inspect', '-f', '{{.State.Running}}', this.#containerId]);
        return result.ok && result.output.trim() === 'true';
    }

    async stop(): Promise<void> {
        if (this.#stopped) return;
        this.#stopped = true;
        const result = await this.#run('docker', ['stop', this.#containerId]);
        if (!result.ok) {
            throw new Error(`docker stop ${this.#containerId} failed: ${result.output}`);
        }
    }
}

/** Background process as started by {@link spawnProgram}. */
export interface BackgroundProcess extends ResourceHandle {
    isRunning(): boolean;
}

export interface PodSpawnerOptions {
    image: string;
    namespace: string;
    podName?: string;
    runProgram?: ProgramRunner;
    spawnProgram?: (executable: string, args: string[]) => BackgroundProcess;
    allocatePort?: () => Promise<number>;
}

/** Runs the browser image as a bare pod and port-forwards to it. */
export class PodEndpointSpawner implements EndpointSpawner {
    readonly #image: string;
    readonly #namespace: string;
    readonly #podName?: string;
    readonly #run: ProgramRunner;
    readonly #spawnProgram: (executable: string, args: string[]) => BackgroundProcess;
    readonly #allocatePort: () => Promise<number>;

    constructor(options: PodSpawnerOptions) {
        this.#image = options.image;
        this.#namespace = options.namespace;
        this.#podName = options.podName;
        this.#run = options.runProgram ?? runProgram;
        this.#spawnProgram = options.spawnProgram ?? ((executable, args) => spawnProgram(executable, args));
        this.#allocatePort = options.allocatePort ?? allocateFreePort;
    }

    async spawn(): Promise<SpawnedEndpoint> {
        const podName = this.#podName ?? `aether-browser-${randomUUID().replace(/-/g, '').slice(0, 8)}`;
        const namespaceFlag = `--namespace=${this.#namespace}`;

        const created = await this.#run('kubectl', [
            'run',
            podName,
            `--image=${this.#image}`,
            namespaceFlag,
            `--port=${BROWSER_CONTAINER_PORT}`,
            '--restart=Never',
        ]);
        if (created.notFound) {
            throw new ToolNotFoundError('kubectl', 'Install the Kubernetes CLI and configure a cluster context.');
        }
        if (!created.ok) {
            throw new ProvisioningError(`Failed to start browser pod ${podName}: ${created.output}`);
        }

        const pod = new BrowserPod(podName, this.#namespace, this.#run);
        try {
            const ready = await this.#run('kubectl', [
                'wait',
                '--for=condition=Ready',
                `pod/${podName}`,
                namespaceFlag,
                '--timeout=60s',
            ]);
            if (!ready.ok) {
                throw new ProvisioningError(`Browser pod ${podName} did not become Ready: ${ready.output}`);
            }

            const port = await this.#allocatePort();
            pod.attachForwarder(
                this.#spawnProgram('kubectl', [
                    'port-forward',
                    `pod/${podName}`,
                    `${port}:${BROWSER_CONTAINER_PORT}`,
                    namespaceFlag,
                ]),
                port,
            );
            return pod;
        } catch (error) {
            await pod.stop().catch((cleanupError: unknown) => {
                void logThought(`[Browser] Cleanup of pod ${podName} failed: ${errorMessage(cleanupError)}`);
            });
            throw error;
        }
    }
}

class BrowserPod implements SpawnedEndpoint {
    readonly description: string;
    readonly #podName: string;
    readonly #namespace: string;
    readonly #run: ProgramRunner;
    #forwarder: BackgroundProcess | null = null;
    #port = 0;
    #stopped = false;

    constructor(podName: string, namespace: string, run: ProgramRunner) {
        this.#podName = podName;
        this.#namespace = namespace;
        this.#run = run;
        this.description = `pod ${podName}`;
    }

    get endpointUrl(): string {
        return `ws://127.0.0.1:${this.#port}`;
    }

    get readinessUrl(): string {
        return `http://127.0.0.1:${this.#port}/json/version`;
    }

    attachForwarder(forwarder: BackgroundProcess, port: number): void {
        this.#forwarder = forwarder;
        this.#port = port;
    }

    async isAlive(): Promise<boolean> {
        return this.#forwarder?.isRunning() ?? false;
    }

    async stop(): Promise<void> {
        if (this.#stopped) return;
        this.#stopped = true;
        const forwarder = this.#forwarder;
        this.#forwarder = null;
        try {
            if (forwarder) await forwarder.stop();
        } finally {
            await this.#run('kubectl', [
                'delete',
                'pod',
                this.#podName,
                `--namespace=${this.#namespace}`,
                '--force',
                '--grace-period=0',
            ]);
        }
    }
}

// ── Strategy resolution ─────────────────────────────────────────────────────

export interface SpawnerDependencies {
    runProgram?: ProgramRunner;
    spawnProgram?: (executable: string, args: string[]) => BackgroundProcess;
    allocatePort?: () => Promise<number>;
}

const DEFAULT_ATTACH_URL = 'http://127.0.0.1:9222';

/**
 * Map the configured browser strategy onto a provider strategy. Returns
 * `null` for `none`: visual tests are then skipped.
 */
export function resolveEndpointStrategy(
    browser: BrowserConfig,
    deps: SpawnerDependencies = {},
): EndpointStrategy | null {
    const url = browser.url ?? DEFAULT_ATTACH_URL;
    switch (browser.strategy) {
        case 'none':
            return null;
        case 'dry-run':
            return { kind: 'dry-run' };
        case 'local':
            return { kind: 'local', headless: browser.headless };
        case 'attach':
            return { kind: 'attach', endpointUrl: url, allowFallback: browser.fallbackToLocal, headless: browser.headless };
        case 'docker':
            if (browser.launch) {
                return {
                    kind: 'spawn',
                    spawner: new ContainerEndpointSpawner({
                        image: browser.image,
                        runProgram: deps.runProgram,
                        allocatePort: deps.allocatePort,
                    }),
                };
            }
            return { kind: 'attach', endpointUrl: url, allowFallback: browser.fallbackToLocal, headless: browser.headless };
        case 'k8s':
            if (browser.launch) {
                return {
                    kind: 'spawn',
                    spawner: new PodEndpointSpawner({
                        image: browser.image,
                        namespace: browser.namespace,
                        runProgram: deps.runProgram,
                        spawnProgram: deps.spawnProgram,
                        allocatePort: deps.allocatePort,
                    }),
                };
            }
            // In-cluster sidecars have no local browser to fall back to.
            return { kind: 'attach', endpointUrl: url, allowFallback: false, headless: browser.headless };
    }
}
