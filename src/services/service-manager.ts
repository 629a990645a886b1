import type { DeploymentSpec, ServiceSpec } from '../config/pipeline-config.js';
import { HealthCheckTimeoutError, ProvisioningError, ToolNotFoundError } from '../core/errors.js';
import type { ResourceHandle } from '../types/lifecycle.js';
import { probeHttp, type HttpProbe } from '../utils/http-probe.js';
import { logThought } from '../utils/logger.js';
import { pollUntilReady } from '../utils/retry.js';
import {
    findExecutable,
    runShellCommand,
    spawnBackground,
    type ExecutableLocator,
    type ShellRunner,
} from './process-runner.js';

const HEALTH_POLL_INTERVAL_MS = 1_000;
const DEFAULT_HEALTH_TIMEOUT_SECONDS = 30;

const INSTALL_GUIDANCE: Readonly<Record<string, string>> = {
    docker: 'Install Docker (with the compose plugin) and make sure `docker` is on PATH.',
    kubectl: 'Install the Kubernetes CLI and make sure `kubectl` is on PATH.',
};

/** A started background command; `isRunning` lets health checks fail fast. */
export interface RunningProcess extends ResourceHandle {
    isRunning(): boolean;
}

export type BackgroundSpawner = (command: string, cwd: string) => RunningProcess;

/** Rewrite the legacy `docker-compose` binary to the `docker compose` plugin. */
export function normalizeServiceCommand(command: string): string {
    const trimmed = command.trim();
    return /^docker-compose(\s|$)/.test(trimmed) ? trimmed.replace('docker-compose', 'docker compose') : trimmed;
}

/** Arguments of a compose command that identify its project, kept for `down`. */
export function composeDownCommand(command: string): string {
    const tokens = normalizeServiceCommand(command).split(/\s+/);
    const kept: string[] = [];
    for (let index = 0; index < tokens.length; index++) {
        const token = tokens[index];
        if (['-f', '--file', '-p', '--project-name', '--project-directory', '--env-file'].includes(token)) {
            const value = tokens[index + 1];
            if (value !== undefined) kept.push(token, value);
            index++;
        } else if (/^--(file|project-name|project-directory|env-file)=/.test(token)) {
            kept.push(token);
        }
    }
    return ['docker', 'compose', ...kept, 'down'].join(' ');
}

/**
 * Fail with {@link ToolNotFoundError} when the executable a command starts
 * with is missing. `docker-compose` is accepted when `docker` exists since
 * it gets rewritten.
 */
export async function ensureToolPresent(command: string, locate: ExecutableLocator = findExecutable): Promise<void> {
    const tool = command.trim().split(/\s+/)[0];
    if (!tool) return;
    if (await locate(tool)) return;
    if (tool === 'docker-compose' && (await locate('docker'))) return;

    const lookup = tool === 'docker-compose' ? 'docker' : tool;
    throw new ToolNotFoundError(tool, INSTALL_GUIDANCE[lookup] ?? `Install '${tool}' and make sure it is on PATH.`);
}

/** Shell command a deployment hook runs. */
export function deploymentCommand(spec: DeploymentSpec): string {
    const namespace = spec.namespace ? ` -n ${spec.namespace}` : '';
    switch (spec.type) {
        case 'compose': {
            const file = spec.file ? ` -f ${spec.file}` : '';
            const service = spec.service ? ` ${spec.service}` : '';
            return `docker compose${file} up -d${service}`;
        }
        case 'kubectl':
            return `kubectl apply -f ${spec.manifests ?? '.'}${namespace}`;
        case 'kustomize':
            return `kubectl apply -k ${spec.path ?? '.'}${namespace}`;
        case 'custom':
            return spec.command ?? '';
    }
}

/**
 * Compose project started for a run. Stopping it stops the attached
 * foreground process (if any) and runs `docker compose down` for the same
 * project files.
 */
export class ComposeProjectHandle implements ResourceHandle {
    readonly description: string;
    readonly #downCommand: string;
    readonly #cwd: string;
    readonly #run: ShellRunner;
    readonly #process?: RunningProcess;
    #stopping: Promise<void> | null = null;

    constructor(options: { command: string; cwd: string; run?: ShellRunner; process?: RunningProcess }) {
        this.description = `compose:${options.command}`;
        this.#downCommand = composeDownCommand(options.command);
        this.#cwd = options.cwd;
        this.#run = options.run ?? runShellCommand;
        this.#process = options.process;
    }

    isRunning(): boolean {
        return this.#process ? this.#process.isRunning() : this.#stopping === null;
    }

    stop(): Promise<void> {
        if (!this.#stopping) {
            this.#stopping = this.#down();
        }
        return this.#stopping;
    }

    async #down(): Promise<void> {
        await this.#process?.stop();
        const result = await this.#run(this.#downCommand, { cwd: this.#cwd, timeoutMs: 120_000 });
        if (!result.ok) {
            throw new Error(`'${this.#downCommand}' failed: ${result.output}`);
        }
    }
}

export interface ServiceManagerOptions {
    run?: ShellRunner;
    spawn?: BackgroundSpawner;
    locate?: ExecutableLocator;
    probe?: HttpProbe;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
    onLog?: (message: string) => void;
    /** Aborting stops any health check in progress. */
    signal?: AbortSignal;
}

/**
 * Brings the environment under test up: declared services, the deployment
 * hook and health gates. Handles for everything left running are returned
 * to the caller, which owns their teardown.
 */
export class ServiceManager {
    readonly #run: ShellRunner;
    readonly #spawn: BackgroundSpawner;
    readonly #locate: ExecutableLocator;
    readonly #probe: HttpProbe;
    readonly #sleep?: (ms: number) => Promise<void>;
    readonly #now?: () => number;
    readonly #onLog?: (message: string) => void;
    readonly #signal?: AbortSignal;

    constructor(options: ServiceManagerOptions = {}) {
        this.#run = options.run ?? runShellCommand;
        this.#spawn = options.spawn ?? spawnBackground;
        this.#locate = options.locate ?? findExecutable;
        this.#probe = options.probe ?? probeHttp;
        this.#sleep = options.sleep;
        this.#now = options.now;
        this.#onLog = options.onLog;
        this.#signal = options.signal;
    }

    /**
     * Start one service. Background services return their handle once the
     * optional health check passes; foreground services must exit 0.
     */
    async startService(service: ServiceSpec, targetDir: string): Promise<ResourceHandle | null> {
        await ensureToolPresent(service.command, this.#locate);
        const command = normalizeServiceCommand(service.command);
        if (command !== service.command.trim()) {
            this.#report(`[Services] Rewrote legacy command to: ${command}`);
        }
        this.#report(`[Services] Starting service: ${service.name} (${command}) [strategy: ${service.strategy}]`);

        let handle: RunningProcess | null = null;
        if (service.background) {
            const child = this.#spawn(command, targetDir);
            handle = service.strategy === 'compose'
                ? new ComposeProjectHandle({ command, cwd: targetDir, run: this.#run, process: child })
                : child;
        } else {
            const result = await this.#run(command, { cwd: targetDir });
            if (!result.ok) {
                throw new ProvisioningError(
                    `Service '${service.name}' exited with code ${result.exitCode}: ${result.output}`,
                    'Run the service command by hand in the target directory to see the failure.',
                );
            }
            if (service.strategy === 'compose') {
                handle = new ComposeProjectHandle({ command, cwd: targetDir, run: this.#run });
            }
        }

        if (service.healthCheck) {
            const running = handle;
            try {
                await this.waitForHealthCheck(service.healthCheck, service.timeoutSeconds, running ? () => running.isRunning() : undefined);
            } catch (error) {
                await this.#stopQuietly(handle);
                throw error;
            }
        }
        return handle;
    }

    /** Run the deployment hook; a background hook returns its process handle. */
    async runDeployment(spec: DeploymentSpec, targetDir: string): Promise<ResourceHandle | null> {
        const command = deploymentCommand(spec);
        let handle: RunningProcess | null = null;
        if (command) {
            await ensureToolPresent(command, this.#locate);
            this.#report(`[Deploy] Running deployment hook: ${command}`);
            if (spec.background) {
                handle = this.#spawn(command, targetDir);
            } else {
                const result = await this.#run(command, { cwd: targetDir });
                if (!result.ok) {
                    throw new ProvisioningError(
                        `Deployment hook failed (exit ${result.exitCode}): ${result.output}`,
                        'Check the deployment section of aether.config.json.',
                    );
                }
                this.#report('[Deploy] Deployment OK.');
            }
        }

        if (spec.healthCheck) {
            const running = handle;
            try {
                await this.waitForHealthCheck(spec.healthCheck, spec.timeoutSeconds, running ? () => running.isRunning() : undefined);
            } catch (error) {
                await this.#stopQuietly(handle);
                throw error;
            }
        }
        return handle;
    }

    /** Poll `url` once a second until it answers HTTP 200. */
    async waitForHealthCheck(
        url: string,
        timeoutSeconds: number = DEFAULT_HEALTH_TIMEOUT_SECONDS,
        isAlive?: () => boolean,
    ): Promise<void> {
        this.#report(`[Health] Waiting for health check: ${url}`);
        try {
            await pollUntilReady(async () => (await this.#probe(url)).ok, {
                initialDelayMs: HEALTH_POLL_INTERVAL_MS,
                backoffFactor: 1,
                maxDelayMs: HEALTH_POLL_INTERVAL_MS,
                timeoutMs: timeoutSeconds * 1_000,
                label: `Health check for ${url}`,
                isAlive,
                sleep: this.#sleep,
                now: this.#now,
                signal: this.#signal,
            });
        } catch (error) {
            // A dead process is reported as is; anything else is the ceiling.
            if (!(error instanceof ProvisioningError) || (isAlive && !isAlive())) {
                throw error;
            }
            this.#report(`[Health] Health check timed out: ${url}`);
            throw new HealthCheckTimeoutError(url, timeoutSeconds);
        }
        this.#report(`[Health] Health check OK: ${url}`);
    }

    async #stopQuietly(handle: ResourceHandle | null): Promise<void> {
        if (!handle) return;
        try {
            await handle.stop();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.#report(`[Services] Failed to stop ${handle.description}: ${message}`);
        }
    }

    #report(message: string): void {
        this.#onLog?.(message);
        void logThought(message);
    }
}
