import path from 'node:path';
import type { CommandOutcome, ExecutionEnvKind } from '../types/pipeline.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { logThought } from '../utils/logger.js';
import {
    runProgram,
    runShellCommand,
    type ProgramRunner,
    type ShellRunner,
} from './process-runner.js';

/** Uniform "run a command, get back success/output/artifact" contract. */
export interface ExecutionEnvironment {
    readonly kind: ExecutionEnvKind;
    runCommand(command: string, cwd?: string): Promise<CommandOutcome>;
}

export class LocalEnvironment implements ExecutionEnvironment {
    readonly kind = 'local' as const;
    readonly #run: ShellRunner;

    constructor(run: ShellRunner = runShellCommand) {
        this.#run = run;
    }

    async runCommand(command: string, cwd?: string): Promise<CommandOutcome> {
        const result = await this.#run(command, { cwd });
        return { success: result.ok, output: result.output };
    }
}

export interface ContainerEnvironmentOptions {
    serviceName: string;
    /** Host directory that maps onto `remoteRoot` inside the container. */
    projectDir: string;
    remoteRoot?: string;
    runProgram?: ProgramRunner;
}

/** Runs commands inside a compose service with `docker compose exec`. */
export class ContainerEnvironment implements ExecutionEnvironment {
    readonly kind = 'docker' as const;
    readonly #serviceName: string;
    readonly #projectDir: string;
    readonly #remoteRoot: string;
    readonly #run: ProgramRunner;

    constructor(options: ContainerEnvironmentOptions) {
        this.#serviceName = options.serviceName;
        this.#projectDir = path.resolve(options.projectDir);
        this.#remoteRoot = options.remoteRoot ?? '/app';
        this.#run = options.runProgram ?? runProgram;
    }

    /**
     * Map a host path to the container path. Paths outside the project
     * directory fall back to the remote root.
     */
    resolveWorkdir(cwd?: string): string {
        if (!cwd) return this.#remoteRoot;
        const relative = path.relative(this.#projectDir, path.resolve(cwd));
        if (relative.startsWith('..') || path.isAbsolute(relative)) {
            return this.#remoteRoot;
        }
        if (!relative) return this.#remoteRoot;
        return path.posix.join(this.#remoteRoot, ...relative.split(path.sep));
    }

    async runCommand(command: string, cwd?: string): Promise<CommandOutcome> {
        const workdir = this.resolveWorkdir(cwd);
        const result = await this.#run(
            'docker',
            [
                'compose',
                '--project-directory',
                this.#projectDir,
                'exec',
                '-T',
                '-w',
                workdir,
                this.#serviceName,
                'sh',
                '-c',
                command,
            ],
            { cwd: this.#projectDir },
        );

        if (result.notFound) {
            return {
                success: false,
                output: 'docker not found. Please ensure Docker is installed and in your PATH.',
            };
        }
        if (!result.ok) {
            void logThought(`[Env:docker] '${command}' failed in ${this.#serviceName}:${workdir}.`);
        }
        return { success: result.ok, output: result.output };
    }
}

export interface RemotePodEnvironmentOptions {
    podName: string;
    namespace?: string;
    container?: string;
    runProgram?: ProgramRunner;
}

const KUBECTL_MISSING = 'kubectl not found. Please ensure Kubernetes CLI is installed and in your PATH.';

/**
 * Runs commands in a pod container through `kubectl exec`. Commands run in
 * the container's default working directory.
 */
export class RemotePodEnvironment implements ExecutionEnvironment {
    readonly kind = 'k8s' as const;
    readonly #podName: string;
    readonly #namespace: string;
    readonly #container: string;
    readonly #run: ProgramRunner;

    constructor(options: RemotePodEnvironmentOptions) {
        this.#podName = options.podName;
        this.#namespace = options.namespace ?? 'default';
        this.#container = options.container ?? 'aether';
        this.#run = options.runProgram ?? runProgram;
    }

    async runCommand(command: string): Promise<CommandOutcome> {
        const result = await this.#run('kubectl', [
            'exec',
            '-n',
            this.#namespace,
            this.#podName,
            '-c',
            this.#container,
            '--',
            'sh',
            '-c',
            command,
        ]);

        if (result.notFound) {
            return { success: false, output: KUBECTL_MISSING };
        }

        const lowered = result.output.toLowerCase();
        if (!result.ok && lowered.includes('not found') && lowered.includes('kubectl')) {
            return { success: false, output: KUBECTL_MISSING };
        }
        return { success: result.ok, output: result.output };
    }
}

export interface EnvironmentFactoryOptions {
    shellRunner?: ShellRunner;
    programRunner?: ProgramRunner;
}

/** Build the environment selected by `executionEnv` for one pipeline run. */
export function createExecutionEnvironment(
    kind: ExecutionEnvKind,
    config: PipelineConfig,
    targetDir: string,
    options: EnvironmentFactoryOptions = {},
): ExecutionEnvironment {
    switch (kind) {
        case 'docker':
            return new ContainerEnvironment({
                serviceName: config.dockerConfig.serviceName,
                remoteRoot: config.dockerConfig.remoteRoot,
                projectDir: targetDir,
                runProgram: options.programRunner,
            });
        case 'k8s':
            return new RemotePodEnvironment({
                podName: config.k8sConfig.podName,
                namespace: config.k8sConfig.namespace,
                container: config.k8sConfig.container,
                runProgram: options.programRunner,
            });
        case 'local':
            return new LocalEnvironment(options.shellRunner);
    }
}
