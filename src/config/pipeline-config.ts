import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigError } from '../core/errors.js';
import type { ExecutionEnvKind, TestDescriptor } from '../types/pipeline.js';
import { parsePipelineConfigInput, type PipelineConfigInput } from './config-schema.js';

export const CONFIG_FILE_NAME = 'aether.config.json';

export type BrowserStrategy = 'local' | 'attach' | 'docker' | 'k8s' | 'dry-run' | 'none';
export type ServiceStrategy = 'process' | 'compose';
export type DeploymentType = 'compose' | 'kubectl' | 'kustomize' | 'custom';

/** A background (or foreground) service started during Preparation. */
export interface ServiceSpec {
    name: string;
    command: string;
    strategy: ServiceStrategy;
    healthCheck?: string;
    timeoutSeconds: number;
    background: boolean;
}

/** Deployment hook selected by the active deployment target. */
export interface DeploymentSpec {
    type: DeploymentType;
    file?: string;
    manifests?: string;
    path?: string;
    command?: string;
    service?: string;
    namespace?: string;
    healthCheck?: string;
    timeoutSeconds: number;
    background: boolean;
}

export interface ReadinessConfig {
    initialDelayMs: number;
    backoffFactor: number;
    maxDelayMs: number;
    timeoutMs: number;
}

export interface BrowserConfig {
    strategy: BrowserStrategy;
    /** Endpoint to attach to; derived from the strategy when unset. */
    url?: string;
    /** Spawn the container/pod instead of attaching to an existing one. */
    launch: boolean;
    headless: boolean;
    image: string;
    namespace: string;
    fallbackToLocal: boolean;
    readiness: ReadinessConfig;
}

export interface PipelineConfig {
    strategy: string;
    executionEnv: ExecutionEnvKind;
    dockerConfig: {
        serviceName: string;
        remoteRoot: string;
    };
    k8sConfig: {
        podName: string;
        namespace: string;
        container: string;
    };
    services: ServiceSpec[];
    deployment: Record<string, DeploymentSpec>;
    qualityChecks: {
        enabled: boolean;
        providers: string[];
    };
    allureStrategy: string;
    appUrl: string;
    customInstruction?: string;
    browser: BrowserConfig;
    watch: {
        debounceMs: number;
        ignore: string[];
    };
    fallbackTest: TestDescriptor;
}

export const DEFAULT_READINESS: ReadinessConfig = {
    initialDelayMs: 500,
    backoffFactor: 1.5,
    maxDelayMs: 5_000,
    timeoutMs: 60_000,
};

export const DEFAULT_CONFIG: PipelineConfig = {
    strategy: 'auto',
    executionEnv: 'local',
    dockerConfig: {
        serviceName: 'app',
        remoteRoot: '/app',
    },
    k8sConfig: {
        podName: '',
        namespace: 'default',
        container: 'aether',
    },
    services: [],
    deployment: {},
    qualityChecks: {
        enabled: false,
        providers: [],
    },
    allureStrategy: 'none',
    appUrl: 'http://localhost:4321',
    browser: {
        strategy: 'local',
        launch: false,
        headless: true,
        image: 'browserless/chrome:latest',
        namespace: 'default',
        fallbackToLocal: true,
        readiness: DEFAULT_READINESS,
    },
    watch: {
        debounceMs: 2_000,
        ignore: ['.git', 'node_modules', '.astro', '__pycache__', '.aether', 'dist', 'coverage'],
    },
    fallbackTest: {
        kind: 'command',
        label: 'Change Audit (Fallback)',
        commandOrPath: 'git diff --check',
    },
};

/** Call-time overrides; highest precedence. */
export interface ConfigOverrides {
    strategy?: string;
    executionEnv?: ExecutionEnvKind;
    allureStrategy?: string;
    appUrl?: string;
    customInstruction?: string;
    browser?: Partial<Omit<BrowserConfig, 'readiness'>>;
    qualityChecks?: Partial<PipelineConfig['qualityChecks']>;
}

export const BROWSER_STRATEGIES: readonly BrowserStrategy[] = ['local', 'attach', 'docker', 'k8s', 'dry-run', 'none'];
export const EXECUTION_ENVS: readonly ExecutionEnvKind[] = ['local', 'docker', 'k8s'];

export function getConfigPath(targetDir: string): string {
    return path.join(path.resolve(targetDir), CONFIG_FILE_NAME);
}

async function readConfigFile(configPath: string): Promise<PipelineConfigInput> {
    let rawData: string;
    try {
        rawData = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        const fsError = error instanceof Error && 'code' in error ? error.code : undefined;
        if (fsError === 'ENOENT') return {};
        throw new ConfigError(`Failed to read config file at ${configPath}.`, [String(error)]);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Failed to parse config file at ${configPath}.`, [message]);
    }

    const { input, errors } = parsePipelineConfigInput(parsed);
    if (errors.length > 0) {
        throw new ConfigError(`Invalid config file at ${configPath}.`, errors);
    }
    return input;
}

function cloneDefaults(): PipelineConfig {
    return structuredClone(DEFAULT_CONFIG);
}

export function mergeWithDefaults(loaded: PipelineConfigInput): PipelineConfig {
    const config = cloneDefaults();

    if (loaded.strategy !== undefined) config.strategy = loaded.strategy;
    if (loaded.executionEnv !== undefined) config.executionEnv = loaded.executionEnv;
    if (loaded.dockerConfig) config.dockerConfig = { ...config.dockerConfig, ...loaded.dockerConfig };
    if (loaded.k8sConfig) config.k8sConfig = { ...config.k8sConfig, ...loaded.k8sConfig };
    if (loaded.services) config.services = loaded.services;
    if (loaded.deployment) config.deployment = loaded.deployment;
    if (loaded.qualityChecks) config.qualityChecks = { ...config.qualityChecks, ...loaded.qualityChecks };
    if (loaded.allureStrategy !== undefined) config.allureStrategy = loaded.allureStrategy;
    if (loaded.appUrl !== undefined) config.appUrl = loaded.appUrl;
    if (loaded.customInstruction !== undefined) config.customInstruction = loaded.customInstruction;
    if (loaded.browser) {
        const { readiness, ...browser } = loaded.browser;
        config.browser = {
            ...config.browser,
            ...browser,
            readiness: { ...config.browser.readiness, ...readiness },
        };
    }
    if (loaded.watch) config.watch = { ...config.watch, ...loaded.watch };
    if (loaded.fallbackTest) config.fallbackTest = loaded.fallbackTest;

    return config;
}

function pickEnum<T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined {
    return allowed.find((candidate) => candidate === value);
}

/** Environment variables sit between the file and call-time overrides. */
export function applyEnvOverrides(config: PipelineConfig, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const next = structuredClone(config);
    const strategy = env.AETHER_ANALYSIS?.trim();
    if (strategy) next.strategy = strategy;

    const browserStrategy = pickEnum(env.AETHER_BROWSER?.trim(), BROWSER_STRATEGIES);
    if (browserStrategy) next.browser.strategy = browserStrategy;

    const executionEnv = pickEnum(env.AETHER_EXECUTION_ENV?.trim(), EXECUTION_ENVS);
    if (executionEnv) next.executionEnv = executionEnv;

    const browserUrl = env.AETHER_BROWSER_URL?.trim();
    if (browserUrl) next.browser.url = browserUrl;

    const appUrl = env.APP_BASE_URL?.trim();
    if (appUrl) next.appUrl = appUrl;

    const allureStrategy = env.ALLURE_STRATEGY?.trim();
    if (allureStrategy) next.allureStrategy = allureStrategy;

    return next;
}

export function applyOverrides(config: PipelineConfig, overrides: ConfigOverrides = {}): PipelineConfig {
    const next = structuredClone(config);
    if (overrides.strategy) next.strategy = overrides.strategy;
    if (overrides.executionEnv) next.executionEnv = overrides.executionEnv;
    if (overrides.allureStrategy) next.allureStrategy = overrides.allureStrategy;
    if (overrides.appUrl) next.appUrl = overrides.appUrl;
    if (overrides.customInstruction) next.customInstruction = overrides.customInstruction;
    if (overrides.qualityChecks) {
        next.qualityChecks = { ...next.qualityChecks, ...stripUndefined(overrides.qualityChecks) };
    }
    if (overrides.browser) {
        next.browser = { ...next.browser, ...stripUndefined(overrides.browser) };
    }
    return next;
}

function stripUndefined<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key of Object.keys(value)) {
        if (!isKeyOf(value, key)) continue;
        const entry = value[key];
        if (entry !== undefined) {
            result[key] = entry;
        }
    }
    return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
    return key in value;
}

/**
 * Default attach endpoint for strategies that talk to a remote browser when
 * none is configured.
 */
export function resolveBrowserUrl(browser: BrowserConfig, env: NodeJS.ProcessEnv = process.env): string | undefined {
    if (browser.url) return browser.url;
    if (browser.strategy === 'docker') return 'ws://localhost:9222';
    if (browser.strategy === 'k8s') {
        return env.TEST_RUNNER_URL?.trim() || 'ws://aether-sidecar:9222';
    }
    return undefined;
}

/**
 * Resolve the effective configuration for a target directory:
 * defaults < aether.config.json < environment < call-time overrides.
 */
export async function readPipelineConfig(
    targetDir: string,
    overrides: ConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env,
): Promise<PipelineConfig> {
    const fromFile = mergeWithDefaults(await readConfigFile(getConfigPath(targetDir)));
    const resolved = applyOverrides(applyEnvOverrides(fromFile, env), overrides);
    resolved.browser.url = resolveBrowserUrl(resolved.browser, env);
    return resolved;
}
