import type { ExecutionEnvKind, TestDescriptor, TestKind } from '../types/pipeline.js';
import type {
  BrowserConfig,
  BrowserStrategy,
  DeploymentSpec,
  DeploymentType,
  PipelineConfig,
  ReadinessConfig,
  ServiceSpec,
  ServiceStrategy,
} from './pipeline-config.js';

type JsonRecord = Record<string, unknown>;

/** Shape of aether.config.json after validation; every key optional. */
export interface PipelineConfigInput {
  strategy?: string;
  executionEnv?: ExecutionEnvKind;
  dockerConfig?: Partial<PipelineConfig['dockerConfig']>;
  k8sConfig?: Partial<PipelineConfig['k8sConfig']>;
  services?: ServiceSpec[];
  deployment?: Record<string, DeploymentSpec>;
  qualityChecks?: Partial<PipelineConfig['qualityChecks']>;
  allureStrategy?: string;
  appUrl?: string;
  customInstruction?: string;
  browser?: Partial<Omit<BrowserConfig, 'readiness'>> & { readiness?: Partial<ReadinessConfig> };
  watch?: Partial<PipelineConfig['watch']>;
  fallbackTest?: TestDescriptor;
}

export interface ConfigParseResult {
  input: PipelineConfigInput;
  errors: string[];
}

const EXECUTION_ENVS: readonly ExecutionEnvKind[] = ['local', 'docker', 'k8s'];
const TEST_KINDS: readonly TestKind[] = ['command', 'visual', 'setup'];
const SERVICE_STRATEGIES: readonly ServiceStrategy[] = ['process', 'compose'];
const DEPLOYMENT_TYPES: readonly DeploymentType[] = ['compose', 'kubectl', 'kustomize', 'custom'];
const BROWSER_STRATEGIES: readonly BrowserStrategy[] = ['local', 'attach', 'docker', 'k8s', 'dry-run', 'none'];
const DEFAULT_TIMEOUT_SECONDS = 30;
const VIEWPORT_PATTERN = /^\d+x\d+$/;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readOptionalObject(parent: JsonRecord, key: string, path: string, errors: string[]): JsonRecord | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    errors.push(`${path} must be an object.`);
    return undefined;
  }
  return value;
}

function readOptionalString(
  parent: JsonRecord,
  key: string,
  path: string,
  errors: string[],
  allowEmpty = false,
): string | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    errors.push(`${path} must be a string.`);
    return undefined;
  }
  if (!allowEmpty && value.trim().length === 0) {
    errors.push(`${path} must be a non-empty string.`);
    return undefined;
  }
  return value;
}

function readRequiredString(parent: JsonRecord, key: string, path: string, errors: string[]): string | undefined {
  if (parent[key] === undefined) {
    errors.push(`${path} is required.`);
    return undefined;
  }
  return readOptionalString(parent, key, path, errors);
}

function readOptionalBoolean(parent: JsonRecord, key: string, path: string, errors: string[]): boolean | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    errors.push(`${path} must be a boolean.`);
    return undefined;
  }
  return value;
}

function readOptionalNumberInRange(
  parent: JsonRecord,
  key: string,
  path: string,
  min: number,
  max: number,
  errors: string[],
): number | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${path} must be a number.`);
    return undefined;
  }
  if (value < min || value > max) {
    errors.push(`${path} must be between ${min} and ${max}.`);
    return undefined;
  }
  return value;
}

function readOptionalEnum<T extends string>(
  parent: JsonRecord,
  key: string,
  path: string,
  allowed: readonly T[],
  errors: string[],
): T | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    errors.push(`${path} must be one of: ${allowed.join(', ')}.`);
  }
  return match;
}

function readOptionalStringArray(parent: JsonRecord, key: string, path: string, errors: string[]): string[] | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    errors.push(`${path} must be an array of strings.`);
    return undefined;
  }
  const strings: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') {
      errors.push(`${path} must be an array of strings.`);
      return undefined;
    }
    strings.push(entry);
  }
  return strings;
}

function withoutUndefined<T extends JsonRecord>(record: T): T {
  const view: JsonRecord = record;
  for (const key of Object.keys(view)) {
    if (view[key] === undefined) {
      delete view[key];
    }
  }
  return record;
}

/** Validate one test descriptor record; shared with the definition-file planner. */
export function parseTestDescriptor(value: unknown, path: string, errors: string[]): TestDescriptor | undefined {
  if (!isRecord(value)) {
    errors.push(`${path} must be an object.`);
    return undefined;
  }
  const before = errors.length;
  const kind = readOptionalEnum(value, 'kind', `${path}.kind`, TEST_KINDS, errors) ?? 'command';
  const label = readRequiredString(value, 'label', `${path}.label`, errors);
  const commandOrPath = readRequiredString(value, 'commandOrPath', `${path}.commandOrPath`, errors);
  const viewport = readOptionalString(value, 'viewport', `${path}.viewport`, errors);
  if (viewport !== undefined && !VIEWPORT_PATTERN.test(viewport)) {
    errors.push(`${path}.viewport must look like 1280x720.`);
  }
  const executionEnv = readOptionalEnum(value, 'executionEnv', `${path}.executionEnv`, EXECUTION_ENVS, errors);

  if (errors.length > before || label === undefined || commandOrPath === undefined) {
    return undefined;
  }
  return withoutUndefined({ kind, label, commandOrPath, viewport, executionEnv });
}

function parseServices(root: JsonRecord, errors: string[]): ServiceSpec[] | undefined {
  const value = root['services'];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    errors.push('services must be an array.');
    return undefined;
  }

  const services: ServiceSpec[] = [];
  value.forEach((entry: unknown, index) => {
    const path = `services[${index}]`;
    if (!isRecord(entry)) {
      errors.push(`${path} must be an object.`);
      return;
    }
    const name = readRequiredString(entry, 'name', `${path}.name`, errors);
    const command = readRequiredString(entry, 'command', `${path}.command`, errors);
    const strategy = readOptionalEnum(entry, 'strategy', `${path}.strategy`, SERVICE_STRATEGIES, errors);
    const healthCheck = readOptionalString(entry, 'healthCheck', `${path}.healthCheck`, errors);
    const timeoutSeconds = readOptionalNumberInRange(entry, 'timeoutSeconds', `${path}.timeoutSeconds`, 1, 3600, errors);
    const background = readOptionalBoolean(entry, 'background', `${path}.background`, errors);
    if (name === undefined || command === undefined) return;

    services.push(withoutUndefined({
      name,
      command,
      strategy: strategy ?? 'process',
      healthCheck,
      timeoutSeconds: timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
      background: background ?? true,
    }));
  });
  return services;
}

function parseDeployment(root: JsonRecord, errors: string[]): Record<string, DeploymentSpec> | undefined {
  const deployment = readOptionalObject(root, 'deployment', 'deployment', errors);
  if (!deployment) return undefined;

  const specs: Record<string, DeploymentSpec> = {};
  for (const [target, entry] of Object.entries(deployment)) {
    const path = `deployment.${target}`;
    if (!isRecord(entry)) {
      errors.push(`${path} must be an object.`);
      continue;
    }
    const type = readOptionalEnum(entry, 'type', `${path}.type`, DEPLOYMENT_TYPES, errors) ?? 'custom';
    const spec: DeploymentSpec = withoutUndefined({
      type,
      file: readOptionalString(entry, 'file', `${path}.file`, errors),
      manifests: readOptionalString(entry, 'manifests', `${path}.manifests`, errors),
      path: readOptionalString(entry, 'path', `${path}.path`, errors),
      command: readOptionalString(entry, 'command', `${path}.command`, errors),
      service: readOptionalString(entry, 'service', `${path}.service`, errors),
      namespace: readOptionalString(entry, 'namespace', `${path}.namespace`, errors),
      healthCheck: readOptionalString(entry, 'healthCheck', `${path}.healthCheck`, errors),
      timeoutSeconds:
        readOptionalNumberInRange(entry, 'timeoutSeconds', `${path}.timeoutSeconds`, 1, 3600, errors)
        ?? DEFAULT_TIMEOUT_SECONDS,
      background: readOptionalBoolean(entry, 'background', `${path}.background`, errors) ?? false,
    });

    if (type === 'kubectl' && !spec.manifests) errors.push(`${path}.manifests is required for type kubectl.`);
    if (type === 'kustomize' && !spec.path) errors.push(`${path}.path is required for type kustomize.`);
    if (type === 'custom' && !spec.command) errors.push(`${path}.command is required for type custom.`);
    specs[target] = spec;
  }
  return specs;
}

function parseBrowser(root: JsonRecord, errors: string[]): PipelineConfigInput['browser'] {
  const browser = readOptionalObject(root, 'browser', 'browser', errors);
  if (!browser) return undefined;

  const readiness = readOptionalObject(browser, 'readiness', 'browser.readiness', errors);
  return withoutUndefined({
    strategy: readOptionalEnum(browser, 'strategy', 'browser.strategy', BROWSER_STRATEGIES, errors),
    url: readOptionalString(browser, 'url', 'browser.url', errors),
    launch: readOptionalBoolean(browser, 'launch', 'browser.launch', errors),
    headless: readOptionalBoolean(browser, 'headless', 'browser.headless', errors),
    image: readOptionalString(browser, 'image', 'browser.image', errors),
    namespace: readOptionalString(browser, 'namespace', 'browser.namespace', errors),
    fallbackToLocal: readOptionalBoolean(browser, 'fallbackToLocal', 'browser.fallbackToLocal', errors),
    readiness: readiness
      ? withoutUndefined({
        initialDelayMs: readOptionalNumberInRange(readiness, 'initialDelayMs', 'browser.readiness.initialDelayMs', 1, 60_000, errors),
        backoffFactor: readOptionalNumberInRange(readiness, 'backoffFactor', 'browser.readiness.backoffFactor', 1, 10, errors),
        maxDelayMs: readOptionalNumberInRange(readiness, 'maxDelayMs', 'browser.readiness.maxDelayMs', 1, 600_000, errors),
        timeoutMs: readOptionalNumberInRange(readiness, 'timeoutMs', 'browser.readiness.timeoutMs', 1, 3_600_000, errors),
      })
      : undefined,
  });
}

/**
 * Validate a parsed aether.config.json document. Every problem is collected
 * so operators can fix the file in one pass.
 */
export function parsePipelineConfigInput(raw: unknown): ConfigParseResult {
  const errors: string[] = [];
  if (!isRecord(raw)) {
    return { input: {}, errors: ['Config root must be a JSON object.'] };
  }

  const dockerConfig = readOptionalObject(raw, 'dockerConfig', 'dockerConfig', errors);
  const k8sConfig = readOptionalObject(raw, 'k8sConfig', 'k8sConfig', errors);
  const qualityChecks = readOptionalObject(raw, 'qualityChecks', 'qualityChecks', errors);
  const watch = readOptionalObject(raw, 'watch', 'watch', errors);
  const fallbackTest = raw['fallbackTest'] === undefined
    ? undefined
    : parseTestDescriptor(raw['fallbackTest'], 'fallbackTest', errors);

  const input: PipelineConfigInput = withoutUndefined({
    strategy: readOptionalString(raw, 'strategy', 'strategy', errors),
    executionEnv: readOptionalEnum(raw, 'executionEnv', 'executionEnv', EXECUTION_ENVS, errors),
    dockerConfig: dockerConfig
      ? withoutUndefined({
        serviceName: readOptionalString(dockerConfig, 'serviceName', 'dockerConfig.serviceName', errors),
        remoteRoot: readOptionalString(dockerConfig, 'remoteRoot', 'dockerConfig.remoteRoot', errors),
      })
      : undefined,
    k8sConfig: k8sConfig
      ? withoutUndefined({
        podName: readOptionalString(k8sConfig, 'podName', 'k8sConfig.podName', errors),
        namespace: readOptionalString(k8sConfig, 'namespace', 'k8sConfig.namespace', errors),
        container: readOptionalString(k8sConfig, 'container', 'k8sConfig.container', errors),
      })
      : undefined,
    services: parseServices(raw, errors),
    deployment: parseDeployment(raw, errors),
    qualityChecks: qualityChecks
      ? withoutUndefined({
        enabled: readOptionalBoolean(qualityChecks, 'enabled', 'qualityChecks.enabled', errors),
        providers: readOptionalStringArray(qualityChecks, 'providers', 'qualityChecks.providers', errors),
      })
      : undefined,
    allureStrategy: readOptionalString(raw, 'allureStrategy', 'allureStrategy', errors),
    appUrl: readOptionalString(raw, 'appUrl', 'appUrl', errors),
    customInstruction: readOptionalString(raw, 'customInstruction', 'customInstruction', errors, true),
    browser: parseBrowser(raw, errors),
    watch: watch
      ? withoutUndefined({
        debounceMs: readOptionalNumberInRange(watch, 'debounceMs', 'watch.debounceMs', 0, 600_000, errors),
        ignore: readOptionalStringArray(watch, 'ignore', 'watch.ignore', errors),
      })
      : undefined,
    fallbackTest,
  });

  if (input.executionEnv === 'k8s' && !input.k8sConfig?.podName) {
    errors.push('k8sConfig.podName is required when executionEnv is k8s.');
  }

  return { input, errors };
}

/** One entry of `aether.tests.json`: a descriptor plus the filters that select it. */
export interface TestDefinition {
  test: TestDescriptor;
  strategies?: string[];
  paths?: string[];
}

export function parseTestDefinitions(raw: unknown): { definitions: TestDefinition[]; errors: string[] } {
  const errors: string[] = [];
  const entries = isRecord(raw) ? raw.tests : raw;
  if (!Array.isArray(entries)) {
    return { definitions: [], errors: ['Test definitions must be an array or an object with a "tests" array.'] };
  }

  const definitions: TestDefinition[] = [];
  entries.forEach((entry, index) => {
    const path = `tests[${index}]`;
    const test = parseTestDescriptor(entry, path, errors);
    if (!test || !isRecord(entry)) return;
    const strategies = readOptionalStringArray(entry, 'strategies', `${path}.strategies`, errors);
    const paths = readOptionalStringArray(entry, 'paths', `${path}.paths`, errors);
    definitions.push({ test, ...(strategies ? { strategies } : {}), ...(paths ? { paths } : {}) });
  });
  return { definitions, errors };
}
