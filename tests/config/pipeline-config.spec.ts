import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  applyOverrides,
  readPipelineConfig,
} from '../../src/config/pipeline-config.js';
import { ConfigError } from '../../src/core/errors.js';

describe('readPipelineConfig', () => {
  let targetDir: string;

  beforeEach(async () => {
    targetDir = await mkdtemp(path.join(os.tmpdir(), 'aether-config-'));
  });

  afterEach(async () => {
    await rm(targetDir, { recursive: true, force: true });
  });

  async function writeConfig(value: unknown): Promise<void> {
    const text = typeof value === 'string' ? value : JSON.stringify(value);
    await writeFile(path.join(targetDir, CONFIG_FILE_NAME), text, 'utf-8');
  }

  it('returns the defaults when no config file exists', async () => {
    const config = await readPipelineConfig(targetDir, {}, {});

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('merges the file over the defaults', async () => {
    await writeConfig({
      strategy: 'frontend',
      browser: { strategy: 'docker', readiness: { timeoutMs: 1_000 } },
      watch: { debounceMs: 50 },
    });

    const config = await readPipelineConfig(targetDir, {}, {});

    expect(config.strategy).toBe('frontend');
    expect(config.browser.strategy).toBe('docker');
    expect(config.browser.url).toBe('ws://localhost:9222');
    expect(config.browser.readiness).toEqual({ initialDelayMs: 500, backoffFactor: 1.5, maxDelayMs: 5_000, timeoutMs: 1_000 });
    expect(config.watch).toEqual({ debounceMs: 50, ignore: DEFAULT_CONFIG.watch.ignore });
  });

  it('applies environment variables between the file and call-time overrides', async () => {
    await writeConfig({ strategy: 'from-file', appUrl: 'http://localhost:3000' });
    const env = {
      AETHER_ANALYSIS: 'from-env',
      AETHER_EXECUTION_ENV: 'docker',
      AETHER_BROWSER: 'safari',
      APP_BASE_URL: 'http://localhost:8080',
    };

    const config = await readPipelineConfig(targetDir, { strategy: 'from-call' }, env);

    expect(config.strategy).toBe('from-call');
    expect(config.executionEnv).toBe('docker');
    expect(config.browser.strategy).toBe('local');
    expect(config.appUrl).toBe('http://localhost:8080');
  });

  it('derives the pod browser endpoint from TEST_RUNNER_URL', async () => {
    const config = await readPipelineConfig(
      targetDir,
      { browser: { strategy: 'k8s' } },
      { TEST_RUNNER_URL: 'ws://runner.test:9222' },
    );

    expect(config.browser.url).toBe('ws://runner.test:9222');
  });

  it('rejects malformed JSON', async () => {
    await writeConfig('{ "strategy": ');

    await expect(readPipelineConfig(targetDir, {}, {})).rejects.toThrow(
      `Failed to parse config file at ${path.join(targetDir, CONFIG_FILE_NAME)}.`,
    );
  });

  it('collects every schema violation in one error', async () => {
    await writeConfig({
      executionEnv: 'vm',
      services: [{ name: 'web' }],
      watch: { debounceMs: -1 },
    });

    const error = await readPipelineConfig(targetDir, {}, {}).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? error.issues : []).toEqual([
      'executionEnv must be one of: local, docker, k8s.',
      'services[0].command is required.',
      'watch.debounceMs must be between 0 and 600000.',
    ]);
  });

  it('requires a pod name for the k8s environment', async () => {
    await writeConfig({ executionEnv: 'k8s' });

    const error = await readPipelineConfig(targetDir, {}, {}).catch((caught: unknown) => caught);

    expect(error instanceof ConfigError ? error.issues : []).toEqual([
      'k8sConfig.podName is required when executionEnv is k8s.',
    ]);
  });
});

describe('applyOverrides', () => {
  it('ignores override keys left undefined', () => {
    const config = applyOverrides(DEFAULT_CONFIG, { browser: { launch: true, headless: undefined } });

    expect(config.browser.launch).toBe(true);
    expect(config.browser.headless).toBe(true);
    expect(DEFAULT_CONFIG.browser.launch).toBe(false);
  });
});
