import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
}));

import { DEFAULT_CONFIG } from '../../src/config/pipeline-config.js';
import { ProvisioningError, ToolNotFoundError } from '../../src/core/errors.js';
import type { AutomationBrowser, BrowserLauncher } from '../../src/services/browser-driver.js';
import {
  ContainerEndpointSpawner,
  EndpointProvider,
  FALLBACK_QUESTION,
  PodEndpointSpawner,
  resolveEndpointStrategy,
  type BackgroundProcess,
  type ConfirmFn,
  type SpawnedEndpoint,
} from '../../src/services/endpoint-provider.js';
import type { ProcessResult, ProgramRunner } from '../../src/services/process-runner.js';
import type { HttpProbe } from '../../src/utils/http-probe.js';

function fakeBrowser(close: () => Promise<void> = async () => undefined) {
  return {
    newPage: vi.fn(async () => ({
      goto: async () => undefined,
      screenshot: async () => undefined,
      close: async () => undefined,
    })),
    isConnected: () => true,
    close: vi.fn(close),
  } satisfies AutomationBrowser;
}

function fakeLauncher(options: { connectError?: Error } = {}) {
  const launched = fakeBrowser();
  const connected = fakeBrowser();
  const launcher = {
    launch: vi.fn<BrowserLauncher['launch']>(async () => launched),
    connect: vi.fn<BrowserLauncher['connect']>(async () => {
      if (options.connectError) throw options.connectError;
      return connected;
    }),
  };
  return { launcher, launched, connected };
}

function fakeSpawned(isAlive: () => Promise<boolean> = async () => true) {
  return {
    description: 'container abc123',
    endpointUrl: 'ws://127.0.0.1:4000',
    readinessUrl: 'http://127.0.0.1:4000/json/version',
    isAlive: vi.fn(isAlive),
    stop: vi.fn(async () => undefined),
  } satisfies SpawnedEndpoint;
}

function probeSequence(...answers: boolean[]) {
  return vi.fn<HttpProbe>(async () => {
    const ok = answers.shift() ?? false;
    return { ok, detail: ok ? 'HTTP 200' : 'connection refused' };
  });
}

describe('EndpointProvider', () => {
  it('spawns, polls readiness with backoff and attaches', async () => {
    const { launcher, connected } = fakeLauncher();
    const spawned = fakeSpawned();
    const sleep = vi.fn(async () => undefined);
    const probe = probeSequence(false, false, true);
    const provider = new EndpointProvider({
      strategy: { kind: 'spawn', spawner: { spawn: async () => spawned } },
      launcher,
      probe,
      sleep,
      now: () => 0,
    });

    expect(provider.state).toBe('idle');
    await provider.start();

    expect(probe).toHaveBeenCalledTimes(3);
    expect(probe).toHaveBeenCalledWith('http://127.0.0.1:4000/json/version');
    expect(sleep.mock.calls).toEqual([[500], [750]]);
    expect(launcher.connect).toHaveBeenCalledWith('ws://127.0.0.1:4000');
    expect(provider.snapshot()).toEqual({
      state: 'connected',
      endpointUrl: 'ws://127.0.0.1:4000',
      ownedResource: 'container abc123',
      fellBack: false,
    });
    expect(await provider.acquire()).toBe(connected);

    await provider.close();
    expect(connected.close).toHaveBeenCalledTimes(1);
    expect(spawned.stop).toHaveBeenCalledTimes(1);
    expect(provider.state).toBe('closed');
  });

  it('fails fast and releases the resource when it dies while waiting', async () => {
    const { launcher } = fakeLauncher();
    const spawned = fakeSpawned(vi.fn<() => Promise<boolean>>().mockResolvedValueOnce(true).mockResolvedValue(false));
    const provider = new EndpointProvider({
      strategy: { kind: 'spawn', spawner: { spawn: async () => spawned } },
      launcher,
      probe: probeSequence(),
      sleep: async () => undefined,
      now: () => 0,
    });

    await expect(provider.start()).rejects.toThrow('container abc123 exited before becoming ready.');
    expect(launcher.connect).not.toHaveBeenCalled();
    expect(spawned.stop).toHaveBeenCalledTimes(1);
    expect(provider.state).toBe('closed');
  });

  it('falls back to a local browser when attach fails and the hook confirms', async () => {
    const { launcher, launched } = fakeLauncher({ connectError: new Error('ECONNREFUSED') });
    const confirm = vi.fn<ConfirmFn>(async () => true);
    const provider = new EndpointProvider({
      strategy: { kind: 'attach', endpointUrl: 'ws://localhost:9222', allowFallback: true, headless: true },
      launcher,
      confirm,
    });

    const browser = await provider.acquire();

    expect(confirm).toHaveBeenCalledWith(FALLBACK_QUESTION, true);
    expect(launcher.launch).toHaveBeenCalledWith({ headless: true });
    expect(browser).toBe(launched);
    expect(provider.snapshot()).toMatchObject({ state: 'connected', endpointUrl: 'local', fellBack: true });
  });

  it('fails when the fallback is declined', async () => {
    const { launcher } = fakeLauncher({ connectError: new Error('ECONNREFUSED') });
    const provider = new EndpointProvider({
      strategy: { kind: 'attach', endpointUrl: 'ws://localhost:9222', allowFallback: true, headless: true },
      launcher,
      confirm: async () => false,
    });

    const error = await provider.start().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toHaveProperty(
      'message',
      'Could not connect to browser endpoint ws://localhost:9222 and local fallback was declined.',
    );
    expect(launcher.launch).not.toHaveBeenCalled();
  });

  it('never asks when the strategy does not permit a fallback', async () => {
    const { launcher } = fakeLauncher({ connectError: new Error('no route') });
    const confirm = vi.fn<ConfirmFn>(async () => true);
    const provider = new EndpointProvider({
      strategy: { kind: 'attach', endpointUrl: 'ws://sidecar:9222', allowFallback: false, headless: true },
      launcher,
      confirm,
    });

    await expect(provider.start()).rejects.toThrow('Could not connect to browser endpoint ws://sidecar:9222: no route');
    expect(confirm).not.toHaveBeenCalled();
  });

  it('shares one provisioning attempt between concurrent callers', async () => {
    const { launcher } = fakeLauncher();
    const provider = new EndpointProvider({ strategy: { kind: 'local', headless: false }, launcher });

    const [first, second] = await Promise.all([provider.acquire(), provider.acquire()]);

    expect(first).toBe(second);
    expect(launcher.launch).toHaveBeenCalledTimes(1);
    expect(launcher.launch).toHaveBeenCalledWith({ headless: false });
  });

  it('still stops the owned resource when closing the browser fails', async () => {
    const spawned = fakeSpawned();
    const brokenBrowser = fakeBrowser(async () => {
      throw new Error('socket hang up');
    });
    const launcher: BrowserLauncher = { launch: async () => brokenBrowser, connect: async () => brokenBrowser };
    const messages: string[] = [];
    const provider = new EndpointProvider({
      strategy: { kind: 'spawn', spawner: { spawn: async () => spawned } },
      launcher,
      probe: probeSequence(true),
      onLog: (message) => messages.push(message),
    });

    await provider.start();
    await Promise.all([provider.close(), provider.close()]);

    expect(brokenBrowser.close).toHaveBeenCalledTimes(1);
    expect(spawned.stop).toHaveBeenCalledTimes(1);
    expect(messages).toContain('[Browser] Failed to close browser: socket hang up');
    await expect(provider.acquire()).rejects.toThrow('Endpoint provider is already closed.');
  });

  describe('dry-run', () => {
    let workspace = '';

    afterEach(async () => {
      if (workspace) await rm(workspace, { recursive: true, force: true });
    });

    it('logs every operation and writes placeholder captures', async () => {
      workspace = await mkdtemp(path.join(os.tmpdir(), 'aether-dry-run-'));
      const messages: string[] = [];
      const provider = new EndpointProvider({ strategy: { kind: 'dry-run' }, onLog: (message) => messages.push(message) });

      const browser = await provider.acquire();
      const page = await browser.newPage({ width: 375, height: 812 });
      const target = path.join(workspace, 'home.png');
      await page.goto('http://localhost:4321/');
      await page.screenshot(target);
      await provider.close();

      expect(await readFile(target, 'utf8')).toBe('');
      expect(messages).toEqual([
        '[Browser] Using log-only strategy (dry run).',
        '[DryRun] Opening page at 375x812.',
        '[DryRun] Navigating to: http://localhost:4321/',
        `[DryRun] Capturing screenshot to: ${target}`,
        '[DryRun] Browser closed.',
      ]);
    });
  });
});

function processResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return { ok: true, exitCode: 0, output: '', durationMs: 1, ...overrides };
}

describe('ContainerEndpointSpawner', () => {
  it('runs the image on the allocated port and stops it once', async () => {
    const run = vi.fn<ProgramRunner>(async (_executable, args) => {
      if (args[0] === 'run') return processResult({ output: 'Unable to find image locally\n0123456789abcdef' });
      if (args[0] === 'inspect') return processResult({ output: 'true\n' });
      return processResult();
    });
    const spawner = new ContainerEndpointSpawner({ image: 'browserless/chrome:latest', runProgram: run, allocatePort: async () => 4555 });

    const container = await spawner.spawn();

    expect(run).toHaveBeenNthCalledWith(1, 'docker', [
      'run', '-d', '--rm', '-p', '127.0.0.1:4555:3000', '--add-host', 'host.docker.internal:host-gateway', 'browserless/chrome:latest',
    ]);
    expect(container.description).toBe('container 0123456789ab');
    expect(container.endpointUrl).toBe('ws://127.0.0.1:4555');
    expect(container.readinessUrl).toBe('http://127.0.0.1:4555/json/version');
    expect(await container.isAlive()).toBe(true);

    await container.stop();
    await container.stop();
    expect(run.mock.calls.filter(([, args]) => args[0] === 'stop')).toEqual([['docker', ['stop', '0123456789abcdef']]]);
  });

  it('reports a missing docker binary as ToolNotFoundError', async () => {
    const spawner = new ContainerEndpointSpawner({
      image: 'browserless/chrome:latest',
      runProgram: async () => processResult({ ok: false, exitCode: 127, notFound: true }),
      allocatePort: async () => 4555,
    });

    await expect(spawner.spawn()).rejects.toBeInstanceOf(ToolNotFoundError);
  });
});

describe('PodEndpointSpawner', () => {
  function fakeForwarder() {
    return { description: 'port-forward', stop: vi.fn(async () => undefined), isRunning: () => true } satisfies BackgroundProcess;
  }

  it('runs, waits for and port-forwards to the pod, then deletes it on stop', async () => {
    const run = vi.fn<ProgramRunner>(async () => processResult());
    const forwarder = fakeForwarder();
    const spawnProgram = vi.fn((_executable: string, _args: string[]) => forwarder);
    const spawner = new PodEndpointSpawner({
      image: 'browserless/chrome:latest',
      namespace: 'qa',
      podName: 'aether-browser-test',
      runProgram: run,
      spawnProgram,
      allocatePort: async () => 9333,
    });

    const pod = await spawner.spawn();

    expect(run.mock.calls.map(([, args]) => args[0])).toEqual(['run', 'wait']);
    expect(run.mock.calls[0][1]).toEqual([
      'run', 'aether-browser-test', '--image=browserless/chrome:latest', '--namespace=qa', '--port=3000', '--restart=Never',
    ]);
    expect(spawnProgram).toHaveBeenCalledWith('kubectl', ['port-forward', 'pod/aether-browser-test', '9333:3000', '--namespace=qa']);
    expect(pod.endpointUrl).toBe('ws://127.0.0.1:9333');
    expect(await pod.isAlive()).toBe(true);

    await pod.stop();
    expect(forwarder.stop).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenLastCalledWith('kubectl', [
      'delete', 'pod', 'aether-browser-test', '--namespace=qa', '--force', '--grace-period=0',
    ]);
  });

  it('deletes the pod when it never becomes ready', async () => {
    const run = vi.fn<ProgramRunner>(async (_executable, args) =>
      args[0] === 'wait' ? processResult({ ok: false, exitCode: 1, output: 'timed out waiting for the condition' }) : processResult(),
    );
    const spawner = new PodEndpointSpawner({
      image: 'browserless/chrome:latest',
      namespace: 'default',
      podName: 'aether-browser-test',
      runProgram: run,
      spawnProgram: () => fakeForwarder(),
      allocatePort: async () => 9333,
    });

    await expect(spawner.spawn()).rejects.toThrow(
      'Browser pod aether-browser-test did not become Ready: timed out waiting for the condition',
    );
    expect(run.mock.calls.map(([, args]) => args[0])).toEqual(['run', 'wait', 'delete']);
  });
});

describe('resolveEndpointStrategy', () => {
  const browser = structuredClone(DEFAULT_CONFIG.browser);

  it('maps each configured strategy', () => {
    expect(resolveEndpointStrategy({ ...browser, strategy: 'none' })).toBeNull();
    expect(resolveEndpointStrategy({ ...browser, strategy: 'dry-run' })).toEqual({ kind: 'dry-run' });
    expect(resolveEndpointStrategy({ ...browser, strategy: 'local', headless: false })).toEqual({ kind: 'local', headless: false });
    expect(resolveEndpointStrategy({ ...browser, strategy: 'docker', url: 'ws://localhost:9222' })).toEqual({
      kind: 'attach',
      endpointUrl: 'ws://localhost:9222',
      allowFallback: true,
      headless: true,
    });
    expect(resolveEndpointStrategy({ ...browser, strategy: 'k8s', url: 'ws://sidecar:9222' })).toMatchObject({
      kind: 'attach',
      allowFallback: false,
    });
    expect(resolveEndpointStrategy({ ...browser, strategy: 'docker', launch: true })?.kind).toBe('spawn');
  });
});
