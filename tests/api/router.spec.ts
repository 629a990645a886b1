import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  scrubSensitiveText: (text: string) => text,
}));

import { createControlApp, parseRunRequest, type ControlApiDeps } from '../../src/api/router.js';
import { signPayload } from '../../src/api/shared.js';
import { ConfigError } from '../../src/core/errors.js';
import { PipelineEventEmitter } from '../../src/core/events.js';
import type { PipelineRunOptions } from '../../src/core/pipeline-controller.js';
import { WatchController } from '../../src/services/file-watcher.js';
import { LifecycleRegistry } from '../../src/services/lifecycle-registry.js';
import { saveSession } from '../../src/services/session-store.js';
import type { PipelineRunResult } from '../../src/types/pipeline.js';

const SECRET = 'test-secret';
const completed: PipelineRunResult = { outcome: 'completed', results: [], reportPaths: [] };

function stubDeps(overrides: Partial<ControlApiDeps> = {}) {
  const registry = new LifecycleRegistry();
  const runPipeline = vi.fn(async (_dir: string, _options?: PipelineRunOptions): Promise<PipelineRunResult> => completed);
  const watcher = new WatchController('/repo', () => undefined, { createSource: () => ({ close: async () => undefined }) });
  const watches = {
    startWatch: vi.fn(async () => ({ watcher, started: true })),
    stopWatch: vi.fn(async () => true),
    activeWatchers: vi.fn(async () => ['/repo']),
  };
  const deps: ControlApiDeps = {
    pipeline: { registry, runPipeline },
    watches,
    secret: SECRET,
    now: () => 5_000,
    ...overrides,
  };
  return { deps, runPipeline, watches, registry };
}

function signedPost(app: ReturnType<typeof createControlApp>, url: string, body: object) {
  return request(app).post(url).set('X-Signature', signPayload(SECRET, JSON.stringify(body))).send(body);
}

function signedGet(app: ReturnType<typeof createControlApp>, url: string) {
  return request(app).get(url).set('X-Signature', signPayload(SECRET, ''));
}

describe('control API', () => {
  it('reports health without a signature', async () => {
    const { deps } = stubDeps();

    const response = await request(createControlApp(deps)).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.ok).toBe(true);
    expect(response.body.data).toEqual({
      status: 'ok',
      uptimeSec: 0,
      activeDirectories: [],
      watchers: ['/repo'],
      eventStream: null,
    });
    expect(typeof response.body.correlationId).toBe('string');
  });

  it('refuses signed routes when no secret is configured', async () => {
    const { deps } = stubDeps({ secret: undefined });

    const response = await request(createControlApp(deps)).post('/pipeline/run').send({ targetDir: '/repo' });

    expect(response.status).toBe(503);
    expect(response.body.error).toBe('Signed API endpoints are unavailable (missing AETHER_API_SECRET).');
  });

  it('rejects missing and wrong signatures', async () => {
    const { deps, runPipeline } = stubDeps();
    const app = createControlApp(deps);

    const missing = await request(app).post('/pipeline/run').send({ targetDir: '/repo' });
    const wrong = await request(app)
      .post('/pipeline/run')
      .set('X-Signature', signPayload('other-secret', JSON.stringify({ targetDir: '/repo' })))
      .send({ targetDir: '/repo' });

    expect(missing.status).toBe(401);
    expect(wrong.status).toBe(403);
    expect(wrong.body.error).toBe('Invalid signature.');
    expect(runPipeline).not.toHaveBeenCalled();
  });

  it('runs the pipeline in the rpc context', async () => {
    const { deps, runPipeline } = stubDeps();

    const response = await signedPost(createControlApp(deps), '/pipeline/run', {
      targetDir: '/repo',
      strategy: 'frontend',
      executionEnv: 'docker',
    });

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual(completed);
    expect(runPipeline).toHaveBeenCalledTimes(1);
    const [dir, options] = runPipeline.mock.calls[0];
    expect(dir).toBe('/repo');
    expect(options).toMatchObject({ invocation: 'rpc', overrides: { strategy: 'frontend', executionEnv: 'docker' } });
    expect(options?.emitter).toBeInstanceOf(PipelineEventEmitter);
  });

  it('validates the run request', async () => {
    const { deps } = stubDeps();

    const response = await signedPost(createControlApp(deps), '/pipeline/run', { targetDir: '/repo', executionEnv: 'vm' });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('executionEnv must be one of: local, docker, k8s.');
  });

  it('maps configuration errors to 422', async () => {
    const { deps, runPipeline } = stubDeps();
    runPipeline.mockRejectedValueOnce(new ConfigError('Invalid JSON in aether.config.json: Unexpected token'));

    const response = await signedPost(createControlApp(deps), '/pipeline/run', { targetDir: '/repo' });

    expect(response.status).toBe(422);
    expect(response.body.error).toBe(
      'Invalid JSON in aether.config.json: Unexpected token Fix aether.config.json in the target directory and retry.',
    );
  });

  it('starts and stops watchers', async () => {
    const { deps, watches } = stubDeps();
    const app = createControlApp(deps);

    const started = await signedPost(app, '/watch/start', { targetDir: '/repo', initialRun: true });
    const stopped = await signedPost(app, '/watch/stop', { targetDir: '/repo' });

    expect(started.body.data).toEqual({ targetDir: path.resolve('/repo'), started: true, initialRun: null });
    expect(watches.startWatch).toHaveBeenCalledWith('/repo', expect.objectContaining({ initialRun: true }));
    expect(stopped.body.data).toEqual({ targetDir: path.resolve('/repo'), stopped: true });
  });

  it('requires a target directory for watch requests', async () => {
    const { deps } = stubDeps();

    const response = await signedPost(createControlApp(deps), '/watch/start', { initialRun: true });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('targetDir is required.');
  });

  describe('history', () => {
    let targetDir: string;

    beforeEach(async () => {
      targetDir = await mkdtemp(path.join(os.tmpdir(), 'aether-api-'));
    });

    afterEach(async () => {
      await rm(targetDir, { recursive: true, force: true });
    });

    it('lists recorded sessions and loads one', async () => {
      await saveSession(
        targetDir,
        'auto',
        [{ kind: 'command', label: 'Unit', status: 'PASSED', strategy: 'auto' }],
        { now: () => 3_000, createId: () => 'feedbeef-0000' },
      );
      const { deps } = stubDeps();
      const app = createControlApp(deps);
      const query = `targetDir=${encodeURIComponent(targetDir)}`;

      const list = await signedGet(app, `/history?${query}`);
      const one = await signedGet(app, `/history/feedbeef?${query}`);
      const missing = await signedGet(app, `/history/deadbeef?${query}`);

      expect(list.body.data).toEqual({
        sessions: [{ sessionId: 'feedbeef', timestamp: 3, fileName: 'run_3_feedbeef.json' }],
        latest: 'Session feedbeef (1970-01-01T00:00:03.000Z, strategy auto): 1 passed, 0 failed, 0 skipped.',
      });
      expect(one.body.data.results).toEqual([{ kind: 'command', label: 'Unit', status: 'PASSED', strategy: 'auto' }]);
      expect(missing.status).toBe(404);
      expect(missing.body.error).toBe("Session 'deadbeef' not found.");
    });
  });
});

describe('parseRunRequest', () => {
  it('rejects bodies without a target directory', () => {
    expect(parseRunRequest(null)).toEqual({ ok: false, error: 'Request body must be a JSON object.' });
    expect(parseRunRequest({ targetDir: '  ' })).toEqual({ ok: false, error: 'targetDir is required.' });
    expect(parseRunRequest({ targetDir: '/repo', strategy: 3 })).toEqual({ ok: false, error: 'strategy must be a string.' });
  });
});
