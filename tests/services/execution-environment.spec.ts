import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
}));

import { DEFAULT_CONFIG } from '../../src/config/pipeline-config.js';
import {
  ContainerEnvironment,
  LocalEnvironment,
  RemotePodEnvironment,
  createExecutionEnvironment,
} from '../../src/services/execution-environment.js';
import type { ProcessResult, ProgramRunner, ShellRunner } from '../../src/services/process-runner.js';

function processResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return { ok: true, exitCode: 0, output: '', durationMs: 1, ...overrides };
}

describe('LocalEnvironment', () => {
  it('maps the exit status and merged output of the shell command', async () => {
    const run = vi.fn<ShellRunner>(async () => processResult({ ok: false, exitCode: 2, output: 'lint\nerror: boom' }));
    const env = new LocalEnvironment(run);

    const outcome = await env.runCommand('npm run lint', '/repo');

    expect(run).toHaveBeenCalledWith('npm run lint', { cwd: '/repo' });
    expect(outcome).toEqual({ success: false, output: 'lint\nerror: boom' });
  });
});

describe('ContainerEnvironment', () => {
  it('maps host directories below the project onto the remote root', () => {
    const env = new ContainerEnvironment({ serviceName: 'web', projectDir: '/repo', remoteRoot: '/srv/app' });

    expect(env.resolveWorkdir('/repo/packages/web')).toBe('/srv/app/packages/web');
    expect(env.resolveWorkdir('/repo')).toBe('/srv/app');
    expect(env.resolveWorkdir('/elsewhere/tmp')).toBe('/srv/app');
    expect(env.resolveWorkdir()).toBe('/srv/app');
  });

  it('runs the command through compose exec in the mapped directory', async () => {
    const run = vi.fn<ProgramRunner>(async () => processResult({ output: 'ok' }));
    const env = new ContainerEnvironment({ serviceName: 'web', projectDir: '/repo', runProgram: run });

    const outcome = await env.runCommand('npm test', '/repo/api');

    expect(run).toHaveBeenCalledWith(
      'docker',
      ['compose', '--project-directory', '/repo', 'exec', '-T', '-w', '/app/api', 'web', 'sh', '-c', 'npm test'],
      { cwd: '/repo' },
    );
    expect(outcome).toEqual({ success: true, output: 'ok' });
  });

  it('reports a missing docker binary with install guidance', async () => {
    const run = vi.fn<ProgramRunner>(async () => processResult({ ok: false, exitCode: 127, notFound: true }));
    const env = new ContainerEnvironment({ serviceName: 'web', projectDir: '/repo', runProgram: run });

    const outcome = await env.runCommand('npm test');

    expect(outcome.success).toBe(false);
    expect(outcome.output).toBe('docker not found. Please ensure Docker is installed and in your PATH.');
  });
});

describe('RemotePodEnvironment', () => {
  it('executes inside the configured pod container', async () => {
    const run = vi.fn<ProgramRunner>(async () => processResult({ output: 'done' }));
    const env = new RemotePodEnvironment({ podName: 'runner-0', namespace: 'qa', container: 'tests', runProgram: run });

    const outcome = await env.runCommand('pytest -q');

    expect(run).toHaveBeenCalledWith('kubectl', ['exec', '-n', 'qa', 'runner-0', '-c', 'tests', '--', 'sh', '-c', 'pytest -q']);
    expect(outcome).toEqual({ success: true, output: 'done' });
  });

  it('rewrites a kubectl-not-found failure into an actionable message', async () => {
    const run = vi.fn<ProgramRunner>(async () =>
      processResult({ ok: false, exitCode: 127, output: 'sh: kubectl: command not found' }),
    );
    const env = new RemotePodEnvironment({ podName: 'runner-0', runProgram: run });

    const outcome = await env.runCommand('true');

    expect(outcome).toEqual({
      success: false,
      output: 'kubectl not found. Please ensure Kubernetes CLI is installed and in your PATH.',
    });
  });

  it('keeps ordinary failures as-is', async () => {
    const run = vi.fn<ProgramRunner>(async () => processResult({ ok: false, exitCode: 1, output: '1 failed' }));
    const env = new RemotePodEnvironment({ podName: 'runner-0', runProgram: run });

    expect(await env.runCommand('pytest')).toEqual({ success: false, output: '1 failed' });
  });
});

describe('createExecutionEnvironment', () => {
  it('selects the environment by kind', () => {
    const config = structuredClone(DEFAULT_CONFIG);
    config.k8sConfig.podName = 'runner-0';

    expect(createExecutionEnvironment('local', config, '/repo').kind).toBe('local');
    expect(createExecutionEnvironment('docker', config, '/repo').kind).toBe('docker');
    expect(createExecutionEnvironment('k8s', config, '/repo').kind).toBe('k8s');
  });
});
