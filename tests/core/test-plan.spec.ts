import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
}));

import { ConfigError } from '../../src/core/errors.js';
import {
  DefinitionFilePlanner,
  analyzeChanges,
  changedFiles,
  dedupeTests,
  parseStrategies,
  readChangeArtifact,
} from '../../src/core/test-plan.js';
import type { ProcessResult, ProgramRunner } from '../../src/services/process-runner.js';
import { FULL_RUN_SIGNAL, type PlannerInput, type TestDescriptor, type TestPlanner } from '../../src/types/pipeline.js';

const fallbackTest: TestDescriptor = { kind: 'command', label: 'Change Audit (Fallback)', commandOrPath: 'git diff --check' };

function result(partial: Partial<ProcessResult>): ProcessResult {
  return { ok: true, exitCode: 0, output: '', durationMs: 1, ...partial };
}

function plannerFrom(answers: Record<string, TestDescriptor[]>) {
  return {
    analyze: vi.fn<TestPlanner['analyze']>(async (input: PlannerInput) => ({
      recommendedTests: answers[input.strategy] ?? [],
    })),
  };
}

describe('parseStrategies', () => {
  it('trims, drops blanks and removes repeats', () => {
    expect(parseStrategies(' frontend, backend ,,frontend ')).toEqual(['frontend', 'backend']);
  });

  it('defaults to auto when nothing is left', () => {
    expect(parseStrategies(' , ')).toEqual(['auto']);
  });
});

describe('dedupeTests', () => {
  it('keeps the first occurrence of each kind/label/command triple', () => {
    const lint: TestDescriptor = { kind: 'command', label: 'Lint', commandOrPath: 'npm run lint' };
    const lintVisual: TestDescriptor = { kind: 'visual', label: 'Lint', commandOrPath: 'npm run lint' };
    const lintAgain: TestDescriptor = { kind: 'command', label: 'Lint', commandOrPath: 'npm run lint', viewport: '1x1' };

    expect(dedupeTests([[lint, lintVisual], [lintAgain]])).toEqual([lint, lintVisual]);
  });
});

describe('analyzeChanges', () => {
  const home: TestDescriptor = { kind: 'visual', label: 'Home', commandOrPath: '/' };
  const unit: TestDescriptor = { kind: 'command', label: 'Unit', commandOrPath: 'npm test' };

  it('yields the same list for a repeated strategy label as for a single one', async () => {
    const planner = plannerFrom({ a: [home, unit] });
    const base = { planner, targetDir: '/repo', diff: 'diff', context: 'cli', fallbackTest };

    const single = await analyzeChanges({ ...base, strategy: 'a' });
    const repeated = await analyzeChanges({ ...base, strategy: 'a,a' });

    expect(repeated.tests).toEqual(single.tests);
    expect(repeated.tests).toEqual([home, unit]);
    expect(planner.analyze).toHaveBeenCalledTimes(2);
  });

  it('merges several strategies in order', async () => {
    const planner = plannerFrom({ frontend: [home, unit], backend: [unit, fallbackTest] });

    const outcome = await analyzeChanges({
      planner,
      targetDir: '/repo',
      diff: FULL_RUN_SIGNAL,
      context: 'cli',
      strategy: 'frontend,backend',
      customInstruction: 'focus on checkout',
      fallbackTest,
    });

    expect(outcome).toEqual({ tests: [home, unit, fallbackTest], strategies: ['frontend', 'backend'], usedFallback: false });
    expect(planner.analyze).toHaveBeenNthCalledWith(2, {
      diff: FULL_RUN_SIGNAL,
      context: 'cli',
      strategy: 'backend',
      customInstruction: 'focus on checkout',
      targetDir: '/repo',
    });
  });

  it('substitutes the fallback audit test for an empty plan', async () => {
    const outcome = await analyzeChanges({
      planner: plannerFrom({}),
      targetDir: '/repo',
      diff: 'diff',
      context: 'watch',
      strategy: 'auto',
      fallbackTest,
    });

    expect(outcome).toEqual({ tests: [fallbackTest], strategies: ['auto'], usedFallback: true });
  });
});

describe('readChangeArtifact', () => {
  it('prefers a base64 injected diff', async () => {
    const run = vi.fn<ProgramRunner>();
    const diff = await readChangeArtifact('/repo', {
      env: { AETHER_DIFF_B64: Buffer.from('diff --git a/x b/x').toString('base64'), AETHER_DIFF: 'plain' },
      runProgram: run,
    });

    expect(diff).toBe('diff --git a/x b/x');
    expect(run).not.toHaveBeenCalled();
  });

  it('uses a plain injected diff next', async () => {
    expect(await readChangeArtifact('/repo', { env: { AETHER_DIFF: 'plain diff' }, runProgram: vi.fn<ProgramRunner>() })).toBe(
      'plain diff',
    );
  });

  it('falls back from git diff HEAD to git diff', async () => {
    const run = vi.fn<ProgramRunner>(async (_executable, args) =>
      args.includes('HEAD')
        ? result({ ok: false, exitCode: 128, output: "fatal: ambiguous argument 'HEAD'" })
        : result({ output: 'diff --git a/src/app.ts b/src/app.ts' }),
    );

    const diff = await readChangeArtifact('/repo', { env: {}, runProgram: run });

    expect(diff).toBe('diff --git a/src/app.ts b/src/app.ts');
    expect(run.mock.calls.map((call) => call[1])).toEqual([['diff', 'HEAD'], ['diff']]);
    expect(run).toHaveBeenCalledWith('git', ['diff'], { cwd: '/repo', timeoutMs: 30_000 });
  });

  it('returns an empty string for a clean tree', async () => {
    const run = vi.fn<ProgramRunner>(async () => result({ output: '' }));
    expect(await readChangeArtifact('/repo', { env: {}, runProgram: run })).toBe('');
  });

  it('returns an empty string when git is missing', async () => {
    const run = vi.fn<ProgramRunner>(async () => result({ ok: false, exitCode: 127, notFound: true }));
    expect(await readChangeArtifact('/repo', { env: {}, runProgram: run })).toBe('');
    expect(run).toHaveBeenCalledTimes(1);
  });
});

describe('changedFiles', () => {
  it('lists the files named in diff headers', () => {
    const diff = [
      'diff --git a/src/pages/index.astro b/src/pages/index.astro',
      '--- a/src/pages/index.astro',
      '+++ b/src/pages/index.astro',
      'diff --git a/api/server.ts b/api/server.ts',
    ].join('\n');
    expect(changedFiles(diff)).toEqual(['src/pages/index.astro', 'api/server.ts']);
  });
});

describe('DefinitionFilePlanner', () => {
  let targetDir: string;

  beforeEach(async () => {
    targetDir = await mkdtemp(path.join(os.tmpdir(), 'aether-plan-'));
  });

  afterEach(async () => {
    await rm(targetDir, { recursive: true, force: true });
  });

  function input(partial: Partial<PlannerInput>): PlannerInput {
    return { diff: FULL_RUN_SIGNAL, context: 'cli', strategy: 'auto', targetDir, ...partial };
  }

  it('recommends nothing when the definitions file is missing', async () => {
    expect(await new DefinitionFilePlanner().analyze(input({}))).toEqual({ recommendedTests: [] });
  });

  it('filters definitions by strategy and touched paths', async () => {
    await writeFile(
      path.join(targetDir, 'aether.tests.json'),
      JSON.stringify({
        tests: [
          { kind: 'visual', label: 'Home', commandOrPath: '/', viewport: '1280x720', strategies: ['frontend'], paths: ['src/pages/'] },
          { label: 'API', commandOrPath: 'npm run test:api', strategies: ['backend'] },
          { label: 'Unit', commandOrPath: 'npm test' },
        ],
      }),
    );
    const planner = new DefinitionFilePlanner();

    const frontend = await planner.analyze(
      input({ strategy: 'frontend', diff: 'diff --git a/src/pages/index.astro b/src/pages/index.astro' }),
    );
    const frontendElsewhere = await planner.analyze(
      input({ strategy: 'frontend', diff: 'diff --git a/README.md b/README.md' }),
    );
    const full = await planner.analyze(input({}));

    expect(frontend.recommendedTests.map((test) => test.label)).toEqual(['Home', 'Unit']);
    expect(frontendElsewhere.recommendedTests.map((test) => test.label)).toEqual(['Unit']);
    expect(full.recommendedTests).toEqual([
      { kind: 'visual', label: 'Home', commandOrPath: '/', viewport: '1280x720' },
      { kind: 'command', label: 'API', commandOrPath: 'npm run test:api' },
      { kind: 'command', label: 'Unit', commandOrPath: 'npm test' },
    ]);
  });

  it('rejects malformed definitions', async () => {
    await writeFile(path.join(targetDir, 'aether.tests.json'), JSON.stringify([{ label: 'No command' }]));

    await expect(new DefinitionFilePlanner().analyze(input({}))).rejects.toBeInstanceOf(ConfigError);
  });
});
