import { describe, expect, it } from 'vitest';
import { applyQualityGuard } from '../../src/core/quality-guard.js';
import type { TestDescriptor } from '../../src/types/pipeline.js';

const home: TestDescriptor = { kind: 'visual', label: 'Home', commandOrPath: '/' };

describe('applyQualityGuard', () => {
  it('places static-lint ahead of the analysis tests and forces it local', () => {
    const { tests, added } = applyQualityGuard([home], { enabled: true, providers: ['static-lint'] });

    expect(tests).toEqual([
      { kind: 'command', label: 'Quality Guard (static-lint)', commandOrPath: 'npx eslint .', executionEnv: 'local' },
      home,
    ]);
    expect(added).toHaveLength(1);
  });

  it('keeps provider order, drops repeats and reports unknown providers', () => {
    const result = applyQualityGuard([], { enabled: true, providers: ['ruff', 'pylint', 'typecheck', 'ruff', 'toString'] });

    expect(result.tests.map((test) => test.label)).toEqual(['Quality Guard (ruff)', 'Quality Guard (typecheck)']);
    expect(result.unknownProviders).toEqual(['pylint', 'toString']);
  });

  it('leaves the list alone when disabled', () => {
    expect(applyQualityGuard([home], { enabled: false, providers: ['static-lint'] })).toEqual({
      tests: [home],
      added: [],
      unknownProviders: [],
    });
  });
});
