import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
}));

import {
  historyDir,
  listSessions,
  loadLatestSession,
  loadSession,
  saveSession,
  summarizeSession,
} from '../../src/services/session-store.js';
import type { ExecutionResult } from '../../src/types/pipeline.js';

const results: ExecutionResult[] = [
  { kind: 'command', label: 'Unit', status: 'PASSED', strategy: 'auto' },
  { kind: 'visual', label: 'Home', status: 'FAILED', error: 'Visual mismatch detected (4 bytes)', strategy: 'auto' },
];

describe('session store', () => {
  let targetDir: string;

  beforeEach(async () => {
    targetDir = await mkdtemp(path.join(os.tmpdir(), 'aether-history-'));
  });

  afterEach(async () => {
    await rm(targetDir, { recursive: true, force: true });
  });

  it('writes the run file and the latest mirror', async () => {
    const saved = await saveSession(targetDir, 'auto', results, {
      now: () => 1_700_000_000_500,
      createId: () => '0f1e2d3c-aaaa-bbbb-cccc-000000000000',
    });

    expect(saved.filePath).toBe(path.join(historyDir(targetDir), 'run_1700000000_0f1e2d3c.json'));
    expect(saved.record).toEqual({ sessionId: '0f1e2d3c', timestamp: 1_700_000_000, strategy: 'auto', results });
    expect((await readdir(historyDir(targetDir))).sort()).toEqual(['latest.json', 'run_1700000000_0f1e2d3c.json']);
    expect(JSON.parse(await readFile(path.join(historyDir(targetDir), 'latest.json'), 'utf8'))).toEqual(saved.record);
  });

  it('loads the latest session and lists runs newest first', async () => {
    await saveSession(targetDir, 'frontend', results, { now: () => 1_000_000, createId: () => 'aaaaaaaa-1' });
    await saveSession(targetDir, 'backend', [], { now: () => 2_000_000, createId: () => 'bbbbbbbb-2' });

    const latest = await loadLatestSession(targetDir);
    const sessions = await listSessions(targetDir);

    expect(latest?.strategy).toBe('backend');
    expect(sessions).toEqual([
      { sessionId: 'bbbbbbbb', timestamp: 2_000, fileName: 'run_2000_bbbbbbbb.json' },
      { sessionId: 'aaaaaaaa', timestamp: 1_000, fileName: 'run_1000_aaaaaaaa.json' },
    ]);
    expect((await loadSession(targetDir, 'aaaaaaaa'))?.results).toEqual(results);
  });

  it('returns nothing for a directory without history', async () => {
    expect(await loadLatestSession(targetDir)).toBeNull();
    expect(await listSessions(targetDir)).toEqual([]);
    expect(await loadSession(targetDir, 'missing')).toBeNull();
  });

  it('ignores a corrupt latest file', async () => {
    await mkdir(historyDir(targetDir), { recursive: true });
    await writeFile(path.join(historyDir(targetDir), 'latest.json'), '{"sessionId": 1');

    expect(await loadLatestSession(targetDir)).toBeNull();
  });

  it('summarizes a session', () => {
    expect(summarizeSession({ sessionId: 'abc12345', timestamp: 0, strategy: 'auto', results })).toBe(
      'Session abc12345 (1970-01-01T00:00:00.000Z, strategy auto): 1 passed, 1 failed, 0 skipped.',
    );
  });
});
