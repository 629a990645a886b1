import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { logSystemCommand, logThought, scrubSensitiveText } from '../../src/utils/logger.js';

const SECRET_ENV = 'AETHER_API_SECRET';
const SECRET_VALUE = 'test-secret-placeholder';

let previousSecret: string | undefined;
let previousLogDir: string | undefined;
let logDir: string;

beforeEach(async () => {
  previousSecret = process.env[SECRET_ENV];
  previousLogDir = process.env.AETHER_LOG_DIR;
  logDir = await mkdtemp(path.join(os.tmpdir(), 'aether-log-'));
  process.env[SECRET_ENV] = SECRET_VALUE;
  process.env.AETHER_LOG_DIR = logDir;
});

afterEach(async () => {
  restore(SECRET_ENV, previousSecret);
  restore('AETHER_LOG_DIR', previousLogDir);
  await rm(logDir, { recursive: true, force: true });
});

function restore(name: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

async function todaysLog(): Promise<string> {
  return readFile(path.join(logDir, `${new Date().toISOString().slice(0, 10)}.md`), 'utf8');
}

describe('scrubSensitiveText', () => {
  it('redacts sensitive environment values wherever they appear', () => {
    expect(scrubSensitiveText(`trace => ${SECRET_VALUE} <= hidden`)).toBe('trace => [REDACTED] <= hidden');
  });

  it('redacts inline key=value secrets and bearer tokens', () => {
    expect(scrubSensitiveText('token=abc123 next')).toBe('token=[REDACTED] next');
    expect(scrubSensitiveText('Authorization: Bearer placeholder.value')).toBe('Authorization: Bearer [REDACTED]');
  });
});

describe('logThought', () => {
  it('appends scrubbed entries to the daily log', async () => {
    await logThought(`[Pipeline] signing with ${SECRET_VALUE}`);

    expect(await todaysLog()).toMatch(/^- \[\d{2}:\d{2}:\d{2}\] \[Pipeline\] signing with \[REDACTED\]\n$/);
  });
});

describe('logSystemCommand', () => {
  it('records the command, exit code and indented output', async () => {
    await logSystemCommand('docker compose ps', 'web  running\ndb   running\n', 0);

    const log = await todaysLog();
    expect(log).toMatch(/^- \[\d{2}:\d{2}:\d{2}\] `docker compose ps` exited 0\n {4}web {2}running\n {4}db {3}running\n$/);
  });

  it('notes empty output', async () => {
    await logSystemCommand('true', '   ', 0);

    expect(await todaysLog()).toMatch(/`true` exited 0\n {4}\(no output\)\n$/);
  });
});
