import { randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { isRecord } from '../config/config-schema.js';
import type { ExecutionResult, SessionRecord, TestKind, TestStatus } from '../types/pipeline.js';
import { logThought } from '../utils/logger.js';

const LATEST_FILE = 'latest.json';
const RUN_FILE_PATTERN = /^run_(\d+)_([A-Za-z0-9-]+)\.json$/;
const TEST_KINDS: readonly TestKind[] = ['command', 'visual', 'setup'];
const TEST_STATUSES: readonly TestStatus[] = ['PASSED', 'FAILED', 'SKIPPED'];

function isTestKind(value: unknown): value is TestKind {
    return TEST_KINDS.some((kind) => kind === value);
}

function isTestStatus(value: unknown): value is TestStatus {
    return TEST_STATUSES.some((status) => status === value);
}

export function historyDir(targetDir: string): string {
    return path.join(targetDir, '.aether', 'history');
}

export interface SaveSessionOptions {
    now?: () => number;
    createId?: () => string;
}

export interface SavedSession {
    record: SessionRecord;
    filePath: string;
}

/**
 * Persist a run under `.aether/history/run_<timestamp>_<id>.json` and mirror
 * it to `latest.json`.
 */
export async function saveSession(
    targetDir: string,
    strategy: string,
    results: readonly ExecutionResult[],
    options: SaveSessionOptions = {},
): Promise<SavedSession> {
    const dir = historyDir(targetDir);
    await mkdir(dir, { recursive: true });

    const record: SessionRecord = {
        sessionId: (options.createId ?? randomUUID)().slice(0, 8),
        timestamp: Math.floor((options.now ?? Date.now)() / 1_000),
        strategy,
        results: [...results],
    };
    const body = `${JSON.stringify(record, null, 2)}\n`;
    const filePath = path.join(dir, `run_${record.timestamp}_${record.sessionId}.json`);

    await writeFile(filePath, body, 'utf8');
    await writeFile(path.join(dir, LATEST_FILE), body, 'utf8');
    void logThought(`[History] Session saved: ${path.basename(filePath)}`);
    return { record, filePath };
}

function parseSession(raw: unknown): SessionRecord | null {
    if (!isRecord(raw)) return null;
    const { sessionId, timestamp, strategy, results } = raw;
    if (typeof sessionId !== 'string' || typeof timestamp !== 'number' || typeof strategy !== 'string') {
        return null;
    }
    if (!Array.isArray(results)) return null;
    const parsed: ExecutionResult[] = [];
    for (const entry of results) {
        if (!isRecord(entry)) return null;
        const { kind, label, status, error, artifact, baseline } = entry;
        if (!isTestKind(kind) || !isTestStatus(status)) return null;
        if (typeof label !== 'string' || typeof entry.strategy !== 'string') return null;
        parsed.push({
            kind,
            label,
            status,
            strategy: entry.strategy,
            ...(typeof error === 'string' ? { error } : {}),
            ...(typeof artifact === 'string' ? { artifact } : {}),
            ...(typeof baseline === 'string' ? { baseline } : {}),
        });
    }
    return { sessionId, timestamp, strategy, results: parsed };
}

async function readSession(filePath: string): Promise<SessionRecord | null> {
    let text: string;
    try {
        text = await readFile(filePath, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
        throw error;
    }
    try {
        return parseSession(JSON.parse(text));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        void logThought(`[History] Ignoring unreadable session ${filePath}: ${message}`);
        return null;
    }
}

/** The most recent session, or `null` when none was recorded. */
export function loadLatestSession(targetDir: string): Promise<SessionRecord | null> {
    return readSession(path.join(historyDir(targetDir), LATEST_FILE));
}

export interface SessionSummary {
    sessionId: string;
    timestamp: number;
    fileName: string;
}

/** Recorded runs, newest first. */
export async function listSessions(targetDir: string): Promise<SessionSummary[]> {
    let names: string[];
    try {
        names = await readdir(historyDir(targetDir));
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
        throw error;
    }

    const sessions: SessionSummary[] = [];
    for (const fileName of names) {
        const match = RUN_FILE_PATTERN.exec(fileName);
        if (!match) continue;
        sessions.push({ sessionId: match[2], timestamp: Number(match[1]), fileName });
    }
    return sessions.sort((left, right) => right.timestamp - left.timestamp || right.fileName.localeCompare(left.fileName));
}

/** Load a specific recorded run by its session id. */
export async function loadSession(targetDir: string, sessionId: string): Promise<SessionRecord | null> {
    const summary = (await listSessions(targetDir)).find((session) => session.sessionId === sessionId);
    return summary ? readSession(path.join(historyDir(targetDir), summary.fileName)) : null;
}

/** One-line overview used by the CLI and the control API. */
export function summarizeSession(record: SessionRecord): string {
    const count = (status: ExecutionResult['status']) => record.results.filter((result) => result.status === status).length;
    const when = new Date(record.timestamp * 1_000).toISOString();
    return `Session ${record.sessionId} (${when}, strategy ${record.strategy}): ${count('PASSED')} passed, ${count('FAILED')} failed, ${count('SKIPPED')} skipped.`;
}
