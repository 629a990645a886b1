import { describeEvent } from '../core/events.js';
import type { PipelineEvent } from '../types/events.js';
import type { TestKind, TestStatus } from '../types/pipeline.js';

export const MAX_LOG_LINES = 200;

export type RowStatus = 'RUNNING' | TestStatus;

export interface DashboardRow {
    label: string;
    kind: TestKind;
    status: RowStatus;
    detail: string;
}

export interface DashboardState {
    rows: DashboardRow[];
    logs: string[];
    runs: number;
    lastRunFailed: number | null;
    /** Set by a `result` event; the next `test_started` clears the table. */
    settled: boolean;
}

export function createDashboardState(): DashboardState {
    return { rows: [], logs: [], runs: 0, lastRunFailed: null, settled: false };
}

const STATUS_COLOR: Readonly<Record<RowStatus, string>> = {
    RUNNING: 'yellow',
    PASSED: 'green',
    FAILED: 'red',
    SKIPPED: 'gray',
};

/**
 * Patch the earliest running row that matches. Tests may share a label, so
 * each start gets its own row and each finish settles one of them.
 */
function updateRow(
    rows: DashboardRow[],
    matches: (row: DashboardRow) => boolean,
    patch: Partial<DashboardRow>,
): DashboardRow[] {
    const index = rows.findIndex((row) => row.status === 'RUNNING' && matches(row));
    if (index === -1) return rows;
    return rows.map((row, i) => (i === index ? { ...row, ...patch } : row));
}

/** Fold one event into the dashboard state. */
export function applyEvent(state: DashboardState, event: PipelineEvent): DashboardState {
    const logs = [...state.logs, describeEvent(event)].slice(-MAX_LOG_LINES);

    switch (event.type) {
        case 'test_started': {
            const fresh: DashboardRow = { label: event.label, kind: event.kind, status: 'RUNNING', detail: '' };
            const rows = state.settled ? [] : state.rows;
            return { ...state, logs, rows: [...rows, fresh], settled: false };
        }
        case 'test_progress':
            return { ...state, logs, rows: updateRow(state.rows, (row) => row.label === event.label, { detail: event.statusText }) };
        case 'test_finished':
            return {
                ...state,
                logs,
                rows: updateRow(
                    state.rows,
                    (row) => row.label === event.label && row.kind === event.kind,
                    { status: event.status, detail: event.error ?? '' },
                ),
            };
        case 'result':
            return {
                ...state,
                logs,
                runs: state.runs + 1,
                settled: true,
                lastRunFailed: event.results.filter((result) => result.status === 'FAILED').length,
            };
        case 'log':
            return { ...state, logs };
    }
}

/** Share of finished tests that passed, as a whole percentage. */
export function passRate(state: DashboardState): number {
    const finished = state.rows.filter((row) => row.status !== 'RUNNING' && row.status !== 'SKIPPED');
    if (finished.length === 0) return 0;
    const passed = finished.filter((row) => row.status === 'PASSED').length;
    return Math.round((passed / finished.length) * 100);
}

export function formatRow(row: DashboardRow): string {
    const color = STATUS_COLOR[row.status];
    const detail = row.detail ? ` - ${row.detail}` : '';
    return `{${color}-fg}${row.status.padEnd(7)}{/${color}-fg} ${row.label} (${row.kind})${detail}`;
}

export function statusMarkdown(state: DashboardState, targetDir: string): string {
    const lastRun = state.lastRunFailed === null
        ? 'none yet'
        : state.lastRunFailed === 0 ? 'all green' : `${state.lastRunFailed} failed`;
    return [
        `**Target:** ${targetDir}`,
        `**Runs:** ${state.runs}    **Last run:** ${lastRun}`,
        '',
        'Press **Escape**, **q**, or **C-c** to quit.',
    ].join('\n');
}
