import type { ExecutionEnvKind } from './pipeline.js';
import type { WsHubMetrics } from './websocket.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok';
    uptimeSec: number;
    /** Directories with registered background resources. */
    activeDirectories: string[];
    watchers: string[];
    eventStream: WsHubMetrics | null;
}

// ── Pipeline control ────────────────────────────────────────────────────────

export interface RunRequestBody {
    targetDir: string;
    strategy?: string;
    executionEnv?: ExecutionEnvKind;
    context?: string;
}

export interface WatchRequestBody {
    targetDir: string;
    initialRun?: boolean;
}
