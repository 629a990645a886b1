import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import path from 'node:path';
import express, { type Express, type Request, type RequestHandler, type Response } from 'express';
import { isRecord } from '../config/config-schema.js';
import { EXECUTION_ENVS, type ConfigOverrides } from '../config/pipeline-config.js';
import { PipelineEventEmitter } from '../core/events.js';
import type { PipelineRunner, WatchOrchestrator } from '../core/watch-orchestrator.js';
import { listSessions, loadLatestSession, loadSession, summarizeSession } from '../services/session-store.js';
import type { HealthData, RunRequestBody, WatchRequestBody } from '../types/api.js';
import { logThought } from '../utils/logger.js';
import { createSignatureGuard, mapError, requestLogger, sendError, sendOk, setRawRequestBody } from './shared.js';
import type { EventHub } from './websocket-hub.js';

export const DEFAULT_PORT = 4780;

export interface ControlApiDeps {
    pipeline: PipelineRunner;
    watches: Pick<WatchOrchestrator, 'startWatch' | 'stopWatch' | 'activeWatchers'>;
    /** HMAC secret for signed routes; without it they answer 503. */
    secret?: string;
    hub?: EventHub;
    now?: () => number;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function readTargetDir(body: Record<string, unknown>): string | null {
    const { targetDir } = body;
    return typeof targetDir === 'string' && targetDir.trim() ? targetDir.trim() : null;
}

export function parseRunRequest(body: unknown): Parsed<RunRequestBody> {
    if (!isRecord(body)) return { ok: false, error: 'Request body must be a JSON object.' };
    const targetDir = readTargetDir(body);
    if (!targetDir) return { ok: false, error: 'targetDir is required.' };

    const { strategy, executionEnv, context } = body;
    if (strategy !== undefined && typeof strategy !== 'string') {
        return { ok: false, error: 'strategy must be a string.' };
    }
    if (context !== undefined && typeof context !== 'string') {
        return { ok: false, error: 'context must be a string.' };
    }
    const env = EXECUTION_ENVS.find((kind) => kind === executionEnv);
    if (executionEnv !== undefined && !env) {
        return { ok: false, error: `executionEnv must be one of: ${EXECUTION_ENVS.join(', ')}.` };
    }
    return { ok: true, value: { targetDir, strategy, executionEnv: env, context } };
}

export function parseWatchRequest(body: unknown): Parsed<WatchRequestBody> {
    if (!isRecord(body)) return { ok: false, error: 'Request body must be a JSON object.' };
    const targetDir = readTargetDir(body);
    if (!targetDir) return { ok: false, error: 'targetDir is required.' };
    const { initialRun } = body;
    if (initialRun !== undefined && typeof initialRun !== 'boolean') {
        return { ok: false, error: 'initialRun must be a boolean.' };
    }
    return { ok: true, value: { targetDir, initialRun } };
}

function queryTargetDir(req: Request): string | null {
    const value = req.query.targetDir;
    return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req, res) => {
        void handler(req, res).catch((error: unknown) => {
            const mapped = mapError(error);
            void logThought(`[API] ${req.method} ${req.path} failed: ${mapped.message}`);
            sendError(res, mapped.message, mapped.status);
        });
    };
}

/**
 * Build the control API.
 *
 * Endpoints:
 *   GET  /health                 Registry and event stream snapshot
 *   POST /pipeline/run           Run the pipeline once (signed)
 *   POST /watch/start            Start watching a directory (signed)
 *   POST /watch/stop             Stop a directory's watcher and resources (signed)
 *   GET  /history?targetDir=     Recorded sessions, newest first (signed)
 *   GET  /history/:id?targetDir= One recorded session (signed)
 */
export function createControlApp(deps: ControlApiDeps): Express {
    const app = express();
    const now = deps.now ?? Date.now;
    const startedAt = now();
    const signed = createSignatureGuard(deps.secret);
    // Watch-triggered runs outlive the request that started them.
    const watchEmitter = new PipelineEventEmitter(deps.hub ? [deps.hub] : []);

    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    app.get('/health', route(async (_req, res) => {
        const health: HealthData = {
            status: 'ok',
            uptimeSec: Math.floor((now() - startedAt) / 1_000),
            activeDirectories: await deps.pipeline.registry.listActive(),
            watchers: await deps.watches.activeWatchers(),
            eventStream: deps.hub?.getMetrics() ?? null,
        };
        sendOk(res, health);
    }));

    app.post('/pipeline/run', signed, route(async (req, res) => {
        const parsed = parseRunRequest(req.body);
        if (!parsed.ok) {
            sendError(res, parsed.error, 400);
            return;
        }
        const { targetDir, strategy, executionEnv, context } = parsed.value;
        const overrides: ConfigOverrides = {};
        if (strategy) overrides.strategy = strategy;
        if (executionEnv) overrides.executionEnv = executionEnv;

        const emitter = new PipelineEventEmitter(deps.hub ? [deps.hub] : []);
        const result = await deps.pipeline.runPipeline(targetDir, { invocation: 'rpc', overrides, emitter, context });
        sendOk(res, result);
    }));

    app.post('/watch/start', signed, route(async (req, res) => {
        const parsed = parseWatchRequest(req.body);
        if (!parsed.ok) {
            sendError(res, parsed.error, 400);
            return;
        }
        const session = await deps.watches.startWatch(parsed.value.targetDir, {
            initialRun: parsed.value.initialRun,
            emitter: watchEmitter,
        });
        sendOk(res, {
            targetDir: session.watcher.targetDir,
            started: session.started,
            initialRun: session.initialRun ?? null,
        });
    }));

    app.post('/watch/stop', signed, route(async (req, res) => {
        const parsed = parseWatchRequest(req.body);
        if (!parsed.ok) {
            sendError(res, parsed.error, 400);
            return;
        }
        const stopped = await deps.watches.stopWatch(parsed.value.targetDir);
        sendOk(res, { targetDir: path.resolve(parsed.value.targetDir), stopped });
    }));

    app.get('/history', signed, route(async (req, res) => {
        const targetDir = queryTargetDir(req);
        if (!targetDir) {
            sendError(res, 'targetDir query parameter is required.', 400);
            return;
        }
        const latest = await loadLatestSession(targetDir);
        sendOk(res, {
            sessions: await listSessions(targetDir),
            latest: latest ? summarizeSession(latest) : null,
        });
    }));

    app.get('/history/:sessionId', signed, route(async (req, res) => {
        const targetDir = queryTargetDir(req);
        if (!targetDir) {
            sendError(res, 'targetDir query parameter is required.', 400);
            return;
        }
        const record = await loadSession(targetDir, req.params.sessionId);
        if (!record) {
            sendError(res, `Session '${req.params.sessionId}' not found.`, 404);
            return;
        }
        sendOk(res, record);
    }));

    return app;
}

export interface ControlServer {
    server: Server;
    port: number;
    close(): Promise<void>;
}

/** Start the control API, with the event stream on `/ws` when a hub is given. */
export function startControlServer(
    deps: ControlApiDeps,
    options: { port?: number; host?: string } = {},
): Promise<ControlServer> {
    const app = createControlApp(deps);
    const server = createServer(app);
    deps.hub?.attach(server);

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(options.port ?? DEFAULT_PORT, options.host ?? '127.0.0.1', () => {
            const address: AddressInfo | string | null = server.address();
            const port = typeof address === 'object' && address ? address.port : options.port ?? DEFAULT_PORT;
            void logThought(`[API] Control API listening on port ${port}.`);
            resolve({
                server,
                port,
                close: () =>
                    new Promise<void>((done, fail) => {
                        deps.hub?.stop();
                        server.close((error) => (error ? fail(error) : done()));
                    }),
            });
        });
    });
}
