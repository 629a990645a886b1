import type { Server } from 'node:http';
import { randomUUID } from 'node:crypto';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { isRecord } from '../config/config-schema.js';
import type { EventSink, PipelineEvent } from '../types/events.js';
import { WS_EVENT_TOPICS, WsCloseCode, type WsEventEnvelope, type WsEventTopic, type WsHubMetrics } from '../types/websocket.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_AUTH_TIMEOUT_MS = 5_000;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
/** Kilobytes a client may have buffered before events to it are dropped. */
const DEFAULT_MAX_CLIENT_QUEUE = 200;

export interface WsHubConfig {
    /** Shared secret clients present in their `auth` message. Without one every client is refused. */
    secret?: string;
    authTimeoutMs?: number;
    heartbeatIntervalMs?: number;
    /** Per-client backpressure threshold in kilobytes. */
    maxClientQueue?: number;
}

// ── Client messages ────────────────────────────────────────────────────────────

type ClientMessage =
    | { type: 'auth'; token: string }
    | { type: 'subscribe'; topics: unknown[] }
    | { type: 'ping' };

type ParsedMessage = { ok: true; message: ClientMessage } | { ok: false; error: string };

function decode(data: RawData): string {
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    return Buffer.from(data).toString('utf8');
}

function parseClientMessage(text: string): ParsedMessage {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch {
        return { ok: false, error: 'Invalid JSON.' };
    }
    if (!isRecord(raw) || typeof raw.type !== 'string') {
        return { ok: false, error: 'Malformed message: missing "type" field.' };
    }
    switch (raw.type) {
        case 'auth':
            return { ok: true, message: { type: 'auth', token: typeof raw.token === 'string' ? raw.token : '' } };
        case 'subscribe':
            return { ok: true, message: { type: 'subscribe', topics: Array.isArray(raw.topics) ? raw.topics : [] } };
        case 'ping':
            return { ok: true, message: { type: 'ping' } };
        default:
            return { ok: false, error: `Unknown message type: ${raw.type}` };
    }
}

export function topicOf(event: PipelineEvent): WsEventTopic {
    switch (event.type) {
        case 'test_started':
        case 'test_progress':
        case 'test_finished':
            return 'tests';
        case 'log':
            return 'logs';
        case 'result':
            return 'results';
    }
}

function now(): string {
    return new Date().toISOString();
}

// ── Connected client ───────────────────────────────────────────────────────────

class StreamClient {
    readonly id = randomUUID();
    readonly topics = new Set<WsEventTopic>();
    authenticated = false;
    alive = true;
    #authTimer: ReturnType<typeof setTimeout> | null = null;

    constructor(
        readonly ws: WebSocket,
        readonly maxBufferedBytes: number,
    ) {}

    get open(): boolean {
        return this.ws.readyState === WebSocket.OPEN;
    }

    armAuthTimer(ms: number, onExpired: () => void): void {
        this.#authTimer = setTimeout(onExpired, ms);
    }

    clearAuthTimer(): void {
        if (this.#authTimer) {
            clearTimeout(this.#authTimer);
            this.#authTimer = null;
        }
    }

    /** @returns `false` when the frame was dropped. */
    send(frame: unknown, onFailure: () => void): boolean {
        if (!this.open) return false;
        if (this.ws.bufferedAmount > this.maxBufferedBytes) return false;
        this.ws.send(JSON.stringify(frame), (error) => {
            if (error) onFailure();
        });
        return true;
    }

    close(code: number, reason: string): void {
        this.clearAuthTimer();
        if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
            this.ws.close(code, reason);
        }
    }
}

// ── EventHub ───────────────────────────────────────────────────────────────────

/**
 * Streams pipeline events to WebSocket clients on `/ws`.
 *
 * Clients send `{ "type": "auth", "token": <secret> }` within the auth
 * window, then `{ "type": "subscribe", "topics": [...] }`. Registered on an
 * emitter, the hub is an ordinary event sink.
 */
export class EventHub implements EventSink {
    readonly #secret: string;
    readonly #authTimeoutMs: number;
    readonly #heartbeatIntervalMs: number;
    readonly #maxBufferedBytes: number;
    readonly #clients = new Map<string, StreamClient>();
    #server: WebSocketServer | null = null;
    #heartbeat: ReturnType<typeof setInterval> | null = null;
    #seq = 0;

    #totalConnections = 0;
    #authFailures = 0;
    #droppedEvents = 0;
    #staleCleaned = 0;
    #lastEventAt: string | null = null;

    constructor(config: WsHubConfig = {}) {
        this.#secret = config.secret ?? '';
        this.#authTimeoutMs = config.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS;
        this.#heartbeatIntervalMs = config.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
        this.#maxBufferedBytes = (config.maxClientQueue ?? DEFAULT_MAX_CLIENT_QUEUE) * 1024;
    }

    /** Attach to an HTTP server before it starts listening. */
    attach(server: Server): void {
        this.#server = new WebSocketServer({ server, path: '/ws' });
        this.#server.on('connection', (ws: WebSocket) => {
            this.#accept(ws);
        });
        this.#heartbeat = setInterval(() => {
            this.#sweep();
        }, this.#heartbeatIntervalMs);
        void logThought('[EventHub] Event stream attached on /ws.');
    }

    stop(): void {
        if (this.#heartbeat) {
            clearInterval(this.#heartbeat);
            this.#heartbeat = null;
        }
        for (const client of this.#clients.values()) {
            client.close(WsCloseCode.ServerShutdown, 'Server shutting down.');
        }
        this.#clients.clear();
        this.#server?.close();
        this.#server = null;
        void logThought('[EventHub] Event stream stopped.');
    }

    emit(event: PipelineEvent): void {
        this.publish(topicOf(event), event);
    }

    /** Send `payload` to every authenticated client subscribed to `topic`. */
    publish(topic: WsEventTopic, payload: unknown): void {
        const envelope: WsEventEnvelope = { type: 'event', v: 1, topic, seq: ++this.#seq, ts: now(), payload };
        this.#lastEventAt = envelope.ts;

        for (const client of this.#clients.values()) {
            if (!client.authenticated || !client.topics.has(topic) || !client.open) continue;
            this.#deliver(client, envelope);
        }
    }

    getMetrics(): WsHubMetrics {
        return {
            activeClients: this.#clients.size,
            totalConnections: this.#totalConnections,
            authFailures: this.#authFailures,
            droppedEvents: this.#droppedEvents,
            staleCleaned: this.#staleCleaned,
            lastEventAt: this.#lastEventAt,
        };
    }

    // ── Connections ────────────────────────────────────────────────────────────

    #accept(ws: WebSocket): void {
        const client = new StreamClient(ws, this.#maxBufferedBytes);
        this.#clients.set(client.id, client);
        this.#totalConnections++;

        client.armAuthTimer(this.#authTimeoutMs, () => {
            if (client.authenticated) return;
            this.#authFailures++;
            void logThought(`[EventHub] Client ${client.id} did not authenticate in time.`);
            this.#drop(client, WsCloseCode.AuthRequired, 'Authentication required.');
        });

        ws.on('pong', () => {
            client.alive = true;
        });
        ws.on('message', (data: RawData) => {
            this.#receive(client, decode(data));
        });
        ws.on('close', () => {
            this.#forget(client);
        });
        ws.on('error', (err: Error) => {
            void logThought(`[EventHub] Client ${client.id} socket error: ${err.message}`);
            this.#forget(client);
        });
    }

    #receive(client: StreamClient, text: string): void {
        const parsed = parseClientMessage(text);
        if (!parsed.ok) {
            this.#error(client, 400, parsed.error);
            return;
        }

        const { message } = parsed;
        switch (message.type) {
            case 'auth':
                this.#authenticate(client, message.token);
                return;
            case 'subscribe':
                this.#subscribe(client, message.topics);
                return;
            case 'ping':
                this.#deliver(client, { type: 'pong', ts: now() });
                return;
        }
    }

    #authenticate(client: StreamClient, token: string): void {
        if (!this.#secret || token !== this.#secret) {
            this.#authFailures++;
            void logThought(`[EventHub] Client ${client.id} authentication failed.`);
            this.#error(client, WsCloseCode.AuthFailed, 'Authentication failed.');
            this.#drop(client, WsCloseCode.AuthFailed, 'Authentication failed.');
            return;
        }
        client.clearAuthTimer();
        client.authenticated = true;
        this.#deliver(client, { type: 'auth_ok', clientId: client.id, ts: now() });
    }

    #subscribe(client: StreamClient, requested: unknown[]): void {
        if (!client.authenticated) {
            this.#error(client, WsCloseCode.AuthRequired, 'Not authenticated.');
            return;
        }

        const accepted = WS_EVENT_TOPICS.filter((topic) => requested.includes(topic));
        const rejected = requested.filter((value) => !WS_EVENT_TOPICS.some((topic) => topic === value)).map(String);
        if (rejected.length > 0) {
            this.#error(
                client,
                WsCloseCode.InvalidSubscription,
                `Invalid topics: ${rejected.join(', ')}. Valid topics: ${WS_EVENT_TOPICS.join(', ')}.`,
            );
            if (accepted.length === 0) return;
        }

        accepted.forEach((topic) => client.topics.add(topic));
        this.#deliver(client, { type: 'subscribed', topics: accepted, ts: now() });
    }

    /** Ping every client; those that missed the previous ping are evicted. */
    #sweep(): void {
        for (const client of [...this.#clients.values()]) {
            if (!client.alive) {
                this.#staleCleaned++;
                this.#drop(client, WsCloseCode.StaleConnection, 'Stale connection.');
                continue;
            }
            client.alive = false;
            try {
                client.ws.ping();
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                void logThought(`[EventHub] Ping to ${client.id} failed: ${message}`);
            }
        }
    }

    #deliver(client: StreamClient, frame: unknown): void {
        const sent = client.send(frame, () => {
            this.#droppedEvents++;
        });
        if (!sent && client.open) {
            this.#droppedEvents++;
            void logThought(`[EventHub] Client ${client.id} over its buffer limit; frame dropped.`);
        }
    }

    #error(client: StreamClient, code: number, message: string): void {
        this.#deliver(client, { type: 'error', code, message, ts: now() });
    }

    #drop(client: StreamClient, code: number, reason: string): void {
        client.close(code, reason);
        this.#clients.delete(client.id);
    }

    #forget(client: StreamClient): void {
        client.clearAuthTimer();
        this.#clients.delete(client.id);
    }
}
