// ── Close Codes ────────────────────────────────────────────────────────────────

/** Close codes for the event stream socket. */
export const WsCloseCode = {
    /** Authentication token missing or invalid. */
    AuthFailed: 4001,
    /** Client did not authenticate within the required window. */
    AuthRequired: 4002,
    /** Subscription request names an unknown topic. */
    InvalidSubscription: 4003,
    /** Client stopped answering pings. */
    StaleConnection: 4004,
    ServerShutdown: 4005,
} as const;

export type WsCloseCode = (typeof WsCloseCode)[keyof typeof WsCloseCode];

// ── Event Topics ───────────────────────────────────────────────────────────────

/**
 * - `tests`: test_started, test_progress and test_finished events.
 * - `logs`: pipeline log lines.
 * - `results`: final result lists, one per run.
 */
export type WsEventTopic = 'tests' | 'logs' | 'results';

export const WS_EVENT_TOPICS: readonly WsEventTopic[] = ['tests', 'logs', 'results'];

// ── Event Envelope ─────────────────────────────────────────────────────────────

/** Wrapper around every pipeline event pushed to subscribers. */
export interface WsEventEnvelope<T = unknown> {
    type: 'event';
    v: 1;
    topic: WsEventTopic;
    /** Monotonically increasing per hub instance. */
    seq: number;
    ts: string;
    payload: T;
}

// ── Hub Diagnostics ────────────────────────────────────────────────────────────

export interface WsHubMetrics {
    activeClients: number;
    totalConnections: number;
    authFailures: number;
    droppedEvents: number;
    staleCleaned: number;
    lastEventAt: string | null;
}
