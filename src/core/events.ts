import { once } from 'node:events';
import type { Writable } from 'node:stream';
import type {
    EventSink,
    LogLevel,
    PipelineEvent,
    PipelineLogEvent,
    PipelineResultEvent,
    TestFinishedEvent,
    TestProgressEvent,
    TestStartedEvent,
} from '../types/events.js';
import type { ExecutionResult, TestKind } from '../types/pipeline.js';
import { logThought } from '../utils/logger.js';

// ── Event constructors ──────────────────────────────────────────────────────

function now(): string {
    return new Date().toISOString();
}

export function testStarted(label: string, kind: TestKind, strategy: string): TestStartedEvent {
    return { type: 'test_started', timestamp: now(), label, kind, strategy };
}

export function testProgress(label: string, statusText: string): TestProgressEvent {
    return { type: 'test_progress', timestamp: now(), label, statusText };
}

export function testFinished(result: ExecutionResult): TestFinishedEvent {
    return {
        type: 'test_finished',
        timestamp: now(),
        label: result.label,
        kind: result.kind,
        status: result.status,
        error: result.error,
        artifact: result.artifact,
        baseline: result.baseline,
    };
}

export function pipelineLog(message: string, level: LogLevel = 'INFO'): PipelineLogEvent {
    return { type: 'log', timestamp: now(), message, level };
}

export function pipelineResult(results: readonly ExecutionResult[]): PipelineResultEvent {
    return { type: 'result', timestamp: now(), results: [...results] };
}

/** One-line human rendering of any event. */
export function describeEvent(event: PipelineEvent): string {
    switch (event.type) {
        case 'test_started':
            return `STARTED ${event.label} (${event.kind}, ${event.strategy})`;
        case 'test_progress':
            return `${event.label}: ${event.statusText}`;
        case 'test_finished':
            return event.error
                ? `${event.status} ${event.label}: ${event.error}`
                : `${event.status} ${event.label}`;
        case 'log':
            return `[${event.level}] ${event.message}`;
        case 'result': {
            const failed = event.results.filter((result) => result.status === 'FAILED').length;
            return `Run finished: ${event.results.length} test(s), ${failed} failed.`;
        }
        default:
            return assertNever(event);
    }
}

function assertNever(value: never): never {
    throw new Error(`Unhandled pipeline event: ${JSON.stringify(value)}`);
}

// ── Emitter ─────────────────────────────────────────────────────────────────

interface SinkLane {
    sink: EventSink;
    tail: Promise<void>;
}

/**
 * Fans pipeline events out to every registered sink.
 *
 * `emit` returns immediately. Each sink has its own delivery lane, so a
 * slow sink only delays itself; within a lane events keep emit order.
 */
export class PipelineEventEmitter {
    readonly #lanes: SinkLane[] = [];

    constructor(sinks: EventSink[] = []) {
        for (const sink of sinks) {
            this.addSink(sink);
        }
    }

    get sinkCount(): number {
        return this.#lanes.length;
    }

    /** Register a sink. Returns a function that removes it again. */
    addSink(sink: EventSink): () => void {
        const lane: SinkLane = { sink, tail: Promise.resolve() };
        this.#lanes.push(lane);
        return () => {
            const index = this.#lanes.indexOf(lane);
            if (index >= 0) this.#lanes.splice(index, 1);
        };
    }

    emit(event: PipelineEvent): void {
        for (const lane of this.#lanes) {
            lane.tail = lane.tail.then(() => deliver(lane.sink, event));
        }
    }

    /** Convenience for `emit(pipelineLog(...))`. */
    log(message: string, level: LogLevel = 'INFO'): void {
        this.emit(pipelineLog(message, level));
    }

    /** Resolves once every event emitted so far has been delivered. */
    async flush(): Promise<void> {
        await Promise.all(this.#lanes.map((lane) => lane.tail));
    }
}

async function deliver(sink: EventSink, event: PipelineEvent): Promise<void> {
    try {
        await sink.emit(event);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        await logThought(`[Events] Sink failed on '${event.type}' event: ${message}`);
    }
}

// ── Sinks ───────────────────────────────────────────────────────────────────

/** Writes one JSON object per line; the headless machine-readable stream. */
export class JsonLinesSink implements EventSink {
    readonly #stream: Writable;

    constructor(stream: Writable = process.stdout) {
        this.#stream = stream;
    }

    async emit(event: PipelineEvent): Promise<void> {
        const flushed = this.#stream.write(`${JSON.stringify(event)}\n`);
        if (!flushed) {
            await once(this.#stream, 'drain');
        }
    }
}

/** Adapts a plain function (e.g. a dashboard update) into a sink. */
export class CallbackSink implements EventSink {
    readonly #callback: (event: PipelineEvent) => Promise<void> | void;

    constructor(callback: (event: PipelineEvent) => Promise<void> | void) {
        this.#callback = callback;
    }

    emit(event: PipelineEvent): Promise<void> | void {
        return this.#callback(event);
    }
}
