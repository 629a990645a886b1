import type { ExecutionResult, TestKind, TestStatus } from './pipeline.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

interface EventBase {
    /** ISO-8601 timestamp of when the event was produced. */
    readonly timestamp: string;
}

export interface TestStartedEvent extends EventBase {
    readonly type: 'test_started';
    readonly label: string;
    readonly kind: TestKind;
    readonly strategy: string;
}

export interface TestProgressEvent extends EventBase {
    readonly type: 'test_progress';
    readonly label: string;
    readonly statusText: string;
}

export interface TestFinishedEvent extends EventBase {
    readonly type: 'test_finished';
    readonly label: string;
    readonly kind: TestKind;
    readonly status: TestStatus;
    readonly error?: string;
    readonly artifact?: string;
    readonly baseline?: string;
}

export interface PipelineLogEvent extends EventBase {
    readonly type: 'log';
    readonly message: string;
    readonly level: LogLevel;
}

export interface PipelineResultEvent extends EventBase {
    readonly type: 'result';
    readonly results: readonly ExecutionResult[];
}

/** Closed set of events a pipeline run produces. */
export type PipelineEvent =
    | TestStartedEvent
    | TestProgressEvent
    | TestFinishedEvent
    | PipelineLogEvent
    | PipelineResultEvent;

export type PipelineEventType = PipelineEvent['type'];

/** Consumer of pipeline events. */
export interface EventSink {
    emit(event: PipelineEvent): Promise<void> | void;
}
