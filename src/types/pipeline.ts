/** Kind of a planned unit of verification. */
export type TestKind = 'command' | 'visual' | 'setup';

/** Substrate a command runs on. */
export type ExecutionEnvKind = 'local' | 'docker' | 'k8s';

/** Terminal status of a single test. */
export type TestStatus = 'PASSED' | 'FAILED' | 'SKIPPED';

/** A planned unit of verification, immutable once produced by the planner. */
export interface TestDescriptor {
    readonly kind: TestKind;
    readonly label: string;
    /** Shell command for `command`/`setup`, URL path (or absolute URL) for `visual`. */
    readonly commandOrPath: string;
    /** Viewport in `WIDTHxHEIGHT` form, e.g. `1280x720`. */
    readonly viewport?: string;
    /** Forces a specific environment regardless of the pipeline default. */
    readonly executionEnv?: ExecutionEnvKind;
}

/** Durable record of one executed test. */
export interface ExecutionResult {
    kind: TestKind;
    label: string;
    status: TestStatus;
    error?: string;
    artifact?: string;
    baseline?: string;
    strategy: string;
}

/** Outcome of `ExecutionEnvironment.runCommand`. */
export interface CommandOutcome {
    success: boolean;
    output: string;
    artifact?: string;
}

// ── Collaborators ───────────────────────────────────────────────────────────

/** Signal sent instead of a diff when an on-demand run has nothing to compare. */
export const FULL_RUN_SIGNAL = 'FULL_RUN';

export interface PlannerInput {
    /** Diff text, or {@link FULL_RUN_SIGNAL}. */
    diff: string;
    context: string;
    strategy: string;
    customInstruction?: string;
    targetDir: string;
}

export interface PlanResult {
    recommendedTests: TestDescriptor[];
}

/** Turns a change artifact into a recommended test list. */
export interface TestPlanner {
    analyze(input: PlannerInput): Promise<PlanResult>;
}

/** Consumes final results once Execution completes; returns report locations. */
export interface Reporter {
    report(results: ExecutionResult[], targetDir: string): Promise<string[]>;
}

// ── Session history ─────────────────────────────────────────────────────────

export interface SessionRecord {
    sessionId: string;
    /** Unix epoch seconds. */
    timestamp: number;
    strategy: string;
    results: ExecutionResult[];
}

// ── Pipeline run surface ────────────────────────────────────────────────────

/**
 * Where a run was requested from.
 * - `cli`: one-shot operator invocation; an empty diff becomes a full run.
 * - `watch`: triggered by the file watcher.
 * - `rpc`: triggered through the control API.
 */
export type InvocationContext = 'cli' | 'watch' | 'rpc';

export type PipelinePhase = 'PREPARATION' | 'ANALYSIS' | 'QUALITY GUARD' | 'EXECUTION' | 'CLEANUP';

export type PipelineOutcome = 'completed' | 'no_changes' | 'aborted' | 'cancelled';

export interface PipelineRunResult {
    outcome: PipelineOutcome;
    results: ExecutionResult[];
    /** Path of the persisted session file, when one was written. */
    sessionPath?: string;
    reportPaths: string[];
    error?: string;
}
