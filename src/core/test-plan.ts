import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parseTestDefinitions, type TestDefinition } from '../config/config-schema.js';
import { runProgram, type ProgramRunner } from '../services/process-runner.js';
import {
    FULL_RUN_SIGNAL,
    type PlannerInput,
    type PlanResult,
    type TestDescriptor,
    type TestPlanner,
} from '../types/pipeline.js';
import { logThought } from '../utils/logger.js';
import { ConfigError } from './errors.js';

export const TEST_DEFINITIONS_FILE = 'aether.tests.json';

/** Split a comma-separated strategy label; blanks and repeats are dropped. */
export function parseStrategies(strategy: string): string[] {
    const labels = strategy
        .split(',')
        .map((label) => label.trim())
        .filter((label) => label.length > 0);
    const unique = [...new Set(labels)];
    return unique.length > 0 ? unique : ['auto'];
}

function descriptorKey(test: TestDescriptor): string {
    return JSON.stringify([test.kind, test.label, test.commandOrPath]);
}

/** Merge test lists by `(kind, label, commandOrPath)`, keeping first-seen order. */
export function dedupeTests(lists: ReadonlyArray<readonly TestDescriptor[]>): TestDescriptor[] {
    const seen = new Set<string>();
    const merged: TestDescriptor[] = [];
    for (const list of lists) {
        for (const test of list) {
            const key = descriptorKey(test);
            if (seen.has(key)) continue;
            seen.add(key);
            merged.push(test);
        }
    }
    return merged;
}

export interface ChangeArtifactOptions {
    env?: NodeJS.ProcessEnv;
    runProgram?: ProgramRunner;
}

/**
 * Diff text describing the pending change. Injected diffs
 * (`AETHER_DIFF_B64`, then `AETHER_DIFF`) win over `git diff HEAD`, which
 * wins over `git diff` for repositories without a first commit.
 * Returns an empty string when nothing changed.
 */
export async function readChangeArtifact(targetDir: string, options: ChangeArtifactOptions = {}): Promise<string> {
    const env = options.env ?? process.env;
    const run = options.runProgram ?? runProgram;

    const encoded = env.AETHER_DIFF_B64?.trim();
    if (encoded) {
        return Buffer.from(encoded, 'base64').toString('utf8');
    }
    const injected = env.AETHER_DIFF;
    if (injected && injected.trim()) {
        return injected;
    }

    for (const args of [['diff', 'HEAD'], ['diff']]) {
        const result = await run('git', args, { cwd: targetDir, timeoutMs: 30_000 });
        if (result.notFound) {
            void logThought('[Analysis] git not found on PATH; treating the change set as empty.');
            return '';
        }
        if (result.ok && result.output.trim()) {
            return result.output;
        }
    }
    return '';
}

/** Paths touched by a unified diff, taken from its `diff --git` headers. */
export function changedFiles(diff: string): string[] {
    const files = new Set<string>();
    for (const match of diff.matchAll(/^diff --git a\/(\S+) b\/(\S+)$/gm)) {
        files.add(match[2]);
    }
    return [...files];
}

export interface AnalysisRequest {
    planner: TestPlanner;
    targetDir: string;
    /** Diff text or {@link FULL_RUN_SIGNAL}. */
    diff: string;
    context: string;
    strategy: string;
    customInstruction?: string;
    fallbackTest: TestDescriptor;
}

export interface AnalysisOutcome {
    tests: TestDescriptor[];
    strategies: string[];
    usedFallback: boolean;
}

/**
 * Ask the planner once per strategy label and merge the answers. An empty
 * merge is replaced by the fallback audit test.
 */
export async function analyzeChanges(request: AnalysisRequest): Promise<AnalysisOutcome> {
    const strategies = parseStrategies(request.strategy);
    const lists: TestDescriptor[][] = [];
    for (const strategy of strategies) {
        const input: PlannerInput = {
            diff: request.diff,
            context: request.context,
            strategy,
            customInstruction: request.customInstruction,
            targetDir: request.targetDir,
        };
        const plan = await request.planner.analyze(input);
        lists.push(plan.recommendedTests);
    }

    const tests = dedupeTests(lists);
    if (tests.length === 0) {
        return { tests: [request.fallbackTest], strategies, usedFallback: true };
    }
    return { tests, strategies, usedFallback: false };
}

function selects(definition: TestDefinition, input: PlannerInput, files: readonly string[] | null): boolean {
    if (definition.strategies && input.strategy !== 'auto' && !definition.strategies.includes(input.strategy)) {
        return false;
    }
    if (!definition.paths || files === null) return true;
    const prefixes = definition.paths;
    return files.some((file) => prefixes.some((prefix) => file.startsWith(prefix)));
}

/**
 * Planner backed by a checked-in list of tests (`aether.tests.json`).
 * Entries may narrow themselves to strategy labels and to path prefixes
 * the diff must touch; a full run ignores the path filter.
 */
export class DefinitionFilePlanner implements TestPlanner {
    readonly #fileName: string;

    constructor(fileName: string = TEST_DEFINITIONS_FILE) {
        this.#fileName = fileName;
    }

    async analyze(input: PlannerInput): Promise<PlanResult> {
        const filePath = path.join(input.targetDir, this.#fileName);
        let text: string;
        try {
            text = await readFile(filePath, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                void logThought(`[Analysis] ${filePath} not found; planner has no tests to recommend.`);
                return { recommendedTests: [] };
            }
            throw error;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ConfigError(`Invalid JSON in ${filePath}: ${message}`);
        }

        const { definitions, errors } = parseTestDefinitions(raw);
        if (errors.length > 0) {
            throw new ConfigError(`Invalid test definitions in ${filePath}.`, errors);
        }

        const files = input.diff === FULL_RUN_SIGNAL ? null : changedFiles(input.diff);
        return {
            recommendedTests: definitions
                .filter((definition) => selects(definition, input, files))
                .map((definition) => definition.test),
        };
    }
}
