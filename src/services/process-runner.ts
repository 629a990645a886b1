import { exec, execFile, spawn, type ChildProcess } from 'node:child_process';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import type { ResourceHandle } from '../types/lifecycle.js';
import { logSystemCommand, logThought, scrubSensitiveText } from '../utils/logger.js';

const execAsync = promisify(exec);
const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 10 * 60_000;
const MAX_BUFFER_BYTES = 10 * 1024 * 1024;
const STOP_GRACE_MS = 5_000;

export interface ProcessResult {
    ok: boolean;
    exitCode: number;
    output: string;
    durationMs: number;
    /** True when the executable itself could not be found. */
    notFound?: boolean;
}

export interface RunOptions {
    cwd?: string;
    timeoutMs?: number;
}

/** Runs a full shell command line. */
export type ShellRunner = (command: string, options?: RunOptions) => Promise<ProcessResult>;

/** Runs an executable with an explicit argument vector (no shell). */
export type ProgramRunner = (
    executable: string,
    args: string[],
    options?: RunOptions,
) => Promise<ProcessResult>;

function isExecError(
    error: unknown,
): error is Error & { code?: number | string | null; stdout?: string; stderr?: string } {
    return error instanceof Error;
}

function mergeOutput(...parts: Array<string | undefined>): string {
    return parts
        .map((part) => (part ?? '').trim())
        .filter((part) => part.length > 0)
        .join('\n');
}

function toFailure(error: unknown, startedAt: number): ProcessResult {
    if (!isExecError(error)) {
        return { ok: false, exitCode: 1, output: String(error), durationMs: Date.now() - startedAt };
    }
    const notFound = error.code === 'ENOENT';
    return {
        ok: false,
        exitCode: typeof error.code === 'number' ? error.code : notFound ? 127 : 1,
        output: scrubSensitiveText(mergeOutput(error.stdout, error.stderr, error.stdout || error.stderr ? '' : error.message)),
        durationMs: Date.now() - startedAt,
        notFound,
    };
}

export const runShellCommand: ShellRunner = async (command, options = {}) => {
    const startedAt = Date.now();
    let result: ProcessResult;
    try {
        const { stdout, stderr } = await execAsync(command, {
            cwd: options.cwd,
            timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            windowsHide: true,
            maxBuffer: MAX_BUFFER_BYTES,
        });
        result = {
            ok: true,
            exitCode: 0,
            output: scrubSensitiveText(mergeOutput(stdout, stderr)),
            durationMs: Date.now() - startedAt,
        };
    } catch (error: unknown) {
        result = toFailure(error, startedAt);
    }
    await logSystemCommand(command, result.output, result.exitCode);
    return result;
};

export const runProgram: ProgramRunner = async (executable, args, options = {}) => {
    const startedAt = Date.now();
    const preview = [executable, ...args].join(' ');
    let result: ProcessResult;
    try {
        const { stdout, stderr } = await execFileAsync(executable, args, {
            cwd: options.cwd,
            timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            windowsHide: true,
            maxBuffer: MAX_BUFFER_BYTES,
        });
        result = {
            ok: true,
            exitCode: 0,
            output: scrubSensitiveText(mergeOutput(stdout, stderr)),
            durationMs: Date.now() - startedAt,
        };
    } catch (error: unknown) {
        result = toFailure(error, startedAt);
    }
    await logSystemCommand(preview, result.output, result.exitCode);
    return result;
};

/** Resolve an executable name against PATH. Returns `null` when absent. */
export async function findExecutable(
    name: string,
    envPath: string = process.env.PATH ?? '',
): Promise<string | null> {
    if (!name) return null;
    if (name.includes('/') || name.includes('\\')) {
        return (await isExecutable(name)) ? name : null;
    }

    const extensions = process.platform === 'win32'
        ? (process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').map((ext) => ext.toLowerCase())
        : [''];

    for (const dir of envPath.split(path.delimiter).filter(Boolean)) {
        for (const ext of extensions) {
            const candidate = path.join(dir, `${name}${ext}`);
            if (await isExecutable(candidate)) {
                return candidate;
            }
        }
    }
    return null;
}

async function isExecutable(candidate: string): Promise<boolean> {
    try {
        await access(candidate, process.platform === 'win32' ? constants.F_OK : constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/** Lookup used by components that check tool presence; injectable for tests. */
export type ExecutableLocator = (name: string) => Promise<string | null>;

/**
 * A detached child process started for the lifetime of a pipeline run
 * (dev server, port-forward, compose project in the foreground).
 */
export class ProcessHandle implements ResourceHandle {
    readonly description: string;
    readonly #child: ChildProcess;
    #exited = false;
    #exitCode: number | null = null;
    #stopping: Promise<void> | null = null;

    constructor(child: ChildProcess, description: string) {
        this.#child = child;
        this.description = description;
        child.once('exit', (code) => {
            this.#exited = true;
            this.#exitCode = code;
        });
        child.once('error', (error) => {
            this.#exited = true;
            void logThought(`[Process] ${description} failed: ${error.message}`);
        });
    }

    get pid(): number | undefined {
        return this.#child.pid;
    }

    get exitCode(): number | null {
        return this.#exitCode;
    }

    isRunning(): boolean {
        return !this.#exited;
    }

    stop(): Promise<void> {
        if (!this.#stopping) {
            this.#stopping = this.#terminate();
        }
        return this.#stopping;
    }

    async #terminate(): Promise<void> {
        if (this.#exited) return;

        const exited = new Promise<void>((resolve) => {
            const forceTimer = setTimeout(() => {
                this.#signal('SIGKILL');
                resolve();
            }, STOP_GRACE_MS);
            this.#child.once('exit', () => {
                clearTimeout(forceTimer);
                resolve();
            });
        });

        this.#signal('SIGTERM');
        await exited;
        await logThought(`[Process] Stopped ${this.description}.`);
    }

    #signal(signal: NodeJS.Signals): void {
        const pid = this.#child.pid;
        try {
            if (pid !== undefined && process.platform !== 'win32') {
                // Negative pid targets the whole process group started with `detached`.
                process.kill(-pid, signal);
            } else {
                this.#child.kill(signal);
            }
        } catch (error) {
            const code = error instanceof Error && 'code' in error ? error.code : undefined;
            if (code !== 'ESRCH') {
                void logThought(`[Process] Failed to send ${signal} to ${this.description}: ${String(error)}`);
            }
        }
    }
}

/** Start a shell command in its own process group and return its handle. */
export function spawnBackground(command: string, cwd?: string): ProcessHandle {
    const child = spawn(command, {
        cwd,
        shell: true,
        detached: process.platform !== 'win32',
        stdio: 'ignore',
        windowsHide: true,
    });
    void logThought(`[Process] Started background command '${scrubSensitiveText(command)}' (pid ${child.pid ?? 'unknown'}).`);
    return new ProcessHandle(child, `process:${command}`);
}

/** Start an executable with arguments in its own process group. */
export function spawnProgram(executable: string, args: string[], cwd?: string): ProcessHandle {
    const child = spawn(executable, args, {
        cwd,
        detached: process.platform !== 'win32',
        stdio: 'ignore',
        windowsHide: true,
    });
    const preview = [executable, ...args].join(' ');
    void logThought(`[Process] Started '${preview}' (pid ${child.pid ?? 'unknown'}).`);
    return new ProcessHandle(child, `process:${preview}`);
}
