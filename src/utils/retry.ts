import { ProvisioningError } from '../core/errors.js';
import { logThought } from './logger.js';

/** Configuration for the readiness poller. */
export interface PollOptions {
    /** Delay in ms before the second probe. @default 500 */
    initialDelayMs?: number;
    /** Multiplier applied to the delay after each failed probe. @default 1.5 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 5000 */
    maxDelayMs?: number;
    /** Hard ceiling for the whole poll in ms. @default 60000 */
    timeoutMs?: number;
    /** Label used in log and error messages. */
    label?: string;
    /**
     * Liveness check for the resource being polled. When it reports `false`
     * the poll fails immediately instead of waiting out the timeout.
     */
    isAlive?: () => Promise<boolean> | boolean;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
    /** Aborting ends the poll with the signal's reason at the next probe. */
    signal?: AbortSignal;
}

/** Outcome of a successful poll. */
export interface PollResult {
    attempts: number;
    /** Every delay slept between probes, in order. */
    delays: number[];
    totalDurationMs: number;
}

const DEFAULTS: Required<Pick<PollOptions, 'initialDelayMs' | 'backoffFactor' | 'maxDelayMs' | 'timeoutMs'>> = {
    initialDelayMs: 500,
    backoffFactor: 1.5,
    maxDelayMs: 5_000,
    timeoutMs: 60_000,
};

/**
 * Probe until it reports ready, backing off exponentially between attempts.
 *
 * - Delays grow by `backoffFactor` and are capped at `maxDelayMs`.
 * - The last wait is shortened to whatever remains of `timeoutMs`.
 * - A probe that throws counts as "not ready yet".
 *
 * Throws {@link ProvisioningError} on timeout or when `isAlive` reports the
 * resource has died, and the abort reason once `signal` is aborted.
 *
 * @example
 * ```ts
 * await pollUntilReady(() => probeHttp('http://127.0.0.1:9222/json/version'), {
 *   label: 'browser container',
 *   isAlive: () => container.isRunning(),
 * });
 * ```
 */
export async function pollUntilReady(
    probe: () => Promise<boolean>,
    options: PollOptions = {},
): Promise<PollResult> {
    const initialDelayMs = options.initialDelayMs ?? DEFAULTS.initialDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    const label = options.label ?? 'resource';
    const signal = options.signal;
    const sleepFn = options.sleep ?? ((ms: number) => sleep(ms, signal));
    const now = options.now ?? Date.now;

    const start = now();
    const delays: number[] = [];
    let nextDelay = Math.min(initialDelayMs, maxDelayMs);
    let attempts = 0;

    for (;;) {
        signal?.throwIfAborted();
        if (options.isAlive && !(await options.isAlive())) {
            void logThought(`[Poll] ${label} died after ${attempts} probe(s).`);
            throw new ProvisioningError(
                `${label} exited before becoming ready.`,
                'Inspect the resource logs; it stopped while readiness was being polled.',
            );
        }

        attempts++;
        if (await safeProbe(probe)) {
            const totalDurationMs = now() - start;
            if (attempts > 1) {
                void logThought(`[Poll] ${label} ready after ${attempts} probes (${totalDurationMs}ms).`);
            }
            return { attempts, delays, totalDurationMs };
        }

        const remaining = timeoutMs - (now() - start);
        if (remaining <= 0) {
            void logThought(`[Poll] ${label} not ready after ${attempts} probes; giving up.`);
            throw new ProvisioningError(
                `${label} did not become ready within ${timeoutMs}ms.`,
                'Raise the readiness timeout or check that the resource can start.',
            );
        }

        const delay = Math.min(nextDelay, remaining);
        delays.push(delay);
        await sleepFn(delay);
        nextDelay = Math.min(nextDelay * backoffFactor, maxDelayMs);
    }
}

async function safeProbe(probe: () => Promise<boolean>): Promise<boolean> {
    try {
        return await probe();
    } catch {
        return false;
    }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
