import { createHash, randomUUID } from 'node:crypto';
import { copyFile, mkdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ExecutionResult, Reporter, TestStatus } from '../types/pipeline.js';
import { logThought } from '../utils/logger.js';

type AllureStatus = 'passed' | 'failed' | 'skipped';

interface AllureAttachment {
    name: string;
    source: string;
    type: string;
}

export interface AllureResult {
    uuid: string;
    historyId: string;
    fullName: string;
    name: string;
    labels: Array<{ name: string; value: string }>;
    status: AllureStatus;
    stage: 'finished';
    statusDetails?: { message: string; trace: string };
    start: number;
    stop: number;
    attachments: AllureAttachment[];
}

const STATUS_MAP: Readonly<Record<TestStatus, AllureStatus>> = {
    PASSED: 'passed',
    FAILED: 'failed',
    SKIPPED: 'skipped',
};

export interface AllureReporterOptions {
    now?: () => number;
    createId?: () => string;
}

export function allureResultsDir(targetDir: string): string {
    return path.join(targetDir, '.aether', 'allure-results');
}

/** Writes one Allure `<uuid>-result.json` per result; artifacts are copied beside them. */
export class AllureResultsReporter implements Reporter {
    readonly #now: () => number;
    readonly #createId: () => string;

    constructor(options: AllureReporterOptions = {}) {
        this.#now = options.now ?? Date.now;
        this.#createId = options.createId ?? randomUUID;
    }

    async report(results: ExecutionResult[], targetDir: string): Promise<string[]> {
        const dir = allureResultsDir(targetDir);
        await mkdir(dir, { recursive: true });

        for (const result of results) {
            const allure = await this.#toAllure(result, dir);
            await writeFile(path.join(dir, `${allure.uuid}-result.json`), `${JSON.stringify(allure, null, 2)}\n`, 'utf8');
        }
        void logThought(`[Report] Wrote ${results.length} Allure result(s) to ${dir}.`);
        return [dir];
    }

    async #toAllure(result: ExecutionResult, dir: string): Promise<AllureResult> {
        const start = this.#now();
        const allure: AllureResult = {
            uuid: this.#createId(),
            historyId: createHash('md5').update(`${result.label}${result.kind}`).digest('hex'),
            fullName: `${result.strategy}.${result.label}`,
            name: result.label,
            labels: [
                { name: 'suite', value: result.strategy },
                { name: 'testClass', value: result.kind },
                { name: 'framework', value: 'aether' },
            ],
            status: STATUS_MAP[result.status],
            stage: 'finished',
            start,
            stop: start,
            attachments: [],
        };

        if (result.status !== 'PASSED') {
            allure.statusDetails = { message: result.error ?? 'Unknown error', trace: '' };
        }

        if (result.artifact && (await isFile(result.artifact))) {
            const extension = path.extname(result.artifact).toLowerCase();
            const source = `${this.#createId()}${extension}`;
            await copyFile(result.artifact, path.join(dir, source));
            allure.attachments.push({
                name: 'Artifact',
                source,
                type: extension === '.png' ? 'image/png' : 'text/plain',
            });
        }
        return allure;
    }
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch {
        return false;
    }
}
