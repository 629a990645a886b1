import { copyFile, mkdir, readFile, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import type { AutomationBrowser, Viewport } from './browser-driver.js';
import { DEFAULT_VIEWPORT } from './browser-driver.js';

export interface VisualCheckRequest {
    label: string;
    /** URL path joined onto the app base URL, or an absolute `http(s)` URL. */
    pathOrUrl: string;
    viewport?: Viewport;
}

export interface VisualCheckOutcome {
    success: boolean;
    message: string;
    artifact?: string;
    baseline?: string;
}

/**
 * Counts the differences between a baseline capture and a fresh one.
 * Implementations may write a diff image to `diffPath`; `unit` names what
 * the returned count measures.
 */
export interface ImageComparator {
    readonly unit: string;
    compare(baselinePath: string, currentPath: string, diffPath: string): Promise<number>;
}

/** Compares captures byte for byte; writes no diff image. */
export class ByteExactComparator implements ImageComparator {
    readonly unit = 'bytes';

    async compare(baselinePath: string, currentPath: string): Promise<number> {
        const [baseline, current] = await Promise.all([readFile(baselinePath), readFile(currentPath)]);
        const shared = Math.min(baseline.length, current.length);
        let mismatched = Math.abs(baseline.length - current.length);
        for (let index = 0; index < shared; index++) {
            if (baseline[index] !== current[index]) mismatched++;
        }
        return mismatched;
    }
}

export interface VisualCheckerOptions {
    targetDir: string;
    baseUrl: string;
    comparator?: ImageComparator;
}

/** File-system safe form of a test label. */
export function baselineKey(label: string): string {
    const key = label
        .trim()
        .replace(/[^A-Za-z0-9._-]+/g, '_')
        .replace(/^_+|_+$/g, '');
    return key || 'visual';
}

export function resolvePageUrl(baseUrl: string, pathOrUrl: string): string {
    if (/^https?:\/\//i.test(pathOrUrl)) return pathOrUrl;
    const base = baseUrl.replace(/\/+$/, '');
    const suffix = pathOrUrl.startsWith('/') ? pathOrUrl : `/${pathOrUrl}`;
    return `${base}${suffix}`;
}

async function exists(filePath: string): Promise<boolean> {
    try {
        await stat(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Navigates, captures and compares a page against its stored baseline.
 *
 * Baselines live under `<targetDir>/tests/baselines/<key>.png`; fresh
 * captures and diff images go to `<targetDir>/.aether/artifacts/`, numbered
 * per check so that tests sharing a label keep their own files. The first
 * capture for a key becomes its baseline and counts as a pass.
 */
export class VisualChecker {
    readonly #baselineDir: string;
    readonly #artifactDir: string;
    readonly #baseUrl: string;
    readonly #comparator: ImageComparator;
    #checks = 0;

    constructor(options: VisualCheckerOptions) {
        this.#baselineDir = path.join(options.targetDir, 'tests', 'baselines');
        this.#artifactDir = path.join(options.targetDir, '.aether', 'artifacts');
        this.#baseUrl = options.baseUrl;
        this.#comparator = options.comparator ?? new ByteExactComparator();
    }

    async check(browser: AutomationBrowser, request: VisualCheckRequest): Promise<VisualCheckOutcome> {
        const key = baselineKey(request.label);
        const capture = `${key}_${++this.#checks}`;
        const baselinePath = path.join(this.#baselineDir, `${key}.png`);
        const currentPath = path.join(this.#artifactDir, `${capture}_current.png`);
        const diffPath = path.join(this.#artifactDir, `${capture}_diff.png`);
        const url = resolvePageUrl(this.#baseUrl, request.pathOrUrl);

        await mkdir(this.#baselineDir, { recursive: true });
        await mkdir(this.#artifactDir, { recursive: true });

        const page = await browser.newPage(request.viewport ?? DEFAULT_VIEWPORT);
        try {
            try {
                await page.goto(url);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                return { success: false, message: `Navigation failed: ${message}` };
            }
            await page.screenshot(currentPath);
        } finally {
            await page.close();
        }

        if (!(await exists(baselinePath))) {
            await copyFile(currentPath, baselinePath);
            return { success: true, message: 'Baseline created', baseline: baselinePath };
        }

        await rm(diffPath, { force: true });
        let mismatch: number;
        try {
            mismatch = await this.#comparator.compare(baselinePath, currentPath, diffPath);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            return { success: false, message: `Comparison error: ${message}`, baseline: baselinePath };
        }

        if (mismatch > 0) {
            const artifact = (await exists(diffPath)) ? diffPath : currentPath;
            return {
                success: false,
                message: `Visual mismatch detected (${mismatch} ${this.#comparator.unit})`,
                artifact,
                baseline: baselinePath,
            };
        }
        return { success: true, message: 'Visual test passed', baseline: baselinePath };
    }
}
