import { writeFile } from 'node:fs/promises';
import { chromium, type Browser } from 'playwright-core';

export interface Viewport {
    width: number;
    height: number;
}

export const DEFAULT_VIEWPORT: Viewport = { width: 1280, height: 720 };

/** The slice of a browser page the visual checker drives. */
export interface AutomationPage {
    goto(url: string): Promise<void>;
    screenshot(filePath: string): Promise<void>;
    close(): Promise<void>;
}

/** The slice of a connected browser an endpoint provider hands out. */
export interface AutomationBrowser {
    newPage(viewport?: Viewport): Promise<AutomationPage>;
    isConnected(): boolean;
    close(): Promise<void>;
}

export interface LaunchOptions {
    headless: boolean;
}

/** Creates browsers either locally or by attaching to a CDP endpoint. */
export interface BrowserLauncher {
    launch(options: LaunchOptions): Promise<AutomationBrowser>;
    connect(endpointUrl: string): Promise<AutomationBrowser>;
}

/** Parse `WIDTHxHEIGHT`; returns `undefined` for anything else. */
export function parseViewport(value?: string): Viewport | undefined {
    if (!value) return undefined;
    const match = /^(\d+)x(\d+)$/.exec(value.trim());
    if (!match) return undefined;
    const width = Number.parseInt(match[1], 10);
    const height = Number.parseInt(match[2], 10);
    if (width <= 0 || height <= 0) return undefined;
    return { width, height };
}

class PlaywrightBrowser implements AutomationBrowser {
    readonly #browser: Browser;

    constructor(browser: Browser) {
        this.#browser = browser;
    }

    async newPage(viewport: Viewport = DEFAULT_VIEWPORT): Promise<AutomationPage> {
        const context = await this.#browser.newContext({ viewport });
        const page = await context.newPage();
        return {
            goto: async (url) => {
                await page.goto(url, { waitUntil: 'networkidle' });
            },
            screenshot: async (filePath) => {
                await page.screenshot({ path: filePath, fullPage: true });
            },
            close: () => context.close(),
        };
    }

    isConnected(): boolean {
        return this.#browser.isConnected();
    }

    close(): Promise<void> {
        return this.#browser.close();
    }
}

/** Default launcher backed by `playwright-core` Chromium. */
export const playwrightLauncher: BrowserLauncher = {
    async launch(options) {
        return new PlaywrightBrowser(await chromium.launch({ headless: options.headless }));
    },
    async connect(endpointUrl) {
        return new PlaywrightBrowser(await chromium.connectOverCDP(endpointUrl));
    },
};

/**
 * Browser stand-in that never touches a real endpoint. Navigation and
 * captures are reported through `log`; screenshots are written as empty
 * files so downstream steps find the path they expect.
 */
export class DryRunBrowser implements AutomationBrowser {
    readonly #log: (message: string) => void;
    #connected = true;

    constructor(log: (message: string) => void) {
        this.#log = log;
    }

    async newPage(viewport: Viewport = DEFAULT_VIEWPORT): Promise<AutomationPage> {
        this.#log(`[DryRun] Opening page at ${viewport.width}x${viewport.height}.`);
        return {
            goto: async (url) => {
                this.#log(`[DryRun] Navigating to: ${url}`);
            },
            screenshot: async (filePath) => {
                this.#log(`[DryRun] Capturing screenshot to: ${filePath}`);
                await writeFile(filePath, '');
            },
            close: async () => undefined,
        };
    }

    isConnected(): boolean {
        return this.#connected;
    }

    async close(): Promise<void> {
        this.#connected = false;
        this.#log('[DryRun] Browser closed.');
    }
}
