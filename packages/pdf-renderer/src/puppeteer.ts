import { existsSync } from "node:fs";
import puppeteer from "puppeteer-core";
import type { Browser, Page } from "puppeteer-core";
import { CapabilityUnavailableError, errorMessage } from "./errors";
import type { PdfArtifact, RendererCapability, RendererSession } from "./orchestrator";

const BROWSER_LOCATIONS: Partial<Record<NodeJS.Platform, string[]>> = {
    linux: [
        "/usr/bin/google-chrome",
        "/usr/bin/google-chrome-stable",
        "/usr/bin/chromium",
        "/usr/bin/chromium-browser",
        "/snap/bin/chromium",
    ],
    darwin: [
        "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
        "/Applications/Chromium.app/Contents/MacOS/Chromium",
    ],
    win32: [
        "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
        "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe",
    ],
};

export const BROWSER_ENV_VARS = ["PUPPETEER_EXECUTABLE_PATH", "CHROME_PATH"] as const;

export interface ResolveBrowserOptions {
    explicitPath?: string;
    env?: NodeJS.ProcessEnv;
    platform?: NodeJS.Platform;
    exists?: (path: string) => boolean;
}

/**
 * Finds a Chrome or Chromium binary: the explicit path, then the
 * environment, then the usual install locations.
 */
export function resolveBrowserExecutable(options: ResolveBrowserOptions = {}): string {
    const exists = options.exists ?? existsSync;
    const env = options.env ?? process.env;

    if (options.explicitPath) {
        if (exists(options.explicitPath)) return options.explicitPath;
        throw new CapabilityUnavailableError(`browser executable not found at ${options.explicitPath}`);
    }

    for (const name of BROWSER_ENV_VARS) {
        const fromEnv = env[name];
        if (fromEnv && exists(fromEnv)) return fromEnv;
    }

    const candidates = BROWSER_LOCATIONS[options.platform ?? process.platform] ?? [];
    const found = candidates.find((candidate) => exists(candidate));
    if (found) return found;

    throw new CapabilityUnavailableError(
        "no Chrome or Chromium installation found; install one (e.g. `sudo apt install chromium-browser`) " +
            `or point ${BROWSER_ENV_VARS.join(" / ")} or --browser at its executable`
    );
}

export interface PuppeteerCapabilityOptions {
    executablePath?: string;
    args?: string[];
}

/**
 * Headless Chrome through puppeteer-core. Nothing is downloaded: the browser
 * has to be installed already.
 */
export class PuppeteerCapability implements RendererCapability {
    public readonly name = "headless Chrome";

    constructor(private readonly options: PuppeteerCapabilityOptions = {}) {}

    public async launch(): Promise<RendererSession> {
        const executablePath = resolveBrowserExecutable({ explicitPath: this.options.executablePath });

        let browser: Browser;
        try {
            browser = await puppeteer.launch({
                executablePath,
                headless: true,
                args: this.options.args ?? ["--no-sandbox", "--disable-setuid-sandbox", "--disable-gpu"],
            });
        } catch (error) {
            throw new CapabilityUnavailableError(`could not start ${executablePath}: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        try {
            const page = await browser.newPage();
            return new PuppeteerSession(browser, page);
        } catch (error) {
            await browser.close();
            throw error;
        }
    }
}

class PuppeteerSession implements RendererSession {
    constructor(
        private readonly browser: Browser,
        private readonly page: Page
    ) {}

    public async loadHtml(html: string): Promise<void> {
        await this.page.setContent(html, { waitUntil: "load" });
        await this.page.emulateMediaType("print");
        const fontsReady = await this.page.evaluateHandle("document.fonts.ready");
        await fontsReady.dispose();
    }

    public async printToPdf(marginPixels: number): Promise<PdfArtifact> {
        const margin = `${marginPixels}px`;
        return this.page.pdf({
            format: "A4",
            printBackground: true,
            preferCSSPageSize: false,
            margin: { top: margin, right: margin, bottom: margin, left: margin },
        });
    }

    public async close(): Promise<void> {
        await this.browser.close();
    }
}
