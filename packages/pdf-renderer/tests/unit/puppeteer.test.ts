import { describe, test, expect } from "vitest";
import { CapabilityUnavailableError } from "../../src/errors";
import { resolveBrowserExecutable } from "../../src/puppeteer";

const installed = (...paths: string[]) => (path: string) => paths.includes(path);

describe("resolveBrowserExecutable", () => {
    test("prefers an explicit path", () => {
        expect(
            resolveBrowserExecutable({
                explicitPath: "/opt/chrome/chrome",
                env: { CHROME_PATH: "/usr/bin/chromium" },
                exists: installed("/opt/chrome/chrome", "/usr/bin/chromium"),
            })
        ).toBe("/opt/chrome/chrome");
    });

    test("fails when the explicit path does not exist", () => {
        expect(() => resolveBrowserExecutable({ explicitPath: "/nope", exists: installed() })).toThrow(
            new CapabilityUnavailableError("browser executable not found at /nope")
        );
    });

    test("reads the environment before well-known locations", () => {
        expect(
            resolveBrowserExecutable({
                env: { PUPPETEER_EXECUTABLE_PATH: "/custom/chrome" },
                platform: "linux",
                exists: installed("/custom/chrome", "/usr/bin/google-chrome"),
            })
        ).toBe("/custom/chrome");
    });

    test("skips environment entries that point nowhere", () => {
        expect(
            resolveBrowserExecutable({
                env: { CHROME_PATH: "/missing" },
                platform: "linux",
                exists: installed("/usr/bin/chromium-browser"),
            })
        ).toBe("/usr/bin/chromium-browser");
    });

    test("names the missing dependency when nothing is installed", () => {
        const run = () => resolveBrowserExecutable({ env: {}, platform: "linux", exists: installed() });
        expect(run).toThrow(CapabilityUnavailableError);
        expect(run).toThrow(/no Chrome or Chromium installation found/);
    });

    test("has no candidates on unknown platforms", () => {
        expect(() => resolveBrowserExecutable({ env: {}, platform: "aix", exists: () => true })).toThrow(
            CapabilityUnavailableError
        );
    });
});
