import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { pathToFileURL } from "node:url";
import { Cli } from "clipanion";
import { createCli, isEntryPoint, siblingWithExtension } from "./index";
import type { ConvertContext } from "./index";
import { FakeCapability } from "./packages/pdf-renderer/tests/unit/test-helpers";
import type { FakeBehaviour } from "./packages/pdf-renderer/tests/unit/test-helpers";

class Capture extends Writable {
    public text = "";

    override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
        this.text += chunk.toString();
        callback();
    }
}

interface RunResult {
    code: number;
    stdout: string;
    stderr: string;
    capability: FakeCapability;
    browserPaths: Array<string | undefined>;
}

async function run(args: string[], behaviour: FakeBehaviour = {}): Promise<RunResult> {
    const stdout = new Capture();
    const stderr = new Capture();
    const capability = new FakeCapability(behaviour);
    const browserPaths: Array<string | undefined> = [];
    const context: ConvertContext = {
        ...Cli.defaultContext,
        stdout,
        stderr,
        createCapability: (browserPath) => {
            browserPaths.push(browserPath);
            return capability;
        },
    };
    const code = await createCli().run(args, context);
    return { code, stdout: stdout.text, stderr: stderr.text, capability, browserPaths };
}

let dir: string;
let input: string;

beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "markdown-press-"));
    input = join(dir, "notes.md");
    await writeFile(input, "# Notes\n\n```rust\nfn main() {}\n```\n", "utf8");
});

afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
});

describe("markdown-press", () => {
    test("writes the pdf and reports where it went", async () => {
        const output = join(dir, "out.pdf");
        const result = await run(["-i", input, "-o", output]);

        expect(result.code).toBe(0);
        expect(result.stdout).toBe(`✅ PDF generated successfully: ${output}\n`);
        expect(result.stderr).toBe("");

        const written = await readFile(output);
        expect(new TextDecoder().decode(written)).toBe(result.capability.loaded[0]);
        expect(result.capability.loaded[0]).toContain("<title>notes</title>");
        expect(result.capability.printedMargins).toEqual([50]);
        expect(result.capability.openSessions).toBe(0);
    });

    test("puts the pdf next to the input by default", async () => {
        const result = await run(["--input", input]);

        expect(result.code).toBe(0);
        expect(result.stdout).toBe(`✅ PDF generated successfully: ${join(dir, "notes.pdf")}\n`);
        expect((await readFile(join(dir, "notes.pdf"))).byteLength).toBeGreaterThan(0);
    });

    test("passes margin and browser options through", async () => {
        const result = await run(["-i", input, "-m", "80", "--browser", "/opt/chrome/chrome"]);

        expect(result.code).toBe(0);
        expect(result.capability.printedMargins).toEqual([80]);
        expect(result.browserPaths).toEqual(["/opt/chrome/chrome"]);
    });

    test("writes the assembled html when asked", async () => {
        const output = join(dir, "out.pdf");
        const result = await run(["-i", input, "-o", output, "--html"]);

        expect(result.code).toBe(0);
        const html = await readFile(join(dir, "out.html"), "utf8");
        expect(html).toBe(result.capability.loaded[0]);
        expect(html.startsWith("<!DOCTYPE html>\n")).toBe(true);
    });

    test("fails when the input cannot be read", async () => {
        const missing = join(dir, "missing.md");
        const result = await run(["-i", missing]);

        expect(result.code).toBe(1);
        expect(result.stdout).toBe("");
        expect(result.stderr.startsWith(`❌ could not read ${missing}: `)).toBe(true);
        expect(result.capability.launches).toBe(0);
    });

    test("rejects a margin that is not a number", async () => {
        const result = await run(["-i", input, "-m", "wide"]);

        expect(result.code).toBe(1);
        expect(result.stderr).toBe("❌ invalid render configuration: marginPixels: Expected number, received nan\n");
        expect(result.capability.launches).toBe(0);
    });

    test("reports renderer failures", async () => {
        const output = join(dir, "out.pdf");
        const result = await run(["-i", input, "-o", output], { failPrint: new Error("paper jam") });

        expect(result.code).toBe(1);
        expect(result.stderr).toBe("❌ fake renderer failed to print: paper jam\n");
        expect(result.capability.openSessions).toBe(0);
        await expect(readFile(output)).rejects.toThrow();
    });

    test("prints the debug trail with --verbose", async () => {
        const result = await run(["-i", input, "--verbose"]);

        expect(result.code).toBe(0);
        expect(result.stderr).toContain("[debug] orchestrator: idle -> launching\n");
        expect(result.stderr).toContain("[debug] orchestrator: released fake renderer\n");
    });

    test("keeps quiet about the pipeline without --verbose", async () => {
        const result = await run(["-i", input]);
        expect(result.stderr).toBe("");
    });
});

describe("siblingWithExtension", () => {
    test("swaps the extension", () => {
        expect(siblingWithExtension("out/report.pdf", ".html")).toBe("out/report.html");
        expect(siblingWithExtension("report", ".html")).toBe("report.html");
    });
});

describe("isEntryPoint", () => {
    test("matches the script it was started as", () => {
        expect(isEntryPoint(input, pathToFileURL(input).href)).toBe(true);
    });

    test("follows a symlinked bin entry", async () => {
        const link = join(dir, "markdown-press");
        await symlink(input, link);
        expect(isEntryPoint(link, pathToFileURL(input).href)).toBe(true);
    });

    test("does not match other scripts", async () => {
        const other = join(dir, "other.md");
        await writeFile(other, "", "utf8");
        expect(isEntryPoint(other, pathToFileURL(input).href)).toBe(false);
        expect(isEntryPoint(undefined, pathToFileURL(input).href)).toBe(false);
        expect(isEntryPoint(join(dir, "missing"), pathToFileURL(input).href)).toBe(false);
    });
});
