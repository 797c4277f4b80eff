#!/usr/bin/env tsx
import { realpathSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { join, parse as parsePath } from "node:path";
import { fileURLToPath } from "node:url";
import { Builtins, Cli, Command, Option } from "clipanion";
import type { BaseContext } from "clipanion";
import { DebugLog } from "markdown-renderer";
import {
    DEFAULT_MARGIN_PIXELS,
    DEFAULT_TIMEOUT_MS,
    PuppeteerCapability,
    convertMarkdownToPdf,
    createRenderConfig,
    defaultOutputPath,
    errorMessage,
} from "pdf-renderer";
import type { RendererCapability } from "pdf-renderer";

export const BINARY_NAME = "markdown-press";
export const VERSION = "0.1.0";

export type ConvertContext = BaseContext & {
    createCapability: (browserPath?: string) => RendererCapability;
};

export class ConvertCommand extends Command<ConvertContext> {
    static paths = [Command.Default];

    static usage = Command.Usage({
        description: "Convert a Markdown file into a styled PDF",
        details: `
            Renders the Markdown to HTML with highlighted code blocks and prints it
            with a locally installed Chrome or Chromium.
        `,
        examples: [
            ["Write notes.pdf next to notes.md", "$0 -i notes.md"],
            ["Pick the output file and a wider margin", "$0 -i notes.md -o out/notes.pdf -m 80"],
        ],
    });

    input = Option.String("-i,--input", { required: true, description: "Input Markdown file" });
    output = Option.String("-o,--output", {
        description: "Output PDF file (default: same name as input with .pdf)",
    });
    margin = Option.String("-m,--margin", String(DEFAULT_MARGIN_PIXELS), {
        description: `Page margin in pixels (default: ${DEFAULT_MARGIN_PIXELS})`,
    });
    timeout = Option.String("--timeout", String(DEFAULT_TIMEOUT_MS), {
        description: "Give up when the browser has not printed within this many milliseconds",
    });
    browser = Option.String("--browser", { description: "Chrome or Chromium executable to use" });
    html = Option.Boolean("--html", false, { description: "Also write the assembled HTML next to the PDF" });
    verbose = Option.Boolean("-v,--verbose", false, { description: "Print pipeline debug output to stderr" });

    async execute(): Promise<number> {
        const debug = new DebugLog(this.verbose);
        try {
            const config = createRenderConfig({
                outputPath: this.output ?? defaultOutputPath(this.input),
                marginPixels: Number(this.margin),
                timeoutMs: Number(this.timeout),
                browserPath: this.browser,
            });
            const markdown = await readMarkdown(this.input);

            const { pdf, document } = await convertMarkdownToPdf(markdown, config, {
                capability: this.context.createCapability(config.browserPath),
                title: parsePath(this.input).name,
                debug,
            });

            await writeFile(config.outputPath, pdf);
            if (this.html) {
                const htmlPath = siblingWithExtension(config.outputPath, ".html");
                await writeFile(htmlPath, document.html, "utf8");
                debug.log(`cli: wrote ${htmlPath}`);
            }

            this.context.stdout.write(`✅ PDF generated successfully: ${config.outputPath}\n`);
            return 0;
        } catch (error) {
            this.context.stderr.write(`❌ ${errorMessage(error)}\n`);
            return 1;
        } finally {
            for (const line of debug.getLogs()) {
                this.context.stderr.write(`[debug] ${line}\n`);
            }
        }
    }
}

async function readMarkdown(inputPath: string): Promise<string> {
    try {
        return await readFile(inputPath, "utf8");
    } catch (error) {
        throw new Error(`could not read ${inputPath}: ${errorMessage(error)}`, { cause: error });
    }
}

export function siblingWithExtension(filePath: string, extension: string): string {
    const { dir, name } = parsePath(filePath);
    return join(dir, `${name}${extension}`);
}

export function createCli(): Cli<ConvertContext> {
    const cli = new Cli<ConvertContext>({
        binaryLabel: "Markdown to PDF",
        binaryName: BINARY_NAME,
        binaryVersion: VERSION,
    });
    cli.register(ConvertCommand);
    cli.register(Builtins.HelpCommand);
    cli.register(Builtins.VersionCommand);
    return cli;
}

export const defaultContext: ConvertContext = {
    ...Cli.defaultContext,
    createCapability: (browserPath) => new PuppeteerCapability({ executablePath: browserPath }),
};

/**
 * True when `scriptPath` (usually `process.argv[1]`) is this module, also when
 * it is reached through a symlink such as an npm `bin` entry.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
    if (scriptPath === undefined) return false;
    try {
        return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
        throw error;
    }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
    void createCli().runExit(process.argv.slice(2), defaultContext);
}
