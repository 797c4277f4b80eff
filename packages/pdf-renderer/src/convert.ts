import { DebugLog, tokenizeMarkdown, transform } from "markdown-renderer";
import { assemble } from "./assemble";
import type { AssembledDocument } from "./assemble";
import type { RenderConfig } from "./config";
import { RenderOrchestrator } from "./orchestrator";
import type { PdfArtifact, RenderState, RendererCapability } from "./orchestrator";
import { PuppeteerCapability } from "./puppeteer";

export interface ConvertOptions {
    // defaults to headless Chrome through puppeteer-core
    capability?: RendererCapability;
    title?: string;
    debug?: DebugLog;
    signal?: AbortSignal;
    onStateChange?: (state: RenderState) => void;
}

export interface ConversionResult {
    pdf: PdfArtifact;
    document: AssembledDocument;
}

export function markdownToDocument(
    markdown: string,
    config: Pick<RenderConfig, "marginPixels">,
    options: Pick<ConvertOptions, "title" | "debug"> = {}
): AssembledDocument {
    const debug = options.debug ?? new DebugLog(false);
    const htmlBody = transform(tokenizeMarkdown(markdown), { debug });
    debug.captureSnapshot("afterTransform", htmlBody);

    const document = assemble(htmlBody, config, { title: options.title });
    debug.captureSnapshot("afterAssemble", document.html);
    return document;
}

export async function convertMarkdownToPdf(
    markdown: string,
    config: RenderConfig,
    options: ConvertOptions = {}
): Promise<ConversionResult> {
    const debug = options.debug ?? new DebugLog(false);
    const document = markdownToDocument(markdown, config, { title: options.title, debug });

    const capability = options.capability ?? new PuppeteerCapability({ executablePath: config.browserPath });
    const orchestrator = new RenderOrchestrator(capability, {
        timeoutMs: config.timeoutMs,
        signal: options.signal,
        debug,
        onStateChange: options.onStateChange,
    });
    const pdf = await orchestrator.renderToPdf(document);
    debug.captureSnapshot("afterPrint", `${pdf.byteLength} bytes`);

    return { pdf, document };
}
