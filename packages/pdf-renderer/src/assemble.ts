import { escapeHtml } from "markdown-renderer";
import type { RenderConfig } from "./config";
import { ConfigError } from "./errors";
import { renderStylesheet } from "./template";

export interface AssembledDocument {
    readonly htmlBody: string;
    // template with the margin filled in
    readonly css: string;
    // complete, self-contained document handed to the renderer
    readonly html: string;
    readonly marginPixels: number;
    readonly title: string;
}

export interface AssembleOptions {
    title?: string;
    lang?: string;
}

/**
 * Wraps an HTML fragment in a full document with the stylesheet inlined.
 * Pure: the same arguments always give the same document.
 */
export function assemble(
    htmlBody: string,
    config: Pick<RenderConfig, "marginPixels">,
    options: AssembleOptions = {}
): AssembledDocument {
    const { marginPixels } = config;
    if (!Number.isInteger(marginPixels) || marginPixels < 0) {
        throw new ConfigError([`marginPixels: expected a non-negative integer, got ${marginPixels}`]);
    }

    const title = options.title ?? "Document";
    const lang = options.lang ?? "en";
    const css = renderStylesheet(marginPixels);
    const html = `<!DOCTYPE html>
<html lang="${escapeHtml(lang)}">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<style>
${css}</style>
</head>
<body><div class="container">
${htmlBody}</div></body>
</html>
`;

    return Object.freeze({ htmlBody, css, html, marginPixels, title });
}
