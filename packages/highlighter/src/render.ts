import { DARK_THEME, inlineStyleFor } from "./theme";
import type { HighlightSpan, Theme } from "./types";

export function renderHighlightedHtml(spans: HighlightSpan[], theme: Theme = DARK_THEME): string {
    return spans
        .map((span) => {
            const text = escapeCode(span.text);
            if (span.styleClass === "plain") return text;
            return `<span class="hl-${span.styleClass}" style="${inlineStyleFor(span.styleClass, theme)}">${text}</span>`;
        })
        .join("");
}

export function escapeCode(str: string): string {
    return str
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&#39;");
}
