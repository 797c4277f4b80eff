import { common, createLowlight } from "lowlight";
import type { ElementContent, Properties, RootContent } from "hast";
import { styleClassForScope } from "./theme";
import type { HighlightResult, HighlightSpan, StyleClass } from "./types";

const lowlight = createLowlight(common);

// the part of a lowlight instance highlightBlock needs
export type GrammarRegistry = Pick<ReturnType<typeof createLowlight>, "registered" | "highlight">;

export function normalizeLanguage(language: string | null | undefined): string | null {
    if (!language) return null;
    const normalized = language.trim().toLowerCase();
    return normalized || null;
}

export function isLanguageSupported(language: string | null | undefined): boolean {
    const normalized = normalizeLanguage(language);
    return normalized !== null && lowlight.registered(normalized);
}

export function supportedLanguages(): string[] {
    return lowlight.listLanguages();
}

/**
 * Splits a code block into theme-classed spans.
 * Joining the span texts always gives back `content` unchanged.
 */
export function highlight(language: string | null | undefined, content: string): HighlightSpan[] {
    return highlightBlock(language, content).spans;
}

export function highlightBlock(
    language: string | null | undefined,
    content: string,
    grammars: GrammarRegistry = lowlight
): HighlightResult {
    const normalized = normalizeLanguage(language);
    if (normalized === null || !grammars.registered(normalized)) {
        return {
            spans: plainSpans(content),
            language: null,
            degradation: normalized === null ? undefined : "unknown-language",
        };
    }

    let children: RootContent[];
    try {
        children = grammars.highlight(normalized, content).children;
    } catch (error) {
        return {
            spans: plainSpans(content),
            language: null,
            degradation: "grammar-error",
            detail: error instanceof Error ? error.message : String(error),
        };
    }

    const spans: HighlightSpan[] = [];
    collectSpans(children, "plain", spans);
    return { spans, language: normalized };
}

function plainSpans(content: string): HighlightSpan[] {
    return content ? [{ text: content, styleClass: "plain" }] : [];
}

function collectSpans(
    nodes: Array<RootContent | ElementContent>,
    inherited: StyleClass,
    out: HighlightSpan[]
): void {
    for (const node of nodes) {
        if (node.type === "text") {
            pushSpan(out, node.value, inherited);
        } else if (node.type === "element") {
            const own = styleClassForScope(scopeOf(node.properties));
            collectSpans(node.children, own === "plain" ? inherited : own, out);
        }
    }
}

function pushSpan(out: HighlightSpan[], text: string, styleClass: StyleClass): void {
    if (!text) return;
    const last = out[out.length - 1];
    if (last && last.styleClass === styleClass) {
        last.text += text;
        return;
    }
    out.push({ text, styleClass });
}

/**
 * ["hljs-title", "function_"] => "title.function_"
 */
export function scopeOf(properties: Properties): string {
    const raw = properties.className;
    let classNames: string[] = [];
    if (Array.isArray(raw)) {
        classNames = raw.filter((c): c is string => typeof c === "string");
    } else if (typeof raw === "string") {
        classNames = raw.split(/\s+/);
    }

    const base = classNames.find((c) => c.startsWith("hljs-"));
    if (!base) return "";
    const modifiers = classNames.filter((c) => c !== base && !c.startsWith("hljs-"));
    return [base.slice("hljs-".length), ...modifiers].join(".");
}
