import type { StyleClass, Theme } from "./types";

// base16 ocean, dark variant
export const DARK_THEME: Theme = {
    name: "base16-ocean.dark",
    background: "#2b303b",
    foreground: "#c0c5ce",
    styles: {
        plain: { color: "#c0c5ce" },
        keyword: { color: "#b48ead" },
        string: { color: "#a3be8c" },
        comment: { color: "#65737e", fontStyle: "italic" },
        number: { color: "#d08770" },
        function: { color: "#8fa1b3" },
        type: { color: "#ebcb8b" },
        punctuation: { color: "#96b5b4" },
        identifier: { color: "#bf616a" },
    },
};

/**
 * highlight.js scope => theme class.
 * Keys are scopes with their sub-scopes joined by ".", e.g. "title.function_".
 * A scope missing here falls back to its base scope, then to "plain".
 */
export const SCOPE_STYLES: Readonly<Record<string, StyleClass>> = {
    keyword: "keyword",
    literal: "keyword",
    "selector-tag": "keyword",
    "meta.keyword": "keyword",
    doctag: "keyword",

    string: "string",
    regexp: "string",
    "char.escape": "string",
    subst: "identifier",
    link: "string",
    quote: "comment",

    comment: "comment",

    number: "number",
    symbol: "number",
    bullet: "number",

    title: "function",
    "title.function_": "function",
    "title.function_.invoke__": "function",
    built_in: "function",
    section: "function",

    type: "type",
    "title.class_": "type",
    "title.class_.inherited__": "type",
    "selector-class": "type",
    "selector-id": "type",

    punctuation: "punctuation",
    operator: "punctuation",
    tag: "punctuation",

    variable: "identifier",
    "variable.language_": "keyword",
    "variable.constant_": "number",
    attr: "identifier",
    attribute: "identifier",
    property: "identifier",
    params: "identifier",
    name: "keyword",
    "template-variable": "identifier",
};

export function styleClassForScope(scope: string): StyleClass {
    const exact = SCOPE_STYLES[scope];
    if (exact) return exact;
    const base = scope.split(".")[0];
    return SCOPE_STYLES[base] ?? "plain";
}

export function inlineStyleFor(styleClass: StyleClass, theme: Theme = DARK_THEME): string {
    const style = theme.styles[styleClass];
    let css = `color:${style.color}`;
    if (style.fontStyle) css += `;font-style:${style.fontStyle}`;
    if (style.fontWeight) css += `;font-weight:${style.fontWeight}`;
    return css;
}
