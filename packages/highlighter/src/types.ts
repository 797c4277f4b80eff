export type StyleClass =
    | "plain"
    | "keyword"
    | "string"
    | "comment"
    | "number"
    | "function"
    | "type"
    | "punctuation"
    | "identifier";

/**
 * HighlightSpan
 * One run of source text and the theme class it is painted with.
 */
export interface HighlightSpan {
    text: string;
    styleClass: StyleClass;
}

export type HighlightDegradation = "unknown-language" | "grammar-error";

export interface HighlightResult {
    spans: HighlightSpan[];
    // grammar actually used, null when the block fell back to plain text
    language: string | null;
    degradation?: HighlightDegradation;
    // underlying message when a grammar threw
    detail?: string;
}

export interface ThemeStyle {
    color: string;
    fontStyle?: "italic";
    fontWeight?: 600;
}

export interface Theme {
    name: string;
    background: string;
    foreground: string;
    styles: Record<StyleClass, ThemeStyle>;
}
