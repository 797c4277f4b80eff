export { highlight, highlightBlock, isLanguageSupported, normalizeLanguage, supportedLanguages } from "./highlight";
export type { GrammarRegistry } from "./highlight";
export { renderHighlightedHtml, escapeCode } from "./render";
export { DARK_THEME, SCOPE_STYLES, styleClassForScope, inlineStyleFor } from "./theme";
export type {
    HighlightSpan,
    HighlightResult,
    HighlightDegradation,
    StyleClass,
    Theme,
    ThemeStyle,
} from "./types";
