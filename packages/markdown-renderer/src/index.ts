import { tokenizeMarkdown } from "./tokenize";
import type { TokenizeOptions } from "./tokenize";
import { transform } from "./transform";
import type { TransformOptions } from "./transform";

export type RenderMarkdownOptions = TokenizeOptions & TransformOptions;

export function renderMarkdown(markdown: string, options: RenderMarkdownOptions = {}): string {
    const events = tokenizeMarkdown(markdown, options);
    return transform(events, options);
}

export { tokenizeMarkdown, createMarkdownTokenizer } from "./tokenize";
export type { TokenizeOptions } from "./tokenize";
export { transform, MarkdownTransformer, escapeHtml, escapeHtmlAttr, escapeUrl, plainTextOf } from "./transform";
export type { TransformOptions } from "./transform";
export { StructuralError } from "./errors";
export { DebugLog } from "./debug";
export type { DebugSnapshot } from "./debug";
export { headingKind, headingLevelOf } from "./events";
export type {
    BlockKind,
    CellAlignment,
    HeadingKind,
    HeadingLevel,
    InlineEvent,
    MarkdownEvent,
    StartEvent,
    EndEvent,
} from "./events";
export type { FootnoteBackrefEvent, FootnoteRefEvent } from "./events";
