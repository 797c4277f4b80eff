import MarkdownIt from "markdown-it";
import footnote from "markdown-it-footnote";
import { headingKind } from "./events";
import type { CellAlignment, HeadingLevel, InlineEvent, MarkdownEvent } from "./events";
import { plainTextOf } from "./transform";

type Token = ReturnType<MarkdownIt["parse"]>[number];

export interface TokenizeOptions {
    // turn bare URLs into links
    linkify?: boolean;
    // recognise "- [ ]" / "- [x]" list items
    taskLists?: boolean;
    // [^label] references and their definitions
    footnotes?: boolean;
}

const TASK_PREFIX = /^\[([ xX])\][ \t]+/;

export function createMarkdownTokenizer(options: TokenizeOptions = {}): MarkdownIt {
    const md = new MarkdownIt("default", {
        html: false,
        linkify: options.linkify ?? true,
        typographer: false,
    });
    return (options.footnotes ?? true) ? md.use(footnote) : md;
}

/**
 * Lazily adapts markdown-it's token stream to MarkdownEvents.
 */
export function* tokenizeMarkdown(source: string, options: TokenizeOptions = {}): Generator<MarkdownEvent> {
    const md = createMarkdownTokenizer(options);
    const tokens = md.parse(source, {});
    yield* blockEvents(tokens, options.taskLists ?? true);
}

function* blockEvents(tokens: Token[], taskLists: boolean): Generator<MarkdownEvent> {
    // inline token index => length of a task prefix to strip
    const taskPrefixes = new Map<number, number>();

    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        switch (token.type) {
            case "paragraph_open":
                if (!token.hidden) yield { type: "start", kind: "paragraph" };
                break;
            case "paragraph_close":
                if (!token.hidden) yield { type: "end", kind: "paragraph" };
                break;
            case "heading_open":
                yield { type: "start", kind: headingKind(headingLevelFromTag(token.tag)) };
                break;
            case "heading_close":
                yield { type: "end", kind: headingKind(headingLevelFromTag(token.tag)) };
                break;
            case "blockquote_open":
                yield { type: "start", kind: "blockquote" };
                break;
            case "blockquote_close":
                yield { type: "end", kind: "blockquote" };
                break;
            case "bullet_list_open":
                yield { type: "start", kind: "bullet_list" };
                break;
            case "bullet_list_close":
                yield { type: "end", kind: "bullet_list" };
                break;
            case "ordered_list_open":
                yield { type: "start", kind: "ordered_list", start: Number(token.attrGet("start") ?? 1) };
                break;
            case "ordered_list_close":
                yield { type: "end", kind: "ordered_list" };
                break;
            case "list_item_open": {
                yield { type: "start", kind: "list_item" };
                const task = taskLists ? findTaskMarker(tokens, i) : null;
                if (task) {
                    taskPrefixes.set(task.inlineIndex, task.prefixLength);
                    yield { type: "task_marker", checked: task.checked };
                }
                break;
            }
            case "list_item_close":
                yield { type: "end", kind: "list_item" };
                break;
            case "fence":
            case "code_block": {
                const language = token.info.trim().split(/\s+/)[0];
                yield language
                    ? { type: "code_block", language, content: token.content }
                    : { type: "code_block", content: token.content };
                break;
            }
            case "hr":
                yield { type: "thematic_break" };
                break;
            case "table_open":
                i = yield* tableEvents(tokens, i);
                break;
            case "footnote_block_open":
                yield { type: "start", kind: "footnotes" };
                break;
            case "footnote_block_close":
                yield { type: "end", kind: "footnotes" };
                break;
            case "footnote_open":
                yield { type: "start", kind: "footnote", number: footnoteRefOf(token).number };
                break;
            case "footnote_close":
                yield { type: "end", kind: "footnote" };
                break;
            case "footnote_anchor":
                yield { type: "footnote_backref", ...footnoteRefOf(token) };
                break;
            case "inline":
                yield* inlineEvents(token.children ?? [], taskPrefixes.get(i) ?? 0);
                break;
            default:
                yield { type: "unsupported", name: token.type, text: token.content };
        }
    }
}

function* inlineEvents(children: Token[], skipPrefix = 0): Generator<InlineEvent> {
    for (const [index, child] of children.entries()) {
        switch (child.type) {
            // text_special: a backslash escape that markdown-it has not joined into text
            case "text":
            case "text_special": {
                const value = index === 0 && skipPrefix > 0 ? child.content.slice(skipPrefix) : child.content;
                if (value) yield { type: "text", value };
                break;
            }
            case "code_inline":
                yield { type: "code_span", code: child.content };
                break;
            case "softbreak":
                yield { type: "soft_break" };
                break;
            case "hardbreak":
                yield { type: "hard_break" };
                break;
            case "em_open":
                yield { type: "start", kind: "emphasis" };
                break;
            case "em_close":
                yield { type: "end", kind: "emphasis" };
                break;
            case "strong_open":
                yield { type: "start", kind: "strong" };
                break;
            case "strong_close":
                yield { type: "end", kind: "strong" };
                break;
            case "s_open":
                yield { type: "start", kind: "strikethrough" };
                break;
            case "s_close":
                yield { type: "end", kind: "strikethrough" };
                break;
            case "link_open": {
                const title = child.attrGet("title");
                const url = child.attrGet("href") ?? "";
                yield title ? { type: "link_start", url, title } : { type: "link_start", url };
                break;
            }
            case "link_close":
                yield { type: "end", kind: "link" };
                break;
            case "footnote_ref":
                yield { type: "footnote_ref", ...footnoteRefOf(child) };
                break;
            case "image": {
                const title = child.attrGet("title");
                const url = child.attrGet("src") ?? "";
                // the label may hold markup, alt only keeps its text
                const alt = plainTextOf([...inlineEvents(child.children ?? [])]);
                yield title ? { type: "image", url, alt, title } : { type: "image", url, alt };
                break;
            }
            default:
                yield { type: "unsupported", name: child.type, text: child.content };
        }
    }
}

/**
 * Folds markdown-it's table_open..table_close run into a start event, one
 * table_row per row and an end event. Returns the index of table_close.
 */
function* tableEvents(tokens: Token[], openIndex: number): Generator<MarkdownEvent, number> {
    const rows: InlineEvent[][][] = [];
    let alignments: CellAlignment[] = [];
    let current: InlineEvent[][] | null = null;
    let inHead = false;
    let i = openIndex + 1;

    for (; i < tokens.length && tokens[i].type !== "table_close"; i++) {
        const token = tokens[i];
        switch (token.type) {
            case "thead_open":
                inHead = true;
                break;
            case "thead_close":
                inHead = false;
                break;
            case "tr_open":
                current = [];
                break;
            case "tr_close":
                if (current) rows.push(current);
                current = null;
                break;
            case "th_open":
            case "td_open":
                if (inHead) alignments.push(alignmentOf(token));
                break;
            case "inline":
                if (current) current.push([...inlineEvents(token.children ?? [])]);
                break;
        }
    }

    if (alignments.length === 0 && rows.length > 0) {
        alignments = rows[0].map(() => null);
    }

    yield { type: "start", kind: "table", alignments };
    for (const cells of rows) {
        yield { type: "table_row", cells };
    }
    yield { type: "end", kind: "table" };
    return i;
}

function alignmentOf(token: Token): CellAlignment {
    const style = token.attrGet("style") ?? "";
    const match = /text-align:\s*(left|center|right)/.exec(style);
    if (!match) return null;
    switch (match[1]) {
        case "left":
            return "left";
        case "center":
            return "center";
        case "right":
            return "right";
        default:
            return null;
    }
}

function findTaskMarker(
    tokens: Token[],
    listItemIndex: number
): { inlineIndex: number; prefixLength: number; checked: boolean } | null {
    // list_item_open, paragraph_open, inline
    const inlineIndex = listItemIndex + 2;
    const paragraph = tokens[listItemIndex + 1];
    const inline = tokens[inlineIndex];
    if (!paragraph || paragraph.type !== "paragraph_open" || !inline || inline.type !== "inline") return null;

    const first = inline.children?.[0];
    if (!first || first.type !== "text") return null;
    const match = TASK_PREFIX.exec(first.content);
    if (!match) return null;
    return { inlineIndex, prefixLength: match[0].length, checked: match[1] !== " " };
}

// footnote tokens carry a 0-based `id` and, on references, a `subId` in meta
function footnoteRefOf(token: Token): { number: number; refIndex: number } {
    const meta: unknown = token.meta;
    if (typeof meta !== "object" || meta === null) return { number: 1, refIndex: 0 };
    const id = "id" in meta && typeof meta.id === "number" ? meta.id : 0;
    const subId = "subId" in meta && typeof meta.subId === "number" ? meta.subId : 0;
    return { number: id + 1, refIndex: subId };
}

function headingLevelFromTag(tag: string): HeadingLevel {
    switch (tag) {
        case "h1":
            return 1;
        case "h2":
            return 2;
        case "h3":
            return 3;
        case "h4":
            return 4;
        case "h5":
            return 5;
        default:
            return 6;
    }
}
