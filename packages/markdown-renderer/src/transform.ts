import { highlightBlock, renderHighlightedHtml } from "highlighter";
import { DebugLog } from "./debug";
import { StructuralError } from "./errors";
import { headingLevelOf } from "./events";
import type {
    BlockKind,
    CellAlignment,
    CodeBlockEvent,
    InlineEvent,
    MarkdownEvent,
    StartEvent,
    TableRowEvent,
} from "./events";

export interface TransformOptions {
    debug?: DebugLog;
}

interface TableState {
    rows: number;
    alignments: CellAlignment[];
}

/**
 * Turns MarkdownEvents into an HTML fragment, one event at a time.
 * Keeps a stack of open blocks so every `end` can be checked against the
 * block it claims to close.
 */
export class MarkdownTransformer {
    private html = "";
    private readonly stack: BlockKind[] = [];
    private readonly tables: TableState[] = [];
    private readonly debug: DebugLog;

    constructor(options: TransformOptions = {}) {
        this.debug = options.debug ?? new DebugLog(false);
    }

    public push(event: MarkdownEvent): void {
        switch (event.type) {
            case "start":
                this.open(event);
                break;
            case "link_start": {
                this.stack.push("link");
                const title = event.title ? ` title="${escapeHtmlAttr(event.title)}"` : "";
                this.html += `<a href="${escapeUrl(event.url)}"${title}>`;
                break;
            }
            case "end":
                this.close(event.kind);
                break;
            case "text":
                this.html += escapeHtml(event.value);
                break;
            case "code_span":
                this.html += `<code class="inline-code">${escapeHtml(event.code)}</code>`;
                break;
            case "code_block":
                this.html += this.renderCodeBlock(event);
                this.blockDone();
                break;
            case "image": {
                const title = event.title ? ` title="${escapeHtmlAttr(event.title)}"` : "";
                this.html += `<img src="${escapeUrl(event.url)}" alt="${escapeHtmlAttr(event.alt)}"${title} />`;
                break;
            }
            case "thematic_break":
                this.html += "<hr />";
                this.blockDone();
                break;
            case "table_row":
                this.renderTableRow(event);
                break;
            case "task_marker":
                this.html += event.checked
                    ? `<input type="checkbox" disabled checked /> `
                    : `<input type="checkbox" disabled /> `;
                break;
            case "soft_break":
                this.html += "\n";
                break;
            case "hard_break":
                this.html += "<br />";
                break;
            case "footnote_ref": {
                const id = footnoteId(event.number, event.refIndex);
                this.html += `<sup class="footnote-ref"><a href="#fn${event.number}" id="fnref${id}">[${event.number}]</a></sup>`;
                break;
            }
            case "footnote_backref":
                this.html += ` <a href="#fnref${footnoteId(event.number, event.refIndex)}" class="footnote-backref">\u21a9</a>`;
                break;
            case "unsupported":
                this.debug.log(`transform: passing "${event.name}" through as text`);
                this.html += escapeHtml(event.text);
                break;
            default:
                this.passThrough(event);
        }
    }

    /**
     * Returns the finished fragment. Blocks left open are a structural error.
     */
    public finish(): string {
        const top = this.top();
        if (top !== null) {
            throw new StructuralError(`unclosed ${top} at end of document`, {
                expected: top,
                found: null,
                partialHtml: this.html,
            });
        }
        return this.html;
    }

    public get depth(): number {
        return this.stack.length;
    }

    private open(event: StartEvent): void {
        this.stack.push(event.kind);
        switch (event.kind) {
            case "ordered_list":
                this.html += event.start !== 1 ? `<ol start="${event.start}">` : "<ol>";
                return;
            case "table":
                this.tables.push({ rows: 0, alignments: event.alignments });
                this.html += "<table>";
                return;
            case "footnote":
                this.html += `<li id="fn${event.number}" class="footnote-item">`;
                return;
            default:
                this.html += openTag(event.kind);
        }
    }

    private close(kind: BlockKind): void {
        const top = this.top();
        if (top !== kind) {
            throw new StructuralError(
                top === null
                    ? `unexpected end of ${kind}: no block is open`
                    : `unexpected end of ${kind} while ${top} is open`,
                { expected: top, found: kind, partialHtml: this.html }
            );
        }
        this.stack.pop();

        if (kind === "table") {
            const table = this.tables.pop();
            if (table && table.rows > 1) this.html += "</tbody>";
        }
        this.html += closeTag(kind);
        this.blockDone();
    }

    private renderCodeBlock(event: CodeBlockEvent): string {
        const declared = event.language?.trim();
        const result = highlightBlock(declared, event.content);
        if (result.degradation) {
            this.debug.log(
                `highlight: ${declared} code block rendered as plain text (${result.degradation}${
                    result.detail ? `: ${result.detail}` : ""
                })`
            );
        }
        const tag = escapeHtmlAttr(declared || "plain");
        const body = renderHighlightedHtml(result.spans);
        return `<div class="code-block" data-language="${tag}"><pre><code class="language-${tag}">${body}</code></pre></div>`;
    }

    private renderTableRow(event: TableRowEvent): void {
        const table = this.top() === "table" ? this.tables[this.tables.length - 1] : undefined;
        if (!table) {
            this.debug.log("transform: table row outside of a table, rendered as text");
            this.html += escapeHtml(event.cells.map(plainTextOf).join(" | "));
            return;
        }

        table.rows++;
        const isHeader = table.rows === 1;
        const cellTag = isHeader ? "th" : "td";
        const cells = event.cells
            .map((cell, i) => {
                const alignment = table.alignments[i] ?? null;
                const style = alignment ? ` style="text-align:${alignment}"` : "";
                return `<${cellTag}${style}>${this.renderCell(cell)}</${cellTag}>`;
            })
            .join("");

        if (isHeader) {
            this.html += `<thead><tr>${cells}</tr></thead>`;
            return;
        }
        if (table.rows === 2) this.html += "<tbody>";
        this.html += `<tr>${cells}</tr>`;
    }

    private renderCell(events: InlineEvent[]): string {
        const cell = new MarkdownTransformer({ debug: this.debug });
        try {
            for (const event of events) cell.push(event);
            return cell.finish();
        } catch (error) {
            if (error instanceof StructuralError) {
                throw new StructuralError(`in table cell: ${error.message}`, {
                    expected: error.expected,
                    found: error.found,
                    partialHtml: this.html,
                });
            }
            throw error;
        }
    }

    // events from untyped producers that match no known shape
    private passThrough(event: unknown): void {
        const text = textOfUnknown(event);
        this.debug.log("transform: unrecognized event passed through as text");
        this.html += escapeHtml(text);
    }

    private blockDone(): void {
        if (this.stack.length === 0) this.html += "\n";
    }

    private top(): BlockKind | null {
        return this.stack.length > 0 ? this.stack[this.stack.length - 1] : null;
    }
}

/**
 * Renders a complete event sequence. Nothing is returned unless the whole
 * sequence nests correctly.
 */
export function transform(events: Iterable<MarkdownEvent>, options: TransformOptions = {}): string {
    const transformer = new MarkdownTransformer(options);
    for (const event of events) {
        transformer.push(event);
    }
    return transformer.finish();
}

function openTag(kind: BlockKind): string {
    const level = headingLevelOf(kind);
    if (level !== null) return `<h${level}>`;
    switch (kind) {
        case "paragraph":
            return "<p>";
        case "blockquote":
            return "<blockquote>";
        case "bullet_list":
            return "<ul>";
        case "ordered_list":
            return "<ol>";
        case "list_item":
            return "<li>";
        case "emphasis":
            return "<em>";
        case "strong":
            return "<strong>";
        case "strikethrough":
            return "<del>";
        case "table":
            return "<table>";
        case "link":
            return "<a>";
        case "footnotes":
            return '<section class="footnotes"><ol class="footnotes-list">';
        case "footnote":
            return "<li>";
        default:
            return "";
    }
}

function closeTag(kind: BlockKind): string {
    const level = headingLevelOf(kind);
    if (level !== null) return `</h${level}>`;
    switch (kind) {
        case "paragraph":
            return "</p>";
        case "blockquote":
            return "</blockquote>";
        case "bullet_list":
            return "</ul>";
        case "ordered_list":
            return "</ol>";
        case "list_item":
            return "</li>";
        case "emphasis":
            return "</em>";
        case "strong":
            return "</strong>";
        case "strikethrough":
            return "</del>";
        case "table":
            return "</table>";
        case "link":
            return "</a>";
        case "footnotes":
            return "</ol></section>";
        case "footnote":
            return "</li>";
        default:
            return "";
    }
}

export function plainTextOf(events: InlineEvent[]): string {
    return events
        .map((event) => {
            switch (event.type) {
                case "text":
                    return event.value;
                case "code_span":
                    return event.code;
                case "image":
                    return event.alt;
                case "unsupported":
                    return event.text;
                case "soft_break":
                case "hard_break":
                    return " ";
                case "footnote_ref":
                    return `[${event.number}]`;
                default:
                    return "";
            }
        })
        .join("");
}

// second and later references to a footnote get their own anchor: fnref1:1
function footnoteId(number: number, refIndex: number): string {
    return refIndex > 0 ? `${number}:${refIndex}` : `${number}`;
}

function textOfUnknown(event: unknown): string {
    if (typeof event !== "object" || event === null) return "";
    if ("text" in event && typeof event.text === "string") return event.text;
    if ("value" in event && typeof event.value === "string") return event.value;
    if ("content" in event && typeof event.content === "string") return event.content;
    return "";
}

export function escapeHtml(str: string) {
    return str
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&#39;");
}

export function escapeHtmlAttr(str: string) {
    return escapeHtml(str);
}

export function escapeUrl(str: string) {
    return str.replace(/"/g, "%22");
}
