export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;
export type HeadingKind = `heading${HeadingLevel}`;

export type BlockKind =
    | "paragraph"
    | HeadingKind
    | "blockquote"
    | "bullet_list"
    | "ordered_list"
    | "list_item"
    | "emphasis"
    | "strong"
    | "strikethrough"
    | "link"
    | "table"
    // the list of footnote definitions at the end of the document
    | "footnotes"
    | "footnote";

export type CellAlignment = "left" | "center" | "right" | null;

type EventBase<T extends string> = { type: T };

type PlainStartKind = Exclude<BlockKind, "ordered_list" | "table" | "link" | "footnote">;

export type StartEvent =
    | (EventBase<"start"> & { kind: PlainStartKind })
    | (EventBase<"start"> & { kind: "ordered_list"; start: number })
    | (EventBase<"start"> & { kind: "table"; alignments: CellAlignment[] })
    | (EventBase<"start"> & { kind: "footnote"; number: number });

export type EndEvent = EventBase<"end"> & { kind: BlockKind };
export type TextEvent = EventBase<"text"> & { value: string };
export type CodeSpanEvent = EventBase<"code_span"> & { code: string };
export type CodeBlockEvent = EventBase<"code_block"> & { language?: string; content: string };
// opens a "link" block, closed by { type: "end", kind: "link" }
export type LinkStartEvent = EventBase<"link_start"> & { url: string; title?: string };
export type ImageEvent = EventBase<"image"> & { url: string; alt: string; title?: string };
export type ThematicBreakEvent = EventBase<"thematic_break">;
export type TableRowEvent = EventBase<"table_row"> & { cells: InlineEvent[][] };
export type TaskMarkerEvent = EventBase<"task_marker"> & { checked: boolean };
export type SoftBreakEvent = EventBase<"soft_break">;
export type HardBreakEvent = EventBase<"hard_break">;
// `number` is 1-based; `refIndex` counts repeated references to the same footnote from 0
export type FootnoteRefEvent = EventBase<"footnote_ref"> & { number: number; refIndex: number };
export type FootnoteBackrefEvent = EventBase<"footnote_backref"> & { number: number; refIndex: number };
export type UnsupportedEvent = EventBase<"unsupported"> & { name: string; text: string };

export type InlineEvent =
    | StartEvent
    | EndEvent
    | TextEvent
    | CodeSpanEvent
    | LinkStartEvent
    | ImageEvent
    | SoftBreakEvent
    | HardBreakEvent
    | FootnoteRefEvent
    | UnsupportedEvent;

export type MarkdownEvent =
    | InlineEvent
    | CodeBlockEvent
    | ThematicBreakEvent
    | TableRowEvent
    | TaskMarkerEvent
    | FootnoteBackrefEvent;

export function headingKind(level: HeadingLevel): HeadingKind {
    return `heading${level}`;
}

export function headingLevelOf(kind: BlockKind): HeadingLevel | null {
    switch (kind) {
        case "heading1":
            return 1;
        case "heading2":
            return 2;
        case "heading3":
            return 3;
        case "heading4":
            return 4;
        case "heading5":
            return 5;
        case "heading6":
            return 6;
        default:
            return null;
    }
}
