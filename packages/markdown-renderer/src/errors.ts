import type { BlockKind } from "./events";

/**
 * Raised when the event stream does not nest: an `end` that does not close
 * the innermost open block, or blocks still open when the stream ends.
 */
export class StructuralError extends Error {
    readonly expected: BlockKind | null;
    readonly found: BlockKind | null;
    // HTML emitted before the violation
    readonly partialHtml: string;

    constructor(message: string, details: { expected: BlockKind | null; found: BlockKind | null; partialHtml: string }) {
        super(message);
        this.name = "StructuralError";
        this.expected = details.expected;
        this.found = details.found;
        this.partialHtml = details.partialHtml;
    }
}
