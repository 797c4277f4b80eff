import { describe, test, expect } from "vitest";
import { DebugLog } from "markdown-renderer";
import { createRenderConfig } from "../../src/config";
import { convertMarkdownToPdf, markdownToDocument } from "../../src/convert";
import { RenderError } from "../../src/errors";
import { FakeCapability } from "./test-helpers";

const source = "# Title\n\n```python\nprint(1)\n```\n";

describe("convertMarkdownToPdf", () => {
    test("renders a heading and a python block into a pdf", async () => {
        const capability = new FakeCapability();
        const config = createRenderConfig({ outputPath: "out.pdf", marginPixels: 50 });

        const { pdf, document } = await convertMarkdownToPdf(source, config, { capability, title: "Title" });

        expect(document.htmlBody.match(/<h1>Title<\/h1>/g)).toHaveLength(1);
        expect(document.htmlBody.match(/<div class="code-block" data-language="python">/g)).toHaveLength(1);
        expect(document.htmlBody).toContain('<span class="hl-number" style="color:#d08770">1</span>');
        expect(pdf.byteLength).toBeGreaterThan(0);
        expect(pdf.byteLength).toBe(new TextEncoder().encode(document.html).byteLength);
        expect(capability.printedMargins).toEqual([50]);
        expect(capability.openSessions).toBe(0);
    });

    test("records a snapshot for every stage", async () => {
        const debug = new DebugLog(true);
        const config = createRenderConfig({ outputPath: "out.pdf" });

        const { pdf } = await convertMarkdownToPdf(source, config, { capability: new FakeCapability(), debug });

        const stages = debug.getSnapshots().map((s) => s.stage);
        expect(stages).toEqual(["afterTransform", "afterAssemble", "afterPrint"]);
        expect(debug.getSnapshots()[2].output).toBe(`${pdf.byteLength} bytes`);
    });

    test("passes renderer failures through after releasing it", async () => {
        const capability = new FakeCapability({ failPrint: new Error("out of memory") });
        const config = createRenderConfig({ outputPath: "out.pdf" });

        await expect(convertMarkdownToPdf(source, config, { capability })).rejects.toThrow(RenderError);
        expect(capability.closeCalls).toBe(1);
    });
});

describe("markdownToDocument", () => {
    test("assembles without touching a renderer", () => {
        const document = markdownToDocument("Some *text*", { marginPixels: 20 });
        expect(document.htmlBody).toBe("<p>Some <em>text</em></p>\n");
        expect(document.css).toContain("margin-left: 20px;");
    });
});
