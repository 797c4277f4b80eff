import { describe, it, expect } from "vitest";
import { createLowlight } from "lowlight";
import {
    highlight,
    highlightBlock,
    isLanguageSupported,
    normalizeLanguage,
    scopeOf,
    supportedLanguages,
} from "./highlight";
import type { GrammarRegistry } from "./highlight";

const join = (spans: { text: string }[]) => spans.map((s) => s.text).join("");

describe("highlight", () => {
    it("falls back to a single plain span for an unknown language", () => {
        expect(highlight("not-a-real-language", "x=1")).toEqual([{ text: "x=1", styleClass: "plain" }]);
    });

    it("returns a plain span when no language is given", () => {
        expect(highlight(undefined, "just text")).toEqual([{ text: "just text", styleClass: "plain" }]);
        expect(highlight("", "just text")).toEqual([{ text: "just text", styleClass: "plain" }]);
    });

    it("returns no spans for empty content", () => {
        expect(highlight("python", "")).toEqual([]);
        expect(highlight(undefined, "")).toEqual([]);
    });

    it("classifies javascript tokens", () => {
        const spans = highlight("javascript", 'const x = "hi"; // c');
        expect(spans).toContainEqual({ text: "const", styleClass: "keyword" });
        expect(spans).toContainEqual({ text: '"hi"', styleClass: "string" });
        expect(spans).toContainEqual({ text: "// c", styleClass: "comment" });
    });

    it("marks python numbers", () => {
        const spans = highlight("python", "print(1)\n");
        expect(spans).toContainEqual({ text: "1", styleClass: "number" });
        expect(join(spans)).toBe("print(1)\n");
    });

    it("accepts language names regardless of case and padding", () => {
        const spans = highlight("  JavaScript ", "let a");
        expect(spans[0]).toEqual({ text: "let", styleClass: "keyword" });
    });

    it("never drops or reorders characters", () => {
        const samples: Array<[string | undefined, string]> = [
            ["typescript", "interface A<T> {\n  a: T; // <&>\n}\n"],
            ["python", "def f(x):\n    return f'{x!r}' # \"q\"\n"],
            ["rust", "fn main() { let s = \"unterminated;\n}"],
            ["json", "{\"a\": [1, 2.5e3, true, null]}"],
            ["bash", "echo \"$HOME\" | grep -v '#'\n"],
            ["css", "a:hover { color: #fff !important }"],
            ["not-a-real-language", "\t<tab> & stuff\r\n"],
            [undefined, "é\u{1F600}"],
        ];
        for (const [language, content] of samples) {
            expect(join(highlight(language, content))).toBe(content);
        }
    });

    it("keeps highlighting after characters the grammar does not expect", () => {
        const content = "x = 1 ` $ ?\ndef f(): return 2";
        const spans = highlight("python", content);
        expect(spans).toContainEqual({ text: "def", styleClass: "keyword" });
        expect(spans).toContainEqual({ text: "return", styleClass: "keyword" });
        expect(spans).toContainEqual({ text: "2", styleClass: "number" });
        expect(join(spans)).toBe(content);
    });

    it("merges neighbouring spans of the same class", () => {
        const spans = highlight("javascript", "a");
        expect(spans).toEqual([{ text: "a", styleClass: "plain" }]);
    });
});

describe("highlightBlock", () => {
    it("reports the grammar it used", () => {
        expect(highlightBlock("Python", "x = 1").language).toBe("python");
    });

    it("reports unknown languages as a degradation", () => {
        const result = highlightBlock("klingon", "Qapla'");
        expect(result.language).toBeNull();
        expect(result.degradation).toBe("unknown-language");
        expect(result.spans).toEqual([{ text: "Qapla'", styleClass: "plain" }]);
    });

    it("falls back to plain text when the grammar throws", () => {
        const broken: GrammarRegistry = {
            registered: () => true,
            highlight: () => {
                throw new Error("grammar blew up");
            },
        };
        expect(highlightBlock("python", "x = 1", broken)).toEqual({
            spans: [{ text: "x = 1", styleClass: "plain" }],
            language: null,
            degradation: "grammar-error",
            detail: "grammar blew up",
        });
    });

    it("only knows the grammars of the registry it is given", () => {
        expect(highlightBlock("python", "x", createLowlight()).degradation).toBe("unknown-language");
    });

    it("does not report a degradation when no language was declared", () => {
        expect(highlightBlock(undefined, "x").degradation).toBeUndefined();
    });
});

describe("language lookup", () => {
    it("knows common grammars and their aliases", () => {
        expect(isLanguageSupported("python")).toBe(true);
        expect(isLanguageSupported("js")).toBe(true);
        expect(isLanguageSupported("not-a-real-language")).toBe(false);
        expect(isLanguageSupported(null)).toBe(false);
    });

    it("lists the registered grammars", () => {
        const languages = supportedLanguages();
        expect(languages).toContain("python");
        expect(languages).toContain("typescript");
        expect(languages).not.toContain("js");
    });

    it("normalizes names", () => {
        expect(normalizeLanguage(" Rust ")).toBe("rust");
        expect(normalizeLanguage("   ")).toBeNull();
        expect(normalizeLanguage(undefined)).toBeNull();
    });
});

describe("scopeOf", () => {
    it("joins the hljs scope with its sub-scopes", () => {
        expect(scopeOf({ className: ["hljs-title", "function_"] })).toBe("title.function_");
        expect(scopeOf({ className: ["hljs-keyword"] })).toBe("keyword");
    });

    it("accepts a space separated class string", () => {
        expect(scopeOf({ className: "hljs-title class_" })).toBe("title.class_");
    });

    it("returns an empty scope for elements without an hljs class", () => {
        expect(scopeOf({ className: ["language-js"] })).toBe("");
        expect(scopeOf({})).toBe("");
    });
});
