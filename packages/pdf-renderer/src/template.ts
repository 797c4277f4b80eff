import { DARK_THEME } from "highlighter";

export const MARGIN_PLACEHOLDER = "{{margin}}";

// Only locally installed fonts: the renderer must never reach the network.
const SERIF = `"Crimson Text", Georgia, "Times New Roman", serif`;
const SANS = `Inter, "Helvetica Neue", Arial, sans-serif`;
const MONO = `"Fira Code", Consolas, Monaco, "DejaVu Sans Mono", monospace`;

export const DOCUMENT_CSS_TEMPLATE = `@page {
    size: A4;
    margin-top: ${MARGIN_PLACEHOLDER}px;
    margin-right: ${MARGIN_PLACEHOLDER}px;
    margin-bottom: ${MARGIN_PLACEHOLDER}px;
    margin-left: ${MARGIN_PLACEHOLDER}px;
}

* {
    margin: 0;
    padding: 0;
    box-sizing: border-box;
}

body {
    font-family: ${SERIF};
    line-height: 1.8;
    color: #2c3e50;
    background-color: #fdfcfb;
    font-size: 18px;
    -webkit-print-color-adjust: exact;
    print-color-adjust: exact;
}

.container {
    max-width: 800px;
    margin: 0 auto;
    padding: 60px 40px;
}

h1, h2, h3, h4, h5, h6 {
    font-family: ${SANS};
    color: #1a202c;
    margin-top: 2.5em;
    margin-bottom: 0.8em;
    font-weight: 700;
    line-height: 1.3;
}

h1 {
    font-size: 2.5em;
    border-bottom: 3px solid #e74c3c;
    padding-bottom: 0.3em;
    margin-bottom: 1em;
}

h1:first-child {
    margin-top: 0;
}

h2 {
    font-size: 1.9em;
    color: #2c3e50;
}

h3 {
    font-size: 1.5em;
    color: #34495e;
}

p {
    margin-bottom: 1.5em;
    text-align: justify;
    hyphens: auto;
}

a {
    color: #3498db;
    text-decoration: none;
}

del {
    color: #7f8c8d;
}

code.inline-code {
    font-family: ${MONO};
    background-color: ${DARK_THEME.background};
    color: #bf616a;
    padding: 0.2em 0.4em;
    border-radius: 4px;
    font-size: 0.85em;
    border: 1px solid #4f5b66;
}

.code-block {
    background-color: ${DARK_THEME.background};
    border-radius: 8px;
    padding: 1.5em;
    margin: 1.5em 0;
    overflow-x: auto;
    border: 1px solid #4f5b66;
}

.code-block pre {
    margin: 0;
    font-family: ${MONO};
    font-size: 0.85em;
    line-height: 1.5;
    white-space: pre-wrap;
    word-break: break-word;
}

.code-block code {
    color: ${DARK_THEME.foreground};
    background: none;
    padding: 0;
    font-family: inherit;
}

blockquote {
    border-left: 4px solid #e74c3c;
    margin: 1.5em 0;
    font-style: italic;
    color: #555;
    background-color: #f9f9f9;
    padding: 1em 1.5em;
    border-radius: 0 8px 8px 0;
}

blockquote p:last-child {
    margin-bottom: 0;
}

ul, ol {
    margin-bottom: 1.5em;
    padding-left: 2em;
}

li {
    margin-bottom: 0.5em;
}

li > input[type="checkbox"] {
    margin-right: 0.4em;
}

hr {
    border: none;
    border-top: 2px solid #ecf0f1;
    margin: 3em 0;
}

table {
    width: 100%;
    border-collapse: collapse;
    margin: 1.5em 0;
    font-size: 0.95em;
}

th, td {
    padding: 0.75em;
    text-align: left;
    border-bottom: 1px solid #ecf0f1;
}

th {
    background-color: #34495e;
    color: white;
    font-family: ${SANS};
    font-weight: 600;
}

tr:nth-child(even) {
    background-color: #f8f9fa;
}

img {
    max-width: 100%;
    height: auto;
    border-radius: 8px;
    margin: 1.5em 0;
}

.footnote-ref a, .footnote-backref {
    text-decoration: none;
}

.footnotes {
    margin-top: 3em;
    padding-top: 1em;
    border-top: 1px solid #bdc3c7;
    font-size: 0.85em;
}

@media print {
    body {
        font-size: 16px;
    }

    .container {
        max-width: none;
        padding: 0;
    }

    h1, h2, h3, h4, h5, h6 {
        page-break-after: avoid;
    }

    .code-block, table, img {
        page-break-inside: avoid;
    }
}
`;

export function renderStylesheet(marginPixels: number, template: string = DOCUMENT_CSS_TEMPLATE): string {
    return template.split(MARGIN_PLACEHOLDER).join(String(marginPixels));
}
