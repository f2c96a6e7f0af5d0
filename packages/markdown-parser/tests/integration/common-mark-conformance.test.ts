import { describe, expect, test } from "vitest";
import type { DialectFlags } from "@/config";
import { DIALECT_GITHUB } from "@/config";
import { markdownToHtml } from "@/renderer";

interface ConformanceCase {
    name: string;
    markdown: string;
    html: string;
    dialect?: DialectFlags;
}

// Hand-picked inputs covering each construct once, with the HTML a
// CommonMark renderer is expected to produce for them.
const cases: ConformanceCase[] = [
    {
        name: "setext heading with inline content",
        markdown: "Release *notes*\n===",
        html: "<h1>Release <em>notes</em></h1>\n",
    },
    { name: "ATX heading with closing sequence", markdown: "### Install steps ###", html: "<h3>Install steps</h3>\n" },
    { name: "code span", markdown: "Run `npm test` first", html: "<p>Run <code>npm test</code> first</p>\n" },
    { name: "escaped emphasis markers", markdown: "Price: \\*only\\* 5", html: "<p>Price: *only* 5</p>\n" },
    {
        name: "inline link with title",
        markdown: '[setup guide](/docs/setup "Read me first")',
        html: '<p><a href="/docs/setup" title="Read me first">setup guide</a></p>\n',
    },
    {
        name: "blockquote holding a heading",
        markdown: "> ## Reminder\n> water the plants",
        html: "<blockquote>\n<h2>Reminder</h2>\n<p>water the plants</p>\n</blockquote>\n",
    },
    {
        name: "indented code",
        markdown: "    let total = 0\n    total += 1",
        html: "<pre><code>let total = 0\ntotal += 1\n</code></pre>\n",
    },
    { name: "soft break", markdown: "first line\nsecond line", html: "<p>first line\nsecond line</p>\n" },
    { name: "backslash hard break", markdown: "street\\\ncity", html: "<p>street<br>\ncity</p>\n" },
    { name: "thematic breaks of each marker", markdown: "- - -\n\n* * * *\n\n___", html: "<hr>\n<hr>\n<hr>\n" },
    { name: "inline HTML", markdown: "Press <kbd>Ctrl</kbd> now", html: "<p>Press <kbd>Ctrl</kbd> now</p>\n" },
    {
        name: "item with two paragraphs is loose",
        markdown: "1. buy milk\n\n   check the date",
        html: "<ol>\n<li>\n<p>buy milk</p>\n<p>check the date</p>\n</li>\n</ol>\n",
    },
    {
        name: "nested tight list",
        markdown: "- fruit\n  - apples",
        html: "<ul>\n<li>fruit\n<ul>\n<li>apples</li>\n</ul>\n</li>\n</ul>\n",
    },
    {
        name: "full reference link",
        markdown: "See [the changelog][log].\n\n[log]: /changes",
        html: '<p>See <a href="/changes">the changelog</a>.</p>\n',
    },
    { name: "unmatched bracket", markdown: "[draft] not a link", html: "<p>[draft] not a link</p>\n" },
    {
        name: "strong inside emphasis",
        markdown: "*keep **this** safe*",
        html: "<p><em>keep <strong>this</strong> safe</em></p>\n",
    },
    { name: "intraword underscore", markdown: "max_retry_count", html: "<p>max_retry_count</p>\n" },
    {
        name: "email autolink",
        markdown: "<ops@example.org>",
        html: '<p><a href="mailto:ops@example.org">ops@example.org</a></p>\n',
    },
    {
        name: "permissive URL autolink",
        markdown: "see https://example.com.",
        html: '<p>see <a href="https://example.com">https://example.com</a>.</p>\n',
        dialect: DIALECT_GITHUB,
    },
    { name: "strikethrough", markdown: "~~gone~~", html: "<p><del>gone</del></p>\n", dialect: DIALECT_GITHUB },
    {
        name: "inline math",
        markdown: "$x$",
        html: "<p><x-equation>x</x-equation></p>\n",
        dialect: { latexMathSpans: true },
    },
    {
        name: "wiki link",
        markdown: "[[Page]]",
        html: '<p><x-wikilink data-target="Page">Page</x-wikilink></p>\n',
        dialect: { wikiLinks: true },
    },
    { name: "underline", markdown: "_u_", html: "<p><u>u</u></p>\n", dialect: { underline: true } },
];

describe("HTML conformance", () => {
    test.each(cases)("$name", ({ markdown, html, dialect }) => {
        expect(markdownToHtml(markdown, { dialect })).toBe(html);
    });
});
