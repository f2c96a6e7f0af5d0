import { describe, expect, test } from "vitest";
import type { InlineNode } from "@/ast";
import { resolveDialect, type DialectFlags } from "@/config";
import { parseInlineString, type InlineContext } from "@/inline-parser";
import type { RefDefinition } from "@/parser-helpers";

function context(flags: DialectFlags = {}, refs: RefDefinition[] = []): InlineContext {
    return {
        dialect: resolveDialect(flags),
        refDefinitions: new Map(refs.map(ref => [ref.label, ref])),
    };
}

function text(value: string): InlineNode {
    return { type: "text", value };
}

describe("parseInlineString - emphasis", () => {
    test("single asterisks make emphasis", () => {
        expect(parseInlineString("*a* b", context())).toEqual([
            { type: "span", span: { type: "emphasis" }, children: [text("a")] },
            text(" b"),
        ]);
    });

    test("double asterisks make strong emphasis", () => {
        expect(parseInlineString("**a**", context())).toEqual([
            { type: "span", span: { type: "strong" }, children: [text("a")] },
        ]);
    });

    test("a run of three nests strong inside emphasis", () => {
        expect(parseInlineString("***a***", context())).toEqual([
            {
                type: "span",
                span: { type: "emphasis" },
                children: [{ type: "span", span: { type: "strong" }, children: [text("a")] }],
            },
        ]);
    });

    test("intraword underscores stay literal", () => {
        expect(parseInlineString("snake_case_name", context())).toEqual([text("snake_case_name")]);
    });

    test("underscores become underline with the underline flag", () => {
        expect(parseInlineString("_a_", context({ underline: true }))).toEqual([
            { type: "span", span: { type: "underline" }, children: [text("a")] },
        ]);
    });

    test("tildes make strikethrough only when enabled", () => {
        expect(parseInlineString("~~a~~", context())).toEqual([text("~~a~~")]);
        expect(parseInlineString("~~a~~", context({ strikethrough: true }))).toEqual([
            { type: "span", span: { type: "strikethrough" }, children: [text("a")] },
        ]);
        expect(parseInlineString("~~~a~~~", context({ strikethrough: true }))).toEqual([text("~~~a~~~")]);
    });
});

describe("parseInlineString - code spans and escapes", () => {
    test("code span content is taken verbatim", () => {
        expect(parseInlineString("`a  *b*`", context())).toEqual([{ type: "code", value: "a  *b*" }]);
    });

    test("one surrounding space is stripped", () => {
        expect(parseInlineString("`` a ` b ``", context())).toEqual([{ type: "code", value: "a ` b" }]);
    });

    test("an unmatched backtick run is text", () => {
        expect(parseInlineString("``a`", context())).toEqual([text("``a`")]);
    });

    test("backslash escapes punctuation", () => {
        expect(parseInlineString("a\\*b\\q", context())).toEqual([text("a*b\\q")]);
    });
});

describe("parseInlineString - line breaks", () => {
    test("two trailing spaces make a hard break", () => {
        expect(parseInlineString("a  \nb", context())).toEqual([text("a"), { type: "hard_break" }, text("b")]);
    });

    test("a backslash before the line ending makes a hard break", () => {
        expect(parseInlineString("a\\\n  b", context())).toEqual([text("a"), { type: "hard_break" }, text("b")]);
    });

    test("a single trailing space makes a soft break", () => {
        expect(parseInlineString("a \nb", context())).toEqual([text("a"), { type: "soft_break" }, text("b")]);
    });
});

describe("parseInlineString - links", () => {
    test("inline link with a title", () => {
        expect(parseInlineString('[x](/u "t")', context())).toEqual([
            {
                type: "span",
                span: {
                    type: "link",
                    href: { text: "/u", substrTypes: ["normal"], substrOffsets: [0, 2] },
                    title: { text: "t", substrTypes: ["normal"], substrOffsets: [0, 1] },
                    isAutolink: false,
                },
                children: [text("x")],
            },
        ]);
    });

    test("shortcut reference uses the link text as label", () => {
        const ctx = context({}, [{ label: "FOO", destination: "/f", title: null }]);
        expect(parseInlineString("[Foo]", ctx)).toEqual([
            {
                type: "span",
                span: {
                    type: "link",
                    href: { text: "/f", substrTypes: ["normal"], substrOffsets: [0, 2] },
                    title: { text: "", substrTypes: [], substrOffsets: [0] },
                    isAutolink: false,
                },
                children: [text("Foo")],
            },
        ]);
    });

    test("full reference uses the second label", () => {
        const ctx = context({}, [{ label: "BAR", destination: "/b", title: null }]);
        const nodes = parseInlineString("[text][bar] after", ctx);
        expect(nodes).toHaveLength(2);
        expect(nodes[1]).toEqual(text(" after"));
    });

    test("an unresolved reference stays text", () => {
        expect(parseInlineString("[a]", context())).toEqual([text("[a]")]);
    });

    test("images keep their description as children", () => {
        expect(parseInlineString("![*a*](/i.png)", context())).toEqual([
            {
                type: "span",
                span: {
                    type: "image",
                    src: { text: "/i.png", substrTypes: ["normal"], substrOffsets: [0, 6] },
                    title: { text: "", substrTypes: [], substrOffsets: [0] },
                },
                children: [{ type: "span", span: { type: "emphasis" }, children: [text("a")] }],
            },
        ]);
    });

    test("links may not contain links", () => {
        const nodes = parseInlineString("[a [b](/b)](/a)", context());
        expect(nodes[0]).toEqual(text("[a "));
        expect(nodes[2]).toEqual(text("](/a)"));
    });

    test("angle-bracket autolinks", () => {
        expect(parseInlineString("<http://a.b>", context())).toEqual([
            {
                type: "span",
                span: {
                    type: "link",
                    href: { text: "http://a.b", substrTypes: ["normal"], substrOffsets: [0, 10] },
                    title: { text: "", substrTypes: [], substrOffsets: [0] },
                    isAutolink: true,
                },
                children: [text("http://a.b")],
            },
        ]);
    });

    test("e-mail autolinks get a mailto: destination", () => {
        const [node] = parseInlineString("<a@b.co>", context());
        expect(node).toEqual({
            type: "span",
            span: {
                type: "link",
                href: { text: "mailto:a@b.co", substrTypes: ["normal"], substrOffsets: [0, 13] },
                title: { text: "", substrTypes: [], substrOffsets: [0] },
                isAutolink: true,
            },
            children: [text("a@b.co")],
        });
    });
});

describe("parseInlineString - HTML and entities", () => {
    test("raw HTML tags", () => {
        expect(parseInlineString("a <b>c", context())).toEqual([text("a "), { type: "raw_html", value: "<b>" }, text("c")]);
    });

    test("raw HTML is text when HTML spans are off", () => {
        expect(parseInlineString("a <b>c", context({ noHtmlSpans: true }))).toEqual([text("a <b>c")]);
    });

    test("known entities are kept apart, unknown ones are text", () => {
        expect(parseInlineString("&copy; &bogus;", context())).toEqual([
            { type: "entity", raw: "&copy;" },
            text(" &bogus;"),
        ]);
    });

    test("NUL characters are reported on their own", () => {
        expect(parseInlineString("a\0b", context())).toEqual([text("a"), { type: "null_char" }, text("b")]);
    });
});

describe("parseInlineString - math and wiki links", () => {
    test("dollar signs delimit math when enabled", () => {
        const ctx = context({ latexMathSpans: true });
        expect(parseInlineString("$x+y$", ctx)).toEqual([{ type: "math", display: false, value: "x+y" }]);
        expect(parseInlineString("$$a$$", ctx)).toEqual([{ type: "math", display: true, value: "a" }]);
        expect(parseInlineString("$ a$", ctx)).toEqual([text("$ a$")]);
    });

    test("dollar signs are text by default", () => {
        expect(parseInlineString("$x$", context())).toEqual([text("$x$")]);
    });

    test("wiki links with and without a label", () => {
        const ctx = context({ wikiLinks: true });
        expect(parseInlineString("[[Page]]", ctx)).toEqual([
            {
                type: "span",
                span: { type: "wiki_link", target: { text: "Page", substrTypes: ["normal"], substrOffsets: [0, 4] } },
                children: [text("Page")],
            },
        ]);
        expect(parseInlineString("[[Page|the *label*]]", ctx)).toEqual([
            {
                type: "span",
                span: { type: "wiki_link", target: { text: "Page", substrTypes: ["normal"], substrOffsets: [0, 4] } },
                children: [text("the "), { type: "span", span: { type: "emphasis" }, children: [text("label")] }],
            },
        ]);
    });
});

describe("parseInlineString - permissive autolinks", () => {
    test("www addresses get an http:// destination", () => {
        const nodes = parseInlineString("see www.example.com.", context({ permissiveWwwAutolinks: true }));
        expect(nodes).toEqual([
            text("see "),
            {
                type: "span",
                span: {
                    type: "link",
                    href: { text: "http://www.example.com", substrTypes: ["normal"], substrOffsets: [0, 22] },
                    title: { text: "", substrTypes: [], substrOffsets: [0] },
                    isAutolink: true,
                },
                children: [text("www.example.com")],
            },
            text("."),
        ]);
    });

    test("text inside an explicit link is left alone", () => {
        const nodes = parseInlineString("[www.a.com](/x)", context({ permissiveAutolinks: true }));
        expect(nodes).toHaveLength(1);
        const [link] = nodes;
        expect(link.type === "span" && link.children).toEqual([text("www.a.com")]);
    });
});
