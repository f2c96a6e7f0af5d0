import { describe, expect, test } from "vitest";
import { recordEvents } from "../test-helpers";

describe("HTML blocks", () => {
    test("a block-level tag runs until a blank line", () => {
        expect(recordEvents("<div>\nhi\n</div>\n\ntext")).toEqual([
            "enter document",
            "enter html_block",
            'html "<div>\\n"',
            'html "hi\\n"',
            'html "</div>\\n"',
            "leave html_block",
            "enter paragraph",
            'normal "text"',
            "leave paragraph",
            "leave document",
        ]);
    });

    test("a comment ends on the line that closes it", () => {
        expect(recordEvents("<!-- a -->\nb")).toEqual([
            "enter document",
            "enter html_block",
            'html "<!-- a -->\\n"',
            "leave html_block",
            "enter paragraph",
            'normal "b"',
            "leave paragraph",
            "leave document",
        ]);
    });

    test("a lone custom tag cannot interrupt a paragraph", () => {
        expect(recordEvents("a\n<custom>")).toEqual([
            "enter document",
            "enter paragraph",
            'normal "a"',
            'soft_break "\\n"',
            'html "<custom>"',
            "leave paragraph",
            "leave document",
        ]);
    });

    test("noHtmlBlocks turns them into paragraphs", () => {
        expect(recordEvents("<div>", { noHtmlBlocks: true })).toEqual([
            "enter document",
            "enter paragraph",
            'html "<div>"',
            "leave paragraph",
            "leave document",
        ]);
    });

    test("noHtml disables inline HTML too", () => {
        expect(recordEvents("<div>", { noHtml: true })).toEqual([
            "enter document",
            "enter paragraph",
            'normal "<div>"',
            "leave paragraph",
            "leave document",
        ]);
    });
});
