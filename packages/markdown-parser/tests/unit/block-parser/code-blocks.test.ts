import { describe, expect, test } from "vitest";
import { collectBlocks, recordEvents } from "../test-helpers";

describe("fenced code blocks", () => {
    test("report info string, language and fence character", () => {
        const [, code] = collectBlocks("```js extra\nlet x;\n```");
        expect(code).toEqual({
            type: "code_block",
            info: { text: "js extra", substrTypes: ["normal"], substrOffsets: [0, 8] },
            lang: { text: "js", substrTypes: ["normal"], substrOffsets: [0, 2] },
            fenceChar: "`",
        });
    });

    test("emit each content line with its line ending", () => {
        expect(recordEvents("~~~\na\n\n*b*\n~~~")).toEqual([
            "enter document",
            "enter code_block",
            'code "a\\n"',
            'code "\\n"',
            'code "*b*\\n"',
            "leave code_block",
            "leave document",
        ]);
    });

    test("the opening fence indentation is removed from content", () => {
        expect(recordEvents("  ```\n    a\n  ```")).toEqual([
            "enter document",
            "enter code_block",
            'code "  a\\n"',
            "leave code_block",
            "leave document",
        ]);
    });

    test("a shorter fence does not close the block", () => {
        expect(recordEvents("````\n```\n````")).toEqual([
            "enter document",
            "enter code_block",
            'code "```\\n"',
            "leave code_block",
            "leave document",
        ]);
    });

    test("an unclosed fence runs to the end of the document", () => {
        expect(recordEvents("```\na")).toEqual(["enter document", "enter code_block", 'code "a\\n"', "leave code_block", "leave document"]);
    });

    test("entities in the info string become entity substrings", () => {
        const [, code] = collectBlocks("``` a&amp;b\n```");
        expect(code).toEqual({
            type: "code_block",
            info: { text: "a&amp;b", substrTypes: ["normal", "entity", "normal"], substrOffsets: [0, 1, 6, 7] },
            lang: { text: "a&amp;b", substrTypes: ["normal", "entity", "normal"], substrOffsets: [0, 1, 6, 7] },
            fenceChar: "`",
        });
    });
});

describe("indented code blocks", () => {
    test("keep inner blank lines and drop trailing ones", () => {
        expect(recordEvents("    a\n\n    b\n\n")).toEqual([
            "enter document",
            "enter code_block",
            'code "a\\n"',
            'code "\\n"',
            'code "b\\n"',
            "leave code_block",
            "leave document",
        ]);
    });

    test("have no info and no fence", () => {
        const [, code] = collectBlocks("    x");
        expect(code).toEqual({
            type: "code_block",
            info: { text: "", substrTypes: [], substrOffsets: [0] },
            lang: { text: "", substrTypes: [], substrOffsets: [0] },
            fenceChar: null,
        });
    });

    test("are disabled by noIndentedCodeBlocks", () => {
        expect(recordEvents("    x", { noIndentedCodeBlocks: true })).toEqual([
            "enter document",
            "enter paragraph",
            'normal "x"',
            "leave paragraph",
            "leave document",
        ]);
    });

    test("NUL characters in code are reported separately", () => {
        expect(recordEvents("    a\0b")).toEqual([
            "enter document",
            "enter code_block",
            'code "a"',
            'null_char "\\u0000"',
            'code "b\\n"',
            "leave code_block",
            "leave document",
        ]);
    });
});
