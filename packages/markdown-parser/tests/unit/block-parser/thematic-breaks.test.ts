import { describe, expect, test } from "vitest";
import { collectBlocks, recordEvents } from "../test-helpers";

const types = (input: string) => collectBlocks(input).map(block => block.type);

describe("thematic breaks", () => {
    test("three or more markers of one kind", () => {
        expect(types("***")).toEqual(["document", "thematic_break"]);
        expect(types("_ _ _ _")).toEqual(["document", "thematic_break"]);
        expect(types(" - - -")).toEqual(["document", "thematic_break"]);
    });

    test("two markers or mixed markers are paragraph text", () => {
        expect(types("**")).toEqual(["document", "paragraph"]);
        expect(types("*-*")).toEqual(["document", "paragraph"]);
    });

    test("interrupt a paragraph", () => {
        expect(recordEvents("a\n***")).toEqual([
            "enter document",
            "enter paragraph",
            'normal "a"',
            "leave paragraph",
            "enter thematic_break",
            "leave thematic_break",
            "leave document",
        ]);
    });

    test("dashes under a paragraph make a heading instead", () => {
        expect(types("a\n---")).toEqual(["document", "heading"]);
    });

    test("win over a list item", () => {
        expect(types("* * *")).toEqual(["document", "thematic_break"]);
    });

    test("four spaces of indentation make code", () => {
        expect(types("    ***")).toEqual(["document", "code_block"]);
    });
});
