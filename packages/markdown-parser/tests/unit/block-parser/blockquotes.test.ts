import { describe, expect, test } from "vitest";
import { recordEvents } from "../test-helpers";

const quotedParagraph = [
    "enter document",
    "enter blockquote",
    "enter paragraph",
    'normal "a"',
    'soft_break "\\n"',
    'normal "b"',
    "leave paragraph",
    "leave blockquote",
    "leave document",
];

describe("blockquotes", () => {
    test("every line carries the marker", () => {
        expect(recordEvents("> a\n> b")).toEqual(quotedParagraph);
    });

    test("paragraph text continues lazily without the marker", () => {
        expect(recordEvents("> a\nb")).toEqual(quotedParagraph);
    });

    test("a blank line ends the quote", () => {
        expect(recordEvents("> a\n\nb")).toEqual([
            "enter document",
            "enter blockquote",
            "enter paragraph",
            'normal "a"',
            "leave paragraph",
            "leave blockquote",
            "enter paragraph",
            'normal "b"',
            "leave paragraph",
            "leave document",
        ]);
    });

    test("quotes nest", () => {
        expect(recordEvents(">> a")).toEqual([
            "enter document",
            "enter blockquote",
            "enter blockquote",
            "enter paragraph",
            'normal "a"',
            "leave paragraph",
            "leave blockquote",
            "leave blockquote",
            "leave document",
        ]);
    });

    test("a lazy line cannot continue a thematic break or list", () => {
        expect(recordEvents("> ***\nb")).toEqual([
            "enter document",
            "enter blockquote",
            "enter thematic_break",
            "leave thematic_break",
            "leave blockquote",
            "enter paragraph",
            'normal "b"',
            "leave paragraph",
            "leave document",
        ]);
    });
});
