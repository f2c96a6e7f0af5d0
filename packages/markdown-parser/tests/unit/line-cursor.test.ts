import { describe, expect, test } from "vitest";
import { contentLineText, LineCursor, splitLines } from "@/line-cursor";

describe("splitLines", () => {
    test("accepts every line ending", () => {
        expect(splitLines("a\nb\r\nc\rd")).toEqual([
            { beg: 0, end: 1 },
            { beg: 2, end: 3 },
            { beg: 5, end: 6 },
            { beg: 7, end: 8 },
        ]);
    });

    test("a final line ending does not open another line", () => {
        expect(splitLines("a\n")).toEqual([{ beg: 0, end: 1 }]);
        expect(splitLines("\n\n")).toEqual([
            { beg: 0, end: 0 },
            { beg: 1, end: 1 },
        ]);
        expect(splitLines("")).toEqual([]);
    });
});

describe("LineCursor", () => {
    test("measures indentation in columns", () => {
        const source = "  \tfoo";
        const cursor = new LineCursor(source);
        cursor.reset({ beg: 0, end: source.length });
        expect(cursor.nextNonspace).toBe(3);
        expect(cursor.indent).toBe(4);
        expect(cursor.indented).toBe(true);
        expect(cursor.blank).toBe(false);
    });

    test("flags blank lines", () => {
        const cursor = new LineCursor(" \t ");
        cursor.reset({ beg: 0, end: 3 });
        expect(cursor.blank).toBe(true);
    });

    test("peek returns an empty string past the end of the line", () => {
        const cursor = new LineCursor("ab\ncd");
        cursor.reset({ beg: 0, end: 2 });
        expect(cursor.peek(1)).toBe("b");
        expect(cursor.peek(2)).toBe("");
    });

    test("a partly consumed tab comes back as leading spaces", () => {
        const source = "\tfoo";
        const cursor = new LineCursor(source);
        cursor.reset({ beg: 0, end: source.length });
        cursor.advanceOffset(2, true);
        expect(cursor.partiallyConsumedTab).toBe(true);
        expect(cursor.column).toBe(2);

        const line = cursor.takeRest();
        expect(line).toEqual({ beg: 1, end: 4, indent: 2 });
        expect(contentLineText(source, line)).toBe("  foo");
    });

    test("advancing by characters consumes a whole tab", () => {
        const source = "\tfoo";
        const cursor = new LineCursor(source);
        cursor.reset({ beg: 0, end: source.length });
        cursor.advanceOffset(1, false);
        expect(cursor.offset).toBe(1);
        expect(cursor.column).toBe(4);
        expect(cursor.takeRest()).toEqual({ beg: 1, end: 4, indent: 0 });
    });
});
