import { describe, expect, test } from "vitest";
import { buildAttribute, emptyAttribute } from "@/attribute";

describe("buildAttribute", () => {
    test("splits entity references into their own substrings", () => {
        expect(buildAttribute("a&amp;b")).toEqual({
            text: "a&amp;b",
            substrTypes: ["normal", "entity", "normal"],
            substrOffsets: [0, 1, 6, 7],
        });
    });

    test("resolves backslash escapes into normal text", () => {
        expect(buildAttribute("x\\*y")).toEqual({
            text: "x*y",
            substrTypes: ["normal"],
            substrOffsets: [0, 3],
        });
    });

    test("keeps a backslash before a non-punctuation character", () => {
        expect(buildAttribute("a\\b").text).toBe("a\\b");
    });

    test("reports NUL characters separately", () => {
        expect(buildAttribute("a\0b")).toEqual({
            text: "a\0b",
            substrTypes: ["normal", "null_char", "normal"],
            substrOffsets: [0, 1, 2, 3],
        });
    });

    test("can leave escapes and entities alone", () => {
        expect(buildAttribute("x\\*&amp;", { resolveEscapes: false, entities: false })).toEqual({
            text: "x\\*&amp;",
            substrTypes: ["normal"],
            substrOffsets: [0, 8],
        });
    });

    test("an empty value has a single offset", () => {
        expect(buildAttribute("")).toEqual({ text: "", substrTypes: [], substrOffsets: [0] });
        expect(emptyAttribute()).toEqual({ text: "", substrTypes: [], substrOffsets: [0] });
    });
});
