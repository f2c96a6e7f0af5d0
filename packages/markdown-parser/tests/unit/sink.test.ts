import { describe, expect, test } from "vitest";
import { AllocationError } from "@/errors";
import { StringSink } from "@/sink";

describe("StringSink", () => {
    test("joins written chunks", () => {
        const sink = new StringSink();
        sink.write("<p>");
        sink.write("hi");
        sink.write("</p>");
        expect(sink.toString()).toBe("<p>hi</p>");
        expect(sink.length).toBe(9);
    });

    test("rejects a write that would pass the limit and keeps earlier output", () => {
        const sink = new StringSink({ limit: 5 });
        sink.write("abc");
        expect(() => sink.write("def")).toThrow(AllocationError);
        expect(sink.toString()).toBe("abc");
    });

    test("a write that reaches the limit exactly is accepted", () => {
        const sink = new StringSink({ limit: 4 });
        sink.write("abcd");
        expect(sink.toString()).toBe("abcd");
    });
});
