import { describe, it, expect } from "vitest";
import { parseCompareArgs } from "../cli-args";

describe("parseCompareArgs", () => {
    it("takes two files with default flags", () => {
        expect(parseCompareArgs(["left.txt", "right.txt"])).toEqual({
            fileA: "left.txt",
            fileB: "right.txt",
            html: false,
            json: false,
            timing: false,
            debug: false,
            config: { tokenizer: {} },
        });
    });

    it("parses every option in any position", () => {
        const parsed = parseCompareArgs([
            "left.html", "--chunk", "250", "right.html",
            "--top", "5", "--stem", "--stop-words", "--html", "--json",
            "--label-a", "Left", "--label-b", "Right", "-t", "--debug",
        ]);

        expect(parsed).toEqual({
            fileA: "left.html",
            fileB: "right.html",
            labelA: "Left",
            labelB: "Right",
            html: true,
            json: true,
            timing: true,
            debug: true,
            config: {
                chunkLength: 250,
                topK: 5,
                tokenizer: { applyStemming: true, removeStopWords: true },
            },
        });
    });

    it("requires exactly two files", () => {
        expect(() => parseCompareArgs(["only.txt"])).toThrow("compare requires exactly two files");
        expect(() => parseCompareArgs(["a.txt", "b.txt", "c.txt"])).toThrow("compare requires exactly two files");
    });

    it("rejects non-integer numbers and unknown options", () => {
        expect(() => parseCompareArgs(["a.txt", "b.txt", "--chunk", "lots"])).toThrow('--chunk expects an integer, got "lots"');
        expect(() => parseCompareArgs(["a.txt", "b.txt", "--bogus"])).toThrow("Unknown option: --bogus");
    });
});
