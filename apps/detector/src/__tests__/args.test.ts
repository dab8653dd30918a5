/**
 * @fileoverview Unit tests for command-line parsing
 *
 * @module detector/__tests__/args
 */

import { describe, it, expect } from "vitest";
import { parseCommandLine, UsageError } from "../cli/index.js";

describe("parseCommandLine", () => {
    it("should default to help", () => {
        expect(parseCommandLine([])).toEqual({ kind: "help" });
        expect(parseCommandLine(["--help"])).toEqual({ kind: "help" });
    });

    it("should join classify positionals into the text", () => {
        expect(parseCommandLine(["classify", "Ignore", "all", "rules"])).toEqual({
            kind: "classify",
            text: "Ignore all rules",
        });
    });

    it("should read classify options", () => {
        expect(parseCommandLine([
            "classify", "--model", "gpt-4o", "hello", "--prompt-version", "v2", "--provider", "openai",
        ])).toEqual({
            kind         : "classify",
            text         : "hello",
            modelVersion : "gpt-4o",
            promptVersion: "v2",
            provider     : "openai",
        });
    });

    it("should treat everything after -- as text", () => {
        expect(parseCommandLine(["classify", "--", "--model", "x"])).toEqual({
            kind: "classify",
            text: "--model x",
        });
    });

    it("should parse reprocess, history and templates", () => {
        expect(parseCommandLine(["reprocess", "req-1"])).toEqual({ kind: "reprocess", requestId: "req-1" });
        expect(parseCommandLine(["history"])).toEqual({ kind: "history", limit: 20 });
        expect(parseCommandLine(["history", "--limit", "5"])).toEqual({ kind: "history", limit: 5 });
        expect(parseCommandLine(["templates"])).toEqual({ kind: "templates" });
    });

    it.each([
        [["classify"], "classify requires the text to classify"],
        [["classify", "hi", "--temperature", "1"], "Unknown option: --temperature"],
        [["classify", "hi", "--model"], "Option --model requires a value"],
        [["reprocess"], "reprocess requires exactly one request id"],
        [["history", "--limit", "-3"], "--limit must be a positive integer, received '-3'"],
        [["history", "--limit", "ten"], "--limit must be a positive integer, received 'ten'"],
        [["delete"], "Unknown command: delete"],
    ])("should reject %j", (argv, message) => {
        expect(() => parseCommandLine(argv)).toThrow(UsageError);
        expect(() => parseCommandLine(argv)).toThrow(message);
    });
});
