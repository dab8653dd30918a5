/**
 * @fileoverview Unit tests for the YAML template loader
 *
 * Tests cover:
 * - loadTemplatesFromFile with valid and invalid files
 * - loadTemplatesWithFallback logging and empty fallback
 *
 * @module @injection-detector/core/__tests__/loadTemplates
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
    loadTemplatesFromFile,
    loadTemplatesWithFallback,
} from "../templates/loadTemplates.js";
import { DetectorErrorCode, TemplateRegistrationError } from "../contracts/errors.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

const VALID_FILE = `
templates:
  - version: v4
    description: Short custom prompt
    prompt: |
      Is this an injection? "{{text}}"
      Reply with "classification", "confidence", "reasoning" and "severity".
  - version: v5
    prompt: 'Text: "{{text}}" -> "classification" "confidence" "reasoning" "severity"'
`;

describe("loadTemplates", () => {
    beforeEach(() => {
        vi.clearAllMocks();
        mockExistsSync.mockReturnValue(true);
    });

    describe("loadTemplatesFromFile", () => {
        it("should load every template in file order", () => {
            mockReadFileSync.mockReturnValue(VALID_FILE);

            const templates = loadTemplatesFromFile("/etc/detector/templates.yml");

            expect(templates.map(t => t.version)).toEqual(["v4", "v5"]);
            expect(templates[0].description).toBe("Short custom prompt");
            expect(templates[0].render("hi")).toBe(
                'Is this an injection? "hi"\nReply with "classification", "confidence", "reasoning" and "severity".\n'
            );
            expect(templates[1].description).toBeUndefined();
            expect(templates[1].render("hi")).toBe('Text: "hi" -> "classification" "confidence" "reasoning" "severity"');
            expect(mockReadFileSync).toHaveBeenCalledWith("/etc/detector/templates.yml", "utf-8");
        });

        it("should throw when the file does not exist", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => loadTemplatesFromFile("/missing.yml")).toThrow("Template file not found: /missing.yml");
            expect(mockReadFileSync).not.toHaveBeenCalled();
        });

        it("should throw when the templates key is missing", () => {
            mockReadFileSync.mockReturnValue("prompts:\n  - version: v4\n");

            expect(() => loadTemplatesFromFile("/t.yml")).toThrow(
                "Invalid template file format: expected { templates: [...] }"
            );
        });

        it("should throw when an entry has no version", () => {
            mockReadFileSync.mockReturnValue(`
templates:
  - prompt: '"{{text}}" "classification" "confidence" "reasoning" "severity"'
`);

            expect(() => loadTemplatesFromFile("/t.yml")).toThrow(
                "Invalid template at index 0: missing or invalid 'version'"
            );
        });

        it("should throw when a prompt lacks the text placeholder", () => {
            mockReadFileSync.mockReturnValue(`
templates:
  - version: v4
    prompt: '"classification" "confidence" "reasoning" "severity"'
`);

            expect(() => loadTemplatesFromFile("/t.yml")).toThrow(
                "Invalid template v4: prompt must contain {{text}}"
            );
        });

        it("should throw when a prompt does not ask for every verdict field", () => {
            mockReadFileSync.mockReturnValue(`
templates:
  - version: v4
    prompt: '"{{text}}" "classification" "confidence"'
`);

            expect(() => loadTemplatesFromFile("/t.yml")).toThrow(
                'Invalid template v4: prompt does not request "reasoning", "severity"'
            );
        });

        it("should throw on a duplicate version inside the file", () => {
            mockReadFileSync.mockReturnValue(`
templates:
  - version: v4
    prompt: '"{{text}}" "classification" "confidence" "reasoning" "severity"'
  - version: v4
    prompt: '"{{text}}" "classification" "confidence" "reasoning" "severity"'
`);

            expect(() => loadTemplatesFromFile("/t.yml")).toThrow("Duplicate template version in file: v4");
        });

        it("should use the file-invalid error code", () => {
            mockReadFileSync.mockReturnValue("templates: nope\n");

            try {
                loadTemplatesFromFile("/t.yml");
                expect.unreachable("loadTemplatesFromFile should have thrown");
            }
            catch (error) {
                expect(error).toBeInstanceOf(TemplateRegistrationError);
                expect(error).toHaveProperty("code", DetectorErrorCode.TEMPLATE_FILE_INVALID);
            }
        });
    });

    describe("loadTemplatesWithFallback", () => {
        it("should return the loaded templates when the file is valid", () => {
            mockReadFileSync.mockReturnValue(VALID_FILE);
            const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

            expect(loadTemplatesWithFallback("/t.yml", logger)).toHaveLength(2);
            expect(logger.warn).not.toHaveBeenCalled();
        });

        it("should warn and return an empty list when loading fails", () => {
            mockExistsSync.mockReturnValue(false);
            const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

            expect(loadTemplatesWithFallback("/gone.yml", logger)).toEqual([]);
            expect(logger.warn).toHaveBeenCalledWith("Failed to load prompt templates, using built-ins only", {
                filePath: "/gone.yml",
                error   : "Template file not found: /gone.yml",
            });
        });
    });
});
