/**
 * @fileoverview Unit tests for environment configuration
 *
 * @module detector/__tests__/loadConfig
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@injection-detector/core";
import { loadConfig, DEFAULT_CONFIG } from "../config/index.js";

describe("loadConfig", () => {
    it("should use defaults for an empty environment", () => {
        expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it("should read every supported variable", () => {
        const config = loadConfig({
            OPENAI_API_KEY        : "test-secret",
            DEFAULT_LLM_PROVIDER  : "openai",
            DEFAULT_MODEL         : "gpt-4o-mini",
            DEFAULT_PROMPT_VERSION: "v3",
            DETECTOR_DB_PATH      : "/var/lib/detector/audit.db",
            DETECTOR_AUDIT_ENABLED: "false",
            DETECTOR_TIMEOUT_MS   : "5000",
            PROMPT_TEMPLATES_FILE : "config/templates.yml",
            LOG_LEVEL             : "DEBUG",
        });

        expect(config).toEqual({
            appName   : "Prompt Injection Detector",
            appVersion: "0.1.0",
            provider  : { name: "openai", apiKey: "test-secret" },
            defaults  : { modelVersion: "gpt-4o-mini", promptVersion: "v3" },
            audit     : { enabled: false, databasePath: "/var/lib/detector/audit.db" },
            requestTimeoutMs: 5000,
            templatesFile   : "config/templates.yml",
            logLevel        : "debug",
        });
    });

    it("should treat blank values as unset", () => {
        const config = loadConfig({ DEFAULT_MODEL: "   ", OPENAI_API_KEY: "" });

        expect(config.defaults.modelVersion).toBe("gpt-4.1-nano");
        expect(config.provider).toEqual({ name: "openai" });
    });

    it.each([
        ["DETECTOR_AUDIT_ENABLED", "maybe", "DETECTOR_AUDIT_ENABLED must be a boolean, received 'maybe'"],
        ["DETECTOR_TIMEOUT_MS", "0", "DETECTOR_TIMEOUT_MS must be a positive integer, received '0'"],
        ["DETECTOR_TIMEOUT_MS", "2.5", "DETECTOR_TIMEOUT_MS must be a positive integer, received '2.5'"],
        ["LOG_LEVEL", "verbose", "LOG_LEVEL must be one of debug, info, warn, error; received 'verbose'"],
    ])("should reject %s=%s", (key, value, message) => {
        expect(() => loadConfig({ [key]: value })).toThrow(ConfigurationError);
        expect(() => loadConfig({ [key]: value })).toThrow(message);
    });

    it("should accept yes/no style booleans", () => {
        expect(loadConfig({ DETECTOR_AUDIT_ENABLED: "no" }).audit.enabled).toBe(false);
        expect(loadConfig({ DETECTOR_AUDIT_ENABLED: "1" }).audit.enabled).toBe(true);
    });
});
