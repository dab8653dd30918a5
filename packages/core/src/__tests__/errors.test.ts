/**
 * @fileoverview Unit tests for the detector error taxonomy
 *
 * @module @injection-detector/core/__tests__/errors
 */

import { describe, it, expect } from "vitest";
import {
    ConfigurationError,
    DetectorError,
    DetectorErrorCode,
    ProviderError,
    ProviderNotRegisteredError,
    UnknownTemplateVersionError,
    UnsupportedProviderError,
    describeError,
    isDetectorError,
} from "../contracts/errors.js";

describe("errors", () => {
    it("should classify provider and template rejections as client errors", () => {
        expect(new UnsupportedProviderError("anthropic", "openai").isClientError()).toBe(true);
        expect(new UnknownTemplateVersionError("v9", ["v1"]).isClientError()).toBe(true);
    });

    it("should not classify backend and wiring failures as client errors", () => {
        expect(new ProviderError("openai", "timeout").isClientError()).toBe(false);
        expect(new ProviderNotRegisteredError("x", []).isClientError()).toBe(false);
        expect(new ConfigurationError("bad").isClientError()).toBe(false);
    });

    it("should format the unsupported provider message", () => {
        const error = new UnsupportedProviderError("anthropic", "openai");

        expect(error.message).toBe("Provider 'anthropic' is not supported. Only 'openai' is available.");
        expect(error.code).toBe(DetectorErrorCode.UNSUPPORTED_PROVIDER);
        expect(error.name).toBe("UnsupportedProviderError");
        expect(error).toBeInstanceOf(DetectorError);
    });

    it("should keep the cause on provider errors", () => {
        const cause = new Error("ECONNRESET");
        const error = new ProviderError("openai", "ECONNRESET", cause);

        expect(error.message).toBe("Provider 'openai' failed: ECONNRESET");
        expect(error.cause).toBe(cause);
        expect(error.providerId).toBe("openai");
    });

    it("should serialize to JSON with code and context", () => {
        const error = new UnknownTemplateVersionError("v9", ["v1", "v2"]);
        const json = error.toJSON();

        expect(json).toMatchObject({
            name   : "UnknownTemplateVersionError",
            message: "Prompt version v9 not found",
            code   : "E1002",
            context: { version: "v9", available: ["v1", "v2"] },
        });
        expect(typeof json.timestamp).toBe("string");
    });

    it("should include the code in toString", () => {
        expect(new ConfigurationError("OPENAI_API_KEY is not set").toString()).toBe(
            "[E9001] ConfigurationError: OPENAI_API_KEY is not set"
        );
    });

    it("should describe any thrown value", () => {
        expect(describeError(new Error("boom"))).toBe("boom");
        expect(describeError("plain")).toBe("plain");
        expect(isDetectorError(new Error("boom"))).toBe(false);
        expect(isDetectorError(new ConfigurationError("x"))).toBe(true);
    });
});
