/**
 * @fileoverview Unit tests for ProviderRegistry
 *
 * @module @injection-detector/core/__tests__/ProviderRegistry
 */

import { describe, it, expect, vi } from "vitest";
import { ProviderRegistry } from "../providers/ProviderRegistry.js";
import { ProviderNotRegisteredError } from "../contracts/errors.js";
import type { LLMProvider, ProviderFactory } from "../contracts/LLMProvider.js";
import { reprocessResponse } from "../normalize/ResponseNormalizer.js";

function createStubProvider(id: string): LLMProvider {
    return {
        id,
        classify : vi.fn().mockResolvedValue("{}"),
        normalize: reprocessResponse,
    };
}

describe("ProviderRegistry", () => {
    it("should construct a provider through its registered factory", () => {
        const registry = new ProviderRegistry();
        const factory = vi.fn<ProviderFactory>((options) => createStubProvider(options.apiKey ?? "none"));

        registry.register("stub", factory);
        const provider = registry.create("stub", { apiKey: "test-secret" });

        expect(provider.id).toBe("test-secret");
        expect(factory).toHaveBeenCalledWith({ apiKey: "test-secret" });
    });

    it("should pass empty options when none are given", () => {
        const registry = new ProviderRegistry();
        const factory = vi.fn<ProviderFactory>(() => createStubProvider("stub"));

        registry.register("stub", factory);
        registry.create("stub");

        expect(factory).toHaveBeenCalledWith({});
    });

    it("should construct a fresh provider on every create", () => {
        const registry = new ProviderRegistry();
        registry.register("stub", () => createStubProvider("stub"));

        expect(registry.create("stub")).not.toBe(registry.create("stub"));
    });

    it("should throw ProviderNotRegisteredError listing available names", () => {
        const registry = new ProviderRegistry();
        registry.register("openai", () => createStubProvider("openai"));
        registry.register("stub", () => createStubProvider("stub"));

        expect(() => registry.create("anthropic")).toThrow(ProviderNotRegisteredError);
        expect(() => registry.create("anthropic")).toThrow(
            "Provider 'anthropic' not found. Available providers: openai, stub"
        );
    });

    it("should replace a factory registered under the same name", () => {
        const registry = new ProviderRegistry();
        registry.register("stub", () => createStubProvider("first"));
        registry.register("stub", () => createStubProvider("second"));

        expect(registry.create("stub").id).toBe("second");
        expect(registry.names()).toEqual(["stub"]);
    });

    it("should report registered names", () => {
        const registry = new ProviderRegistry();

        expect(registry.has("stub")).toBe(false);
        registry.register("stub", () => createStubProvider("stub"));
        expect(registry.has("stub")).toBe(true);
    });
});
