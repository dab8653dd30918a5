/**
 * @fileoverview Provider registration
 *
 * @module providers
 */

import type { ProviderFactoryOptions, ProviderRegistry } from "@injection-detector/core";
import { OpenAIProvider, type OpenAIProviderConfig } from "./OpenAIProvider.js";

export { OpenAIProvider, DETECTION_SYSTEM_PROMPT, type OpenAIProviderConfig } from "./OpenAIProvider.js";

/**
 * Pick the OpenAI-specific settings out of a factory's free-form settings.
 */
function readOpenAISettings(settings: ProviderFactoryOptions["settings"]): OpenAIProviderConfig {
    const config: OpenAIProviderConfig = {};
    const values: Readonly<Record<string, unknown>> = settings ?? {};
    const { temperature, maxTokens, jsonMode } = values;

    if (typeof temperature === "number") {
        config.temperature = temperature;
    }

    if (typeof maxTokens === "number") {
        config.maxTokens = maxTokens;
    }

    if (typeof jsonMode === "boolean") {
        config.jsonMode = jsonMode;
    }

    return config;
}

/**
 * Register every provider that ships with the detector.
 *
 * Call once at startup, before the first request.
 */
export function registerBuiltinProviders(registry: ProviderRegistry): void {
    registry.register("openai", (options) => new OpenAIProvider({
        ...readOpenAISettings(options.settings),
        apiKey: options.apiKey,
        logger: options.logger,
    }));
}
