/**
 * @fileoverview Provider Registry
 *
 * Register by name, construct by name. Backends are added by registering a
 * factory, never by branching on a provider name in the pipeline.
 *
 * @module @injection-detector/core/providers/ProviderRegistry
 */

import type {
    LLMProvider,
    ProviderFactory,
    ProviderFactoryOptions,
} from "../contracts/LLMProvider.js";
import { ProviderNotRegisteredError } from "../contracts/errors.js";

/**
 * Provider Registry
 *
 * Populated once at startup, before the first request is served.
 *
 * @example
 * ```typescript
 * const providers = new ProviderRegistry();
 * providers.register("openai", (options) => new OpenAIProvider(options));
 *
 * const provider = providers.create("openai", { apiKey });
 * ```
 */
export class ProviderRegistry {
    private readonly factories: Map<string, ProviderFactory> = new Map();

    /**
     * Register a factory under a provider name.
     * Registering the same name again replaces the previous factory.
     */
    register(name: string, factory: ProviderFactory): void {
        this.factories.set(name, factory);
    }

    /**
     * Construct a provider by name.
     *
     * @throws ProviderNotRegisteredError if nothing is registered under the name
     */
    create(name: string, options: ProviderFactoryOptions = {}): LLMProvider {
        const factory = this.factories.get(name);

        if (!factory) {
            throw new ProviderNotRegisteredError(name, this.names());
        }

        return factory(options);
    }

    has(name: string): boolean {
        return this.factories.has(name);
    }

    names(): string[] {
        return Array.from(this.factories.keys());
    }
}
