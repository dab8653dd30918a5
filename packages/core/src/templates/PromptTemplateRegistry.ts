/**
 * @fileoverview Prompt Template Registry
 *
 * Maps a prompt version to its template. Registration happens at startup;
 * after that the registry is only read.
 *
 * @module @injection-detector/core/templates/PromptTemplateRegistry
 */

import type { PromptTemplate, PromptVersion } from "../contracts/PromptTemplate.js";
import {
    TemplateRegistrationError,
    UnknownTemplateVersionError,
} from "../contracts/errors.js";
import { BUILTIN_TEMPLATES } from "./builtin.js";

/**
 * Prompt Template Registry
 *
 * @example
 * ```typescript
 * const registry = createTemplateRegistry();
 *
 * registry.register(createPromptTemplate("v4", customBody));
 *
 * const prompt = registry.get("v3").render(userText);
 * ```
 */
export class PromptTemplateRegistry {
    private readonly templates: Map<PromptVersion, PromptTemplate> = new Map();

    /**
     * Register a template under its version.
     *
     * @throws TemplateRegistrationError if the version is already taken;
     *         released versions are never reinterpreted
     */
    register(template: PromptTemplate): void {
        if (template.version.trim().length === 0) {
            throw new TemplateRegistrationError("Template version must not be empty");
        }

        if (this.templates.has(template.version)) {
            throw new TemplateRegistrationError(
                `Prompt version ${template.version} is already registered`
            );
        }

        this.templates.set(template.version, template);
    }

    /**
     * Look up the template for a version.
     *
     * @throws UnknownTemplateVersionError if nothing is registered under it
     */
    get(version: PromptVersion): PromptTemplate {
        const template = this.templates.get(version);

        if (!template) {
            throw new UnknownTemplateVersionError(version, this.versions());
        }

        return template;
    }

    has(version: PromptVersion): boolean {
        return this.templates.has(version);
    }

    /**
     * Registered versions in registration order.
     */
    versions(): PromptVersion[] {
        return Array.from(this.templates.keys());
    }

    /**
     * Registered templates in registration order.
     */
    list(): PromptTemplate[] {
        return Array.from(this.templates.values());
    }
}

/**
 * Create a registry holding the built-in templates plus any extras.
 *
 * @param extra - Additional templates, registered after the built-ins
 */
export function createTemplateRegistry(extra: readonly PromptTemplate[] = []): PromptTemplateRegistry {
    const registry = new PromptTemplateRegistry();

    for (const template of [...BUILTIN_TEMPLATES, ...extra]) {
        registry.register(template);
    }

    return registry;
}
