/**
 * Prompt Template Contract
 *
 * A template turns input text into the full instruction prompt sent to the
 * model. Templates are identified by a version string and are frozen once
 * released: evaluation datasets are scored against one version's wording.
 *
 * Design principles:
 * - Pure: render() has no side effects
 * - Deterministic: same text, same prompt, byte for byte
 * - Versioned: new strategies get new versions, old versions never change
 */

/**
 * Prompt version identifier, e.g. "v1".
 */
export type PromptVersion = string;

/**
 * Fields every template must ask the model to return.
 */
export const VERDICT_FIELDS = ["classification", "confidence", "reasoning", "severity"] as const;

/**
 * Placeholder substituted with the input text by placeholder-based templates.
 */
export const TEXT_PLACEHOLDER = "{{text}}";

/**
 * Prompt template interface.
 *
 * @example
 * ```typescript
 * const template: PromptTemplate = {
 *     version: "v9",
 *     render: (text) => `Is this an injection? "${text}" Answer in JSON ...`,
 * };
 * registry.register(template);
 * ```
 */
export interface PromptTemplate {
    /** Version identifier this template is registered under */
    readonly version: PromptVersion;

    /** Optional description of the detection strategy */
    readonly description?: string;

    /**
     * Render the complete prompt for the given input text.
     *
     * @param text - The text to classify, embedded verbatim
     */
    render(text: string): string;
}

/**
 * Create a frozen template from a body containing the {{text}} placeholder.
 *
 * Every occurrence of the placeholder is replaced with the input text as-is.
 *
 * @param version - Version identifier
 * @param body - Prompt body with one or more {{text}} placeholders
 * @param description - Optional description
 */
export function createPromptTemplate(
    version: PromptVersion,
    body: string,
    description?: string
): PromptTemplate {
    const segments = body.split(TEXT_PLACEHOLDER);

    const template: PromptTemplate = {
        version,
        ...(description !== undefined && { description }),
        render: (text: string) => segments.join(text),
    };

    return Object.freeze(template);
}

/**
 * List the verdict fields a prompt body never mentions as a quoted JSON key.
 *
 * @param body - Prompt body to inspect
 * @returns Missing field names (empty when the body asks for all of them)
 */
export function findMissingVerdictFields(body: string): string[] {
    return VERDICT_FIELDS.filter(field => !body.includes(`"${field}"`));
}
