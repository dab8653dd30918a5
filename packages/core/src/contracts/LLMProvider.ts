/**
 * LLM Provider Contract
 *
 * A provider is an interchangeable backend that turns a rendered prompt into
 * raw completion text. Transport details (HTTP, SDK, auth) stay inside the
 * implementation.
 *
 * Rules:
 * - classify() returns the completion text untouched
 * - Any backend failure surfaces as a ProviderError
 * - No retries; retry policy belongs to the caller
 * - normalize() applies the same rules as the response normalizer
 */

import type { ReprocessedVerdict } from "./ClassificationVerdict.js";
import type { DetectorLogger } from "./Logger.js";

/**
 * Per-call options supplied by the caller.
 */
export interface ProviderCallOptions {
    /** Abort the call after this many milliseconds */
    readonly timeoutMs?: number;

    /** Caller-owned cancellation signal */
    readonly signal?: AbortSignal;
}

/**
 * LLM provider interface.
 *
 * @example
 * ```typescript
 * const echoProvider: LLMProvider = {
 *     id: "echo",
 *     async classify() {
 *         return '{"classification":"benign","confidence":0.9,"reasoning":"echo"}';
 *     },
 *     normalize: reprocessResponse,
 * };
 * ```
 */
export interface LLMProvider {
    /** Name the provider is registered under */
    readonly id: string;

    /**
     * Send the rendered prompt to the backend.
     *
     * @param prompt - Rendered detection prompt (user message)
     * @param model - Backend model identifier
     * @param options - Caller timeout and cancellation
     * @returns Raw completion text
     * @throws ProviderError on any backend failure
     */
    classify(prompt: string, model: string, options?: ProviderCallOptions): Promise<string>;

    /**
     * Reprocess a previously stored raw response.
     *
     * @param rawText - Completion text as stored
     * @param promptVersion - Prompt version it was produced with
     * @param modelVersion - Model it was produced with
     */
    normalize(rawText: string, promptVersion: string, modelVersion: string): ReprocessedVerdict;
}

/**
 * Options handed to a provider factory by the registry.
 */
export interface ProviderFactoryOptions {
    /** Backend credential; implementations may fall back to the environment */
    readonly apiKey?: string;

    readonly logger?: DetectorLogger;

    /** Provider-specific settings */
    readonly settings?: Readonly<Record<string, unknown>>;
}

/**
 * Constructor function registered for a provider name.
 */
export type ProviderFactory = (options: ProviderFactoryOptions) => LLMProvider;

