/**
 * OpenAI-backed LLM provider
 *
 * Sends the rendered detection prompt as the user message under a fixed
 * security-assistant system instruction and returns the completion text.
 * Parsing is left to the response normalizer.
 */

import OpenAI from "openai";
import {
    ConfigurationError,
    ProviderError,
    createConsoleLogger,
    describeError,
    reprocessResponse,
    type DetectorLogger,
    type LLMProvider,
    type ProviderCallOptions,
    type ReprocessedVerdict,
} from "@injection-detector/core";

/**
 * System instruction sent with every detection prompt.
 */
export const DETECTION_SYSTEM_PROMPT = "You are a cybersecurity assistant that detects prompt injection attacks.";

/**
 * Configuration options for the OpenAI provider
 */
export interface OpenAIProviderConfig {
    /** OpenAI API key (defaults to OPENAI_API_KEY env var) */
    apiKey?: string;

    /** Temperature for responses (default: 0.1 for consistency) */
    temperature?: number;

    /** Maximum tokens for response (default: no limit) */
    maxTokens?: number;

    /** Ask for a JSON object response format (default: true) */
    jsonMode?: boolean;

    logger?: DetectorLogger;
}

/**
 * OpenAI provider implementation
 *
 * SDK retries are off; a failed call surfaces as a ProviderError.
 */
export class OpenAIProvider implements LLMProvider {
    readonly id: string;

    private readonly client: OpenAI;
    private readonly temperature: number;
    private readonly maxTokens: number | undefined;
    private readonly jsonMode: boolean;
    private readonly logger: DetectorLogger;

    constructor(config: OpenAIProviderConfig = {}, id: string = "openai") {
        this.id = id;

        const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY;
        if (!apiKey) {
            throw new ConfigurationError("OPENAI_API_KEY is not set", { providerId: id });
        }

        this.client = new OpenAI({ apiKey, maxRetries: 0 });

        this.temperature = config.temperature ?? 0.1;
        this.maxTokens = config.maxTokens;
        this.jsonMode = config.jsonMode ?? true;
        this.logger = config.logger ?? createConsoleLogger("OpenAIProvider");
    }

    /**
     * Send the prompt and return the raw completion text.
     *
     * @throws ProviderError on transport, auth, quota or empty-response failures
     */
    async classify(prompt: string, model: string, options: ProviderCallOptions = {}): Promise<string> {
        let content: string | null | undefined;

        try {
            const response = await this.client.chat.completions.create(
                {
                    model,
                    temperature: this.temperature,
                    ...(this.maxTokens !== undefined && { max_tokens: this.maxTokens }),
                    ...(this.jsonMode && { response_format: { type: "json_object" as const } }),
                    messages   : [
                        { role: "system", content: DETECTION_SYSTEM_PROMPT },
                        { role: "user", content: prompt },
                    ],
                },
                {
                    ...(options.timeoutMs !== undefined && { timeout: options.timeoutMs }),
                    ...(options.signal !== undefined && { signal: options.signal }),
                }
            );

            content = response.choices[0]?.message?.content;
        }
        catch (error) {
            this.logger.error("Error calling OpenAI API", {
                model,
                error: describeError(error),
            });
            throw new ProviderError(this.id, describeError(error), error);
        }

        // An empty string is still a response; the normalizer turns it into a parse failure
        if (content === null || content === undefined) {
            throw new ProviderError(this.id, "No response from OpenAI");
        }

        return content;
    }

    normalize(rawText: string, promptVersion: string, modelVersion: string): ReprocessedVerdict {
        const verdict = reprocessResponse(rawText, promptVersion, modelVersion);

        if (verdict.classification === "error") {
            this.logger.error("Error processing LLM response", { reasoning: verdict.reasoning });
        }

        return verdict;
    }
}
