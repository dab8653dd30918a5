/**
 * Classification Request / Result
 *
 * The inbound operation's input and output, plus the snake_case body a
 * transport layer hands back to its clients.
 */

import type { Severity, VerdictClassification } from "./ClassificationVerdict.js";

/**
 * Input to ClassificationOrchestrator.classify().
 */
export interface ClassificationRequest {
    /** Text to classify */
    readonly text: string;

    /** Model identifier; falls back to the configured default */
    readonly modelVersion?: string;

    /** Prompt template version; falls back to the configured default */
    readonly promptVersion?: string;

    /** Provider name; anything but the supported provider is rejected */
    readonly provider?: string;
}

/**
 * Final result of one classification.
 */
export interface ClassificationResult {
    readonly text: string;
    readonly classification: VerdictClassification;
    readonly confidence: number;
    readonly reasoning: string;
    readonly severity: Severity;
    readonly modelVersion: string;
    readonly promptVersion: string;
    readonly requestId: string;

    /** ISO timestamp taken after the provider responded */
    readonly timestamp: string;
}

/**
 * Wire shape of a classification result.
 */
export interface ClassificationResponseBody {
    text: string;
    classification: VerdictClassification;
    confidence: number;
    reasoning: string;
    severity: Severity;
    model_version: string;
    prompt_version: string;
    request_id: string;
    timestamp: string;
}

/**
 * Convert a result to its wire shape.
 *
 * @example
 * ```typescript
 * const body = toClassificationResponse(await orchestrator.classify({ text }));
 * res.json(body); // { ..., model_version, prompt_version, request_id, timestamp }
 * ```
 */
export function toClassificationResponse(result: ClassificationResult): ClassificationResponseBody {
    return {
        text          : result.text,
        classification: result.classification,
        confidence    : result.confidence,
        reasoning     : result.reasoning,
        severity      : result.severity,
        model_version : result.modelVersion,
        prompt_version: result.promptVersion,
        request_id    : result.requestId,
        timestamp     : result.timestamp,
    };
}
