/**
 * Classification Verdict
 *
 * The structured outcome for one input text, produced by the response
 * normalizer from provider output. Immutable once created.
 */

import type { PromptVersion } from "./PromptTemplate.js";

/**
 * Verdict label. "error" only ever comes out of the reprocessing path.
 */
export type VerdictClassification = "benign" | "malicious" | "error";

/**
 * Coarse impact rating for malicious verdicts; empty for everything else.
 */
export type Severity = "" | "low" | "medium" | "high";

/**
 * Confidence reported when a fresh provider response could not be parsed.
 * Legitimate confidence lies in [0, 1], so consumers can tell the two apart.
 */
export const PARSE_FAILURE_CONFIDENCE = -1.0;

/**
 * Verdict produced from a fresh provider response.
 */
export interface ClassificationVerdict {
    readonly classification: VerdictClassification;

    /** Confidence in [0, 1], or -1.0 for a parse failure */
    readonly confidence: number;

    readonly reasoning: string;

    readonly severity: Severity;

    /** Completion text exactly as the provider returned it */
    readonly rawResponse: string;
}

/**
 * Verdict produced when reprocessing a previously stored raw response.
 * Carries the versions the response was originally produced with.
 */
export interface ReprocessedVerdict {
    readonly classification: VerdictClassification;
    readonly confidence: number;
    readonly reasoning: string;
    readonly severity: Severity;
    readonly modelVersion: string;
    readonly promptVersion: PromptVersion;
}

/**
 * Factory function to create a ClassificationVerdict.
 * Ensures the object is frozen (immutable).
 */
export function createVerdict(fields: ClassificationVerdict): ClassificationVerdict {
    return Object.freeze({
        classification: fields.classification,
        confidence    : fields.confidence,
        reasoning     : fields.reasoning,
        severity      : fields.severity,
        rawResponse   : fields.rawResponse,
    });
}

/**
 * Check whether a verdict is the fresh-path parse failure sentinel.
 */
export function isParseFailure(verdict: Pick<ClassificationVerdict, "confidence">): boolean {
    return verdict.confidence === PARSE_FAILURE_CONFIDENCE;
}

export function isSeverity(value: unknown): value is Severity {
    return value === "" || value === "low" || value === "medium" || value === "high";
}
