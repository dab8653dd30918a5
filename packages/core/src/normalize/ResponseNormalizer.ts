/**
 * @fileoverview Response Normalizer
 *
 * Turns raw completion text into a verdict. Two entry points share one set of
 * extraction rules and differ only in how they report malformed input:
 *
 * - normalizeResponse(): fresh provider output. Malformed text becomes the
 *   sentinel { benign, -1.0, "Error parsing response" }.
 * - reprocessResponse(): stored raw text. Malformed text becomes
 *   { error, 0, "Error processing response: <cause>" }.
 *
 * Existing consumers depend on each shape; keep them apart.
 *
 * @module @injection-detector/core/normalize/ResponseNormalizer
 */

import {
    createVerdict,
    isSeverity,
    PARSE_FAILURE_CONFIDENCE,
    type ClassificationVerdict,
    type ReprocessedVerdict,
    type Severity,
    type VerdictClassification,
} from "../contracts/ClassificationVerdict.js";
import { describeError } from "../contracts/errors.js";

/** Confidence at or above which a malicious verdict is rated high */
export const HIGH_SEVERITY_THRESHOLD = 0.8;

/** Confidence at or above which a malicious verdict is rated medium */
export const MEDIUM_SEVERITY_THRESHOLD = 0.5;

export const DEFAULT_REASONING = "No reasoning provided";
export const PARSE_FAILURE_REASONING = "Error parsing response";

/**
 * Fields extracted from a well-formed response.
 */
interface ParsedVerdict {
    classification: VerdictClassification;
    confidence: number;
    reasoning: string;
    severity: Severity;
}

/**
 * Thrown internally when text parses but lacks the verdict structure.
 */
class MalformedResponseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "MalformedResponseError";
    }
}

function isVerdictLabel(value: unknown): value is "benign" | "malicious" {
    return value === "benign" || value === "malicious";
}

function describeJsonType(value: unknown): string {
    if (value === null) {
        return "null";
    }
    return Array.isArray(value) ? "array" : typeof value;
}

/**
 * Derive severity from confidence.
 *
 * Only malicious verdicts have a severity. Older templates never asked the
 * model for one, so it is filled in from confidence.
 */
export function deriveSeverity(classification: VerdictClassification, confidence: number): Severity {
    if (classification !== "malicious") {
        return "";
    }

    if (confidence >= HIGH_SEVERITY_THRESHOLD) {
        return "high";
    }

    if (confidence >= MEDIUM_SEVERITY_THRESHOLD) {
        return "medium";
    }

    return "low";
}

/**
 * Parse raw text and extract verdict fields.
 *
 * @throws SyntaxError when the text is not JSON
 * @throws MalformedResponseError when the JSON is not a verdict object
 */
function parseVerdict(rawText: string): ParsedVerdict {
    const parsed: unknown = JSON.parse(rawText);

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new MalformedResponseError(`Expected a JSON object but received ${describeJsonType(parsed)}`);
    }

    const payload: Record<string, unknown> = { ...parsed };

    const classification = payload.classification ?? "benign";
    if (!isVerdictLabel(classification)) {
        throw new MalformedResponseError(`Unexpected classification: ${JSON.stringify(classification)}`);
    }

    const confidence = payload.confidence ?? 0.0;
    if (typeof confidence !== "number" || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
        throw new MalformedResponseError(`Confidence must be a number between 0 and 1, received ${JSON.stringify(confidence)}`);
    }

    const reasoning = payload.reasoning ?? DEFAULT_REASONING;
    if (typeof reasoning !== "string") {
        throw new MalformedResponseError(`Reasoning must be a string, received ${describeJsonType(reasoning)}`);
    }

    const reported = payload.severity;
    const severity: Severity = classification === "malicious" && isSeverity(reported) && reported !== ""
        ? reported
        : deriveSeverity(classification, confidence);

    return { classification, confidence, reasoning, severity };
}

/**
 * Normalize fresh provider output into a verdict.
 *
 * Never throws: malformed output yields the parse-failure sentinel with
 * confidence -1.0.
 *
 * @param rawText - Completion text from the provider
 *
 * @example
 * ```typescript
 * normalizeResponse('{"classification":"malicious","confidence":0.85}');
 * // { classification: "malicious", confidence: 0.85,
 * //   reasoning: "No reasoning provided", severity: "high", rawResponse: ... }
 *
 * normalizeResponse("Sure! Here is my analysis...");
 * // { classification: "benign", confidence: -1, reasoning: "Error parsing response", ... }
 * ```
 */
export function normalizeResponse(rawText: string): ClassificationVerdict {
    try {
        return createVerdict({ ...parseVerdict(rawText), rawResponse: rawText });
    }
    catch {
        return createVerdict({
            classification: "benign",
            confidence    : PARSE_FAILURE_CONFIDENCE,
            reasoning     : PARSE_FAILURE_REASONING,
            severity      : "",
            rawResponse   : rawText,
        });
    }
}

/**
 * Reprocess a stored raw response.
 *
 * Never throws: malformed text yields an "error" verdict whose reasoning
 * carries the cause.
 *
 * @param rawText - Completion text as stored
 * @param promptVersion - Prompt version the text was produced with
 * @param modelVersion - Model the text was produced with
 */
export function reprocessResponse(
    rawText: string,
    promptVersion: string,
    modelVersion: string
): ReprocessedVerdict {
    let verdict: ReprocessedVerdict;

    try {
        verdict = { ...parseVerdict(rawText), modelVersion, promptVersion };
    }
    catch (error) {
        verdict = {
            classification: "error",
            confidence    : 0,
            reasoning     : `Error processing response: ${describeError(error)}`,
            severity      : "",
            modelVersion,
            promptVersion,
        };
    }

    return Object.freeze(verdict);
}
