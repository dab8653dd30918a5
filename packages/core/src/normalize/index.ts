/**
 * @fileoverview Normalizer barrel exports
 *
 * @module @injection-detector/core/normalize
 */

export {
    DEFAULT_REASONING,
    HIGH_SEVERITY_THRESHOLD,
    MEDIUM_SEVERITY_THRESHOLD,
    PARSE_FAILURE_REASONING,
    deriveSeverity,
    normalizeResponse,
    reprocessResponse,
} from "./ResponseNormalizer.js";
