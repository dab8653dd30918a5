/**
 * @fileoverview Engine barrel exports
 *
 * @module @injection-detector/core/engine
 */

export {
    ClassificationOrchestrator,
    type ClassifyOptions,
    type OrchestratorConfig,
    type OrchestratorDefaults,
} from "./ClassificationOrchestrator.js";
export {
    reprocessStoredResponses,
    type ReprocessedRecord,
} from "./reprocess.js";
