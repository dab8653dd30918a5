/**
 * @fileoverview Template barrel exports
 *
 * @module @injection-detector/core/templates
 */

export {
    PromptTemplateRegistry,
    createTemplateRegistry,
} from "./PromptTemplateRegistry.js";
export {
    BUILTIN_TEMPLATES,
    INJECTION_DETECTOR_V1,
    INJECTION_DETECTOR_V2,
    INJECTION_DETECTOR_V3,
} from "./builtin.js";
export {
    loadTemplatesFromFile,
    loadTemplatesWithFallback,
} from "./loadTemplates.js";
