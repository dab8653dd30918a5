/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces, types and factories shared by every detector component.
 *
 * @module @injection-detector/core/contracts
 */

// Prompt template contract
export type { PromptTemplate, PromptVersion } from "./PromptTemplate.js";
export {
    createPromptTemplate,
    findMissingVerdictFields,
    TEXT_PLACEHOLDER,
    VERDICT_FIELDS,
} from "./PromptTemplate.js";

// Verdict
export type {
    ClassificationVerdict,
    ReprocessedVerdict,
    Severity,
    VerdictClassification,
} from "./ClassificationVerdict.js";
export {
    createVerdict,
    isParseFailure,
    isSeverity,
    PARSE_FAILURE_CONFIDENCE,
} from "./ClassificationVerdict.js";

// Request / result
export type {
    ClassificationRequest,
    ClassificationResult,
    ClassificationResponseBody,
} from "./ClassificationResult.js";
export { toClassificationResponse } from "./ClassificationResult.js";

// Provider contract
export type {
    LLMProvider,
    ProviderCallOptions,
    ProviderFactory,
    ProviderFactoryOptions,
} from "./LLMProvider.js";

// Audit store contract
export type {
    AuditStore,
    AuditWriteOptions,
    ClassificationRecord,
} from "./AuditStore.js";

// EventBus contract
export type {
    AuditEventType,
    ClassificationEventType,
    EventBus,
    EventHandler,
    EventPayload,
    EventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";

// Logger
export type { DetectorLogger, LogLevel } from "./Logger.js";
export { LOG_LEVELS, createConsoleLogger, isLogLevel } from "./Logger.js";

// Errors
export {
    ConfigurationError,
    DetectorError,
    DetectorErrorCode,
    ProviderError,
    ProviderNotRegisteredError,
    TemplateRegistrationError,
    UnknownTemplateVersionError,
    UnsupportedProviderError,
    describeError,
    isDetectorError,
} from "./errors.js";
