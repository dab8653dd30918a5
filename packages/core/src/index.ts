/**
 * @fileoverview Injection Detector Core
 *
 * Provider-agnostic prompt injection classification pipeline.
 *
 * The core provides:
 * - Versioned prompt templates and a registry to select them
 * - A provider contract and a register-by-name provider registry
 * - Response normalization with severity derivation
 * - An orchestrator that runs template, provider, normalizer and audit log
 *
 * @module @injection-detector/core
 * @example
 * ```typescript
 * import {
 *     ClassificationOrchestrator,
 *     ProviderRegistry,
 *     createTemplateRegistry,
 * } from "@injection-detector/core";
 *
 * // Register providers at startup
 * // Build the orchestrator around the supported provider
 * // Call classify() per request
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus, InMemoryAuditStore } from "./impl/index.js";

// ============================================================================
// Pipeline exports
// ============================================================================

export * from "./templates/index.js";
export * from "./normalize/index.js";
export * from "./providers/index.js";
export * from "./engine/index.js";
