/**
 * @fileoverview Implementation barrel exports
 *
 * In-process implementations of detector contracts.
 *
 * @module @injection-detector/core/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { InMemoryAuditStore } from "./InMemoryAuditStore.js";
