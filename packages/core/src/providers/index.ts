/**
 * @fileoverview Provider barrel exports
 *
 * @module @injection-detector/core/providers
 */

export { ProviderRegistry } from "./ProviderRegistry.js";
