/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    DEFAULT_CONFIG,
    type AppConfig,
} from "./loadConfig.js";
