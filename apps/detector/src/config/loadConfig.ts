/**
 * @fileoverview Application configuration
 *
 * Reads detector settings from the environment. `.env` is loaded by the entry
 * point before this runs.
 *
 * @module config/loadConfig
 */

import { ConfigurationError, isLogLevel, type LogLevel } from "@injection-detector/core";

/**
 * Detector application configuration.
 */
export interface AppConfig {
    readonly appName: string;
    readonly appVersion: string;

    /** Supported provider: registry name plus credential */
    readonly provider: {
        readonly name: string;
        readonly apiKey?: string;
    };

    /** Versions used when a request omits them */
    readonly defaults: {
        readonly modelVersion: string;
        readonly promptVersion: string;
    };

    readonly audit: {
        readonly enabled: boolean;
        readonly databasePath: string;
    };

    /** Bound on the provider call and the audit write, in milliseconds */
    readonly requestTimeoutMs: number;

    /** Optional YAML file with extra prompt versions */
    readonly templatesFile?: string;

    readonly logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
    appName   : "Prompt Injection Detector",
    appVersion: "0.1.0",
    provider  : {
        name: "openai",
    },
    defaults: {
        modelVersion : "gpt-4.1-nano",
        promptVersion: "v1",
    },
    audit: {
        enabled     : true,
        databasePath: "data/prompt-security.db",
    },
    requestTimeoutMs: 30000,
    logLevel        : "info",
};

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Read a variable, treating blank values as unset.
 */
function readString(env: Environment, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function readBoolean(env: Environment, key: string, fallback: boolean): boolean {
    const value = readString(env, key);
    if (value === undefined) {
        return fallback;
    }

    switch (value.toLowerCase()) {
        case "true":
        case "1":
        case "yes":
            return true;
        case "false":
        case "0":
        case "no":
            return false;
        default:
            throw new ConfigurationError(`${key} must be a boolean, received '${value}'`, { key });
    }
}

function readPositiveInteger(env: Environment, key: string, fallback: number): number {
    const value = readString(env, key);
    if (value === undefined) {
        return fallback;
    }

    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigurationError(`${key} must be a positive integer, received '${value}'`, { key });
    }

    return parsed;
}

function readLogLevel(env: Environment, key: string, fallback: LogLevel): LogLevel {
    const value = readString(env, key)?.toLowerCase();
    if (value === undefined) {
        return fallback;
    }

    if (!isLogLevel(value)) {
        throw new ConfigurationError(`${key} must be one of debug, info, warn, error; received '${value}'`, { key });
    }

    return value;
}

/**
 * Build the application configuration from environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigurationError if a variable holds an invalid value
 *
 * @example
 * ```typescript
 * const config = loadConfig({ DEFAULT_PROMPT_VERSION: "v3", LOG_LEVEL: "debug" });
 * config.defaults.promptVersion; // "v3"
 * ```
 */
export function loadConfig(env: Environment = process.env): AppConfig {
    const templatesFile = readString(env, "PROMPT_TEMPLATES_FILE");
    const apiKey = readString(env, "OPENAI_API_KEY");

    return {
        appName   : DEFAULT_CONFIG.appName,
        appVersion: DEFAULT_CONFIG.appVersion,
        provider  : {
            name: readString(env, "DEFAULT_LLM_PROVIDER") ?? DEFAULT_CONFIG.provider.name,
            ...(apiKey !== undefined && { apiKey }),
        },
        defaults: {
            modelVersion : readString(env, "DEFAULT_MODEL") ?? DEFAULT_CONFIG.defaults.modelVersion,
            promptVersion: readString(env, "DEFAULT_PROMPT_VERSION") ?? DEFAULT_CONFIG.defaults.promptVersion,
        },
        audit: {
            enabled     : readBoolean(env, "DETECTOR_AUDIT_ENABLED", DEFAULT_CONFIG.audit.enabled),
            databasePath: readString(env, "DETECTOR_DB_PATH") ?? DEFAULT_CONFIG.audit.databasePath,
        },
        requestTimeoutMs: readPositiveInteger(env, "DETECTOR_TIMEOUT_MS", DEFAULT_CONFIG.requestTimeoutMs),
        ...(templatesFile !== undefined && { templatesFile }),
        logLevel        : readLogLevel(env, "LOG_LEVEL", DEFAULT_CONFIG.logLevel),
    };
}
