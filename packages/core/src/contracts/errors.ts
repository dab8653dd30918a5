/**
 * @fileoverview Detector error taxonomy
 *
 * Structured errors with stable codes. Client input errors are raised before
 * any external call; provider errors are fatal to a request; wiring errors
 * surface at startup.
 *
 * @module @injection-detector/core/contracts/errors
 */

/**
 * Error codes for categorizing detector failures.
 */
export enum DetectorErrorCode {
    // Client input (1xxx)
    UNSUPPORTED_PROVIDER = "E1001",
    UNKNOWN_TEMPLATE_VERSION = "E1002",

    // Provider (2xxx)
    PROVIDER_FAILED = "E2000",
    PROVIDER_NOT_REGISTERED = "E2001",

    // Templates (3xxx)
    TEMPLATE_REGISTRATION_FAILED = "E3000",
    TEMPLATE_FILE_INVALID = "E3001",

    // General (9xxx)
    CONFIGURATION_INVALID = "E9001",
}

const CLIENT_ERROR_CODES: ReadonlySet<DetectorErrorCode> = new Set([
    DetectorErrorCode.UNSUPPORTED_PROVIDER,
    DetectorErrorCode.UNKNOWN_TEMPLATE_VERSION,
]);

/**
 * Base error class for all detector errors.
 */
export class DetectorError extends Error {
    readonly code: DetectorErrorCode;
    readonly timestamp: Date;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        code: DetectorErrorCode,
        context?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "DetectorError";
        this.code = code;
        this.timestamp = new Date();
        this.context = context;

        Error.captureStackTrace(this, this.constructor);
    }

    /**
     * True for request-rejection errors (bad provider, bad prompt version).
     * These are never retried.
     */
    isClientError(): boolean {
        return CLIENT_ERROR_CODES.has(this.code);
    }

    /**
     * Convert error to JSON for logging
     */
    toJSON(): Record<string, unknown> {
        return {
            name     : this.name,
            message  : this.message,
            code     : this.code,
            timestamp: this.timestamp.toISOString(),
            context  : this.context,
        };
    }

    toString(): string {
        return `[${this.code}] ${this.name}: ${this.message}`;
    }
}

/**
 * Raised when a request names a provider other than the supported one.
 */
export class UnsupportedProviderError extends DetectorError {
    constructor(provider: string, supported: string) {
        super(
            `Provider '${provider}' is not supported. Only '${supported}' is available.`,
            DetectorErrorCode.UNSUPPORTED_PROVIDER,
            { provider, supported }
        );
        this.name = "UnsupportedProviderError";
    }
}

/**
 * Raised when no prompt template is registered under a version.
 */
export class UnknownTemplateVersionError extends DetectorError {
    constructor(version: string, available: readonly string[]) {
        super(
            `Prompt version ${version} not found`,
            DetectorErrorCode.UNKNOWN_TEMPLATE_VERSION,
            { version, available: [...available] }
        );
        this.name = "UnknownTemplateVersionError";
    }
}

/**
 * Wraps any transport, auth or quota failure from an LLM backend.
 */
export class ProviderError extends DetectorError {
    readonly providerId: string;

    constructor(providerId: string, message: string, cause?: unknown) {
        super(
            `Provider '${providerId}' failed: ${message}`,
            DetectorErrorCode.PROVIDER_FAILED,
            { providerId },
            { cause }
        );
        this.name = "ProviderError";
        this.providerId = providerId;
    }
}

/**
 * Raised by the provider registry for names nobody registered.
 */
export class ProviderNotRegisteredError extends DetectorError {
    constructor(name: string, available: readonly string[]) {
        super(
            `Provider '${name}' not found. Available providers: ${available.join(", ")}`,
            DetectorErrorCode.PROVIDER_NOT_REGISTERED,
            { name, available: [...available] }
        );
        this.name = "ProviderNotRegisteredError";
    }
}

export class TemplateRegistrationError extends DetectorError {
    constructor(message: string, code: DetectorErrorCode = DetectorErrorCode.TEMPLATE_REGISTRATION_FAILED) {
        super(message, code);
        this.name = "TemplateRegistrationError";
    }
}

export class ConfigurationError extends DetectorError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, DetectorErrorCode.CONFIGURATION_INVALID, context);
        this.name = "ConfigurationError";
    }
}

/**
 * Type guard for detector errors.
 */
export function isDetectorError(error: unknown): error is DetectorError {
    return error instanceof DetectorError;
}

/**
 * Extract a loggable message from anything thrown.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
