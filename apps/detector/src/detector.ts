/**
 * @fileoverview Detector wiring
 *
 * Builds the template registry, provider, audit store and orchestrator from
 * the application configuration. The provider is constructed on first use so
 * read-only commands run without an API key.
 *
 * @module detector
 */

import {
    ClassificationOrchestrator,
    ConfigurationError,
    UnsupportedProviderError,
    createTemplateRegistry,
    loadTemplatesWithFallback,
    reprocessStoredResponses,
    type ClassificationRecord,
    type ClassificationRequest,
    type ClassificationResult,
    type DetectorLogger,
    type LLMProvider,
    type PromptTemplateRegistry,
    type ProviderRegistry,
    type ReprocessedRecord,
} from "@injection-detector/core";
import type { AppConfig } from "./config/index.js";
import { SqliteAuditStore } from "./persistence/index.js";

export interface DetectorOptions {
    providers: ProviderRegistry;
    logger: DetectorLogger;
}

/**
 * Detector application facade
 */
export class Detector {
    readonly templates: PromptTemplateRegistry;
    readonly auditStore: SqliteAuditStore | null;

    private provider: LLMProvider | null = null;
    private orchestrator: ClassificationOrchestrator | null = null;

    constructor(
        private readonly config: AppConfig,
        private readonly options: DetectorOptions
    ) {
        const extra = config.templatesFile
            ? loadTemplatesWithFallback(config.templatesFile, options.logger)
            : [];

        this.templates = createTemplateRegistry(extra);
        this.auditStore = config.audit.enabled
            ? new SqliteAuditStore({ path: config.audit.databasePath, logger: options.logger })
            : null;

        options.logger.debug("Detector configured", {
            provider      : config.provider.name,
            promptVersions: this.templates.versions(),
            audit         : config.audit.enabled,
        });
    }

    /**
     * The configured provider, constructed through the registry on first use
     *
     * @throws ProviderNotRegisteredError if the configured name has no factory
     */
    getProvider(): LLMProvider {
        if (!this.provider) {
            this.provider = this.options.providers.create(this.config.provider.name, {
                apiKey: this.config.provider.apiKey,
                logger: this.options.logger,
            });
        }
        return this.provider;
    }

    /**
     * @throws UnsupportedProviderError before the provider is constructed when
     *         the request names a provider other than the configured one
     */
    async classify(request: ClassificationRequest): Promise<ClassificationResult> {
        const supported = this.config.provider.name;
        if (request.provider !== undefined && request.provider !== supported) {
            throw new UnsupportedProviderError(request.provider, supported);
        }

        return this.getOrchestrator().classify(request, { timeoutMs: this.config.requestTimeoutMs });
    }

    async reprocess(requestId: string): Promise<ReprocessedRecord[]> {
        return reprocessStoredResponses(this.requireAuditStore(), this.getProvider(), requestId);
    }

    async history(limit: number): Promise<ClassificationRecord[]> {
        return this.requireAuditStore().recent(limit);
    }

    close(): void {
        this.auditStore?.close();
    }

    private getOrchestrator(): ClassificationOrchestrator {
        if (!this.orchestrator) {
            const orchestrator = new ClassificationOrchestrator({
                templates : this.templates,
                provider  : this.getProvider(),
                defaults  : this.config.defaults,
                auditStore: this.auditStore ?? undefined,
                logger    : this.options.logger,
            });

            orchestrator.eventBus.subscribe("*", (event) => {
                this.options.logger.debug(`Event ${event.type}`, {
                    requestId: event.requestId,
                    ...event.data,
                });
            });

            this.orchestrator = orchestrator;
        }
        return this.orchestrator;
    }

    private requireAuditStore(): SqliteAuditStore {
        if (!this.auditStore) {
            throw new ConfigurationError("Audit logging is disabled (DETECTOR_AUDIT_ENABLED=false)");
        }
        return this.auditStore;
    }
}
