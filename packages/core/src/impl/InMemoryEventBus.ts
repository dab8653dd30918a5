/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * @module @injection-detector/core/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { DetectorLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import { describeError } from "../contracts/errors.js";

/**
 * Synchronous in-memory event bus.
 *
 * Specific handlers run before wildcard ("*") handlers. A throwing handler
 * is logged and skipped; the remaining handlers still run.
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: DetectorLogger;

    constructor(logger: DetectorLogger = createConsoleLogger("EventBus")) {
        this.logger = logger;
    }

    emit(event: EventPayload): void {
        const targets = [
            ...(this.handlers.get(event.type) ?? []),
            ...(this.handlers.get("*") ?? []),
        ];

        for (const handler of targets) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("Event handler failed", {
                    eventType: event.type,
                    error    : describeError(error),
                });
            }
        }
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type. Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }
}
