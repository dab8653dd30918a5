/**
 * @fileoverview EventBus Contract
 *
 * Observability hook for the classification pipeline. The orchestrator emits
 * an event at each stage; subscribers (metrics, tracing, tests) listen without
 * touching the pipeline.
 *
 * Dispatch is synchronous and in-process. A failing handler never affects the
 * request that emitted the event.
 *
 * @module @injection-detector/core/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Request id the event belongs to, when there is one */
    readonly requestId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Pipeline stages emitted by the orchestrator.
 */
export type ClassificationEventType =
    | "classification:requested"
    | "classification:rejected"
    | "classification:completed"
    | "classification:failed";

/**
 * Audit side-effect outcomes.
 */
export type AuditEventType =
    | "audit:recorded"
    | "audit:failed";

/**
 * All known event types.
 */
export type EventType = ClassificationEventType | AuditEventType;

/**
 * Event handler function signature.
 */
export type EventHandler = (event: EventPayload) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("audit:failed", (event) => {
 *     alerts.push(event.data);
 * });
 *
 * bus.emit(createEvent("audit:failed", { error: "disk full" }, requestId));
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type, or "*" for all events.
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a type, or every subscription.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param requestId - Optional request id for correlation
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    requestId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        ...(requestId !== undefined && { requestId }),
        ...(data !== undefined && { data }),
    };
}
