/**
 * @fileoverview In-Memory Audit Store
 *
 * Append-only store kept in process memory, for tests and for embedders that
 * only need the audit trail for the life of the process.
 *
 * @module @injection-detector/core/impl/InMemoryAuditStore
 */

import type { AuditStore, AuditWriteOptions, ClassificationRecord } from "../contracts/AuditStore.js";

export class InMemoryAuditStore implements AuditStore {
    private readonly records: ClassificationRecord[] = [];

    async append(record: ClassificationRecord, options?: AuditWriteOptions): Promise<void> {
        options?.signal?.throwIfAborted();
        this.records.push(Object.freeze({ ...record }));
    }

    async findByRequestId(requestId: string): Promise<ClassificationRecord[]> {
        return this.records.filter(record => record.requestId === requestId);
    }

    /**
     * Every record in insertion order.
     */
    all(): readonly ClassificationRecord[] {
        return [...this.records];
    }

    get size(): number {
        return this.records.length;
    }
}
