/**
 * @fileoverview Audit Store Contract
 *
 * Append-only persistence for classification records. One record is written
 * per classification request and never updated or deleted here; retention is
 * somebody else's job.
 *
 * @module @injection-detector/core/contracts/AuditStore
 */

import type { VerdictClassification } from "./ClassificationVerdict.js";

/**
 * Persisted record of one classification request.
 */
export interface ClassificationRecord {
    /** UUID generated per request; the lookup key for audits */
    readonly requestId: string;
    readonly inputText: string;
    readonly classification: VerdictClassification;
    readonly confidence: number;
    readonly modelVersion: string;
    readonly promptVersion: string;
    readonly rawResponse: string;

    /** ISO timestamp of the request */
    readonly createdAt: string;
}

/**
 * Options for a single store call.
 */
export interface AuditWriteOptions {
    /** Abort the write when this signal fires */
    readonly signal?: AbortSignal;
}

/**
 * Audit store interface.
 *
 * `findByRequestId` returns an array: the request id index is non-unique.
 */
export interface AuditStore {
    /**
     * Append a record.
     *
     * @throws on connection or constraint failures; callers decide whether that matters
     */
    append(record: ClassificationRecord, options?: AuditWriteOptions): Promise<void>;

    /**
     * All records written for a request id, oldest first.
     */
    findByRequestId(requestId: string): Promise<ClassificationRecord[]>;
}
